/**
 * Transform Registry
 * Maps file extensions to the operation that produces their distribution counterpart
 */

import type {
  OperationKind,
  StagePlan,
  SupportedExtension,
  TransformSpec,
} from "../types";

/**
 * Stages that run over registered extensions, in pipeline order.
 * The verbatim assets copy always runs after these.
 */
export const EXTENSION_STAGES: readonly OperationKind[] = [
  "compile",
  "minify-markup",
  "minify-script",
  "minify-style",
];

export const DEFAULT_TRANSFORMS: Record<SupportedExtension, TransformSpec> = {
  ".py": { matchExtension: ".py", destinationExtension: ".pyc", operation: "compile" },
  ".html": { matchExtension: ".html", destinationExtension: null, operation: "minify-markup" },
  ".htm": { matchExtension: ".htm", destinationExtension: null, operation: "minify-markup" },
  ".js": { matchExtension: ".js", destinationExtension: null, operation: "minify-script" },
  ".mjs": { matchExtension: ".mjs", destinationExtension: null, operation: "minify-script" },
  ".css": { matchExtension: ".css", destinationExtension: null, operation: "minify-style" },
};

export class TransformRegistry {
  private specs = new Map<string, TransformSpec>();

  constructor(specs: Iterable<TransformSpec> = Object.values(DEFAULT_TRANSFORMS)) {
    for (const spec of specs) {
      const key = spec.matchExtension.toLowerCase();
      if (this.specs.has(key)) {
        throw new Error(`Duplicate transform registered for ${key}`);
      }
      this.specs.set(key, { ...spec, matchExtension: key });
    }
  }

  /**
   * Look up the spec for an extension (case-insensitive, exact match)
   * Undefined means the file is not stage-eligible
   */
  resolve(extension: string): TransformSpec | undefined {
    return this.specs.get(extension.toLowerCase());
  }

  extensionsFor(operation: OperationKind): string[] {
    const extensions: string[] = [];
    for (const spec of this.specs.values()) {
      if (spec.operation === operation) {
        extensions.push(spec.matchExtension);
      }
    }
    return extensions.sort();
  }

  list(): TransformSpec[] {
    return [...this.specs.values()];
  }

  /**
   * Extension stages in pipeline order. Operations with nothing registered are left out.
   */
  plan(root: string, ignore: readonly string[] = []): StagePlan[] {
    const plans: StagePlan[] = [];

    for (const operation of EXTENSION_STAGES) {
      const extensions = this.extensionsFor(operation);
      if (extensions.length === 0) continue;

      plans.push({ name: operation, operation, root, extensions, ignore });
    }

    // Copy specs registered by callers run after the minifiers
    const copied = this.extensionsFor("copy");
    if (copied.length > 0) {
      plans.push({ name: "copy", operation: "copy", root, extensions: copied, ignore });
    }

    return plans;
  }
}
