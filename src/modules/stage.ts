/**
 * Stage Runner Module
 * Walks one stage's subtree and pushes every file through its transformer
 *
 * A file that fails to transform is recorded and the stage moves on; only a
 * path the mapper refuses (a programmer error) escapes the stage.
 */

import path from "node:path";
import { mkdir } from "fs/promises";
import { walk } from "./walker";
import { TransformRegistry } from "./registry";
import { mapPath } from "../utils/map-path";
import { forEachConcurrent } from "../utils/concurrency";
import { toTransformError } from "../utils/errors";
import { Logger } from "../utils/logger";
import type {
  FileEntry,
  StagePlan,
  StageResult,
  TransformerSet,
  TransformOutcome,
  TransformSpec,
} from "../types";

export interface StageRunnerOptions {
  sourceRoot: string;
  destRoot: string;
  transformers: TransformerSet;
  registry?: TransformRegistry;
  concurrency?: number;
  logger?: Logger;
}

export class StageRunner {
  private readonly sourceRoot: string;
  private readonly destRoot: string;
  private readonly registry: TransformRegistry;
  private readonly concurrency: number;
  private readonly logger: Logger;

  // Directories created (or being created) during this runner's lifetime
  private readonly ensured = new Map<string, Promise<void>>();

  constructor(private readonly options: StageRunnerOptions) {
    this.sourceRoot = path.resolve(options.sourceRoot);
    this.destRoot = path.resolve(options.destRoot);
    this.registry = options.registry ?? new TransformRegistry();
    this.concurrency = options.concurrency ?? 1;
    this.logger = options.logger ?? new Logger("warn");
  }

  async run(plan: StagePlan): Promise<StageResult> {
    const startTime = Date.now();
    const result: StageResult = {
      name: plan.name,
      operation: plan.operation,
      processed: 0,
      skipped: 0,
      failed: [],
      walkErrors: [],
      symlinks: [],
      durationMs: 0,
    };

    const logger = this.logger.scoped(plan.name);
    const events = walk(plan.root, {
      extensions: plan.extensions,
      ignore: plan.ignore,
    });

    await forEachConcurrent(events, this.concurrency, async (event) => {
      switch (event.kind) {
        case "symlink":
          logger.debug(`not following symlink ${event.path}`);
          result.symlinks.push(event.path);
          return;
        case "error":
          logger.warn(`cannot read ${event.error.path}: ${event.error.message}`);
          result.walkErrors.push(event.error);
          return;
        case "file":
          await this.processFile(plan, event.entry, result, logger);
          return;
      }
    });

    // Completion order depends on the pool; keep reports reproducible
    result.failed.sort((a, b) => a.entry.absolutePath.localeCompare(b.entry.absolutePath));
    result.walkErrors.sort((a, b) => a.path.localeCompare(b.path));
    result.symlinks.sort();
    result.durationMs = Date.now() - startTime;

    return result;
  }

  private specFor(plan: StagePlan, entry: FileEntry): TransformSpec | undefined {
    if (!plan.extensions) {
      return {
        matchExtension: entry.extension,
        destinationExtension: null,
        operation: plan.operation,
      };
    }

    const spec = this.registry.resolve(entry.extension);
    return spec && spec.operation === plan.operation ? spec : undefined;
  }

  private async processFile(
    plan: StagePlan,
    entry: FileEntry,
    result: StageResult,
    logger: Logger,
  ): Promise<void> {
    const spec = this.specFor(plan, entry);
    if (!spec) {
      result.skipped++;
      return;
    }

    const destination = mapPath(
      this.sourceRoot,
      this.destRoot,
      entry.absolutePath,
      spec.destinationExtension,
    );

    let outcome: TransformOutcome;
    try {
      await this.ensureDirectory(path.dirname(destination));
      outcome = await this.options.transformers[spec.operation](
        entry.absolutePath,
        destination,
      );
    } catch (error) {
      outcome = { ok: false, error: toTransformError(error) };
    }

    if (outcome.ok) {
      logger.debug(`${entry.relativePath} -> ${path.relative(this.destRoot, destination)}`);
      result.processed++;
      return;
    }

    logger.warn(`${entry.absolutePath}: ${outcome.error.message}`);
    result.failed.push({ entry, error: outcome.error });
  }

  /**
   * Create a destination directory once per runner; concurrent callers share the same creation
   */
  private ensureDirectory(directory: string): Promise<void> {
    const existing = this.ensured.get(directory);
    if (existing) return existing;

    const pending = mkdir(directory, { recursive: true }).then(
      () => undefined,
      (error: unknown) => {
        this.ensured.delete(directory);
        throw error;
      },
    );
    this.ensured.set(directory, pending);
    return pending;
  }
}
