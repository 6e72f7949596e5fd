/**
 * Build context - what a single build invocation is given
 */

import type { StagePlan, TransformerSet } from "./pipeline";
import type { TransformRegistry } from "../modules/registry";
import type { Logger } from "../utils/logger";

/**
 * Resolved directories for one build
 */
export interface BuildTarget {
  sourceRoot: string;
  destRoot: string;
  assets: string; // Relative to sourceRoot
}

export interface BuildOptions {
  transformers: TransformerSet;
  registry?: TransformRegistry; // Defaults to the built-in registry
  assets?: string; // Relative to sourceRoot, "assets" when absent
  ignore?: readonly string[];
  concurrency?: number;
  clean?: boolean; // Remove destRoot before building
  logger?: Logger;
  onStage?: (plan: StagePlan) => void;
}
