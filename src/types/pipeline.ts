/**
 * Pipeline module data types
 */

import type { FileEntry, OperationKind } from "./files";
import type { TransformError, WalkError } from "../utils/errors";

// ============================================================================
// Tree Walker
// ============================================================================

export type WalkEvent =
  | { kind: "file"; entry: FileEntry }
  | { kind: "symlink"; path: string }
  | { kind: "error"; error: WalkError };

export interface WalkOptions {
  // Lowercased extensions to keep; every file when absent
  extensions?: readonly string[];
  // fast-glob patterns relative to the walked root
  ignore?: readonly string[];
}

// ============================================================================
// Transformers
// ============================================================================

export type TransformOutcome =
  | { ok: true }
  | { ok: false; error: TransformError };

export type Transformer = (
  inputPath: string,
  outputPath: string,
) => Promise<TransformOutcome>;

export type TransformerSet = Record<OperationKind, Transformer>;

// ============================================================================
// Stage Runner
// ============================================================================

export interface StagePlan {
  name: string;
  operation: OperationKind;
  root: string; // Directory to walk, at or below the source root
  extensions?: readonly string[]; // Absent for the verbatim assets stage
  ignore: readonly string[];
}

export interface FailedFile {
  entry: FileEntry;
  error: TransformError;
}

export interface StageResult {
  name: string;
  operation: OperationKind;
  processed: number;
  skipped: number; // Walked but no spec resolved
  failed: FailedFile[];
  walkErrors: WalkError[];
  symlinks: string[];
  durationMs: number;
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface BuildReport {
  sourceRoot: string;
  destRoot: string;
  stages: StageResult[];
  processed: number;
  failed: number; // Per-file failures plus walk errors, across all stages
  durationMs: number;
}
