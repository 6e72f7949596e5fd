/**
 * Build Errors
 * Named errors for each failure class of the pipeline
 */

import { z } from "zod";

export type TransformErrorReason =
  | "missing-tool"
  | "exit-code"
  | "timeout"
  | "io-error";

export type WalkErrorReason = "permission-denied" | "read-error";

/**
 * A path handed to the mapper does not live under the source root
 */
export class PathOutsideRootError extends Error {
  constructor(
    readonly path: string,
    readonly root: string,
  ) {
    super(`Path ${path} is not inside ${root}`);
    this.name = "PathOutsideRootError";
  }
}

/**
 * A subtree could not be enumerated. Recorded, never thrown past the walker.
 */
export class WalkError extends Error {
  constructor(
    readonly path: string,
    readonly reason: WalkErrorReason,
    details: string,
  ) {
    super(details);
    this.name = "WalkError";
  }
}

/**
 * A single file could not be transformed
 */
export class TransformError extends Error {
  constructor(
    readonly reason: TransformErrorReason,
    details: string,
  ) {
    super(details);
    this.name = "TransformError";
  }
}

/**
 * Cleanup (or a build about to clean) points at a directory it must never delete
 */
export class UnsafeTargetError extends Error {
  constructor(
    readonly target: string,
    details: string,
  ) {
    super(details);
    this.name = "UnsafeTargetError";
  }
}

/**
 * The source root is missing, not a directory, or unreadable
 */
export class SourceRootError extends Error {
  constructor(
    readonly root: string,
    details: string,
  ) {
    super(details);
    this.name = "SourceRootError";
  }
}

/**
 * Map anything caught around filesystem work to a TransformError
 */
export function toTransformError(error: unknown): TransformError {
  if (error instanceof TransformError) {
    return error;
  }
  const details = error instanceof Error ? error.message : String(error);
  return new TransformError("io-error", details);
}

/**
 * Map a failed directory access to a WalkError
 */
export function toWalkError(path: string, error: unknown): WalkError {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "EACCES" || error.code === "EPERM") {
      return new WalkError(path, "permission-denied", details);
    }
  }

  return new WalkError(path, "read-error", details);
}

/**
 * One-line message for anything thrown; zod issues are joined
 */
export function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => issue.message).join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}
