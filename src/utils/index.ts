/**
 * Utility exports
 */

// Path utilities
export { isInside, mapPath } from "./map-path";

// Filesystem utilities
export { fileExists, directoryProblem } from "./fs";

// Concurrency
export { forEachConcurrent } from "./concurrency";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";
export { resolveTarget, PackageNameSchema } from "./resolve-target";

// Errors
export {
  PathOutsideRootError,
  WalkError,
  TransformError,
  UnsafeTargetError,
  SourceRootError,
  toTransformError,
  toWalkError,
  describeError,
} from "./errors";

// Classes
export { Logger } from "./logger";
