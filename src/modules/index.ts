/**
 * Pipeline modules export
 */

export { walk } from "./walker";
export { TransformRegistry, DEFAULT_TRANSFORMS, EXTENSION_STAGES } from "./registry";
export { StageRunner } from "./stage";
export type { StageRunnerOptions } from "./stage";
export { clean, assertSafeTarget } from "./cleanup";
export { stats, exportReport, reportToJson } from "./stats";
