/**
 * Central type exports
 */

// Configuration
export type {
  BuildConfig,
  PartialBuildConfig,
  SourceConfig,
  OutputConfig,
  ToolConfig,
  ToolsConfig,
  ExecutionConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  BuildConfigSchema,
  PartialBuildConfigSchema,
} from "./config";

// Files
export type {
  FileEntry,
  TransformSpec,
  OperationKind,
  ExternalOperation,
  SupportedExtension,
} from "./files";
export { OPERATION_KINDS, SUPPORTED_EXTENSIONS } from "./files";

// Pipeline
export type {
  WalkEvent,
  WalkOptions,
  Transformer,
  TransformerSet,
  TransformOutcome,
  StagePlan,
  StageResult,
  FailedFile,
  BuildReport,
} from "./pipeline";

// Context
export type { BuildTarget, BuildOptions } from "./context";
