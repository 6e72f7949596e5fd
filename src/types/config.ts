/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ToolConfigSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()),
  })
  .refine(
    (tool) =>
      tool.args.some((arg) => arg.includes("{input}")) &&
      tool.args.some((arg) => arg.includes("{output}")),
    { message: "Tool arguments must reference {input} and {output}" },
  );

export const SourceConfigSchema = z.object({
  directory: z.string(),
  assets: z.string(), // Relative to the package source root
  ignore: z.array(z.string()),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  clean: z.boolean(),
});

export const ToolsConfigSchema = z.object({
  compile: ToolConfigSchema,
  "minify-markup": ToolConfigSchema,
  "minify-script": ToolConfigSchema,
  "minify-style": ToolConfigSchema,
});

export const ExecutionConfigSchema = z.object({
  concurrency: z.number().int().positive(),
  timeout: z.number().int().positive(), // In milliseconds, per external call
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const BuildConfigSchema = z.object({
  source: SourceConfigSchema,
  output: OutputConfigSchema,
  tools: ToolsConfigSchema,
  execution: ExecutionConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialBuildConfigSchema = z.object({
  source: SourceConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  tools: ToolsConfigSchema.partial().optional(),
  execution: ExecutionConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ToolConfig = z.infer<typeof ToolConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PartialBuildConfig = z.infer<typeof PartialBuildConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
