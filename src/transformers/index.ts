/**
 * Transformer exports
 */

import { createCommandTransformer } from "./command";
import { copyTransformer } from "./copy";
import type { ExecutionConfig, ToolsConfig, TransformerSet } from "../types";

export { createCommandTransformer, interpolateArgs, runCommand } from "./command";
export { copyTransformer } from "./copy";

/**
 * One transformer per operation, external ones configured from `tools`
 */
export function createTransformers(
  tools: ToolsConfig,
  execution: Pick<ExecutionConfig, "timeout">,
): TransformerSet {
  const options = { timeout: execution.timeout };

  return {
    compile: createCommandTransformer(tools.compile, options),
    "minify-markup": createCommandTransformer(tools["minify-markup"], options),
    "minify-script": createCommandTransformer(tools["minify-script"], options),
    "minify-style": createCommandTransformer(tools["minify-style"], options),
    copy: copyTransformer,
  };
}
