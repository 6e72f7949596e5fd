/**
 * Build command - Loads config and runs the packaging pipeline
 */

import ora, { type Ora } from "ora";
import { z } from "zod";
import { describeError, loadConfig, resolveTarget, Logger } from "../../utils";
import { build, exitCodeFor } from "../../builder";
import { createTransformers } from "../../transformers";
import * as modules from "../../modules";

const BuildOptionsSchema = z.object({
  config: z.string().optional(),
  clean: z.boolean().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  report: z.string().optional(),
  verbose: z.boolean().optional(),
});

export async function buildCommand(
  packageName: string | undefined,
  opts: unknown,
): Promise<void> {
  let spinner: Ora | undefined;
  let verbose = false;

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);
    verbose = options.verbose ?? false;

    const progress = ora({
      text: "Loading configuration...",
      indent: 2,
      // Debug logging and a spinner fight over the same line
      isEnabled: !verbose,
    }).start();
    spinner = progress;

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    for (const err of errors) {
      progress.warn(`Ignoring ${err.path}: ${describeError(err.error)}`);
      progress.start();
    }

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    const target = resolveTarget(config, packageName);

    const report = await build(target.sourceRoot, target.destRoot, {
      transformers: createTransformers(config.tools, config.execution),
      assets: target.assets,
      ignore: config.source.ignore,
      concurrency: options.concurrency ?? config.execution.concurrency,
      // --no-clean only ever turns cleaning off
      clean: options.clean === false ? false : config.output.clean,
      logger,
      onStage: (plan) => {
        progress.text = `Running ${plan.name}...`;
      },
    });

    // Clear and stop spinner before displaying stats
    progress.clear();
    progress.stop();

    await modules.stats(report, {
      verbose: options.verbose,
      exportPath: options.report,
    });

    process.exitCode = exitCodeFor(report);
  } catch (error) {
    const message = `Build failed: ${describeError(error)}`;
    if (spinner) {
      spinner.fail(message);
    } else {
      console.error(`  ✖ ${message}`);
    }
    if (verbose) {
      console.error(error);
    }
    process.exit(1);
  }
}
