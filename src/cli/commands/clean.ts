/**
 * Clean command - Removes the distribution tree of a package
 */

import chalk from "chalk";
import { z } from "zod";
import { loadConfig, resolveTarget } from "../../utils";
import { clean } from "../../modules";

const CleanOptionsSchema = z.object({
  config: z.string().optional(),
});

export async function cleanCommand(
  packageName: string | undefined,
  opts: unknown,
): Promise<void> {
  const options = CleanOptionsSchema.parse(opts);

  try {
    const { config } = await loadConfig(options.config);
    const target = resolveTarget(config, packageName);

    await clean(target.destRoot, target.sourceRoot);
    console.log(`  ${chalk.green("✔")} Removed ${chalk.white(target.destRoot)}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`  ${chalk.red("✖")} ${message}`);
    process.exit(1);
  }
}
