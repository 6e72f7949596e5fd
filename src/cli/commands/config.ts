/**
 * Config command - Show configuration file location
 */

import { z } from "zod";
import { getUserConfigPath, loadConfig } from "../../utils/load-config";
import { describeError } from "../../utils/errors";

const ConfigOptionsSchema = z.object({
  show: z.boolean().optional(),
  config: z.string().optional(),
});

export async function configCommand(opts: unknown): Promise<void> {
  const options = ConfigOptionsSchema.parse(opts);
  const configPath = getUserConfigPath();

  if (options.show) {
    const { config, errors } = await loadConfig(options.config);
    for (const err of errors) {
      console.warn(`Ignoring ${err.path}: ${describeError(err.error)}`);
    }
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize build settings.");
  console.log("See src/config/default.json for available options.");
}
