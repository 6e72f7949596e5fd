/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { BuildConfig, ConfigError, PartialBuildConfig } from "../types";
import { BuildConfigSchema, PartialBuildConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("release-packer", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<BuildConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return BuildConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial config file with Zod validation
 * Throws error if the file is unreadable or invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialBuildConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialBuildConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs, one level down
 */
export function mergeConfig(
  base: BuildConfig,
  override: PartialBuildConfig,
): BuildConfig {
  return {
    source: { ...base.source, ...override.source },
    output: { ...base.output, ...override.output },
    // Each tool is replaced as a whole
    tools: { ...base.tools, ...override.tools },
    execution: { ...base.execution, ...override.execution },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: BuildConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/release-packer/config.json
 * - macOS: ~/Library/Preferences/release-packer/config.json
 * - Windows: %APPDATA%\release-packer\config.json
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}
