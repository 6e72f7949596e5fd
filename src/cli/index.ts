#!/usr/bin/env tsx

/**
 * CLI entry point for the release packer
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { cleanCommand } from "./commands/clean";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("release-pack")
  .description("Compile, minify and mirror a source tree into a distribution tree")
  .version("0.1.0");

function addBuildOptions(command: Command): Command {
  return command
    .argument("[package]", "Package directory to build (defaults to the whole source directory)")
    .option("-c, --config <path>", "Path to custom config file")
    .option("--no-clean", "Keep existing output instead of removing it first")
    .option("-j, --concurrency <n>", "Files transformed in parallel per stage")
    .option("--report <path>", "Write a JSON build report to this path")
    .option("-v, --verbose", "Verbose output")
    .action(buildCommand);
}

// Build is the default action
addBuildOptions(program);

addBuildOptions(
  program.command("build").description("Build a package into the output directory"),
);

program
  .command("clean [package]")
  .description("Remove the output directory of a package")
  .option("-c, --config <path>", "Path to custom config file")
  .action(cleanCommand);

program
  .command("config")
  .description("Show configuration file location")
  .option("--show", "Print the merged configuration")
  .option("-c, --config <path>", "Path to custom config file")
  .action(configCommand);

await program.parseAsync();
