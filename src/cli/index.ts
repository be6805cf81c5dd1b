#!/usr/bin/env tsx

/**
 * CLI entry point for flaticon-fetch
 * Handles command-line argument parsing and user interaction
 */

import "dotenv/config";
import chalk from "chalk";
import { Command } from "commander";
import { describeError } from "../api";
import { configCommand } from "./commands/config";
import { labelsCommand } from "./commands/labels";
import { queryCommand } from "./commands/query";
import { EXIT_FAILURE } from "./setup";

const program = new Command();

program
  .name("flaticon-fetch")
  .description("Search Flaticon and download matching icons")
  .version("0.1.0");

// Options shared by both batch commands; defaults come from the config files
function withDownloadOptions(command: Command): Command {
  return command
    .option("-f, --format <format>", "Download format: png or svg (default: png)")
    .option("-s, --size <px>", "PNG size, ignored for SVG (default: 128)")
    .option("--order <order>", "Search order: priority or added (default: priority)")
    .option("-o, --out <dir>", "Output directory (default: icons)")
    .option("--delay-ms <ms>", "Pause between items in milliseconds")
    .option("--concurrency <n>", "Items processed at once (default: 1)")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-v, --verbose", "Verbose output");
}

// Batch-by-label: one icon per line
withDownloadOptions(
  program
    .command("labels <file>")
    .description("Fetch one icon per label (one label per line, # for comments)"),
).action(labelsCommand);

// Batch-by-query: up to N icons for one query
withDownloadOptions(
  program
    .command("query <query>")
    .description("Fetch up to --limit icons matching a query")
    .option("-l, --limit <n>", "Max icons to fetch (default: 10)"),
).action(queryCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(EXIT_FAILURE);
});
