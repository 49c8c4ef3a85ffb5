#!/usr/bin/env node

/**
 * authgraph CLI
 * Renders DNSSEC authentication graphs from previously collected analysis data
 */

import { Command } from "commander";
import chalk from "chalk";
import { graphCommand, type GraphOptions } from "./commands/graph.js";
import { printCommand, type PrintOptions } from "./commands/print.js";
import { UnsupportedFormatError, UsageError, wrapError } from "../core/errors.js";
import { OUTPUT_FORMATS } from "../core/render/formats.js";
import { createLogger, loadConfig, setLogLevel, type AppConfig } from "../utils/index.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("authgraph")
  .description("Graph DNSSEC authentication chains from collected DNS analysis data")
  .version("0.1.0")
  .showHelpAfterError()
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Configuration
// =============================================================================

let configPromise: Promise<AppConfig> | null = null;

function getConfig(): Promise<AppConfig> {
  if (!configPromise) {
    configPromise = loadConfig().then((config) => {
      if (config.logLevel && !process.env.LOG_LEVEL) {
        setLogLevel(config.logLevel);
      }
      return config;
    });
  }
  return configPromise;
}

/**
 * Report bad option combinations the way commander reports its own parse
 * errors: message, usage text, exit code 1.
 */
function failOnUsage(command: Command, error: unknown): never {
  if (error instanceof UsageError || error instanceof UnsupportedFormatError) {
    command.error(`error: ${error.message}`, { exitCode: 1, code: error.code });
  }
  throw error;
}

// =============================================================================
// Commands
// =============================================================================

function addInputOptions(command: Command): Command {
  return command
    .option("-f, --names-file <file>", "Read names from a file, one per line (- for stdin)")
    .option("-r, --input <file>", "Analysis input file (default: stdin)")
    .option("-y, --yaml", "Input is YAML rather than JSON")
    .option("-t, --trusted-keys-file <file>", "Trust anchors in zone file format (default: none)");
}

addInputOptions(program.command("graph [names...]", { isDefault: true }))
  .description("Render the authentication graph of one or more names")
  .option("-R, --rr-types <types>", "Only graph these RR types, comma-separated")
  .option("-e, --show-redundant", "Keep edges that reduction would remove")
  .option("-T, --output-format <format>", `Output format (${OUTPUT_FORMATS.join(", ")})`)
  .option("-o, --output-file <file>", "Write one combined graph to this file (- for stdout)")
  .option("-O, --derive-filename", "Write one file per name, named after the name")
  .option("--asset-base <path>", "Base path of the script and stylesheet for html output")
  .action(async (names: string[], options: GraphOptions, command: Command) => {
    const config = await getConfig();
    try {
      await graphCommand(names, options, config);
    } catch (error) {
      failOnUsage(command, error);
    }
  });

addInputOptions(program.command("print [names...]"))
  .description("Print the validation status of zones and responses")
  .action(async (names: string[], options: PrintOptions, command: Command) => {
    await getConfig();
    try {
      await printCommand(names, options);
    } catch (error) {
      failOnUsage(command, error);
    }
  });

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Report a failure and exit with status 1
 */
function handleError(error: unknown): void {
  const failure = wrapError(error);
  logger.error({ err: failure.toJSON() }, "CLI error occurred");
  console.error(chalk.red(`\n${failure.toString()}`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(error instanceof Error ? error.stack : failure.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
