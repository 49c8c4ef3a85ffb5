/**
 * graph command - Render the authentication graph of one or more names
 */

import chalk from "chalk";
import ora from "ora";
import { parseRRType } from "../../core/dns/rr-types.js";
import { ErrorCode, UsageError } from "../../core/errors.js";
import { inferOutputFormat, parseOutputFormat, type OutputFormat } from "../../core/render/formats.js";
import { GraphRenderer } from "../../core/render/renderer.js";
import { runGraphSession } from "../../core/session/index.js";
import { STDIO_PATH, createLogger, type AppConfig } from "../../utils/index.js";
import { checkNameSources, loadInput, type InputOptions } from "./input.js";

const logger = createLogger("cli");

export interface GraphOptions extends InputOptions {
  rrTypes?: string;
  showRedundant?: boolean;
  outputFormat?: string;
  outputFile?: string;
  deriveFilename?: boolean;
  assetBase?: string;
}

export interface GraphPlan {
  format: OutputFormat;
  rrTypes?: number[];
  showRedundant: boolean;
  /** Combined output target; `-` is stdout */
  outputFile: string;
  perName: boolean;
  assetBase: string;
}

/**
 * Parse a comma-separated RR type list such as `A,AAAA,MX`.
 *
 * @throws UsageError on an unknown type
 */
export function parseRRTypeList(text: string): number[] {
  const types: number[] = [];
  for (const item of text.split(",").map((t) => t.trim()).filter((t) => t.length > 0)) {
    const rrtype = parseRRType(item);
    if (rrtype === undefined) {
      throw new UsageError(`Unknown RR type "${item}"`, ErrorCode.USAGE_INVALID);
    }
    types.push(rrtype);
  }
  return types;
}

/**
 * Check the option combination and decide format, mode and targets. Nothing
 * is read or written here.
 *
 * @throws UsageError for conflicting or missing options
 * @throws UnsupportedFormatError for an unknown output format
 */
export function planGraph(positional: readonly string[], options: GraphOptions, config: AppConfig): GraphPlan {
  checkNameSources(positional, options);

  if (options.outputFile !== undefined && options.deriveFilename) {
    throw new UsageError("--output-file and --derive-filename cannot be used together", ErrorCode.USAGE_CONFLICTING_OPTIONS);
  }

  let format: OutputFormat;
  if (options.outputFormat !== undefined) {
    format = parseOutputFormat(options.outputFormat);
  } else if (options.outputFile !== undefined && options.outputFile !== STDIO_PATH) {
    format = inferOutputFormat(options.outputFile) ?? config.defaultFormat; // no extension
  } else {
    format = config.defaultFormat;
  }

  return {
    format,
    rrTypes: options.rrTypes !== undefined ? parseRRTypeList(options.rrTypes) : undefined,
    showRedundant: options.showRedundant ?? false,
    outputFile: options.outputFile ?? STDIO_PATH,
    perName: options.deriveFilename ?? false,
    assetBase: options.assetBase ?? config.assetBase,
  };
}

/**
 * Render the authentication graph of the given names
 */
export async function graphCommand(positional: string[], options: GraphOptions, config: AppConfig): Promise<void> {
  logger.debug({ options }, "Running graph command");

  const plan = planGraph(positional, options, config);
  const input = await loadInput(positional, options);
  const renderer = new GraphRenderer({ assetBase: plan.assetBase });

  if (!plan.perName) {
    await runGraphSession({ ...input, ...plan, renderer });
    return;
  }

  const spinner = ora(`Rendering ${input.names.length} graph(s)...`).start();
  try {
    const result = await runGraphSession({
      ...input,
      ...plan,
      outputFile: undefined,
      renderer,
      onFileWritten: (name, file) => {
        spinner.text = `Wrote ${file} (${name.toText()})`;
      },
    });
    spinner.succeed(chalk.green(`Wrote ${result.files.length} file(s)`));
    for (const file of result.files) {
      console.error(chalk.dim(`  ${file}`));
    }
  } catch (error) {
    spinner.fail(chalk.red("Rendering failed"));
    throw error;
  }
}
