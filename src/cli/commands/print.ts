/**
 * print command - Show validation statuses as text
 */

import chalk from "chalk";
import { deserializeAll, summarizeStore, type StoreSummary } from "../../core/session/index.js";
import { evaluateStore } from "../../core/evaluation/status-evaluator.js";
import type { ValidationStatus } from "../../core/evaluation/status.js";
import { createLogger } from "../../utils/index.js";
import { loadInput, type InputOptions } from "./input.js";

const logger = createLogger("cli");

export type PrintOptions = InputOptions;

const STATUS_STYLES: Readonly<Record<ValidationStatus, (text: string) => string>> = {
  secure: (text) => chalk.cyan(text),
  bogus: (text) => chalk.red.bold(text),
  insecure: (text) => chalk.white(text),
  indeterminate: (text) => chalk.yellow(text),
};

function status(value: ValidationStatus): string {
  return STATUS_STYLES[value](value.padEnd(13));
}

/**
 * Lines of the text summary for one name
 */
export function formatSummary(summary: StoreSummary): string[] {
  const lines = [chalk.bold(summary.name), chalk.dim(`  as of ${summary.referenceTime}`), "  Zones"];
  for (const zone of summary.zones) {
    lines.push(`    ${status(zone.status)} ${zone.name} ${chalk.dim(`(${zone.reason})`)}`);
  }

  lines.push("  Queries");
  for (const query of summary.queries) {
    lines.push(`    ${query.query}`);
    for (const rrset of query.rrsets) {
      lines.push(`      ${status(rrset.status)} ${rrset.name}/${rrset.type}`);
    }
    for (const negative of query.negatives) {
      lines.push(`      ${status(negative.status)} ${negative.kind.toUpperCase()}`);
    }
    if (query.rrsets.length === 0 && query.negatives.length === 0) {
      lines.push(chalk.dim("      no response"));
    }
  }
  return lines;
}

/**
 * Print the status summary of the given names
 */
export async function printCommand(positional: string[], options: PrintOptions): Promise<void> {
  logger.debug({ options }, "Running print command");

  const input = await loadInput(positional, options);
  const stores = deserializeAll(input.names, input.document);

  for (const store of stores) {
    const summary = summarizeStore(evaluateStore(store, input.anchors));
    console.log(formatSummary(summary).join("\n"));
    console.log();
  }
}
