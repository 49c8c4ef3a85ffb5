/**
 * Output formats and their parsing at the command line boundary.
 *
 * @module
 */

import * as path from "node:path";
import { UnsupportedFormatError } from "../errors.js";

export const OUTPUT_FORMATS = ["dot", "png", "jpg", "svg", "html"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const ALIASES: ReadonlyMap<string, OutputFormat> = new Map<string, OutputFormat>([
  ...OUTPUT_FORMATS.map((f): [string, OutputFormat] => [f, f]),
  ["jpeg", "jpg"],
  ["gv", "dot"],
  ["htm", "html"],
]);

/**
 * @throws UnsupportedFormatError for anything outside {@link OUTPUT_FORMATS}
 */
export function parseOutputFormat(text: string): OutputFormat {
  const format = ALIASES.get(text.trim().toLowerCase());
  if (!format) {
    throw new UnsupportedFormatError(text, { supported: [...OUTPUT_FORMATS] });
  }
  return format;
}

/**
 * Format implied by a file name's extension; undefined when it has none.
 *
 * @throws UnsupportedFormatError for an extension outside {@link OUTPUT_FORMATS}
 */
export function inferOutputFormat(filename: string): OutputFormat | undefined {
  const ext = path.extname(filename).slice(1);
  return ext ? parseOutputFormat(ext) : undefined;
}
