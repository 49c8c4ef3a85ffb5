/**
 * File System Utilities
 * Reading inputs from files or standard input
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import { AuthGraphError, ErrorCode } from "../core/errors.js";

/**
 * Marker for standard input or output in place of a file name
 */
export const STDIO_PATH = "-";

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read all of standard input (or another stream) as UTF-8 text
 */
export async function readStream(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read a text file, or standard input for `-`
 *
 * @throws AuthGraphError with FILE_SYSTEM_ERROR if the file cannot be read
 */
export async function readText(filePath: string): Promise<string> {
  if (filePath === STDIO_PATH) {
    return readStream();
  }
  try {
    return await fsPromises.readFile(filePath, { encoding: "utf-8" });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AuthGraphError(`Cannot read ${filePath}: ${reason}`, ErrorCode.FILE_SYSTEM_ERROR, { filePath });
  }
}

/**
 * Split a names file into names: one per line, blank lines and `#` comments
 * ignored
 */
export function parseNamesList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, "").trim())
    .filter((line) => line.length > 0);
}

export async function readNamesFile(filePath: string): Promise<string[]> {
  return parseNamesList(await readText(filePath));
}
