/**
 * Input document loading: JSON or YAML text to an analysis document.
 *
 * @module
 */

import { parse as parseYaml } from "yaml";
import { ErrorCode, MalformedInputError } from "../errors.js";
import { AnalysisDocumentSchema, type AnalysisDocument } from "./schema.js";

export type InputSyntax = "json" | "yaml";

/**
 * Parse document text. Only the top-level shape is checked here; name blocks
 * are validated when a store is built for them.
 *
 * @throws MalformedInputError on a syntax error or a non-mapping document
 */
export function parseAnalysisDocument(text: string, syntax: InputSyntax = "json"): AnalysisDocument {
  let raw: unknown;
  try {
    raw = syntax === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(`Input is not valid ${syntax.toUpperCase()}: ${reason}`, ErrorCode.INPUT_MALFORMED);
  }

  const parsed = AnalysisDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedInputError("Input document must be a mapping of names to analysis blocks", ErrorCode.INPUT_MALFORMED);
  }
  return parsed.data;
}
