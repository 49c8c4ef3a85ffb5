/**
 * Input options shared by the graph and print commands
 */

import { parseAnalysisDocument, type AnalysisDocument } from "../../core/analysis/index.js";
import { ErrorCode, UsageError } from "../../core/errors.js";
import { TrustAnchorSet, parseTrustAnchors } from "../../core/trust/trust-anchors.js";
import { STDIO_PATH, createLogger, readNamesFile, readText } from "../../utils/index.js";

const logger = createLogger("cli");

export interface InputOptions {
  namesFile?: string;
  input?: string;
  yaml?: boolean;
  trustedKeysFile?: string;
}

export interface LoadedInput {
  names: string[];
  document: AnalysisDocument;
  anchors: TrustAnchorSet;
}

/**
 * Names come from positional arguments or a names file, never both.
 *
 * @throws UsageError if both or neither are given
 */
export function checkNameSources(positional: readonly string[], options: InputOptions): void {
  if (positional.length > 0 && options.namesFile !== undefined) {
    throw new UsageError("Give names either as arguments or with --names-file, not both", ErrorCode.USAGE_CONFLICTING_OPTIONS);
  }
  if (positional.length === 0 && options.namesFile === undefined) {
    throw new UsageError("No names given: pass names as arguments or use --names-file", ErrorCode.USAGE_MISSING_NAMES);
  }
}

export async function resolveNames(positional: readonly string[], options: InputOptions): Promise<string[]> {
  checkNameSources(positional, options);
  if (options.namesFile === undefined) {
    return [...positional];
  }

  const names = await readNamesFile(options.namesFile);
  if (names.length === 0) {
    throw new UsageError(`No names in ${options.namesFile}`, ErrorCode.USAGE_MISSING_NAMES);
  }
  return names;
}

/**
 * Read names, the analysis document and trust anchors. Anchors default to
 * the empty set.
 */
export async function loadInput(positional: readonly string[], options: InputOptions): Promise<LoadedInput> {
  const source = options.input ?? STDIO_PATH;
  if (source === STDIO_PATH && options.namesFile === STDIO_PATH) {
    throw new UsageError("Names and analysis input cannot both come from standard input", ErrorCode.USAGE_CONFLICTING_OPTIONS);
  }
  const names = await resolveNames(positional, options);

  const document = parseAnalysisDocument(await readText(source), options.yaml ? "yaml" : "json");

  let anchors = TrustAnchorSet.EMPTY;
  if (options.trustedKeysFile !== undefined) {
    anchors = parseTrustAnchors(await readText(options.trustedKeysFile));
  } else {
    logger.info("No trusted keys given; nothing can be shown as secure");
  }

  logger.debug({ names: names.length, anchors: anchors.size, input: source }, "Loaded input");
  return { names, document, anchors };
}
