/**
 * Shared utilities
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../core/errors.js";
import { fileExists } from "./fs.js";
import { AppConfigFileSchema, AppConfigSchema, formatZodIssues, type AppConfig } from "./validation.js";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

export { AppConfigSchema, type AppConfig } from "./validation.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_FILE = "authgraph.config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_FILE);
}

// =============================================================================
// Configuration Loading
// =============================================================================

export interface LoadConfigOptions {
  /** Directory holding the configuration file (default: cwd) */
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Read and parse a JSON file
 *
 * @throws ConfigError if the file is not valid JSON
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${filePath} is not valid JSON: ${reason}`, { filePath });
  }
}

function fromEnvironment(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  if (env.AUTHGRAPH_ASSET_BASE) values.assetBase = env.AUTHGRAPH_ASSET_BASE;
  if (env.AUTHGRAPH_FORMAT) values.defaultFormat = env.AUTHGRAPH_FORMAT.toLowerCase();
  return values;
}

/**
 * Load configuration: defaults, then the configuration file, then the
 * environment. Command line flags are applied by the caller.
 *
 * @throws ConfigError if the file or environment holds invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = getConfigPath(options.projectRoot);
  const env = options.env ?? process.env;

  let fileValues: unknown = {};
  if (await fileExists(configPath)) {
    fileValues = await readJson(configPath);
  }

  const file = AppConfigFileSchema.safeParse(fileValues);
  if (!file.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}: ${formatZodIssues(file.error)}`, {
      configPath,
    });
  }

  const merged = AppConfigSchema.safeParse({ ...file.data, ...fromEnvironment(env) });
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration from environment: ${formatZodIssues(merged.error)}`);
  }
  return merged.data;
}
