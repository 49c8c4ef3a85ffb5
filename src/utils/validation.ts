/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the application configuration file and environment.
 *
 * @module
 */

import { z } from "zod";
import { OUTPUT_FORMATS } from "../core/render/formats.js";
import { LOG_LEVELS } from "./logger.js";

// =============================================================================
// Application Configuration Schema
// =============================================================================

export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Application configuration schema
 */
export const AppConfigSchema = z
  .object({
    /** Base path or URL of the HTML viewer's script and stylesheet */
    assetBase: z.string().min(1).default("share"),

    /** Output format when neither a flag nor a file extension names one */
    defaultFormat: OutputFormatSchema.default("dot"),

    /** Log level; LOG_LEVEL in the environment takes precedence */
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * The configuration file: every field optional, unknown keys rejected
 */
export const AppConfigFileSchema = AppConfigSchema.partial();

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Format zod issues as one line per issue, `path: message`
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
