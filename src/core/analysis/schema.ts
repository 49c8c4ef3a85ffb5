/**
 * Input Document Schemas
 *
 * Zod schemas for the per-name analysis blocks produced by the collector.
 * Field names follow the collector's serialization and must not change.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Primitive Fields
// =============================================================================

const COMPACT_TIME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/**
 * RRSIG time: epoch seconds, or the `YYYYMMDDHHmmSS` presentation form.
 */
export const SignatureTimeSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(COMPACT_TIME, "expected YYYYMMDDHHmmSS")
    .transform((text) => {
      const m = COMPACT_TIME.exec(text);
      const [year, month, day, hour, minute, second] = (m ?? []).slice(1).map(Number);
      return Math.floor(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, hour ?? 0, minute ?? 0, second ?? 0) / 1000);
    }),
]);

/**
 * Analysis reference time: ISO timestamp or epoch seconds.
 */
export const AnalysisTimeSchema = z.union([
  z.number().nonnegative().transform((seconds) => new Date(seconds * 1000)),
  z
    .string()
    .refine((text) => !Number.isNaN(Date.parse(text)), "expected an ISO timestamp")
    .transform((text) => new Date(text)),
]);

// =============================================================================
// Records
// =============================================================================

export const RrsigSchema = z.object({
  covered: z.string().min(1),
  algorithm: z.number().int().min(0).max(255),
  labels: z.number().int().min(0).max(255),
  original_ttl: z.number().int().nonnegative(),
  expiration: SignatureTimeSchema,
  inception: SignatureTimeSchema,
  key_tag: z.number().int().min(0).max(0xffff),
  signer: z.string().min(1),
  signature: z.string(),
});

export type RrsigInput = z.infer<typeof RrsigSchema>;

export const RRsetSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  ttl: z.number().int().nonnegative(),
  rdata: z.array(z.string()).min(1),
  rrsigs: z.array(RrsigSchema).default([]),
  servers: z.array(z.string()).default([]),
});

export type RRsetInput = z.infer<typeof RRsetSchema>;

export const NegativeResponseSchema = z.object({
  servers: z.array(z.string()).default([]),
  clients: z.array(z.string()).default([]),
  proof: z.array(RRsetSchema).default([]),
});

export type NegativeResponseInput = z.infer<typeof NegativeResponseSchema>;

export const QueryResultSchema = z.object({
  answer: z.array(RRsetSchema).default([]),
  nxdomain: z.array(NegativeResponseSchema).default([]),
  nodata: z.array(NegativeResponseSchema).default([]),
});

export type QueryResultInput = z.infer<typeof QueryResultSchema>;

// =============================================================================
// Name Block
// =============================================================================

export const NameAnalysisSchema = z.object({
  /** Whether this name is a zone apex */
  zone: z.boolean().default(false),
  /** Enclosing zone; for a zone apex, the parent zone */
  parent: z.string().min(1).optional(),
  /** Look-aside validation zone */
  dlv_parent: z.string().min(1).optional(),
  /** Reference time for signature validity windows */
  analysis_end: AnalysisTimeSchema.optional(),
  queries: z.record(z.string(), QueryResultSchema).default({}),
});

export type NameAnalysisInput = z.infer<typeof NameAnalysisSchema>;

/**
 * Top-level document: name strings to blocks. Blocks are validated lazily, per
 * requested name, so that unrelated malformed entries do not abort a run.
 */
export const AnalysisDocumentSchema = z.record(z.string(), z.unknown());

export type AnalysisDocument = z.infer<typeof AnalysisDocumentSchema>;

/**
 * Render a zod issue path the way it appears in the input: `queries["x"].answer[0]`.
 */
export function formatIssuePath(root: string, path: readonly (string | number)[]): string {
  let out = JSON.stringify(root);
  for (const segment of path) {
    out += typeof segment === "number" ? `[${segment}]` : `.${segment}`;
  }
  return out;
}
