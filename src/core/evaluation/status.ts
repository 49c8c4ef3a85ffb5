/**
 * Validation status values and the rules that combine them.
 *
 * @module
 */

export type ValidationStatus = "secure" | "insecure" | "bogus" | "indeterminate";

export const VALIDATION_STATUSES: readonly ValidationStatus[] = ["secure", "insecure", "bogus", "indeterminate"];

/**
 * Strength of a status along a trust path. A path is as strong as its weakest
 * edge.
 */
const STRENGTH: Readonly<Record<ValidationStatus, number>> = {
  bogus: 0,
  indeterminate: 1,
  insecure: 2,
  secure: 3,
};

/**
 * Precedence when two observations of the same thing disagree: a single
 * failure wins over any success.
 */
const PRECEDENCE: Readonly<Record<ValidationStatus, number>> = {
  bogus: 3,
  secure: 2,
  insecure: 1,
  indeterminate: 0,
};

export function strength(status: ValidationStatus): number {
  return STRENGTH[status];
}

export function weakest(a: ValidationStatus, b: ValidationStatus): ValidationStatus {
  return STRENGTH[a] <= STRENGTH[b] ? a : b;
}

/**
 * Combine two statuses reported for the same record, signature or edge.
 */
export function mergeStatus(a: ValidationStatus, b: ValidationStatus): ValidationStatus {
  return PRECEDENCE[a] >= PRECEDENCE[b] ? a : b;
}

/**
 * Status of data served by a zone, given the zone's status and the statuses
 * of the items that authenticate it (signatures for an RRset, proof RRsets for
 * a negative response). Only a secure zone looks at the items: unauthenticated
 * data there is bogus, one bogus item makes the whole bogus, one secure item
 * makes it secure.
 */
export function statusInZone(
  zoneStatus: ValidationStatus | undefined,
  items: readonly ValidationStatus[],
  requireAll = false
): ValidationStatus {
  if (zoneStatus === undefined) return "indeterminate";
  if (zoneStatus !== "secure") return zoneStatus;
  if (items.length === 0) return "bogus";
  if (items.includes("bogus")) return "bogus";
  if (requireAll) {
    return items.every((s) => s === "secure") ? "secure" : "indeterminate";
  }
  return items.includes("secure") ? "secure" : "indeterminate";
}
