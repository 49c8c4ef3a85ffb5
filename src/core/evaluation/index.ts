/**
 * Evaluation Module
 *
 * @module
 */

export {
  VALIDATION_STATUSES,
  mergeStatus,
  statusInZone,
  strength,
  weakest,
  type ValidationStatus,
} from "./status.js";

export {
  evaluateStore,
  isFailedOutcome,
  signatureStatus,
  type DelegationSignerEvaluation,
  type DigestEvaluation,
  type DigestOutcome,
  type EvaluatorOptions,
  type KeyEvaluation,
  type NegativeEvaluation,
  type QueryEvaluation,
  type RRsetEvaluation,
  type SignatureEvaluation,
  type SignatureOutcome,
  type StoreEvaluation,
  type ZoneEvaluation,
} from "./status-evaluator.js";
