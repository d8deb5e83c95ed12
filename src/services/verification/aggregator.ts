/**
 * Verdict Aggregator
 *
 * Folds the four field verdicts into an overall status, score and summary.
 * Strict: any unmatched field (missing data included) makes the whole
 * verification a mismatch.
 *
 * @module services/verification/aggregator
 */

import {
  FIELD_LABELS,
  VERIFIED_FIELDS,
  type FieldVerdict,
  type VerdictCounts,
  type VerificationVerdict,
  type VerifiedField,
} from '../../models/verdict.js';

/** Every verification evaluates all four fields */
export const TOTAL_FIELDS = VERIFIED_FIELDS.length;

/**
 * Freeze a verdict and everything it holds
 */
export function freezeVerdict(verdict: VerificationVerdict): VerificationVerdict {
  verdict.field_verdicts.forEach((fieldVerdict) => Object.freeze(fieldVerdict));
  Object.freeze(verdict.field_verdicts);
  Object.freeze(verdict.verified_fields);
  Object.freeze(verdict.mismatched_fields);
  Object.freeze(verdict.details);
  return Object.freeze(verdict);
}

/**
 * Aggregate field verdicts. A field with no verdict counts as unmatched.
 */
export function aggregateVerdicts(fieldVerdicts: readonly FieldVerdict[]): VerificationVerdict {
  const byField = new Map<VerifiedField, FieldVerdict>();
  for (const fieldVerdict of fieldVerdicts) {
    byField.set(fieldVerdict.field_name, fieldVerdict);
  }

  const ordered: FieldVerdict[] = [];
  const verified: VerifiedField[] = [];
  const mismatched: VerifiedField[] = [];
  const details: string[] = [];

  for (const field of VERIFIED_FIELDS) {
    const fieldVerdict = byField.get(field);
    if (fieldVerdict) ordered.push({ ...fieldVerdict });

    if (fieldVerdict?.matched) {
      verified.push(field);
      details.push(`✓ ${FIELD_LABELS[field]} Match`);
    } else {
      mismatched.push(field);
      details.push(`✗ ${FIELD_LABELS[field]} Mismatch`);
    }
  }

  const ratio = `${verified.length}/${TOTAL_FIELDS} fields verified`;
  const allMatched = mismatched.length === 0;

  return freezeVerdict({
    field_verdicts: ordered,
    overall_status: allMatched ? 'verified' : 'mismatch',
    score_percent: (verified.length / TOTAL_FIELDS) * 100,
    summary: allMatched
      ? `Verification passed - all fields match (${ratio})`
      : `Verification failed - ${mismatched.length} field(s) mismatch: ${mismatched.join(', ')} (${ratio})`,
    verified_fields: verified,
    mismatched_fields: mismatched,
    details,
  });
}

/**
 * Verdict for a run that failed before any field could be compared
 */
export function errorVerdict(message: string): VerificationVerdict {
  return freezeVerdict({
    field_verdicts: [],
    overall_status: 'error',
    score_percent: 0,
    summary: `Verification error: ${message}`,
    verified_fields: [],
    mismatched_fields: [],
    details: [],
  });
}

/**
 * Field counts for a verdict. An error verdict compared nothing, so it
 * reports no matched and no mismatched fields.
 */
export function countVerdictFields(verdict: VerificationVerdict): VerdictCounts {
  if (verdict.overall_status === 'error') {
    return { total_fields: TOTAL_FIELDS, matched_fields: 0, mismatched_fields: 0 };
  }
  const matched = verdict.field_verdicts.filter((fieldVerdict) => fieldVerdict.matched).length;
  return {
    total_fields: TOTAL_FIELDS,
    matched_fields: matched,
    mismatched_fields: TOTAL_FIELDS - matched,
  };
}
