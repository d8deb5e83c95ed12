/**
 * Verdict interfaces for Income Verification MCP System
 *
 * Per-field and overall outcomes of comparing an application against one
 * extracted pay document. Pure types - no logic.
 */

import type { ExtractedRecordJson } from './extraction.js';

/**
 * Fields compared by the engine, in evaluation order
 */
export type VerifiedField = 'name' | 'salary' | 'employer' | 'ssn';

export const VERIFIED_FIELDS: readonly VerifiedField[] = ['name', 'salary', 'employer', 'ssn'] as const;

/** Display labels used in summaries and detail lines */
export const FIELD_LABELS: Record<VerifiedField, string> = {
  name: 'Name',
  salary: 'Salary',
  employer: 'Employer',
  ssn: 'SSN',
};

export type OverallStatus = 'verified' | 'mismatch' | 'error';

/**
 * Match decision for a single field
 */
export interface FieldVerdict {
  field_name: VerifiedField;
  matched: boolean;
  /** Always populated, including missing-data cases */
  reason: string;
  /** Value read off the document, when one was available */
  extracted_value?: string | number;
  /** Token similarity (0-1) for name and employer, when computed */
  similarity?: number;
}

/**
 * Overall outcome for one (application, document) pair
 */
export interface VerificationVerdict {
  field_verdicts: FieldVerdict[];
  overall_status: OverallStatus;
  /** matched / 4 * 100 */
  score_percent: number;
  summary: string;
  verified_fields: VerifiedField[];
  mismatched_fields: VerifiedField[];
  /** One "✓ Name Match" / "✗ Salary Mismatch" line per field */
  details: string[];
}

/**
 * Matched/mismatched tallies for an aggregated verdict
 */
export interface VerdictCounts {
  total_fields: number;
  matched_fields: number;
  mismatched_fields: number;
}

/**
 * Persisted verdict (one per verification run)
 */
export interface StoredVerdict {
  /** UUID v4 identifier */
  id: string;
  application_id: string;
  document_id: string;
  verdict: VerificationVerdict;
  /** Normalized extraction the verdict was computed from (null on extraction failure) */
  extracted_record: ExtractedRecordJson | null;
  /** ISO 8601 timestamp */
  created_at: string;
}
