/**
 * Verification Engine
 *
 * Pure comparison pipeline: application record + normalized extraction ->
 * field verdicts -> aggregated verdict. No I/O, no shared state; safe to run
 * concurrently for any number of (application, document) pairs.
 *
 * @module services/verification/engine
 */

import { isPresent, type ExtractedRecord } from '../../models/extraction.js';
import type { ApplicationRecord } from '../../models/application.js';
import type { FieldVerdict, VerificationVerdict } from '../../models/verdict.js';
import { aggregateVerdicts } from './aggregator.js';
import { compareSalary } from './salary.js';
import { compareSsn } from './ssn.js';
import {
  EMPLOYER_MATCH_THRESHOLD,
  NAME_MATCH_THRESHOLD,
  employerSimilarity,
  similarity,
} from './similarity.js';

function formatSimilarity(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function thresholdLabel(threshold: number): string {
  return `${Math.round(threshold * 100)}%+`;
}

export function verifyName(application: ApplicationRecord, extracted: ExtractedRecord): FieldVerdict {
  const { employee_name } = extracted;
  if (!isPresent(employee_name)) {
    return { field_name: 'name', matched: false, reason: 'Could not extract employee name from pay stub' };
  }

  const declared = application.full_name.trim();
  if (declared.length === 0) {
    return {
      field_name: 'name',
      matched: false,
      reason: 'Could not verify name - application name not provided',
      extracted_value: employee_name.value,
    };
  }

  const score = similarity(declared, employee_name.value);
  const matched = score >= NAME_MATCH_THRESHOLD;
  return {
    field_name: 'name',
    matched,
    reason: matched
      ? `Name matches (similarity: ${formatSimilarity(score)})`
      : `Name mismatch: Application has '${declared}' but pay stub shows '${employee_name.value}' ` +
        `(similarity: ${formatSimilarity(score)}) - requires ${thresholdLabel(NAME_MATCH_THRESHOLD)} similarity`,
    extracted_value: employee_name.value,
    similarity: score,
  };
}

export function verifySalary(application: ApplicationRecord, extracted: ExtractedRecord): FieldVerdict {
  const outcome = compareSalary(application.annual_salary, extracted.annual_salary);
  const verdict: FieldVerdict = { field_name: 'salary', ...outcome };
  if (isPresent(extracted.annual_salary)) {
    verdict.extracted_value = extracted.annual_salary.value;
  }
  return verdict;
}

export function verifyEmployer(application: ApplicationRecord, extracted: ExtractedRecord): FieldVerdict {
  const { company_name } = extracted;
  if (!isPresent(company_name)) {
    return { field_name: 'employer', matched: false, reason: 'Could not extract employer name from pay stub' };
  }

  const declared = application.employer_name.trim();
  if (declared.length === 0) {
    return {
      field_name: 'employer',
      matched: false,
      reason: 'Could not verify employer - application employer not provided',
      extracted_value: company_name.value,
    };
  }

  const score = employerSimilarity(declared, company_name.value);
  const matched = score >= EMPLOYER_MATCH_THRESHOLD;
  return {
    field_name: 'employer',
    matched,
    reason: matched
      ? `Employer matches (similarity: ${formatSimilarity(score)})`
      : `Employer mismatch: Application has '${declared}' but pay stub shows '${company_name.value}' ` +
        `(similarity: ${formatSimilarity(score)}) - requires ${thresholdLabel(EMPLOYER_MATCH_THRESHOLD)} similarity`,
    extracted_value: company_name.value,
    similarity: score,
  };
}

export function verifySsn(application: ApplicationRecord, extracted: ExtractedRecord): FieldVerdict {
  const outcome = compareSsn(application.ssn, extracted.ssn);
  const verdict: FieldVerdict = { field_name: 'ssn', ...outcome };
  if (isPresent(extracted.ssn)) {
    verdict.extracted_value = extracted.ssn.value;
  }
  return verdict;
}

/** Field checks in evaluation order */
export const FIELD_CHECKS = [verifyName, verifySalary, verifyEmployer, verifySsn] as const;

/**
 * Compare all four fields and aggregate
 */
export function verifyRecords(application: ApplicationRecord, extracted: ExtractedRecord): VerificationVerdict {
  return aggregateVerdicts(FIELD_CHECKS.map((check) => check(application, extracted)));
}
