/**
 * Extraction interfaces for Income Verification MCP System
 *
 * Fields read off a scanned pay document by the vision model, after
 * normalization. Every field is tagged present/unknown - no null sentinels.
 */

/**
 * A value that was either read off the document or is unknown
 */
export type FieldValue<T> = { readonly kind: 'present'; readonly value: T } | { readonly kind: 'unknown' };

/** Shared unknown marker */
export const UNKNOWN: FieldValue<never> = Object.freeze({ kind: 'unknown' });

export function present<T>(value: T): FieldValue<T> {
  return { kind: 'present', value };
}

export function isPresent<T>(field: FieldValue<T>): field is { kind: 'present'; value: T } {
  return field.kind === 'present';
}

/**
 * Unwrap a field, mapping unknown to null (for JSON output and display)
 */
export function valueOrNull<T>(field: FieldValue<T>): T | null {
  return field.kind === 'present' ? field.value : null;
}

/**
 * Which derivation strategy produced the annual salary
 */
export type SalarySource =
  | 'reported'
  | 'pay_period'
  | 'monthly_gross'
  | 'monthly_net'
  | 'year_to_date'
  | 'unknown';

/**
 * Normalized record of the fields extracted from one pay document
 */
export interface ExtractedRecord {
  employee_name: FieldValue<string>;
  company_name: FieldValue<string>;
  annual_salary: FieldValue<number>;
  /** Last 4 characters of the SSN (fewer if the document showed fewer) */
  ssn: FieldValue<string>;
  pay_period: FieldValue<string>;
  gross_pay: FieldValue<number>;
  net_pay: FieldValue<number>;
  hourly_rate: FieldValue<number>;
  hours_worked: FieldValue<number>;
  year_to_date_gross: FieldValue<number>;
  year_to_date_net: FieldValue<number>;
  /** Canonical YYYY-MM-DD */
  pay_date: FieldValue<string>;
  deductions: FieldValue<string[]>;
  salary_source: SalarySource;
}

/** Raw field names requested from the vision model */
export const EXTRACTED_FIELD_NAMES = [
  'employee_name',
  'company_name',
  'annual_salary',
  'ssn',
  'pay_period',
  'gross_pay',
  'net_pay',
  'deductions',
  'pay_date',
  'hourly_rate',
  'hours_worked',
  'year_to_date_gross',
  'year_to_date_net',
] as const;

/**
 * Plain-JSON view of an ExtractedRecord (unknown -> null)
 */
export type ExtractedRecordJson = {
  [K in keyof ExtractedRecord]: ExtractedRecord[K] extends FieldValue<infer T> ? T | null : ExtractedRecord[K];
};

export function extractedRecordToJson(record: ExtractedRecord): ExtractedRecordJson {
  return {
    employee_name: valueOrNull(record.employee_name),
    company_name: valueOrNull(record.company_name),
    annual_salary: valueOrNull(record.annual_salary),
    ssn: valueOrNull(record.ssn),
    pay_period: valueOrNull(record.pay_period),
    gross_pay: valueOrNull(record.gross_pay),
    net_pay: valueOrNull(record.net_pay),
    hourly_rate: valueOrNull(record.hourly_rate),
    hours_worked: valueOrNull(record.hours_worked),
    year_to_date_gross: valueOrNull(record.year_to_date_gross),
    year_to_date_net: valueOrNull(record.year_to_date_net),
    pay_date: valueOrNull(record.pay_date),
    deductions: valueOrNull(record.deductions),
    salary_source: record.salary_source,
  };
}
