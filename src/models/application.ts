/**
 * Application interfaces for Income Verification MCP System
 *
 * The applicant-declared identity and income data that a pay document is
 * verified against. Read-only once handed to the verification engine.
 */

/**
 * User-declared record submitted with a loan/income application
 */
export interface ApplicationRecord {
  /** Applicant's full name as typed on the application */
  readonly full_name: string;

  /** Declared annual salary in whole currency units */
  readonly annual_salary: number;

  /** Declared employer name */
  readonly employer_name: string;

  /** Full SSN or its last digits; only the last 4 are ever compared */
  readonly ssn: string;
}
