/**
 * Extraction Field Normalizer
 *
 * Cleans and type-coerces the raw field mapping returned by the vision model
 * into an ExtractedRecord. Every field ends up either typed or UNKNOWN; a bad
 * value never throws. Derives annual salary and hourly rate when the document
 * does not state them directly.
 *
 * @module services/verification/normalizer
 */

import { z } from 'zod';
import {
  UNKNOWN,
  isPresent,
  present,
  type ExtractedRecord,
  type FieldValue,
  type SalarySource,
} from '../../models/extraction.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Values the model uses for "not found" (compared case-insensitively) */
export const NULL_SENTINELS: ReadonlySet<string> = new Set([
  '',
  'null',
  'none',
  'n/a',
  'na',
  'not available',
  'unknown',
  'tbd',
]);

const CURRENCY_AND_SEPARATORS = /[$€£¥₹,]/g;
const NUMERIC_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SSN_SEPARATORS = /[-_\s]/g;

/**
 * Pay period keywords and periods per year.
 * Tested in this order against the lower-cased period text with '-', '_' and
 * spaces removed; the first substring hit wins.
 */
export const PAY_PERIOD_MULTIPLIERS: ReadonlyArray<readonly [string, number]> = [
  ['weekly', 52],
  ['biweekly', 26],
  ['semimonthly', 24],
  ['monthly', 12],
  ['daily', 260],
];

/** Plausible monthly pay range for the "assume monthly" heuristics */
const MONTHLY_PAY_MIN = 1000;
const MONTHLY_PAY_MAX = 500000;

/** Year-to-date gross is assumed to cover about a quarter of the year */
const YEAR_TO_DATE_MULTIPLIER = 4;

type DatePart = 'y' | 'm' | 'd';

/** Accepted pay date layouts, first successful parse wins */
const DATE_PATTERNS: ReadonlyArray<{ label: string; regex: RegExp; order: readonly DatePart[] }> = [
  { label: 'YYYY-MM-DD', regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ['y', 'm', 'd'] },
  { label: 'MM/DD/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ['m', 'd', 'y'] },
  { label: 'DD/MM/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ['d', 'm', 'y'] },
  { label: 'YYYY/MM/DD', regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: ['y', 'm', 'd'] },
  { label: 'MM-DD-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: ['m', 'd', 'y'] },
  { label: 'DD-MM-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: ['d', 'm', 'y'] },
];

const RawExtractionSchema = z.record(z.string(), z.unknown());

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface NormalizeResult {
  record: ExtractedRecord;
  /** Values that were present but could not be coerced, plus parse recovery notes */
  warnings: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD CLEANERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Trim a string field and map null sentinels to UNKNOWN.
 * Finite numbers are stringified (models often return an SSN as 7777).
 */
export function cleanString(raw: unknown): FieldValue<string> {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return present(String(raw));
  }
  if (typeof raw !== 'string') {
    return UNKNOWN;
  }
  const trimmed = raw.trim();
  if (NULL_SENTINELS.has(trimmed.toLowerCase())) {
    return UNKNOWN;
  }
  return present(trimmed);
}

/** "mARIA   garcia" -> "Maria Garcia" */
export function toNameCase(value: string): string {
  return value
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/** "ACME widgets-east inc" -> "Acme Widgets-East Inc" */
export function toTitleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Parse a money or count value. Strips currency symbols and thousands separators.
 */
export function parseAmount(raw: unknown): FieldValue<number> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? present(raw) : UNKNOWN;
  }
  if (typeof raw !== 'string') {
    return UNKNOWN;
  }
  const cleaned = raw.replace(CURRENCY_AND_SEPARATORS, '').trim();
  if (!NUMERIC_LITERAL.test(cleaned)) {
    return UNKNOWN;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? present(parsed) : UNKNOWN;
}

/**
 * Reduce an SSN to its last 4 characters after removing separators
 */
export function normalizeSsn(raw: unknown): FieldValue<string> {
  const cleaned = cleanString(raw);
  if (!isPresent(cleaned)) return UNKNOWN;

  const compact = cleaned.value.replace(SSN_SEPARATORS, '');
  if (compact.length === 0) return UNKNOWN;
  return present(compact.length >= 4 ? compact.slice(-4) : compact);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse a pay date against DATE_PATTERNS and return it as YYYY-MM-DD
 */
export function normalizePayDate(raw: unknown): FieldValue<string> {
  const cleaned = cleanString(raw);
  if (!isPresent(cleaned)) return UNKNOWN;

  for (const pattern of DATE_PATTERNS) {
    const match = pattern.regex.exec(cleaned.value);
    if (!match) continue;

    const parts: Record<DatePart, number> = { y: 0, m: 0, d: 0 };
    pattern.order.forEach((part, index) => {
      parts[part] = parseInt(match[index + 1] ?? '0', 10);
    });

    if (parts.m < 1 || parts.m > 12) continue;
    if (parts.d < 1 || parts.d > daysInMonth(parts.y, parts.m)) continue;

    const month = String(parts.m).padStart(2, '0');
    const day = String(parts.d).padStart(2, '0');
    return present(`${String(parts.y).padStart(4, '0')}-${month}-${day}`);
  }
  return UNKNOWN;
}

/**
 * Split a deductions string on ',' and ';'. Arrays of strings are accepted as-is.
 */
export function normalizeDeductions(raw: unknown): FieldValue<string[]> {
  let tokens: string[];
  if (Array.isArray(raw)) {
    tokens = raw.filter((item): item is string => typeof item === 'string');
  } else {
    const cleaned = cleanString(raw);
    if (!isPresent(cleaned)) return UNKNOWN;
    tokens = cleaned.value.split(/[,;]/);
  }

  const deductions = tokens.map((token) => token.trim()).filter((token) => token.length > 0);
  return deductions.length > 0 ? present(deductions) : UNKNOWN;
}

/**
 * Look up the periods-per-year multiplier for a pay period description
 */
export function payPeriodMultiplier(period: string): number | null {
  const compact = period.toLowerCase().replace(/[-_\s]/g, '');
  for (const [keyword, multiplier] of PAY_PERIOD_MULTIPLIERS) {
    if (compact.includes(keyword)) {
      return multiplier;
    }
  }
  return null;
}

function isPlausibleMonthlyPay(amount: number): boolean {
  return amount >= MONTHLY_PAY_MIN && amount <= MONTHLY_PAY_MAX;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DERIVATIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Derive annual salary from per-period figures. First strategy that applies wins.
 */
export function deriveAnnualSalary(record: ExtractedRecord): {
  annual_salary: FieldValue<number>;
  salary_source: SalarySource;
} {
  if (isPresent(record.annual_salary)) {
    return { annual_salary: record.annual_salary, salary_source: 'reported' };
  }

  const { gross_pay, pay_period, net_pay, year_to_date_gross } = record;

  if (isPresent(gross_pay) && isPresent(pay_period)) {
    const multiplier = payPeriodMultiplier(pay_period.value);
    if (multiplier !== null) {
      return { annual_salary: present(gross_pay.value * multiplier), salary_source: 'pay_period' };
    }
  }

  if (isPresent(gross_pay) && isPlausibleMonthlyPay(gross_pay.value)) {
    return { annual_salary: present(gross_pay.value * 12), salary_source: 'monthly_gross' };
  }

  if (isPresent(net_pay) && !isPresent(gross_pay) && isPlausibleMonthlyPay(net_pay.value)) {
    return { annual_salary: present(net_pay.value * 12), salary_source: 'monthly_net' };
  }

  if (isPresent(year_to_date_gross)) {
    return {
      annual_salary: present(year_to_date_gross.value * YEAR_TO_DATE_MULTIPLIER),
      salary_source: 'year_to_date',
    };
  }

  return { annual_salary: UNKNOWN, salary_source: 'unknown' };
}

/**
 * gross_pay / hours_worked when the document has no hourly rate
 */
export function deriveHourlyRate(record: ExtractedRecord): FieldValue<number> {
  if (isPresent(record.hourly_rate)) return record.hourly_rate;
  const { gross_pay, hours_worked } = record;
  if (isPresent(gross_pay) && isPresent(hours_worked) && hours_worked.value > 0) {
    return present(gross_pay.value / hours_worked.value);
  }
  return UNKNOWN;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Record with every field unknown - the ParseError recovery value
 */
export function emptyExtractedRecord(): ExtractedRecord {
  return {
    employee_name: UNKNOWN,
    company_name: UNKNOWN,
    annual_salary: UNKNOWN,
    ssn: UNKNOWN,
    pay_period: UNKNOWN,
    gross_pay: UNKNOWN,
    net_pay: UNKNOWN,
    hourly_rate: UNKNOWN,
    hours_worked: UNKNOWN,
    year_to_date_gross: UNKNOWN,
    year_to_date_net: UNKNOWN,
    pay_date: UNKNOWN,
    deductions: UNKNOWN,
    salary_source: 'unknown',
  };
}

function isBlank(raw: unknown): boolean {
  if (raw === undefined || raw === null) return true;
  return typeof raw === 'string' && NULL_SENTINELS.has(raw.trim().toLowerCase());
}

/**
 * Normalize a raw extraction mapping. Unknown keys are ignored; missing keys
 * become UNKNOWN. A payload that is not an object yields an all-unknown record.
 */
export function normalizeExtraction(raw: unknown): NormalizeResult {
  const parsed = RawExtractionSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      record: emptyExtractedRecord(),
      warnings: ['Extraction payload is not a JSON object; all fields treated as unknown'],
    };
  }

  const data = parsed.data;
  const warnings: string[] = [];

  const numeric = (field: string): FieldValue<number> => {
    const value = parseAmount(data[field]);
    if (!isPresent(value) && !isBlank(data[field])) {
      warnings.push(`${field}: could not parse ${JSON.stringify(data[field])} as a number`);
    }
    return value;
  };

  const employeeName = cleanString(data.employee_name);
  const companyName = cleanString(data.company_name);
  const payDate = normalizePayDate(data.pay_date);
  if (!isPresent(payDate) && !isBlank(data.pay_date)) {
    warnings.push(`pay_date: unrecognized date format ${JSON.stringify(data.pay_date)}`);
  }

  const record: ExtractedRecord = {
    employee_name: isPresent(employeeName) ? present(toNameCase(employeeName.value)) : UNKNOWN,
    company_name: isPresent(companyName) ? present(toTitleCase(companyName.value)) : UNKNOWN,
    annual_salary: numeric('annual_salary'),
    ssn: normalizeSsn(data.ssn),
    pay_period: cleanString(data.pay_period),
    gross_pay: numeric('gross_pay'),
    net_pay: numeric('net_pay'),
    hourly_rate: numeric('hourly_rate'),
    hours_worked: numeric('hours_worked'),
    year_to_date_gross: numeric('year_to_date_gross'),
    year_to_date_net: numeric('year_to_date_net'),
    pay_date: payDate,
    deductions: normalizeDeductions(data.deductions),
    salary_source: 'unknown',
  };

  const salary = deriveAnnualSalary(record);
  record.annual_salary = salary.annual_salary;
  record.salary_source = salary.salary_source;
  record.hourly_rate = deriveHourlyRate(record);

  return { record, warnings };
}
