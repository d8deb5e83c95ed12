/**
 * Salary Tolerance Comparator
 *
 * Declared vs extracted annual salary, allowed to differ by a percentage
 * that narrows as the declared salary grows.
 *
 * @module services/verification/salary
 */

import { isPresent, type FieldValue } from '../../models/extraction.js';

export interface ComparisonOutcome {
  matched: boolean;
  reason: string;
}

/** Upper bounds (exclusive) of declared salary and their tolerance percent */
const TOLERANCE_TIERS: ReadonlyArray<{ below: number; percent: number }> = [
  { below: 30000, percent: 15 },
  { below: 100000, percent: 12 },
];
const TOP_TIER_PERCENT = 10;

export function tolerancePercentFor(declared: number): number {
  for (const tier of TOLERANCE_TIERS) {
    if (declared < tier.below) return tier.percent;
  }
  return TOP_TIER_PERCENT;
}

export function formatMoney(amount: number): string {
  return `$${amount.toLocaleString('en-US', { maximumFractionDigits: 2 })}`;
}

/**
 * Compare salaries. Match iff |declared - extracted| / declared <= tolerance
 * (inclusive), computed without division so whole-number boundaries are exact.
 */
export function compareSalary(declared: number | null, extracted: FieldValue<number>): ComparisonOutcome {
  if (!isPresent(extracted)) {
    return { matched: false, reason: 'Could not extract salary from pay stub' };
  }
  if (declared === null || !Number.isFinite(declared) || declared <= 0) {
    return { matched: false, reason: 'Could not verify salary - application salary not provided' };
  }

  const tolerance = tolerancePercentFor(declared);
  const diff = Math.abs(declared - extracted.value);
  const diffPercent = ((diff / declared) * 100).toFixed(1);
  const matched = diff * 100 <= tolerance * declared;

  if (matched) {
    return {
      matched: true,
      reason: `Salary matches within ${tolerance}% tolerance (difference: ${formatMoney(diff)}, ${diffPercent}%)`,
    };
  }
  return {
    matched: false,
    reason:
      `Salary mismatch: Application shows ${formatMoney(declared)} but pay stub indicates ` +
      `${formatMoney(extracted.value)} (difference: ${formatMoney(diff)}, ${diffPercent}%, exceeds ${tolerance}% tolerance)`,
  };
}
