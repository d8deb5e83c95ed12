/**
 * SSN Exact Matcher
 *
 * @module services/verification/ssn
 */

import { isPresent, type FieldValue } from '../../models/extraction.js';
import type { ComparisonOutcome } from './salary.js';

/** Last 4 characters, or the whole string when shorter */
export function lastFour(ssn: string): string {
  return ssn.length >= 4 ? ssn.slice(-4) : ssn;
}

/**
 * Exact string equality of the declared SSN's last 4 against the extracted suffix
 */
export function compareSsn(declared: string, extractedLast4: FieldValue<string>): ComparisonOutcome {
  if (!isPresent(extractedLast4)) {
    return { matched: false, reason: 'Could not extract SSN from pay stub' };
  }
  if (declared.length === 0) {
    return { matched: false, reason: 'Could not verify SSN - application SSN not provided' };
  }

  const declaredLast4 = lastFour(declared);
  if (declaredLast4 === extractedLast4.value) {
    return { matched: true, reason: 'SSN last 4 digits match' };
  }
  return {
    matched: false,
    reason: `SSN mismatch: Application last 4 digits are ${declaredLast4} but pay stub shows ${extractedLast4.value} - exact match required`,
  };
}
