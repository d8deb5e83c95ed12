/**
 * Token Similarity Scorer
 *
 * Symmetric, case- and whitespace-insensitive similarity for person and
 * employer names: 0.6 x Jaccard over token sets + 0.4 x containment of the
 * shorter token list in the longer one.
 *
 * @module services/verification/similarity
 */

/** Inclusive match threshold for name and employer comparisons */
export const NAME_MATCH_THRESHOLD = 0.8;
export const EMPLOYER_MATCH_THRESHOLD = 0.8;

const JACCARD_WEIGHT = 0.6;
const CONTAINMENT_WEIGHT = 0.4;

/** Trailing tokens dropped from employer names before scoring */
export const BUSINESS_SUFFIXES: ReadonlySet<string> = new Set([
  'inc',
  'llc',
  'corp',
  'ltd',
  'company',
  'co',
  'enterprises',
  'group',
]);

function tokenize(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

function jaccard(left: Set<string>, right: Set<string>): number {
  if (left.size === 0 || right.size === 0) return 0;
  let intersection = 0;
  left.forEach((token) => {
    if (right.has(token)) intersection++;
  });
  const union = left.size + right.size - intersection;
  return union > 0 ? intersection / union : 0;
}

function containedShare(shorter: string[], longer: string[]): number {
  if (shorter.length === 0) return 0;
  const longerSet = new Set(longer);
  return shorter.filter((token) => longerSet.has(token)).length / shorter.length;
}

/**
 * Containment of the shorter token list in the longer. Equal-length lists
 * take the larger direction so the score does not depend on argument order.
 */
function containment(left: string[], right: string[]): number {
  if (left.length < right.length) return containedShare(left, right);
  if (right.length < left.length) return containedShare(right, left);
  return Math.max(containedShare(left, right), containedShare(right, left));
}

/**
 * Similarity of two free-text strings in [0, 1], rounded to 4 decimals
 */
export function similarity(a: string, b: string): number {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  const leftTokens = tokenize(left);
  const rightTokens = tokenize(right);

  if (leftTokens.length === 0 || rightTokens.length === 0) return 0;
  if (left === right || leftTokens.join(' ') === rightTokens.join(' ')) return 1;

  const score =
    JACCARD_WEIGHT * jaccard(new Set(leftTokens), new Set(rightTokens)) +
    CONTAINMENT_WEIGHT * containment(leftTokens, rightTokens);

  return Math.round(Math.min(score, 1) * 10000) / 10000;
}

/**
 * Drop trailing business-entity suffixes ("Acme Widgets, Inc." -> "acme widgets").
 * At least one token is always kept.
 */
export function stripBusinessSuffixes(employer: string): string {
  const tokens = tokenize(employer.trim().toLowerCase());
  const bare = (token: string) => token.replace(/[.,]+$/, '');

  while (tokens.length > 1 && BUSINESS_SUFFIXES.has(bare(tokens[tokens.length - 1]))) {
    tokens.pop();
  }
  if (tokens.length > 0) {
    tokens[tokens.length - 1] = bare(tokens[tokens.length - 1]) || tokens[tokens.length - 1];
  }
  return tokens.join(' ');
}

/**
 * Employer similarity: suffix-stripped, then scored like names
 */
export function employerSimilarity(a: string, b: string): number {
  return similarity(stripBusinessSuffixes(a), stripBusinessSuffixes(b));
}
