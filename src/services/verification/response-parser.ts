/**
 * Vision Model Response Parser
 *
 * Pulls the JSON object out of a free-text model reply (markdown fences,
 * leading prose) and parses it. When strict parsing fails, single quotes and
 * True/False/None literals are repaired and parsing is retried. Output that
 * still cannot be read is a ParseError, recovered as an all-unknown record
 * rather than failing the run.
 *
 * @module services/verification/response-parser
 */

import { emptyExtractedRecord, normalizeExtraction, type NormalizeResult } from './normalizer.js';

/** Tried in order; first pattern with a match wins */
const JSON_BLOCK_PATTERNS: readonly RegExp[] = [/```json\s*([\s\S]*?)\s*```/, /```\s*([\s\S]*?)\s*```/, /\{[\s\S]*\}/];

export type ParsedModelJson = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Extract the JSON candidate from a model reply. Returns the trimmed input
 * when no pattern matches.
 */
export function extractJsonFromResponse(responseText: string): string {
  for (const pattern of JSON_BLOCK_PATTERNS) {
    const match = pattern.exec(responseText);
    if (match) {
      return (match[1] ?? match[0]).trim();
    }
  }
  return responseText.trim();
}

function tryParse(text: string): ParsedModelJson {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parse JSON strictly, then once more after replacing single quotes and
 * True/False/None literals.
 */
export function parseModelJson(jsonText: string): ParsedModelJson {
  const strict = tryParse(jsonText);
  if (strict.ok) return strict;

  const repaired = jsonText
    .replace(/'/g, '"')
    .replace(/True/g, 'true')
    .replace(/False/g, 'false')
    .replace(/None/g, 'null');
  const lenient = tryParse(repaired);
  return lenient.ok ? lenient : strict;
}

/**
 * Model reply text -> normalized record. Never throws.
 */
export function parseExtractionText(responseText: string): NormalizeResult {
  const parsed = parseModelJson(extractJsonFromResponse(responseText));
  if (!parsed.ok) {
    console.error(`[ResponseParser] Unparseable model output, treating all fields as unknown: ${parsed.error}`);
    return {
      record: emptyExtractedRecord(),
      warnings: [`Model output is not valid JSON (${parsed.error}); all fields treated as unknown`],
    };
  }
  return normalizeExtraction(parsed.value);
}
