/**
 * Environment variable parsing helpers
 *
 * Unset or empty variables fall back; anything else must parse or the
 * loader throws.
 *
 * @module utils/env
 */

export function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseFloatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseFloat(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function stringEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}
