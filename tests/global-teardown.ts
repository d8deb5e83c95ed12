/**
 * Vitest Global Teardown
 *
 * Cleans up leaked temporary directories from test runs.
 * Test cleanup hooks don't execute when processes are killed,
 * so this ensures temp dirs are cleaned up after all tests complete.
 *
 * @module tests/global-teardown
 */

import { readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

/** Prefixes of temp directories created by tests */
export const TEMP_DIR_PREFIXES = ['income-verify-loader-', 'income-verify-e2e-'];

export default function globalTeardown(): void {
  const tmp = tmpdir();
  let entries: string[];

  try {
    entries = readdirSync(tmp);
  } catch (error) {
    console.error(`[global-teardown] Cannot read ${tmp}: ${String(error)}`);
    return;
  }

  let cleaned = 0;
  for (const entry of entries) {
    if (!TEMP_DIR_PREFIXES.some((prefix) => entry.startsWith(prefix))) continue;
    try {
      rmSync(join(tmp, entry), { recursive: true, force: true });
      cleaned++;
    } catch (error) {
      console.error(`[global-teardown] Could not remove ${entry}: ${String(error)}`);
    }
  }

  if (cleaned > 0) {
    // Use stderr to avoid polluting JSON-RPC stdout
    console.error(`[global-teardown] Cleaned ${cleaned} leaked temp directories`);
  }
}
