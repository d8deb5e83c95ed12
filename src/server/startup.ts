/**
 * Startup Validation
 *
 * Warnings only: an unreachable vision model fails verify_document, not
 * the whole server.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { DEFAULT_OLLAMA_BASE_URL } from '../services/extraction/config.js';
import type { StartupStatus } from './types.js';

export function validateStartupDependencies(): StartupStatus {
  const warnings: string[] = [];
  const baseUrlSet = Boolean(process.env.OLLAMA_BASE_URL?.trim());

  if (!baseUrlSet) {
    warnings.push(
      `OLLAMA_BASE_URL is not set. Assuming ${DEFAULT_OLLAMA_BASE_URL}; verify_document fails if no Ollama server listens there.`
    );
  }
  if (!process.env.OLLAMA_VLM_MODEL?.trim()) {
    warnings.push('OLLAMA_VLM_MODEL is not set. Using llava; pull it with `ollama pull llava`.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  return {
    ollama_base_url_set: baseUrlSet,
    warnings,
    checked_at: new Date().toISOString(),
  };
}
