/**
 * Verification Run Configuration
 *
 * Retry and timeout settings for the OCR collaborator call.
 *
 * @module services/verification/config
 */

import { z } from 'zod';
import { parseIntEnv } from '../../utils/env.js';

export const VerificationConfigSchema = z.object({
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(30_000),
      jitterFraction: z.number().min(0).max(1).default(0),
      attemptTimeoutMs: z.number().int().positive().default(120_000),
    })
    .default({}),
});

export type VerificationConfig = z.infer<typeof VerificationConfigSchema>;

/**
 * Environment variables:
 *   VERIFY_MAX_ATTEMPTS       - Extraction attempts, first included (default: 3)
 *   VERIFY_BASE_DELAY_MS      - Backoff base delay (default: 1000)
 *   VERIFY_ATTEMPT_TIMEOUT_MS - Per-attempt timeout (default: 120000)
 */
export function loadVerificationConfig(overrides?: Partial<VerificationConfig>): VerificationConfig {
  const envConfig = {
    retry: {
      maxAttempts: parseIntEnv('VERIFY_MAX_ATTEMPTS', 3),
      baseDelayMs: parseIntEnv('VERIFY_BASE_DELAY_MS', 1000),
      attemptTimeoutMs: parseIntEnv('VERIFY_ATTEMPT_TIMEOUT_MS', 120_000),
    },
  };

  return VerificationConfigSchema.parse({ ...envConfig, ...overrides });
}
