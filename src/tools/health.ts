/**
 * Health Check MCP Tools
 *
 * Tools: verify_health
 *
 * Configuration snapshot, store size and lifecycle event counts. Makes no
 * call to the vision model.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/health
 */

import { z } from 'zod';
import type { VerificationContext } from '../server/types.js';
import { successResult } from '../server/types.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

const HealthCheckInput = z.object({});

export function createHealthTools(ctx: VerificationContext): Record<string, ToolDefinition> {
  async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      validateInput(HealthCheckInput, params);
      const verdicts = await ctx.store.listAll();
      const { extractionConfig, verificationConfig } = ctx;

      const warnings = [...(ctx.startup?.warnings ?? [])];
      const byStatus = { verified: 0, mismatch: 0, error: 0 };
      for (const stored of verdicts) {
        byStatus[stored.verdict.overall_status]++;
      }

      return formatResponse(
        successResult({
          healthy: true,
          started_at: ctx.started_at,
          vision_model: {
            base_url: extractionConfig.baseUrl,
            model: extractionConfig.model,
            temperature: extractionConfig.temperature,
            max_output_tokens: extractionConfig.maxOutputTokens,
            document_timeout_ms: extractionConfig.documentTimeoutMs,
          },
          retry: verificationConfig.retry,
          store: {
            verdicts: verdicts.length,
            by_status: byStatus,
          },
          runs: ctx.lifecycle.snapshot(),
          startup_check: ctx.startup,
          warnings,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    verify_health: {
      description:
        'Report vision model and retry configuration, stored verdict counts, run lifecycle counts and startup warnings.',
      inputSchema: HealthCheckInput.shape,
      handler: handleHealthCheck,
    },
  };
}
