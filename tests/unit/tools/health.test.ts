/**
 * Unit tests for the health check tool
 *
 * @module tests/unit/tools/health
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createVerificationContext } from '../../../src/server/context.js';
import { aggregateVerdicts, errorVerdict } from '../../../src/services/verification/aggregator.js';
import { createHealthTools } from '../../../src/tools/health.js';

describe('verify_health', () => {
  beforeEach(() => {
    for (const name of ['OLLAMA_BASE_URL', 'OLLAMA_VLM_MODEL', 'OLLAMA_TEMPERATURE', 'OLLAMA_MAX_OUTPUT_TOKENS', 'VERIFY_MAX_ATTEMPTS']) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reports configuration, store counts and startup warnings', async () => {
    const ctx = createVerificationContext({
      extractor: { extract: async () => '{}' },
      startup: { ollama_base_url_set: false, warnings: ['OLLAMA_BASE_URL is not set.'], checked_at: '2024-04-01T10:00:00.000Z' },
    });
    await ctx.store.save({ application_id: 'app-1', document_id: 'doc-1', verdict: errorVerdict('boom'), extracted_record: null });
    await ctx.store.save({
      application_id: 'app-1',
      document_id: 'doc-2',
      verdict: aggregateVerdicts([]),
      extracted_record: null,
    });

    const response = await createHealthTools(ctx).verify_health.handler({});
    expect(JSON.parse(response.content[0].text)).toMatchObject({
      success: true,
      data: {
        healthy: true,
        started_at: ctx.started_at,
        vision_model: {
          base_url: 'http://localhost:11434',
          model: 'llava',
          temperature: 0.1,
          max_output_tokens: 8192,
        },
        retry: { maxAttempts: 3 },
        store: { verdicts: 2, by_status: { verified: 0, mismatch: 1, error: 1 } },
        startup_check: { ollama_base_url_set: false },
        warnings: ['OLLAMA_BASE_URL is not set.'],
      },
    });
  });

  it('counts run lifecycle events', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const ctx = createVerificationContext({ extractor: { extract: async () => '{}' } });
    await ctx.orchestrator.run({
      application_id: 'app-1',
      document_id: 'doc-1',
      application: { full_name: 'Maria Garcia', annual_salary: 60000, employer_name: 'Acme', ssn: '7777' },
      document_ref: '/uploads/stub.png',
    });

    const response = await createHealthTools(ctx).verify_health.handler({});
    expect(JSON.parse(response.content[0].text)).toMatchObject({
      data: {
        runs: {
          'verification.started': 1,
          'verification.extracted': 1,
          'verification.completed': 1,
          'verification.failed': 0,
          'verification.cancelled': 0,
        },
      },
    });
    vi.restoreAllMocks();
  });

  it('works without a startup check', async () => {
    const ctx = createVerificationContext({ extractor: { extract: async () => '{}' } });
    const response = await createHealthTools(ctx).verify_health.handler({});
    expect(JSON.parse(response.content[0].text)).toMatchObject({
      data: { startup_check: null, warnings: [], store: { verdicts: 0 } },
    });
  });
});
