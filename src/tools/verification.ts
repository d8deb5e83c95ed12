/**
 * Verification MCP Tools
 *
 * Tools: verify_normalize, verify_compare, verify_similarity,
 *        verify_document, verify_history, verify_latest, verify_status
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/verification
 */

import { extractedRecordToJson } from '../models/extraction.js';
import type { ProgressEvent } from '../models/progress.js';
import type { VerificationContext } from '../server/types.js';
import { successResult } from '../server/types.js';
import { getLatestSummary, getVerificationStatus } from '../services/storage/verdict-store.js';
import { countVerdictFields } from '../services/verification/aggregator.js';
import { verifyRecords } from '../services/verification/engine.js';
import { normalizeExtraction, type NormalizeResult } from '../services/verification/normalizer.js';
import { parseExtractionText } from '../services/verification/response-parser.js';
import {
  EMPLOYER_MATCH_THRESHOLD,
  NAME_MATCH_THRESHOLD,
  employerSimilarity,
  similarity,
} from '../services/verification/similarity.js';
import {
  ApplicationIdInput,
  CompareInput,
  HistoryInput,
  NormalizeInput,
  SimilarityInput,
  VerifyDocumentInput,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolExtra, type ToolResponse } from './shared.js';

/**
 * Text goes through the response parser, objects straight to the normalizer
 */
function normalizeRaw(extraction: string | Record<string, unknown>): NormalizeResult {
  return typeof extraction === 'string' ? parseExtractionText(extraction) : normalizeExtraction(extraction);
}

function normalizedView(result: NormalizeResult) {
  return {
    extracted_data: extractedRecordToJson(result.record),
    salary_source: result.record.salary_source,
    warnings: result.warnings,
  };
}

export function createVerificationTools(ctx: VerificationContext): Record<string, ToolDefinition> {
  // ═════════════════════════════════════════════════════════════════════════════
  // HANDLERS
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleNormalize(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(NormalizeInput, params);
      return formatResponse(successResult(normalizedView(normalizeRaw(input.extraction))));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleCompare(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CompareInput, params);
      const normalized = normalizeRaw(input.extraction);
      const verdict = verifyRecords(input.application, normalized.record);
      return formatResponse(
        successResult({
          verification_results: verdict,
          counts: countVerdictFields(verdict),
          ...normalizedView(normalized),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleSimilarity(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(SimilarityInput, params);
      const isEmployer = input.kind === 'employer';
      const score = isEmployer ? employerSimilarity(input.a, input.b) : similarity(input.a, input.b);
      const threshold = isEmployer ? EMPLOYER_MATCH_THRESHOLD : NAME_MATCH_THRESHOLD;
      return formatResponse(
        successResult({ kind: input.kind, score, threshold, matched: score >= threshold })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleVerifyDocument(params: Record<string, unknown>, extra?: ToolExtra): Promise<ToolResponse> {
    try {
      const input = validateInput(VerifyDocumentInput, params);
      const progress: ProgressEvent[] = [];
      const result = await ctx.orchestrator.run(input, {
        signal: extra?.signal,
        onProgress: (event) => progress.push(event),
      });

      return formatResponse(
        successResult({
          run_id: result.run_id,
          state: result.state,
          verification_id: result.stored.id,
          verification_results: result.verdict,
          counts: countVerdictFields(result.verdict),
          ...(result.extraction ? normalizedView(result.extraction) : { extracted_data: null, warnings: [] }),
          progress: progress.map(({ step, message, progress_percent, error }) => ({
            step,
            message,
            progress_percent,
            error,
          })),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleHistory(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(HistoryInput, params);
      const page = { limit: input.limit, offset: input.offset };
      const verifications = input.application_id
        ? await ctx.store.listByApplication(input.application_id, page)
        : await ctx.store.listAll(page);
      return formatResponse(
        successResult({
          application_id: input.application_id ?? null,
          verifications,
          count: verifications.length,
          limit: input.limit,
          offset: input.offset,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleLatest(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ApplicationIdInput, params);
      const summary = await getLatestSummary(ctx.store, input.application_id);
      if (!summary) {
        return formatResponse(
          successResult({
            application_id: input.application_id,
            verification: null,
            message: 'No verification results found for this application',
          })
        );
      }
      return formatResponse(successResult(summary));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleStatus(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ApplicationIdInput, params);
      const status = await getVerificationStatus(ctx.store, input.application_id);
      return formatResponse(successResult({ application_id: input.application_id, ...status }));
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // TOOL DEFINITIONS
  // ═════════════════════════════════════════════════════════════════════════════

  return {
    verify_normalize: {
      description:
        'Normalize a raw pay-stub extraction (model text or JSON object) into typed fields. Derives annual salary when the document does not state it. Returns fields (null = unknown), salary_source and warnings.',
      inputSchema: NormalizeInput.shape,
      handler: handleNormalize,
    },
    verify_compare: {
      description:
        'Compare an application (full_name, annual_salary, employer_name, ssn) against a raw extraction. Pure: nothing is stored. Returns per-field verdicts with reasons, overall status and score.',
      inputSchema: CompareInput.shape,
      handler: handleCompare,
    },
    verify_similarity: {
      description:
        'Score two names (kind=name) or employer names (kind=employer, business suffixes ignored) in [0,1]. Match threshold is 0.8.',
      inputSchema: SimilarityInput.shape,
      handler: handleSimilarity,
    },
    verify_document: {
      description:
        'Run a full verification: extract fields from a pay document image with the vision model (with retry), compare against the application, store the verdict. Returns the verdict, stored id and progress log.',
      inputSchema: VerifyDocumentInput.shape,
      handler: handleVerifyDocument,
    },
    verify_history: {
      description: 'List stored verdicts, newest first, for one application or all. Paginate with limit/offset.',
      inputSchema: HistoryInput.shape,
      handler: handleHistory,
    },
    verify_latest: {
      description: 'Latest stored verdict for an application with matched/mismatched field counts.',
      inputSchema: ApplicationIdInput.shape,
      handler: handleLatest,
    },
    verify_status: {
      description: "Verification status of an application: 'no_documents' or the latest overall status.",
      inputSchema: ApplicationIdInput.shape,
      handler: handleStatus,
    },
  };
}
