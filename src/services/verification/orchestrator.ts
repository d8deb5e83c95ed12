/**
 * Verification Orchestrator
 *
 * Drives one verification run: OCR collaborator call under the retry
 * policy, normalization, the four field comparisons, aggregation and
 * persistence. Progress is an async iterator of ordered ProgressEvents:
 *
 *   starting(0) -> downloading(20) -> extracting(40) -> extracted(60) ->
 *   verifying_name(70) -> verifying_salary(80) -> verifying_employer(90) ->
 *   finalizing(95) -> complete(100)
 *
 * or an early error(0). Runs share nothing but the injected collaborators.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/verification/orchestrator
 */

import { v4 as uuidv4 } from 'uuid';

import type { ApplicationRecord } from '../../models/application.js';
import { extractedRecordToJson } from '../../models/extraction.js';
import { STEP_PROGRESS, type ProgressEvent, type ProgressStep, type RunState } from '../../models/progress.js';
import type { StoredVerdict, VerificationVerdict } from '../../models/verdict.js';
import { EventBus, type SystemEventType } from '../../server/events.js';
import { VerificationError, cancelledError, persistenceError } from '../../server/errors.js';
import type { RetryPolicy } from '../../utils/backoff.js';
import { ExtractionError, isTransientError, toExtractionError } from '../extraction/errors.js';
import type { ExtractionSource } from '../extraction/extractor.js';
import type { SaveVerdictInput, VerdictStore } from '../storage/verdict-store.js';
import { aggregateVerdicts, errorVerdict } from './aggregator.js';
import { verifyEmployer, verifyName, verifySalary, verifySsn } from './engine.js';
import type { NormalizeResult } from './normalizer.js';
import { parseExtractionText } from './response-parser.js';

export interface VerificationRequest {
  application_id: string;
  document_id: string;
  application: ApplicationRecord;
  /** Local path or http(s) URL of the pay document */
  document_ref: string;
}

export interface RunResult {
  run_id: string;
  state: RunState;
  verdict: VerificationVerdict;
  stored: StoredVerdict;
  /** Null when extraction failed */
  extraction: NormalizeResult | null;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

export interface OrchestratorDeps {
  extractor: ExtractionSource;
  store: VerdictStore;
  retryPolicy: RetryPolicy;
  events?: EventBus;
}

/** Mutable bookkeeping for one run */
interface RunTracker {
  runId: string;
  state: RunState;
  request: VerificationRequest;
}

const STEP_MESSAGES: Record<Exclude<ProgressStep, 'error'>, string> = {
  starting: 'Starting verification process...',
  downloading: 'Downloading document from storage...',
  extracting: 'Extracting data using AI OCR...',
  extracted: 'Data extracted successfully',
  verifying_name: 'Verifying name match...',
  verifying_salary: 'Verifying salary match...',
  verifying_employer: 'Verifying employer match...',
  finalizing: 'Finalizing verification results...',
  complete: 'Verification completed',
};

function stepEvent(
  step: Exclude<ProgressStep, 'error'>,
  state: RunState,
  payload: Record<string, unknown> = {}
): ProgressEvent {
  return {
    step,
    message: STEP_MESSAGES[step],
    progress_percent: STEP_PROGRESS[step],
    error: false,
    payload: { ...payload, state },
  };
}

function errorEvent(message: string, state: RunState, payload: Record<string, unknown>): ProgressEvent {
  return {
    step: 'error',
    message,
    progress_percent: STEP_PROGRESS.error,
    error: true,
    payload: { ...payload, state },
  };
}

export class VerificationOrchestrator {
  private readonly extractor: ExtractionSource;
  private readonly store: VerdictStore;
  private readonly retryPolicy: RetryPolicy;
  private readonly events: EventBus;

  constructor(deps: OrchestratorDeps) {
    this.extractor = deps.extractor;
    this.store = deps.store;
    this.retryPolicy = deps.retryPolicy;
    this.events = deps.events ?? new EventBus();
  }

  /**
   * Ordered progress events for one run. A failure ends the stream with an
   * `error` event; cancellation ends it silently.
   */
  async *stream(request: VerificationRequest, signal?: AbortSignal): AsyncGenerator<ProgressEvent, RunResult | null, void> {
    const tracker = this.createTracker(request);
    try {
      return yield* this.execute(tracker, signal);
    } catch (error) {
      const failure = VerificationError.fromUnknown(error);
      if (failure.category === 'CANCELLED') return null;

      const message =
        failure.category === 'PERSISTENCE_ERROR'
          ? `Verification process failed: ${failure.message}`
          : `Verification failed: ${failure.message}`;
      yield errorEvent(message, tracker.state, { category: failure.category });
      return null;
    }
  }

  /**
   * Run to completion. Resolves with the result (including extraction
   * failures, which yield an `error` verdict); rejects with
   * PERSISTENCE_ERROR when the verdict cannot be stored and CANCELLED when
   * the signal fires.
   */
  async run(request: VerificationRequest, options: RunOptions = {}): Promise<RunResult> {
    const execution = this.execute(this.createTracker(request), options.signal);
    try {
      for (;;) {
        const next = await execution.next();
        if (next.done) return next.value;
        options.onProgress?.(next.value);
      }
    } catch (error) {
      throw VerificationError.fromUnknown(error);
    }
  }

  private createTracker(request: VerificationRequest): RunTracker {
    return {
      runId: uuidv4(),
      state: 'PENDING',
      request: {
        ...request,
        application: Object.freeze({ ...request.application }),
      },
    };
  }

  private async *execute(tracker: RunTracker, signal?: AbortSignal): AsyncGenerator<ProgressEvent, RunResult, void> {
    const { request } = tracker;
    this.checkpoint(tracker, signal);
    console.error(
      `[Orchestrator] Run ${tracker.runId}: application ${request.application_id}, document ${request.document_id}`
    );
    this.publish('verification.started', tracker, { document_ref: request.document_ref });
    yield stepEvent('starting', tracker.state);

    this.checkpoint(tracker, signal);
    tracker.state = 'EXTRACTING';
    yield stepEvent('downloading', tracker.state);
    this.checkpoint(tracker, signal);
    yield stepEvent('extracting', tracker.state);
    this.checkpoint(tracker, signal);

    let rawText: string;
    try {
      rawText = await this.retryPolicy.execute(
        async ({ signal: attemptSignal }) => {
          const text = await this.extractor.extract(request.document_ref, attemptSignal);
          if (text.trim() === '') {
            throw new ExtractionError('Vision model returned no content', 'EXTRACTION_FAILED', true);
          }
          return text;
        },
        { signal, shouldRetry: isTransientError, label: 'Extraction' }
      );
    } catch (error) {
      this.checkpoint(tracker, signal);
      const failure = toExtractionError(error);
      const message = `OCR extraction failed: ${failure.message}`;
      console.error(`[Orchestrator] Run ${tracker.runId}: ${message}`);

      const verdict = errorVerdict(message);
      const stored = await this.persist(tracker, { verdict, extracted_record: null });
      tracker.state = 'ERROR';
      this.publish('verification.failed', tracker, { category: failure.category, message });
      yield errorEvent(message, tracker.state, {
        category: failure.category,
        verification_results: verdict,
        verification_id: stored.id,
      });
      return { run_id: tracker.runId, state: tracker.state, verdict, stored, extraction: null };
    }

    this.checkpoint(tracker, signal);
    const extraction = parseExtractionText(rawText);
    const extractedJson = extractedRecordToJson(extraction.record);
    this.publish('verification.extracted', tracker, { warnings: extraction.warnings.length });
    yield stepEvent('extracted', tracker.state, {
      extracted_data: extractedJson,
      warnings: extraction.warnings,
    });

    this.checkpoint(tracker, signal);
    tracker.state = 'COMPARING';
    const { application } = request;
    const record = extraction.record;

    const nameVerdict = verifyName(application, record);
    yield stepEvent('verifying_name', tracker.state, { field_verdict: nameVerdict });
    this.checkpoint(tracker, signal);

    const salaryVerdict = verifySalary(application, record);
    yield stepEvent('verifying_salary', tracker.state, { field_verdict: salaryVerdict });
    this.checkpoint(tracker, signal);

    const employerVerdict = verifyEmployer(application, record);
    yield stepEvent('verifying_employer', tracker.state, { field_verdict: employerVerdict });
    this.checkpoint(tracker, signal);

    const ssnVerdict = verifySsn(application, record);
    const verdict = aggregateVerdicts([nameVerdict, salaryVerdict, employerVerdict, ssnVerdict]);
    yield stepEvent('finalizing', tracker.state, { field_verdict: ssnVerdict });
    this.checkpoint(tracker, signal);

    const stored = await this.persist(tracker, { verdict, extracted_record: extractedJson });
    tracker.state = verdict.overall_status === 'verified' ? 'VERIFIED' : 'MISMATCH';
    console.error(`[Orchestrator] Run ${tracker.runId}: ${verdict.summary}`);
    this.publish('verification.completed', tracker, {
      verification_id: stored.id,
      overall_status: verdict.overall_status,
      score_percent: verdict.score_percent,
    });
    yield stepEvent('complete', tracker.state, {
      verification_results: verdict,
      verification_id: stored.id,
    });

    return { run_id: tracker.runId, state: tracker.state, verdict, stored, extraction };
  }

  /**
   * Throw CANCELLED once the caller's signal has fired
   */
  private checkpoint(tracker: RunTracker, signal?: AbortSignal): void {
    if (!signal?.aborted) return;
    console.error(`[Orchestrator] Run ${tracker.runId} cancelled during ${tracker.state}`);
    this.publish('verification.cancelled', tracker, {});
    throw cancelledError();
  }

  private async persist(
    tracker: RunTracker,
    input: Pick<SaveVerdictInput, 'verdict' | 'extracted_record'>
  ): Promise<StoredVerdict> {
    try {
      return await this.store.save({
        application_id: tracker.request.application_id,
        document_id: tracker.request.document_id,
        ...input,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Orchestrator] Run ${tracker.runId}: failed to store verdict: ${message}`);
      throw persistenceError(`Failed to store verdict: ${message}`, {
        verdict: input.verdict,
        application_id: tracker.request.application_id,
        document_id: tracker.request.document_id,
      });
    }
  }

  private publish(type: SystemEventType, tracker: RunTracker, data: Record<string, unknown>): void {
    this.events.emitEvent({
      type,
      timestamp: new Date().toISOString(),
      runId: tracker.runId,
      applicationId: tracker.request.application_id,
      documentId: tracker.request.document_id,
      data: { ...data, state: tracker.state },
    });
  }
}
