/**
 * Verification Context
 *
 * Builds the collaborators (extractor, store, event bus, retry policy,
 * orchestrator) once. Tools receive the context by reference; nothing is
 * held in module-level state.
 *
 * @module server/context
 */

import { VisionModelClient } from '../services/extraction/client.js';
import { loadExtractionConfig, type ExtractionConfig } from '../services/extraction/config.js';
import { DocumentLoader } from '../services/extraction/document-loader.js';
import { PaystubExtractor, type ExtractionSource } from '../services/extraction/extractor.js';
import { MemoryVerdictStore, type VerdictStore } from '../services/storage/verdict-store.js';
import { loadVerificationConfig, type VerificationConfig } from '../services/verification/config.js';
import { VerificationOrchestrator } from '../services/verification/orchestrator.js';
import { RetryPolicy } from '../utils/backoff.js';
import { configurationError } from './errors.js';
import { EventBus, EventTally } from './events.js';
import type { StartupStatus, VerificationContext } from './types.js';

export interface VerificationContextOptions {
  extraction?: Partial<ExtractionConfig>;
  verification?: Partial<VerificationConfig>;
  /** Replaces the vision-model extractor */
  extractor?: ExtractionSource;
  /** Replaces the in-memory store */
  store?: VerdictStore;
  events?: EventBus;
  startup?: StartupStatus;
}

function loadConfigs(options: VerificationContextOptions): {
  extractionConfig: ExtractionConfig;
  verificationConfig: VerificationConfig;
} {
  try {
    return {
      extractionConfig: loadExtractionConfig(options.extraction),
      verificationConfig: loadVerificationConfig(options.verification),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw configurationError(`Invalid configuration: ${message}`);
  }
}

export function createVerificationContext(options: VerificationContextOptions = {}): VerificationContext {
  const { extractionConfig, verificationConfig } = loadConfigs(options);

  const extractor =
    options.extractor ??
    new PaystubExtractor(
      new DocumentLoader({
        downloadTimeoutMs: extractionConfig.documentTimeoutMs,
        maxFileSize: extractionConfig.maxFileSize,
      }),
      new VisionModelClient(extractionConfig)
    );
  const store = options.store ?? new MemoryVerdictStore();
  const events = options.events ?? new EventBus();
  const retryPolicy = new RetryPolicy(verificationConfig.retry);

  return {
    extractionConfig,
    verificationConfig,
    extractor,
    store,
    events,
    lifecycle: new EventTally(events),
    retryPolicy,
    orchestrator: new VerificationOrchestrator({ extractor, store, retryPolicy, events }),
    startup: options.startup ?? null,
    started_at: new Date().toISOString(),
  };
}
