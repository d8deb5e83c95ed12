/**
 * MCP Server Type Definitions
 *
 * Tool result envelope and the verification context shared by every tool.
 *
 * @module server/types
 */

import type { ExtractionConfig } from '../services/extraction/config.js';
import type { ExtractionSource } from '../services/extraction/extractor.js';
import type { VerdictStore } from '../services/storage/verdict-store.js';
import type { VerificationConfig } from '../services/verification/config.js';
import type { VerificationOrchestrator } from '../services/verification/orchestrator.js';
import type { RetryPolicy } from '../utils/backoff.js';
import type { EventBus, EventTally } from './events.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STARTUP STATUS
// ═══════════════════════════════════════════════════════════════════════════════

export interface StartupStatus {
  /** Whether OLLAMA_BASE_URL was set explicitly */
  ollama_base_url_set: boolean;
  warnings: string[];
  checked_at: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION CONTEXT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything the tools need, built once at start-up and passed by reference
 */
export interface VerificationContext {
  extractionConfig: ExtractionConfig;
  verificationConfig: VerificationConfig;
  extractor: ExtractionSource;
  store: VerdictStore;
  events: EventBus;
  /** Lifecycle event counts since the context was built */
  lifecycle: EventTally;
  retryPolicy: RetryPolicy;
  orchestrator: VerificationOrchestrator;
  startup: StartupStatus | null;
  /** ISO 8601 */
  started_at: string;
}
