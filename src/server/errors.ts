/**
 * Verification Error Handling
 *
 * Every failure that leaves the engine or a tool is a VerificationError with a
 * category agents can branch on, plus a recovery hint naming the next tool.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // OCR collaborator
  | 'EXTRACTION_FAILED'
  | 'EXTRACTION_TIMEOUT'
  | 'EXTRACTION_AUTH_ERROR'

  // Verdict store
  | 'PERSISTENCE_ERROR'

  // Caller aborted the run
  | 'CANCELLED'

  // Tool boundary
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

const VALID_CATEGORIES: ReadonlySet<string> = new Set<ErrorCategory>([
  'EXTRACTION_FAILED',
  'EXTRACTION_TIMEOUT',
  'EXTRACTION_AUTH_ERROR',
  'PERSISTENCE_ERROR',
  'CANCELLED',
  'VALIDATION_ERROR',
  'CONFIGURATION_ERROR',
  'INTERNAL_ERROR',
]);

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && VALID_CATEGORIES.has(value);
}

/**
 * Map error class names to categories. Extraction errors carry their own
 * `.category`, which wins over this table.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',

  ExtractionError: 'EXTRACTION_FAILED',
  ExtractionAPIError: 'EXTRACTION_FAILED',
  ExtractionTimeoutError: 'EXTRACTION_TIMEOUT',
  DocumentLoadError: 'EXTRACTION_FAILED',
  AttemptTimeoutError: 'EXTRACTION_TIMEOUT',

  RetryAbortedError: 'CANCELLED',
  AbortError: 'CANCELLED',
};

function readProperty(error: Error, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(error, key)
    ? Object.getOwnPropertyDescriptor(error, key)?.value
    : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class VerificationError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'VerificationError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VerificationError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): VerificationError {
    if (error instanceof VerificationError) {
      return error;
    }

    if (error instanceof Error) {
      const ownCategory = readProperty(error, 'category');
      const category = isErrorCategory(ownCategory)
        ? ownCategory
        : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      const customDetails = readProperty(error, 'details');
      const statusCode = readProperty(error, 'statusCode');
      return new VerificationError(category, error.message, {
        originalName: error.name,
        ...(typeof statusCode === 'number' && { statusCode }),
        ...(isRecord(customDetails) && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new VerificationError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  EXTRACTION_FAILED: {
    tool: 'verify_health',
    hint: 'Check that Ollama is running at OLLAMA_BASE_URL and the document is a readable image',
  },
  EXTRACTION_TIMEOUT: {
    tool: 'verify_health',
    hint: 'Retry later or raise VERIFY_ATTEMPT_TIMEOUT_MS; large images take longer',
  },
  EXTRACTION_AUTH_ERROR: {
    tool: 'verify_health',
    hint: 'The vision model server rejected the request; check proxy credentials in front of Ollama',
  },
  PERSISTENCE_ERROR: {
    tool: 'verify_history',
    hint: 'The verdict was computed but not saved (see details.verdict); retry verify_document',
  },
  CANCELLED: { tool: 'verify_document', hint: 'The run was cancelled; start it again if needed' },
  VALIDATION_ERROR: { tool: 'verify_health', hint: 'Check parameter types and required fields' },
  CONFIGURATION_ERROR: {
    tool: 'verify_health',
    hint: 'Check environment variables: OLLAMA_BASE_URL, OLLAMA_VLM_MODEL, VERIFY_* settings',
  },
  INTERNAL_ERROR: { tool: 'verify_health', hint: 'Run verify_health for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format VerificationError for tool response.
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: VerificationError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): VerificationError {
  return new VerificationError('VALIDATION_ERROR', message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): VerificationError {
  return new VerificationError('CONFIGURATION_ERROR', message, details);
}

export function persistenceError(message: string, details?: Record<string, unknown>): VerificationError {
  return new VerificationError('PERSISTENCE_ERROR', message, details);
}

export function cancelledError(message: string = 'Verification cancelled'): VerificationError {
  return new VerificationError('CANCELLED', message);
}
