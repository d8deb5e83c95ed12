/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 * Eliminates duplication of formatResponse, handleError, and type definitions.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { VerificationError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Per-request extras the MCP server passes to a handler */
export interface ToolExtra {
  /** Fires when the client cancels the request */
  signal?: AbortSignal;
}

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>, extra?: ToolExtra) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response. Listing tools paginate, so
 * every result is serialized whole.
 */
export function formatResponse(result: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const failure = VerificationError.fromUnknown(error);
  console.error(`[ERROR] ${failure.category}: ${failure.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(failure), null, 2) }],
    isError: true,
  };
}
