/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { createVerificationTools } from '../tools/verification.js';
import { createHealthTools } from '../tools/health.js';
import type { VerificationContext } from './types.js';

/**
 * All tool modules in registration order
 */
export function buildToolModules(ctx: VerificationContext): Record<string, ToolDefinition>[] {
  return [createVerificationTools(ctx), createHealthTools(ctx)];
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer, ctx: VerificationContext): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of buildToolModules(ctx)) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
      toolCount++;
    }
  }

  return toolCount;
}
