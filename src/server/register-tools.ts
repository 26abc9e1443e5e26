/**
 * Shared Tool Registration
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { databaseTools } from '../tools/database.js';
import { pageTools } from '../tools/pages.js';
import { correctionTools } from '../tools/corrections.js';
import { queueTools } from '../tools/queue.js';
import { pipelineTools } from '../tools/pipeline.js';

/** All tool modules in registration order */
export const allToolModules: Record<string, ToolDefinition>[] = [
  databaseTools,
  pageTools,
  correctionTools,
  queueTools,
  pipelineTools,
];

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules define the same tool name
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames.size;
}

export function getToolCount(): number {
  return allToolModules.reduce((count, toolModule) => count + Object.keys(toolModule).length, 0);
}
