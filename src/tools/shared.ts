/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

/** Suggested follow-up call included in successful responses */
export interface NextStep {
  tool: string;
  description: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Correction histories carry full text bodies; cap the response size */
const MAX_RESPONSE_BYTES = 700 * 1024;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Format tool result as MCP content response. Oversized results have their
 * largest arrays cut down and carry a `_response_truncated` note.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES || !isRecord(result)) {
    return { content: [{ type: 'text', text: json }] };
  }
  const truncated = truncateResult(result, MAX_RESPONSE_BYTES);
  return { content: [{ type: 'text', text: JSON.stringify(truncated, null, 2) }] };
}

function truncateResult(obj: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(obj));
  if (!isRecord(copy)) return obj;

  const arrays: { path: string[]; arr: unknown[]; size: number }[] = [];
  findArrays(copy, [], arrays);
  arrays.sort((a, b) => b.size - a.size);

  let currentSize = JSON.stringify(copy, null, 2).length;
  const truncatedFields: string[] = [];

  for (const { path, arr } of arrays) {
    if (currentSize <= maxBytes) break;
    if (arr.length <= 5) continue;

    const cap = Math.min(50, Math.max(5, Math.floor(arr.length * 0.1)));
    setNestedValue(copy, path, arr.slice(0, cap));
    setNestedValue(copy, [...path.slice(0, -1), `_${path[path.length - 1]}_total`], arr.length);
    truncatedFields.push(`${path.join('.')} (${arr.length} → ${cap})`);
    currentSize = JSON.stringify(copy, null, 2).length;
  }

  if (currentSize > maxBytes) {
    return {
      _response_truncated: {
        reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit and could not be reduced by array truncation`,
        suggestion: 'Use limit/offset parameters or more specific filters to reduce response size',
      },
    };
  }

  if (truncatedFields.length > 0) {
    copy._response_truncated = {
      reason: `Response exceeded ${Math.round(maxBytes / 1024)}KB limit`,
      truncated_fields: truncatedFields,
      suggestion: 'Use limit/offset parameters or more specific filters to reduce response size',
    };
  }
  return copy;
}

function findArrays(
  obj: unknown,
  path: string[],
  result: { path: string[]; arr: unknown[]; size: number }[]
): void {
  if (Array.isArray(obj)) {
    result.push({ path: [...path], arr: obj, size: JSON.stringify(obj).length });
    return;
  }
  if (isRecord(obj)) {
    for (const [key, value] of Object.entries(obj)) {
      findArrays(value, [...path, key], result);
    }
  }
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const next = current[path[i]];
    if (!isRecord(next)) return;
    current = next;
  }
  current[path[path.length - 1]] = value;
}

/**
 * Handle errors uniformly
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
