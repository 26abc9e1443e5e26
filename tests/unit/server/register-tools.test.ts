/**
 * Tool registration on the MCP server
 *
 * @module tests/unit/server/register-tools
 */

import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools, getToolCount, allToolModules } from '../../../src/server/register-tools.js';

describe('registerAllTools', () => {
  it('registers every tool once', () => {
    const server = new McpServer({ name: 'ocr-convergence-test', version: '0.0.0' });

    expect(registerAllTools(server)).toBe(19);
    expect(getToolCount()).toBe(19);
  });

  it('prefixes every tool name with ocr_', () => {
    const names = allToolModules.flatMap((toolModule) => Object.keys(toolModule));
    expect(names.every((name) => name.startsWith('ocr_'))).toBe(true);
    expect(names).toContain('ocr_pipeline_run');
    expect(names).toContain('ocr_page_mark_reviewed');
  });
});
