#!/usr/bin/env node
/**
 * OCR Convergence MCP Server - CLI Entry Point
 *
 * Usage:
 *   ocr-convergence-mcp                 # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
