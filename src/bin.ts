#!/usr/bin/env node
/**
 * Income Verification MCP Server - CLI Entry Point
 *
 * Usage:
 *   income-verification-mcp             # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
