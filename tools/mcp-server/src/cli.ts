#!/usr/bin/env -S npx tsx
/**
 * tilegrid MCP Server CLI
 *
 * Runs the MCP server over stdio for LLM integration.
 *
 * Usage:
 *   tilegrid-mcp --rows 5 --cols 5 --opponent greedy
 *
 * Or via environment variables:
 *   TILEGRID_ROWS=4 TILEGRID_COLS=6 tilegrid-mcp
 */

import * as readline from 'node:readline';
import { errorMessage, isGameError } from 'tilegrid-core';
import { HELP_TEXT, type McpCliOptions, parseArgs } from './config.js';
import { MCP_SERVER_VERSION, TileGridMcpServer } from './index.js';
import { handleRequest } from './json-rpc.js';

function readOptions(): McpCliOptions {
  try {
    return parseArgs(process.argv.slice(2), process.env);
  } catch (error) {
    if (!isGameError(error, 'INVALID_CONFIG')) throw error;
    console.error(error.message);
    process.exit(2);
  }
}

function main(): void {
  const options = readOptions();
  if (options.help) {
    console.error(HELP_TEXT);
    process.exit(0);
  }

  const server = new TileGridMcpServer(options);
  const serverInfo = {
    name: 'tilegrid-mcp-server',
    version: MCP_SERVER_VERSION,
    description: 'tilegrid MCP Server - play the connected components game against a baseline bot',
  };

  // Set up readline for stdio communication
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  rl.on('line', (line) => {
    handleRequest(server, serverInfo, line)
      .then((response) => {
        if (response) process.stdout.write(`${JSON.stringify(response)}\n`);
      })
      .catch((error: unknown) => {
        console.error('[TileGridMcp] request failed:', errorMessage(error));
      });
  });

  rl.on('close', () => {
    server.close();
    process.exit(0);
  });

  // Log to stderr (not stdout, which is for MCP protocol)
  console.error('tilegrid MCP Server started');
  console.error(`  Default board: ${options.rows ?? 5}x${options.cols ?? 5}`);
  console.error(`  Default opponent: ${options.opponent ?? 'greedy'}`);
  console.error('  Waiting for MCP client...');
}

main();
