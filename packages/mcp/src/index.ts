/**
 * @module mcp
 * MCP (Model Context Protocol) server for the pixel recolor engine.
 *
 * Communicates with the client over stdio. Bitmaps arrive as base64 RGBA
 * bytes and are recolored on a shared worker-thread pool.
 *
 * Architecture:
 *   MCP client ──stdio──> This MCP Server (Node.js)
 *                               │ postMessage + SharedArrayBuffer
 *                               ↓
 *                        RecolorPool worker threads
 *
 * stdout carries the protocol, so all logging goes to stderr.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { getConfig, shutdownEngine } from './engine.js';
import { TOOLS, handleToolCall } from './tools.js';

const config = getConfig();

const server = new Server(
  { name: 'pixel-recolor', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args ?? {});
});

async function shutdown(signal: string): Promise<void> {
  console.error(`[MCP Server] ${signal} received, shutting down`);
  try {
    await shutdownEngine();
    await server.close();
  } catch (e) {
    console.error('[MCP Server] Shutdown failed:', e);
    process.exitCode = 1;
  }
  process.exit();
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

const transport = new StdioServerTransport();
await server.connect(transport);
console.error(
  `[MCP Server] pixel-recolor ready (workers: ${config.workers}, default tolerance: ${config.defaultTolerance})`,
);
