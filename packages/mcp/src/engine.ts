/**
 * @module engine
 * Lazily created recolor pool shared by every tool call.
 *
 * The pool is built on first use from {@link loadConfig} and torn down by
 * {@link shutdownEngine} when the server exits. Tools that only need the
 * configuration call {@link getConfig} and never spawn workers.
 */

import { RecolorEventBus, RecolorPool } from '@pixel-recolor/core';
import { type ServerConfig, loadConfig } from './config.js';

let config: ServerConfig | null = null;
let pool: RecolorPool | null = null;

/** Return the server configuration, reading the environment on first call. */
export function getConfig(): ServerConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/** Subscribe stderr logging to the pool's events. */
function createLoggingBus(): RecolorEventBus {
  const events = new RecolorEventBus();
  events.on('recolor:completed', ({ replacedPixels, durationMs }) => {
    console.error(`[MCP Server] Replaced ${replacedPixels} pixel(s) in ${durationMs.toFixed(1)}ms`);
  });
  events.on('recolor:rejected', ({ kind, message }) => {
    console.error(`[MCP Server] Rejected bitmap (${kind}): ${message}`);
  });
  return events;
}

/** Return the shared pool, creating it on first call. */
export function getPool(): RecolorPool {
  if (!pool) {
    const { workers, verbose } = getConfig();
    pool = new RecolorPool({
      size: workers,
      events: verbose ? createLoggingBus() : undefined,
    });
  }
  return pool;
}

/** Terminate the shared pool, if one was created. */
export async function shutdownEngine(): Promise<void> {
  const current = pool;
  pool = null;
  if (current) {
    await current.destroy();
  }
}
