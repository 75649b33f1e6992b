/**
 * @module config
 * Server configuration read from environment variables.
 *
 * | Variable                            | Default                      |
 * |-------------------------------------|------------------------------|
 * | `PIXEL_RECOLOR_WORKERS`             | `os.availableParallelism()`  |
 * | `PIXEL_RECOLOR_DEFAULT_TOLERANCE`   | `0.5`                        |
 * | `PIXEL_RECOLOR_VERBOSE`             | off (`1`/`true` enables)     |
 */

import { availableParallelism } from 'os';
import { DEFAULT_TOLERANCE } from '@pixel-recolor/core';

/** Resolved server configuration. */
export interface ServerConfig {
  /** Worker threads in the recolor pool. */
  workers: number;
  /** Tolerance used when a tool call omits one. */
  defaultTolerance: number;
  /** Log every recolor pass to stderr. */
  verbose: boolean;
}

function readWorkers(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return availableParallelism();
  const workers = Number(raw);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new Error(`Invalid PIXEL_RECOLOR_WORKERS: "${raw}" (expected a positive integer)`);
  }
  return workers;
}

function readTolerance(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_TOLERANCE;
  const tolerance = Number(raw);
  if (!Number.isFinite(tolerance) || tolerance < 0 || tolerance > 1) {
    throw new Error(`Invalid PIXEL_RECOLOR_DEFAULT_TOLERANCE: "${raw}" (expected a number between 0 and 1)`);
  }
  return tolerance;
}

/**
 * Build the server configuration from an environment map.
 *
 * @param env - Environment variables, `process.env` by default.
 * @throws {Error} If a variable is set to an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const verbose = env.PIXEL_RECOLOR_VERBOSE;
  return {
    workers: readWorkers(env.PIXEL_RECOLOR_WORKERS),
    defaultTolerance: readTolerance(env.PIXEL_RECOLOR_DEFAULT_TOLERANCE),
    verbose: verbose === '1' || verbose?.toLowerCase() === 'true',
  };
}
