/**
 * @module recolor-pool
 * Multi-threaded color replacement on a fixed pool of `worker_threads` workers.
 *
 * A pass copies the source bytes into a `SharedArrayBuffer`, pre-fills a shared
 * output buffer with the same bytes, splits the pixel range into one disjoint
 * range per worker and resolves only after every range has reported back.
 * Workers read the shared source and write the matching pixels of their own
 * range, so no two tasks ever touch the same byte.
 *
 * @see {@link recolor} for the single-threaded variant.
 */

import { availableParallelism } from 'os';
import { Worker } from 'worker_threads';
import type { Bitmap, EventBus, ReplacementRequest } from '@pixel-recolor/types';
import { validateBitmap } from './bitmap';
import { type RecolorResult, partitionPixels, planRecolor } from './recolor';
import { recolorPixelRange } from './recolor-kernel';

/** Work item posted to a worker. */
export interface RecolorTask {
  id: number;
  source: SharedArrayBuffer;
  output: SharedArrayBuffer;
  width: number;
  bytesPerRow: number;
  start: number;
  end: number;
  target: number[];
  replacement: number[];
  limit: number;
}

/** Message a worker posts back when a task finishes. */
export type RecolorTaskReply = { id: number; replaced: number } | { id: number; error: string };

/** Subset of `Worker` the pool relies on. */
export interface WorkerLike {
  postMessage(message: RecolorTask): void;
  on(event: 'message' | 'error', listener: (value: unknown) => void): unknown;
  terminate(): Promise<number>;
}

/** Creates a worker that evaluates the given CommonJS source. */
export type WorkerFactory = (source: string) => WorkerLike;

/** Options for {@link RecolorPool}. */
export interface RecolorPoolOptions {
  /** Number of workers. Defaults to `os.availableParallelism()`. */
  size?: number;
  /** Worker constructor; replaced in tests by an in-process stand-in. */
  workerFactory?: WorkerFactory;
  /** Bus that receives `recolor:*` and `pool:destroyed` events. */
  events?: EventBus;
}

/** Script each worker runs: the shared kernel plus a message loop. */
export const WORKER_SOURCE = [
  "const { parentPort } = require('worker_threads');",
  `const recolorPixelRange = ${recolorPixelRange.toString()};`,
  "parentPort.on('message', (task) => {",
  '  try {',
  '    const replaced = recolorPixelRange(',
  '      new Uint8Array(task.source), new Uint8ClampedArray(task.output),',
  '      task.width, task.bytesPerRow, task.start, task.end,',
  '      task.target, task.replacement, task.limit,',
  '    );',
  '    parentPort.postMessage({ id: task.id, replaced });',
  '  } catch (err) {',
  '    parentPort.postMessage({ id: task.id, error: err instanceof Error ? err.message : String(err) });',
  '  }',
  '});',
].join('\n');

/** Default factory: a real worker thread evaluating {@link WORKER_SOURCE}. */
export function createNodeWorker(source: string): WorkerLike {
  return new Worker(source, { eval: true });
}

function isTaskReply(value: unknown): value is RecolorTaskReply {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value) || typeof value.id !== 'number') return false;
  return ('replaced' in value && typeof value.replaced === 'number') || ('error' in value && typeof value.error === 'string');
}

interface PendingTask {
  /** Recolor call the task belongs to. */
  pass: number;
  task: RecolorTask;
  resolve: (replaced: number) => void;
  reject: (error: Error) => void;
}

interface WorkerSlot {
  worker: WorkerLike;
  current: PendingTask | null;
}

/**
 * Fixed-size worker pool running the recolor kernel in parallel.
 *
 * Call {@link destroy} when done; live workers keep the process running.
 */
export class RecolorPool {
  /** Number of workers in the pool. */
  readonly size: number;
  private readonly factory: WorkerFactory;
  private readonly events?: EventBus;
  private readonly slots: WorkerSlot[] = [];
  private readonly queue: PendingTask[] = [];
  private nextTaskId = 1;
  private nextPassId = 1;
  private destroyed = false;

  constructor(options: RecolorPoolOptions = {}) {
    const size = options.size ?? availableParallelism();
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.factory = options.workerFactory ?? createNodeWorker;
    this.events = options.events;

    for (let i = 0; i < size; i++) {
      this.slots.push(this.spawn());
    }
  }

  /**
   * Replace a color in a bitmap using every worker of the pool.
   *
   * Validation runs before anything is allocated or dispatched; a rejected
   * bitmap resolves to `{ ok: false }`. The caller's buffer is never written.
   *
   * @throws {Error} If the pool has been destroyed or a worker fails.
   */
  async recolor(bitmap: Bitmap, request: ReplacementRequest): Promise<RecolorResult> {
    this.assertAlive();

    const error = validateBitmap(bitmap);
    if (error) {
      this.events?.emit('recolor:rejected', { kind: error.kind, message: error.message });
      return { ok: false, error };
    }

    const startedAt = performance.now();
    this.events?.emit('recolor:started', { width: bitmap.width, height: bitmap.height, workers: this.size });

    const plan = planRecolor(request);
    const byteLength = bitmap.data.length;
    const sourceBuffer = new SharedArrayBuffer(byteLength);
    new Uint8Array(sourceBuffer).set(bitmap.data);
    const outputBuffer = new SharedArrayBuffer(byteLength);
    const output = new Uint8ClampedArray(outputBuffer);
    output.set(bitmap.data);

    const pass = this.nextPassId++;
    const ranges = partitionPixels(bitmap.width * bitmap.height, this.size);
    const counts = await Promise.all(
      ranges.map(([start, end]) =>
        this.run(pass, {
          id: this.nextTaskId++,
          source: sourceBuffer,
          output: outputBuffer,
          width: bitmap.width,
          bytesPerRow: bitmap.bytesPerRow,
          start,
          end,
          target: plan.target,
          replacement: plan.replacement,
          limit: plan.limit,
        }),
      ),
    );

    const replacedPixels = counts.reduce((sum, n) => sum + n, 0);
    this.events?.emit('recolor:completed', { replacedPixels, durationMs: performance.now() - startedAt });

    return {
      ok: true,
      replacedPixels,
      bitmap: {
        width: bitmap.width,
        height: bitmap.height,
        bytesPerRow: bitmap.bytesPerRow,
        bytesPerPixel: bitmap.bytesPerPixel,
        data: output,
      },
    };
  }

  /** Terminate every worker. Queued tasks are rejected. */
  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;

    const stopped = new Error('RecolorPool has been destroyed');
    for (const pending of this.queue.splice(0)) {
      pending.reject(stopped);
    }
    for (const slot of this.slots) {
      slot.current?.reject(stopped);
      slot.current = null;
    }

    await Promise.all(this.slots.map((slot) => slot.worker.terminate()));
    this.events?.emit('pool:destroyed');
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private assertAlive(): void {
    if (this.destroyed) {
      throw new Error('RecolorPool has been destroyed');
    }
  }

  private run(pass: number, task: RecolorTask): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      this.queue.push({ pass, task, resolve, reject });
      this.pump();
    });
  }

  /** Reject a failed task and drop the queued ranges of the same pass. */
  private fail(pending: PendingTask, error: Error): void {
    pending.reject(error);
    for (let i = this.queue.length - 1; i >= 0; i--) {
      if (this.queue[i].pass === pending.pass) {
        this.queue.splice(i, 1)[0].reject(error);
      }
    }
  }

  /** Hand queued tasks to idle workers. */
  private pump(): void {
    for (const slot of this.slots) {
      if (this.queue.length === 0) return;
      if (slot.current) continue;

      const pending = this.queue.shift();
      if (!pending) return;
      slot.current = pending;
      slot.worker.postMessage(pending.task);
    }
  }

  private spawn(): WorkerSlot {
    const slot: WorkerSlot = { worker: this.factory(WORKER_SOURCE), current: null };

    slot.worker.on('message', (value) => {
      const pending = slot.current;
      if (!pending || !isTaskReply(value) || value.id !== pending.task.id) return;

      slot.current = null;
      if ('error' in value) {
        this.fail(pending, new Error(`Recolor task ${value.id} failed: ${value.error}`));
      } else {
        pending.resolve(value.replaced);
      }
      this.pump();
    });

    slot.worker.on('error', (value) => {
      const err = value instanceof Error ? value : new Error(String(value));
      console.error('[RecolorPool] Worker crashed:', err);

      const pending = slot.current;
      slot.current = null;
      if (pending) this.fail(pending, err);

      if (!this.destroyed) {
        const index = this.slots.indexOf(slot);
        if (index >= 0) this.slots[index] = this.spawn();
        this.pump();
      }
    });

    return slot;
  }
}
