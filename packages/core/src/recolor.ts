/**
 * @module recolor
 * Color replacement over RGBA bitmaps.
 *
 * Every pixel whose channels all lie within the tolerance of the target color
 * is overwritten with the replacement color (alpha included). Other pixels and
 * row padding are copied unchanged. The input bitmap is never modified.
 *
 * @see {@link RecolorPool} for the multi-threaded variant.
 */

import type { Bitmap, Color, EventBus, ReplacementRequest } from '@pixel-recolor/types';
import { EngineError, getPixelColor, validateBitmap } from './bitmap';
import { colorToBytes, normalizeColor } from './color';
import { MATCH_EPSILON, effectiveTolerance, matches } from './color-match';
import { recolorPixelRange } from './recolor-kernel';

/** Outcome of a recolor pass. */
export type RecolorResult =
  | { ok: true; bitmap: Bitmap; replacedPixels: number }
  | { ok: false; error: EngineError };

/** Outcome of {@link countMatches}. */
export type CountResult = { ok: true; count: number } | { ok: false; error: EngineError };

/** Pixels processed per chunk by the synchronous engine. */
export const CHUNK_PIXELS = 64 * 1024;

/** Options for {@link recolor}. */
export interface RecolorOptions {
  /** Bus that receives `recolor:*` events. */
  events?: EventBus;
}

/** Request parameters resolved into the form the kernel consumes. */
export interface RecolorPlan {
  /** Normalized target channels (r, g, b, a). */
  target: [number, number, number, number];
  /** Replacement channels as bytes (r, g, b, a). */
  replacement: [number, number, number, number];
  /** Per-channel match limit: effective tolerance plus {@link MATCH_EPSILON}. */
  limit: number;
}

/** Resolve a request into kernel parameters. */
export function planRecolor(request: ReplacementRequest): RecolorPlan {
  const target = normalizeColor(request.target);
  return {
    target: [target.r, target.g, target.b, target.a],
    replacement: colorToBytes(request.replacement),
    limit: effectiveTolerance(request.tolerance) + MATCH_EPSILON,
  };
}

/**
 * Split `[0, pixelCount)` into at most `parts` contiguous, disjoint ranges
 * whose sizes differ by at most one.
 *
 * @returns `[start, end)` pairs covering every pixel exactly once.
 */
export function partitionPixels(pixelCount: number, parts: number): Array<[number, number]> {
  const count = Math.max(1, Math.min(Math.floor(parts), pixelCount));
  const base = Math.floor(pixelCount / count);
  const remainder = pixelCount % count;

  const ranges: Array<[number, number]> = [];
  let start = 0;
  for (let i = 0; i < count; i++) {
    const end = start + base + (i < remainder ? 1 : 0);
    ranges.push([start, end]);
    start = end;
  }
  return ranges;
}

/**
 * Replace a color in a bitmap on the calling thread.
 *
 * Validation runs before anything is allocated; a rejected bitmap yields
 * `{ ok: false }` and no output.
 *
 * @param bitmap - Source bitmap (read-only).
 * @param request - Target, replacement and tolerance.
 * @param options - Optional event bus.
 * @returns The new bitmap and the number of replaced pixels, or the validation error.
 */
export function recolor(bitmap: Bitmap, request: ReplacementRequest, options: RecolorOptions = {}): RecolorResult {
  const { events } = options;
  const error = validateBitmap(bitmap);
  if (error) {
    events?.emit('recolor:rejected', { kind: error.kind, message: error.message });
    return { ok: false, error };
  }

  const startedAt = performance.now();
  events?.emit('recolor:started', { width: bitmap.width, height: bitmap.height, workers: 1 });

  const plan = planRecolor(request);
  const output = new Uint8ClampedArray(bitmap.data);
  const pixelCount = bitmap.width * bitmap.height;

  let replacedPixels = 0;
  for (let start = 0; start < pixelCount; start += CHUNK_PIXELS) {
    const end = Math.min(start + CHUNK_PIXELS, pixelCount);
    replacedPixels += recolorPixelRange(
      bitmap.data,
      output,
      bitmap.width,
      bitmap.bytesPerRow,
      start,
      end,
      plan.target,
      plan.replacement,
      plan.limit,
    );
  }

  events?.emit('recolor:completed', { replacedPixels, durationMs: performance.now() - startedAt });

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

/**
 * Count the pixels that would be replaced for a target and tolerance,
 * without allocating an output bitmap.
 */
export function countMatches(bitmap: Bitmap, target: Color, tolerance?: number): CountResult {
  const error = validateBitmap(bitmap);
  if (error) return { ok: false, error };

  const normalizedTarget = normalizeColor(target);
  const limit = effectiveTolerance(tolerance);
  let count = 0;
  for (let y = 0; y < bitmap.height; y++) {
    for (let x = 0; x < bitmap.width; x++) {
      if (matches(getPixelColor(bitmap, x, y), normalizedTarget, limit)) count++;
    }
  }
  return { ok: true, count };
}
