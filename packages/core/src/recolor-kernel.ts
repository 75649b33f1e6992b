/**
 * @module recolor-kernel
 * Per-pixel replacement loop shared by the synchronous engine and the worker pool.
 *
 * The worker pool ships {@link recolorPixelRange} to worker threads as source
 * text, so its body must not reference anything outside itself (no imports,
 * no module-level constants, no helper functions).
 */

/** Typed array views the kernel reads from and writes to. */
export type PixelBytes = Uint8Array | Uint8ClampedArray;

/**
 * Replace every pixel in `[start, end)` whose channels all lie within `limit`
 * of `target`.
 *
 * Pixel `p` is addressed as `row * bytesPerRow + col * 4` with
 * `row = floor(p / width)` and `col = p % width`, so padded rows are honored.
 * Only matching pixels are written; `output` must already hold the source
 * bytes for everything else.
 *
 * @param source      - Input pixel bytes (never written).
 * @param output      - Output pixel bytes, same layout as `source`.
 * @param width       - Bitmap width in pixels.
 * @param bytesPerRow - Row stride in bytes.
 * @param start       - First pixel index (inclusive).
 * @param end         - Last pixel index (exclusive).
 * @param target      - Target channels, normalized (r, g, b, a).
 * @param replacement - Replacement channels as bytes (r, g, b, a).
 * @param limit       - Per-channel match limit (tolerance plus epsilon).
 * @returns Number of pixels replaced in the range.
 */
export function recolorPixelRange(
  source: PixelBytes,
  output: PixelBytes,
  width: number,
  bytesPerRow: number,
  start: number,
  end: number,
  target: ArrayLike<number>,
  replacement: ArrayLike<number>,
  limit: number,
): number {
  const tr = target[0];
  const tg = target[1];
  const tb = target[2];
  const ta = target[3];
  const nr = replacement[0];
  const ng = replacement[1];
  const nb = replacement[2];
  const na = replacement[3];

  let replaced = 0;
  for (let p = start; p < end; p++) {
    const row = Math.floor(p / width);
    const offset = row * bytesPerRow + (p - row * width) * 4;

    if (
      Math.abs(source[offset] / 255 - tr) <= limit &&
      Math.abs(source[offset + 1] / 255 - tg) <= limit &&
      Math.abs(source[offset + 2] / 255 - tb) <= limit &&
      Math.abs(source[offset + 3] / 255 - ta) <= limit
    ) {
      output[offset] = nr;
      output[offset + 1] = ng;
      output[offset + 2] = nb;
      output[offset + 3] = na;
      replaced++;
    }
  }
  return replaced;
}
