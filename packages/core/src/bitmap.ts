/**
 * @module bitmap
 * Bitmap construction, validation and stride-aware pixel access.
 *
 * A bitmap's `data` is laid out row by row; each row occupies `bytesPerRow`
 * bytes, of which the first `width * 4` hold RGBA pixels and the rest is
 * padding.
 */

import type { Bitmap, Color, EngineErrorKind } from '@pixel-recolor/types';
import { colorFromBytes, colorToBytes } from './color';

/** Bytes per pixel for 8-bit RGBA. */
export const BYTES_PER_PIXEL = 4;

/** Error describing why the engine refused a bitmap. */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string) {
    super(message);
    this.name = 'EngineError';
    this.kind = kind;
  }
}

/** Options for {@link createBitmap}. */
export interface CreateBitmapOptions {
  /** Row stride in bytes. Defaults to `width * 4` (tightly packed). */
  bytesPerRow?: number;
  /** Color every pixel starts with. Defaults to transparent black. */
  fill?: Color;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Check a bitmap against the engine's preconditions.
 *
 * @param bitmap - Bitmap to check.
 * @returns `null` when the bitmap is usable, otherwise the violation.
 */
export function validateBitmap(bitmap: Bitmap): EngineError | null {
  const { width, height, bytesPerRow, bytesPerPixel, data } = bitmap;

  if (bytesPerPixel !== BYTES_PER_PIXEL) {
    return new EngineError(
      'UnsupportedLayout',
      `Unsupported bytesPerPixel ${bytesPerPixel} (only ${BYTES_PER_PIXEL}-byte RGBA is supported)`,
    );
  }
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    return new EngineError('InvalidBuffer', `Invalid dimensions ${width}x${height}`);
  }
  if (!Number.isInteger(bytesPerRow) || bytesPerRow < width * BYTES_PER_PIXEL) {
    return new EngineError(
      'InvalidBuffer',
      `bytesPerRow ${bytesPerRow} is smaller than width * ${BYTES_PER_PIXEL} (${width * BYTES_PER_PIXEL})`,
    );
  }

  const expectedLength = bytesPerRow * height;
  if (data.length !== expectedLength) {
    return new EngineError(
      'InvalidBuffer',
      `Buffer length ${data.length} does not match bytesPerRow * height (${bytesPerRow}x${height} = ${expectedLength})`,
    );
  }
  return null;
}

/**
 * Create a new bitmap.
 *
 * @param width - Width in pixels.
 * @param height - Height in pixels.
 * @param options - Stride and fill color.
 * @returns A bitmap backed by a fresh `Uint8ClampedArray`.
 */
export function createBitmap(width: number, height: number, options: CreateBitmapOptions = {}): Bitmap {
  const bytesPerRow = options.bytesPerRow ?? width * BYTES_PER_PIXEL;
  const bitmap: Bitmap = {
    width,
    height,
    bytesPerRow,
    bytesPerPixel: BYTES_PER_PIXEL,
    data: new Uint8ClampedArray(bytesPerRow * height),
  };

  if (options.fill) {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        setPixelColor(bitmap, x, y, options.fill);
      }
    }
  }
  return bitmap;
}

/**
 * Wrap tightly packed RGBA bytes (e.g. `ImageData.data`) as a bitmap.
 * The data is not copied.
 */
export function bitmapFromRgba(data: Uint8Array | Uint8ClampedArray, width: number, height: number): Bitmap {
  return { width, height, bytesPerRow: width * BYTES_PER_PIXEL, bytesPerPixel: BYTES_PER_PIXEL, data };
}

/** Byte offset of pixel (x, y), honoring row padding. */
export function pixelOffset(bitmap: Bitmap, x: number, y: number): number {
  return y * bitmap.bytesPerRow + x * bitmap.bytesPerPixel;
}

/**
 * Read the color of a single pixel.
 *
 * @param bitmap - Bitmap to sample from.
 * @param x - X coordinate (0-based).
 * @param y - Y coordinate (0-based).
 * @returns Normalized color at the pixel.
 * @throws {RangeError} If (x, y) is outside the bitmap.
 */
export function getPixelColor(bitmap: Bitmap, x: number, y: number): Color {
  assertInBounds(bitmap, x, y);
  const offset = pixelOffset(bitmap, x, y);
  const { data } = bitmap;
  return colorFromBytes(data[offset], data[offset + 1], data[offset + 2], data[offset + 3]);
}

/**
 * Write the color of a single pixel.
 *
 * @throws {RangeError} If (x, y) is outside the bitmap.
 */
export function setPixelColor(bitmap: Bitmap, x: number, y: number, color: Color): void {
  assertInBounds(bitmap, x, y);
  bitmap.data.set(colorToBytes(color), pixelOffset(bitmap, x, y));
}

function assertInBounds(bitmap: Bitmap, x: number, y: number): void {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside ${bitmap.width}x${bitmap.height} bitmap`);
  }
}
