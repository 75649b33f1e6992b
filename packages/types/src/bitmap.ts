/**
 * @module bitmap
 * Raw pixel buffer and color replacement parameter types.
 */

import type { Color } from './common';

/**
 * A rectangular grid of 8-bit RGBA pixels stored as a flat byte buffer.
 *
 * Rows may be padded: `bytesPerRow` can exceed `width * bytesPerPixel`.
 * `data.length` must equal `bytesPerRow * height` exactly.
 */
export interface Bitmap {
  /** Width in pixels (positive integer). */
  readonly width: number;
  /** Height in pixels (positive integer). */
  readonly height: number;
  /** Row stride in bytes, including any trailing padding. */
  readonly bytesPerRow: number;
  /** Bytes per pixel. Only 4 (RGBA, in that byte order) is supported. */
  readonly bytesPerPixel: number;
  /** Pixel bytes, row-major. */
  readonly data: Uint8Array | Uint8ClampedArray;
}

/** Parameters for a single color replacement pass. */
export interface ReplacementRequest {
  /** Color to look for. */
  readonly target: Color;
  /** Color written over every matching pixel, alpha included. */
  readonly replacement: Color;
  /**
   * Maximum per-channel absolute difference (0-1) for a pixel to match.
   * Defaults to 0.5. Values outside 0-1 are clamped.
   */
  readonly tolerance?: number;
}

/**
 * Precondition violations reported by the engine.
 *
 * - `InvalidBuffer`: dimensions, stride or buffer length are inconsistent.
 * - `UnsupportedLayout`: bytes-per-pixel is not 4.
 */
export type EngineErrorKind = 'InvalidBuffer' | 'UnsupportedLayout';
