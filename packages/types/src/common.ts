/**
 * @module common
 * Common primitive types used across all packages.
 */

/**
 * RGBA color with every channel normalized to the 0-1 range
 * (byte value divided by 255).
 */
export interface Color {
  /** Red channel (0-1) */
  r: number;
  /** Green channel (0-1) */
  g: number;
  /** Blue channel (0-1) */
  b: number;
  /** Alpha channel (0-1) */
  a: number;
}
