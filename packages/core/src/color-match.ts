/**
 * @module color-match
 * Tolerance-based color matching.
 *
 * Two colors match when every channel (r, g, b, a) differs by at most the
 * tolerance. This is a per-channel (Chebyshev) bound, not a Euclidean
 * distance.
 */

import type { Color } from '@pixel-recolor/types';
import { clamp01 } from './color';

/** Tolerance used when a request does not specify one. */
export const DEFAULT_TOLERANCE = 0.5;

/** Absorbs floating-point noise in byte/255 channel values. */
export const MATCH_EPSILON = 1e-9;

/**
 * Resolve the tolerance a pass actually uses.
 * Missing → {@link DEFAULT_TOLERANCE}; out of range → clamped to 0-1; `NaN` → 0.
 */
export function effectiveTolerance(tolerance: number | undefined): number {
  if (tolerance === undefined) return DEFAULT_TOLERANCE;
  return clamp01(tolerance);
}

/**
 * Absolute per-channel differences between two colors.
 *
 * @returns Differences in r, g, b, a order.
 */
export function channelDifferences(a: Color, b: Color): [number, number, number, number] {
  return [Math.abs(a.r - b.r), Math.abs(a.g - b.g), Math.abs(a.b - b.b), Math.abs(a.a - b.a)];
}

/**
 * Check if a candidate color is close enough to a target color.
 *
 * Tolerance 0 matches only equal colors; tolerance 1 matches every color.
 *
 * @param candidate - Color under test.
 * @param target - Color to compare against.
 * @param tolerance - Maximum per-channel difference (0-1).
 * @returns True when all four channels are within the tolerance.
 */
export function matches(candidate: Color, target: Color, tolerance: number): boolean {
  const limit = tolerance + MATCH_EPSILON;
  return channelDifferences(candidate, target).every((diff) => diff <= limit);
}
