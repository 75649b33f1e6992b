// Color helpers for the recolor engine.
// Engine colors carry normalized channels (0-1); pixel bytes are 0-255.
// Replacement channels are converted to bytes with Math.round(channel * 255).

import type { Color } from '@pixel-recolor/types';

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Clamp a value between min and max. */
function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// ---------------------------------------------------------------------------
// Channel Conversion
// ---------------------------------------------------------------------------

/**
 * Clamp a channel value into 0-1. `NaN` becomes 0.
 *
 * @param value - Channel value
 * @returns Value in the range 0-1
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return clamp(value, 0, 1);
}

/**
 * Convert a normalized channel to a byte using rounding.
 *
 * @param channel - Channel value (clamped to 0-1 first)
 * @returns Byte value in 0-255
 */
export function channelToByte(channel: number): number {
  return Math.round(clamp01(channel) * 255);
}

/**
 * Build a normalized color from byte channels.
 *
 * @param r - Red channel (0-255)
 * @param g - Green channel (0-255)
 * @param b - Blue channel (0-255)
 * @param a - Alpha channel (0-255), opaque by default
 * @returns Color with channels in 0-1
 */
export function colorFromBytes(r: number, g: number, b: number, a: number = 255): Color {
  return { r: r / 255, g: g / 255, b: b / 255, a: a / 255 };
}

/**
 * Convert a normalized color to RGBA bytes.
 *
 * @param color - Color with channels in 0-1 (out-of-range values are clamped)
 * @returns Tuple of four bytes in R, G, B, A order
 */
export function colorToBytes(color: Color): [number, number, number, number] {
  return [
    channelToByte(color.r),
    channelToByte(color.g),
    channelToByte(color.b),
    channelToByte(color.a),
  ];
}

/** Return a copy of the color with every channel clamped to 0-1. */
export function normalizeColor(color: Color): Color {
  return {
    r: clamp01(color.r),
    g: clamp01(color.g),
    b: clamp01(color.b),
    a: clamp01(color.a),
  };
}

// ---------------------------------------------------------------------------
// Hex Conversion
// ---------------------------------------------------------------------------

/**
 * Parse a hex color string.
 * Supports "#RGB", "#RGBA", "#RRGGBB" and "#RRGGBBAA" (with or without leading #).
 * Alpha defaults to fully opaque.
 *
 * @param hex - Hex color string
 * @returns Normalized color, or null if the string is invalid
 */
export function parseHexColor(hex: string): Color | null {
  const cleaned = hex.trim().replace(/^#/, '');

  if (!/^[0-9a-fA-F]+$/.test(cleaned)) {
    return null;
  }

  let expanded: string;
  if (cleaned.length === 3 || cleaned.length === 4) {
    expanded = cleaned
      .split('')
      .map((ch) => ch + ch)
      .join('');
  } else if (cleaned.length === 6 || cleaned.length === 8) {
    expanded = cleaned;
  } else {
    return null;
  }

  const r = parseInt(expanded.slice(0, 2), 16);
  const g = parseInt(expanded.slice(2, 4), 16);
  const b = parseInt(expanded.slice(4, 6), 16);
  const a = expanded.length === 8 ? parseInt(expanded.slice(6, 8), 16) : 255;

  return colorFromBytes(r, g, b, a);
}

/**
 * Format a normalized color as "#rrggbbaa".
 *
 * @param color - Color with channels in 0-1
 * @returns Lowercase hex string with alpha
 */
export function colorToHex(color: Color): string {
  const toHex = (n: number): string => n.toString(16).padStart(2, '0');
  return `#${colorToBytes(color).map(toHex).join('')}`;
}
