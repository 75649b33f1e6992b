/**
 * @module tools
 * MCP tool definitions and handlers for the recolor engine.
 *
 * Bitmaps travel as base64-encoded raw RGBA bytes plus their layout; no image
 * file format is involved. Colors are "#RRGGBB[AA]" strings or `{ r, g, b, a }`
 * objects with 0-1 channels. Arguments are validated with zod before they
 * reach the engine.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Bitmap, Color } from '@pixel-recolor/types';
import {
  BYTES_PER_PIXEL,
  channelDifferences,
  colorToHex,
  countMatches,
  effectiveTolerance,
  matches,
  parseHexColor,
} from '@pixel-recolor/core';
import { z } from 'zod';
import { getConfig, getPool } from './engine.js';

// ── Argument schemas ───────────────────────────────────────────────

const hexColorSchema = z.string().transform((value, ctx): Color => {
  const color = parseHexColor(value);
  if (!color) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid hex color: "${value}"` });
    return z.NEVER;
  }
  return color;
});

const channelSchema = z.number().min(0).max(1);

const colorSchema = z.union([
  hexColorSchema,
  z.object({ r: channelSchema, g: channelSchema, b: channelSchema, a: channelSchema.default(1) }),
]);

const bitmapSchema = z.object({
  width: z.number().int(),
  height: z.number().int(),
  bytesPerRow: z.number().int().optional(),
  data: z
    .string()
    .transform((value) => value.replace(/\s+/g, ''))
    .pipe(z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'data must be base64-encoded RGBA bytes')),
});

const toleranceSchema = z.number().optional();

const replaceColorArgs = bitmapSchema.extend({
  target: colorSchema,
  replacement: colorSchema,
  tolerance: toleranceSchema,
});

const countArgs = bitmapSchema.extend({
  target: colorSchema,
  tolerance: toleranceSchema,
});

const matchArgs = z.object({
  candidate: colorSchema,
  target: colorSchema,
  tolerance: toleranceSchema,
});

// ── Tool definitions ───────────────────────────────────────────────

const colorProperty = {
  description: 'Hex string "#RRGGBB" / "#RRGGBBAA", or an object { r, g, b, a } with channels 0-1',
  oneOf: [
    { type: 'string' },
    {
      type: 'object',
      properties: {
        r: { type: 'number' },
        g: { type: 'number' },
        b: { type: 'number' },
        a: { type: 'number' },
      },
      required: ['r', 'g', 'b'],
    },
  ],
};

const bitmapProperties = {
  width: { type: 'number', description: 'Width in pixels' },
  height: { type: 'number', description: 'Height in pixels' },
  bytesPerRow: { type: 'number', description: 'Row stride in bytes (default: width * 4)' },
  data: {
    type: 'string',
    description: 'Base64-encoded RGBA bytes, bytesPerRow * height long (line breaks are ignored)',
  },
};

const toleranceProperty = {
  type: 'number',
  description: 'Maximum per-channel difference, 0-1 (default: 0.5). Values outside 0-1 are clamped.',
};

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  {
    name: 'replace_color',
    description:
      'Replace every pixel whose R, G, B and A channels are each within the tolerance of the ' +
      'target color with the replacement color. Returns the new bitmap as base64 RGBA bytes.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...bitmapProperties,
        target: colorProperty,
        replacement: colorProperty,
        tolerance: toleranceProperty,
      },
      required: ['width', 'height', 'data', 'target', 'replacement'],
    },
  },
  {
    name: 'count_matching_pixels',
    description: 'Count the pixels that replace_color would overwrite, without producing a bitmap.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...bitmapProperties,
        target: colorProperty,
        tolerance: toleranceProperty,
      },
      required: ['width', 'height', 'data', 'target'],
    },
  },
  {
    name: 'match_colors',
    description: 'Check whether two colors match within a tolerance and report per-channel differences.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        candidate: colorProperty,
        target: colorProperty,
        tolerance: toleranceProperty,
      },
      required: ['candidate', 'target'],
    },
  },
];

// ── Handler ────────────────────────────────────────────────────────

type ContentItem = { type: 'text'; text: string };
type ToolResult = { content: ContentItem[]; isError?: boolean };

function decodeBitmap(args: z.infer<typeof bitmapSchema>): Bitmap {
  const bytes = Buffer.from(args.data, 'base64');
  return {
    width: args.width,
    height: args.height,
    bytesPerRow: args.bytesPerRow ?? args.width * BYTES_PER_PIXEL,
    bytesPerPixel: BYTES_PER_PIXEL,
    data: new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength),
  };
}

function encodeBytes(data: Uint8Array | Uint8ClampedArray): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

/**
 * Handle a tool call: validate the arguments, run the engine and format the
 * response. Never throws; failures become error results.
 */
export async function handleToolCall(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
  try {
    switch (toolName) {
      case 'replace_color': {
        const parsed = replaceColorArgs.safeParse(args);
        if (!parsed.success) return invalidArguments(parsed.error);

        const { target, replacement } = parsed.data;
        const tolerance = parsed.data.tolerance ?? getConfig().defaultTolerance;
        const result = await getPool().recolor(decodeBitmap(parsed.data), { target, replacement, tolerance });
        if (!result.ok) {
          return errorResult(`${result.error.kind}: ${result.error.message}`);
        }

        const { bitmap, replacedPixels } = result;
        return jsonResult({
          width: bitmap.width,
          height: bitmap.height,
          bytesPerRow: bitmap.bytesPerRow,
          bytesPerPixel: bitmap.bytesPerPixel,
          replacedPixels,
          tolerance: effectiveTolerance(tolerance),
          data: encodeBytes(bitmap.data),
        });
      }

      case 'count_matching_pixels': {
        const parsed = countArgs.safeParse(args);
        if (!parsed.success) return invalidArguments(parsed.error);

        const tolerance = parsed.data.tolerance ?? getConfig().defaultTolerance;
        const result = countMatches(decodeBitmap(parsed.data), parsed.data.target, tolerance);
        if (!result.ok) {
          return errorResult(`${result.error.kind}: ${result.error.message}`);
        }
        return jsonResult({ count: result.count, tolerance: effectiveTolerance(tolerance) });
      }

      case 'match_colors': {
        const parsed = matchArgs.safeParse(args);
        if (!parsed.success) return invalidArguments(parsed.error);

        const { candidate, target } = parsed.data;
        const tolerance = effectiveTolerance(parsed.data.tolerance ?? getConfig().defaultTolerance);
        const [r, g, b, a] = channelDifferences(candidate, target);
        return jsonResult({
          matches: matches(candidate, target, tolerance),
          tolerance,
          candidate: colorToHex(candidate),
          target: colorToHex(target),
          differences: { r, g, b, a },
        });
      }

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    return errorResult(e instanceof Error ? e.message : String(e));
  }
}

// ── Response formatters ────────────────────────────────────────────

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function invalidArguments(error: z.ZodError): ToolResult {
  const details = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  return errorResult(`Invalid arguments: ${details}`);
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}
