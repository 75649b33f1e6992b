import { describe, it, expect, vi } from 'vitest';
import type { Bitmap } from '@pixel-recolor/types';
import { bitmapFromRgba, createBitmap, getPixelColor } from './bitmap';
import { colorFromBytes } from './color';
import { RecolorEventBus } from './event-bus';
import { CHUNK_PIXELS, countMatches, partitionPixels, planRecolor, recolor } from './recolor';

const RED = colorFromBytes(255, 0, 0);
const GREEN = colorFromBytes(0, 255, 0);
const BLUE = colorFromBytes(0, 0, 255);

/** Tightly packed bitmap where every pixel has the same RGBA bytes. */
function solid(width: number, height: number, rgba: [number, number, number, number]): Bitmap {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data.set(rgba, i);
  }
  return bitmapFromRgba(data, width, height);
}

function expectOk(result: ReturnType<typeof recolor>): { bitmap: Bitmap; replacedPixels: number } {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result;
}

describe('recolor', () => {
  it('replaces every exact match at tolerance 0', () => {
    const { bitmap, replacedPixels } = expectOk(
      recolor(solid(2, 2, [255, 0, 0, 255]), { target: RED, replacement: BLUE, tolerance: 0 }),
    );
    expect(replacedPixels).toBe(4);
    expect(Array.from(bitmap.data)).toEqual([
      0, 0, 255, 255, 0, 0, 255, 255,
      0, 0, 255, 255, 0, 0, 255, 255,
    ]);
  });

  it('leaves the image unchanged when nothing matches', () => {
    const source = solid(2, 2, [255, 0, 0, 255]);
    const { bitmap, replacedPixels } = expectOk(recolor(source, { target: GREEN, replacement: BLUE, tolerance: 0 }));
    expect(replacedPixels).toBe(0);
    expect(Array.from(bitmap.data)).toEqual(Array.from(source.data));
  });

  it('replaces a pixel whose channel difference is within the tolerance', () => {
    const { bitmap, replacedPixels } = expectOk(
      recolor(solid(1, 1, [200, 0, 0, 255]), { target: RED, replacement: BLUE, tolerance: 0.25 }),
    );
    expect(replacedPixels).toBe(1);
    expect(Array.from(bitmap.data)).toEqual([0, 0, 255, 255]);
  });

  it('writes the replacement alpha', () => {
    const { bitmap } = expectOk(
      recolor(solid(1, 1, [255, 0, 0, 255]), { target: RED, replacement: { r: 0, g: 0, b: 0, a: 0 }, tolerance: 0 }),
    );
    expect(Array.from(bitmap.data)).toEqual([0, 0, 0, 0]);
  });

  it('rounds fractional replacement channels', () => {
    const { bitmap } = expectOk(
      recolor(solid(1, 1, [255, 0, 0, 255]), { target: RED, replacement: { r: 0.5, g: 0.1, b: 0, a: 1 }, tolerance: 0 }),
    );
    expect(Array.from(bitmap.data)).toEqual([128, 26, 0, 255]);
  });

  it('replaces everything at tolerance 1', () => {
    const data = new Uint8ClampedArray([0, 0, 0, 0, 255, 255, 255, 255, 12, 200, 7, 90]);
    const { bitmap, replacedPixels } = expectOk(
      recolor(bitmapFromRgba(data, 3, 1), { target: GREEN, replacement: BLUE, tolerance: 1 }),
    );
    expect(replacedPixels).toBe(3);
    expect(Array.from(bitmap.data)).toEqual([0, 0, 255, 255, 0, 0, 255, 255, 0, 0, 255, 255]);
  });

  it('uses a tolerance of 0.5 when none is given', () => {
    // byte 128 is 127/255 ≈ 0.498 away from red and matches; byte 127 is 128/255 ≈ 0.502 away and does not
    const data = new Uint8ClampedArray([128, 0, 0, 255, 127, 0, 0, 255]);
    const { bitmap, replacedPixels } = expectOk(recolor(bitmapFromRgba(data, 2, 1), { target: RED, replacement: BLUE }));
    expect(replacedPixels).toBe(1);
    expect(Array.from(bitmap.data)).toEqual([0, 0, 255, 255, 127, 0, 0, 255]);
  });

  it('clamps out-of-range tolerances', () => {
    const source = solid(1, 1, [0, 0, 0, 255]);
    expect(expectOk(recolor(source, { target: RED, replacement: BLUE, tolerance: 5 })).replacedPixels).toBe(1);
    expect(expectOk(recolor(source, { target: RED, replacement: BLUE, tolerance: -1 })).replacedPixels).toBe(0);
  });

  it('is a no-op when target equals replacement, applied twice', () => {
    const data = new Uint8ClampedArray([255, 0, 0, 255, 250, 3, 0, 255, 9, 9, 9, 9]);
    const source = bitmapFromRgba(data, 3, 1);
    const request = { target: RED, replacement: RED, tolerance: 0 };
    const once = expectOk(recolor(source, request)).bitmap;
    const twice = expectOk(recolor(once, request)).bitmap;
    expect(Array.from(twice.data)).toEqual(Array.from(source.data));
  });

  it('preserves dimensions and layout', () => {
    const source = createBitmap(3, 2, { bytesPerRow: 16 });
    const { bitmap } = expectOk(recolor(source, { target: RED, replacement: BLUE, tolerance: 0 }));
    expect(bitmap.width).toBe(3);
    expect(bitmap.height).toBe(2);
    expect(bitmap.bytesPerRow).toBe(16);
    expect(bitmap.bytesPerPixel).toBe(4);
    expect(bitmap.data.length).toBe(32);
  });

  it('never mutates the input buffer', () => {
    const source = solid(2, 1, [255, 0, 0, 255]);
    const before = Array.from(source.data);
    const { bitmap } = expectOk(recolor(source, { target: RED, replacement: BLUE, tolerance: 0 }));
    expect(Array.from(source.data)).toEqual(before);
    expect(bitmap.data).not.toBe(source.data);
  });

  it('addresses pixels through the row stride', () => {
    // 2x2 with 4 bytes of padding per row; only pixel (0, 1) is red
    const source = createBitmap(2, 2, { bytesPerRow: 12 });
    source.data.set([255, 0, 0, 255], 12);
    source.data.set([7, 7, 7, 7], 8);
    source.data.set([7, 7, 7, 7], 20);

    const { bitmap, replacedPixels } = expectOk(recolor(source, { target: RED, replacement: BLUE, tolerance: 0 }));
    expect(replacedPixels).toBe(1);
    expect(Array.from(bitmap.data)).toEqual([
      0, 0, 0, 0, 0, 0, 0, 0, 7, 7, 7, 7,
      0, 0, 255, 255, 0, 0, 0, 0, 7, 7, 7, 7,
    ]);
  });

  it('keeps row padding even when every pixel is replaced', () => {
    const source = createBitmap(1, 2, { bytesPerRow: 8 });
    source.data.set([9, 9, 9, 9], 4);
    source.data.set([9, 9, 9, 9], 12);
    const { bitmap } = expectOk(recolor(source, { target: RED, replacement: GREEN, tolerance: 1 }));
    expect(Array.from(bitmap.data)).toEqual([0, 255, 0, 255, 9, 9, 9, 9, 0, 255, 0, 255, 9, 9, 9, 9]);
  });

  it('replaces exactly the pixels whose channels are all within the tolerance', () => {
    const source = createBitmap(16, 16);
    for (let y = 0; y < 16; y++) {
      for (let x = 0; x < 16; x++) {
        source.data.set([x * 16, y * 16, 128, 255], (y * 16 + x) * 4);
      }
    }
    const target = colorFromBytes(128, 128, 128, 255);
    const replacement = { r: 0, g: 0, b: 0, a: 0 };
    const tolerance = 0.2;

    const { bitmap, replacedPixels } = expectOk(recolor(source, { target, replacement, tolerance }));

    // x * 16 within 51 of 128 → x in 5..11, same for y
    expect(replacedPixels).toBe(49);
    for (let y = 0; y < 16; y++) {
      for (let x = 0; x < 16; x++) {
        const before = getPixelColor(source, x, y);
        const within =
          Math.abs(before.r - target.r) <= tolerance &&
          Math.abs(before.g - target.g) <= tolerance &&
          Math.abs(before.b - target.b) <= tolerance &&
          Math.abs(before.a - target.a) <= tolerance;
        expect(getPixelColor(bitmap, x, y)).toEqual(within ? replacement : before);
      }
    }
  });

  it('processes bitmaps spanning several chunks', () => {
    const width = 300;
    const height = 300;
    expect(width * height).toBeGreaterThan(CHUNK_PIXELS);

    const { bitmap, replacedPixels } = expectOk(
      recolor(solid(width, height, [255, 0, 0, 255]), { target: RED, replacement: BLUE, tolerance: 0 }),
    );
    expect(replacedPixels).toBe(width * height);
    expect(Array.from(bitmap.data.subarray(bitmap.data.length - 4))).toEqual([0, 0, 255, 255]);
  });

  it('rejects a buffer shortened by one byte without producing output', () => {
    const source: Bitmap = { ...solid(2, 2, [255, 0, 0, 255]), data: new Uint8ClampedArray(15) };
    const result = recolor(source, { target: RED, replacement: BLUE, tolerance: 0 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidBuffer');
    }
    expect('bitmap' in result).toBe(false);
  });

  it('rejects unsupported layouts', () => {
    const source: Bitmap = { width: 1, height: 1, bytesPerRow: 3, bytesPerPixel: 3, data: new Uint8Array(3) };
    const result = recolor(source, { target: RED, replacement: BLUE });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('UnsupportedLayout');
    }
  });

  it('emits started and completed events', () => {
    const events = new RecolorEventBus();
    const started = vi.fn();
    const completed = vi.fn();
    events.on('recolor:started', started);
    events.on('recolor:completed', completed);

    recolor(solid(2, 3, [255, 0, 0, 255]), { target: RED, replacement: BLUE, tolerance: 0 }, { events });

    expect(started).toHaveBeenCalledWith({ width: 2, height: 3, workers: 1 });
    expect(completed).toHaveBeenCalledOnce();
    expect(completed.mock.calls[0][0].replacedPixels).toBe(6);
  });

  it('emits a rejected event for invalid input', () => {
    const events = new RecolorEventBus();
    const rejected = vi.fn();
    const started = vi.fn();
    events.on('recolor:rejected', rejected);
    events.on('recolor:started', started);

    const source: Bitmap = { ...solid(1, 1, [0, 0, 0, 0]), data: new Uint8ClampedArray(3) };
    recolor(source, { target: RED, replacement: BLUE }, { events });

    expect(rejected).toHaveBeenCalledWith({
      kind: 'InvalidBuffer',
      message: 'Buffer length 3 does not match bytesPerRow * height (4x1 = 4)',
    });
    expect(started).not.toHaveBeenCalled();
  });
});

describe('planRecolor', () => {
  it('resolves colors, bytes and the match limit', () => {
    const plan = planRecolor({ target: { r: 2, g: 0.5, b: 0, a: 1 }, replacement: { r: 0.5, g: 0, b: 1, a: 1 } });
    expect(plan.target).toEqual([1, 0.5, 0, 1]);
    expect(plan.replacement).toEqual([128, 0, 255, 255]);
    expect(plan.limit).toBeCloseTo(0.5, 8);
  });
});

describe('partitionPixels', () => {
  it('covers the range with disjoint, balanced ranges', () => {
    expect(partitionPixels(10, 3)).toEqual([
      [0, 4],
      [4, 7],
      [7, 10],
    ]);
  });

  it('never creates more ranges than pixels', () => {
    expect(partitionPixels(2, 8)).toEqual([
      [0, 1],
      [1, 2],
    ]);
  });

  it('returns a single range for one part', () => {
    expect(partitionPixels(5, 1)).toEqual([[0, 5]]);
  });
});

describe('countMatches', () => {
  it('counts matching pixels without allocating output', () => {
    const data = new Uint8ClampedArray([255, 0, 0, 255, 200, 0, 0, 255, 0, 0, 255, 255]);
    const result = countMatches(bitmapFromRgba(data, 3, 1), RED, 0.25);
    expect(result).toEqual({ ok: true, count: 2 });
  });

  it('reports invalid bitmaps', () => {
    const result = countMatches({ ...solid(1, 1, [0, 0, 0, 0]), bytesPerPixel: 2 }, RED);
    expect(result.ok).toBe(false);
  });
});
