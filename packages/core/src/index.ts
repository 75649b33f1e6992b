/**
 * @pixel-recolor/core
 *
 * Pixel recolor engine: tolerance-based color replacement over RGBA bitmaps,
 * on the calling thread or across a worker pool.
 *
 * @packageDocumentation
 */

export {
  BYTES_PER_PIXEL,
  EngineError,
  bitmapFromRgba,
  createBitmap,
  getPixelColor,
  pixelOffset,
  setPixelColor,
  validateBitmap,
} from './bitmap';
export type { CreateBitmapOptions } from './bitmap';

export {
  channelToByte,
  clamp01,
  colorFromBytes,
  colorToBytes,
  colorToHex,
  normalizeColor,
  parseHexColor,
} from './color';

export {
  DEFAULT_TOLERANCE,
  MATCH_EPSILON,
  channelDifferences,
  effectiveTolerance,
  matches,
} from './color-match';

export { CHUNK_PIXELS, countMatches, partitionPixels, planRecolor, recolor } from './recolor';
export type { CountResult, RecolorOptions, RecolorPlan, RecolorResult } from './recolor';

export { recolorPixelRange } from './recolor-kernel';
export type { PixelBytes } from './recolor-kernel';

export { RecolorPool, WORKER_SOURCE, createNodeWorker } from './recolor-pool';
export type {
  RecolorPoolOptions,
  RecolorTask,
  RecolorTaskReply,
  WorkerFactory,
  WorkerLike,
} from './recolor-pool';

export { RecolorEventBus } from './event-bus';
