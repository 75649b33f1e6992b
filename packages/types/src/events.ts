/**
 * @module events
 * Type-safe event bus definitions for observing recolor passes.
 */

import type { EngineErrorKind } from './bitmap';

/** Map of event names to their payload types. */
export interface RecolorEventMap {
  /** Fired after validation succeeds, before any pixel is processed. */
  'recolor:started': { width: number; height: number; workers: number };
  /** Fired once every pixel range has been processed. */
  'recolor:completed': { replacedPixels: number; durationMs: number };
  /** Fired when validation rejects the input bitmap. */
  'recolor:rejected': { kind: EngineErrorKind; message: string };
  /** Fired when every worker of a pool has been terminated. */
  'pool:destroyed': undefined;
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof RecolorEventMap> = RecolorEventMap[K] extends undefined
  ? () => void
  : (payload: RecolorEventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof RecolorEventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof RecolorEventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof RecolorEventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof RecolorEventMap>(
    event: K,
    ...args: RecolorEventMap[K] extends undefined ? [] : [RecolorEventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
