/**
 * @module event-bus
 * Typed pub/sub emitter for observing recolor passes.
 *
 * Engines emit `recolor:*` events on an optional bus; callers subscribe to
 * time passes, count replacements or log rejected bitmaps.
 *
 * @see {@link @pixel-recolor/types#EventBus} for the interface contract
 * @see {@link @pixel-recolor/types#RecolorEventMap} for the event catalogue
 */

import type { EventBus, EventCallback, RecolorEventMap } from '@pixel-recolor/types';

type EventName = keyof RecolorEventMap;

/** Untyped listener as stored internally. */
type Listener = (...args: unknown[]) => void;

/** A registered listener; `original` is what the caller passed to `once`. */
interface Subscription {
  listener: Listener;
  original: Listener;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners fire in subscription order. Emission iterates over a snapshot, so
 * listeners may subscribe or unsubscribe while an event is being delivered.
 */
export class RecolorEventBus implements EventBus {
  private readonly subscriptions = new Map<EventName, Subscription[]>();

  /** @inheritdoc */
  on<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    const listener = callback as Listener;
    this.add(event, { listener, original: listener });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    const original = callback as Listener;
    const listener: Listener = (...args) => {
      this.off(event, callback);
      original(...args);
    };
    this.add(event, { listener, original });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends EventName>(event: K, callback: EventCallback<K>): void {
    const list = this.subscriptions.get(event);
    if (!list) return;

    const original = callback as Listener;
    const index = list.findIndex((sub) => sub.original === original);
    if (index < 0) return;
    list.splice(index, 1);
    if (list.length === 0) this.subscriptions.delete(event);
  }

  /** @inheritdoc */
  emit<K extends EventName>(
    event: K,
    ...args: RecolorEventMap[K] extends undefined ? [] : [RecolorEventMap[K]]
  ): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    for (const { listener } of [...list]) {
      listener(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  /** Number of listeners currently subscribed to `event`. */
  listenerCount(event: EventName): number {
    return this.subscriptions.get(event)?.length ?? 0;
  }

  private add(event: EventName, subscription: Subscription): void {
    const list = this.subscriptions.get(event);
    if (list) {
      list.push(subscription);
    } else {
      this.subscriptions.set(event, [subscription]);
    }
  }
}
