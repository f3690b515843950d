/**
 * Snapshot Broadcaster
 *
 * Fans each published snapshot out to every subscriber. Snapshots are
 * frozen before delivery and listeners run in a microtask, so the tick
 * that published never waits on a subscriber. A listener that throws is
 * unsubscribed.
 */

import type {
  Clock,
  Diagnostic,
  DiagnosticListener,
  ISnapshotSink,
  Snapshot,
  SnapshotListener,
} from "@lumitone/contracts";

export interface SnapshotBroadcasterConfig {
  /** Millisecond clock used to stamp diagnostics */
  clock?: Clock;
  /** Told about subscribers dropped for throwing */
  onDiagnostic?: DiagnosticListener;
  /** Called after each new subscription */
  onSubscribe?: () => void;
}

/**
 * Freeze an object graph in place.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class SnapshotBroadcaster implements ISnapshotSink {
  readonly id = "snapshot-broadcaster";

  private listeners: Set<SnapshotListener> = new Set();
  private last: Snapshot | null = null;
  private dropped = 0;
  private clock: Clock;
  private onDiagnostic: DiagnosticListener | null;
  private onSubscribe: (() => void) | null;

  constructor(config: SnapshotBroadcasterConfig = {}) {
    this.clock = config.clock ?? (() => performance.now());
    this.onDiagnostic = config.onDiagnostic ?? null;
    this.onSubscribe = config.onSubscribe ?? null;
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  /**
   * Register a listener. Returns the matching unsubscribe.
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    this.onSubscribe?.();
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: SnapshotListener): boolean {
    return this.listeners.delete(listener);
  }

  /** Most recently published snapshot */
  latest(): Snapshot | null {
    return this.last;
  }

  publish(snapshot: Snapshot): void {
    const frozen = deepFreeze(snapshot);
    this.last = frozen;

    for (const listener of this.listeners) {
      queueMicrotask(() => this.deliver(listener, frozen));
    }
  }

  private deliver(listener: SnapshotListener, snapshot: Snapshot): void {
    // Unsubscribed after this delivery was queued
    if (!this.listeners.has(listener)) return;

    try {
      listener(snapshot);
    } catch (e) {
      this.listeners.delete(listener);
      this.dropped++;
      const message = `Dropped subscriber after error: ${e instanceof Error ? e.message : String(e)}`;
      console.warn(`[SnapshotBroadcaster] ${message}`);

      const diagnostic: Diagnostic = {
        id: `broadcast-drop-${this.dropped}`,
        category: "scheduler",
        severity: "warning",
        message,
        timestamp: this.clock(),
        source: this.id,
        persistence: "transient",
      };
      this.onDiagnostic?.(diagnostic);
    }
  }

  /**
   * Remove every subscriber and forget the last snapshot.
   */
  dispose(): void {
    this.listeners.clear();
    this.last = null;
  }
}
