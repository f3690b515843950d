/**
 * Event Queue Router
 *
 * Two FIFO queues feeding the note state: live input (pushed from device
 * callbacks at any time) and file playback (pushed by the scheduler as the
 * cursor passes entries). drain() runs once per tick and interleaves both
 * queues by timestamp while keeping each queue's own order.
 *
 * Pushing never blocks. When the live queue is full the oldest live event
 * is dropped and the loss is reported on the next drain.
 */

import type {
  ChannelMessage,
  DrainResult,
  ILiveInputSink,
  LiveInputEvent,
  QueueOverflow,
  RoutedEvent,
  Seconds,
  TimelineEntry,
} from "@lumitone/contracts";
import { InvalidConfigurationError } from "@lumitone/contracts";

/**
 * Configuration for the EventQueueRouter.
 */
export interface EventQueueRouterConfig {
  /**
   * Maximum number of undrained live events.
   * @default 256
   */
  liveCapacity?: number;

  /**
   * Timeline-seconds clock used to stamp live arrivals.
   */
  clock: () => Seconds;

  /** Called once per drain that follows dropped live events */
  onOverflow?: (overflow: QueueOverflow) => void;
}

export const DEFAULT_LIVE_CAPACITY = 256;

/**
 * Anything that consumes routed events in order (the note state tracker).
 */
export interface RoutedEventSink {
  apply(event: RoutedEvent): void;
}

/**
 * Array-backed FIFO with an advancing head, compacted lazily.
 */
class Fifo<T> {
  private items: T[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  dropOldest(count: number): void {
    this.head += Math.min(count, this.size);
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }

  takeAll(): T[] {
    const taken = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return taken;
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }
}

function validateCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new InvalidConfigurationError(
      "liveQueueCapacity",
      `Live queue capacity must be a positive integer, got ${capacity}`
    );
  }
}

function liveToMessage(event: LiveInputEvent): ChannelMessage {
  switch (event.kind) {
    case "note_on":
      return { kind: "note_on", channel: event.channel, note: event.note, velocity: event.velocity };
    case "note_off":
      return { kind: "note_on", channel: event.channel, note: event.note, velocity: 0 };
    case "control_change":
      return {
        kind: "control_change",
        channel: event.channel,
        controller: event.controller,
        value: event.value,
      };
  }
}

export class EventQueueRouter implements ILiveInputSink {
  private live = new Fifo<RoutedEvent>();
  private file = new Fifo<RoutedEvent>();
  private liveCapacity: number;
  private droppedSinceDrain = 0;

  private readonly clock: () => Seconds;
  private onOverflow: ((overflow: QueueOverflow) => void) | null;

  constructor(config: EventQueueRouterConfig) {
    const capacity = config.liveCapacity ?? DEFAULT_LIVE_CAPACITY;
    validateCapacity(capacity);
    this.liveCapacity = capacity;
    this.clock = config.clock;
    this.onOverflow = config.onOverflow ?? null;
  }

  get capacity(): number {
    return this.liveCapacity;
  }

  get pendingLive(): number {
    return this.live.size;
  }

  get pendingFile(): number {
    return this.file.size;
  }

  /**
   * Queue a live input event, stamped with the current timeline time.
   * Note-offs become zero-velocity note-ons here.
   */
  pushLive(event: LiveInputEvent): void {
    if (this.live.size >= this.liveCapacity) {
      this.live.dropOldest(1);
      this.droppedSinceDrain++;
    }
    this.live.push({ origin: "live", t: this.clock(), message: liveToMessage(event) });
  }

  /**
   * Queue a timeline entry the cursor has just passed. Meta events carry
   * no note state and are skipped.
   */
  pushFile(entry: TimelineEntry): void {
    const event = entry.event;
    switch (event.kind) {
      case "note_on":
        this.file.push({
          origin: "file",
          t: entry.absoluteSeconds,
          message: { kind: "note_on", channel: event.channel, note: event.note, velocity: event.velocity },
        });
        break;
      case "control_change":
        this.file.push({
          origin: "file",
          t: entry.absoluteSeconds,
          message: {
            kind: "control_change",
            channel: event.channel,
            controller: event.controller,
            value: event.value,
          },
        });
        break;
      case "meta":
        break;
    }
  }

  /**
   * Take everything queued, merge by timestamp (file first on ties) and
   * hand each event to the sink in that order.
   */
  drain(sink?: RoutedEventSink): DrainResult {
    const fromFile = this.file.takeAll();
    const fromLive = this.live.takeAll();

    const events: RoutedEvent[] = [];
    let f = 0;
    let l = 0;
    while (f < fromFile.length || l < fromLive.length) {
      if (l >= fromLive.length || (f < fromFile.length && fromFile[f].t <= fromLive[l].t)) {
        events.push(fromFile[f++]);
      } else {
        events.push(fromLive[l++]);
      }
    }

    let overflow: QueueOverflow | null = null;
    if (this.droppedSinceDrain > 0) {
      overflow = {
        kind: "queue_overflow",
        dropped: this.droppedSinceDrain,
        capacity: this.liveCapacity,
      };
      this.droppedSinceDrain = 0;
      this.onOverflow?.(overflow);
    }

    if (sink) {
      for (const event of events) {
        sink.apply(event);
      }
    }

    return { events, overflow };
  }

  /**
   * Change the live capacity. Shrinking below the current backlog drops the
   * oldest events, which counts as overflow.
   */
  setLiveCapacity(capacity: number): void {
    validateCapacity(capacity);
    this.liveCapacity = capacity;
    const excess = this.live.size - capacity;
    if (excess > 0) {
      this.live.dropOldest(excess);
      this.droppedSinceDrain += excess;
    }
  }

  clear(): void {
    this.live.clear();
    this.file.clear();
    this.droppedSinceDrain = 0;
  }
}
