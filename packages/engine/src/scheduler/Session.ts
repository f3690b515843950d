/**
 * Session
 *
 * Everything that lives for one loaded timeline (or one live-only run):
 * the note state, the event queues, the frame projector and the playback
 * cursor's anchor. Built on load, torn down on stop.
 */

import type {
  CursorSnapshot,
  EngineConfig,
  HandPolicy,
  HandSelection,
  MidiNoteNumber,
  Ms,
  Percent,
  QueueOverflow,
  Seconds,
  SourceIdentity,
} from "@lumitone/contracts";
import { isRelease } from "@lumitone/contracts";

import type { Timeline } from "../timeline/Timeline";
import { NoteStateTracker, handForChannel } from "../state/NoteStateTracker";
import { EventQueueRouter } from "../routing/EventQueueRouter";
import { FrameProjector } from "../projection/FrameProjector";
import { timelineSecondsForWallClock } from "../time/TimeConverter";

export interface SessionConfig {
  timeline: Timeline | null;
  source: SourceIdentity | null;
  config: EngineConfig;
  /** Monotonic wall clock in ms */
  now: () => Ms;
  onOverflow: (overflow: QueueOverflow) => void;
}

/**
 * Which onsets the learner is expected to play in melody practice.
 */
export interface MelodyWait {
  hands: HandSelection;
  handPolicy: HandPolicy;
}

let nextSessionId = 1;

export class Session {
  readonly id: number;
  readonly timeline: Timeline | null;
  readonly source: SourceIdentity | null;
  readonly tracker: NoteStateTracker;
  readonly router: EventQueueRouter;
  readonly projector: FrameProjector;

  /** Region bounds as entry indices, [start, end) */
  regionStart = 0;
  regionEnd = 0;

  /** Next timeline entry not yet handed to the router */
  cursorIndex = 0;
  /** Snapshots published for this session */
  sequence = 0;

  private now: () => Ms;
  private tempoScale: Percent;
  private anchorWallMs: Ms;
  private anchorSeconds: Seconds = 0;
  private frozenSeconds: Seconds | null = null;
  private heldAt: Seconds | null = null;
  private expected: Set<MidiNoteNumber> = new Set();

  constructor(config: SessionConfig) {
    this.id = nextSessionId++;
    this.timeline = config.timeline;
    this.source = config.source;
    this.now = config.now;
    this.tempoScale = config.config.tempoScale;
    this.anchorWallMs = config.now();

    this.tracker = new NoteStateTracker({ handPolicy: config.config.handPolicy });
    this.projector = new FrameProjector({
      geometry: config.config.geometry,
      handPolicy: config.config.handPolicy,
    });
    this.router = new EventQueueRouter({
      liveCapacity: config.config.liveQueueCapacity,
      clock: () => this.cursorSeconds(),
      onOverflow: config.onOverflow,
    });

    this.setRegion(config.config.practiceRegion.startPercent, config.config.practiceRegion.endPercent);
    this.rewind();
  }

  get isLive(): boolean {
    return this.timeline === null;
  }

  get paused(): boolean {
    return this.frozenSeconds !== null;
  }

  /** Waiting for the learner in melody practice */
  get holding(): boolean {
    return this.heldAt !== null;
  }

  /** Keys the cursor waits for, ascending */
  awaitingNotes(): MidiNoteNumber[] {
    return Array.from(this.expected).sort((a, b) => a - b);
  }

  /**
   * Timeline seconds at the current wall time.
   */
  cursorSeconds(): Seconds {
    if (this.frozenSeconds !== null) return this.frozenSeconds;
    if (this.heldAt !== null) return this.heldAt;
    const elapsedWall = (this.now() - this.anchorWallMs) / 1000;
    return this.anchorSeconds + timelineSecondsForWallClock(elapsedWall, this.tempoScale);
  }

  cursor(): CursorSnapshot {
    return { index: this.cursorIndex, seconds: this.cursorSeconds(), tempoScale: this.tempoScale };
  }

  getTempoScale(): Percent {
    return this.tempoScale;
  }

  /**
   * Change speed from now on; the cursor keeps its position.
   */
  setTempoScale(percent: Percent): void {
    this.reanchor(this.cursorSeconds());
    this.tempoScale = percent;
  }

  freeze(): void {
    if (this.frozenSeconds === null) {
      this.frozenSeconds = this.cursorSeconds();
    }
  }

  thaw(): void {
    if (this.frozenSeconds !== null) {
      const seconds = this.frozenSeconds;
      this.frozenSeconds = null;
      this.reanchor(seconds);
    }
  }

  /**
   * Recompute region bounds. Throws InvalidConfigurationError for a bad
   * range; a live-only session has no entries and keeps [0, 0).
   */
  setRegion(startPercent: Percent, endPercent: Percent): void {
    if (!this.timeline) return;
    const { start, end } = this.timeline.regionBounds({ startPercent, endPercent });
    this.regionStart = start;
    this.regionEnd = end;
  }

  /**
   * True once every entry of the region has been handed to the router.
   */
  regionFinished(): boolean {
    return this.timeline !== null && this.heldAt === null && this.cursorIndex >= this.regionEnd;
  }

  /**
   * Move the cursor to the region start and release every note.
   */
  rewind(): void {
    this.router.clear();
    this.tracker.allNotesOff();
    this.cursorIndex = this.regionStart;
    this.heldAt = null;
    this.expected.clear();

    let seconds: Seconds = 0;
    if (this.timeline && this.regionStart > 0) {
      const entry = this.timeline.at(this.regionStart);
      if (entry) seconds = entry.absoluteSeconds;
    }
    if (this.frozenSeconds !== null) {
      this.frozenSeconds = seconds;
    }
    this.reanchor(seconds);
  }

  /**
   * Queue every entry the cursor has reached. Returns how many were queued.
   *
   * With `wait`, queuing ends after the first group of onsets the learner
   * has to play and the cursor holds at that group's time until release().
   */
  advance(seconds: Seconds, wait?: MelodyWait): number {
    if (!this.timeline || this.heldAt !== null) return 0;
    const start = this.cursorIndex;
    let groupSeconds: Seconds | null = null;

    while (this.cursorIndex < this.regionEnd) {
      const entry = this.timeline.entries[this.cursorIndex];
      if (entry.absoluteSeconds > seconds) break;
      if (groupSeconds !== null && entry.absoluteSeconds > groupSeconds) break;
      this.router.pushFile(entry);
      this.cursorIndex++;

      const event = entry.event;
      if (!wait || event.kind !== "note_on" || isRelease(event)) continue;
      const hand = handForChannel(wait.handPolicy, event.channel);
      if (wait.hands !== "both" && hand !== wait.hands) continue;
      groupSeconds = entry.absoluteSeconds;
      this.expected.add(event.note);
    }

    if (groupSeconds !== null) {
      this.heldAt = groupSeconds;
    }
    return this.cursorIndex - start;
  }

  /**
   * True when every awaited key is among the given held keys.
   */
  expectationMet(held: ReadonlySet<MidiNoteNumber>): boolean {
    for (const note of this.expected) {
      if (!held.has(note)) return false;
    }
    return true;
  }

  /**
   * Stop waiting; the cursor moves on from the held time.
   */
  release(): void {
    if (this.heldAt === null) return;
    const seconds = this.heldAt;
    this.heldAt = null;
    this.expected.clear();
    if (this.frozenSeconds === null) {
      this.reanchor(seconds);
    }
  }

  teardown(): void {
    this.router.clear();
    this.tracker.reset();
    this.heldAt = null;
    this.expected.clear();
  }

  private reanchor(seconds: Seconds): void {
    this.anchorSeconds = seconds;
    this.anchorWallMs = this.now();
  }
}
