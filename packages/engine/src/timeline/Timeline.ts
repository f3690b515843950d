/**
 * Timeline
 *
 * Merges per-track MIDI events into one ordered, time-resolved sequence.
 * The playback cursor addresses entries by index.
 */

import type {
  MicrosPerBeat,
  NormalizedEvent,
  PracticeRegion,
  RawEvent,
  Seconds,
  TempoMapEntry,
  TempoMap,
  TimelineData,
  TimelineEntry,
  Ticks,
} from "@lumitone/contracts";
import {
  InvalidConfigurationError,
  MalformedTimelineError,
} from "@lumitone/contracts";

import { ticksToSeconds } from "../time/TimeConverter";

export interface BuildTimelineOptions {
  /**
   * Re-channel note events by track index so each track maps to a hand.
   * Track k becomes channel k + 1 for two-track files, k otherwise.
   * @default false
   */
  channelFromTrack?: boolean;
}

/**
 * Sort rank for events sharing a tick: tempo changes first, then
 * releases, then everything else. Releases before onsets keeps a key from
 * appearing pressed twice when one track ends a note another track starts.
 */
const TieRank = {
  Tempo: 0,
  Release: 1,
  Other: 2,
} as const;

type TieRank = (typeof TieRank)[keyof typeof TieRank];

interface PendingEntry {
  tick: Ticks;
  rank: TieRank;
  track: number;
  sequence: number;
  event: NormalizedEvent;
}

function normalize(event: RawEvent, track: number, channelOverride: number | null): NormalizedEvent {
  switch (event.kind) {
    case "note_off":
      return {
        kind: "note_on",
        channel: channelOverride ?? event.channel,
        note: event.note,
        velocity: 0,
        deltaTicks: event.deltaTicks,
        track,
      };
    case "note_on":
      return { ...event, channel: channelOverride ?? event.channel, track };
    case "control_change":
    case "meta":
      return { ...event, track };
  }
}

function rankOf(event: NormalizedEvent): TieRank {
  if (event.kind === "meta" && event.meta.type === "tempo") return TieRank.Tempo;
  if (event.kind === "note_on" && event.velocity === 0) return TieRank.Release;
  return TieRank.Other;
}

function comparePending(a: PendingEntry, b: PendingEntry): number {
  return (
    a.tick - b.tick ||
    a.rank - b.rank ||
    a.track - b.track ||
    a.sequence - b.sequence
  );
}

/**
 * Build a timeline from per-track event lists.
 *
 * An empty track list yields an empty timeline. Negative or non-integer
 * deltas and a non-positive resolution are rejected.
 */
export function buildTimeline(
  tracks: readonly (readonly RawEvent[])[],
  resolution: number,
  initialTempo: MicrosPerBeat,
  options: BuildTimelineOptions = {}
): Timeline {
  if (!Number.isFinite(resolution) || resolution <= 0) {
    throw new MalformedTimelineError(`Resolution must be positive, got ${resolution}`);
  }
  if (!Number.isFinite(initialTempo) || initialTempo <= 0) {
    throw new MalformedTimelineError(`Initial tempo must be positive, got ${initialTempo}`);
  }

  const channelOffset = tracks.length === 2 ? 1 : 0;
  const pending: PendingEntry[] = [];

  tracks.forEach((events, track) => {
    let tick = 0;
    events.forEach((event, sequence) => {
      if (!Number.isInteger(event.deltaTicks) || event.deltaTicks < 0) {
        throw new MalformedTimelineError(
          `Track ${track} event ${sequence} has invalid delta ${event.deltaTicks}`
        );
      }
      tick += event.deltaTicks;

      const override = options.channelFromTrack ? track + channelOffset : null;
      const normalized = normalize(event, track, override);
      pending.push({ tick, rank: rankOf(normalized), track, sequence, event: normalized });
    });
  });

  pending.sort(comparePending);

  // Resolve seconds in merged order; tempo changes apply from their tick on
  const tempoMap: TempoMapEntry[] = [{ tick: 0, microsecondsPerBeat: initialTempo }];
  const entries: TimelineEntry[] = [];
  let lastTick = 0;
  let seconds = 0;

  for (const item of pending) {
    const current = tempoMap[tempoMap.length - 1];
    seconds += ticksToSeconds(item.tick - lastTick, resolution, current.microsecondsPerBeat);
    lastTick = item.tick;

    entries.push({
      index: entries.length,
      absoluteTick: item.tick,
      absoluteSeconds: seconds,
      event: item.event,
    });

    if (item.event.kind === "meta" && item.event.meta.type === "tempo") {
      const microsecondsPerBeat = item.event.meta.microsecondsPerBeat;
      if (current.tick === item.tick) {
        tempoMap[tempoMap.length - 1] = { tick: item.tick, microsecondsPerBeat };
      } else {
        tempoMap.push({ tick: item.tick, microsecondsPerBeat });
      }
    }
  }

  return new Timeline({ resolution, tempoMap, entries });
}

/**
 * Ordered, indexed view over merged timeline entries.
 */
export class Timeline {
  readonly resolution: number;
  readonly tempoMap: TempoMap;
  readonly entries: readonly TimelineEntry[];

  private readonly noteOnCount: number;

  constructor(data: TimelineData) {
    this.resolution = data.resolution;
    this.tempoMap = data.tempoMap;
    this.entries = data.entries;
    this.noteOnCount = data.entries.filter(
      (e) => e.event.kind === "note_on" && e.event.velocity > 0
    ).length;
  }

  get length(): number {
    return this.entries.length;
  }

  /** Number of sounding note onsets */
  get noteCount(): number {
    return this.noteOnCount;
  }

  get durationSeconds(): Seconds {
    return this.entries.length > 0
      ? this.entries[this.entries.length - 1].absoluteSeconds
      : 0;
  }

  at(index: number): TimelineEntry | undefined {
    return this.entries[index];
  }

  /**
   * First index whose time is at or after `seconds`; `length` if none.
   */
  indexAtSeconds(seconds: Seconds): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.entries[mid].absoluteSeconds < seconds) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /**
   * Entry index range [start, end) covered by a practice region.
   */
  regionBounds(region: PracticeRegion): { start: number; end: number } {
    const { startPercent, endPercent } = region;
    if (
      !Number.isFinite(startPercent) ||
      !Number.isFinite(endPercent) ||
      startPercent < 0 ||
      endPercent > 100 ||
      startPercent >= endPercent
    ) {
      throw new InvalidConfigurationError(
        "practiceRegion",
        `Practice region must satisfy 0 <= start < end <= 100, got ${startPercent}..${endPercent}`
      );
    }
    return {
      start: Math.floor((startPercent * this.entries.length) / 100),
      end: Math.floor((endPercent * this.entries.length) / 100),
    };
  }

  toData(): TimelineData {
    return {
      resolution: this.resolution,
      tempoMap: this.tempoMap,
      entries: [...this.entries],
    };
  }
}
