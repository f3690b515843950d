/**
 * Timeline Types
 *
 * A timeline is the merged, ordered, time-resolved view of every track of a
 * MIDI file. Entries are addressed by index; the playback cursor moves along
 * that index.
 */

import type { Ticks, Seconds, MicrosPerBeat, Percent, Ms } from "../core/time";
import type { RawEvent, NormalizedEvent } from "../raw/raw";

/**
 * One tempo in effect from `tick` until the next entry.
 */
export interface TempoMapEntry {
  tick: Ticks;
  microsecondsPerBeat: MicrosPerBeat;
}

/**
 * Tempo changes ordered by tick. The first entry is always at tick 0.
 */
export type TempoMap = readonly TempoMapEntry[];

export interface TimelineEntry {
  /** Position in the merged sequence */
  index: number;
  absoluteTick: Ticks;
  absoluteSeconds: Seconds;
  event: NormalizedEvent;
}

/**
 * Plain data form of a timeline (what the cache stores).
 */
export interface TimelineData {
  /** Ticks per quarter note */
  resolution: number;
  tempoMap: TempoMap;
  entries: TimelineEntry[];
}

/**
 * Read-only view of the playback cursor.
 */
export interface CursorSnapshot {
  /** Index of the next timeline entry not yet released */
  index: number;
  /** Timeline time (unscaled) */
  seconds: Seconds;
  tempoScale: Percent;
}

/**
 * Output of the file-parsing collaborator: per-track event lists.
 */
export interface ParsedTracks {
  /** Ticks per quarter note */
  resolution: number;
  /** Tempo in effect at tick 0 when the file carries no tempo event there */
  initialTempo: MicrosPerBeat;
  tracks: RawEvent[][];
}

/**
 * Identity of a timeline source for cache keying.
 */
export interface SourceIdentity {
  path: string;
  /** Modification time of the source file */
  modifiedMs: Ms;
}

/**
 * A loadable timeline source (usually a MIDI file on disk).
 */
export interface TimelineSource {
  identity(): Promise<SourceIdentity>;
  read(): Promise<ParsedTracks>;
}

/**
 * Slice of the timeline that is played, as percentages of the entry count.
 */
export interface PracticeRegion {
  startPercent: Percent;
  endPercent: Percent;
}
