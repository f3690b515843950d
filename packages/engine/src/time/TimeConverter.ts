/**
 * Tick ↔ seconds conversion.
 *
 * Pure functions; the tempo in effect at a tick always comes from the
 * tempo map, never from a single song-wide value.
 */

import type {
  MicrosPerBeat,
  Percent,
  Seconds,
  TempoMap,
  TempoMapEntry,
  Ticks,
} from "@lumitone/contracts";
import {
  InvalidConfigurationError,
  MalformedTimelineError,
} from "@lumitone/contracts";

/** 120 BPM, the MIDI default when a file sets no tempo */
export const DEFAULT_TEMPO: MicrosPerBeat = 500_000;

const MICROS_PER_SECOND = 1_000_000;

function assertResolution(resolution: number): void {
  if (!Number.isFinite(resolution) || resolution <= 0) {
    throw new MalformedTimelineError(`Resolution must be positive, got ${resolution}`);
  }
}

/**
 * Convert a tick count to seconds under a single tempo.
 */
export function ticksToSeconds(
  tick: Ticks,
  resolution: number,
  microsecondsPerBeat: MicrosPerBeat
): Seconds {
  assertResolution(resolution);
  if (tick < 0) {
    throw new MalformedTimelineError(`Tick must not be negative, got ${tick}`);
  }
  return (tick * microsecondsPerBeat) / (resolution * MICROS_PER_SECOND);
}

/**
 * Tempo entry in effect at `tick`: the last entry at or before it.
 */
export function tempoAt(tempoMap: TempoMap, tick: Ticks): TempoMapEntry {
  if (tempoMap.length === 0 || tempoMap[0].tick > tick) {
    throw new MalformedTimelineError(`Tempo map does not cover tick ${tick}`);
  }

  let lo = 0;
  let hi = tempoMap.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (tempoMap[mid].tick <= tick) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return tempoMap[lo];
}

/**
 * Seconds from tick 0 to `tick`, integrating over every tempo change.
 */
export function absoluteSecondsAt(
  tick: Ticks,
  resolution: number,
  tempoMap: TempoMap
): Seconds {
  assertResolution(resolution);
  const current = tempoAt(tempoMap, tick);

  let seconds = 0;
  for (let i = 0; i < tempoMap.length; i++) {
    const entry = tempoMap[i];
    if (entry === current) {
      return seconds + ticksToSeconds(tick - entry.tick, resolution, entry.microsecondsPerBeat);
    }
    const next = tempoMap[i + 1];
    seconds += ticksToSeconds(next.tick - entry.tick, resolution, entry.microsecondsPerBeat);
  }
  return seconds;
}

/**
 * Inverse of absoluteSecondsAt. The result is fractional; callers round
 * when they need a whole tick.
 */
export function secondsToTicks(
  seconds: Seconds,
  resolution: number,
  tempoMap: TempoMap
): Ticks {
  assertResolution(resolution);
  if (tempoMap.length === 0) {
    throw new MalformedTimelineError("Tempo map is empty");
  }

  let elapsed = 0;
  for (let i = 0; i < tempoMap.length; i++) {
    const entry = tempoMap[i];
    const next = tempoMap[i + 1];
    const ticksPerSecond = (resolution * MICROS_PER_SECOND) / entry.microsecondsPerBeat;
    if (next) {
      const segment = ticksToSeconds(next.tick - entry.tick, resolution, entry.microsecondsPerBeat);
      if (seconds < elapsed + segment) {
        return entry.tick + (seconds - elapsed) * ticksPerSecond;
      }
      elapsed += segment;
    } else {
      return entry.tick + (seconds - elapsed) * ticksPerSecond;
    }
  }
  return 0;
}

function assertScale(scalePercent: Percent): void {
  if (!Number.isFinite(scalePercent) || scalePercent <= 0) {
    throw new InvalidConfigurationError(
      "tempoScale",
      `Tempo scale must be a positive percentage, got ${scalePercent}`
    );
  }
}

/**
 * Wall-clock duration of `seconds` of timeline at a playback speed.
 * 50% plays at half speed, so durations double.
 */
export function applyTempoScale(seconds: Seconds, scalePercent: Percent): Seconds {
  assertScale(scalePercent);
  return (seconds * 100) / scalePercent;
}

/**
 * Timeline seconds covered by `wallSeconds` of real time at a playback speed.
 */
export function timelineSecondsForWallClock(
  wallSeconds: Seconds,
  scalePercent: Percent
): Seconds {
  assertScale(scalePercent);
  return (wallSeconds * scalePercent) / 100;
}

/**
 * Beats per minute for a tempo value.
 */
export function tempoToBpm(microsecondsPerBeat: MicrosPerBeat): number {
  return 60_000_000 / microsecondsPerBeat;
}
