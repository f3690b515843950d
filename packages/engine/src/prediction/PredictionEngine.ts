/**
 * Prediction Engine
 *
 * Finds the next group of notes the learner has to play: the first
 * not-yet-sounding onset after the cursor plus everything that starts
 * together with it.
 *
 * Pure: the same cursor, timeline and note-state snapshot always give the
 * same batch.
 */

import type {
  CursorSnapshot,
  HandPolicy,
  HandSelection,
  NoteStateSnapshot,
  PredictedNote,
  PredictionBatch,
  Seconds,
  TimelineEntry,
} from "@lumitone/contracts";
import { InvalidConfigurationError, isNoteActive } from "@lumitone/contracts";

import type { Timeline } from "../timeline/Timeline";
import { applyTempoScale } from "../time/TimeConverter";
import { DEFAULT_HAND_POLICY, handForChannel } from "../state/NoteStateTracker";

export interface PredictOptions {
  /**
   * Onsets closer than this to the batch anchor count as simultaneous.
   * @default 0
   */
  epsilonSeconds?: Seconds;

  /** Restrict predictions to one hand. @default "both" */
  hands?: HandSelection;

  /** Hand derivation for predicted notes. @default DEFAULT_HAND_POLICY */
  handPolicy?: HandPolicy;

  /** Exclusive scan limit, e.g. the end of a practice region */
  endIndex?: number;
}

export const EMPTY_BATCH: PredictionBatch = { entries: [], notes: [] };

/** Lookahead for a beginner on an easy song */
export const BASE_WINDOW_SECONDS: Seconds = 2.0;

/**
 * Predict the next simultaneous group of notes within the lookahead window.
 *
 * Delays are wall-clock seconds under the cursor's tempo scale.
 */
export function predict(
  cursor: CursorSnapshot,
  timeline: Timeline,
  noteState: NoteStateSnapshot,
  lookaheadWindowSeconds: Seconds,
  options: PredictOptions = {}
): PredictionBatch {
  if (!Number.isFinite(lookaheadWindowSeconds) || lookaheadWindowSeconds < 0) {
    throw new InvalidConfigurationError(
      "lookaheadWindowSeconds",
      `Lookahead window must be a non-negative number, got ${lookaheadWindowSeconds}`
    );
  }

  const epsilon = Math.max(0, options.epsilonSeconds ?? 0);
  const hands = options.hands ?? "both";
  const handPolicy = options.handPolicy ?? DEFAULT_HAND_POLICY;
  const end = Math.min(options.endIndex ?? timeline.length, timeline.length);

  const entries: TimelineEntry[] = [];
  const notes: PredictedNote[] = [];
  let anchor: Seconds | null = null;

  for (let i = Math.max(0, cursor.index); i < end; i++) {
    const entry = timeline.entries[i];
    const delay = applyTempoScale(entry.absoluteSeconds - cursor.seconds, cursor.tempoScale);
    if (delay > lookaheadWindowSeconds) break;

    if (anchor !== null) {
      const sinceAnchor = applyTempoScale(entry.absoluteSeconds - anchor, cursor.tempoScale);
      if (sinceAnchor > epsilon) break;
    }

    const event = entry.event;
    if (event.kind !== "note_on" || event.velocity === 0) continue;
    if (isNoteActive(noteState, event.channel, event.note)) continue;

    const hand = handForChannel(handPolicy, event.channel);
    if (hands !== "both" && hand !== hands) continue;

    if (anchor === null) anchor = entry.absoluteSeconds;
    entries.push(entry);
    notes.push({
      channel: event.channel,
      note: event.note,
      velocity: event.velocity,
      hand,
      delaySeconds: delay,
      startSeconds: entry.absoluteSeconds,
    });
  }

  return { entries, notes };
}

/**
 * Lookahead window for a learner: base × (1 + skill/10) × (1 + difficulty/5).
 */
export function calculateWindow(
  skillLevel: number,
  songDifficulty: number,
  baseSeconds: Seconds = BASE_WINDOW_SECONDS
): Seconds {
  if (!Number.isFinite(skillLevel) || skillLevel < 0) {
    throw new InvalidConfigurationError("skillLevel", `Skill level must be >= 0, got ${skillLevel}`);
  }
  if (!Number.isFinite(songDifficulty) || songDifficulty < 0) {
    throw new InvalidConfigurationError(
      "songDifficulty",
      `Song difficulty must be >= 0, got ${songDifficulty}`
    );
  }
  if (!Number.isFinite(baseSeconds) || baseSeconds <= 0) {
    throw new InvalidConfigurationError("baseSeconds", `Base window must be > 0, got ${baseSeconds}`);
  }
  return baseSeconds * (1 + skillLevel / 10) * (1 + songDifficulty / 5);
}

/**
 * Cap a window so sparse timelines do not trigger unbounded scans.
 */
export function clampWindow(windowSeconds: Seconds, maxSeconds: Seconds): Seconds {
  return Math.min(windowSeconds, maxSeconds);
}
