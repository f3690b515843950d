import type { Seconds } from "../core/time";
import type { Hand } from "../notes/notes";
import type { MidiChannel, MidiNoteNumber } from "../raw/raw";
import type { TimelineEntry } from "../timeline/timeline";

/**
 * Which hand(s) the learner is practising.
 */
export type HandSelection = "both" | Hand;

export interface PredictedNote {
  channel: MidiChannel;
  note: MidiNoteNumber;
  velocity: number;
  hand: Hand;
  /** Wall-clock delay from the cursor, tempo scale applied */
  delaySeconds: Seconds;
  /** Timeline time of the note onset */
  startSeconds: Seconds;
}

/**
 * A group of notes that start together: the next chord (or single note)
 * the learner has to play.
 */
export interface PredictionBatch {
  entries: readonly TimelineEntry[];
  notes: readonly PredictedNote[];
}
