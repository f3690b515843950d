import type { Seconds } from "../core/time";
import type { Diagnostic } from "../diagnostics/diagnostics";
import type { Frame } from "../frame/frame";
import type { MidiChannel, MidiNoteNumber } from "../raw/raw";

export type PlaybackState = "idle" | "loading" | "playing" | "paused" | "stopped";

export interface ActiveNoteRef {
  channel: MidiChannel;
  note: MidiNoteNumber;
}

export interface SnapshotPrediction {
  channel: MidiChannel;
  note: MidiNoteNumber;
  velocity: number;
  delaySeconds: Seconds;
}

/**
 * Immutable per-tick state handed to the broadcast boundary.
 */
export interface Snapshot {
  /** Tick sequence number within the session */
  sequence: number;
  state: PlaybackState;
  cursorSeconds: Seconds;
  cursorIndex: number;
  activeNotes: ActiveNoteRef[];
  predictedNotes: SnapshotPrediction[];
  /** Keys the cursor is waiting for in melody practice, ascending */
  awaitingNotes: MidiNoteNumber[];
  frame: Frame;
  diagnostics: Diagnostic[];
}
