/**
 * Pipeline Interfaces
 *
 * Seams between the scheduler and its collaborators. The scheduler owns
 * the cursor and drives everything else once per tick:
 * Router.drain → NoteState → Prediction → Frame → Snapshot sink
 */

import type { Ms } from "../core/time";
import type { MidiChannel, MidiNoteNumber } from "../raw/raw";
import type { NoteKey, NoteStateSnapshot } from "../notes/notes";
import type { CacheLookup } from "../cache/cache";
import type { SourceIdentity, TimelineData } from "../timeline/timeline";
import type { Snapshot } from "../snapshot/snapshot";
import type { Diagnostic } from "../diagnostics/diagnostics";

/**
 * Monotonic millisecond clock (performance.now() or a test stand-in).
 */
export type Clock = () => Ms;

/**
 * Read side of the note state. Readers only ever see whole events.
 */
export interface INoteStateReader {
  isActive(channel: MidiChannel, note: MidiNoteNumber): boolean;
  activeSet(): ReadonlySet<NoteKey>;
  snapshot(): NoteStateSnapshot;
}

/**
 * Persistent store of processed timelines.
 */
export interface ITimelineCache {
  /** Never rejects; stale, missing or unreadable records are misses */
  load(identity: SourceIdentity): Promise<CacheLookup>;
  /** Best effort; resolves false when the record could not be written */
  store(identity: SourceIdentity, timeline: TimelineData): Promise<boolean>;
}

/**
 * Receiver of per-tick snapshots (the broadcast boundary).
 */
export interface ISnapshotSink {
  publish(snapshot: Snapshot): void;
}

export type SnapshotListener = (snapshot: Snapshot) => void;

export type DiagnosticListener = (diagnostic: Diagnostic) => void;
