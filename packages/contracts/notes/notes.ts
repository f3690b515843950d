/**
 * Note State Types
 *
 * The engine's single model of which keys are down, shared by file
 * playback and live input.
 */

import type { Seconds } from "../core/time";
import type { EventOrigin } from "../core/provenance";
import type { MidiChannel, MidiNoteNumber } from "../raw/raw";

export type Hand = "left" | "right";

/**
 * Channel to hand mapping. Channels not listed use the fallback.
 */
export interface HandPolicy {
  channels: Readonly<Record<number, Hand>>;
  fallback: Hand;
}

/**
 * Key of a note in the state map: "{channel}:{note}".
 */
export type NoteKey = string;

export function noteKey(channel: MidiChannel, note: MidiNoteNumber): NoteKey {
  return `${channel}:${note}`;
}

export interface NoteStatus {
  channel: MidiChannel;
  note: MidiNoteNumber;
  /** Key is held down */
  active: boolean;
  /** Key was released while the sustain pedal is down */
  sustained: boolean;
  velocity: number;
  onSeconds: Seconds;
  hand: Hand;
  origin: EventOrigin;
}

/**
 * Immutable copy of the note state published after each applied event.
 */
export interface NoteStateSnapshot {
  /** Increments on every applied event */
  version: number;
  notes: ReadonlyMap<NoteKey, NoteStatus>;
  /** Channels with the sustain pedal down */
  sustainChannels: ReadonlySet<MidiChannel>;
}

export function isNoteActive(
  snapshot: NoteStateSnapshot,
  channel: MidiChannel,
  note: MidiNoteNumber
): boolean {
  return snapshot.notes.get(noteKey(channel, note))?.active ?? false;
}
