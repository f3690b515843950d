/**
 * Raw Event Types
 *
 * Protocol-level MIDI events as handed over by the file-parsing collaborator
 * or a live input device. No musical interpretation and no wall-clock time:
 * file events only know their tick delta inside their track.
 */

import type { Ticks, MicrosPerBeat } from "../core/time";

/**
 * Type alias for MIDI note numbers (0-127).
 */
export type MidiNoteNumber = number;

/**
 * MIDI channel (0-15).
 */
export type MidiChannel = number;

interface TrackPosition {
  /** Ticks since the previous event in the same track */
  deltaTicks: Ticks;
  /** Index of the source track */
  track: number;
}

export interface NoteOnEvent extends TrackPosition {
  kind: "note_on";
  channel: MidiChannel;
  note: MidiNoteNumber;
  velocity: number; // 0-127, 0 means release
}

export interface NoteOffEvent extends TrackPosition {
  kind: "note_off";
  channel: MidiChannel;
  note: MidiNoteNumber;
  velocity: number; // release velocity, ignored downstream
}

export interface ControlChangeEvent extends TrackPosition {
  kind: "control_change";
  channel: MidiChannel;
  controller: number;
  value: number;
}

export type MetaPayload =
  | { type: "tempo"; microsecondsPerBeat: MicrosPerBeat }
  | { type: "end_of_track" }
  | { type: "other"; name: string };

export interface MetaEvent extends TrackPosition {
  kind: "meta";
  meta: MetaPayload;
}

/**
 * Union of all raw events a track may contain.
 */
export type RawEvent = NoteOnEvent | NoteOffEvent | ControlChangeEvent | MetaEvent;

/**
 * Events after note-off normalization. A release is a note_on with
 * velocity 0 from here on.
 */
export type NormalizedEvent = NoteOnEvent | ControlChangeEvent | MetaEvent;

/**
 * Channel message shape shared by both sources once they reach the router.
 */
export type ChannelMessage =
  | { kind: "note_on"; channel: MidiChannel; note: MidiNoteNumber; velocity: number }
  | { kind: "control_change"; channel: MidiChannel; controller: number; value: number };

export const SUSTAIN_PEDAL_CONTROLLER = 64;

/**
 * True for a note_on that releases the key (velocity 0).
 */
export function isRelease(event: NormalizedEvent | ChannelMessage): boolean {
  return event.kind === "note_on" && event.velocity === 0;
}
