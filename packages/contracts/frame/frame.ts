/**
 * Frame Types
 *
 * Renderer-facing geometry for the flying-notes view and the keyboard
 * beneath it. Coordinates are canvas pixels; y grows downwards.
 */

import type { Seconds } from "../core/time";
import type { Hand } from "../notes/notes";
import type { MidiChannel, MidiNoteNumber } from "../raw/raw";

export type KeyColor = "white" | "black";

/**
 * Palette lookup key. Palette selection itself lives outside the engine.
 */
export interface ColorKey {
  hand: Hand;
  keyColor: KeyColor;
  upcoming: boolean;
}

export interface KeyLayoutEntry {
  note: MidiNoteNumber;
  x: number;
  width: number;
  keyColor: KeyColor;
}

export interface FlyingNotesGeometry {
  canvasHeight: number;
  keyboardHeight: number;
  /** Distance a note travels between appearing and reaching the keys */
  fallDistance: number;
  noteHeight: number;
}

export interface VisibleNote {
  channel: MidiChannel;
  note: MidiNoteNumber;
  /** Scientific pitch name, e.g. "C#4" */
  name: string;
  velocity: number;
  startSeconds: Seconds;
  x: number;
  y: number;
  width: number;
  height: number;
  hand: Hand;
  keyColor: KeyColor;
  colorKey: string;
}

export interface Frame {
  visibleNotes: VisibleNote[];
  /** Present only when the layout changed since the previous frame */
  keyboardLayout: KeyLayoutEntry[] | null;
}
