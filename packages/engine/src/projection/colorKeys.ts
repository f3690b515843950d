/**
 * Palette lookup keys.
 *
 * The engine never picks colors. It derives the key a palette is looked up
 * by: which hand, which key color, and whether the note is still upcoming.
 */

import { Midi, Note } from "tonal";

import type { ColorKey, Hand, KeyColor, MidiNoteNumber } from "@lumitone/contracts";

/**
 * Scientific pitch name with sharps, e.g. 61 → "C#4".
 */
export function noteName(note: MidiNoteNumber): string {
  return Midi.midiToNoteName(note, { sharps: true });
}

/**
 * Black for the five accidentals of each octave, white otherwise.
 */
export function keyColorOf(note: MidiNoteNumber): KeyColor {
  return Note.get(noteName(note)).acc === "" ? "white" : "black";
}

export function colorKeyFor(hand: Hand, note: MidiNoteNumber, upcoming: boolean): ColorKey {
  return { hand, keyColor: keyColorOf(note), upcoming };
}

/**
 * Settings path of a palette entry, e.g. "left_hand/black_keys/upcoming".
 */
export function colorKeyPath(key: ColorKey): string {
  return `${key.hand}_hand/${key.keyColor}_keys/${key.upcoming ? "upcoming" : "current"}`;
}
