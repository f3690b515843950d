/**
 * Frame Projector
 *
 * Turns upcoming notes into flying-note rectangles over an 88-key keyboard.
 * Geometry only; drawing is the renderer's business.
 */

import type {
  CursorSnapshot,
  FlyingNotesGeometry,
  Frame,
  HandPolicy,
  KeyLayoutEntry,
  MidiNoteNumber,
  Seconds,
  VisibleNote,
} from "@lumitone/contracts";
import { InvalidConfigurationError } from "@lumitone/contracts";

import type { Timeline } from "../timeline/Timeline";
import { applyTempoScale } from "../time/TimeConverter";
import { DEFAULT_HAND_POLICY, handForChannel } from "../state/NoteStateTracker";
import { colorKeyFor, colorKeyPath, keyColorOf, noteName } from "./colorKeys";

export const LOWEST_KEY: MidiNoteNumber = 21; // A0
export const HIGHEST_KEY: MidiNoteNumber = 108; // C8

export const WHITE_KEY_WIDTH = 20;
export const BLACK_KEY_WIDTH = 12;

/**
 * Black key offset from the middle of the white key to its left, by pitch
 * class. Black keys are not evenly spaced inside an octave.
 */
const BLACK_KEY_OFFSETS: Readonly<Record<number, number>> = {
  1: -6, // C#
  3: 6, // D#
  6: -8, // F#
  8: 0, // G#
  10: 8, // A#
};

export const DEFAULT_GEOMETRY: FlyingNotesGeometry = {
  canvasHeight: 600,
  keyboardHeight: 80,
  fallDistance: 520,
  noteHeight: 20,
};

/**
 * Static 88-key layout: white keys tile left to right, black keys sit at a
 * fixed offset from the preceding white key.
 */
export function layoutKeyboard(): KeyLayoutEntry[] {
  const keys: KeyLayoutEntry[] = [];
  let whiteCount = 0;

  for (let note = LOWEST_KEY; note <= HIGHEST_KEY; note++) {
    const keyColor = keyColorOf(note);
    if (keyColor === "white") {
      keys.push({ note, x: whiteCount * WHITE_KEY_WIDTH, width: WHITE_KEY_WIDTH, keyColor });
      whiteCount++;
    } else {
      const offset = BLACK_KEY_OFFSETS[note % 12] ?? 0;
      const x = (whiteCount - 1) * WHITE_KEY_WIDTH + WHITE_KEY_WIDTH / 2 + offset;
      keys.push({ note, x, width: BLACK_KEY_WIDTH, keyColor });
    }
  }

  return keys;
}

/**
 * Distance a note has travelled towards the keyboard, or null when it is
 * not on screen (not yet within the lookahead, or already past the keys).
 */
export function projectNotePosition(
  noteStartSeconds: Seconds,
  cursorSeconds: Seconds,
  lookaheadSeconds: Seconds,
  canvasExtent: number
): number | null {
  if (!Number.isFinite(lookaheadSeconds) || lookaheadSeconds <= 0) {
    throw new InvalidConfigurationError(
      "lookaheadSeconds",
      `Lookahead must be positive, got ${lookaheadSeconds}`
    );
  }
  const progress = 1 - (noteStartSeconds - cursorSeconds) / lookaheadSeconds;
  if (progress < 0 || progress > 1) return null;
  return canvasExtent * progress;
}

/**
 * Configuration for the FrameProjector.
 */
export interface FrameProjectorConfig {
  geometry?: Partial<FlyingNotesGeometry>;
  handPolicy?: HandPolicy;
}

export class FrameProjector {
  private geometry: FlyingNotesGeometry;
  private handPolicy: HandPolicy;
  private readonly layout: KeyLayoutEntry[] = layoutKeyboard();
  private readonly keysByNote: Map<MidiNoteNumber, KeyLayoutEntry>;
  private layoutSent = false;

  constructor(config: FrameProjectorConfig = {}) {
    this.geometry = { ...DEFAULT_GEOMETRY, ...config.geometry };
    this.handPolicy = config.handPolicy ?? DEFAULT_HAND_POLICY;
    this.keysByNote = new Map(this.layout.map((k) => [k.note, k]));
  }

  getGeometry(): FlyingNotesGeometry {
    return { ...this.geometry };
  }

  setGeometry(patch: Partial<FlyingNotesGeometry>): void {
    this.geometry = { ...this.geometry, ...patch };
    this.layoutSent = false;
  }

  setHandPolicy(policy: HandPolicy): void {
    this.handPolicy = policy;
  }

  /**
   * Send the keyboard layout again with the next frame (e.g. for a new
   * subscriber).
   */
  invalidateLayout(): void {
    this.layoutSent = false;
  }

  /**
   * Project every onset between the cursor and the end of the lookahead.
   * Times are compared in wall-clock seconds under the cursor's tempo scale.
   */
  project(
    timeline: Timeline | null,
    cursor: CursorSnapshot,
    lookaheadSeconds: Seconds,
    endIndex?: number
  ): Frame {
    const visibleNotes: VisibleNote[] = [];
    const { canvasHeight, keyboardHeight, fallDistance, noteHeight } = this.geometry;
    const top = canvasHeight - keyboardHeight - fallDistance;

    if (timeline) {
      const end = Math.min(endIndex ?? timeline.length, timeline.length);
      for (let i = Math.max(0, cursor.index); i < end; i++) {
        const entry = timeline.entries[i];
        const delay = applyTempoScale(entry.absoluteSeconds - cursor.seconds, cursor.tempoScale);
        if (delay > lookaheadSeconds) break;

        const event = entry.event;
        if (event.kind !== "note_on" || event.velocity === 0) continue;

        const key = this.keysByNote.get(event.note);
        if (!key) continue;

        const position = projectNotePosition(delay, 0, lookaheadSeconds, fallDistance);
        if (position === null) continue;

        const hand = handForChannel(this.handPolicy, event.channel);
        visibleNotes.push({
          channel: event.channel,
          note: event.note,
          name: noteName(event.note),
          velocity: event.velocity,
          startSeconds: entry.absoluteSeconds,
          x: key.x,
          y: top + position,
          width: key.width,
          height: noteHeight,
          hand,
          keyColor: key.keyColor,
          colorKey: colorKeyPath(colorKeyFor(hand, event.note, true)),
        });
      }
    }

    let keyboardLayout: KeyLayoutEntry[] | null = null;
    if (!this.layoutSent) {
      keyboardLayout = this.layout.map((k) => ({ ...k }));
      this.layoutSent = true;
    }

    return { visibleNotes, keyboardLayout };
  }
}
