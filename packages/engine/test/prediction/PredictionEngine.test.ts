import { describe, it, expect } from "vitest";
import type { CursorSnapshot, RawEvent } from "@lumitone/contracts";
import { InvalidConfigurationError } from "@lumitone/contracts";
import { buildTimeline } from "../../src/timeline/Timeline";
import { NoteStateTracker } from "../../src/state/NoteStateTracker";
import { calculateWindow, clampWindow, predict } from "../../src/prediction/PredictionEngine";

function on(deltaTicks: number, note: number, velocity = 80, channel = 0): RawEvent {
  return { kind: "note_on", channel, note, velocity, deltaTicks, track: 0 };
}

function cursor(index: number, seconds: number, tempoScale = 100): CursorSnapshot {
  return { index, seconds, tempoScale };
}

const EMPTY_STATE = new NoteStateTracker().snapshot();

// Onsets at 0 s, 0 s and 1.5 s
const chordThenNote = buildTimeline([[on(0, 60), on(0, 64), on(1440, 67)]], 480, 500_000);

describe("PredictionEngine", () => {
  describe("predict", () => {
    it("returns the simultaneous group at the cursor and nothing after it", () => {
      const batch = predict(cursor(0, 0), chordThenNote, EMPTY_STATE, 2.0);

      expect(batch.notes.map((n) => n.note)).toEqual([60, 64]);
      expect(batch.notes.map((n) => n.delaySeconds)).toEqual([0, 0]);
      expect(batch.entries.map((e) => e.index)).toEqual([0, 1]);
    });

    it("is idempotent for identical inputs", () => {
      const first = predict(cursor(0, 0), chordThenNote, EMPTY_STATE, 2.0);
      const second = predict(cursor(0, 0), chordThenNote, EMPTY_STATE, 2.0);

      expect(second).toEqual(first);
    });

    it("moves on to the next group once the cursor passes the first", () => {
      const batch = predict(cursor(2, 0.1), chordThenNote, EMPTY_STATE, 2.0);

      expect(batch.notes).toHaveLength(1);
      expect(batch.notes[0].note).toBe(67);
      expect(batch.notes[0].delaySeconds).toBeCloseTo(1.4, 9);
      expect(batch.notes[0].startSeconds).toBeCloseTo(1.5, 9);
    });

    it("excludes onsets beyond the window", () => {
      expect(predict(cursor(2, 0), chordThenNote, EMPTY_STATE, 1.0).notes).toEqual([]);
    });

    it("measures delays in wall-clock time under the tempo scale", () => {
      expect(predict(cursor(2, 0, 50), chordThenNote, EMPTY_STATE, 2.0).notes).toEqual([]);

      const wide = predict(cursor(2, 0, 50), chordThenNote, EMPTY_STATE, 4.0);
      expect(wide.notes[0].delaySeconds).toBeCloseTo(3.0, 9);
    });

    it("skips notes that are already sounding", () => {
      const tracker = new NoteStateTracker();
      tracker.apply({ origin: "live", t: 0, message: { kind: "note_on", channel: 0, note: 60, velocity: 90 } });

      const batch = predict(cursor(0, 0), chordThenNote, tracker.snapshot(), 2.0);
      expect(batch.notes.map((n) => n.note)).toEqual([64]);
    });

    it("skips releases and meta events before the group", () => {
      const timeline = buildTimeline(
        [
          [
            { kind: "meta", meta: { type: "tempo", microsecondsPerBeat: 500_000 }, deltaTicks: 0, track: 0 },
            on(0, 60),
            on(240, 60, 0),
            on(240, 62),
          ],
        ],
        480,
        500_000
      );

      const batch = predict(cursor(2, 0.25), timeline, EMPTY_STATE, 2.0);
      expect(batch.notes.map((n) => n.note)).toEqual([62]);
      expect(batch.notes[0].delaySeconds).toBeCloseTo(0.25, 9);
    });

    it("filters by hand", () => {
      const timeline = buildTimeline([[on(0, 60, 80, 1), on(0, 48, 80, 2)]], 480, 500_000);

      expect(predict(cursor(0, 0), timeline, EMPTY_STATE, 2.0, { hands: "left" }).notes.map((n) => n.note)).toEqual([48]);
      expect(predict(cursor(0, 0), timeline, EMPTY_STATE, 2.0, { hands: "right" }).notes.map((n) => n.note)).toEqual([60]);
      expect(predict(cursor(0, 0), timeline, EMPTY_STATE, 2.0).notes.map((n) => n.hand)).toEqual(["right", "left"]);
    });

    it("groups near-simultaneous onsets within epsilon", () => {
      // 1 tick = 1 ms at 1000 ticks/beat and 1 s/beat
      const timeline = buildTimeline([[on(0, 60), on(10, 64), on(500, 67)]], 1000, 1_000_000);

      expect(predict(cursor(0, 0), timeline, EMPTY_STATE, 2.0).notes.map((n) => n.note)).toEqual([60]);
      expect(
        predict(cursor(0, 0), timeline, EMPTY_STATE, 2.0, { epsilonSeconds: 0.02 }).notes.map((n) => n.note)
      ).toEqual([60, 64]);
    });

    it("stops at the end index", () => {
      expect(predict(cursor(2, 0), chordThenNote, EMPTY_STATE, 2.0, { endIndex: 2 }).notes).toEqual([]);
    });

    it("rejects a negative window", () => {
      expect(() => predict(cursor(0, 0), chordThenNote, EMPTY_STATE, -1)).toThrow(InvalidConfigurationError);
    });
  });

  describe("calculateWindow", () => {
    it("starts from the base window", () => {
      expect(calculateWindow(0, 0)).toBe(2);
    });

    it("widens with skill and difficulty", () => {
      expect(calculateWindow(5, 5, 2)).toBeCloseTo(6, 9);
    });

    it("rejects negative inputs", () => {
      expect(() => calculateWindow(-1, 0)).toThrow(InvalidConfigurationError);
      expect(() => calculateWindow(0, -1)).toThrow(InvalidConfigurationError);
      expect(() => calculateWindow(0, 0, 0)).toThrow(InvalidConfigurationError);
    });

    it("clamps to a maximum", () => {
      expect(clampWindow(6, 4)).toBe(4);
      expect(clampWindow(3, 4)).toBe(3);
    });
  });
});
