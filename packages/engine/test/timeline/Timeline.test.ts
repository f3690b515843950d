import { describe, it, expect } from "vitest";
import type { RawEvent } from "@lumitone/contracts";
import { InvalidConfigurationError, MalformedTimelineError } from "@lumitone/contracts";
import { Timeline, buildTimeline } from "../../src/timeline/Timeline";
import { absoluteSecondsAt } from "../../src/time/TimeConverter";

function on(deltaTicks: number, note: number, velocity = 80, channel = 0): RawEvent {
  return { kind: "note_on", channel, note, velocity, deltaTicks, track: 0 };
}

function off(deltaTicks: number, note: number, channel = 0): RawEvent {
  return { kind: "note_off", channel, note, velocity: 64, deltaTicks, track: 0 };
}

function tempo(deltaTicks: number, microsecondsPerBeat: number): RawEvent {
  return { kind: "meta", meta: { type: "tempo", microsecondsPerBeat }, deltaTicks, track: 0 };
}

function notesAt(timeline: Timeline, tick: number): number[] {
  const notes: number[] = [];
  for (const entry of timeline.entries) {
    if (entry.absoluteTick === tick && entry.event.kind === "note_on") {
      notes.push(entry.event.note);
    }
  }
  return notes.sort((a, b) => a - b);
}

describe("Timeline", () => {
  describe("buildTimeline", () => {
    it("merges tracks by tick and resolves seconds", () => {
      const timeline = buildTimeline(
        [
          [on(0, 60), off(480, 60)],
          [on(240, 64), off(240, 64)],
        ],
        480,
        500_000
      );

      expect(timeline.entries.map((e) => e.absoluteTick)).toEqual([0, 240, 480, 480]);
      expect(timeline.entries.map((e) => e.absoluteSeconds)).toEqual([0, 0.25, 0.5, 0.5]);
      expect(timeline.entries.map((e) => e.index)).toEqual([0, 1, 2, 3]);
      expect(timeline.entries.map((e) => e.event.track)).toEqual([0, 1, 0, 1]);
    });

    it("normalizes note-off to a zero-velocity note-on", () => {
      const timeline = buildTimeline([[on(0, 60), off(480, 60)]], 480, 500_000);

      expect(timeline.entries[1].event).toEqual({
        kind: "note_on",
        channel: 0,
        note: 60,
        velocity: 0,
        deltaTicks: 480,
        track: 0,
      });
    });

    it("orders a release before an onset at the same tick across tracks", () => {
      const timeline = buildTimeline(
        [
          [on(480, 62)],
          [on(0, 62), off(480, 62)],
        ],
        480,
        500_000
      );

      const velocities = timeline.entries.map((e) => (e.event.kind === "note_on" ? e.event.velocity : -1));
      expect(velocities).toEqual([80, 0, 80]);
      expect(timeline.entries.map((e) => e.event.track)).toEqual([1, 1, 0]);
    });

    it("yields the same tick ordering when tracks are swapped", () => {
      const a = [on(0, 60), off(480, 60)];
      const b = [on(0, 64), off(480, 64)];

      const ab = buildTimeline([a, b], 480, 500_000);
      const ba = buildTimeline([b, a], 480, 500_000);

      expect(ab.entries.map((e) => e.absoluteTick)).toEqual(ba.entries.map((e) => e.absoluteTick));
      expect(notesAt(ab, 0)).toEqual(notesAt(ba, 0));
      expect(notesAt(ab, 480)).toEqual(notesAt(ba, 480));

      // Only the payload order inside a tick differs
      const first = (t: Timeline) => (t.entries[0].event.kind === "note_on" ? t.entries[0].event.note : -1);
      expect(first(ab)).toBe(60);
      expect(first(ba)).toBe(64);
    });

    it("applies tempo changes from their tick on", () => {
      const timeline = buildTimeline(
        [[tempo(0, 500_000), on(0, 60), tempo(480, 250_000), on(0, 62), on(480, 64)]],
        480,
        500_000
      );

      expect(timeline.entries.map((e) => e.absoluteSeconds)).toEqual([0, 0, 0.5, 0.5, 0.75]);
      expect(timeline.tempoMap).toEqual([
        { tick: 0, microsecondsPerBeat: 500_000 },
        { tick: 480, microsecondsPerBeat: 250_000 },
      ]);
      expect(absoluteSecondsAt(960, 480, timeline.tempoMap)).toBeCloseTo(0.75, 9);
    });

    it("lets a tempo event at tick 0 replace the initial tempo", () => {
      const timeline = buildTimeline([[tempo(0, 1_000_000), on(480, 60)]], 480, 500_000);

      expect(timeline.tempoMap).toEqual([{ tick: 0, microsecondsPerBeat: 1_000_000 }]);
      expect(timeline.entries[1].absoluteSeconds).toBeCloseTo(1.0, 9);
    });

    it("re-channels notes by track for two-track files", () => {
      const timeline = buildTimeline(
        [[on(0, 60, 80, 5)], [on(0, 48, 80, 5)]],
        480,
        500_000,
        { channelFromTrack: true }
      );

      const channels = timeline.entries.map((e) => (e.event.kind === "note_on" ? e.event.channel : -1));
      expect(channels).toEqual([1, 2]);
    });

    it("re-channels by track index when there are more than two tracks", () => {
      const timeline = buildTimeline(
        [[on(0, 60, 80, 9)], [on(0, 62, 80, 9)], [on(0, 64, 80, 9)]],
        480,
        500_000,
        { channelFromTrack: true }
      );

      const channels = timeline.entries.map((e) => (e.event.kind === "note_on" ? e.event.channel : -1));
      expect(channels).toEqual([0, 1, 2]);
    });

    it("rejects negative and fractional deltas", () => {
      expect(() => buildTimeline([[on(-1, 60)]], 480, 500_000)).toThrow(MalformedTimelineError);
      expect(() => buildTimeline([[on(1.5, 60)]], 480, 500_000)).toThrow(MalformedTimelineError);
    });

    it("rejects a non-positive resolution", () => {
      expect(() => buildTimeline([[on(0, 60)]], 0, 500_000)).toThrow(MalformedTimelineError);
    });

    it("builds an empty timeline from no tracks", () => {
      const timeline = buildTimeline([], 480, 500_000);

      expect(timeline.length).toBe(0);
      expect(timeline.durationSeconds).toBe(0);
      expect(timeline.tempoMap).toEqual([{ tick: 0, microsecondsPerBeat: 500_000 }]);
    });
  });

  describe("queries", () => {
    const timeline = buildTimeline(
      [[on(0, 60), on(480, 61), on(480, 62, 0), on(480, 63)]],
      480,
      500_000
    );

    it("counts sounding onsets only", () => {
      expect(timeline.length).toBe(4);
      expect(timeline.noteCount).toBe(3);
      expect(timeline.durationSeconds).toBeCloseTo(1.5, 9);
    });

    it("finds the first entry at or after a time", () => {
      expect(timeline.indexAtSeconds(0)).toBe(0);
      expect(timeline.indexAtSeconds(0.5)).toBe(1);
      expect(timeline.indexAtSeconds(0.6)).toBe(2);
      expect(timeline.indexAtSeconds(2)).toBe(4);
    });

    it("round-trips through plain data", () => {
      const copy = new Timeline(timeline.toData());
      expect(copy.entries).toEqual(timeline.entries);
      expect(copy.tempoMap).toEqual(timeline.tempoMap);
    });
  });

  describe("regionBounds", () => {
    const timeline = buildTimeline(
      [Array.from({ length: 10 }, (_, i) => on(i === 0 ? 0 : 120, 60 + i))],
      480,
      500_000
    );

    it("floors percentages of the entry count", () => {
      expect(timeline.regionBounds({ startPercent: 25, endPercent: 75 })).toEqual({ start: 2, end: 7 });
      expect(timeline.regionBounds({ startPercent: 0, endPercent: 100 })).toEqual({ start: 0, end: 10 });
    });

    it("rejects empty or out-of-range regions", () => {
      expect(() => timeline.regionBounds({ startPercent: 50, endPercent: 50 })).toThrow(
        InvalidConfigurationError
      );
      expect(() => timeline.regionBounds({ startPercent: -1, endPercent: 50 })).toThrow(
        InvalidConfigurationError
      );
      expect(() => timeline.regionBounds({ startPercent: 0, endPercent: 101 })).toThrow(
        InvalidConfigurationError
      );
    });
  });
});
