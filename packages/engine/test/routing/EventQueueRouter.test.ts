import { describe, it, expect, vi } from "vitest";
import type { LiveInputEvent, QueueOverflow, RoutedEvent, TimelineEntry } from "@lumitone/contracts";
import { InvalidConfigurationError } from "@lumitone/contracts";
import { EventQueueRouter } from "../../src/routing/EventQueueRouter";
import { NoteStateTracker } from "../../src/state/NoteStateTracker";

function liveNote(note: number, velocity = 80, channel = 0): LiveInputEvent {
  return { kind: "note_on", channel, note, velocity, arrivalTimestamp: 0 };
}

function fileEntry(index: number, seconds: number, note: number, velocity = 80): TimelineEntry {
  return {
    index,
    absoluteTick: Math.round(seconds * 960),
    absoluteSeconds: seconds,
    event: { kind: "note_on", channel: 0, note, velocity, deltaTicks: 0, track: 0 },
  };
}

function noteOf(event: RoutedEvent): number {
  return event.message.kind === "note_on" ? event.message.note : -1;
}

describe("EventQueueRouter", () => {
  describe("backpressure", () => {
    it("drops the oldest live events beyond capacity and reports the count once", () => {
      const onOverflow = vi.fn<(overflow: QueueOverflow) => void>();
      const router = new EventQueueRouter({ liveCapacity: 32, clock: () => 0, onOverflow });

      for (let i = 0; i < 40; i++) {
        router.pushLive(liveNote(i));
      }
      const result = router.drain();

      expect(result.events).toHaveLength(32);
      expect(noteOf(result.events[0])).toBe(8);
      expect(noteOf(result.events[31])).toBe(39);
      expect(result.overflow).toEqual({ kind: "queue_overflow", dropped: 8, capacity: 32 });
      expect(onOverflow).toHaveBeenCalledTimes(1);
      expect(onOverflow).toHaveBeenCalledWith({ kind: "queue_overflow", dropped: 8, capacity: 32 });

      expect(router.drain().overflow).toBeNull();
    });

    it("counts events trimmed by a smaller capacity", () => {
      const router = new EventQueueRouter({ liveCapacity: 32, clock: () => 0 });
      for (let i = 0; i < 10; i++) {
        router.pushLive(liveNote(60 + i));
      }

      router.setLiveCapacity(4);
      expect(router.pendingLive).toBe(4);

      const result = router.drain();
      expect(result.events.map(noteOf)).toEqual([66, 67, 68, 69]);
      expect(result.overflow).toEqual({ kind: "queue_overflow", dropped: 6, capacity: 4 });
    });

    it("rejects capacities that are not positive integers", () => {
      expect(() => new EventQueueRouter({ liveCapacity: 0, clock: () => 0 })).toThrow(InvalidConfigurationError);
      const router = new EventQueueRouter({ clock: () => 0 });
      expect(() => router.setLiveCapacity(2.5)).toThrow(InvalidConfigurationError);
      expect(router.capacity).toBe(256);
    });
  });

  describe("merge", () => {
    it("interleaves by timestamp with file events first on ties", () => {
      let now = 0;
      const router = new EventQueueRouter({ clock: () => now });

      router.pushFile(fileEntry(0, 0.5, 60));
      router.pushFile(fileEntry(1, 1.0, 62));
      now = 0.5;
      router.pushLive(liveNote(70));
      now = 0.75;
      router.pushLive(liveNote(72));

      const { events } = router.drain();
      expect(events.map((e) => e.origin)).toEqual(["file", "live", "live", "file"]);
      expect(events.map(noteOf)).toEqual([60, 70, 72, 62]);
      expect(events.map((e) => e.t)).toEqual([0.5, 0.5, 0.75, 1.0]);
    });

    it("keeps each queue in push order", () => {
      const router = new EventQueueRouter({ clock: () => 1 });
      router.pushLive(liveNote(64));
      router.pushLive(liveNote(60));
      router.pushLive(liveNote(62));

      expect(router.drain().events.map(noteOf)).toEqual([64, 60, 62]);
    });

    it("turns live note-offs into zero-velocity note-ons", () => {
      const router = new EventQueueRouter({ clock: () => 0 });
      router.pushLive({ kind: "note_off", channel: 2, note: 60, velocity: 40, arrivalTimestamp: 0 });

      expect(router.drain().events[0].message).toEqual({ kind: "note_on", channel: 2, note: 60, velocity: 0 });
    });

    it("does not queue meta entries", () => {
      const router = new EventQueueRouter({ clock: () => 0 });
      router.pushFile({
        index: 0,
        absoluteTick: 0,
        absoluteSeconds: 0,
        event: { kind: "meta", meta: { type: "end_of_track" }, deltaTicks: 0, track: 0 },
      });

      expect(router.pendingFile).toBe(0);
    });

    it("applies drained events to the sink in merged order", () => {
      let now = 0;
      const router = new EventQueueRouter({ clock: () => now });
      const tracker = new NoteStateTracker();

      router.pushFile(fileEntry(0, 0, 60));
      router.pushFile(fileEntry(1, 0.5, 60, 0));
      now = 0.25;
      router.pushLive(liveNote(60, 0));
      router.drain(tracker);

      // file on, live release, file release
      expect(tracker.snapshot().version).toBe(3);
      expect(tracker.isActive(0, 60)).toBe(false);
    });
  });

  it("clears both queues and the overflow count", () => {
    const router = new EventQueueRouter({ liveCapacity: 1, clock: () => 0 });
    router.pushLive(liveNote(60));
    router.pushLive(liveNote(61));
    router.pushFile(fileEntry(0, 0, 62));

    router.clear();
    const result = router.drain();
    expect(result.events).toEqual([]);
    expect(result.overflow).toBeNull();
  });
});
