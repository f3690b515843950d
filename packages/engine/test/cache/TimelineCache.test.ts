import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { RawEvent, SourceIdentity } from "@lumitone/contracts";
import { TimelineCache } from "../../src/cache/TimelineCache";
import { buildTimeline } from "../../src/timeline/Timeline";

function on(deltaTicks: number, note: number, velocity = 80): RawEvent {
  return { kind: "note_on", channel: 0, note, velocity, deltaTicks, track: 0 };
}

const timeline = buildTimeline(
  [[{ kind: "meta", meta: { type: "tempo", microsecondsPerBeat: 400_000 }, deltaTicks: 0, track: 0 }, on(0, 60), on(480, 60, 0)]],
  480,
  500_000
);

const SONG: SourceIdentity = { path: "/songs/etude.mid", modifiedMs: 5_000 };

describe("TimelineCache", () => {
  let directory: string;
  let cache: TimelineCache;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "lumitone-cache-"));
    cache = new TimelineCache({ directory });
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it("names record files by a SHA-1 of the path", () => {
    const file = cache.fileFor(SONG.path);

    expect(file.startsWith(directory)).toBe(true);
    expect(file).toMatch(/[0-9a-f]{40}\.json$/);
    expect(cache.fileFor(SONG.path)).toBe(file);
    expect(cache.fileFor("/songs/other.mid")).not.toBe(file);
  });

  it("reports a miss for a path never stored", async () => {
    expect(await cache.load(SONG)).toEqual({ status: "miss", reason: "absent" });
  });

  it("returns a stored timeline while the source is unchanged", async () => {
    expect(await cache.store(SONG, timeline.toData())).toBe(true);

    const lookup = await cache.load(SONG);
    expect(lookup.status).toBe("hit");
    if (lookup.status === "hit") {
      expect(lookup.record.version).toBe(1);
      expect(lookup.record.source).toEqual(SONG);
      expect(lookup.record.resolution).toBe(480);
      expect(lookup.record.tempoMap).toEqual([{ tick: 0, microsecondsPerBeat: 400_000 }]);
      expect(lookup.record.entries).toEqual(timeline.entries);
    }
  });

  it("treats any record older than the source as a stale miss", async () => {
    await cache.store(SONG, timeline.toData());

    for (const newer of [1, 10, 1_000_000]) {
      const lookup = await cache.load({ ...SONG, modifiedMs: SONG.modifiedMs + newer });
      expect(lookup.status).toBe("miss");
      if (lookup.status === "miss") {
        expect(lookup.reason).toBe("stale");
        expect(lookup.stale?.entries).toEqual(timeline.entries);
      }
    }
  });

  it("misses on a format version change", async () => {
    await cache.store(SONG, timeline.toData());
    const newer = new TimelineCache({ directory, version: 2 });

    expect(await newer.load(SONG)).toEqual({ status: "miss", reason: "version" });
  });

  it("misses on unparseable records", async () => {
    await writeFile(cache.fileFor(SONG.path), "{not json", "utf-8");

    expect(await cache.load(SONG)).toEqual({ status: "miss", reason: "corrupt" });
  });

  it("misses on records of the wrong shape", async () => {
    await writeFile(cache.fileFor(SONG.path), JSON.stringify({ version: 1, entries: "nope" }), "utf-8");

    expect(await cache.load(SONG)).toEqual({ status: "miss", reason: "corrupt" });
  });

  it("misses when the record belongs to another path", async () => {
    await cache.store(SONG, timeline.toData());
    const other = await cache.load({ path: "/songs/other.mid", modifiedMs: 0 });

    expect(other).toEqual({ status: "miss", reason: "absent" });
  });

  it("returns false when the record cannot be written", async () => {
    const blocker = join(directory, "blocker");
    await writeFile(blocker, "", "utf-8");
    const blocked = new TimelineCache({ directory: join(blocker, "records") });

    expect(await blocked.store(SONG, timeline.toData())).toBe(false);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
