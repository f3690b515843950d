/**
 * Timeline Cache
 *
 * Stores processed timelines as JSON files, one per source path. A record
 * is only trusted while the source file is not newer than the record and
 * the format version matches. Every failure is a miss: the caller falls
 * through to a fresh parse.
 */

import { createHash } from "crypto";
import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";

import type {
  CacheLookup,
  CacheRecord,
  ITimelineCache,
  NormalizedEvent,
  SourceIdentity,
  TempoMapEntry,
  TimelineData,
  TimelineEntry,
} from "@lumitone/contracts";
import { CACHE_FORMAT_VERSION, CacheCorruptError } from "@lumitone/contracts";

/**
 * Configuration for the TimelineCache.
 */
export interface TimelineCacheConfig {
  /** Directory holding the record files */
  directory: string;

  /**
   * Record format version; records with another version are misses.
   * @default CACHE_FORMAT_VERSION
   */
  version?: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isTempoEntry(value: unknown): value is TempoMapEntry {
  return isObject(value) && isNumber(value.tick) && isNumber(value.microsecondsPerBeat);
}

function isEvent(value: unknown): value is NormalizedEvent {
  if (!isObject(value) || !isNumber(value.deltaTicks) || !isNumber(value.track)) {
    return false;
  }
  switch (value.kind) {
    case "note_on":
      return isNumber(value.channel) && isNumber(value.note) && isNumber(value.velocity);
    case "control_change":
      return isNumber(value.channel) && isNumber(value.controller) && isNumber(value.value);
    case "meta":
      return isObject(value.meta) && typeof value.meta.type === "string";
    default:
      return false;
  }
}

function isEntry(value: unknown): value is TimelineEntry {
  return (
    isObject(value) &&
    isNumber(value.index) &&
    isNumber(value.absoluteTick) &&
    isNumber(value.absoluteSeconds) &&
    isEvent(value.event)
  );
}

/**
 * Structural check of a parsed record file.
 */
export function isCacheRecord(value: unknown): value is CacheRecord {
  return (
    isObject(value) &&
    isNumber(value.version) &&
    isObject(value.source) &&
    typeof value.source.path === "string" &&
    isNumber(value.source.modifiedMs) &&
    isNumber(value.resolution) &&
    Array.isArray(value.tempoMap) &&
    value.tempoMap.every(isTempoEntry) &&
    Array.isArray(value.entries) &&
    value.entries.every(isEntry)
  );
}

export class TimelineCache implements ITimelineCache {
  private directory: string;
  private version: number;

  constructor(config: TimelineCacheConfig) {
    this.directory = config.directory;
    this.version = config.version ?? CACHE_FORMAT_VERSION;
  }

  /**
   * Record file for a source path.
   */
  fileFor(path: string): string {
    const digest = createHash("sha1").update(path).digest("hex");
    return join(this.directory, `${digest}.json`);
  }

  async load(identity: SourceIdentity): Promise<CacheLookup> {
    const file = this.fileFor(identity.path);

    let content: string;
    try {
      content = await readFile(file, "utf-8");
    } catch (e) {
      if (isObject(e) && e.code === "ENOENT") {
        return { status: "miss", reason: "absent" };
      }
      console.warn(`[TimelineCache] Could not read ${file}: ${e instanceof Error ? e.message : e}`);
      return { status: "miss", reason: "corrupt" };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      const error = new CacheCorruptError(identity.path, e instanceof Error ? e.message : String(e));
      console.warn(`[TimelineCache] ${error.message}`);
      return { status: "miss", reason: "corrupt" };
    }

    if (!isCacheRecord(parsed)) {
      console.warn(`[TimelineCache] ${new CacheCorruptError(identity.path, "unexpected shape").message}`);
      return { status: "miss", reason: "corrupt" };
    }
    if (parsed.version !== this.version) {
      return { status: "miss", reason: "version" };
    }
    // Digest collision or a moved file: not ours
    if (parsed.source.path !== identity.path) {
      return { status: "miss", reason: "absent" };
    }
    if (parsed.source.modifiedMs < identity.modifiedMs) {
      return { status: "miss", reason: "stale", stale: parsed };
    }

    console.info(`[TimelineCache] Loaded ${identity.path} from cache`);
    return { status: "hit", record: parsed };
  }

  async store(identity: SourceIdentity, timeline: TimelineData): Promise<boolean> {
    const record: CacheRecord = {
      version: this.version,
      source: { path: identity.path, modifiedMs: identity.modifiedMs },
      resolution: timeline.resolution,
      tempoMap: timeline.tempoMap,
      entries: timeline.entries,
    };
    const file = this.fileFor(identity.path);
    const temp = `${file}.${process.pid}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, JSON.stringify(record), "utf-8");
      await rename(temp, file);
      return true;
    } catch (e) {
      console.warn(`[TimelineCache] Could not store ${identity.path}: ${e instanceof Error ? e.message : e}`);
      return false;
    }
  }
}
