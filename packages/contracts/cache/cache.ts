import type { SourceIdentity, TimelineData } from "../timeline/timeline";

/**
 * Bump on any change to the record shape; older records become misses.
 */
export const CACHE_FORMAT_VERSION = 1;

export interface CacheRecord extends TimelineData {
  version: number;
  source: SourceIdentity;
}

export type CacheMissReason = "absent" | "stale" | "version" | "corrupt";

export type CacheLookup =
  | { status: "hit"; record: CacheRecord }
  | {
      status: "miss";
      reason: CacheMissReason;
      /** The outdated record for a stale miss, usable as a last resort */
      stale?: CacheRecord;
    };
