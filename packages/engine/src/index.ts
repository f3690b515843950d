// Time
export * from "./time/TimeConverter";

// Timeline
export { Timeline, buildTimeline, type BuildTimelineOptions } from "./timeline/Timeline";

// Note state
export {
  NoteStateTracker,
  DEFAULT_HAND_POLICY,
  handForChannel,
  type NoteStateTrackerConfig,
} from "./state/NoteStateTracker";

// Prediction
export * from "./prediction/PredictionEngine";

// Routing
export {
  EventQueueRouter,
  DEFAULT_LIVE_CAPACITY,
  type EventQueueRouterConfig,
  type RoutedEventSink,
} from "./routing/EventQueueRouter";

// Projection
export * from "./projection/FrameProjector";
export * from "./projection/colorKeys";

// Cache
export { TimelineCache, isCacheRecord, type TimelineCacheConfig } from "./cache/TimelineCache";

// Broadcast
export {
  SnapshotBroadcaster,
  deepFreeze,
  type SnapshotBroadcasterConfig,
} from "./broadcast/SnapshotBroadcaster";

// Configuration
export * from "./config/EngineConfig";

// Scheduler
export { Session, type SessionConfig, type MelodyWait } from "./scheduler/Session";
export {
  SyncScheduler,
  type SyncSchedulerConfig,
  type StateListener,
  type ErrorListener,
} from "./scheduler/SyncScheduler";
