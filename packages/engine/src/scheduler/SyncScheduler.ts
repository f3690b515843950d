/**
 * Sync Scheduler
 *
 * Owns the playback cursor and drives one tick at a fixed cadence:
 *
 *   cursor → queue passed file entries → drain into note state →
 *   predict → project frame → publish snapshot
 *
 * The tick is the only writer of the cursor and the only caller of the
 * note state's apply(). Live input only ever enqueues. Anything that goes
 * wrong inside a tick becomes a diagnostic on the next snapshot; sticky
 * diagnostics repeat on every snapshot until their condition clears.
 *
 * States: idle → loading → playing ⇄ paused → stopped
 */

import type {
  ActiveNoteRef,
  CacheRecord,
  Clock,
  ControlOp,
  ControlOpResult,
  CursorSnapshot,
  Diagnostic,
  DiagnosticCategory,
  DiagnosticListener,
  DiagnosticSeverity,
  EngineConfig,
  Frame,
  ILiveInputSink,
  ISnapshotSink,
  ITimelineCache,
  LiveInputEvent,
  MidiNoteNumber,
  Ms,
  PlaybackState,
  PredictedNote,
  Seconds,
  Snapshot,
  SourceIdentity,
  TimelineSource,
  ValidationError,
} from "@lumitone/contracts";
import {
  CacheCorruptError,
  CacheMissError,
  DeviceDisconnectedError,
  InvalidConfigurationError,
  MalformedTimelineError,
  QueueOverflowError,
  isLumitoneError,
} from "@lumitone/contracts";

import { Timeline, buildTimeline } from "../timeline/Timeline";
import { EMPTY_BATCH, calculateWindow, clampWindow, predict } from "../prediction/PredictionEngine";
import { SnapshotBroadcaster } from "../broadcast/SnapshotBroadcaster";
import {
  type EngineConfigOverrides,
  resolveEngineConfig,
  validateEngineConfig,
  validateFlag,
  validateGeometry,
  validateHandPolicy,
  validateLiveQueueCapacity,
  validateLookahead,
  validatePracticeMode,
  validatePracticeRegion,
  validatePredictionHands,
  validateTempoScale,
} from "../config/EngineConfig";
import { Session, type MelodyWait } from "./Session";

/**
 * Configuration for the SyncScheduler.
 */
export interface SyncSchedulerConfig {
  /** Engine settings merged over DEFAULT_ENGINE_CONFIG */
  config?: EngineConfigOverrides;

  /** Processed-timeline store; without one every load parses */
  cache?: ITimelineCache;

  /**
   * Receiver of snapshots.
   * @default a new SnapshotBroadcaster
   */
  sink?: ISnapshotSink;

  /**
   * Monotonic millisecond clock.
   * @default performance.now
   */
  clock?: Clock;

  /**
   * Re-channel loaded files by track so each track maps to a hand.
   * @default true
   */
  channelFromTrack?: boolean;

  /**
   * Onsets closer than this are predicted as one group.
   * @default 0
   */
  epsilonSeconds?: Seconds;
}

export type StateListener = (state: PlaybackState, previous: PlaybackState) => void;
export type ErrorListener = (error: Error) => void;

const EMPTY_FRAME: Frame = { visibleNotes: [], keyboardLayout: null };

const TIMELINE_CONDITION = "timeline";

function deviceCondition(inputId: string): string {
  return `device:${inputId}`;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class SyncScheduler implements ILiveInputSink {
  readonly id = "sync-scheduler";
  readonly sink: ISnapshotSink;

  private config: EngineConfig;
  private cache: ITimelineCache | null;
  private clock: Clock;
  private channelFromTrack: boolean;
  private epsilonSeconds: Seconds;
  private startedAt: Ms;

  private state: PlaybackState = "idle";
  /** State to return to when a load fails; kept across overlapping loads */
  private stateBeforeLoad: PlaybackState = "idle";
  private session: Session | null = null;
  private interval: ReturnType<typeof setInterval> | null = null;
  private loadGeneration = 0;

  private pending: Diagnostic[] = [];
  private sticky: Map<string, Diagnostic> = new Map();
  private diagnosticCount = 0;
  private stateListeners: Set<StateListener> = new Set();
  private diagnosticListeners: Set<DiagnosticListener> = new Set();
  private errorListeners: Set<ErrorListener> = new Set();

  constructor(config: SyncSchedulerConfig = {}) {
    this.config = resolveEngineConfig(config.config);
    const errors = validateEngineConfig(this.config);
    if (errors.length > 0) {
      throw new InvalidConfigurationError(
        errors[0].field,
        errors.map((e) => `${e.field}: ${e.reason}`).join("; ")
      );
    }

    this.cache = config.cache ?? null;
    this.clock = config.clock ?? (() => performance.now());
    this.channelFromTrack = config.channelFromTrack ?? true;
    this.epsilonSeconds = config.epsilonSeconds ?? 0;
    this.startedAt = this.clock();
    this.sink =
      config.sink ??
      new SnapshotBroadcaster({
        clock: this.clock,
        onDiagnostic: (d) => this.addDiagnostic(d),
        onSubscribe: () => this.requestKeyboardLayout(),
      });
  }

  // ---------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------

  getState(): PlaybackState {
    return this.state;
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  /** Timeline of the current session; null for live-only or no session */
  getTimeline(): Timeline | null {
    return this.session?.timeline ?? null;
  }

  getCursor(): CursorSnapshot | null {
    return this.session?.cursor() ?? null;
  }

  /** Sticky diagnostics still in effect */
  activeConditions(): Diagnostic[] {
    return Array.from(this.sticky.values());
  }

  /** Lookahead window in wall-clock seconds */
  lookaheadWindow(): Seconds {
    const { baseSeconds, skillLevel, songDifficulty, maxSeconds } = this.config.lookahead;
    return clampWindow(calculateWindow(skillLevel, songDifficulty, baseSeconds), maxSeconds);
  }

  // ---------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  onDiagnostic(listener: DiagnosticListener): () => void {
    this.diagnosticListeners.add(listener);
    return () => this.diagnosticListeners.delete(listener);
  }

  onError(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  // ---------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------

  /**
   * Load a timeline and start playing it. Rejects with the build error
   * when the source cannot be turned into a timeline; the previous
   * session is then left as it was.
   *
   * A load overtaken by a later load() or stop() resolves without
   * replacing anything.
   */
  async load(source: TimelineSource): Promise<Timeline> {
    const generation = ++this.loadGeneration;
    if (this.state !== "loading") {
      this.stateBeforeLoad = this.state;
    }
    this.session?.freeze();
    this.setState("loading");

    try {
      const { timeline, identity } = await this.resolveTimeline(source);
      if (generation !== this.loadGeneration) {
        return timeline;
      }

      this.installSession(
        new Session({
          timeline,
          source: identity,
          config: this.config,
          now: this.clock,
          onOverflow: (o) => this.report(new QueueOverflowError(o.dropped, o.capacity), "input", "warning"),
        })
      );
      this.clearCondition(TIMELINE_CONDITION);
      this.startPlayback();
      return timeline;
    } catch (e) {
      const error = toError(e);
      if (generation === this.loadGeneration) {
        const restored: PlaybackState = this.session ? this.stateBeforeLoad : "stopped";
        if (restored === "playing") {
          this.session?.thaw();
        }
        this.setState(restored);
      }

      // Only the latest load's failure stays on screen
      this.report(error, "timeline", "error", generation === this.loadGeneration ? TIMELINE_CONDITION : undefined);
      for (const listener of this.errorListeners) {
        listener(error);
      }
      throw error;
    }
  }

  /**
   * Start a session without a timeline; only live input drives it.
   */
  startLive(): void {
    this.loadGeneration++;
    this.installSession(
      new Session({
        timeline: null,
        source: null,
        config: this.config,
        now: this.clock,
        onOverflow: (o) => this.report(new QueueOverflowError(o.dropped, o.capacity), "input", "warning"),
      })
    );
    this.clearCondition(TIMELINE_CONDITION);
    this.startPlayback();
  }

  pause(): boolean {
    if (this.state !== "playing" || !this.session) return false;
    this.session.freeze();
    this.setState("paused");
    return true;
  }

  resume(): boolean {
    if (this.state !== "paused" || !this.session) return false;
    this.session.thaw();
    this.setState("playing");
    return true;
  }

  /**
   * Halt playback: releases every note, publishes a final snapshot and
   * tears the session down. Returns that final snapshot, if any.
   */
  stop(): Snapshot | null {
    this.clearTicker();
    this.loadGeneration++;

    const session = this.session;
    if (!session) {
      if (this.state !== "idle") this.setState("stopped");
      return null;
    }

    const released = session.tracker.allNotesOff();
    session.router.clear();
    this.setState("stopped");
    let snapshot: Snapshot | null = null;
    try {
      snapshot = this.publish(session, session.cursor(), [], EMPTY_FRAME);
    } catch (e) {
      this.report(e, "scheduler", "error");
    }

    session.teardown();
    this.session = null;
    console.info(`[SyncScheduler] Stopped, released ${released.length} note(s)`);
    return snapshot;
  }

  /**
   * Stop and drop every listener.
   */
  dispose(): void {
    this.stop();
    this.stateListeners.clear();
    this.diagnosticListeners.clear();
    this.errorListeners.clear();
  }

  // ---------------------------------------------------------------------
  // Input
  // ---------------------------------------------------------------------

  /**
   * Live input entry point. Never blocks; events arriving without a
   * running session are ignored.
   */
  pushLive(event: LiveInputEvent): void {
    if (!this.session || (this.state !== "playing" && this.state !== "paused")) return;
    this.session.router.pushLive(event);
  }

  /**
   * The live device went away. File playback carries on; a live-only
   * session stops.
   */
  handleDeviceDisconnected(inputId: string): void {
    this.report(new DeviceDisconnectedError(inputId), "input", "warning", deviceCondition(inputId));
    if (this.session?.isLive) {
      this.stop();
    }
  }

  /**
   * The device is back; its disconnect diagnostic clears.
   */
  handleDeviceConnected(inputId: string): void {
    this.clearCondition(deviceCondition(inputId));
  }

  /**
   * Send the full keyboard layout with the next frame, e.g. for a
   * subscriber that joined after the first one.
   */
  requestKeyboardLayout(): void {
    this.session?.projector.invalidateLayout();
  }

  // ---------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------

  /**
   * Run one tick now. Returns the published snapshot, or null when no
   * session is running or the tick failed (the failure is reported as a
   * diagnostic).
   */
  tick(): Snapshot | null {
    const session = this.session;
    if (!session || (this.state !== "playing" && this.state !== "paused")) {
      return null;
    }

    try {
      return this.step(session);
    } catch (e) {
      this.report(e, "scheduler", "error");
      return null;
    }
  }

  private step(session: Session): Snapshot | null {
    let seconds = session.cursorSeconds();
    session.advance(seconds, this.melodyWait());
    if (session.holding) {
      seconds = session.cursorSeconds();
    }
    session.router.drain(session.tracker);

    if (session.holding && session.expectationMet(this.heldLiveNotes(session))) {
      session.release();
    }

    const cursor: CursorSnapshot = {
      index: session.cursorIndex,
      seconds,
      tempoScale: session.getTempoScale(),
    };
    const window = this.lookaheadWindow();
    const finished = this.state === "playing" && session.regionFinished();

    const batch =
      session.timeline && this.showsPredictions()
        ? predict(cursor, session.timeline, session.tracker.snapshot(), window, {
            epsilonSeconds: this.epsilonSeconds,
            hands: this.config.predictionHands,
            handPolicy: this.config.handPolicy,
            endIndex: session.regionEnd,
          })
        : EMPTY_BATCH;
    const frame = session.projector.project(session.timeline, cursor, window, session.regionEnd);

    // The region's last events get one snapshot before the wrap or stop
    const snapshot = this.publish(session, cursor, batch.notes, frame);

    if (finished) {
      if (!this.config.loop || session.regionEnd <= session.regionStart) {
        return this.stop();
      }
      session.rewind();
      console.info(`[SyncScheduler] Looping region at entry ${session.regionStart}`);
    }
    return snapshot;
  }

  private melodyWait(): MelodyWait | undefined {
    if (this.config.practiceMode !== "melody") return undefined;
    return { hands: this.config.predictionHands, handPolicy: this.config.handPolicy };
  }

  private showsPredictions(): boolean {
    return this.config.showPredictions && this.config.practiceMode !== "listen";
  }

  /** Keys the learner is holding down, by note number */
  private heldLiveNotes(session: Session): Set<MidiNoteNumber> {
    const held = new Set<MidiNoteNumber>();
    for (const status of session.tracker.snapshot().notes.values()) {
      if (status.active && status.origin === "live") {
        held.add(status.note);
      }
    }
    return held;
  }

  private publish(
    session: Session,
    cursor: CursorSnapshot,
    predicted: readonly PredictedNote[],
    frame: Frame
  ): Snapshot {
    const activeNotes: ActiveNoteRef[] = [];
    for (const status of session.tracker.snapshot().notes.values()) {
      if (status.active) {
        activeNotes.push({ channel: status.channel, note: status.note });
      }
    }

    const snapshot: Snapshot = {
      sequence: ++session.sequence,
      state: this.state,
      cursorSeconds: cursor.seconds,
      cursorIndex: cursor.index,
      activeNotes,
      predictedNotes: predicted.map((p) => ({
        channel: p.channel,
        note: p.note,
        velocity: p.velocity,
        delaySeconds: p.delaySeconds,
      })),
      awaitingNotes: session.awaitingNotes(),
      frame,
      diagnostics: [...this.sticky.values(), ...this.pending.splice(0)],
    };

    this.sink.publish(snapshot);
    return snapshot;
  }

  // ---------------------------------------------------------------------
  // Control ops
  // ---------------------------------------------------------------------

  /**
   * Validate and apply a runtime control op. A rejected op changes
   * nothing.
   */
  execute(op: ControlOp): ControlOpResult {
    const session = this.session;
    let errors: ValidationError[];

    switch (op.op) {
      case "setTempoScale":
        errors = validateTempoScale(op.percent);
        if (errors.length > 0) break;
        this.config = { ...this.config, tempoScale: op.percent };
        session?.setTempoScale(op.percent);
        break;

      case "setLookahead": {
        const lookahead = { ...this.config.lookahead, ...op.patch };
        errors = validateLookahead(lookahead);
        if (errors.length > 0) break;
        this.config = { ...this.config, lookahead };
        break;
      }

      case "setHandPolicy":
        errors = validateHandPolicy(op.policy);
        if (errors.length > 0) break;
        this.config = { ...this.config, handPolicy: op.policy };
        session?.tracker.setHandPolicy(op.policy);
        session?.projector.setHandPolicy(op.policy);
        break;

      case "setPredictionHands":
        errors = validatePredictionHands(op.hands);
        if (errors.length > 0) break;
        this.config = { ...this.config, predictionHands: op.hands };
        break;

      case "setLiveQueueCapacity":
        errors = validateLiveQueueCapacity(op.capacity);
        if (errors.length > 0) break;
        this.config = { ...this.config, liveQueueCapacity: op.capacity };
        session?.router.setLiveCapacity(op.capacity);
        break;

      case "setPracticeRegion":
        errors = validatePracticeRegion(op.region);
        if (errors.length > 0) break;
        this.config = { ...this.config, practiceRegion: { ...op.region } };
        if (session) {
          session.setRegion(op.region.startPercent, op.region.endPercent);
          if (session.cursorIndex < session.regionStart || session.cursorIndex >= session.regionEnd) {
            session.rewind();
          }
        }
        break;

      case "setLoop":
        errors = validateFlag("loop", op.loop);
        if (errors.length > 0) break;
        this.config = { ...this.config, loop: op.loop };
        break;

      case "setPracticeMode":
        errors = validatePracticeMode(op.mode);
        if (errors.length > 0) break;
        this.config = { ...this.config, practiceMode: op.mode };
        if (op.mode !== "melody") {
          session?.release();
        }
        break;

      case "setShowPredictions":
        errors = validateFlag("showPredictions", op.show);
        if (errors.length > 0) break;
        this.config = { ...this.config, showPredictions: op.show };
        break;

      case "setGeometry": {
        const geometry = { ...this.config.geometry, ...op.patch };
        errors = validateGeometry(geometry);
        if (errors.length > 0) break;
        this.config = { ...this.config, geometry };
        session?.projector.setGeometry(geometry);
        break;
      }

      default: {
        const unknown: never = op;
        errors = [{ field: "op", reason: `unknown control op ${JSON.stringify(unknown)}` }];
      }
    }

    if (errors.length > 0) {
      console.warn(`[SyncScheduler] Rejected ${op.op}: ${errors.map((e) => e.reason).join("; ")}`);
      return { success: false, errors };
    }
    return { success: true };
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private async resolveTimeline(
    source: TimelineSource
  ): Promise<{ timeline: Timeline; identity: SourceIdentity }> {
    const identity = await source.identity();

    let stale: CacheRecord | undefined;
    if (this.cache) {
      const lookup = await this.cache.load(identity);
      if (lookup.status === "hit") {
        return { timeline: new Timeline(lookup.record), identity };
      }
      if (lookup.reason === "corrupt") {
        this.report(new CacheCorruptError(identity.path, "record unreadable"), "cache", "warning");
      }
      stale = lookup.stale;
    }

    let timeline: Timeline;
    try {
      const parsed = await source.read();
      timeline = buildTimeline(parsed.tracks, parsed.resolution, parsed.initialTempo, {
        channelFromTrack: this.channelFromTrack,
      });
    } catch (e) {
      if (e instanceof MalformedTimelineError && stale) {
        this.report(
          new CacheMissError(identity.path, `source is newer but unreadable (${e.message}), using stale record`),
          "cache",
          "warning"
        );
        return { timeline: new Timeline(stale), identity };
      }
      throw e;
    }

    if (this.cache) {
      const stored = await this.cache.store(identity, timeline.toData());
      if (!stored) {
        this.report(new CacheMissError(identity.path, "record could not be written"), "cache", "info");
      }
    }

    console.info(
      `[SyncScheduler] Loaded ${identity.path}: ${timeline.length} events, ${timeline.noteCount} notes`
    );
    return { timeline, identity };
  }

  private installSession(session: Session): void {
    this.session?.teardown();
    this.session = session;
  }

  private startPlayback(): void {
    this.setState("playing");
    if (this.interval === null) {
      this.interval = setInterval(() => {
        this.tick();
      }, this.config.tickIntervalMs);
    }
  }

  private clearTicker(): void {
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  private setState(state: PlaybackState): void {
    const previous = this.state;
    if (previous === state) return;
    this.state = state;
    for (const listener of this.stateListeners) {
      listener(state, previous);
    }
  }

  /**
   * Turn an error into a diagnostic. With a condition key it is sticky and
   * stays on every snapshot until clearCondition(key).
   */
  private report(
    error: unknown,
    category: DiagnosticCategory,
    severity: DiagnosticSeverity,
    condition?: string
  ): void {
    const diagnostic: Diagnostic = {
      id: `${category}-${++this.diagnosticCount}`,
      category,
      severity,
      ...(isLumitoneError(error) ? { kind: error.kind } : {}),
      message: error instanceof Error ? error.message : String(error),
      timestamp: this.clock() - this.startedAt,
      source: this.id,
      persistence: condition === undefined ? "transient" : "sticky",
    };
    this.addDiagnostic(diagnostic, condition);
  }

  private addDiagnostic(diagnostic: Diagnostic, condition?: string): void {
    if (condition === undefined) {
      this.pending.push(diagnostic);
    } else {
      this.sticky.set(condition, diagnostic);
    }

    const line = `[SyncScheduler] ${diagnostic.category}: ${diagnostic.message}`;
    if (diagnostic.severity === "error") {
      console.error(line);
    } else if (diagnostic.severity === "warning") {
      console.warn(line);
    }

    for (const listener of this.diagnosticListeners) {
      try {
        listener(diagnostic);
      } catch (e) {
        console.error(`[SyncScheduler] Diagnostic listener failed: ${toError(e).message}`);
      }
    }
  }

  private clearCondition(condition: string): void {
    if (this.sticky.delete(condition)) {
      console.info(`[SyncScheduler] Cleared ${condition}`);
    }
  }
}
