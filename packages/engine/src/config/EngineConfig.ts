/**
 * Engine configuration defaults and validation.
 *
 * Validation reports every problem at once; callers decide whether to
 * reject the whole config or a single control op.
 */

import type {
  EngineConfig,
  FlyingNotesGeometry,
  HandPolicy,
  HandSelection,
  LookaheadConfig,
  PracticeRegion,
  ValidationError,
} from "@lumitone/contracts";

import { DEFAULT_HAND_POLICY } from "../state/NoteStateTracker";
import { DEFAULT_LIVE_CAPACITY } from "../routing/EventQueueRouter";
import { BASE_WINDOW_SECONDS } from "../prediction/PredictionEngine";
import { DEFAULT_GEOMETRY } from "../projection/FrameProjector";

export const DEFAULT_LOOKAHEAD: LookaheadConfig = {
  baseSeconds: BASE_WINDOW_SECONDS,
  skillLevel: 0,
  songDifficulty: 0,
  maxSeconds: 10,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  tempoScale: 100,
  lookahead: DEFAULT_LOOKAHEAD,
  handPolicy: DEFAULT_HAND_POLICY,
  predictionHands: "both",
  liveQueueCapacity: DEFAULT_LIVE_CAPACITY,
  tickIntervalMs: 16,
  practiceRegion: { startPercent: 0, endPercent: 100 },
  loop: false,
  practiceMode: "rhythm",
  showPredictions: true,
  geometry: DEFAULT_GEOMETRY,
};

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export function validateTempoScale(percent: number): ValidationError[] {
  if (isPositive(percent)) return [];
  return [{ field: "tempoScale", reason: `must be a positive percentage, got ${percent}`, hint: "100 plays as written" }];
}

export function validateLookahead(lookahead: LookaheadConfig): ValidationError[] {
  const errors: ValidationError[] = [];
  if (!isPositive(lookahead.baseSeconds)) {
    errors.push({ field: "lookahead.baseSeconds", reason: `must be > 0, got ${lookahead.baseSeconds}` });
  }
  if (!isNonNegative(lookahead.skillLevel)) {
    errors.push({ field: "lookahead.skillLevel", reason: `must be >= 0, got ${lookahead.skillLevel}` });
  }
  if (!isNonNegative(lookahead.songDifficulty)) {
    errors.push({
      field: "lookahead.songDifficulty",
      reason: `must be >= 0, got ${lookahead.songDifficulty}`,
    });
  }
  if (!isPositive(lookahead.maxSeconds)) {
    errors.push({ field: "lookahead.maxSeconds", reason: `must be > 0, got ${lookahead.maxSeconds}` });
  }
  return errors;
}

export function validateHandPolicy(policy: HandPolicy): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const [channel, hand] of Object.entries(policy.channels)) {
    const n = Number(channel);
    if (!Number.isInteger(n) || n < 0 || n > 15) {
      errors.push({ field: "handPolicy.channels", reason: `channel ${channel} is outside 0-15` });
    }
    if (hand !== "left" && hand !== "right") {
      errors.push({ field: `handPolicy.channels.${channel}`, reason: `unknown hand ${hand}` });
    }
  }
  if (policy.fallback !== "left" && policy.fallback !== "right") {
    errors.push({ field: "handPolicy.fallback", reason: `unknown hand ${policy.fallback}` });
  }
  return errors;
}

export function validatePredictionHands(hands: HandSelection): ValidationError[] {
  if (hands === "both" || hands === "left" || hands === "right") return [];
  return [{ field: "predictionHands", reason: `unknown selection ${hands}`, hint: "both, left or right" }];
}

export function validateLiveQueueCapacity(capacity: number): ValidationError[] {
  if (Number.isInteger(capacity) && capacity >= 1) return [];
  return [{ field: "liveQueueCapacity", reason: `must be a positive integer, got ${capacity}` }];
}

export function validatePracticeRegion(region: PracticeRegion): ValidationError[] {
  const { startPercent, endPercent } = region;
  if (
    isNonNegative(startPercent) &&
    Number.isFinite(endPercent) &&
    endPercent <= 100 &&
    startPercent < endPercent
  ) {
    return [];
  }
  return [
    {
      field: "practiceRegion",
      reason: `invalid range ${startPercent}..${endPercent}`,
      hint: "0 <= startPercent < endPercent <= 100",
    },
  ];
}

export function validatePracticeMode(mode: string): ValidationError[] {
  if (mode === "melody" || mode === "rhythm" || mode === "listen") return [];
  return [{ field: "practiceMode", reason: `unknown mode ${mode}`, hint: "melody, rhythm or listen" }];
}

export function validateFlag(field: string, value: unknown): ValidationError[] {
  return typeof value === "boolean" ? [] : [{ field, reason: "must be a boolean" }];
}

export function validateGeometry(geometry: FlyingNotesGeometry): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const field of ["canvasHeight", "keyboardHeight", "fallDistance", "noteHeight"] as const) {
    if (!isPositive(geometry[field])) {
      errors.push({ field: `geometry.${field}`, reason: `must be > 0, got ${geometry[field]}` });
    }
  }
  return errors;
}

export function validateEngineConfig(config: EngineConfig): ValidationError[] {
  const errors: ValidationError[] = [
    ...validateTempoScale(config.tempoScale),
    ...validateLookahead(config.lookahead),
    ...validateHandPolicy(config.handPolicy),
    ...validatePredictionHands(config.predictionHands),
    ...validateLiveQueueCapacity(config.liveQueueCapacity),
    ...validatePracticeRegion(config.practiceRegion),
    ...validateGeometry(config.geometry),
    ...validateFlag("loop", config.loop),
    ...validatePracticeMode(config.practiceMode),
    ...validateFlag("showPredictions", config.showPredictions),
  ];
  if (!isPositive(config.tickIntervalMs)) {
    errors.push({ field: "tickIntervalMs", reason: `must be > 0, got ${config.tickIntervalMs}` });
  }
  return errors;
}

/**
 * Engine settings where nested groups may be given in part.
 */
export type EngineConfigOverrides = Partial<
  Omit<EngineConfig, "lookahead" | "practiceRegion" | "geometry">
> & {
  lookahead?: Partial<LookaheadConfig>;
  practiceRegion?: Partial<PracticeRegion>;
  geometry?: Partial<FlyingNotesGeometry>;
};

/**
 * Merge overrides over the defaults, nested groups field by field.
 */
export function resolveEngineConfig(partial: EngineConfigOverrides = {}): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...partial,
    lookahead: { ...DEFAULT_ENGINE_CONFIG.lookahead, ...partial.lookahead },
    practiceRegion: { ...DEFAULT_ENGINE_CONFIG.practiceRegion, ...partial.practiceRegion },
    geometry: { ...DEFAULT_ENGINE_CONFIG.geometry, ...partial.geometry },
  };
}
