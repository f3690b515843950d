import type { Ms, Percent, Seconds } from "../core/time";
import type { FlyingNotesGeometry } from "../frame/frame";
import type { HandPolicy } from "../notes/notes";
import type { HandSelection } from "../prediction/prediction";
import type { PracticeRegion } from "../timeline/timeline";

export interface LookaheadConfig {
  /** Window for a beginner on an easy song */
  baseSeconds: Seconds;
  /** Learner skill, 0 upwards */
  skillLevel: number;
  /** Song difficulty, 0 upwards */
  songDifficulty: number;
  /** Upper bound applied to the computed window */
  maxSeconds: Seconds;
}

/**
 * How playback treats the learner:
 * - "melody": the cursor waits at each group of onsets until the learner
 *   holds every expected key
 * - "rhythm": real time, with predictions as cues
 * - "listen": real time, nobody plays along, so no predictions
 */
export type PracticeMode = "melody" | "rhythm" | "listen";

/**
 * Everything the engine reads from the (external) settings store.
 */
export interface EngineConfig {
  /** Playback speed, 100 = as written */
  tempoScale: Percent;
  lookahead: LookaheadConfig;
  handPolicy: HandPolicy;
  predictionHands: HandSelection;
  liveQueueCapacity: number;
  /** Tick cadence; 16 ms keeps 60 updates per second */
  tickIntervalMs: Ms;
  practiceRegion: PracticeRegion;
  loop: boolean;
  practiceMode: PracticeMode;
  /** Publish predicted notes on each snapshot */
  showPredictions: boolean;
  geometry: FlyingNotesGeometry;
}
