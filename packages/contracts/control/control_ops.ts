import type { Percent } from "../core/time";
import type { LookaheadConfig, PracticeMode } from "../config/config";
import type { FlyingNotesGeometry } from "../frame/frame";
import type { HandPolicy } from "../notes/notes";
import type { HandSelection } from "../prediction/prediction";
import type { PracticeRegion } from "../timeline/timeline";

/**
 * Runtime control operations accepted by the scheduler.
 *
 * Each op is validated before it is applied; a rejected op leaves the
 * previous value in place.
 */
export type ControlOp =
  | { op: "setTempoScale"; percent: Percent }
  | { op: "setLookahead"; patch: Partial<LookaheadConfig> }
  | { op: "setHandPolicy"; policy: HandPolicy }
  | { op: "setPredictionHands"; hands: HandSelection }
  | { op: "setLiveQueueCapacity"; capacity: number }
  | { op: "setPracticeRegion"; region: PracticeRegion }
  | { op: "setLoop"; loop: boolean }
  | { op: "setPracticeMode"; mode: PracticeMode }
  | { op: "setShowPredictions"; show: boolean }
  | { op: "setGeometry"; patch: Partial<FlyingNotesGeometry> };
