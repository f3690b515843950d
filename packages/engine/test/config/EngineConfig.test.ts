import { describe, it, expect } from "vitest";
import {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  validateEngineConfig,
  validateHandPolicy,
  validateFlag,
  validateLookahead,
  validatePracticeMode,
  validatePracticeRegion,
} from "../../src/config/EngineConfig";

describe("EngineConfig", () => {
  it("accepts the defaults", () => {
    expect(validateEngineConfig(DEFAULT_ENGINE_CONFIG)).toEqual([]);
  });

  it("reports every invalid field", () => {
    const errors = validateEngineConfig({
      ...DEFAULT_ENGINE_CONFIG,
      tempoScale: 0,
      liveQueueCapacity: 0,
      practiceRegion: { startPercent: 60, endPercent: 40 },
      tickIntervalMs: -5,
    });

    expect(errors.map((e) => e.field)).toEqual([
      "tempoScale",
      "liveQueueCapacity",
      "practiceRegion",
      "tickIntervalMs",
    ]);
  });

  it("checks lookahead parameters", () => {
    const errors = validateLookahead({ baseSeconds: 0, skillLevel: -1, songDifficulty: 2, maxSeconds: 5 });
    expect(errors.map((e) => e.field)).toEqual(["lookahead.baseSeconds", "lookahead.skillLevel"]);
  });

  it("checks hand policy channels", () => {
    expect(validateHandPolicy({ channels: { 16: "right" }, fallback: "left" })).toEqual([
      { field: "handPolicy.channels", reason: "channel 16 is outside 0-15" },
    ]);
  });

  it("allows the full region but not an empty one", () => {
    expect(validatePracticeRegion({ startPercent: 0, endPercent: 100 })).toEqual([]);
    expect(validatePracticeRegion({ startPercent: 30, endPercent: 30 })).toHaveLength(1);
  });

  it("knows the three practice modes", () => {
    expect(validatePracticeMode("melody")).toEqual([]);
    expect(validatePracticeMode("listen")).toEqual([]);
    expect(validatePracticeMode("karaoke")).toEqual([
      { field: "practiceMode", reason: "unknown mode karaoke", hint: "melody, rhythm or listen" },
    ]);
  });

  it("requires boolean flags", () => {
    expect(validateFlag("showPredictions", false)).toEqual([]);
    expect(validateFlag("showPredictions", "yes")).toEqual([{ field: "showPredictions", reason: "must be a boolean" }]);
  });

  it("merges nested overrides field by field", () => {
    const config = resolveEngineConfig({ lookahead: { skillLevel: 3 }, geometry: { canvasHeight: 720 } });

    expect(config.lookahead).toEqual({ baseSeconds: 2, skillLevel: 3, songDifficulty: 0, maxSeconds: 10 });
    expect(config.geometry.canvasHeight).toBe(720);
    expect(config.geometry.fallDistance).toBe(520);
    expect(config.tempoScale).toBe(100);
    expect(config.practiceMode).toBe("rhythm");
    expect(config.showPredictions).toBe(true);
  });
});
