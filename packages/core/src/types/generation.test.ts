import { describe, it, expect } from "vitest";
import {
  GenerationConfig,
  failedResult,
  isCompleted,
  isFailed,
  isProcessing,
  isTerminal,
  type GenerationResult,
} from "./generation.js";

describe("GenerationConfig", () => {
  it("applies defaults", () => {
    const config = new GenerationConfig({ prompt: "a red car" });

    expect(config.duration).toBe(5);
    expect(config.aspectRatio).toBe("16:9");
    expect(config.quality).toBe("1080p");
    expect(config.motionStrength).toBe(0.5);
    expect(config.customParameters).toEqual({});
    expect(config.validate()).toBe(true);
  });

  it.each([
    [{ duration: 0 }, "Duration must be greater than 0 and at most 300s"],
    [{ duration: -1 }, "Duration must be greater than 0 and at most 300s"],
    [{ duration: 301 }, "Duration must be greater than 0 and at most 300s"],
    [{ aspectRatio: "21:9" }, "Aspect ratio '21:9' must be one of 16:9, 9:16, 1:1"],
    [{ quality: "8k" }, "Quality '8k' must be one of 720p, 1080p, 4k"],
    [{ motionStrength: 1.5 }, "Motion strength must be between 0.0 and 1.0"],
    [{ motionStrength: -0.1 }, "Motion strength must be between 0.0 and 1.0"],
    [{ seed: 1.5 }, "Seed must be an integer"],
  ])("rejects %o", (overrides, message) => {
    const config = new GenerationConfig({ prompt: "a red car", ...overrides });

    expect(config.validate()).toBe(false);
    expect(config.validationError()).toBe(message);
  });

  it("rejects a blank prompt", () => {
    const config = new GenerationConfig({ prompt: "   " });
    expect(config.validationError()).toBe("Prompt must be a non-empty string");
  });

  it("accepts the boundary values", () => {
    expect(new GenerationConfig({ prompt: "p", duration: 300, motionStrength: 0 }).validate()).toBe(true);
    expect(new GenerationConfig({ prompt: "p", duration: 0.5, motionStrength: 1, quality: "4k" }).validate()).toBe(true);
  });

  it("derives a changed copy with with()", () => {
    const base = new GenerationConfig({ prompt: "base", style: "anime", customParameters: { loop: true } });
    const derived = base.with({ prompt: "scene", duration: 3 });

    expect(derived.prompt).toBe("scene");
    expect(derived.duration).toBe(3);
    expect(derived.style).toBe("anime");
    expect(derived.customParameters).toEqual({ loop: true });
    expect(base.prompt).toBe("base");
  });

  it("serializes with custom parameters last", () => {
    const config = new GenerationConfig({ prompt: "p", customParameters: { quality: "override" } });
    const json = config.toJSON();

    expect(json.prompt).toBe("p");
    expect(json.quality).toBe("override");
    expect(json.seed).toBeNull();
  });
});

describe("result helpers", () => {
  const base: GenerationResult = { jobId: "j", status: "completed", progress: 1, metadata: {} };

  it("requires a video URL for isCompleted", () => {
    expect(isCompleted(base)).toBe(false);
    expect(isCompleted({ ...base, videoUrl: "https://cdn.test/v.mp4" })).toBe(true);
  });

  it("classifies statuses", () => {
    expect(isProcessing({ ...base, status: "queued" })).toBe(true);
    expect(isProcessing(base)).toBe(false);
    expect(isFailed({ ...base, status: "failed" })).toBe(true);
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("processing")).toBe(false);
  });

  it("builds failed results with a message", () => {
    expect(failedResult("failed_2", "boom")).toEqual({
      jobId: "failed_2",
      status: "failed",
      progress: 0,
      errorMessage: "boom",
      metadata: {},
    });
  });
});
