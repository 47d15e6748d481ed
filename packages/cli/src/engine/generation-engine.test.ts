import { describe, it, expect, vi, beforeAll } from "vitest";
import {
  BackendError,
  ErrorHandler,
  GenerationConfig,
  GenerationError,
  InvalidConfigError,
  InvalidRequestError,
  JobNotFoundError,
  NetworkError,
  NoSuitableModelError,
  UnsupportedOperationError,
  setLogLevel,
  type GenerationResult,
  type Scene,
} from "@clipmesh/core";
import {
  createModelConfig,
  describeAdapter,
  pollUntilDone,
  validateAdapterConfig,
  type VideoAdapter,
} from "@clipmesh/ai-providers";
import { GenerationEngine, isRetryable, sceneConfig, type GenerationEngineOptions } from "./generation-engine.js";

type Generate = (config: GenerationConfig) => Promise<GenerationResult>;

const pending = (jobId: string): GenerationResult => ({ jobId, status: "pending", progress: 0, metadata: {} });

function fakeAdapter(
  name: string,
  options: { generate?: Generate; aspectRatios?: string[]; maxDuration?: number; enabled?: boolean } = {}
) {
  const limits = {
    name,
    supportedAspectRatios: options.aspectRatios ?? ["16:9", "9:16", "1:1"],
    supportedQualities: ["720p", "1080p"],
    maxDuration: options.maxDuration ?? 10,
  };
  const generate = vi.fn<Generate>(options.generate ?? (async () => pending(`${name}-job`)));
  const getStatus = vi.fn(async (jobId: string): Promise<GenerationResult> => {
    throw new JobNotFoundError(`Not found: ${jobId}`);
  });
  const cancelJob = vi.fn(async (_jobId: string) => false);
  const close = vi.fn(async () => {});
  const adapter: VideoAdapter = {
    ...limits,
    enabled: options.enabled ?? true,
    capabilities: ["text-to-video"],
    generate,
    getStatus,
    cancelJob,
    validateConfig: (config) => validateAdapterConfig(limits, config),
    waitForCompletion: (jobId, wait) => pollUntilDone(adapter, jobId, wait),
    getModelInfo: () => describeAdapter(adapter, createModelConfig({ name, apiKey: "test-secret" })),
    close,
  };
  return { adapter, generate, getStatus, cancelJob, close };
}

function makeEngine(adapters: VideoAdapter[], options: GenerationEngineOptions = {}) {
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const errorHandler = options.errorHandler ?? new ErrorHandler({ sleep: () => Promise.resolve() });
  const engine = new GenerationEngine({ errorHandler, sleep, now: () => Date.UTC(2026, 2, 4, 5, 6, 7), ...options });
  for (const adapter of adapters) engine.registerAdapter(adapter);
  return { engine, sleep, errorHandler };
}

const carConfig = () =>
  new GenerationConfig({ prompt: "a red car", duration: 5, aspectRatio: "16:9", quality: "1080p", motionStrength: 0.5 });

const failWith = (error: Error): Generate => async () => {
  throw error;
};

beforeAll(() => {
  setLogLevel("silent");
});

describe("isRetryable", () => {
  it.each([
    [new InvalidRequestError("bad"), false],
    [new InvalidConfigError("bad"), false],
    [new NoSuitableModelError("none"), false],
    [new BackendError("auth", 401), false],
    [new BackendError("down", 503), true],
    [new BackendError("unknown"), true],
    [new NetworkError("reset"), true],
  ])("%s -> %s", (error, expected) => {
    expect(isRetryable(error)).toBe(expected);
  });
});

describe("sceneConfig", () => {
  it("takes shot fields from the scene and the rest from the base request", () => {
    const base = new GenerationConfig({
      prompt: "base",
      referenceImage: "https://cdn.test/base.png",
      aspectRatio: "9:16",
      quality: "720p",
      style: "anime",
      motionStrength: 0.8,
      seed: 3,
      customParameters: { loop: true },
    });
    const scene: Scene = { sceneId: "s1", visualPrompt: "A harbour at dawn", duration: 4, cameraMovement: "pan_left" };

    const config = sceneConfig(scene, base);

    expect(config.toInit()).toEqual({
      prompt: "A harbour at dawn",
      referenceImage: undefined,
      duration: 4,
      aspectRatio: "9:16",
      quality: "720p",
      style: "anime",
      cameraMovement: "pan_left",
      motionStrength: 0.8,
      seed: 3,
      customParameters: { loop: true },
    });
  });
});

describe("GenerationEngine", () => {
  describe("generateVideo", () => {
    it("dispatches to the only suitable adapter", async () => {
      const alpha = fakeAdapter("alpha");
      const { engine } = makeEngine([alpha.adapter]);

      const result = await engine.generateVideo(carConfig());

      expect(result.jobId).toBe("alpha-job");
      expect(result.status).toBe("pending");
      expect(result.metadata.adapter).toBe("alpha");
      expect(engine.getEngineStats()).toMatchObject({ totalGenerations: 1, successfulGenerations: 1, successRate: 1 });
    });

    it("fails at once when no adapter accepts the request", async () => {
      const alpha = fakeAdapter("alpha", { aspectRatios: ["16:9"] });
      const { engine, sleep } = makeEngine([alpha.adapter]);
      const config = carConfig().with({ aspectRatio: "21:9" });

      const failure = engine.generateVideo(config);

      await expect(failure).rejects.toBeInstanceOf(NoSuitableModelError);
      await expect(failure).rejects.toThrow(
        "No suitable model found for the request: Aspect ratio '21:9' must be one of 16:9, 9:16, 1:1"
      );
      expect(alpha.generate).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
    });

    it("names each rejecting adapter", async () => {
      const short = fakeAdapter("short", { maxDuration: 3 });
      const { engine } = makeEngine([short.adapter]);

      const selection = engine.selectModelForConfig(carConfig());

      expect(selection.ok).toBe(false);
      if (!selection.ok) {
        expect(selection.error.message).toBe("No suitable model found for the request");
        expect(selection.error.rejections).toEqual({ short: "Duration 5s exceeds maximum 3s for short" });
      }
    });

    it("falls back to another adapter after a transient failure", async () => {
      const alpha = fakeAdapter("alpha", { generate: failWith(new NetworkError("Network error after 3 retries: reset")) });
      const beta = fakeAdapter("beta");
      const { engine, sleep } = makeEngine([alpha.adapter, beta.adapter]);

      const result = await engine.generateVideo(carConfig());

      expect(result.jobId).toBe("beta-job");
      expect(sleep.mock.calls).toEqual([[1000]]);
      const { modelMetrics } = engine.getEngineStats();
      expect(modelMetrics.alpha).toMatchObject({ totalRequests: 1, successRate: 0, currentLoad: 0 });
      expect(modelMetrics.beta).toMatchObject({ totalRequests: 1, successRate: 1, currentLoad: 0 });
    });

    it("tries at most maxRetries + 1 distinct adapters", async () => {
      const fakes = ["a", "b", "c", "d", "e"].map((name) =>
        fakeAdapter(name, { generate: failWith(new NetworkError(`${name} unreachable`)) })
      );
      const { engine, errorHandler } = makeEngine(
        fakes.map((fake) => fake.adapter),
        { maxRetries: 3 }
      );

      const error = await engine.generateVideo(carConfig()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GenerationError);
      expect(error instanceof GenerationError && error.retryCount).toBe(3);
      expect(error instanceof Error && error.message).toBe("Generation failed after 3 retries: d unreachable");
      expect(fakes.map((fake) => fake.generate.mock.calls.length)).toEqual([1, 1, 1, 1, 0]);

      const [info] = errorHandler.getRecentErrors(1);
      expect(info.category).toBe("generation");
      expect(info.modelName).toBe("d");
      expect(info.retryCount).toBe(3);
    });

    it("gives up without a delay when no other adapter is left", async () => {
      const alpha = fakeAdapter("alpha", { generate: failWith(new NetworkError("reset")) });
      const { engine, sleep } = makeEngine([alpha.adapter]);

      await expect(engine.generateVideo(carConfig())).rejects.toThrow("Generation failed after 0 retries: reset");
      expect(sleep).not.toHaveBeenCalled();
    });

    it.each([new InvalidRequestError("Invalid request: prompt too long"), new BackendError("Authentication failed", 401)])(
      "does not fall back after %s",
      async (failure) => {
        const alpha = fakeAdapter("alpha", { generate: failWith(failure) });
        const beta = fakeAdapter("beta");
        const { engine } = makeEngine([alpha.adapter, beta.adapter]);

        await expect(engine.generateVideo(carConfig())).rejects.toBeInstanceOf(GenerationError);
        expect(beta.generate).not.toHaveBeenCalled();
      }
    );

    it("uses a preferred model that accepts the request", async () => {
      const alpha = fakeAdapter("alpha");
      const beta = fakeAdapter("beta");
      const { engine } = makeEngine([alpha.adapter, beta.adapter]);

      const result = await engine.generateVideo(carConfig(), { preferredModel: "beta" });

      expect(result.jobId).toBe("beta-job");
    });

    it("ignores a preferred model that rejects the request", async () => {
      const alpha = fakeAdapter("alpha");
      const short = fakeAdapter("short", { maxDuration: 3 });
      const { engine } = makeEngine([alpha.adapter, short.adapter]);

      const result = await engine.generateVideo(carConfig(), { preferredModel: "short" });

      expect(result.jobId).toBe("alpha-job");
    });

    it("stamps requests with a dated id", async () => {
      const alpha = fakeAdapter("alpha", { generate: failWith(new NetworkError("reset")) });
      const { engine } = makeEngine([alpha.adapter], { random: () => 0 });

      const error = await engine.generateVideo(carConfig()).catch((e: unknown) => e);

      expect(error instanceof GenerationError && error.details.requestId).toBe("gen_20260304_050607_1000");
    });

    it("short-circuits an adapter whose breaker is open", async () => {
      const errorHandler = new ErrorHandler({ breaker: { threshold: 2 }, sleep: () => Promise.resolve() });
      const alpha = fakeAdapter("alpha", { generate: failWith(new NetworkError("reset")) });
      const { engine } = makeEngine([alpha.adapter], { errorHandler });

      await expect(engine.generateVideo(carConfig())).rejects.toThrow("reset");
      await expect(engine.generateVideo(carConfig())).rejects.toThrow("reset");
      await expect(engine.generateVideo(carConfig())).rejects.toThrow(
        "Generation failed after 0 retries: Service temporarily unavailable due to repeated failures"
      );

      expect(alpha.generate).toHaveBeenCalledTimes(2);
      expect(engine.getEngineStats().modelMetrics.alpha.totalRequests).toBe(2);
    });
  });

  describe("load balancing", () => {
    it("picks the least loaded adapter and breaks ties by order", async () => {
      let finish: (result: GenerationResult) => void = () => {};
      const alpha = fakeAdapter("alpha", {
        generate: () =>
          new Promise<GenerationResult>((resolve) => {
            finish = resolve;
          }),
      });
      const beta = fakeAdapter("beta");
      const { engine } = makeEngine([alpha.adapter, beta.adapter]);

      const first = engine.selectModelForConfig(carConfig());
      expect(first.ok && first.value.name).toBe("alpha");

      const running = engine.generateVideo(carConfig());
      await Promise.resolve();
      expect(engine.getEngineStats()).toMatchObject({ activeRequests: 1 });

      const second = engine.selectModelForConfig(carConfig());
      expect(second.ok && second.value.name).toBe("beta");

      finish(pending("alpha-job"));
      await expect(running).resolves.toMatchObject({ jobId: "alpha-job" });
      expect(engine.getEngineStats().activeRequests).toBe(0);
    });

    it("cycles round-robin across calls", () => {
      const names = ["a", "b", "c"];
      const { engine } = makeEngine(
        names.map((name) => fakeAdapter(name).adapter),
        { strategy: "round-robin" }
      );

      const picks = [1, 2, 3, 4].map(() => {
        const selection = engine.selectModelForConfig(carConfig());
        return selection.ok ? selection.value.name : undefined;
      });

      expect(picks).toEqual(["a", "b", "c", "a"]);
    });

    it("can switch strategy at run time", () => {
      const { engine } = makeEngine([fakeAdapter("a").adapter, fakeAdapter("b").adapter], { random: () => 0.99 });

      engine.setLoadBalancingStrategy("random");

      const selection = engine.selectModelForConfig(carConfig());
      expect(selection.ok && selection.value.name).toBe("b");
      expect(engine.getEngineStats().loadBalancingStrategy).toBe("random");
    });
  });

  describe("batchGenerate", () => {
    const scenes: Scene[] = [
      { sceneId: "s1", visualPrompt: "opening", duration: 3 },
      { sceneId: "s2", visualPrompt: "rejected", duration: 3 },
      { sceneId: "s3", visualPrompt: "closing", duration: 3 },
    ];

    it("returns one result per scene in input order", async () => {
      const alpha = fakeAdapter("alpha", {
        generate: async (config) => {
          if (config.prompt === "rejected") throw new InvalidRequestError("Invalid request: blocked prompt");
          return pending(`job-${config.prompt}`);
        },
      });
      const { engine } = makeEngine([alpha.adapter]);

      const results = await engine.batchGenerate(scenes, carConfig());

      expect(results.map((result) => result.jobId)).toEqual(["job-opening", "failed_1", "job-closing"]);
      expect(results[1]).toMatchObject({
        status: "failed",
        errorMessage: "Generation failed after 0 retries: Invalid request: blocked prompt",
      });
    });

    it("keeps no more than maxConcurrent generations in flight", async () => {
      let inFlight = 0;
      let peak = 0;
      const alpha = fakeAdapter("alpha", {
        generate: async (config) => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 1));
          inFlight--;
          return pending(config.prompt);
        },
      });
      const { engine } = makeEngine([alpha.adapter]);
      const many = [1, 2, 3, 4, 5].map((n) => ({ sceneId: `s${n}`, visualPrompt: `shot ${n}`, duration: 2 }));

      const results = await engine.batchGenerate(many, carConfig(), 2);

      expect(results.map((result) => result.jobId)).toEqual(["shot 1", "shot 2", "shot 3", "shot 4", "shot 5"]);
      expect(peak).toBe(2);
    });

    it("returns nothing for no scenes", async () => {
      const { engine } = makeEngine([fakeAdapter("alpha").adapter]);
      await expect(engine.batchGenerate([], carConfig())).resolves.toEqual([]);
    });
  });

  describe("job status and cancellation", () => {
    it("asks each adapter in turn for a job", async () => {
      const alpha = fakeAdapter("alpha");
      const beta = fakeAdapter("beta");
      beta.getStatus.mockResolvedValue({ jobId: "j-1", status: "processing", progress: 0.4, metadata: {} });
      const { engine } = makeEngine([alpha.adapter, beta.adapter]);

      const result = await engine.getJobStatus("j-1");

      expect(result.progress).toBe(0.4);
      expect(alpha.getStatus).toHaveBeenCalledWith("j-1");
    });

    it("fails when no adapter knows the job", async () => {
      const { engine } = makeEngine([fakeAdapter("alpha").adapter, fakeAdapter("beta").adapter]);

      const failure = engine.getJobStatus("j-404");
      await expect(failure).rejects.toBeInstanceOf(JobNotFoundError);
      await expect(failure).rejects.toThrow("Job j-404 not found in any model");
    });

    it("lets a named model's error through", async () => {
      const alpha = fakeAdapter("alpha");
      const { engine } = makeEngine([alpha.adapter, fakeAdapter("beta").adapter]);

      await expect(engine.getJobStatus("j-1", "alpha")).rejects.toThrow("Not found: j-1");
    });

    it("cancels on the first adapter that accepts", async () => {
      const alpha = fakeAdapter("alpha");
      alpha.cancelJob.mockRejectedValue(new UnsupportedOperationError("Luma does not support cancelling"));
      const beta = fakeAdapter("beta");
      beta.cancelJob.mockResolvedValue(true);
      const { engine } = makeEngine([alpha.adapter, beta.adapter]);

      await expect(engine.cancelJob("j-1")).resolves.toBe(true);
    });

    it("waits on the adapter that knows the job", async () => {
      const alpha = fakeAdapter("alpha");
      const beta = fakeAdapter("beta");
      beta.getStatus.mockResolvedValue({
        jobId: "j-1",
        status: "completed",
        progress: 1,
        videoUrl: "https://cdn.test/j-1.mp4",
        metadata: {},
      });
      const { engine } = makeEngine([alpha.adapter, beta.adapter]);

      const result = await engine.waitForCompletion("j-1");

      expect(result.videoUrl).toBe("https://cdn.test/j-1.mp4");
      await expect(engine.waitForCompletion("j-2", "alpha")).rejects.toThrow("Not found: j-2");
    });

    it("reports false when nothing cancels", async () => {
      const { engine } = makeEngine([fakeAdapter("alpha").adapter]);
      await expect(engine.cancelJob("j-1")).resolves.toBe(false);
    });
  });

  describe("lifecycle", () => {
    it("describes a model with its metrics", async () => {
      const { engine } = makeEngine([fakeAdapter("alpha").adapter]);
      await engine.generateVideo(carConfig());

      const info = engine.getModelInfo("alpha");

      expect(info?.maxDuration).toBe(10);
      expect(info?.metrics).toMatchObject({ totalRequests: 1, successRate: 1, currentLoad: 0 });
      expect(engine.getModelInfo("missing")).toBeUndefined();
    });

    it("counts only enabled models as available", () => {
      const { engine } = makeEngine([fakeAdapter("on").adapter, fakeAdapter("off", { enabled: false }).adapter]);

      expect(engine.getAvailableModels()).toEqual(["on"]);
      expect(engine.getEngineStats().availableModels).toBe(1);
    });

    it("stops selecting an unregistered adapter", () => {
      const alpha = fakeAdapter("alpha");
      const { engine } = makeEngine([alpha.adapter, fakeAdapter("beta").adapter]);

      expect(engine.unregisterAdapter("alpha")).toBe(true);

      const selection = engine.selectModelForConfig(carConfig(), "alpha");
      expect(selection.ok && selection.value.name).toBe("beta");
      expect(Object.keys(engine.getEngineStats().modelMetrics)).toEqual(["beta"]);
    });

    it("closes every adapter on shutdown", async () => {
      const alpha = fakeAdapter("alpha");
      const beta = fakeAdapter("beta");
      const { engine } = makeEngine([alpha.adapter, beta.adapter]);

      await engine.shutdown();

      expect(alpha.close).toHaveBeenCalledTimes(1);
      expect(beta.close).toHaveBeenCalledTimes(1);
      expect(engine.getAvailableModels()).toEqual([]);
      expect(engine.getEngineStats().modelMetrics).toEqual({});
    });
  });
});
