/**
 * generate / status / cancel commands
 */

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { GenerationConfig, type GenerationConfigInit } from "@clipmesh/core";
import { formatResult, parseInteger, parseNumber, resultToJSON, withStudio } from "./studio.js";

export interface GenerationFlags {
  duration?: string;
  ratio?: string;
  quality?: string;
  style?: string;
  camera?: string;
  motion?: string;
  seed?: string;
  image?: string;
}

/**
 * Request settings from command flags; anything not given keeps its default
 */
export function configFromFlags(prompt: string, flags: GenerationFlags): GenerationConfig {
  const init: GenerationConfigInit = { prompt };
  const duration = parseNumber(flags.duration, "--duration");
  const motion = parseNumber(flags.motion, "--motion");
  const seed = parseInteger(flags.seed, "--seed");
  if (duration !== undefined) init.duration = duration;
  if (motion !== undefined) init.motionStrength = motion;
  if (seed !== undefined) init.seed = seed;
  if (flags.ratio) init.aspectRatio = flags.ratio;
  if (flags.quality) init.quality = flags.quality;
  if (flags.style) init.style = flags.style;
  if (flags.camera) init.cameraMovement = flags.camera;
  if (flags.image) init.referenceImage = flags.image;
  return new GenerationConfig(init);
}

interface GenerateOptions extends GenerationFlags {
  model?: string;
  apiKey?: string;
  priority?: string;
  wait?: boolean;
  timeout?: string;
  json?: boolean;
}

export const generateCommand = new Command("generate")
  .description("Generate a video clip from a text prompt")
  .argument("<prompt>", "What the clip should show")
  .option("-m, --model <name>", "Preferred model (luma, runway, pika)")
  .option("-k, --api-key <key>", "API key for --model (overrides config and env)")
  .option("-d, --duration <seconds>", "Clip length in seconds")
  .option("-r, --ratio <ratio>", "Aspect ratio (16:9, 9:16, 1:1)")
  .option("-q, --quality <quality>", "Quality (720p, 1080p, 4k)")
  .option("-s, --style <style>", "Style tag")
  .option("-c, --camera <movement>", "Camera movement (zoom_in, pan_left, ...)")
  .option("--motion <strength>", "Motion strength between 0 and 1")
  .option("--seed <n>", "Seed for reproducible output")
  .option("-i, --image <url>", "Reference image URL or asset id")
  .option("-p, --priority <n>", "Request priority", "0")
  .option("-w, --wait", "Wait until the video is ready")
  .option("-t, --timeout <seconds>", "How long --wait may take", "600")
  .option("--json", "Print the result as JSON")
  .action(async (prompt: string, options: GenerateOptions) => {
    await withStudio(async (studio) => {
      const config = configFromFlags(prompt, options);
      const priority = parseInteger(options.priority, "--priority") ?? 0;
      const spinner = ora({ text: "Starting generation...", isSilent: options.json === true }).start();

      try {
        let result = await studio.engine.generateVideo(config, { preferredModel: options.model, priority });
        const owner = typeof result.metadata.adapter === "string" ? result.metadata.adapter : undefined;
        spinner.succeed(chalk.green(`Job ${result.jobId} started on ${owner ?? "an unknown model"}`));

        if (options.wait) {
          const timeoutMs = (parseNumber(options.timeout, "--timeout") ?? 600) * 1000;
          spinner.start("Waiting for the video...");
          result = await studio.engine.waitForCompletion(result.jobId, owner, { timeoutMs });
          spinner.succeed(chalk.green("Video ready"));
        }

        if (options.json) {
          console.log(JSON.stringify(resultToJSON(result), null, 2));
          return;
        }
        console.log(formatResult(result));
        if (result.estimatedCompletion) {
          console.log(chalk.dim(`Estimated completion: ${result.estimatedCompletion.toISOString()}`));
        }
      } catch (error) {
        spinner.fail(chalk.red("Generation failed"));
        throw error;
      }
    }, { model: options.model, apiKey: options.apiKey });
  });

interface JobOptions {
  model?: string;
  json?: boolean;
}

export const statusCommand = new Command("status")
  .description("Show the status of a generation job")
  .argument("<jobId>", "Job id returned by generate")
  .option("-m, --model <name>", "Model that owns the job")
  .option("--json", "Print the result as JSON")
  .action(async (jobId: string, options: JobOptions) => {
    await withStudio(async (studio) => {
      const result = await studio.engine.getJobStatus(jobId, options.model);
      console.log(options.json ? JSON.stringify(resultToJSON(result), null, 2) : formatResult(result));
    });
  });

export const cancelCommand = new Command("cancel")
  .description("Cancel a running generation job")
  .argument("<jobId>", "Job id returned by generate")
  .option("-m, --model <name>", "Model that owns the job")
  .action(async (jobId: string, options: JobOptions) => {
    await withStudio(async (studio) => {
      if (await studio.engine.cancelJob(jobId, options.model)) {
        console.log(chalk.green(`Cancelled ${jobId}`));
        return;
      }
      console.log(chalk.yellow(`Could not cancel ${jobId}`));
      process.exitCode = 1;
    });
  });
