import { Command } from "commander";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { summarizeValidation, validateScriptFile } from "@clipmesh/core";
import { configFromFlags, type GenerationFlags } from "./generate.js";
import { formatResult, parseInteger, resultToJSON, withStudio } from "./studio.js";

interface BatchOptions extends Omit<GenerationFlags, "duration" | "camera" | "image"> {
  concurrency?: string;
  json?: boolean;
}

export const batchCommand = new Command("batch")
  .description("Generate every scene of a script")
  .argument("<script>", "Script JSON file ({ scenes: [...] })")
  .option("-n, --concurrency <n>", "Generations in flight at once (default from config)")
  .option("-r, --ratio <ratio>", "Aspect ratio for every scene")
  .option("-q, --quality <quality>", "Quality for every scene")
  .option("-s, --style <style>", "Style tag for every scene")
  .option("--motion <strength>", "Motion strength between 0 and 1")
  .option("--seed <n>", "Seed for every scene")
  .option("--json", "Print the results as JSON")
  .action(async (scriptPath: string, options: BatchOptions) => {
    const validation = await validateScriptFile(resolve(process.cwd(), scriptPath));

    if (!validation.isValid) {
      console.error(chalk.red(summarizeValidation(validation)));
      if (validation.scenes.length === 0) {
        process.exitCode = 1;
        return;
      }
      console.error(chalk.yellow(`Continuing with ${validation.scenes.length} valid scene(s)`));
    } else {
      for (const warning of validation.warnings) {
        console.error(chalk.yellow(`Warning: ${warning}`));
      }
    }
    if (validation.scenes.length === 0) {
      console.log(chalk.dim("Nothing to generate"));
      return;
    }

    await withStudio(async (studio) => {
      const concurrency = parseInteger(options.concurrency, "--concurrency");

      // Per-scene fields replace the prompt
      const base = configFromFlags("(scene prompt)", options);
      const spinner = ora({
        text: `Generating ${validation.scenes.length} scene(s)...`,
        isSilent: options.json === true,
      }).start();
      const results = await studio.engine.batchGenerate(validation.scenes, base, concurrency);
      const failed = results.filter((result) => result.status === "failed").length;

      if (failed > 0) {
        spinner.warn(chalk.yellow(`${results.length - failed} started, ${failed} failed`));
        process.exitCode = 1;
      } else {
        spinner.succeed(chalk.green(`${results.length} scene(s) started`));
      }

      if (options.json) {
        const scenes = validation.scenes.map((scene, i) => ({ sceneId: scene.sceneId, ...resultToJSON(results[i]) }));
        console.log(JSON.stringify(scenes, null, 2));
        return;
      }
      validation.scenes.forEach((scene, i) => {
        console.log(`${chalk.bold(scene.sceneId.padEnd(16))} ${formatResult(results[i])}`);
      });
    });
  });
