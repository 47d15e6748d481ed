/**
 * models / stats commands
 */

import { Command } from "commander";
import chalk from "chalk";
import { withStudio } from "./studio.js";

interface JsonOption {
  json?: boolean;
}

export const modelsCommand = new Command("models")
  .description("List configured video models and what they support")
  .option("--json", "Print registry info as JSON")
  .action(async (options: JsonOption) => {
    await withStudio(async (studio) => {
      const info = studio.registry.getRegistryInfo();
      if (options.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }

      console.log(chalk.bold(`Models: ${info.enabledAdapters} enabled of ${info.totalAdapters}`));
      if (info.totalAdapters === 0) {
        console.log(chalk.dim("No models configured. Run `clipmesh setup` or set LUMA_API_KEY, RUNWAY_API_KEY, PIKA_API_KEY."));
        return;
      }
      for (const model of Object.values(info.adapters)) {
        const state = model.enabled ? chalk.green("enabled ") : chalk.dim("disabled");
        console.log();
        console.log(`${state} ${chalk.bold(model.name)}`);
        console.log(chalk.dim(`  capabilities:  ${model.capabilities.join(", ")}`));
        console.log(chalk.dim(`  aspect ratios: ${model.supportedAspectRatios.join(", ")}`));
        console.log(chalk.dim(`  qualities:     ${model.supportedQualities.join(", ")}`));
        console.log(chalk.dim(`  max duration:  ${model.maxDuration}s`));
      }
    });
  });

export const statsCommand = new Command("stats")
  .description("Show generation engine statistics")
  .option("--json", "Print statistics as JSON")
  .action(async (options: JsonOption) => {
    await withStudio(async (studio) => {
      const stats = studio.engine.getEngineStats();
      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log(chalk.bold("Engine"));
      console.log(`  strategy:          ${stats.loadBalancingStrategy}`);
      console.log(`  available models:  ${stats.availableModels}`);
      console.log(`  active requests:   ${stats.activeRequests}`);
      console.log(`  generations:       ${stats.successfulGenerations}/${stats.totalGenerations}`);
      console.log(`  success rate:      ${(stats.successRate * 100).toFixed(1)}%`);
      for (const [name, metrics] of Object.entries(stats.modelMetrics)) {
        console.log(
          chalk.dim(
            `  ${name.padEnd(8)} requests=${metrics.totalRequests} load=${metrics.currentLoad} ` +
              `avg=${metrics.averageResponseTime.toFixed(2)}s`
          )
        );
      }
    });
  });
