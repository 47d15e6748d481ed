/**
 * Setup command - Interactive configuration wizard
 */

import { Command } from "commander";
import chalk from "chalk";
import {
  loadConfig,
  saveConfig,
  createDefaultConfig,
  CONFIG_PATH,
  MODEL_DISPLAY_NAMES,
  MODEL_NAMES,
  type ClipmeshConfig,
} from "../config/index.js";
import { LOAD_BALANCING_STRATEGIES } from "../engine/load-balancer.js";
import { maskApiKey } from "../utils/api-key.js";
import { closeTTYStream, prompt, promptConfirm, promptHidden, promptSelect } from "../utils/tty.js";
import { reportFailure } from "./studio.js";

export const setupCommand = new Command("setup")
  .description("Configure clipmesh (API keys, load balancing, concurrency)")
  .option("--reset", "Reset configuration to defaults")
  .action(async (options: { reset?: boolean }) => {
    try {
      if (options.reset) {
        await saveConfig(createDefaultConfig());
        console.log(chalk.green("Configuration reset to defaults"));
        console.log(chalk.dim(`Saved to: ${CONFIG_PATH}`));
        return;
      }
      await runSetupWizard();
    } catch (error) {
      reportFailure(error);
    } finally {
      closeTTYStream();
    }
  });

/**
 * Run the interactive setup wizard
 */
async function runSetupWizard(): Promise<void> {
  console.log();
  console.log(chalk.bold.cyan("clipmesh Setup Wizard"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  const config: ClipmeshConfig = (await loadConfig()) ?? createDefaultConfig();

  // Step 1: API keys
  console.log(chalk.bold("1. Video Models"));
  console.log(chalk.dim("   Models with a key are enabled"));
  console.log();

  for (const name of MODEL_NAMES) {
    const settings = config.models[name];
    const label = MODEL_DISPLAY_NAMES[name];
    const status = settings.apiKey ? chalk.green(` (${maskApiKey(settings.apiKey)})`) : "";

    if (!(await promptConfirm(chalk.cyan(`   Configure ${label}${status}?`), false))) continue;

    const key = (await promptHidden(chalk.cyan(`   Enter ${label} API key: `))).trim();
    if (key) {
      config.models[name] = { ...settings, apiKey: key, enabled: true };
    } else if (settings.apiKey) {
      const keep = await promptConfirm(chalk.cyan(`   Keep ${label} enabled?`), settings.enabled);
      config.models[name] = { ...settings, enabled: keep };
    }
  }
  console.log();

  // Step 2: Load balancing
  console.log(chalk.bold("2. Load Balancing"));
  console.log(chalk.dim("   How to choose between models that can all take a request"));
  console.log();
  const current = LOAD_BALANCING_STRATEGIES.indexOf(config.engine.loadBalancing);
  const choice = await promptSelect(
    chalk.cyan(`   Select [1-${LOAD_BALANCING_STRATEGIES.length}]: `),
    [...LOAD_BALANCING_STRATEGIES],
    Math.max(0, current)
  );
  config.engine.loadBalancing = LOAD_BALANCING_STRATEGIES[choice];
  console.log();

  // Step 3: Concurrency
  console.log(chalk.bold("3. Batch Concurrency"));
  const answer = await prompt(chalk.cyan(`   Generations in flight at once [${config.workflow.maxConcurrentTasks}]: `));
  const tasks = parseInt(answer, 10);
  if (Number.isInteger(tasks) && tasks > 0) {
    config.workflow.maxConcurrentTasks = tasks;
  }
  console.log();

  await saveConfig(config);

  console.log(chalk.dim("─".repeat(40)));
  console.log(chalk.green.bold("Setup complete!"));
  console.log();
  console.log(chalk.dim(`Config saved to: ${CONFIG_PATH}`));
  console.log();
  console.log(chalk.cyan("Run `clipmesh models` to check your models"));
  console.log(chalk.cyan("Run `clipmesh --help` to see all commands"));
  console.log();
}
