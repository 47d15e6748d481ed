import { readFile, writeFile, access } from "node:fs/promises";
import { resolve } from "node:path";
import { config } from "dotenv";
import chalk from "chalk";
import { getApiKeyFromConfig, MODEL_DISPLAY_NAMES, MODEL_ENV_VARS, type ModelName } from "../config/index.js";
import { promptConfirm, promptHidden } from "./tty.js";

/**
 * Load environment variables from the .env file in the current directory.
 * Variables already set in the environment win.
 */
export function loadEnv(path: string = resolve(process.cwd(), ".env")): void {
  config({ path, debug: false });
}

/**
 * Get a model's API key from the option, config, environment, or a prompt
 */
export async function getApiKey(model: ModelName, optionValue?: string): Promise<string | null> {
  // 1. Command line option
  if (optionValue) {
    return optionValue;
  }

  // 2. ~/.clipmesh/config.yaml, then the environment (after .env is loaded)
  loadEnv();
  const stored = await getApiKeyFromConfig(model);
  if (stored) {
    return stored;
  }

  // 3. Prompt only in an interactive terminal
  if (!process.stdin.isTTY) {
    return null;
  }

  const envVar = MODEL_ENV_VARS[model];
  const name = MODEL_DISPLAY_NAMES[model];
  console.log();
  console.log(chalk.yellow(`${name} API key not found.`));
  console.log(chalk.dim(`Set ${envVar} in .env (current directory), run 'clipmesh setup', or enter below.`));
  console.log();

  const apiKey = (await promptHidden(chalk.cyan(`Enter ${name} API key: `))).trim();
  if (apiKey === "") {
    return null;
  }

  if (await promptConfirm(chalk.cyan("Save to .env for future use?"), false)) {
    await saveApiKeyToEnv(envVar, apiKey);
    console.log(chalk.green("API key saved to .env"));
  }

  return apiKey;
}

/**
 * Write or replace `envVar` in a .env file
 */
export async function saveApiKeyToEnv(
  envVar: string,
  apiKey: string,
  envPath: string = resolve(process.cwd(), ".env")
): Promise<void> {
  let content = "";

  try {
    await access(envPath);
    content = await readFile(envPath, "utf-8");
  } catch {
    // Missing file: start a new one
    content = "";
  }

  const regex = new RegExp(`^${envVar}=.*$`, "m");
  if (regex.test(content)) {
    content = content.replace(regex, `${envVar}=${apiKey}`);
  } else {
    if (content && !content.endsWith("\n")) {
      content += "\n";
    }
    content += `${envVar}=${apiKey}\n`;
  }

  await writeFile(envPath, content, "utf-8");
}

/**
 * Mask API key for display
 */
export function maskApiKey(key: string): string {
  if (key.length <= 8) return "****";
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}
