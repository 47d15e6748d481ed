import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import {
  createSampleScript,
  getValidationSchema,
  scriptToJSON,
  summarizeValidation,
  validateScriptFile,
} from "@clipmesh/core";
import { parseInteger, reportFailure } from "./studio.js";

export const scriptCommand = new Command("script").description("Validate and scaffold scene scripts");

scriptCommand
  .command("validate")
  .description("Check a script file against the scene format")
  .argument("<file>", "Script JSON file")
  .option("--json", "Print the validation result as JSON")
  .action(async (file: string, options: { json?: boolean }) => {
    const result = await validateScriptFile(resolve(process.cwd(), file));

    if (options.json) {
      console.log(
        JSON.stringify(
          { isValid: result.isValid, errors: result.errors, warnings: result.warnings, ...scriptToJSON(result.scenes) },
          null,
          2
        )
      );
    } else if (result.isValid) {
      console.log(chalk.green(`Script is valid: ${result.scenes.length} scene(s)`));
      for (const warning of result.warnings) {
        console.log(chalk.yellow(`Warning: ${warning}`));
      }
    } else {
      console.log(chalk.red(summarizeValidation(result)));
    }

    if (!result.isValid) process.exitCode = 1;
  });

scriptCommand
  .command("sample")
  .description("Print or write a sample script")
  .option("-n, --scenes <n>", "Number of scenes", "3")
  .option("-o, --output <file>", "Write to a file instead of stdout")
  .action(async (options: { scenes: string; output?: string }) => {
    try {
      const count = parseInteger(options.scenes, "--scenes") ?? 3;
      const content = JSON.stringify(createSampleScript(count), null, 2);
      if (!options.output) {
        console.log(content);
        return;
      }
      const path = resolve(process.cwd(), options.output);
      await writeFile(path, `${content}\n`, "utf-8");
      console.log(chalk.green(`Sample script written to ${path}`));
    } catch (error) {
      reportFailure(error);
    }
  });

scriptCommand
  .command("schema")
  .description("Print the JSON schema of the script format")
  .action(() => {
    console.log(JSON.stringify(getValidationSchema(), null, 2));
  });
