import { Command } from "commander";
import { batchCommand } from "./commands/batch.js";
import { cancelCommand, generateCommand, statusCommand } from "./commands/generate.js";
import { modelsCommand, statsCommand } from "./commands/models.js";
import { scriptCommand } from "./commands/script.js";
import { setupCommand } from "./commands/setup.js";
import { VERSION } from "./version.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("clipmesh")
    .description("clipmesh - video generation across Luma, Runway and Pika")
    .version(VERSION);

  program.addCommand(generateCommand);
  program.addCommand(batchCommand);
  program.addCommand(statusCommand);
  program.addCommand(cancelCommand);
  program.addCommand(modelsCommand);
  program.addCommand(statsCommand);
  program.addCommand(scriptCommand);
  program.addCommand(setupCommand);

  return program;
}
