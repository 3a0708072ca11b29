#!/usr/bin/env node
import { Command } from "commander";
import { initContext } from "./lib/cli-context.js";
import { getCliVersion } from "./lib/version.js";
import { handleCommandError } from "./lib/errors/renderer.js";
import { registerRunCommand } from "./modules/run.js";
import { registerDoctorCommand } from "./modules/doctor.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

export function createProgram(): Command {
  const program = new Command()
    .name("dataprep")
    .description("Download the BoolQ dataset, GloVe embeddings and the spaCy English model")
    .version(getCliVersion())
    .option("--json", "Print machine-readable JSON")
    .option("-q, --quiet", "Hide spinners and progress");

  registerRunCommand(program);
  registerDoctorCommand(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    handleCommandError(error);
  }
}

void main();
