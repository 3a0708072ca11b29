import type { CommandRunner } from "./ports/command-runner.js";
import type { InstallConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { installFailed } from "./errors/catalog.js";

export interface InstallReport {
  status: "installed" | "failed" | "skipped";
  /** Command line as it would be typed in a shell */
  command: string;
  exitCode?: number;
}

/**
 * Build the spaCy model download command: `<python> -m spacy download <model>`.
 */
export function buildInstallCommand(install: InstallConfig): { command: string; args: string[] } {
  return {
    command: install.python,
    args: ["-m", "spacy", "download", install.model],
  };
}

/**
 * Install the spaCy language model.
 * A failed install aborts the run unless the install is marked optional.
 */
export async function installLanguageModel(
  install: InstallConfig,
  runner: CommandRunner,
  logger: Logger
): Promise<InstallReport> {
  const { command, args } = buildInstallCommand(install);
  const commandLine = [command, ...args].join(" ");

  if (!install.enabled) {
    logger.info("Skipping language model install.");
    return { status: "skipped", command: commandLine };
  }

  logger.info(`Installing spaCy model ${install.model}...`);

  let exitCode: number;
  try {
    ({ exitCode } = await runner.run(command, args));
  } catch (error) {
    if (install.required) {
      throw installFailed(commandLine, undefined, error);
    }
    logger.warn(`Could not start "${commandLine}"`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { status: "failed", command: commandLine };
  }

  if (exitCode !== 0) {
    if (install.required) {
      throw installFailed(commandLine, exitCode);
    }
    logger.warn(`"${commandLine}" exited with code ${exitCode}, continuing.`);
    return { status: "failed", command: commandLine, exitCode };
  }

  logger.info(`spaCy model ${install.model} installed.`);
  return { status: "installed", command: commandLine, exitCode };
}
