/**
 * Run command - prepares the data directory in one pass.
 */

import { Command } from "commander";
import chalk from "chalk";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { runPipeline, type PipelineDeps, type RunReport } from "../lib/pipeline.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { createSpinner } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { maybeOutputJson } from "../lib/json-output.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import {
  createProcessSignalHandler,
  createSpawnCommandRunner,
  fetchDownloadService,
  pathResolver,
  zipExtractor,
} from "../lib/adapters/index.js";

export interface RunOptions {
  dataDir?: string;
  config?: string;
  skipInstall?: boolean;
  model?: string;
  verbose?: boolean;
}

export type DepsFactory = (logger: Logger) => PipelineDeps;

/**
 * Production wiring of the pipeline ports.
 */
export const createDefaultDeps: DepsFactory = (logger) => ({
  resolver: pathResolver,
  downloader: fetchDownloadService,
  extractor: zipExtractor,
  runner: createSpawnCommandRunner({ stdoutToStderr: isJsonMode() }),
  logger,
  spinner: createSpinner,
  signals: createProcessSignalHandler(),
});

/**
 * Status lines go to stdout, except in JSON mode where stdout carries the
 * report and only warnings and errors are printed (to stderr).
 */
export function createRunLogger(config: ResolvedConfig): Logger {
  return createLogger({
    level: isJsonMode() && config.logLevel !== "error" ? "warn" : config.logLevel,
    json: config.logJson,
    timestamps: false,
  });
}

function printSummary(report: RunReport): void {
  const downloaded = report.tasks.filter((t) => t.status === "downloaded").length;
  const skipped = report.tasks.length - downloaded;
  const extracted = report.tasks.reduce((sum, t) => sum + t.extracted.length, 0);

  console.log("");
  console.log(chalk.green(`✓ Data directory ready: ${report.dataDir}`));
  console.log(`  Downloaded: ${downloaded}  Skipped: ${skipped}  Extracted: ${extracted}`);
  const install =
    report.install.status === "installed" ? chalk.green("installed") :
    report.install.status === "skipped" ? chalk.gray("skipped") :
    chalk.yellow(`failed (${report.install.command})`);
  console.log(`  Language model: ${install}`);
}

export function registerRunCommand(
  program: Command,
  makeDeps: DepsFactory = createDefaultDeps
): void {
  program
    .command("run", { isDefault: true })
    .description("Check prerequisites, download the datasets and install the language model")
    .option("-d, --data-dir <dir>", "Directory to download into")
    .option("-c, --config <path>", "Config file to use instead of the user/system files")
    .option("--skip-install", "Skip the language model install")
    .option("-m, --model <name>", "spaCy model to install")
    .option("--verbose", "Log debug details")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Steps:")}
  ${chalk.yellow("1.")} Verify python3 and pip are on PATH
  ${chalk.yellow("2.")} Create boolq/ and glove/
  ${chalk.yellow("3.")} Download BoolQ train/dev and the GloVe 840B archive (existing files are kept)
  ${chalk.yellow("4.")} Run python3 -m spacy download en_core_web_sm

${chalk.bold.cyan("Examples:")}
  dataprep                        ${chalk.gray("Prepare the current directory")}
  dataprep run -d ./data          ${chalk.gray("Prepare ./data")}
  dataprep run --skip-install     ${chalk.gray("Only download files")}
  dataprep run --json             ${chalk.gray("Print the run report as JSON")}
`
    )
    .action(async (options: RunOptions) => {
      try {
        const { config } = loadConfig(options.config, {
          dataDir: options.dataDir,
          installEnabled: options.skipInstall ? false : undefined,
          model: options.model,
          logLevel: options.verbose ? "debug" : undefined,
        });

        const report = await runPipeline(config, makeDeps(createRunLogger(config)));

        if (!maybeOutputJson(report)) {
          printSummary(report);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
