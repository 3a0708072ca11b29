import { resolve } from "path";
import type { ResolvedConfig } from "./config.js";
import type {
  ArchiveExtractor,
  CommandRunner,
  DownloadService,
  ExecutableResolver,
  SignalHandler,
} from "./ports/index.js";
import type { Logger } from "./logger.js";
import type { SpinnerFactory } from "./spinner.js";
import { verifyRequirements, type RequirementCheck } from "./requirements.js";
import { downloadAll, ensureDirectories, type TaskReport } from "./downloads.js";
import { installLanguageModel, type InstallReport } from "./installer.js";

export interface PipelineDeps {
  resolver: ExecutableResolver;
  downloader: DownloadService;
  extractor: ArchiveExtractor;
  runner: CommandRunner;
  logger: Logger;
  spinner: SpinnerFactory;
  signals?: SignalHandler;
}

export interface RunReport {
  dataDir: string;
  requirements: RequirementCheck[];
  directories: string[];
  tasks: TaskReport[];
  install: InstallReport;
}

/**
 * Prepare the data directory: prerequisites, output directories, downloads,
 * then the language model install. Each step runs only after the previous
 * one succeeded.
 */
export async function runPipeline(config: ResolvedConfig, deps: PipelineDeps): Promise<RunReport> {
  const dataDir = resolve(config.dataDir);
  const logger = deps.logger;

  const requirements = await verifyRequirements(config.requirements, deps.resolver, logger);
  const directories = await ensureDirectories(dataDir, config.downloads);
  logger.debug("Output directories ready", { directories });

  const tasks = await downloadAll(config.downloads, dataDir, {
    downloader: deps.downloader,
    extractor: deps.extractor,
    logger,
    spinner: deps.spinner,
    signals: deps.signals,
  });

  const install = await installLanguageModel(config.install, deps.runner, logger);

  return { dataDir, requirements, directories, tasks, install };
}
