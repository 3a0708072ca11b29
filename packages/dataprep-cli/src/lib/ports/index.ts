export type { ArchiveExtractor } from "./archive.js";
export type { CommandRunner, CommandResult } from "./command-runner.js";
export type { DownloadService, DownloadProgress, DownloadResult } from "./download.js";
export type { ExecutableResolver } from "./executable-resolver.js";
export type { SignalHandler } from "./signal-handler.js";
