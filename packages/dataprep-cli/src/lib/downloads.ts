import { mkdir, rename, rm } from "fs/promises";
import { dirname, relative, resolve } from "path";
import type { ArchiveExtractor } from "./ports/archive.js";
import type { DownloadProgress, DownloadService } from "./ports/download.js";
import type { SignalHandler } from "./ports/signal-handler.js";
import type { Logger } from "./logger.js";
import { formatBytes, type SpinnerFactory } from "./spinner.js";
import { computeFileHash, isRegularFile } from "./file-identity.js";
import {
  checksumMismatch,
  directoryCreateFailed,
  downloadFailed,
  sizeMismatch,
} from "./errors/catalog.js";
import { isCLIError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadTask {
  url: string;
  /** Destination relative to the data directory */
  dest: string;
  /** Expected hex SHA-256 of the downloaded file */
  sha256?: string;
  /** Expected size of the downloaded file */
  sizeBytes?: number;
}

export interface TaskReport {
  url: string;
  dest: string;
  status: "skipped" | "downloaded";
  bytes?: number;
  /** Extracted files, relative to the data directory */
  extracted: string[];
}

export interface DownloadDeps {
  downloader: DownloadService;
  extractor: ArchiveExtractor;
  logger: Logger;
  spinner: SpinnerFactory;
  /** Removes the in-flight partial file or archive when the run is interrupted */
  signals?: SignalHandler;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PART_SUFFIX = ".part";
const ARCHIVE_SUFFIX = ".zip";

// ---------------------------------------------------------------------------
// Directories
// ---------------------------------------------------------------------------

/**
 * Create the parent directory of every destination, parents included.
 * Returns the absolute directories in first-seen order.
 */
export async function ensureDirectories(
  dataDir: string,
  tasks: readonly DownloadTask[]
): Promise<string[]> {
  const dirs = [...new Set(tasks.map((task) => dirname(resolve(dataDir, task.dest))))];

  for (const dir of dirs) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw directoryCreateFailed(dir, error);
    }
  }

  return dirs;
}

// ---------------------------------------------------------------------------
// Download-if-absent
// ---------------------------------------------------------------------------

function progressText(url: string, progress: DownloadProgress): string {
  const received = formatBytes(progress.receivedBytes);
  if (!progress.totalBytes) {
    return `Downloading ${url} ${received}`;
  }
  const percent = Math.floor((progress.receivedBytes / progress.totalBytes) * 100);
  return `Downloading ${url} ${received} / ${formatBytes(progress.totalBytes)} (${percent}%)`;
}

async function verifyContent(path: string, task: DownloadTask, bytes: number): Promise<void> {
  if (task.sizeBytes !== undefined && bytes !== task.sizeBytes) {
    throw sizeMismatch(task.dest, bytes, task.sizeBytes);
  }
  if (task.sha256 !== undefined) {
    const actual = await computeFileHash(path);
    if (actual !== task.sha256.toLowerCase()) {
      throw checksumMismatch(task.dest, actual, task.sha256.toLowerCase());
    }
  }
}

/**
 * Run one task: skip an existing destination, otherwise download through a
 * ".part" file, verify, confirm and extract.
 *
 * `trackInFlight` receives the file an interrupt must remove: the ".part"
 * file while downloading, then the archive while it is being extracted.
 * An archive whose extraction fails is removed as well, so the next run
 * fetches and extracts it again instead of skipping it.
 */
export async function downloadTask(
  task: DownloadTask,
  dataDir: string,
  deps: DownloadDeps,
  trackInFlight: (path: string | undefined) => void = () => {}
): Promise<TaskReport> {
  const { downloader, extractor, logger } = deps;
  const root = resolve(dataDir);
  const dest = resolve(root, task.dest);

  if (await isRegularFile(dest)) {
    logger.info(`${task.dest} already exists, skipping download.`);
    return { url: task.url, dest: task.dest, status: "skipped", extracted: [] };
  }

  const partPath = dest + PART_SUFFIX;
  const spinner = deps.spinner(`Downloading ${task.url}`).start();
  let bytes: number;

  trackInFlight(partPath);
  try {
    const result = await downloader.download(task.url, partPath, (progress) => {
      spinner.text = progressText(task.url, progress);
    });
    bytes = result.bytes;
    await verifyContent(partPath, task, bytes);
    await rename(partPath, dest);
  } catch (error) {
    spinner.fail();
    await rm(partPath, { force: true });
    logger.error(`${task.url} not successfully downloaded.`);
    throw isCLIError(error) ? error : downloadFailed(task.url, error);
  } finally {
    trackInFlight(undefined);
  }
  spinner.stop();

  if (!(await isRegularFile(dest))) {
    logger.error(`${task.url} not successfully downloaded.`);
    throw downloadFailed(task.url, new Error(`${task.dest} is missing after the download`));
  }
  logger.info(`${task.url} successfully downloaded.`);

  const extracted: string[] = [];
  if (task.dest.endsWith(ARCHIVE_SUFFIX)) {
    const extractSpinner = deps.spinner(`Extracting ${task.dest}`).start();
    trackInFlight(dest);
    try {
      const files = await extractor.extract(dest, dirname(dest));
      extracted.push(...files.map((file) => relative(root, file)));
    } catch (error) {
      extractSpinner.fail();
      await rm(dest, { force: true });
      logger.error(`${task.dest} could not be extracted and was removed.`);
      throw error;
    } finally {
      trackInFlight(undefined);
    }
    extractSpinner.stop();
    logger.info(`Extracted ${extracted.length} file(s) from ${task.dest}.`);
  }

  return { url: task.url, dest: task.dest, status: "downloaded", bytes, extracted };
}

/**
 * Run the tasks strictly in order; the first failure stops the sequence.
 */
export async function downloadAll(
  tasks: readonly DownloadTask[],
  dataDir: string,
  deps: DownloadDeps
): Promise<TaskReport[]> {
  let inFlight: string | undefined;
  deps.signals?.onShutdown(async () => {
    if (inFlight) {
      await rm(inFlight, { force: true });
    }
  });

  try {
    const reports: TaskReport[] = [];
    for (const task of tasks) {
      reports.push(
        await downloadTask(task, dataDir, deps, (path) => {
          inFlight = path;
        })
      );
    }
    return reports;
  } finally {
    deps.signals?.removeAll();
  }
}
