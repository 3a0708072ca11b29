import { createWriteStream } from "fs";
import { mkdir, rename, rm } from "fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "path";
import { pipeline } from "stream/promises";
import { Open } from "unzipper";
import type { ArchiveExtractor } from "../ports/archive.js";
import { extractFailed, unsafeArchivePath } from "../errors/catalog.js";
import { isCLIErrorCode } from "../errors/types.js";

const PART_SUFFIX = ".part";

/**
 * Resolve an archive member name below targetDir.
 * Throws ARCHIVE_UNSAFE_PATH for absolute names, drive letters and names
 * that climb out of targetDir through "..".
 */
export function resolveEntryPath(archivePath: string, targetDir: string, entryName: string): string {
  const name = entryName.replace(/\\/g, "/");
  if (isAbsolute(name) || /^[a-zA-Z]:/.test(name)) {
    throw unsafeArchivePath(archivePath, entryName);
  }

  const root = resolve(targetDir);
  const target = resolve(root, name);
  const rel = relative(root, target);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw unsafeArchivePath(archivePath, entryName);
  }
  return target;
}

/**
 * Zip extractor built on unzipper's central-directory reader. Members are
 * streamed to disk one at a time, so entries larger than a Buffer can hold
 * (the GloVe text file) extract fine. Every member path is checked before
 * the first byte is written, and each member only appears under its own name
 * once it is complete.
 */
export const zipExtractor: ArchiveExtractor = {
  async extract(archivePath: string, targetDir: string): Promise<string[]> {
    try {
      const directory = await Open.file(archivePath);
      const planned = directory.files.map((file) => ({
        file,
        target: resolveEntryPath(archivePath, targetDir, file.path),
      }));

      const written: string[] = [];
      for (const { file, target } of planned) {
        if (file.type === "Directory") {
          await mkdir(target, { recursive: true });
          continue;
        }
        await mkdir(dirname(target), { recursive: true });
        const partPath = target + PART_SUFFIX;
        try {
          await pipeline(file.stream(), createWriteStream(partPath));
          await rename(partPath, target);
        } catch (error) {
          await rm(partPath, { force: true });
          throw error;
        }
        written.push(target);
      }
      return written;
    } catch (error) {
      if (isCLIErrorCode(error, "ARCHIVE_UNSAFE_PATH")) throw error;
      throw extractFailed(archivePath, error);
    }
  },
};
