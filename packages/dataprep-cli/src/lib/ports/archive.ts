/**
 * Abstraction for archive extraction.
 */
export interface ArchiveExtractor {
  /**
   * Extract every member of the archive below targetDir.
   * Resolves to the absolute paths of the files written.
   */
  extract(archivePath: string, targetDir: string): Promise<string[]>;
}
