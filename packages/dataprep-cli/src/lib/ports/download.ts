/**
 * Progress of a running download.
 */
export interface DownloadProgress {
  receivedBytes: number;
  /** From Content-Length, when the server sent one */
  totalBytes?: number;
}

export interface DownloadResult {
  /** Bytes written to the output path */
  bytes: number;
  /** Announced size, when the server sent one */
  expectedBytes?: number;
}

/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /** Download a file from URL to local path */
  download(
    url: string,
    outputPath: string,
    onProgress?: (progress: DownloadProgress) => void
  ): Promise<DownloadResult>;
}
