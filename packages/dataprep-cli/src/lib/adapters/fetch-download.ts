import { createWriteStream } from "fs";
import { Writable } from "stream";
import type { DownloadProgress, DownloadResult, DownloadService } from "../ports/download.js";
import { downloadFailed, downloadHttpError, downloadIncomplete } from "../errors/catalog.js";

function parseContentLength(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) return undefined;
  return Number(header.trim());
}

/**
 * Size of the body as it reaches disk. fetch decodes gzip/deflate/br, so a
 * Content-Length announced for an encoded body counts different bytes.
 */
function expectedBodyLength(headers: Headers): number | undefined {
  const encoding = headers.get("content-encoding")?.trim().toLowerCase();
  if (encoding && encoding !== "identity") return undefined;
  return parseContentLength(headers.get("content-length"));
}

/**
 * Create a download service using fetch.
 * The body is streamed to disk; an unencoded body shorter than the announced
 * Content-Length is reported as DOWNLOAD_INCOMPLETE.
 */
export function createFetchDownloadService(
  fetchImpl: typeof fetch = globalThis.fetch
): DownloadService {
  return {
    async download(
      url: string,
      outputPath: string,
      onProgress?: (progress: DownloadProgress) => void
    ): Promise<DownloadResult> {
      let response: Response;
      try {
        response = await fetchImpl(url, { redirect: "follow" });
      } catch (error) {
        throw downloadFailed(url, error);
      }

      if (!response.ok) {
        throw downloadHttpError(url, response.status, response.statusText);
      }

      if (!response.body) {
        throw downloadFailed(url, new Error("No response body"));
      }

      const expectedBytes = expectedBodyLength(response.headers);
      let receivedBytes = 0;

      const counter = new TransformStream<Uint8Array, Uint8Array>({
        transform(chunk, controller) {
          receivedBytes += chunk.byteLength;
          onProgress?.({ receivedBytes, totalBytes: expectedBytes });
          controller.enqueue(chunk);
        },
      });

      const fileStream = createWriteStream(outputPath);
      const writableStream = Writable.toWeb(fileStream) as WritableStream<Uint8Array>;

      try {
        await response.body.pipeThrough(counter).pipeTo(writableStream);
      } catch (error) {
        throw downloadFailed(url, error);
      }

      if (expectedBytes !== undefined && receivedBytes < expectedBytes) {
        throw downloadIncomplete(url, receivedBytes, expectedBytes);
      }

      return { bytes: receivedBytes, expectedBytes };
    },
  };
}

/**
 * Default download service instance.
 */
export const fetchDownloadService = createFetchDownloadService();
