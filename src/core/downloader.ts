import { createWriteStream } from "node:fs";
import { rm, utimes } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ConnectionError, DeviceError, formatError } from "./errors.js";
import { buildSegmentFileName, reserveFilePath } from "./filename.js";
import { retryOperation, toConnectionError } from "./http.js";
import type { RunLogger } from "./logging.js";
import type { TrackDescriptor } from "./tracks.js";

export interface MediaClient {
  readonly timeoutMs: number;
  openDownload(
    playbackUri: string,
    controller?: AbortController,
  ): Promise<Response>;
}

export type DownloadOutcome =
  | { status: "success"; bytes: number }
  | { status: "failed"; reason: string; error: unknown };

export interface DownloadResult {
  track: TrackDescriptor;
  localPath: string;
  outcome: DownloadOutcome;
}

export interface SegmentDownloadOptions {
  directory: string;
  /** Extra attempts per segment after the first one fails. */
  retries?: number;
  retryDelayMs?: number;
  /** Abort a transfer when no bytes arrive for this long. */
  idleTimeoutMs?: number;
  logger?: RunLogger;
  onProgress?: (received: number, total: number | undefined) => void;
}

export interface BatchDownloadOptions extends SegmentDownloadOptions {
  onStart?: (track: TrackDescriptor, index: number, total: number) => void;
  onResult?: (result: DownloadResult, index: number, total: number) => void;
}

/**
 * Streams one recording to `<directory>/<start>.mp4`. Never throws: failures
 * come back as a `failed` outcome and leave no partial file behind.
 */
export async function downloadSegment(
  client: MediaClient,
  track: TrackDescriptor,
  options: SegmentDownloadOptions,
): Promise<DownloadResult> {
  const fileName = buildSegmentFileName(track.start);
  let localPath = path.join(options.directory, fileName);

  try {
    const bytes = await retryOperation(
      async () => {
        localPath = await reserveFilePath(options.directory, fileName);
        try {
          return await transfer(client, track, localPath, options);
        } catch (error) {
          await rm(localPath, { force: true });
          throw error;
        }
      },
      {
        retries: options.retries ?? 0,
        delayMs: options.retryDelayMs ?? 1000,
        shouldRetry: isTransient,
        onRetry: (error, attempt) =>
          options.logger?.warn(
            `Retrying ${fileName} (attempt ${attempt + 1}): ${formatError(error)}`,
          ),
      },
    );
    await stampModifiedTime(localPath, track.start, options.logger);
    return { track, localPath, outcome: { status: "success", bytes } };
  } catch (error) {
    return {
      track,
      localPath,
      outcome: { status: "failed", reason: formatError(error), error },
    };
  }
}

/**
 * Downloads tracks one after another in the given order. A failed segment is
 * recorded and the batch moves on.
 */
export async function downloadSegments(
  client: MediaClient,
  tracks: readonly TrackDescriptor[],
  options: BatchDownloadOptions,
): Promise<DownloadResult[]> {
  const results: DownloadResult[] = [];
  for (const [index, track] of tracks.entries()) {
    options.onStart?.(track, index, tracks.length);
    const result = await downloadSegment(client, track, options);
    results.push(result);
    options.onResult?.(result, index, tracks.length);
  }
  return results;
}

async function transfer(
  client: MediaClient,
  track: TrackDescriptor,
  localPath: string,
  options: SegmentDownloadOptions,
): Promise<number> {
  const controller = new AbortController();
  const response = await client.openDownload(track.playbackUri, controller);
  if (!response.body) {
    throw new ConnectionError("Device returned an empty media stream");
  }
  const total = Number(response.headers.get("content-length")) || undefined;
  const idleMs = options.idleTimeoutMs ?? client.timeoutMs;
  let received = 0;
  let idleTimer: NodeJS.Timeout | undefined;
  const armIdleTimer = () => {
    clearTimeout(idleTimer);
    idleTimer = setTimeout(() => {
      controller.abort(
        new ConnectionError(`No data received for ${idleMs} ms`),
      );
    }, idleMs);
  };

  armIdleTimer();
  try {
    await pipeline(
      Readable.fromWeb(response.body),
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          received += chunk.length;
          armIdleTimer();
          options.onProgress?.(received, total);
          yield chunk;
        }
      },
      createWriteStream(localPath),
      { signal: controller.signal },
    );
  } catch (error) {
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof ConnectionError) {
      throw reason;
    }
    throw toConnectionError(error, track.playbackUri);
  } finally {
    clearTimeout(idleTimer);
  }

  if (total !== undefined && received < total) {
    throw new ConnectionError(
      `Transfer ended after ${received} of ${total} bytes`,
    );
  }
  return received;
}

function isTransient(error: unknown): boolean {
  return (
    error instanceof ConnectionError ||
    (error instanceof DeviceError && error.status >= 500)
  );
}

async function stampModifiedTime(
  filePath: string,
  start: Date,
  logger: RunLogger | undefined,
): Promise<void> {
  try {
    await utimes(filePath, start, start);
  } catch (error) {
    logger?.debug(`Could not set modification time on ${filePath}: ${formatError(error)}`);
  }
}
