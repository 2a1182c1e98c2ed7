import type { AuthStrategy, Credentials } from "./auth.js";
import { negotiateAuth } from "./auth.js";
import type { DownloadResult } from "./downloader.js";
import { downloadSegments } from "./downloader.js";
import { segmentDirectory } from "./filename.js";
import { IsapiClient, deviceBaseUrl } from "./isapi.js";
import type { RunLogger } from "./logging.js";
import type { TimeRange } from "./time.js";
import { describeRange, formatDeviceTimestamp } from "./time.js";
import type { TrackListing } from "./tracks.js";
import { listTracks } from "./tracks.js";

export interface ConnectionParams {
  address: string;
  channel: number;
  timeoutSeconds: number;
  credentials?: Credentials;
}

export interface ProgressSink {
  update(received: number, total: number | undefined): void;
  stop(): void;
}

export interface RunOptions {
  connection: ConnectionParams;
  range: TimeRange;
  outputDir: string;
  logger: RunLogger;
  listOnly?: boolean;
  retries?: number;
  retryDelayMs?: number;
  pageSize?: number;
  maxPages?: number;
  createProgress?: (label: string) => ProgressSink;
}

export interface RunSummary {
  authentication: AuthStrategy["kind"];
  listing: TrackListing;
  results: DownloadResult[];
  requested: number;
  succeeded: number;
  failed: number;
}

/**
 * One sequential pass: authenticate, list the window, fetch each segment.
 * Errors before the first segment propagate; segment errors are collected
 * in the summary.
 */
export async function runDownload(options: RunOptions): Promise<RunSummary> {
  const { connection, logger, range } = options;
  const baseUrl = deviceBaseUrl(connection.address);
  const timeoutMs = connection.timeoutSeconds * 1000;

  logger.info(`Device ${baseUrl}, camera ${connection.channel}`);
  logger.info(`Window (UTC): ${describeRange(range)}`);

  const signer = await negotiateAuth({
    baseUrl,
    credentials: connection.credentials,
    timeoutMs,
    onProbe: (attempt, status) =>
      logger.debug(`Auth probe (${attempt}) -> HTTP ${status}`),
  });
  logger.info(`Authentication: ${signer.strategy.kind}`);

  const client = new IsapiClient({ baseUrl, signer, timeoutMs });
  const listing = await listTracks(client, {
    channel: connection.channel,
    range,
    pageSize: options.pageSize,
    maxPages: options.maxPages,
    onPage: (page, pageNumber) =>
      logger.debug(
        `Search page ${pageNumber}: ${page.status}, ${page.tracks.length} tracks`,
      ),
  });
  if (listing.dropped > 0) {
    logger.debug(`Dropped ${listing.dropped} segments starting outside the window`);
  }
  if (listing.truncated) {
    logger.warn(listing.truncated.message);
  }
  if (listing.outOfOrder) {
    logger.warn("Device returned segments out of chronological order; keeping device order");
  }
  logger.info(`Found ${listing.tracks.length} segments`);

  if (options.listOnly) {
    for (const track of listing.tracks) {
      logger.info(
        `${formatDeviceTimestamp(track.start)} .. ${formatDeviceTimestamp(track.end)} ${track.playbackUri}`,
      );
    }
    return summarize(signer.strategy.kind, listing, []);
  }

  const directory = segmentDirectory(
    options.outputDir,
    connection.address,
    connection.channel,
  );
  let progress: ProgressSink | undefined;
  const results = await downloadSegments(client, listing.tracks, {
    directory,
    retries: options.retries,
    retryDelayMs: options.retryDelayMs,
    logger,
    onStart: (track, index, total) => {
      const label = `[${index + 1}/${total}] ${formatDeviceTimestamp(track.start)}`;
      logger.debug(`Downloading ${track.playbackUri}`);
      progress = options.createProgress?.(label);
    },
    onProgress: (received, total) => progress?.update(received, total),
    onResult: (result, index, total) => {
      progress?.stop();
      progress = undefined;
      const prefix = `[${index + 1}/${total}]`;
      if (result.outcome.status === "success") {
        logger.success(`${prefix} ${result.localPath}`);
      } else {
        logger.failure(
          `${prefix} ${formatDeviceTimestamp(result.track.start)} -> ${result.outcome.reason}`,
        );
      }
    },
  });
  return summarize(signer.strategy.kind, listing, results);
}

function summarize(
  authentication: AuthStrategy["kind"],
  listing: TrackListing,
  results: DownloadResult[],
): RunSummary {
  const succeeded = results.filter((r) => r.outcome.status === "success").length;
  return {
    authentication,
    listing,
    results,
    requested: results.length,
    succeeded,
    failed: results.length - succeeded,
  };
}
