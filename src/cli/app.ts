import type { AppEnvironment } from "../core/config.js";
import { readEnvironment } from "../core/config.js";
import { resolveTimeRange, splitRangeWords } from "../core/date-parser.js";
import { UsageError, formatError } from "../core/errors.js";
import { DeviceRegistry, DEFAULT_CHANNEL, DEFAULT_TIMEOUT_SECONDS } from "../core/registry.js";
import type { ConnectionParams, ProgressSink, RunSummary } from "../core/run.js";
import { runDownload } from "../core/run.js";
import { formatDeviceTimestamp } from "../core/time.js";
import type { DownloadArgs } from "./args.js";
import { USAGE, parseCliArgs } from "./args.js";
import { addDevice, listDevices, removeDevice } from "./devices.js";
import type { LogWriter } from "./logger.js";
import { Logger, consoleWriter } from "./logger.js";
import { DownloadProgress } from "./progress.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  writer?: LogWriter;
  now?: Date;
  createProgress?: (label: string) => ProgressSink;
}

/**
 * Runs one command line and returns the process exit code: 0 when every
 * requested segment was saved, 2 when some failed, 1 on a fatal or usage
 * error.
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  let logger = new Logger("info", context.writer);
  try {
    const environment = readEnvironment(context.env);
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      (context.writer ?? consoleWriter).out(USAGE);
      return EXIT_OK;
    }
    logger = new Logger(
      command.verbosity > 0 ? "debug" : (environment.logLevel ?? "info"),
      context.writer,
    );
    const registry = new DeviceRegistry(
      command.configDir ?? environment.configDir,
      logger,
    );

    switch (command.kind) {
      case "device-add":
        await addDevice(registry, command, logger);
        return EXIT_OK;
      case "device-list":
        await listDevices(registry, logger);
        return EXIT_OK;
      case "device-remove":
        await removeDevice(registry, command.name, logger);
        return EXIT_OK;
      case "download": {
        const summary = await download(command, registry, environment, logger, context);
        return reportSummary(summary, command.listOnly, logger);
      }
    }
  } catch (error) {
    logger.error(formatError(error));
    if (error instanceof UsageError) {
      logger.info("Run with --help for usage");
    }
    return EXIT_FATAL;
  }
}

async function download(
  args: DownloadArgs,
  registry: DeviceRegistry,
  environment: AppEnvironment,
  logger: Logger,
  context: CliContext,
): Promise<RunSummary> {
  const connection = await resolveConnection(args, registry, environment);
  const now = context.now ?? new Date();
  const bounds =
    args.end !== undefined
      ? { start: args.dateWords.join(" "), end: args.end }
      : splitRangeWords(args.dateWords, now);
  const range = resolveTimeRange(bounds.start, bounds.end, now);

  return runDownload({
    connection,
    range,
    outputDir: args.output,
    logger,
    listOnly: args.listOnly,
    retries: args.retries,
    createProgress:
      context.createProgress ?? ((label) => new DownloadProgress(label)),
  });
}

/**
 * Command-line flags win over the saved profile, which wins over
 * NVR_USER/NVR_PASS.
 */
export async function resolveConnection(
  args: DownloadArgs,
  registry: DeviceRegistry,
  environment: AppEnvironment,
): Promise<ConnectionParams> {
  const device =
    args.target.kind === "device" ? await registry.get(args.target.name) : undefined;
  const address = args.target.kind === "address" ? args.target.address : device?.address;
  if (address === undefined) {
    throw new UsageError("No device address given");
  }
  const username = args.username ?? device?.username ?? environment.username;
  const password = args.password ?? device?.password ?? environment.password;
  return {
    address,
    channel: args.channel ?? device?.channel ?? DEFAULT_CHANNEL,
    timeoutSeconds: args.timeout ?? device?.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    credentials:
      username === undefined ? undefined : { username, password: password ?? "" },
  };
}

function reportSummary(summary: RunSummary, listOnly: boolean, logger: Logger): number {
  if (listOnly) {
    logger.info(`Listed ${summary.listing.tracks.length} segments`);
    return EXIT_OK;
  }
  logger.info(
    `Completed. requested=${summary.requested} succeeded=${summary.succeeded} failed=${summary.failed}`,
  );
  for (const result of summary.results) {
    if (result.outcome.status === "failed") {
      logger.warn(
        `Failure detail: ${formatDeviceTimestamp(result.track.start)} ${result.track.playbackUri} :: ${result.outcome.reason}`,
      );
    }
  }
  return summary.failed > 0 ? EXIT_PARTIAL : EXIT_OK;
}
