import { parseArgs } from "node:util";
import { UsageError } from "../core/errors.js";

export const DEFAULT_OUTPUT_DIR = "video";

const OPTIONS = {
  device: { type: "string" },
  address: { type: "string" },
  channel: { type: "string" },
  timeout: { type: "string" },
  username: { type: "string" },
  password: { type: "string" },
  force: { type: "boolean" },
  output: { type: "string", short: "o" },
  end: { type: "string" },
  "list-only": { type: "boolean" },
  retries: { type: "string" },
  "config-dir": { type: "string" },
  verbose: { type: "boolean", short: "v", multiple: true },
  help: { type: "boolean", short: "h" },
} as const;

export interface CommonArgs {
  configDir?: string;
  verbosity: number;
}

export type DownloadTarget =
  | { kind: "address"; address: string }
  | { kind: "device"; name: string };

export interface DownloadArgs extends CommonArgs {
  kind: "download";
  target: DownloadTarget;
  /** Date words as typed; split into start/end once `now` is known. */
  dateWords: string[];
  end?: string;
  channel?: number;
  timeout?: number;
  username?: string;
  password?: string;
  output: string;
  listOnly: boolean;
  retries: number;
}

export interface DeviceAddArgs extends CommonArgs {
  kind: "device-add";
  name: string;
  address: string;
  channel?: number;
  timeout?: number;
  username?: string;
  password?: string;
  force: boolean;
}

export interface DeviceListArgs extends CommonArgs {
  kind: "device-list";
}

export interface DeviceRemoveArgs extends CommonArgs {
  kind: "device-remove";
  name: string;
}

export type CliCommand =
  | { kind: "help" }
  | DownloadArgs
  | DeviceAddArgs
  | DeviceListArgs
  | DeviceRemoveArgs;

export const USAGE = `Usage:
  isapi-dl [options] <address> <start> [end]
  isapi-dl [options] --device <name> <start> [end]
  isapi-dl device add <name> --address <addr> [--channel N] [--timeout S]
                      [--username U] [--password P] [--force]
  isapi-dl device list
  isapi-dl device remove <name>

Dates may span several words ("2024-04-12 08:00", "yesterday 8pm",
"3 days ago"). Use --end to mark where the end expression starts.

Options:
  --device <name>      use a saved device profile
  --channel <N>        camera channel (default 1)
  --timeout <S>        per-request timeout in seconds (default 10)
  --username <U>       device user (default $NVR_USER)
  --password <P>       device password (default $NVR_PASS)
  --end <expr>         end of the window (default: now)
  -o, --output <dir>   output directory (default ${DEFAULT_OUTPUT_DIR})
  --list-only          list recordings without downloading
  --retries <N>        extra attempts per failed segment (default 0)
  --config-dir <dir>   device registry directory (default $ISAPI_DL_CONFIG_DIR
                       or ~/.config/isapi-dl)
  -v, --verbose        debug output
  -h, --help           show this help

Environment:
  NVR_USER, NVR_PASS, NVR_LOG_LEVEL (error|warn|info|debug), ISAPI_DL_CONFIG_DIR`;

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: "help" };
  }

  const common: CommonArgs = {
    configDir: values["config-dir"],
    verbosity: values.verbose?.length ?? 0,
  };
  const channel = optionalPositive(values.channel, "--channel");
  const timeout = optionalPositive(values.timeout, "--timeout");

  if (positionals[0] === "device") {
    const [, action, ...rest] = positionals;
    switch (action) {
      case "add": {
        const name = singleName(rest, "device add");
        if (!values.address) {
          throw new UsageError("device add requires --address");
        }
        return {
          ...common,
          kind: "device-add",
          name,
          address: values.address,
          channel,
          timeout,
          username: values.username,
          password: values.password,
          force: values.force ?? false,
        };
      }
      case "list":
        if (rest.length > 0) {
          throw new UsageError(`Unexpected argument: ${rest[0]}`);
        }
        return { ...common, kind: "device-list" };
      case "remove":
        return { ...common, kind: "device-remove", name: singleName(rest, "device remove") };
      default:
        throw new UsageError(
          action === undefined
            ? "device requires add, list or remove"
            : `Unknown device command: ${action}`,
        );
    }
  }

  if (values.force || values.address !== undefined) {
    throw new UsageError("--address and --force belong to 'device add'");
  }

  let target: DownloadTarget;
  let dateWords: string[];
  if (values.device !== undefined) {
    target = { kind: "device", name: values.device };
    dateWords = positionals;
  } else {
    const [address, ...rest] = positionals;
    if (address === undefined) {
      throw new UsageError("Missing device address (or --device <name>)");
    }
    target = { kind: "address", address };
    dateWords = rest;
  }
  if (dateWords.length === 0) {
    throw new UsageError("Missing start date/time");
  }

  return {
    ...common,
    kind: "download",
    target,
    dateWords,
    end: values.end,
    channel,
    timeout,
    username: values.username,
    password: values.password,
    output: values.output ?? DEFAULT_OUTPUT_DIR,
    listOnly: values["list-only"] ?? false,
    retries: optionalCount(values.retries, "--retries") ?? 0,
  };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

function singleName(rest: string[], command: string): string {
  if (rest.length !== 1 || rest[0].trim() === "") {
    throw new UsageError(`${command} takes exactly one device name`);
  }
  return rest[0];
}

function optionalPositive(value: string | undefined, flag: string): number | undefined {
  const parsed = optionalCount(value, flag);
  if (parsed === 0) {
    throw new UsageError(`${flag} must be a positive integer`);
  }
  return parsed;
}

function optionalCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`${flag} must be a whole number (got '${value}')`);
  }
  return Number(value.trim());
}
