import { UsageError } from "./errors.js";
import type { LogLevel } from "./logging.js";
import { parseLogLevel } from "./logging.js";
import { defaultConfigDir } from "./registry.js";

/** Process environment, read once at startup and passed down. */
export interface AppEnvironment {
  username?: string;
  password?: string;
  logLevel?: LogLevel;
  configDir: string;
}

export function readEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): AppEnvironment {
  const rawLevel = env.NVR_LOG_LEVEL;
  const logLevel = parseLogLevel(rawLevel);
  if (rawLevel !== undefined && rawLevel.trim() !== "" && !logLevel) {
    throw new UsageError(
      `NVR_LOG_LEVEL must be one of error, warn, info, debug (got '${rawLevel}')`,
    );
  }
  return {
    username: nonEmpty(env.NVR_USER),
    password: nonEmpty(env.NVR_PASS),
    logLevel,
    configDir: nonEmpty(env.ISAPI_DL_CONFIG_DIR) ?? defaultConfigDir(env),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}
