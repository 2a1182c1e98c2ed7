import chalk from "chalk";
import type { LogLevel, RunLogger } from "../core/logging.js";
import { LOG_LEVELS } from "../core/logging.js";

export interface LogWriter {
  out(line: string): void;
  err(line: string): void;
}

export const consoleWriter: LogWriter = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Badge-style terminal logging. `success`/`failure` report per-segment
 * outcomes and print at `info`/`error` respectively.
 */
export class Logger implements RunLogger {
  constructor(
    readonly level: LogLevel = "info",
    private readonly writer: LogWriter = consoleWriter,
  ) {}

  static silent(): Logger {
    return new Logger("silent");
  }

  enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.print(chalk.bgGray.white(" DEBUG "), chalk.gray(message));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.print(chalk.bgBlue.black(" INFO "), chalk.cyan(message));
    }
  }

  success(message: string): void {
    if (this.enabled("info")) {
      this.print(chalk.bgGreen.black(" OK "), chalk.greenBright(message));
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.print(chalk.bgYellow.black(" WARN "), chalk.yellowBright(message), true);
    }
  }

  error(message: string): void {
    if (this.enabled("error")) {
      this.print(chalk.bgRed.white(" ERROR "), chalk.redBright(message), true);
    }
  }

  failure(message: string): void {
    if (this.enabled("error")) {
      this.print(
        chalk.bgMagenta.white(" FAIL "),
        chalk.magentaBright(message),
        true,
      );
    }
  }

  private print(label: string, content: string, toError = false): void {
    const ts = chalk.gray(`[${new Date().toISOString()}]`);
    const line = `${ts} ${label} ${content}`;
    if (toError) {
      this.writer.err(line);
    } else {
      this.writer.out(line);
    }
  }
}
