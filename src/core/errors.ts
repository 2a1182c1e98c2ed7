/**
 * Error kinds raised by the downloader. The CLI decides which of them are
 * fatal; per-segment failures are caught by the downloader and recorded.
 */
export class DownloaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A date/time expression matched neither the absolute nor relative grammar. */
export class ParseError extends DownloaderError {}

/**
 * The resolved start is not strictly before the end. Named `RangeError` at
 * runtime so it reads the same as in user-facing messages.
 */
export class TimeRangeError extends DownloaderError {
  constructor(message: string) {
    super(message);
    this.name = "RangeError";
  }
}

/** Device unreachable: refused, DNS failure, timeout or a dropped stream. */
export class ConnectionError extends DownloaderError {}

export class UnauthorizedError extends DownloaderError {}

export class DeviceError extends DownloaderError {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string) {
    super(`Device error ${status}: ${detail}`);
    this.status = status;
    this.detail = detail;
  }
}

export class TruncatedResultsError extends DownloaderError {
  readonly pages: number;
  readonly received: number;

  constructor(pages: number, received: number) {
    super(
      `Device still reported more results after ${pages} pages; listing truncated at ${received} tracks`,
    );
    this.pages = pages;
    this.received = received;
  }
}

export class NotFoundError extends DownloaderError {
  constructor(name: string) {
    super(`Device '${name}' not found`);
  }
}

export class DuplicateNameError extends DownloaderError {
  constructor(name: string) {
    super(`Device '${name}' already exists (use --force to overwrite)`);
  }
}

export class RegistryFormatError extends DownloaderError {}

export class UsageError extends DownloaderError {}

/**
 * Flattens an error and its `cause` chain into one line.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts: string[] = [error.message];
  let current: Error = error;
  let guard = 0;
  while (guard < 4) {
    guard += 1;
    const cause: unknown = current.cause;
    if (cause === undefined || cause === null) {
      break;
    }
    if (cause instanceof Error) {
      parts.push(`cause=${cause.message}`);
      const code = errorCode(cause);
      if (code) {
        parts.push(`code=${code}`);
      }
      current = cause;
    } else {
      parts.push(`cause=${String(cause)}`);
      break;
    }
  }
  return parts.join(" | ");
}

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
