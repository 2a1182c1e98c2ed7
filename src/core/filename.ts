import { mkdir, open } from "node:fs/promises";
import path from "node:path";
import { formatFileTimestamp } from "./time.js";

export const VIDEO_EXTENSION = ".mp4";
const MAX_SUFFIX = 999;

export function buildSegmentFileName(
  start: Date,
  extension: string = VIDEO_EXTENSION,
): string {
  return `${formatFileTimestamp(start)}${extension}`;
}

/**
 * `<output>/<address>/camera<channel>`, with the address made path-safe
 * (`10.0.0.5:8080` -> `10.0.0.5_8080`).
 */
export function segmentDirectory(
  outputDir: string,
  address: string,
  channel: number,
): string {
  const host = address.replace(/^https?:\/\//i, "").replace(/\/+$/, "");
  return path.join(outputDir, sanitizeFileNamePart(host), `camera${channel}`);
}

export function sanitizeFileNamePart(value: string): string {
  const sanitized = value
    .replace(/[\\/:*?"<>|]/g, "_")
    .replace(/_+/g, "_")
    .replace(/\s+/g, " ")
    .trim();
  return sanitized === "" ? "device" : sanitized;
}

/**
 * Creates an empty file for `fileName` in `dir`, appending `_1`, `_2`, ...
 * before the extension while the name is taken. Creation uses O_EXCL, so
 * an existing recording is never overwritten.
 */
export async function reserveFilePath(
  dir: string,
  fileName: string,
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);

  for (let suffix = 0; suffix <= MAX_SUFFIX; suffix += 1) {
    const candidate = path.join(
      dir,
      suffix === 0 ? fileName : `${stem}_${suffix}${ext}`,
    );
    try {
      const handle = await open(candidate, "wx");
      await handle.close();
      return candidate;
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
        throw error;
      }
    }
  }
  throw new Error(`No free file name for ${fileName} in ${dir}`);
}
