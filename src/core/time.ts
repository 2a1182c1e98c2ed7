import { ParseError } from "./errors.js";

/**
 * Search requests are sent in UTC, extended form. Responses use the same
 * form (some firmware appends an offset instead of Z); playback URIs carry
 * the basic form.
 *
 *   2024-04-12T00:00:00Z       (search request / response)
 *   2024-04-12T08:00:00+08:00  (search response, local firmware)
 *   20240412T000000Z           (playbackURI starttime/endtime)
 */
const EXTENDED =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(Z|[+-]\d{2}:\d{2})$/;
const BASIC_UTC = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z)$/;

export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

export function formatDeviceTimestamp(date: Date): string {
  return `${datePart(date, "-")}T${timePart(date, ":")}Z`;
}

export function parseDeviceTimestamp(text: string): Date {
  const trimmed = text.trim();
  const m = EXTENDED.exec(trimmed) ?? BASIC_UTC.exec(trimmed);
  if (!m) {
    throw new ParseError(`Invalid device timestamp: ${text}`);
  }
  const [, y, mo, d, h, mi, s, zone] = m;
  const utc = Date.UTC(
    Number(y),
    Number(mo) - 1,
    Number(d),
    Number(h),
    Number(mi),
    Number(s),
  );
  return new Date(utc - offsetMinutes(zone) * 60_000);
}

/**
 * File-system safe UTC stamp, e.g. `2024-04-12_00-00-00Z`.
 */
export function formatFileTimestamp(date: Date): string {
  return `${datePart(date, "-")}_${timePart(date, "-")}Z`;
}

export function describeRange(range: TimeRange): string {
  return `${formatDeviceTimestamp(range.start)} .. ${formatDeviceTimestamp(range.end)}`;
}

function offsetMinutes(zone: string): number {
  if (zone === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const [hours, minutes] = zone.slice(1).split(":").map(Number);
  return sign * (hours * 60 + minutes);
}

function datePart(date: Date, sep: string): string {
  const y = date.getUTCFullYear().toString().padStart(4, "0");
  const m = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const d = date.getUTCDate().toString().padStart(2, "0");
  return [y, m, d].join(sep);
}

function timePart(date: Date, sep: string): string {
  const h = date.getUTCHours().toString().padStart(2, "0");
  const mi = date.getUTCMinutes().toString().padStart(2, "0");
  const s = date.getUTCSeconds().toString().padStart(2, "0");
  return [h, mi, s].join(sep);
}
