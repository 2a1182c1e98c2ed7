import { ParseError, TimeRangeError } from "./errors.js";
import type { TimeRange } from "./time.js";

/**
 * Free-text date/time expressions are read as local wall-clock values and
 * turned into instants with the host zone offset valid on that date, so a
 * range spanning a DST change still lines up with the recorder's UTC clock.
 *
 * Supported input, tried in order:
 * - natural language combined with a time: `yesterday 08:00`, `8:30 pm today`,
 *   `2 days ago 14:00`, `last week 9am`
 * - natural language: `now`, `today`, `yesterday`, `tomorrow`,
 *   `3 days ago`, `2 weeks from now`, `next month`, `last year`
 * - absolute dates with an optional time: `2024-04-12 08:00:00`,
 *   `2024/04/12`, `04/12/2024`, `12.04.2024`, `April 12, 2024 8:00 PM`,
 *   `12 Apr 2024`
 */

const UNITS = ["minute", "hour", "day", "week", "month", "year"] as const;
const PERIODS = ["week", "month", "year"] as const;

type Unit = (typeof UNITS)[number];
type Period = (typeof PERIODS)[number];

const DAY_OFFSETS: Record<string, number> = {
  today: 0,
  yesterday: -1,
  tomorrow: 1,
};
const PERIOD_STEPS: Record<string, number> = { this: 0, next: 1, last: -1 };

interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
  utc: boolean;
}

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const TIME_PATTERN =
  "\\d{1,2}:\\d{2}(?::\\d{2})?\\s*(?:am|pm)?z?|\\d{1,2}\\s*(?:am|pm)";
const TRAILING_TIME = new RegExp(`^(.+?)\\s+(${TIME_PATTERN})$`);
const LEADING_TIME = new RegExp(`^(${TIME_PATTERN})\\s+(.+)$`);

export function parseDateTime(text: string, now: Date = new Date()): Date {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, " ");
  if (normalized === "") {
    throw new ParseError("Empty date/time expression");
  }

  const result =
    parseNaturalWithTime(normalized, now) ??
    parseNatural(normalized, now) ??
    parseAbsolute(normalized);
  if (!result) {
    throw new ParseError(`Unable to parse date/time: "${text.trim()}"`);
  }
  return result;
}

/**
 * Resolves the user's start/end expressions into a UTC half-open interval.
 * A missing or blank end means "now".
 */
export function resolveTimeRange(
  startText: string,
  endText?: string,
  now: Date = new Date(),
): TimeRange {
  const start = parseDateTime(startText, now);
  const end =
    endText === undefined || endText.trim() === ""
      ? new Date(now.getTime())
      : parseDateTime(endText, now);
  if (start.getTime() >= end.getTime()) {
    throw new TimeRangeError(
      `Start (${start.toISOString()}) must be before end (${end.toISOString()})`,
    );
  }
  return Object.freeze({ start, end });
}

/**
 * Splits unquoted command-line words into start and end expressions:
 * `2024-04-12 00:00 2024-04-12 04:00` -> `2024-04-12 00:00` / `2024-04-12 04:00`.
 *
 * A time word sticks to the date before it, so `yesterday 08:00 now` splits
 * after `08:00`. Among such splits the shortest parseable start wins; splits
 * that open the end with a time word are tried only after those. When no
 * split parses, every word goes to the start so its ParseError is reported.
 */
export function splitRangeWords(
  words: readonly string[],
  now: Date = new Date(),
): { start: string; end?: string } {
  const candidates = words.map((_, i) => i + 1);
  const preferred = candidates.filter((k) => !opensWithTime(words, k));
  const fallback = candidates.filter((k) => opensWithTime(words, k));
  for (const k of [...preferred, ...fallback]) {
    const start = words.slice(0, k).join(" ");
    const end = words.slice(k).join(" ");
    if (parses(start, now) && (end === "" || parses(end, now))) {
      return end === "" ? { start } : { start, end };
    }
  }
  return { start: words.join(" ") };
}

const TIME_WORD = /^(?:\d{1,2}:\d{2}(?::\d{2})?(?:am|pm)?z?|\d{1,2}(?:am|pm)|am|pm)$/i;

function opensWithTime(words: readonly string[], k: number): boolean {
  const first = words[k];
  if (first === undefined) {
    return false;
  }
  const next = words[k + 1] ?? "";
  return TIME_WORD.test(first) || (/^\d{1,2}$/.test(first) && /^(?:am|pm)$/i.test(next));
}

function parses(text: string, now: Date): boolean {
  try {
    parseDateTime(text, now);
    return true;
  } catch (error) {
    if (error instanceof ParseError) {
      return false;
    }
    throw error;
  }
}

function parseNaturalWithTime(text: string, now: Date): Date | null {
  const trailing = TRAILING_TIME.exec(text);
  const leading = trailing ? null : LEADING_TIME.exec(text);
  const naturalText = trailing?.[1] ?? leading?.[2];
  const timeText = trailing?.[2] ?? leading?.[1];
  if (naturalText === undefined || timeText === undefined) {
    return null;
  }
  const base = parseNatural(naturalText, now);
  const time = parseTimeOfDay(timeText);
  if (!base || !time) {
    return null;
  }
  return buildDate(
    {
      year: base.getFullYear(),
      month: base.getMonth() + 1,
      day: base.getDate(),
    },
    time,
  );
}

function parseNatural(text: string, now: Date): Date | null {
  if (text === "now") {
    return new Date(now.getTime());
  }

  const dayWord = /^(today|yesterday|tomorrow)$/.exec(text);
  if (dayWord) {
    const offset = DAY_OFFSETS[dayWord[1]] ?? 0;
    const day = startOfDay(now);
    day.setDate(day.getDate() + offset);
    return day;
  }

  const relative =
    /^(\d+) (minute|hour|day|week|month|year)s? (ago|from now)$/.exec(text);
  const unit = relative ? UNITS.find((u) => u === relative[2]) : undefined;
  if (relative && unit) {
    const count = Number(relative[1]) * (relative[3] === "ago" ? -1 : 1);
    return shift(now, unit, count);
  }

  const period = /^(this|next|last) (week|month|year)$/.exec(text);
  const periodUnit = period
    ? PERIODS.find((p) => p === period[2])
    : undefined;
  if (period && periodUnit) {
    const step = PERIOD_STEPS[period[1]] ?? 0;
    return shift(startOfPeriod(now, periodUnit), periodUnit, step);
  }

  return null;
}

function parseAbsolute(text: string): Date | null {
  let m = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:(?:t| )(.+))?$/.exec(text);
  if (m) {
    return withTime(
      { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) },
      m[4],
    );
  }

  m = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})(?: (.+))?$/.exec(text);
  if (m) {
    return withTime(
      { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) },
      m[4],
    );
  }

  // MM/DD/YYYY, or DD/MM/YYYY when the first field cannot be a month.
  m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (.+))?$/.exec(text);
  if (m) {
    const first = Number(m[1]);
    const second = Number(m[2]);
    const dayFirst = first > 12;
    return withTime(
      {
        year: Number(m[3]),
        month: dayFirst ? second : first,
        day: dayFirst ? first : second,
      },
      m[4],
    );
  }

  m = /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?: (.+))?$/.exec(text);
  if (m) {
    return withTime(
      { year: Number(m[3]), month: Number(m[2]), day: Number(m[1]) },
      m[4],
    );
  }

  m = /^([a-z]+)\.? (\d{1,2})(?:st|nd|rd|th)?,? (\d{4})(?:,? (.+))?$/.exec(
    text,
  );
  if (m) {
    const month = monthNumber(m[1]);
    return month === null
      ? null
      : withTime({ year: Number(m[3]), month, day: Number(m[2]) }, m[4]);
  }

  m = /^(\d{1,2})(?:st|nd|rd|th)? ([a-z]+)\.?,? (\d{4})(?:,? (.+))?$/.exec(
    text,
  );
  if (m) {
    const month = monthNumber(m[2]);
    return month === null
      ? null
      : withTime({ year: Number(m[3]), month, day: Number(m[1]) }, m[4]);
  }

  return null;
}

function withTime(date: CalendarDate, timeText: string | undefined): Date | null {
  if (timeText === undefined) {
    return buildDate(date, { hours: 0, minutes: 0, seconds: 0, utc: false });
  }
  const time = parseTimeOfDay(timeText);
  return time ? buildDate(date, time) : null;
}

function parseTimeOfDay(text: string): TimeOfDay | null {
  const m =
    /^(\d{1,2})(?::(\d{2}))?(?::(\d{2}))?\s*(am|pm)?(z)?$/.exec(text.trim());
  if (!m) {
    return null;
  }
  const [, h, mi, s, meridiem, zulu] = m;
  if (mi === undefined && meridiem === undefined) {
    return null;
  }
  let hours = Number(h);
  const minutes = Number(mi ?? "0");
  const seconds = Number(s ?? "0");
  if (meridiem) {
    if (hours < 1 || hours > 12) {
      return null;
    }
    hours = (hours % 12) + (meridiem === "pm" ? 12 : 0);
  }
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return { hours, minutes, seconds, utc: zulu !== undefined };
}

function buildDate(date: CalendarDate, time: TimeOfDay): Date | null {
  const { year, month, day } = date;
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const result = time.utc
    ? new Date(
        Date.UTC(year, month - 1, day, time.hours, time.minutes, time.seconds),
      )
    : new Date(year, month - 1, day, time.hours, time.minutes, time.seconds);
  // Rejects Feb 30 and friends, which Date would silently roll over.
  const actualDay = time.utc ? result.getUTCDate() : result.getDate();
  const actualMonth = time.utc ? result.getUTCMonth() : result.getMonth();
  if (actualDay !== day || actualMonth !== month - 1) {
    return null;
  }
  return result;
}

function monthNumber(name: string): number | null {
  const key = name === "sept" ? "sep" : name;
  const index = MONTHS.findIndex(
    (full) => full === key || full.slice(0, 3) === key,
  );
  return index < 0 ? null : index + 1;
}

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function startOfPeriod(date: Date, period: Period): Date {
  switch (period) {
    case "week": {
      const day = startOfDay(date);
      const sinceMonday = (day.getDay() + 6) % 7;
      day.setDate(day.getDate() - sinceMonday);
      return day;
    }
    case "month":
      return new Date(date.getFullYear(), date.getMonth(), 1);
    case "year":
      return new Date(date.getFullYear(), 0, 1);
  }
}

function shift(date: Date, unit: Unit, count: number): Date {
  const result = new Date(date.getTime());
  switch (unit) {
    case "minute":
      result.setTime(result.getTime() + count * 60_000);
      break;
    case "hour":
      result.setTime(result.getTime() + count * 3_600_000);
      break;
    case "day":
      result.setDate(result.getDate() + count);
      break;
    case "week":
      result.setDate(result.getDate() + count * 7);
      break;
    case "month":
      return addMonths(result, count);
    case "year":
      return addMonths(result, count * 12);
  }
  return result;
}

// Clamps to the last day of the target month (Mar 31 - 1 month = Feb 29).
function addMonths(date: Date, count: number): Date {
  const result = new Date(date.getTime());
  const day = result.getDate();
  result.setDate(1);
  result.setMonth(result.getMonth() + count);
  const lastDay = new Date(
    result.getFullYear(),
    result.getMonth() + 1,
    0,
  ).getDate();
  result.setDate(Math.min(day, lastDay));
  return result;
}
