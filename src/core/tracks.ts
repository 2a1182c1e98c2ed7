import { randomUUID } from "node:crypto";
import { DeviceError, ParseError, TruncatedResultsError } from "./errors.js";
import type { TimeRange } from "./time.js";
import { formatDeviceTimestamp, parseDeviceTimestamp } from "./time.js";
import {
  ISAPI_NAMESPACE,
  buildXml,
  child,
  childList,
  childText,
  parseXml,
} from "./xml.js";

export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_MAX_PAGES = 100;
const RECORD_TYPE_DESCRIPTOR = "//recordType.meta.std-cgi.com";

export interface TrackDescriptor {
  readonly start: Date;
  readonly end: Date;
  readonly playbackUri: string;
}

export interface SearchPage {
  status: string;
  more: boolean;
  tracks: TrackDescriptor[];
}

export interface TrackListing {
  /** Tracks whose start lies in `[range.start, range.end)`. */
  tracks: TrackDescriptor[];
  pages: number;
  /** Matches the device returned that start outside the range. */
  dropped: number;
  /** Set when the page cap was hit while the device still reported more. */
  truncated?: TruncatedResultsError;
  outOfOrder: boolean;
}

export interface SearchClient {
  search(body: string): Promise<string>;
}

export interface ListTracksOptions {
  channel: number;
  range: TimeRange;
  pageSize?: number;
  maxPages?: number;
  searchId?: string;
  onPage?: (page: SearchPage, pageNumber: number) => void;
}

export interface SearchRequest {
  searchId: string;
  channel: number;
  range: TimeRange;
  position: number;
  maxResults: number;
}

/** Main-stream track of a channel: channel 1 -> 101, channel 12 -> 1201. */
export function trackIdFor(channel: number): string {
  return String(channel * 100 + 1);
}

export function buildSearchRequest(request: SearchRequest): string {
  return buildXml({
    CMSearchDescription: {
      "@_version": "2.0",
      "@_xmlns": ISAPI_NAMESPACE,
      searchID: request.searchId,
      trackIDList: { trackID: trackIdFor(request.channel) },
      timeSpanList: {
        timeSpan: {
          startTime: formatDeviceTimestamp(request.range.start),
          endTime: formatDeviceTimestamp(request.range.end),
        },
      },
      maxResults: String(request.maxResults),
      // Sic: the device schema spells it this way.
      searchResultPostion: String(request.position),
      metadataList: { metadataDescriptor: RECORD_TYPE_DESCRIPTOR },
    },
  });
}

export function parseSearchResponse(xml: string): SearchPage {
  let document: unknown;
  try {
    document = parseXml(xml);
  } catch (error) {
    throw new DeviceError(200, `Unreadable search response: ${String(error)}`);
  }
  const result = child(document, "CMSearchResult");
  if (result === undefined) {
    throw new DeviceError(200, "Search response has no CMSearchResult");
  }

  const statusText = (childText(result, "responseStatusStrg") ?? "OK")
    .trim()
    .toUpperCase();
  if (childText(result, "responseStatus")?.trim().toLowerCase() === "false") {
    throw new DeviceError(200, `Search failed: ${statusText}`);
  }

  const items = childList(child(result, "matchList"), "searchMatchItem");
  const tracks = statusText === "NO MATCHES" ? [] : items.map(toTrack);
  return { status: statusText, more: statusText === "MORE", tracks };
}

/**
 * Enumerates the recordings of `channel` that start inside the range,
 * following the device's MORE marker page by page. The device also reports
 * recordings that merely overlap the range; those are counted in `dropped`.
 * Device order is kept as is.
 */
export async function listTracks(
  client: SearchClient,
  options: ListTracksOptions,
): Promise<TrackListing> {
  const searchId = options.searchId ?? randomUUID();
  const maxResults = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const tracks: TrackDescriptor[] = [];
  let position = 0;
  let pages = 0;
  let dropped = 0;
  let truncated: TruncatedResultsError | undefined;

  for (;;) {
    if (pages >= maxPages) {
      truncated = new TruncatedResultsError(pages, position);
      break;
    }
    const xml = await client.search(
      buildSearchRequest({
        searchId,
        channel: options.channel,
        range: options.range,
        position,
        maxResults,
      }),
    );
    pages += 1;
    const page = parseSearchResponse(xml);
    options.onPage?.(page, pages);
    for (const track of page.tracks) {
      if (startsWithin(track, options.range)) {
        tracks.push(track);
      } else {
        dropped += 1;
      }
    }
    // The cursor counts every match, kept or not.
    position += page.tracks.length;
    if (!page.more || page.tracks.length === 0) {
      break;
    }
  }

  return {
    tracks,
    pages,
    dropped,
    truncated,
    outOfOrder: !isChronological(tracks),
  };
}

/** Half-open: a track starting exactly at `range.end` belongs to the next window. */
export function startsWithin(track: TrackDescriptor, range: TimeRange): boolean {
  const start = track.start.getTime();
  return start >= range.start.getTime() && start < range.end.getTime();
}

export function isChronological(tracks: readonly TrackDescriptor[]): boolean {
  return tracks.every(
    (track, i) => i === 0 || tracks[i - 1].start.getTime() <= track.start.getTime(),
  );
}

function toTrack(item: unknown): TrackDescriptor {
  const playbackUri = childText(
    child(item, "mediaSegmentDescriptor"),
    "playbackURI",
  )?.trim();
  if (!playbackUri) {
    throw new DeviceError(200, "Search match without playbackURI");
  }
  const span = child(item, "timeSpan");
  const start = readTime(childText(span, "startTime"), playbackUri, "starttime");
  const end = readTime(childText(span, "endTime"), playbackUri, "endtime");
  return { start, end, playbackUri };
}

// Falls back to the starttime/endtime parameters embedded in the URI.
function readTime(
  value: string | undefined,
  playbackUri: string,
  param: "starttime" | "endtime",
): Date {
  const fromUri = new RegExp(`[?&]${param}=([^&]+)`, "i").exec(playbackUri)?.[1];
  const text = value ?? fromUri;
  if (text === undefined) {
    throw new DeviceError(200, `Search match without ${param}: ${playbackUri}`);
  }
  try {
    return parseDeviceTimestamp(text);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new DeviceError(200, error.message);
    }
    throw error;
  }
}
