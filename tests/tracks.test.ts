import { afterEach, describe, expect, it, vi } from "vitest";
import { createSigner } from "../src/core/auth.js";
import { DeviceError, TruncatedResultsError } from "../src/core/errors.js";
import { IsapiClient } from "../src/core/isapi.js";
import {
  buildSearchRequest,
  listTracks,
  parseSearchResponse,
  trackIdFor,
} from "../src/core/tracks.js";
import { child, childText, parseXml } from "../src/core/xml.js";
import type { FakeSegment } from "./helpers/fake-device.js";
import { FakeDevice } from "./helpers/fake-device.js";

const range = {
  start: new Date(Date.UTC(2024, 3, 12, 0, 0, 0)),
  end: new Date(Date.UTC(2024, 3, 12, 4, 0, 0)),
};

function hourly(count: number): FakeSegment[] {
  return Array.from({ length: count }, (_, i) => ({
    start: `20240412T0${i}0000Z`,
    end: `20240412T0${i}5959Z`,
    body: `segment-${i}`,
  }));
}

function clientFor(device: FakeDevice): IsapiClient {
  vi.spyOn(globalThis, "fetch").mockImplementation(device.fetch);
  return new IsapiClient({
    baseUrl: "http://10.0.0.5",
    signer: createSigner({ kind: "none" }),
    timeoutMs: 1000,
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildSearchRequest", () => {
  it("describes one main-stream track and window", () => {
    const xml = buildSearchRequest({
      searchId: "search-1",
      channel: 2,
      range,
      position: 50,
      maxResults: 50,
    });
    const description = child(parseXml(xml), "CMSearchDescription");

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?><CMSearchDescription')).toBe(true);
    expect(childText(description, "searchID")).toBe("search-1");
    expect(childText(child(description, "trackIDList"), "trackID")).toBe("201");
    expect(child(child(description, "timeSpanList"), "timeSpan")).toEqual({
      startTime: "2024-04-12T00:00:00Z",
      endTime: "2024-04-12T04:00:00Z",
    });
    expect(childText(description, "searchResultPostion")).toBe("50");
    expect(childText(description, "maxResults")).toBe("50");
  });

  it("derives track ids from the channel", () => {
    expect(trackIdFor(1)).toBe("101");
    expect(trackIdFor(12)).toBe("1201");
  });
});

describe("parseSearchResponse", () => {
  it("returns no tracks for NO MATCHES", () => {
    expect(
      parseSearchResponse(
        "<CMSearchResult><responseStatus>true</responseStatus><responseStatusStrg>NO MATCHES</responseStatusStrg></CMSearchResult>",
      ),
    ).toEqual({ status: "NO MATCHES", more: false, tracks: [] });
  });

  it("reads times from the playback URI when the span is missing", () => {
    const page = parseSearchResponse(
      "<CMSearchResult><responseStatus>true</responseStatus><responseStatusStrg>OK</responseStatusStrg><matchList><searchMatchItem><mediaSegmentDescriptor><playbackURI>rtsp://10.0.0.5/Streaming/tracks/101/?starttime=20240412T010000Z&amp;endtime=20240412T015959Z</playbackURI></mediaSegmentDescriptor></searchMatchItem></matchList></CMSearchResult>",
    );

    expect(page.tracks).toEqual([
      {
        start: new Date(Date.UTC(2024, 3, 12, 1, 0, 0)),
        end: new Date(Date.UTC(2024, 3, 12, 1, 59, 59)),
        playbackUri:
          "rtsp://10.0.0.5/Streaming/tracks/101/?starttime=20240412T010000Z&endtime=20240412T015959Z",
      },
    ]);
  });

  it("fails on a negative response status", () => {
    expect(() =>
      parseSearchResponse(
        "<CMSearchResult><responseStatus>false</responseStatus><responseStatusStrg>FAILED</responseStatusStrg></CMSearchResult>",
      ),
    ).toThrow(DeviceError);
  });

  it("fails on a body that is not a search result", () => {
    expect(() => parseSearchResponse("<html></html>")).toThrow(
      "Device error 200: Search response has no CMSearchResult",
    );
  });
});

describe("listTracks", () => {
  it("returns an empty listing when nothing was recorded", async () => {
    const device = new FakeDevice({ auth: "none", segments: [] });
    const listing = await listTracks(clientFor(device), { channel: 1, range });

    expect(listing.tracks).toEqual([]);
    expect(listing.truncated).toBeUndefined();
    expect(device.searches).toHaveLength(1);
  });

  it("follows MORE across pages with one search id", async () => {
    const device = new FakeDevice({ auth: "none", segments: hourly(5), pageLimit: 2 });
    const listing = await listTracks(clientFor(device), { channel: 1, range });

    expect(device.searches).toHaveLength(3);
    expect(listing.pages).toBe(3);
    expect(listing.tracks.map((t) => t.start.toISOString())).toEqual([
      "2024-04-12T00:00:00.000Z",
      "2024-04-12T01:00:00.000Z",
      "2024-04-12T02:00:00.000Z",
      "2024-04-12T03:00:00.000Z",
    ]);
    expect(listing.dropped).toBe(1);
    const descriptions = device.searches.map((r) =>
      child(parseXml(r.body ?? ""), "CMSearchDescription"),
    );
    expect(descriptions.map((d) => childText(d, "searchResultPostion"))).toEqual([
      "0",
      "2",
      "4",
    ]);
    expect(new Set(descriptions.map((d) => childText(d, "searchID"))).size).toBe(1);
    expect(listing.outOfOrder).toBe(false);
  });

  it("keeps only tracks starting inside the half-open window", async () => {
    const device = new FakeDevice({
      auth: "none",
      pageLimit: 2,
      segments: [
        { start: "20240411T233000Z", end: "20240412T002959Z", body: "before" },
        { start: "20240412T010000Z", end: "20240412T015959Z", body: "inside" },
        { start: "20240412T040000Z", end: "20240412T045959Z", body: "at-end" },
      ],
    });
    const listing = await listTracks(clientFor(device), { channel: 1, range });

    expect(listing.tracks.map((t) => t.start.toISOString())).toEqual([
      "2024-04-12T01:00:00.000Z",
    ]);
    expect(listing.dropped).toBe(2);
    expect(
      device.searches.map((r) =>
        childText(child(parseXml(r.body ?? ""), "CMSearchDescription"), "searchResultPostion"),
      ),
    ).toEqual(["0", "2"]);
  });

  it("stops at the page cap and marks the listing truncated", async () => {
    const device = new FakeDevice({
      auth: "none",
      segments: hourly(3),
      pageLimit: 1,
      endlessMore: true,
    });
    const listing = await listTracks(clientFor(device), {
      channel: 1,
      range,
      maxPages: 2,
    });

    expect(listing.tracks).toHaveLength(2);
    expect(listing.truncated).toBeInstanceOf(TruncatedResultsError);
    expect(device.searches).toHaveLength(2);
  });

  it("keeps device order and flags it when not chronological", async () => {
    const [first, second, third] = hourly(3);
    const device = new FakeDevice({ auth: "none", segments: [second, first, third] });
    const listing = await listTracks(clientFor(device), { channel: 1, range });

    expect(listing.outOfOrder).toBe(true);
    expect(listing.tracks.map((t) => t.start.getUTCHours())).toEqual([1, 0, 2]);
  });

  it("reports device errors from the search endpoint", async () => {
    const device = new FakeDevice({ auth: "none", searchStatus: 400 });

    await expect(
      listTracks(clientFor(device), { channel: 1, range }),
    ).rejects.toThrow("Device error 400: Invalid Operation - notSupport");
  });
});
