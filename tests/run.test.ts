import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../src/cli/logger.js";
import { UnauthorizedError } from "../src/core/errors.js";
import { runDownload } from "../src/core/run.js";
import { CaptureWriter } from "./helpers/capture.js";
import type { FakeSegment } from "./helpers/fake-device.js";
import { FakeDevice } from "./helpers/fake-device.js";

const credentials = { username: "admin", password: "test-secret" };
const range = {
  start: new Date(Date.UTC(2024, 3, 12, 0, 0, 0)),
  end: new Date(Date.UTC(2024, 3, 12, 4, 0, 0)),
};
const segments: FakeSegment[] = [0, 1, 2, 3].map((hour) => ({
  start: `20240412T0${hour}0000Z`,
  end: `20240412T0${hour}5959Z`,
  body: `camera-1-hour-${hour}`,
  breakAfter: hour === 2 ? 4 : undefined,
}));

let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(path.join(os.tmpdir(), "isapi-dl-run-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(outputDir, { recursive: true, force: true });
});

function deviceWith(auth: "none" | "digest"): FakeDevice {
  const device = new FakeDevice({ auth, ...credentials, segments, pageLimit: 3 });
  vi.spyOn(globalThis, "fetch").mockImplementation(device.fetch);
  return device;
}

describe("runDownload", () => {
  it("downloads a four hour window behind digest auth", async () => {
    const device = deviceWith("digest");
    const writer = new CaptureWriter();

    const summary = await runDownload({
      connection: { address: "10.0.0.5", channel: 1, timeoutSeconds: 5, credentials },
      range,
      outputDir,
      logger: new Logger("info", writer),
    });

    expect(summary).toMatchObject({
      authentication: "digest",
      requested: 4,
      succeeded: 3,
      failed: 1,
    });
    expect(device.requests.map((r) => r.path)).toEqual([
      "/ISAPI/System/time",
      "/ISAPI/System/time",
      "/ISAPI/ContentMgmt/search",
      "/ISAPI/ContentMgmt/search",
      "/ISAPI/ContentMgmt/download",
      "/ISAPI/ContentMgmt/download",
      "/ISAPI/ContentMgmt/download",
      "/ISAPI/ContentMgmt/download",
    ]);
    expect(
      device.requests.slice(1).every((r) => r.authorization?.startsWith("Digest ")),
    ).toBe(true);
    expect((await readdir(path.join(outputDir, "10.0.0.5", "camera1"))).sort()).toEqual([
      "2024-04-12_00-00-00Z.mp4",
      "2024-04-12_01-00-00Z.mp4",
      "2024-04-12_03-00-00Z.mp4",
    ]);
    expect(writer.stdout).toContain("INFO Authentication: digest");
    expect(writer.stdout).toContain("INFO Found 4 segments");
    expect(writer.stdout).toContain(
      `OK [1/4] ${path.join(outputDir, "10.0.0.5", "camera1", "2024-04-12_00-00-00Z.mp4")}`,
    );
    expect(writer.stderr.some((line) => line.startsWith("FAIL [3/4] 2024-04-12T02:00:00Z -> "))).toBe(
      true,
    );
  });

  it("stops after listing when asked", async () => {
    const device = deviceWith("none");

    const summary = await runDownload({
      connection: { address: "10.0.0.5", channel: 1, timeoutSeconds: 5 },
      range,
      outputDir,
      logger: Logger.silent(),
      listOnly: true,
    });

    expect(summary.listing.tracks).toHaveLength(4);
    expect(summary.requested).toBe(0);
    expect(device.downloads).toHaveLength(0);
    expect(await readdir(outputDir)).toEqual([]);
  });

  it("downloads only segments that start inside the window", async () => {
    const device = new FakeDevice({
      auth: "none",
      segments: [
        { start: "20240411T233000Z", end: "20240412T002959Z", body: "before" },
        { start: "20240412T010000Z", end: "20240412T015959Z", body: "inside" },
        { start: "20240412T040000Z", end: "20240412T045959Z", body: "at-end" },
      ],
    });
    vi.spyOn(globalThis, "fetch").mockImplementation(device.fetch);
    const writer = new CaptureWriter();

    const summary = await runDownload({
      connection: { address: "10.0.0.5", channel: 1, timeoutSeconds: 5 },
      range,
      outputDir,
      logger: new Logger("debug", writer),
    });

    expect(summary).toMatchObject({ requested: 1, succeeded: 1, failed: 0 });
    expect(device.downloads).toHaveLength(1);
    expect(await readdir(path.join(outputDir, "10.0.0.5", "camera1"))).toEqual([
      "2024-04-12_01-00-00Z.mp4",
    ]);
    expect(writer.stdout).toContain("DEBUG Dropped 2 segments starting outside the window");
    expect(writer.stdout).toContain("INFO Found 1 segments");
  });

  it("aborts before listing when credentials are rejected", async () => {
    const device = deviceWith("digest");

    await expect(
      runDownload({
        connection: {
          address: "10.0.0.5",
          channel: 1,
          timeoutSeconds: 5,
          credentials: { username: "admin", password: "wrong" },
        },
        range,
        outputDir,
        logger: Logger.silent(),
      }),
    ).rejects.toThrow(UnauthorizedError);
    expect(device.searches).toHaveLength(0);
  });

  it("warns when the listing was truncated", async () => {
    const device = new FakeDevice({ auth: "none", segments, pageLimit: 1, endlessMore: true });
    vi.spyOn(globalThis, "fetch").mockImplementation(device.fetch);
    const writer = new CaptureWriter();

    const summary = await runDownload({
      connection: { address: "10.0.0.5", channel: 1, timeoutSeconds: 5 },
      range,
      outputDir,
      logger: new Logger("warn", writer),
      listOnly: true,
      maxPages: 2,
    });

    expect(summary.listing.tracks).toHaveLength(2);
    expect(writer.stderr).toEqual([
      "WARN Device still reported more results after 2 pages; listing truncated at 2 tracks",
    ]);
  });
});
