import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  buildSegmentFileName,
  reserveFilePath,
  sanitizeFileNamePart,
  segmentDirectory,
} from "../src/core/filename.js";

describe("buildSegmentFileName", () => {
  it("names segments by their UTC start", () => {
    expect(buildSegmentFileName(new Date(Date.UTC(2024, 3, 12, 0, 0, 0)))).toBe(
      "2024-04-12_00-00-00Z.mp4",
    );
  });
});

describe("segmentDirectory", () => {
  it("nests address and camera under the output directory", () => {
    expect(segmentDirectory("video", "10.0.0.5:8080", 2)).toBe(
      path.join("video", "10.0.0.5_8080", "camera2"),
    );
    expect(segmentDirectory("video", "http://nvr.local/", 1)).toBe(
      path.join("video", "nvr.local", "camera1"),
    );
  });
});

describe("sanitizeFileNamePart", () => {
  it("sanitizes forbidden path chars", () => {
    expect(sanitizeFileNamePart('A/B:C*D?"E<F>G|')).toBe("A_B_C_D_E_F_G_");
    expect(sanitizeFileNamePart("  ")).toBe("device");
  });
});

describe("reserveFilePath", () => {
  it("appends a counter while the name is taken", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "isapi-dl-names-"));
    try {
      await writeFile(path.join(dir, "clip.mp4"), "a");
      await writeFile(path.join(dir, "clip_1.mp4"), "b");

      expect(await reserveFilePath(dir, "clip.mp4")).toBe(path.join(dir, "clip_2.mp4"));
      expect((await readdir(dir)).sort()).toEqual(["clip.mp4", "clip_1.mp4", "clip_2.mp4"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("creates missing directories", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "isapi-dl-names-"));
    try {
      const nested = path.join(dir, "10.0.0.5", "camera1");
      expect(await reserveFilePath(nested, "clip.mp4")).toBe(path.join(nested, "clip.mp4"));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
