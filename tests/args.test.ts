import { describe, expect, it } from "vitest";
import { parseCliArgs } from "../src/cli/args.js";
import { UsageError } from "../src/core/errors.js";

describe("parseCliArgs", () => {
  it("reads the direct address form", () => {
    expect(
      parseCliArgs(["--channel", "2", "10.0.0.5", "2024-04-12", "00:00", "2024-04-12", "04:00"]),
    ).toEqual({
      kind: "download",
      target: { kind: "address", address: "10.0.0.5" },
      dateWords: ["2024-04-12", "00:00", "2024-04-12", "04:00"],
      end: undefined,
      channel: 2,
      timeout: undefined,
      username: undefined,
      password: undefined,
      output: "video",
      listOnly: false,
      retries: 0,
      configDir: undefined,
      verbosity: 0,
    });
  });

  it("reads the saved device form with shared options", () => {
    expect(
      parseCliArgs([
        "--device",
        "office",
        "yesterday",
        "--end",
        "today",
        "-o",
        "clips",
        "--list-only",
        "--retries",
        "2",
        "-v",
        "-v",
      ]),
    ).toMatchObject({
      kind: "download",
      target: { kind: "device", name: "office" },
      dateWords: ["yesterday"],
      end: "today",
      output: "clips",
      listOnly: true,
      retries: 2,
      verbosity: 2,
    });
  });

  it("reads device management commands", () => {
    expect(
      parseCliArgs([
        "device",
        "add",
        "office",
        "--address",
        "192.168.1.64",
        "--username",
        "admin",
        "--force",
      ]),
    ).toMatchObject({
      kind: "device-add",
      name: "office",
      address: "192.168.1.64",
      username: "admin",
      force: true,
    });
    expect(parseCliArgs(["device", "list"])).toMatchObject({ kind: "device-list" });
    expect(parseCliArgs(["device", "remove", "office"])).toMatchObject({
      kind: "device-remove",
      name: "office",
    });
  });

  it("recognises help", () => {
    expect(parseCliArgs(["10.0.0.5", "-h"])).toEqual({ kind: "help" });
  });

  it.each<{ argv: string[]; message: string }>([
    { argv: ["10.0.0.5"], message: "Missing start date/time" },
    { argv: [], message: "Missing device address (or --device <name>)" },
    {
      argv: ["--channel", "0", "10.0.0.5", "today"],
      message: "--channel must be a positive integer",
    },
    {
      argv: ["--timeout", "ten", "10.0.0.5", "today"],
      message: "--timeout must be a whole number (got 'ten')",
    },
    { argv: ["device", "add", "office"], message: "device add requires --address" },
    { argv: ["device", "rename", "office"], message: "Unknown device command: rename" },
    {
      argv: ["--force", "10.0.0.5", "today"],
      message: "--address and --force belong to 'device add'",
    },
  ])("rejects: $message", ({ argv, message }) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message));
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["--bogus", "10.0.0.5", "today"])).toThrow(UsageError);
  });
});
