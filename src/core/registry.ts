import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import {
  DuplicateNameError,
  NotFoundError,
  RegistryFormatError,
  formatError,
} from "./errors.js";
import type { RunLogger } from "./logging.js";

export const DEFAULT_CHANNEL = 1;
export const DEFAULT_TIMEOUT_SECONDS = 10;

const REGISTRY_FILE = "devices.yaml";
const LEGACY_FILE = "devices.json";

export interface DeviceConfig {
  name: string;
  address: string;
  channel: number;
  timeout: number;
  username?: string;
  password?: string;
}

export interface DeviceSummary {
  name: string;
  address: string;
  channel: number;
  timeout: number;
  hasUsername: boolean;
  hasPassword: boolean;
}

/** On-disk record: the table key carries the name. */
export type DeviceRecord = Omit<DeviceConfig, "name">;
export type RegistryTable = Record<string, DeviceRecord>;

export interface LegacyMigration {
  table: RegistryTable;
  /** One line per legacy entry that could not be carried over. */
  skipped: string[];
}

export function defaultConfigDir(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(base, "isapi-dl");
}

/**
 * Named device profiles kept in a YAML table, one top-level key per device:
 *
 *   office-nvr:
 *     address: 192.168.1.64
 *     channel: 2
 *     timeout: 10
 *     username: admin
 *
 * The previous JSON registry is upgraded on first read.
 */
export class DeviceRegistry {
  readonly filePath: string;
  readonly legacyFilePath: string;

  constructor(
    readonly configDir: string = defaultConfigDir(),
    private readonly logger?: Pick<RunLogger, "warn">,
  ) {
    this.filePath = path.join(configDir, REGISTRY_FILE);
    this.legacyFilePath = path.join(configDir, LEGACY_FILE);
  }

  async add(config: DeviceConfig, options: { overwrite?: boolean } = {}): Promise<void> {
    const record = validateRecord(config.name, { ...config });
    const table = await this.load();
    if (table[config.name] && !options.overwrite) {
      throw new DuplicateNameError(config.name);
    }
    table[config.name] = record;
    await this.save(table);
  }

  async get(name: string): Promise<DeviceConfig> {
    const table = await this.load();
    const record = table[name];
    if (!record) {
      throw new NotFoundError(name);
    }
    return { name, ...record };
  }

  async remove(name: string): Promise<void> {
    const table = await this.load();
    if (!table[name]) {
      throw new NotFoundError(name);
    }
    delete table[name];
    await this.save(table);
  }

  async list(): Promise<DeviceSummary[]> {
    const table = await this.load();
    return Object.keys(table)
      .sort((a, b) => a.localeCompare(b))
      .map((name) => {
        const record = table[name];
        return {
          name,
          address: record.address,
          channel: record.channel,
          timeout: record.timeout,
          hasUsername: !!record.username,
          hasPassword: !!record.password,
        };
      });
  }

  async load(): Promise<RegistryTable> {
    const current = await readOptional(this.filePath);
    if (current !== null) {
      return parseRegistry(current);
    }
    const legacy = await readOptional(this.legacyFilePath);
    if (legacy === null) {
      return {};
    }
    let migration: LegacyMigration;
    try {
      migration = migrateLegacyRegistry(legacy);
    } catch (error) {
      if (!(error instanceof RegistryFormatError)) {
        throw error;
      }
      // Left in place so the user can repair it by hand.
      this.logger?.warn(`Ignoring ${this.legacyFilePath}: ${formatError(error)}`);
      return {};
    }
    for (const line of migration.skipped) {
      this.logger?.warn(`Legacy registry: ${line}`);
    }
    await this.save(migration.table);
    await rename(this.legacyFilePath, `${this.legacyFilePath}.backup`);
    return migration.table;
  }

  private async save(table: RegistryTable): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.filePath, serializeRegistry(table), "utf-8");
  }
}

export function parseRegistry(text: string): RegistryTable {
  const parsed: unknown = YAML.parse(text);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isObject(parsed)) {
    throw new RegistryFormatError("Device registry must be a table of devices");
  }
  const table: RegistryTable = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (!isObject(value)) {
      throw new RegistryFormatError(`Device '${name}' must be a table`);
    }
    table[name] = validateRecord(name, value);
  }
  return table;
}

export function serializeRegistry(table: RegistryTable): string {
  return YAML.stringify(table);
}

/**
 * Old JSON layout, keyed by name with snake_case fields:
 *
 *   { "shop": { "device_name": "shop", "ip_address": "10.0.0.5",
 *               "camera_channel": 2, "timeout": 10 } }
 *
 * Entries that fail validation are left out and reported in `skipped`.
 * Throws only when the document as a whole is unusable.
 */
export function migrateLegacyRegistry(text: string): LegacyMigration {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new RegistryFormatError("Legacy device registry is not valid JSON", {
      cause: error,
    });
  }
  if (!isObject(parsed)) {
    throw new RegistryFormatError("Legacy device registry must be an object");
  }
  const table: RegistryTable = {};
  const skipped: string[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (!isObject(value)) {
      skipped.push(`Device '${key}' is not an object, skipped`);
      continue;
    }
    const name = typeof value.device_name === "string" && value.device_name !== ""
      ? value.device_name
      : key;
    try {
      table[name] = validateRecord(name, {
        address: value.ip_address ?? value.address,
        channel: value.camera_channel ?? value.channel,
        timeout: value.timeout,
        username: value.username,
        password: value.password,
      });
    } catch (error) {
      if (!(error instanceof RegistryFormatError)) {
        throw error;
      }
      skipped.push(`${error.message}, skipped`);
    }
  }
  return { table, skipped };
}

function validateRecord(name: string, value: Record<string, unknown>): DeviceRecord {
  const address = value.address;
  if (typeof address !== "string" || address.trim() === "") {
    throw new RegistryFormatError(`Device '${name}' has no address`);
  }
  const channel = positiveInteger(value.channel, DEFAULT_CHANNEL);
  if (channel === null) {
    throw new RegistryFormatError(
      `Device '${name}' channel must be a positive integer`,
    );
  }
  const timeout = positiveInteger(value.timeout, DEFAULT_TIMEOUT_SECONDS);
  if (timeout === null) {
    throw new RegistryFormatError(
      `Device '${name}' timeout must be a positive integer`,
    );
  }
  const record: DeviceRecord = { address: address.trim(), channel, timeout };
  if (typeof value.username === "string" && value.username !== "") {
    record.username = value.username;
  }
  if (typeof value.password === "string" && value.password !== "") {
    record.password = value.password;
  }
  return record;
}

function positiveInteger(value: unknown, fallback: number): number | null {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n <= 0) {
    return null;
  }
  return n;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}
