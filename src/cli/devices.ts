import type { DeviceRegistry } from "../core/registry.js";
import { DEFAULT_CHANNEL, DEFAULT_TIMEOUT_SECONDS } from "../core/registry.js";
import type { DeviceAddArgs } from "./args.js";
import type { Logger } from "./logger.js";

export async function addDevice(
  registry: DeviceRegistry,
  args: DeviceAddArgs,
  logger: Logger,
): Promise<void> {
  await registry.add(
    {
      name: args.name,
      address: args.address,
      channel: args.channel ?? DEFAULT_CHANNEL,
      timeout: args.timeout ?? DEFAULT_TIMEOUT_SECONDS,
      username: args.username,
      password: args.password,
    },
    { overwrite: args.force },
  );
  logger.success(`Saved device '${args.name}' to ${registry.filePath}`);
}

export async function listDevices(
  registry: DeviceRegistry,
  logger: Logger,
): Promise<void> {
  const devices = await registry.list();
  if (devices.length === 0) {
    logger.info(`No devices configured (${registry.filePath})`);
    return;
  }
  for (const device of devices) {
    const auth = device.hasUsername
      ? device.hasPassword
        ? "user+password"
        : "user"
      : "env credentials";
    logger.info(
      `${device.name}: ${device.address} camera ${device.channel}, timeout ${device.timeout}s, ${auth}`,
    );
  }
}

export async function removeDevice(
  registry: DeviceRegistry,
  name: string,
  logger: Logger,
): Promise<void> {
  await registry.remove(name);
  logger.success(`Removed device '${name}'`);
}
