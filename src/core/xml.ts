import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { DeviceError } from "./errors.js";

export const ISAPI_NAMESPACE = "http://www.isapi.org/ver20/XMLSchema";

// Tags that may repeat; parsed as arrays even when the device sends one.
const REPEATED_TAGS = new Set(["searchMatchItem"]);

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName: string) => REPEATED_TAGS.has(tagName),
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  suppressEmptyNode: false,
});

export function parseXml(text: string): unknown {
  const parsed: unknown = parser.parse(text);
  return parsed;
}

export function buildXml(document: Record<string, unknown>): string {
  return `<?xml version="1.0" encoding="UTF-8"?>${builder.build(document)}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function child(node: unknown, key: string): unknown {
  return isRecord(node) ? node[key] : undefined;
}

export function childText(node: unknown, key: string): string | undefined {
  const value = child(node, key);
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

export function childList(node: unknown, key: string): unknown[] {
  const value = child(node, key);
  if (value === undefined || value === "") {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Turns an error response into a DeviceError. ISAPI devices answer with
 *
 *   <ResponseStatus>
 *     <statusCode>4</statusCode>
 *     <statusString>Invalid Operation</statusString>
 *     <subStatusCode>notSupport</subStatusCode>
 *   </ResponseStatus>
 *
 * and anything else is reported as raw text.
 */
export async function readDeviceError(response: Response): Promise<DeviceError> {
  let body = "";
  try {
    body = await response.text();
  } catch (error) {
    return new DeviceError(
      response.status,
      `${response.statusText || "error"} (body unreadable: ${String(error)})`,
    );
  }
  return new DeviceError(response.status, describeErrorBody(body, response.statusText));
}

export function describeErrorBody(body: string, statusText = ""): string {
  const trimmed = body.trim();
  const fromStatus = trimmed.includes("ResponseStatus")
    ? describeResponseStatus(trimmed)
    : undefined;
  if (fromStatus) {
    return fromStatus;
  }
  if (trimmed !== "") {
    return trimmed.length > 300 ? `${trimmed.slice(0, 300)}...` : trimmed;
  }
  return statusText || "no details";
}

function describeResponseStatus(xml: string): string | undefined {
  let document: unknown;
  try {
    document = parseXml(xml);
  } catch {
    return undefined;
  }
  const status = child(document, "ResponseStatus");
  const statusString = childText(status, "statusString");
  const subStatus = childText(status, "subStatusCode");
  if (!statusString) {
    return undefined;
  }
  return subStatus ? `${statusString} - ${subStatus}` : statusString;
}
