import type { AuthStrategy, RequestSigner } from "./auth.js";
import { parseAuthenticateHeader } from "./auth.js";
import { fetchWithTimeout } from "./http.js";
import { readDeviceError } from "./xml.js";

export const SEARCH_PATH = "/ISAPI/ContentMgmt/search";
export const DOWNLOAD_PATH = "/ISAPI/ContentMgmt/download";

export interface IsapiClientOptions {
  baseUrl: string;
  signer: RequestSigner;
  timeoutMs: number;
}

export interface IsapiRequest {
  method: "GET" | "POST" | "PUT";
  body?: string;
  contentType?: string;
  /** Owner of the abort signal, kept by callers that stream the body. */
  controller?: AbortController;
}

/**
 * `192.168.1.64` -> `http://192.168.1.64`; explicit schemes and ports are
 * kept as given.
 */
export function deviceBaseUrl(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * Authenticated access to one recorder. Every request is signed with the
 * strategy chosen during negotiation; a Digest nonce the device reports as
 * stale is refreshed once per request.
 */
export class IsapiClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private signer: RequestSigner;

  constructor(options: IsapiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.signer = options.signer;
  }

  get strategy(): AuthStrategy {
    return this.signer.strategy;
  }

  url(path: string, query?: Record<string, string>): URL {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  async request(url: URL, request: IsapiRequest): Promise<Response> {
    const response = await this.send(url, request);
    if (response.status !== 401 || this.strategy.kind !== "digest") {
      return response;
    }
    const renewed = parseAuthenticateHeader(
      response.headers.get("www-authenticate") ?? "",
    );
    if (renewed?.scheme !== "digest" || !renewed.challenge.stale) {
      return response;
    }
    await response.body?.cancel();
    this.signer = this.signer.withChallenge(renewed.challenge);
    return this.send(url, request);
  }

  /**
   * POSTs a CMSearchDescription and returns the CMSearchResult text.
   */
  async search(body: string): Promise<string> {
    const response = await this.request(this.url(SEARCH_PATH), {
      method: "POST",
      body,
      contentType: "application/xml",
    });
    if (!response.ok) {
      throw await readDeviceError(response);
    }
    return response.text();
  }

  /**
   * Opens the media stream for one playback URI. The caller consumes the
   * body; `controller` lets it abort a stalled transfer.
   */
  async openDownload(
    playbackUri: string,
    controller?: AbortController,
  ): Promise<Response> {
    const response = await this.request(
      this.url(DOWNLOAD_PATH, { playbackURI: playbackUri }),
      { method: "GET", controller },
    );
    if (!response.ok) {
      throw await readDeviceError(response);
    }
    return response;
  }

  private send(url: URL, request: IsapiRequest): Promise<Response> {
    const headers: Record<string, string> = {
      ...this.signer.sign(request.method, url),
    };
    if (request.contentType) {
      headers["Content-Type"] = request.contentType;
    }
    return fetchWithTimeout(
      url,
      { method: request.method, headers, body: request.body },
      this.timeoutMs,
      request.controller,
    );
  }
}
