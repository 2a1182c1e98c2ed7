import { createHash, randomBytes } from "node:crypto";
import { UnauthorizedError } from "./errors.js";
import { fetchWithTimeout } from "./http.js";
import { readDeviceError } from "./xml.js";

/** Cheap authenticated endpoint every ISAPI device exposes. */
export const PROBE_PATH = "/ISAPI/System/time";

export interface Credentials {
  username: string;
  password: string;
}

export interface DigestChallenge {
  realm: string;
  nonce: string;
  qop?: string;
  opaque?: string;
  algorithm?: string;
  stale?: boolean;
}

export type AuthStrategy =
  | { readonly kind: "none" }
  | {
      readonly kind: "basic";
      readonly username: string;
      readonly password: string;
    }
  | {
      readonly kind: "digest";
      readonly username: string;
      readonly password: string;
      readonly challenge: Readonly<DigestChallenge>;
    };

export type AuthChallenge =
  | { scheme: "digest"; challenge: DigestChallenge }
  | { scheme: "basic"; realm?: string };

export interface RequestSigner {
  readonly strategy: AuthStrategy;
  /** Headers to attach to one request. */
  sign(method: string, url: string | URL): Record<string, string>;
  /** Same credentials, fresh server nonce. */
  withChallenge(challenge: DigestChallenge): RequestSigner;
}

export interface NegotiateOptions {
  baseUrl: string;
  credentials?: Credentials;
  timeoutMs: number;
  onProbe?: (
    attempt: "unauthenticated" | AuthStrategy["kind"],
    status: number,
  ) => void;
}

/**
 * Probes the device once without credentials and picks the scheme it asks
 * for, then confirms that scheme with a single signed probe. The returned
 * signer is meant to be shared by every later request of the run.
 */
export async function negotiateAuth(
  options: NegotiateOptions,
): Promise<RequestSigner> {
  const url = new URL(PROBE_PATH, options.baseUrl);
  const first = await fetchWithTimeout(
    url,
    { method: "GET" },
    options.timeoutMs,
  );
  options.onProbe?.("unauthenticated", first.status);

  if (first.ok) {
    await first.body?.cancel();
    return createSigner({ kind: "none" });
  }
  if (first.status !== 401) {
    throw await readDeviceError(first);
  }
  await first.body?.cancel();

  const challenge = parseAuthenticateHeader(
    first.headers.get("www-authenticate") ?? "",
  );
  if (!challenge) {
    throw new UnauthorizedError(
      "Device rejected the request without offering Basic or Digest authentication",
    );
  }
  const credentials = options.credentials;
  if (!credentials) {
    throw new UnauthorizedError(
      "Device requires authentication but no username/password was supplied",
    );
  }

  const signer = createSigner(
    challenge.scheme === "digest"
      ? { kind: "digest", ...credentials, challenge: challenge.challenge }
      : { kind: "basic", ...credentials },
  );
  const second = await fetchWithTimeout(
    url,
    { method: "GET", headers: signer.sign("GET", url) },
    options.timeoutMs,
  );
  options.onProbe?.(signer.strategy.kind, second.status);
  if (second.status === 401) {
    await second.body?.cancel();
    throw new UnauthorizedError(
      `Device rejected ${signer.strategy.kind} credentials for user '${credentials.username}'`,
    );
  }
  if (!second.ok) {
    throw await readDeviceError(second);
  }
  await second.body?.cancel();
  return signer;
}

/**
 * Picks the strongest scheme from a WWW-Authenticate value. Several
 * challenges may arrive folded into one header, e.g.
 * `Digest realm="DS", nonce="abc", qop="auth", Basic realm="DS"`.
 */
export function parseAuthenticateHeader(header: string): AuthChallenge | null {
  const digestAt = header.search(/\bdigest\s/i);
  if (digestAt >= 0) {
    const params = parseAuthParams(
      header.slice(digestAt).replace(/^digest\s+/i, ""),
    );
    const realm = params.get("realm");
    const nonce = params.get("nonce");
    if (realm !== undefined && nonce !== undefined) {
      return {
        scheme: "digest",
        challenge: {
          realm,
          nonce,
          qop: params.get("qop"),
          opaque: params.get("opaque"),
          algorithm: params.get("algorithm"),
          stale: params.get("stale")?.toLowerCase() === "true",
        },
      };
    }
  }
  const basicAt = header.search(/\bbasic\b/i);
  if (basicAt >= 0) {
    const params = parseAuthParams(
      header.slice(basicAt).replace(/^basic\s*/i, ""),
    );
    return { scheme: "basic", realm: params.get("realm") };
  }
  return null;
}

export function createSigner(strategy: AuthStrategy): RequestSigner {
  switch (strategy.kind) {
    case "none": {
      const signer: RequestSigner = {
        strategy,
        sign: () => ({}),
        withChallenge: () => signer,
      };
      return signer;
    }
    case "basic": {
      const token = Buffer.from(
        `${strategy.username}:${strategy.password}`,
      ).toString("base64");
      const signer: RequestSigner = {
        strategy,
        sign: () => ({ Authorization: `Basic ${token}` }),
        withChallenge: () => signer,
      };
      return signer;
    }
    case "digest": {
      const digest = strategy;
      let nonceCount = 0;
      return {
        strategy: digest,
        sign: (method, url) => {
          nonceCount += 1;
          const cnonce = randomBytes(8).toString("hex");
          return {
            Authorization: digestAuthorization(
              digest,
              method,
              url,
              nonceCount,
              cnonce,
            ),
          };
        },
        withChallenge: (challenge) => createSigner({ ...digest, challenge }),
      };
    }
  }
}

/**
 * RFC 7616 response computation (MD5, MD5-sess, SHA-256; qop=auth or none).
 */
export function digestAuthorization(
  strategy: Extract<AuthStrategy, { kind: "digest" }>,
  method: string,
  url: string | URL,
  nonceCount: number,
  cnonce: string,
): string {
  const { username, password, challenge } = strategy;
  const target = typeof url === "string" ? new URL(url) : url;
  const uri = `${target.pathname}${target.search}`;
  const algorithm = challenge.algorithm ?? "MD5";
  const hash = hashFor(algorithm);
  const nc = nonceCount.toString(16).padStart(8, "0");
  const qop = pickQop(challenge.qop);

  let ha1 = hash(`${username}:${challenge.realm}:${password}`);
  if (algorithm.toLowerCase().endsWith("-sess")) {
    ha1 = hash(`${ha1}:${challenge.nonce}:${cnonce}`);
  }
  const ha2 = hash(`${method.toUpperCase()}:${uri}`);
  const response = qop
    ? hash(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:${qop}:${ha2}`)
    : hash(`${ha1}:${challenge.nonce}:${ha2}`);

  const parts = [
    `username="${username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${uri}"`,
    `algorithm=${algorithm}`,
    `response="${response}"`,
  ];
  if (qop) {
    parts.push(`qop=${qop}`, `nc=${nc}`, `cnonce="${cnonce}"`);
  }
  if (challenge.opaque !== undefined) {
    parts.push(`opaque="${challenge.opaque}"`);
  }
  return `Digest ${parts.join(", ")}`;
}

function pickQop(offered: string | undefined): string | undefined {
  if (offered === undefined) {
    return undefined;
  }
  const options = offered.split(",").map((q) => q.trim().toLowerCase());
  return options.includes("auth") ? "auth" : undefined;
}

function hashFor(algorithm: string): (value: string) => string {
  const base = algorithm.toLowerCase().replace(/-sess$/, "");
  const name = base === "sha-256" ? "sha256" : base === "md5" ? "md5" : null;
  if (!name) {
    throw new UnauthorizedError(`Unsupported digest algorithm: ${algorithm}`);
  }
  return (value) => createHash(name).update(value).digest("hex");
}

function parseAuthParams(text: string): Map<string, string> {
  const params = new Map<string, string>();
  const pattern = /([a-z0-9_-]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^,\s]*))/gi;
  for (const match of text.matchAll(pattern)) {
    const key = match[1].toLowerCase();
    // First occurrence wins; a folded second challenge repeats `realm`.
    if (!params.has(key)) {
      params.set(key, match[2] ?? match[3] ?? "");
    }
  }
  return params;
}
