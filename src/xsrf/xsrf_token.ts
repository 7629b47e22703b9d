/**
 * XSRF token derivation.
 *
 * Uses HMAC-SHA256 keyed with the plugin secret.
 * Token format: base64url(HMAC-SHA256(secret, JSON.stringify([host, path, userId])))
 *
 * Host and path are canonicalised before signing (see `canonicalTarget`), so
 * "Foo.com" and "foo.com", or "/café" and "/caf%C3%A9", bind the same token.
 * There is no random part and no timestamp, so a token can be recomputed from
 * the request alone.
 */

import { webcrypto } from "node:crypto";

/**
 * Derives tokens from (host, path, user ID) under a fixed secret.
 */
export class XsrfTokenGenerator {
  private readonly secret: Uint8Array;
  private cryptoKey: Promise<webcrypto.CryptoKey> | null = null;

  constructor(secret: string | Uint8Array) {
    this.secret = typeof secret === "string"
      ? new TextEncoder().encode(secret)
      : Uint8Array.from(secret);
    if (this.secret.length === 0) {
      throw new TypeError("XSRF secret must not be empty");
    }
  }

  /**
   * Get or create the CryptoKey for HMAC operations.
   */
  private getCryptoKey(): Promise<webcrypto.CryptoKey> {
    if (!this.cryptoKey) {
      this.cryptoKey = webcrypto.subtle.importKey(
        "raw",
        this.secret,
        { name: "HMAC", hash: "SHA-256" },
        false,
        ["sign"],
      );
    }
    return this.cryptoKey;
  }

  /**
   * Compute the token bound to a host, a path and a user ID.
   *
   * Deterministic: identical inputs always yield the identical token.
   */
  async computeToken(host: string, path: string, userId: string): Promise<string> {
    const target = canonicalTarget(host, path);

    const key = await this.getCryptoKey();
    const data = new TextEncoder().encode(
      JSON.stringify([target.host, target.path, userId]),
    );
    const signature = await webcrypto.subtle.sign("HMAC", key, data);

    return Buffer.from(signature).toString("base64url");
  }
}

export interface TokenTarget {
  host: string;
  path: string;
}

/**
 * Canonical form of the (host, path) pair a token is bound to.
 *
 * The host goes through URL host parsing: lowercased, IDNA-encoded, default
 * port dropped. The path is resolved the way a request URL's pathname is
 * (dot segments removed, "" becomes "/") and then percent-decoded. A path
 * with a malformed escape is kept encoded.
 */
export function canonicalTarget(host: string, path: string): TokenTarget {
  if (host.length === 0) {
    throw new TypeError("XSRF token host must not be empty");
  }
  if (/[\/\\?#@\s]/.test(host)) {
    throw new TypeError(`XSRF token host is not a host: ${host}`);
  }

  const url = new URL(`http://${host}`);
  url.pathname = path;

  return { host: url.host, path: decodePath(url.pathname) };
}

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

/**
 * Constant-time string comparison to prevent timing attacks.
 *
 * Only the length check returns early; token length is not secret.
 */
export function constantTimeEquals(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }
  return result === 0;
}
