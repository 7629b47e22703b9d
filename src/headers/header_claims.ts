/**
 * Single-writer ownership of response headers.
 *
 * A component that must control a header claims it once per response and
 * receives a setter. Any later claim for the same name fails, which surfaces
 * two middlewares fighting over one header instead of letting the last
 * writer win silently.
 */

import type { Context } from "hono";
import { HeaderClaimConflictError } from "./errors.ts";

/**
 * Replaces the claimed header with the given values, in order.
 * An empty list removes the header.
 */
export type HeaderSetter = (values: readonly string[]) => void;

/**
 * Writes header values to the underlying response.
 */
export type HeaderWriter = (name: string, values: readonly string[]) => void;

/**
 * Hono environment carrying the per-request claim registry.
 */
export type HeaderClaimsEnv = {
  Variables: {
    headerClaims: HeaderClaims | undefined;
  };
};

export class HeaderClaims {
  private readonly claimed = new Set<string>();
  private readonly write: HeaderWriter;

  constructor(write: HeaderWriter) {
    this.write = write;
  }

  /**
   * Claim exclusive ownership of a header for this response.
   * Names are compared case-insensitively.
   *
   * @throws HeaderClaimConflictError if the header is already claimed
   */
  claim(name: string): HeaderSetter {
    const key = name.toLowerCase();
    if (this.claimed.has(key)) {
      throw new HeaderClaimConflictError(name);
    }
    this.claimed.add(key);

    return (values) => this.write(name, values);
  }

  isClaimed(name: string): boolean {
    return this.claimed.has(name.toLowerCase());
  }
}

/**
 * Get the claim registry for the current request, creating it on first use.
 * Setters write through `c.header`, so values land on whatever response the
 * handler chain eventually returns.
 */
export function getHeaderClaims(c: Context<HeaderClaimsEnv>): HeaderClaims {
  const existing = c.get("headerClaims");
  if (existing) {
    return existing;
  }

  const claims = new HeaderClaims((name, values) => {
    c.header(name, undefined);
    for (const value of values) {
      c.header(name, value, { append: true });
    }
  });
  c.set("headerClaims", claims);
  return claims;
}
