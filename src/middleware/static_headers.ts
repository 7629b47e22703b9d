/**
 * Static security headers middleware.
 *
 * Claims and sets on every response:
 * - X-Content-Type-Options: nosniff - Prevents MIME type sniffing
 * - X-XSS-Protection: 0 - Disables the legacy XSS auditor
 */

import type { MiddlewareHandler } from "hono";
import { getHeaderClaims, type HeaderClaimsEnv } from "../headers/header_claims.ts";
import { HeaderClaimConflictError } from "../headers/errors.ts";
import { plainTextError } from "../utils/http_errors.ts";
import { logger } from "../utils/logger.ts";

const STATIC_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ["X-Content-Type-Options", "nosniff"],
  ["X-XSS-Protection", "0"],
];

/**
 * Creates middleware that claims and sets the static security headers.
 *
 * A header already claimed by another middleware is a pipeline
 * misconfiguration and fails the request with 500.
 */
export function createStaticHeadersMiddleware(): MiddlewareHandler<HeaderClaimsEnv> {
  return async (c, next) => {
    const claims = getHeaderClaims(c);

    for (const [name, value] of STATIC_HEADERS) {
      try {
        claims.claim(name)([value]);
      } catch (error) {
        if (error instanceof HeaderClaimConflictError) {
          logger.error(`Static headers: ${error.message}`);
          return plainTextError(c, 500);
        }
        throw error;
      }
    }

    await next();
  };
}
