/**
 * XSRF protection middleware for Hono.
 *
 * Validates state-changing requests before any route handler runs:
 * 1. Resolves the user ID (failure: 500)
 * 2. Reads the submitted token from the token header or form field (missing: 401)
 * 3. Recomputes the token for the request's own host and path
 * 4. Compares the two in constant time (mismatch: 403)
 *
 * Approved requests reach the next handler with the body unread and no
 * headers touched.
 */

import type { Context, MiddlewareHandler } from "hono";
import { plainTextError } from "../utils/http_errors.ts";
import { logger } from "../utils/logger.ts";
import { extractFormField } from "./body_extractor.ts";
import { IdentityLookupError, TokenMismatchError, TokenNotPresentError } from "./errors.ts";
import type { XsrfService } from "./xsrf_service.ts";

export interface XsrfMiddlewareOptions {
  service: XsrfService;
  tokenField: string;
  tokenHeader: string | null;
  safeMethods: ReadonlySet<string>;
}

/**
 * Creates XSRF protection middleware.
 *
 * Token can be submitted via:
 * - the token header, when configured (for script-initiated requests)
 * - the token form field in url-encoded or multipart bodies
 */
export function createXsrfMiddleware(options: XsrfMiddlewareOptions): MiddlewareHandler {
  const { service, tokenField, tokenHeader, safeMethods } = options;

  return async (c, next) => {
    // Skip validation for safe methods
    if (safeMethods.has(c.req.method.toUpperCase())) {
      return next();
    }

    const url = new URL(c.req.url);
    const host = url.host;
    const path = url.pathname;

    let userId: string;
    try {
      userId = await service.resolveUserId({
        request: c.req.raw,
        signal: c.req.raw.signal,
      });
    } catch (error) {
      if (error instanceof IdentityLookupError) {
        logger.error(`XSRF check for ${c.req.method} ${path}: ${error.message}`);
        return plainTextError(c, 500);
      }
      throw error;
    }

    const submitted = await submittedToken(c, tokenField, tokenHeader);
    if (submitted === null) {
      return reject(c, new TokenNotPresentError(tokenField));
    }

    const expected = await service.expectedToken(host, path, userId);
    if (!service.matches(submitted, expected)) {
      return reject(c, new TokenMismatchError(host, path));
    }

    await next();
  };
}

async function submittedToken(
  c: Context,
  tokenField: string,
  tokenHeader: string | null,
): Promise<string | null> {
  if (tokenHeader) {
    const headerToken = c.req.header(tokenHeader);
    if (headerToken) {
      return headerToken;
    }
  }

  const extracted = await extractFormField(c.req, tokenField);
  return extracted.found ? extracted.value : null;
}

function reject(c: Context, error: TokenNotPresentError | TokenMismatchError): Response {
  logger.warn(`XSRF check rejected ${c.req.method} ${c.req.path}: ${error.message}`);
  return plainTextError(c, error instanceof TokenMismatchError ? 403 : 401);
}
