/**
 * XSRF token generation bound to a secret and an identity lookup.
 */

import { IdentityLookupError } from "./errors.ts";
import type { UserIdLookupContext, UserIdStorage } from "./types.ts";
import { constantTimeEquals, XsrfTokenGenerator } from "./xsrf_token.ts";

/**
 * Service for generating and checking XSRF tokens.
 *
 * A token is bound to the secret, the target host and path, and the user
 * the request acts for. Nothing is stored: validation recomputes the token
 * for the incoming request and compares.
 */
export class XsrfService {
  private readonly generator: XsrfTokenGenerator;
  private readonly storage: UserIdStorage;

  constructor(secret: string | Uint8Array, storage: UserIdStorage) {
    this.generator = new XsrfTokenGenerator(secret);
    this.storage = storage;
  }

  /**
   * Resolve the current user ID through the identity lookup.
   *
   * Single attempt. Aborting the signal rejects immediately, even while the
   * lookup is still pending.
   *
   * @throws IdentityLookupError
   */
  async resolveUserId(context: UserIdLookupContext = {}): Promise<string> {
    const { signal } = context;
    let userId: unknown;
    try {
      signal?.throwIfAborted();
      const lookup = Promise.resolve(this.storage.getUserId(context));
      userId = await (signal ? abortable(lookup, signal) : lookup);
    } catch (error) {
      throw new IdentityLookupError(error);
    }

    if (typeof userId !== "string") {
      throw new IdentityLookupError(`expected a string user ID, got ${typeof userId}`);
    }
    return userId;
  }

  /**
   * Generate a token for a form that will be submitted to host + path.
   *
   * @throws IdentityLookupError if the user ID cannot be resolved
   */
  async generateToken(
    host: string,
    path: string,
    context: UserIdLookupContext = {},
  ): Promise<string> {
    const userId = await this.resolveUserId(context);
    return this.generator.computeToken(host, path, userId);
  }

  /**
   * Token expected on a request to host + path made by userId.
   */
  expectedToken(host: string, path: string, userId: string): Promise<string> {
    return this.generator.computeToken(host, path, userId);
  }

  /**
   * Constant-time comparison of a presented token with the expected one.
   */
  matches(presented: string, expected: string): boolean {
    return constantTimeEquals(presented, expected);
  }
}

/**
 * Settle with the promise, or reject with the signal's reason as soon as it
 * aborts.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
