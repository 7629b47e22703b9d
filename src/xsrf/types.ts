/**
 * Types for XSRF protection.
 */

/**
 * Per-call context handed to the identity lookup.
 */
export interface UserIdLookupContext {
  /** The request being validated or rendered for, when there is one */
  request?: Request;
  /** Aborts the lookup; fired when the client goes away */
  signal?: AbortSignal;
}

/**
 * Identity-lookup capability supplied by the hosting application.
 *
 * Returns the identifier of the user the request acts for. Throwing or
 * rejecting fails the request with 500; retries, if any, belong here.
 */
export interface UserIdStorage {
  getUserId(context: UserIdLookupContext): string | Promise<string>;
}

/**
 * Options for creating the XSRF plugin.
 */
export interface XsrfPluginOptions {
  /**
   * Form field carrying the token in url-encoded and multipart bodies.
   * Default: "xsrf-token"
   */
  tokenField?: string;

  /**
   * Request header accepted as an alternative to the form field, for
   * script-initiated requests. null disables header transport.
   * Default: "X-XSRF-Token"
   */
  tokenHeader?: string | null;

  /**
   * Methods that are never validated.
   * Default: ["GET", "HEAD", "OPTIONS"]
   *
   * Skipping these is a relaxation: without it every request, GET included,
   * must carry a valid token. Pass [] to validate every method.
   */
  safeMethods?: readonly string[];
}

/**
 * Result of looking up a single form field in a request body.
 */
export type FieldExtraction =
  | { found: true; value: string }
  | { found: false };
