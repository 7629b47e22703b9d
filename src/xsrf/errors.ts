/**
 * Base error class for XSRF validation failures.
 */
export class XsrfError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "XsrfError";
  }
}

/**
 * Thrown when the identity-lookup capability fails, returns something other
 * than a string, or is aborted.
 */
export class IdentityLookupError extends XsrfError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`User ID lookup failed: ${detail}`, { cause });
    this.name = "IdentityLookupError";
  }
}

/**
 * No usable token was supplied: the field is absent or empty, or the body
 * could not be parsed.
 */
export class TokenNotPresentError extends XsrfError {
  public readonly fieldName: string;

  constructor(fieldName: string) {
    super(`XSRF token field ${fieldName} not present`);
    this.name = "TokenNotPresentError";
    this.fieldName = fieldName;
  }
}

/**
 * The supplied token does not match the one recomputed for this request.
 */
export class TokenMismatchError extends XsrfError {
  public readonly host: string;
  public readonly path: string;

  constructor(host: string, path: string) {
    super(`XSRF token not valid for ${host}${path}`);
    this.name = "TokenMismatchError";
    this.host = host;
    this.path = path;
  }
}

/**
 * Thrown when the plugin is created with invalid options.
 */
export class XsrfConfigError extends XsrfError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid XSRF plugin options: ${issues.join("; ")}`);
    this.name = "XsrfConfigError";
    this.issues = issues;
  }
}
