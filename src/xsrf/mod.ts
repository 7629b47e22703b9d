/**
 * XSRF protection module.
 *
 * Provides host- and path-bound token generation, form field extraction and
 * the validating middleware.
 */

export {
  createXsrfPlugin,
  DEFAULT_SAFE_METHODS,
  DEFAULT_TOKEN_HEADER,
  TOKEN_KEY,
} from "./xsrf_plugin.ts";
export type { XsrfPlugin } from "./xsrf_plugin.ts";
export { XsrfService } from "./xsrf_service.ts";
export { createXsrfMiddleware } from "./xsrf_middleware.ts";
export type { XsrfMiddlewareOptions } from "./xsrf_middleware.ts";
export { canonicalTarget, constantTimeEquals, type TokenTarget, XsrfTokenGenerator } from "./xsrf_token.ts";
export { extractFormField, mediaType } from "./body_extractor.ts";
export { xsrfInput } from "./xsrf_helpers.ts";
export {
  IdentityLookupError,
  TokenMismatchError,
  TokenNotPresentError,
  XsrfConfigError,
  XsrfError,
} from "./errors.ts";
export type {
  FieldExtraction,
  UserIdLookupContext,
  UserIdStorage,
  XsrfPluginOptions,
} from "./types.ts";
