/**
 * XSRF plugin entry point: one object for the hook and for token generation.
 */

import type { MiddlewareHandler } from "hono";
import { z } from "zod";
import { XsrfConfigError } from "./errors.ts";
import { createXsrfMiddleware } from "./xsrf_middleware.ts";
import { XsrfService } from "./xsrf_service.ts";
import type { UserIdLookupContext, UserIdStorage, XsrfPluginOptions } from "./types.ts";

/**
 * Form field that carries the token unless configured otherwise.
 */
export const TOKEN_KEY = "xsrf-token";

export const DEFAULT_TOKEN_HEADER = "X-XSRF-Token";

export const DEFAULT_SAFE_METHODS: readonly string[] = ["GET", "HEAD", "OPTIONS"];

const PluginOptionsSchema = z.object({
  tokenField: z.string().min(1, "tokenField must not be empty").default(TOKEN_KEY),
  tokenHeader: z
    .string()
    .min(1, "tokenHeader must not be empty; use null to disable")
    .nullable()
    .default(DEFAULT_TOKEN_HEADER),
  safeMethods: z
    .array(z.string().min(1))
    .default([...DEFAULT_SAFE_METHODS])
    .transform((methods) => new Set(methods.map((method) => method.toUpperCase()))),
});

export interface XsrfPlugin {
  /** Pre-handler hook; register with app.use ahead of the routes it guards */
  readonly before: MiddlewareHandler;
  /** Form field the hook reads the token from */
  readonly tokenField: string;
  /**
   * Token for a form submitted to host + path, for embedding in rendered
   * pages.
   *
   * @throws IdentityLookupError if the user ID cannot be resolved
   */
  generateToken(host: string, path: string, context?: UserIdLookupContext): Promise<string>;
}

/**
 * Create the XSRF plugin.
 *
 * @param secret Key for the token HMAC; keep it stable across restarts or
 *   outstanding forms stop validating
 * @param userIdStorage Identity lookup supplied by the application
 * @throws XsrfConfigError if the options are invalid
 */
export function createXsrfPlugin(
  secret: string | Uint8Array,
  userIdStorage: UserIdStorage,
  options: XsrfPluginOptions = {},
): XsrfPlugin {
  const result = PluginOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new XsrfConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  if (secret.length === 0) {
    throw new XsrfConfigError(["secret: must not be empty"]);
  }

  const { tokenField, tokenHeader, safeMethods } = result.data;
  const service = new XsrfService(secret, userIdStorage);

  return {
    before: createXsrfMiddleware({ service, tokenField, tokenHeader, safeMethods }),
    tokenField,
    generateToken: (host, path, context) => service.generateToken(host, path, context),
  };
}
