/**
 * Environment configuration for the example server.
 *
 * Values come from process.env (populated from .env by dotenv in main.ts)
 * and are validated with zod before anything else starts.
 */

import { z } from "zod";
import { LOG_LEVEL_NAMES, type LogLevel } from "../utils/logger.ts";

export const ConfigSchema = z.object({
  XSRF_SECRET: z.string().min(1, "XSRF_SECRET must not be empty"),
  XSRF_TOKEN_FIELD: z.string().min(1).default("xsrf-token"),
  // Empty string disables header transport
  XSRF_TOKEN_HEADER: z.string().default("X-XSRF-Token"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(LOG_LEVEL_NAMES)),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
});

/**
 * Validated application configuration.
 */
export interface AppConfig {
  xsrfSecret: string;
  tokenField: string;
  /** null when header transport is disabled */
  tokenHeader: string | null;
  logLevel: LogLevel;
  port: number;
}

/**
 * Thrown when the environment does not describe a valid configuration.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    xsrfSecret: parsed.XSRF_SECRET,
    tokenField: parsed.XSRF_TOKEN_FIELD,
    tokenHeader: parsed.XSRF_TOKEN_HEADER === "" ? null : parsed.XSRF_TOKEN_HEADER,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.PORT,
  };
}
