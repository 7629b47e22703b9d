export * from "./xsrf/mod.ts";
export * from "./headers/mod.ts";
export { createStaticHeadersMiddleware } from "./middleware/static_headers.ts";
export { plainTextError } from "./utils/http_errors.ts";
export type { GuardErrorStatus } from "./utils/http_errors.ts";
export { logger, setLogLevel } from "./utils/logger.ts";
export type { LogLevel } from "./utils/logger.ts";
