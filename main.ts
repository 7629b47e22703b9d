import "dotenv/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { type AppConfig, loadConfig } from "./src/config/config.ts";
import type { HeaderClaimsEnv } from "./src/headers/header_claims.ts";
import { createStaticHeadersMiddleware } from "./src/middleware/static_headers.ts";
import { escapeHtml } from "./src/utils/html.ts";
import { plainTextError } from "./src/utils/http_errors.ts";
import { logger, setLogLevel } from "./src/utils/logger.ts";
import type { UserIdStorage } from "./src/xsrf/types.ts";
import { xsrfInput } from "./src/xsrf/xsrf_helpers.ts";
import { createXsrfPlugin } from "./src/xsrf/xsrf_plugin.ts";

function formPage(tokenInput: string, message: string | null): string {
  const received = message === null ? "" : `<p>Received: ${escapeHtml(message)}</p>`;
  return `<!DOCTYPE html>
<html>
<body>
  ${received}
  <form method="POST" action="/form">
    ${tokenInput}
    <input type="text" name="message">
    <button type="submit">Send</button>
  </form>
</body>
</html>`;
}

/**
 * Build the example application: static headers and XSRF validation on
 * every route, plus a form that posts back to itself.
 */
export function createApp(config: AppConfig, userIdStorage: UserIdStorage) {
  const plugin = createXsrfPlugin(config.xsrfSecret, userIdStorage, {
    tokenField: config.tokenField,
    tokenHeader: config.tokenHeader,
  });

  const app = new Hono<HeaderClaimsEnv>();

  app.use("/*", createStaticHeadersMiddleware());
  app.use("/*", plugin.before);

  app.onError((err, c) => {
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, err);
    return plainTextError(c, 500);
  });

  // Public endpoints
  app.get("/ping", (c) => c.json({ pong: true }));

  app.get("/form", async (c) => {
    const host = new URL(c.req.url).host;
    const token = await plugin.generateToken(host, "/form", {
      request: c.req.raw,
      signal: c.req.raw.signal,
    });
    return c.html(formPage(xsrfInput(token, plugin.tokenField), null));
  });

  app.post("/form", async (c) => {
    const body = await c.req.parseBody();
    const message = body["message"];
    return c.text(`Received: ${typeof message === "string" ? message : ""}`);
  });

  return { app, plugin };
}

// Identity normally comes from the application's session layer; the example
// trusts a header so the form can be exercised from a browser or curl.
const exampleUserIdStorage: UserIdStorage = {
  getUserId: ({ request }) => request?.headers.get("X-Example-User") ?? "anonymous",
};

// Start server only when run directly
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { app } = createApp(config, exampleUserIdStorage);
  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`Listening on http://localhost:${info.port}`);
  });
}
