import { expect, test } from "vitest";
import { Hono } from "hono";
import { createStaticHeadersMiddleware } from "./static_headers.ts";
import { getHeaderClaims, type HeaderClaimsEnv } from "../headers/header_claims.ts";
import { setLogLevel } from "../utils/logger.ts";

setLogLevel("none");

test("createStaticHeadersMiddleware sets X-Content-Type-Options header", async () => {
  const app = new Hono<HeaderClaimsEnv>();
  app.use("/*", createStaticHeadersMiddleware());
  app.get("/test", (c) => c.text("ok"));

  const res = await app.request("/test");

  expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
});

test("createStaticHeadersMiddleware sets X-XSS-Protection header", async () => {
  const app = new Hono<HeaderClaimsEnv>();
  app.use("/*", createStaticHeadersMiddleware());
  app.get("/test", (c) => c.text("ok"));

  const res = await app.request("/test");

  expect(res.headers.get("X-XSS-Protection")).toBe("0");
});

test("createStaticHeadersMiddleware leaves the handler response intact", async () => {
  const app = new Hono<HeaderClaimsEnv>();
  app.use("/*", createStaticHeadersMiddleware());
  app.get("/test", (c) => c.json({ message: "ok" }));

  const res = await app.request("/test");

  expect(res.status).toBe(200);
  expect(await res.json()).toEqual({ message: "ok" });
});

test("createStaticHeadersMiddleware claims both headers", async () => {
  const app = new Hono<HeaderClaimsEnv>();
  app.use("/*", createStaticHeadersMiddleware());
  app.get("/test", (c) => {
    const claims = getHeaderClaims(c);
    return c.json({
      xcto: claims.isClaimed("X-Content-Type-Options"),
      xxp: claims.isClaimed("X-XSS-Protection"),
    });
  });

  const res = await app.request("/test");

  expect(await res.json()).toEqual({ xcto: true, xxp: true });
});

test("createStaticHeadersMiddleware fails with 500 when a header is already claimed", async () => {
  let handlerCalled = false;
  const app = new Hono<HeaderClaimsEnv>();
  app.use("/*", async (c, next) => {
    getHeaderClaims(c).claim("X-XSS-Protection")(["1; mode=block"]);
    await next();
  });
  app.use("/*", createStaticHeadersMiddleware());
  app.get("/test", (c) => {
    handlerCalled = true;
    return c.text("ok");
  });

  const res = await app.request("/test");

  expect(res.status).toBe(500);
  expect(await res.text()).toBe("Internal Server Error\n");
  expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
  expect(handlerCalled).toBe(false);
});

test("a later middleware cannot claim a static header", async () => {
  const app = new Hono<HeaderClaimsEnv>();
  app.use("/*", createStaticHeadersMiddleware());
  app.get("/test", (c) => {
    try {
      getHeaderClaims(c).claim("X-Content-Type-Options");
      return c.text("claimed");
    } catch {
      return c.text("conflict");
    }
  });

  const res = await app.request("/test");

  expect(await res.text()).toBe("conflict");
});
