/**
 * @file http-routes.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createApp, setDefaultNotFoundHandler, type RelayApp } from "../../../src/app.js";
import { EnvSchema } from "../../../src/config/env.js";
import { registerHealthRoute } from "../../../src/infrastructure/http/health-route.js";
import { registerTranslationRoutes } from "../../../src/infrastructure/http/translation-route.js";
import {
  FakeTranslationProvider,
  TEST_LANGUAGE_TABLE,
  createTestRelay,
  silentLogger,
} from "../../helpers/fakes.js";

describe("HTTP routes", () => {
  let relay: ReturnType<typeof createTestRelay>;
  let provider: FakeTranslationProvider;
  let app: RelayApp;

  beforeEach(async () => {
    provider = new FakeTranslationProvider();
    relay = createTestRelay({ provider });
    app = await createApp({ env: EnvSchema.parse({ NODE_ENV: "test" }), logger: silentLogger });
    registerHealthRoute(
      app,
      { version: "1.2.3" },
      { connectionRegistry: relay.connectionRegistry, languageSet: relay.languageSet }
    );
    registerTranslationRoutes(app, {
      provider,
      normalizer: relay.normalizer,
      logger: silentLogger,
    });
    setDefaultNotFoundHandler(app);
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /health", () => {
    it("should report connection and language counts", async () => {
      const client = await relay.connect();
      await relay.connect();
      await relay.send(client, "/add-lang fr");

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: "healthy",
        version: "1.2.3",
        connections: 2,
        languages: 1,
      });
    });

    it("should answer liveness and readiness probes", async () => {
      expect((await app.inject({ method: "GET", url: "/healthz" })).json()).toEqual({
        status: "ok",
      });
      expect((await app.inject({ method: "GET", url: "/readyz" })).json()).toEqual({
        status: "ready",
      });
    });
  });

  describe("GET /languages", () => {
    it("should return the provider's language table", async () => {
      const response = await app.inject({ method: "GET", url: "/languages" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ supported_languages: TEST_LANGUAGE_TABLE });
    });
  });

  describe("GET /translate", () => {
    it("should translate into a target given by name", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/translate?text=Hello&target=French",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        source: "auto",
        target: "fr",
        original: "Hello",
        translated: "Hello (fr)",
      });
    });

    it("should default the target to French", async () => {
      const response = await app.inject({ method: "GET", url: "/translate?text=Hi" });

      expect(response.json()).toMatchObject({ target: "fr", translated: "Hi (fr)" });
    });

    it("should normalize an explicit source", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/translate?text=Hola&target=en&source=Spanish",
      });

      expect(response.json()).toMatchObject({ source: "es", target: "en" });
    });

    it("should reject an unrecognized target", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/translate?text=Hello&target=klingon",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "Unrecognized language: 'klingon'",
        code: "UNRECOGNIZED_LANGUAGE",
      });
    });

    it("should reject a missing text", async () => {
      const response = await app.inject({ method: "GET", url: "/translate?target=fr" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'Query parameter "text" is required',
        code: "INVALID_COMMAND",
      });
    });

    it("should report a provider failure as a bad gateway", async () => {
      provider.failing.add("de");

      const response = await app.inject({
        method: "GET",
        url: "/translate?text=Hello&target=de",
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({ error: "Translation failed", code: "INTERNAL_ERROR" });
    });
  });

  it("should answer unknown routes with a JSON 404", async () => {
    const response = await app.inject({ method: "GET", url: "/nope" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "Not Found", code: "NOT_FOUND" });
  });

  it("should hide the message of an unexpected failure", async () => {
    app.get("/explode", async () => {
      throw new Error("stack details");
    });

    const response = await app.inject({ method: "GET", url: "/explode" });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: "An internal error occurred",
      code: "INTERNAL_ERROR",
    });
  });

  describe("CORS", () => {
    it("should allow any origin by default", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/languages",
        headers: { origin: "https://chat.example" },
      });

      expect(response.headers["access-control-allow-origin"]).toBe("*");
    });

    it("should answer a preflight request", async () => {
      const response = await app.inject({
        method: "OPTIONS",
        url: "/translate",
        headers: {
          origin: "https://chat.example",
          "access-control-request-method": "GET",
        },
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers["access-control-allow-origin"]).toBe("*");
    });

    it("should only allow configured origins", async () => {
      const restricted = await createApp({
        env: EnvSchema.parse({ NODE_ENV: "test", CORS_ORIGINS: "https://chat.example" }),
        logger: silentLogger,
      });
      registerTranslationRoutes(restricted, {
        provider,
        normalizer: relay.normalizer,
        logger: silentLogger,
      });

      const allowed = await restricted.inject({
        method: "GET",
        url: "/languages",
        headers: { origin: "https://chat.example" },
      });
      const denied = await restricted.inject({
        method: "GET",
        url: "/languages",
        headers: { origin: "https://elsewhere.example" },
      });
      await restricted.close();

      expect(allowed.headers["access-control-allow-origin"]).toBe("https://chat.example");
      expect(denied.headers["access-control-allow-origin"]).toBeUndefined();
      expect(denied.statusCode).toBe(200);
    });
  });
});
