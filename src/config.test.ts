import { test, describe } from "node:test";
import assert from "node:assert";
import { ZodError } from "zod";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  test("should fall back to defaults on an empty environment", () => {
    const config = loadConfig({});

    assert.strictEqual(config.searchUrl, "https://www.google.com/search");
    assert.strictEqual(config.locale, "us");
    assert.strictEqual(config.language, undefined);
    assert.strictEqual(config.timeoutMs, 10_000);
    assert.strictEqual(config.debug, false);
    assert.match(config.userAgent, /^Mozilla\/5\.0/);
  });

  test("should read overrides from the environment", () => {
    const config = loadConfig({
      PAA_SEARCH_URL: "http://localhost:8080/search",
      PAA_USER_AGENT: "test-agent",
      PAA_LOCALE: "fr",
      PAA_LANGUAGE: "fr",
      PAA_TIMEOUT_MS: "2500",
      PAA_DEBUG: "1",
    });

    assert.deepStrictEqual(config, {
      searchUrl: "http://localhost:8080/search",
      userAgent: "test-agent",
      locale: "fr",
      language: "fr",
      timeoutMs: 2500,
      debug: true,
    });
  });

  test("should reject invalid values", () => {
    assert.throws(() => loadConfig({ PAA_TIMEOUT_MS: "soon" }), ZodError);
    assert.throws(() => loadConfig({ PAA_SEARCH_URL: "not-a-url" }), ZodError);
    assert.throws(() => loadConfig({ PAA_DEBUG: "yes" }), ZodError);
  });

  test("should return a frozen object", () => {
    assert.ok(Object.isFrozen(loadConfig({})));
  });
});
