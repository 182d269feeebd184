import { describe, it, expect } from "vitest";
import { loadConfig, resolveConfig } from "../../utils/config.js";
import { ConfigurationError } from "../../errors.js";

describe("loadConfig", () => {
  it("falls back to the published endpoints", () => {
    expect(loadConfig({})).toEqual({
      heritageApiUrl: "http://www.cha.go.kr/cha/",
      palaceApiUrl: "https://www.heritage.go.kr/",
      timeoutMs: 15_000,
      logRequests: false,
    });
  });

  it("reads overrides and appends a trailing slash to base URLs", () => {
    const config = loadConfig({
      HERITAGE_API_URL: "http://localhost:8080/cha",
      PALACE_API_URL: "http://localhost:8081/",
      HERITAGE_HTTP_TIMEOUT_MS: "2500",
      HERITAGE_LOG_REQUESTS: "true",
    });
    expect(config).toEqual({
      heritageApiUrl: "http://localhost:8080/cha/",
      palaceApiUrl: "http://localhost:8081/",
      timeoutMs: 2500,
      logRequests: true,
    });
  });

  it("rejects malformed values with the variable name", () => {
    expect(() => loadConfig({ HERITAGE_HTTP_TIMEOUT_MS: "-5" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ HERITAGE_API_URL: "not a url" })).toThrow(/HERITAGE_API_URL/);
    expect(() => loadConfig({ HERITAGE_LOG_REQUESTS: "yes" })).toThrow(/HERITAGE_LOG_REQUESTS/);
  });
});

describe("resolveConfig", () => {
  const overrides = {
    heritageApiUrl: "http://localhost:8080/cha",
    palaceApiUrl: "http://localhost:8081/",
    timeoutMs: 2500,
    logRequests: true,
  };

  it("ignores overrides that are undefined", () => {
    expect(resolveConfig({ heritageApiUrl: undefined }, {}).heritageApiUrl).toBe(
      "http://www.cha.go.kr/cha/"
    );
  });

  it("validates and normalises overrides", () => {
    expect(resolveConfig({ heritageApiUrl: "http://localhost:8080/cha" }, {}).heritageApiUrl).toBe(
      "http://localhost:8080/cha/"
    );
    expect(() => resolveConfig({ heritageApiUrl: "not a url" }, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig({ heritageApiUrl: "not a url" }, {})).toThrow(/heritageApiUrl/);
    expect(() => resolveConfig({ timeoutMs: 0 }, {})).toThrow(/timeoutMs/);
  });

  it("does not read variables for fields the caller supplied", () => {
    const env = { HERITAGE_HTTP_TIMEOUT_MS: "abc" };

    expect(resolveConfig(overrides, env)).toEqual({
      heritageApiUrl: "http://localhost:8080/cha/",
      palaceApiUrl: "http://localhost:8081/",
      timeoutMs: 2500,
      logRequests: true,
    });
    expect(() => resolveConfig({ ...overrides, timeoutMs: undefined }, env)).toThrow(
      /HERITAGE_HTTP_TIMEOUT_MS/
    );
  });
});
