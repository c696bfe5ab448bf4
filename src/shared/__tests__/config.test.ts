import { describe, expect, it } from "vitest";
import { DEFAULT_BEDROCK_MODEL_ID, DEFAULT_UPSTREAM_BASE_URL, parseConfig, requireDbUrl, retryBudgetMs } from "../config.js";
import { ConfigError } from "../errors.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      upstreamBaseUrl: DEFAULT_UPSTREAM_BASE_URL,
      fetch: {
        timeoutMs: 30_000,
        maxAttempts: 3,
        backoffBaseMs: 500,
        backoffMaxMs: 10_000,
        userAgent: "letterfetch/0.1"
      },
      ingest: { deadlineMs: 91_500, maxNewPages: 5, maxOlderPages: 5 },
      port: 8000,
      logLevel: "info",
      dbUrl: "",
      answers: { region: "us-east-1", profile: undefined, modelId: DEFAULT_BEDROCK_MODEL_ID, maxTokens: 2000 }
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = parseConfig({
      UPSTREAM_BASE_URL: "https://letters.test/archive/",
      FETCH_TIMEOUT_MS: "",
      FETCH_MAX_ATTEMPTS: "5",
      INGEST_DEADLINE_MS: "1200",
      LOG_LEVEL: "DEBUG",
      POSTGRES_URL: "postgres://localhost/letters",
      AWS_PROFILE: "research"
    });

    expect(config.upstreamBaseUrl).toBe("https://letters.test/archive/");
    expect(config.fetch.timeoutMs).toBe(30_000);
    expect(config.fetch.maxAttempts).toBe(5);
    expect(config.ingest.deadlineMs).toBe(1200);
    expect(config.logLevel).toBe("debug");
    expect(config.dbUrl).toBe("postgres://localhost/letters");
    expect(config.answers.profile).toBe("research");
  });

  it("prefers DATABASE_URL over POSTGRES_URL", () => {
    const config = parseConfig({ DATABASE_URL: "postgres://primary/db", POSTGRES_URL: "postgres://fallback/db" });

    expect(config.dbUrl).toBe("postgres://primary/db");
  });

  it("rejects values it cannot use", () => {
    expect(() => parseConfig({ FETCH_TIMEOUT_MS: "abc" })).toThrow(
      'Invalid configuration: FETCH_TIMEOUT_MS: expected an integer >= 1, got "abc"'
    );
    expect(() => parseConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => parseConfig({ UPSTREAM_BASE_URL: "ftp://letters.test/" })).toThrow(ConfigError);
    expect(() => parseConfig({ PORT: "70000" })).toThrow(ConfigError);
  });
});

describe("retryBudgetMs", () => {
  it("adds every timeout and every capped pause", () => {
    expect(retryBudgetMs({ timeoutMs: 1000, maxAttempts: 4, backoffBaseMs: 500, backoffMaxMs: 1500 })).toBe(7000);
    expect(retryBudgetMs({ timeoutMs: 1000, maxAttempts: 1, backoffBaseMs: 500, backoffMaxMs: 1500 })).toBe(1000);
  });
});

describe("requireDbUrl", () => {
  it("fails without a database URL", () => {
    expect(() => requireDbUrl(parseConfig({}))).toThrow(ConfigError);
    expect(requireDbUrl(parseConfig({ DATABASE_URL: "postgres://localhost/letters" }))).toBe(
      "postgres://localhost/letters"
    );
  });
});
