import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";

import { loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

const baseEnv = {
  DB_USER: "clips",
  DB_PASSWORD: "test-secret",
  DB_HOST: "localhost",
  DB_NAME: "clips",
  TEXT_EMBEDDING_URL: "http://localhost:8080/v1/embeddings",
};

describe("loadConfig", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies defaults and leaves the visual endpoint unset", () => {
    const config = loadConfig(baseEnv);

    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe("info");
    expect(config.db).toEqual({
      user: "clips",
      password: "test-secret",
      host: "localhost",
      port: 5432,
      database: "clips",
      ssl: false,
      statementTimeoutMs: 30000,
    });
    expect(config.embedding.text).toEqual({
      baseUrl: "http://localhost:8080/v1/embeddings",
      dimensions: 1024,
      timeoutMs: 30000,
    });
    expect(config.embedding.visual).toBeUndefined();
    expect(config.search.rrfK).toBe(50);
  });

  it("reads the visual endpoint, coerced numbers and search overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: "8080",
      DB_SSL: "true",
      EMBEDDING_TIMEOUT_MS: "5000",
      VISUAL_EMBEDDING_URL: "http://localhost:8081/v1/embeddings",
      VISUAL_EMBEDDING_API_KEY: "test-secret",
      SEARCH_RRF_K: "60",
    });

    expect(config.port).toBe(8080);
    expect(config.db.ssl).toBe(true);
    expect(config.embedding.visual).toEqual({
      baseUrl: "http://localhost:8081/v1/embeddings",
      apiKey: "test-secret",
      dimensions: 1152,
      timeoutMs: 5000,
    });
    expect(config.search.rrfK).toBe(60);
  });

  it("bounds database statements by the request timeout unless set explicitly", () => {
    expect(loadConfig({ ...baseEnv, SEARCH_REQUEST_TIMEOUT_MS: "8000" }).db.statementTimeoutMs).toBe(
      8000,
    );
    expect(
      loadConfig({
        ...baseEnv,
        SEARCH_REQUEST_TIMEOUT_MS: "8000",
        DB_STATEMENT_TIMEOUT_MS: "2000",
      }).db.statementTimeoutMs,
    ).toBe(2000);
  });

  it("refuses an embedding width the table does not store", () => {
    expect(() => loadConfig({ ...baseEnv, TEXT_EMBEDDING_DIMENSIONS: "768" })).toThrow(
      ConfigurationError,
    );
  });

  it("requires the database settings", () => {
    const { DB_HOST: _host, ...withoutHost } = baseEnv;
    expect(() => loadConfig(withoutHost)).toThrow(ZodError);
  });
});
