import "dotenv/config";

import z from "zod";

import {
  TEXT_EMBEDDING_DIMENSIONS,
  VISUAL_EMBEDDING_DIMENSIONS,
} from "./db/schema.js";
import { ConfigurationError } from "./errors.js";
import { loadSearchSettings, type SearchSettings } from "./search/settings.js";

const embeddingEndpointSchema = (defaultDimensions: number) =>
  z.object({
    baseUrl: z.url(),
    apiKey: z.string().optional(),
    model: z.string().optional(),
    dimensions: z.coerce.number().int().positive().default(defaultDimensions),
    timeoutMs: z.coerce.number().int().positive().default(30000),
  });

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  db: z.object({
    user: z.string(),
    password: z.string(),
    host: z.string(),
    port: z.coerce.number().int().positive().default(5432),
    database: z.string(),
    ssl: z.stringbool().default(false),
    statementTimeoutMs: z.coerce.number().int().positive(),
  }),
  embedding: z.object({
    text: embeddingEndpointSchema(TEXT_EMBEDDING_DIMENSIONS),
    visual: embeddingEndpointSchema(VISUAL_EMBEDDING_DIMENSIONS).optional(),
  }),
});

export type EmbeddingEndpointConfig = z.infer<ReturnType<typeof embeddingEndpointSchema>>;
export type AppConfig = z.infer<typeof configSchema> & { search: SearchSettings };

const assertStoredWidth = (
  endpoint: EmbeddingEndpointConfig | undefined,
  expected: number,
  name: string,
) => {
  if (endpoint && endpoint.dimensions !== expected) {
    throw new ConfigurationError(
      `${name} embeddings are configured for ${endpoint.dimensions} dimensions but the clips table stores ${expected}`,
    );
  }
};

/**
 * Builds the application configuration from the environment. Called once at
 * startup; the result is passed to everything that needs it.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const visualUrl = env.VISUAL_EMBEDDING_URL;
  const search = loadSearchSettings({ env, filePath: env.SEARCH_CONFIG_PATH });

  const parsed = configSchema.parse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    db: {
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      ssl: env.DB_SSL,
      statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS ?? search.requestTimeoutMs,
    },
    embedding: {
      text: {
        baseUrl: env.TEXT_EMBEDDING_URL,
        apiKey: env.TEXT_EMBEDDING_API_KEY,
        model: env.TEXT_EMBEDDING_MODEL,
        dimensions: env.TEXT_EMBEDDING_DIMENSIONS,
        timeoutMs: env.EMBEDDING_TIMEOUT_MS,
      },
      visual: visualUrl
        ? {
            baseUrl: visualUrl,
            apiKey: env.VISUAL_EMBEDDING_API_KEY,
            model: env.VISUAL_EMBEDDING_MODEL,
            dimensions: env.VISUAL_EMBEDDING_DIMENSIONS,
            timeoutMs: env.EMBEDDING_TIMEOUT_MS,
          }
        : undefined,
    },
  });

  assertStoredWidth(parsed.embedding.text, TEXT_EMBEDDING_DIMENSIONS, "Text");
  assertStoredWidth(parsed.embedding.visual, VISUAL_EMBEDDING_DIMENSIONS, "Visual");

  return { ...parsed, search };
};
