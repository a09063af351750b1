import { serve } from "@hono/node-server";

import { createApp } from "./app.js";
import { CatalogService } from "./catalog.js";
import { loadConfig } from "./config.js";
import { createDatabase, ensureExtensions, PgClipStore } from "./db.js";
import { createEmbeddingClient } from "./embeddings.js";
import { logger, setLogLevel } from "./logger.js";
import { SearchEngine } from "./search/engine.js";
import { describeSettings } from "./search/settings.js";

const bootstrap = async () => {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const { pool, db } = createDatabase(config.db);
    await ensureExtensions(pool);
    logger.info("app", "Database extensions ready");

    const store = new PgClipStore(db);
    const textEmbeddings = createEmbeddingClient({
      space: "text",
      endpoint: config.embedding.text,
    });
    const visualEmbeddings = config.embedding.visual
      ? createEmbeddingClient({ space: "visual", endpoint: config.embedding.visual })
      : null;
    if (!visualEmbeddings) {
      logger.warn("app", "VISUAL_EMBEDDING_URL not set; thumbnail embeddings will not be generated");
    }

    const engine = new SearchEngine({ store, textEmbeddings, settings: config.search });
    const catalog = new CatalogService({ store, textEmbeddings, visualEmbeddings });
    const app = createApp({ engine, catalog });
    logger.info("app", "Search settings loaded", describeSettings(config.search));

    const server = serve(
      {
        fetch: app.fetch,
        port: config.port,
      },
      (info) => {
        logger.info("app", `Server is running on http://localhost:${info.port}`);
      },
    );

    const shutdown = () => {
      logger.info("app", "Shutting down");
      server.close();
      pool.end().catch((error: unknown) => {
        logger.error("app", "Failed to close database pool", { error });
      });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    logger.error("app", "Failed to initialize application", { error });
    process.exit(1);
  }
};

void bootstrap();
