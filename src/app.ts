import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import z, { ZodError } from "zod";

import type { CatalogService } from "./catalog.js";
import { ConfigurationError, SearchTimeoutError } from "./errors.js";
import { logger } from "./logger.js";
import {
  listQuerySchema,
  searchQuerySchema,
  similarQuerySchema,
  toClipFilters,
} from "./schemas.js";
import type { OutcomeStatus, SearchEngine } from "./search/engine.js";
import {
  formatClip,
  formatClipDetail,
  formatSearchHit,
  formatSimilarHit,
} from "./search/format.js";
import {
  describeSettings,
  parseSettingOverrides,
  resolveSearchSettings,
  type SearchSettingsOverrides,
} from "./search/settings.js";

const OUTCOME_STATUS_CODES = {
  ok: 200,
  degraded: 200,
  failed: 503,
  not_found: 404,
} as const satisfies Record<OutcomeStatus, number>;

export const createApp = (deps: { engine: SearchEngine; catalog: CatalogService }) => {
  const { engine, catalog } = deps;
  const app = new Hono();

  // Query-string weight overrides are caller input: invalid values are a 400.
  const requestOverrides = (query: Record<string, string>): SearchSettingsOverrides | undefined => {
    try {
      const overrides = parseSettingOverrides(query, "request");
      if (Object.keys(overrides).length === 0) {
        return undefined;
      }
      resolveSearchSettings(engine.effectiveSettings, overrides);
      return overrides;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new HTTPException(400, { message: error.message, cause: error });
      }
      throw error;
    }
  };

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/api/search", async (c) => {
    const raw = c.req.query();
    const query = searchQuerySchema.parse(raw);

    const outcome = await engine.search(query.q, query.mode, {
      limit: query.limit,
      filters: toClipFilters(query),
      overrides: requestOverrides(raw),
    });

    return c.json(
      {
        status: outcome.status,
        search_type: query.mode,
        count: outcome.results.length,
        failures: outcome.failures,
        results: outcome.results.map(formatSearchHit),
      },
      OUTCOME_STATUS_CODES[outcome.status],
    );
  });

  app.get("/api/clips/:id/similar", async (c) => {
    const raw = c.req.query();
    const query = similarQuerySchema.parse(raw);
    const sourceId = c.req.param("id");

    const outcome = await engine.findSimilar(sourceId, query.mode, {
      limit: query.limit,
      threshold: query.threshold,
      filters: toClipFilters(query),
      overrides: requestOverrides(raw),
    });

    if (outcome.status === "not_found") {
      return c.json({ error: "Source clip not found", id: sourceId }, 404);
    }

    return c.json(
      {
        status: outcome.status,
        source_id: sourceId,
        similarity_mode: query.mode,
        count: outcome.results.length,
        failures: outcome.failures,
        results: outcome.results.map(formatSimilarHit),
      },
      OUTCOME_STATUS_CODES[outcome.status],
    );
  });

  app.get("/api/clips", async (c) => {
    const query = listQuerySchema.parse(c.req.query());
    const { clips, total } = await catalog.listClips({
      sortBy: query.sort_by,
      sortOrder: query.sort_order,
      limit: query.limit,
      offset: query.offset,
      filters: toClipFilters(query),
    });
    return c.json({
      clips: clips.map(formatClip),
      total,
      limit: query.limit,
      offset: query.offset,
    });
  });

  app.get("/api/clips/:id", async (c) => {
    const id = c.req.param("id");
    const clip = await catalog.getClip(id);
    if (!clip) {
      return c.json({ error: "Clip not found", id }, 404);
    }
    return c.json({ clip: formatClipDetail(clip) });
  });

  app.post("/api/clips", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      throw new HTTPException(400, { message: "Request body must be JSON", cause: error });
    }

    const { clip, created } = await catalog.upsertClip(body);
    return c.json({ clip: formatClipDetail(clip), created }, created ? 201 : 200);
  });

  app.delete("/api/clips/:id", async (c) => {
    const id = c.req.param("id");
    const deleted = await catalog.deleteClip(id);
    if (!deleted) {
      return c.json({ error: "Clip not found", id }, 404);
    }
    return c.body(null, 204);
  });

  app.get("/api/settings/search", (c) =>
    c.json({ settings: describeSettings(engine.effectiveSettings) }),
  );

  app.onError((error, c) => {
    if (error instanceof ZodError) {
      return c.json({ error: z.flattenError(error) }, 400);
    }
    if (error instanceof HTTPException) {
      return c.json({ error: error.message }, error.status);
    }
    if (error instanceof SearchTimeoutError) {
      logger.warn("http", "Request timed out", { path: c.req.path, timeoutMs: error.timeoutMs });
      return c.json({ error: error.message }, 504);
    }
    logger.error("http", "Unhandled request error", { path: c.req.path, error });
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
};
