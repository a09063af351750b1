import z from "zod";

import type { EmbeddingEndpointConfig } from "./config.js";
import { logger } from "./logger.js";
import type { EmbeddingSpace } from "./search/plan.js";

const embeddingResponseSchema = z.object({
  data: z
    .array(z.object({ embedding: z.array(z.number()) }))
    .min(1),
});

export type EmbeddingClient = {
  readonly space: EmbeddingSpace;
  readonly dimensions: number;
  /** `input` is free text or a data URI. Resolves to null on any failure. */
  embed(input: string): Promise<number[] | null>;
  embedText(text: string): Promise<number[] | null>;
};

export const createEmbeddingClient = (params: {
  space: EmbeddingSpace;
  endpoint: EmbeddingEndpointConfig;
  fetchImpl?: typeof fetch;
}): EmbeddingClient => {
  const { space, endpoint } = params;
  const fetchImpl = params.fetchImpl ?? fetch;
  const context = `embeddings:${space}`;

  const embed = async (input: string): Promise<number[] | null> => {
    const requestBody: Record<string, unknown> = { input };
    if (endpoint.model) {
      requestBody.model = endpoint.model;
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (endpoint.apiKey) {
      headers.Authorization = `Bearer ${endpoint.apiKey}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), endpoint.timeoutMs);

    try {
      const response = await fetchImpl(endpoint.baseUrl, {
        method: "POST",
        headers,
        body: JSON.stringify(requestBody),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        logger.warn(context, "Embedding request failed", {
          status: response.status,
          detail: detail.slice(0, 200),
        });
        return null;
      }

      const payload: unknown = await response.json();
      const parsed = embeddingResponseSchema.safeParse(payload);
      if (!parsed.success) {
        logger.warn(context, "Embedding response malformed", {
          issues: z.flattenError(parsed.error).formErrors,
        });
        return null;
      }

      const [first] = parsed.data.data;
      if (!first || first.embedding.length !== endpoint.dimensions) {
        logger.error(context, "Embedding has unexpected dimensions", {
          expected: endpoint.dimensions,
          received: first?.embedding.length ?? 0,
        });
        return null;
      }

      if (first.embedding.every((value) => value === 0)) {
        logger.error(context, "Embedding is a zero vector");
        return null;
      }

      return first.embedding;
    } catch (error) {
      if (controller.signal.aborted) {
        logger.warn(context, "Embedding request timed out", {
          timeoutMs: endpoint.timeoutMs,
        });
      } else {
        logger.error(context, "Embedding request errored", { error });
      }
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  };

  return {
    space,
    dimensions: endpoint.dimensions,
    embed,
    embedText: (text) => embed(text),
  };
};
