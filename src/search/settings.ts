import { existsSync, readFileSync } from "node:fs";

import z from "zod";

import { ConfigurationError } from "../errors.js";
import { logger } from "../logger.js";

const weight = z.coerce.number().min(0);
const threshold = z.coerce.number().min(0).max(1);
const count = z.coerce.number().int().positive();

const settingsShape = {
  defaultMatchCount: count,
  maxMatchCount: count,
  summaryWeight: weight,
  keywordWeight: weight,
  similarityThreshold: threshold,
  fulltextWeight: weight,
  rrfK: z.coerce.number().int().nonnegative(),
  overfetchFactor: count,
  similarThreshold: threshold,
  textSummaryWeight: weight,
  textKeywordWeight: weight,
  visualThumb1Weight: weight,
  visualThumb2Weight: weight,
  visualThumb3Weight: weight,
  combinedTextFactor: weight,
  combinedVisualFactor: weight,
  requestTimeoutMs: count,
};

export const searchSettingsSchema = z
  .object(settingsShape)
  .refine((value) => value.defaultMatchCount <= value.maxMatchCount, {
    message: "defaultMatchCount cannot exceed maxMatchCount",
    path: ["defaultMatchCount"],
  });

export const searchSettingsOverridesSchema = z.object(settingsShape).partial();

export type SearchSettings = z.infer<typeof searchSettingsSchema>;
export type SearchSettingsOverrides = Partial<SearchSettings>;

export const DEFAULT_SEARCH_SETTINGS: SearchSettings = {
  defaultMatchCount: 10,
  maxMatchCount: 100,
  summaryWeight: 1.0,
  keywordWeight: 0.8,
  similarityThreshold: 0.3,
  fulltextWeight: 2.5,
  rrfK: 50,
  overfetchFactor: 2,
  similarThreshold: 0.3,
  textSummaryWeight: 0.5,
  textKeywordWeight: 0.5,
  visualThumb1Weight: 0.4,
  visualThumb2Weight: 0.3,
  visualThumb3Weight: 0.3,
  combinedTextFactor: 0.6,
  combinedVisualFactor: 0.4,
  requestTimeoutMs: 30000,
};

/** External (file, environment, query string) name of every setting. */
export const SETTING_NAMES: Record<keyof SearchSettings, string> = {
  defaultMatchCount: "default_match_count",
  maxMatchCount: "max_match_count",
  summaryWeight: "summary_weight",
  keywordWeight: "keyword_weight",
  similarityThreshold: "similarity_threshold",
  fulltextWeight: "fulltext_weight",
  rrfK: "rrf_k",
  overfetchFactor: "overfetch_factor",
  similarThreshold: "similar_threshold",
  textSummaryWeight: "text_summary_weight",
  textKeywordWeight: "text_keyword_weight",
  visualThumb1Weight: "visual_thumb1_weight",
  visualThumb2Weight: "visual_thumb2_weight",
  visualThumb3Weight: "visual_thumb3_weight",
  combinedTextFactor: "combined_text_factor",
  combinedVisualFactor: "combined_visual_factor",
  requestTimeoutMs: "request_timeout_ms",
};

const SETTING_KEYS = z.object(settingsShape).keyof().options;

/**
 * Picks the known snake_case settings out of `source`, validating each one.
 * Unknown keys are ignored.
 */
export const parseSettingOverrides = (
  source: Record<string, unknown>,
  origin: string,
): SearchSettingsOverrides => {
  const raw: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    const value = source[SETTING_NAMES[key]];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const result = searchSettingsOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid search settings from ${origin}: ${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
};

const envOverrides = (env: NodeJS.ProcessEnv): SearchSettingsOverrides => {
  const source: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    const name = SETTING_NAMES[key];
    const value = env[`SEARCH_${name.toUpperCase()}`];
    if (value !== undefined) {
      source[name] = value;
    }
  }
  return parseSettingOverrides(source, "environment");
};

const fileOverrides = (filePath: string): SearchSettingsOverrides => {
  if (!existsSync(filePath)) {
    logger.info("config", "Search settings file not found, using defaults", { filePath });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Search settings file ${filePath} is not valid JSON`, {
      cause: error,
    });
  }

  const record = z.record(z.string(), z.unknown()).safeParse(parsed);
  if (!record.success) {
    throw new ConfigurationError(`Search settings file ${filePath} must hold a JSON object`);
  }
  logger.info("config", "Loaded search settings file", { filePath });
  return parseSettingOverrides(record.data, filePath);
};

/**
 * Applies `overrides` on top of `base` and validates the result. Throws
 * `ConfigurationError` when the merged settings are invalid.
 */
export const resolveSearchSettings = (
  base: SearchSettings,
  ...overrides: SearchSettingsOverrides[]
): SearchSettings => {
  const merged = overrides.reduce<Record<string, unknown>>(
    (accumulated, layer) => ({ ...accumulated, ...layer }),
    { ...base },
  );
  const result = searchSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid search settings: ${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }

  const settings = result.data;
  const factorTotal = settings.combinedTextFactor + settings.combinedVisualFactor;
  if (Math.abs(factorTotal - 1) > 0.01) {
    logger.warn("config", "Combined similarity factors do not sum to 1.0", {
      textFactor: settings.combinedTextFactor,
      visualFactor: settings.combinedVisualFactor,
      total: factorTotal,
    });
  }
  return settings;
};

/** Defaults, then the optional JSON file, then `SEARCH_*` environment variables. */
export const loadSearchSettings = (params: {
  env: NodeJS.ProcessEnv;
  filePath?: string;
}): SearchSettings => {
  const fromFile = params.filePath ? fileOverrides(params.filePath) : {};
  const fromEnv = envOverrides(params.env);
  return resolveSearchSettings(DEFAULT_SEARCH_SETTINGS, fromFile, fromEnv);
};

/** Settings keyed by their external names, as served to operators. */
export const describeSettings = (settings: SearchSettings) =>
  Object.fromEntries(SETTING_KEYS.map((key) => [SETTING_NAMES[key], settings[key]]));
