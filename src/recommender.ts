/**
 * Recommender — the single entry point for a recommendation query.
 *
 * Drives one query through its stages, strictly in order:
 *
 *   RECEIVED → EMBEDDED → RANKED → FILTERED_SCORED → PATH_COMPOSED → RETURNED
 *
 * with ERRORED reachable from any of them. The query is validated before
 * the embedding call so malformed requests never reach the external
 * service. Everything built here belongs to the one call; nothing is shared
 * between requests, so concurrent calls and abandoned calls are both safe.
 */

import { randomUUID } from "node:crypto";
import type {
  QueryFilters,
  QueryStage,
  RecommendationQuery,
  RecommendationResult,
} from "@/types";
import { isSkillLevel } from "@/types";
import {
  DEFAULT_RESULT_LIMIT,
  EMBEDDING_TIMEOUT_MS,
  MAX_RESULT_LIMIT,
  PATH_DURATION_BUDGET_HOURS,
  SCORE_WEIGHTS,
  SIMILARITY_THRESHOLD,
  type ScoreWeights,
} from "./config";
import { findSkillGaps, summarizeCandidates } from "./analytics";
import { type EmbeddingProvider, embedWithTimeout } from "./embeddings";
import {
  DegenerateVectorError,
  DimensionMismatchError,
  EmbeddingServiceError,
  InvalidQueryError,
  NotFoundError,
  StoreUnavailableError,
} from "./errors";
import { logEvent } from "./log";
import { composeLearningPath } from "./path";
import { scoreCandidates } from "./scoring";
import { rankBySimilarity } from "./similarity";
import type { CatalogStore } from "./store";

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface RecommenderSettings {
  threshold: number;
  defaultLimit: number;
  maxLimit: number;
  weights: ScoreWeights;
  durationBudgetHours: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_SETTINGS: RecommenderSettings = {
  threshold: SIMILARITY_THRESHOLD,
  defaultLimit: DEFAULT_RESULT_LIMIT,
  maxLimit: MAX_RESULT_LIMIT,
  weights: SCORE_WEIGHTS,
  durationBudgetHours: PATH_DURATION_BUDGET_HOURS,
  embeddingTimeoutMs: EMBEDDING_TIMEOUT_MS,
};

// ---------------------------------------------------------------------------
// Request parsing & validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(
  source: Record<string, unknown>,
  key: string,
  label: string,
  problems: string[],
): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    problems.push(`${label} must be a number`);
    return undefined;
  }
  return value;
}

function optionalStrings(
  source: Record<string, unknown>,
  key: string,
  label: string,
  problems: string[],
): string[] | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    problems.push(`${label} must be an array of strings`);
    return undefined;
  }
  return value;
}

/**
 * Turn an untrusted request body into a typed query.
 * Throws InvalidQueryError listing every type problem found.
 */
export function parseQuery(body: unknown): RecommendationQuery {
  if (!isRecord(body)) {
    throw new InvalidQueryError(["request body must be a JSON object"]);
  }

  const problems: string[] = [];

  if (typeof body.text !== "string") {
    problems.push("text must be a string");
  }

  let filters: QueryFilters | undefined;
  if (body.filters !== undefined && body.filters !== null) {
    if (!isRecord(body.filters)) {
      problems.push("filters must be an object");
    } else {
      const raw = body.filters;
      const levels = optionalStrings(raw, "levels", "filters.levels", problems);
      const unknownLevels = (levels ?? []).filter((l) => !isSkillLevel(l));
      if (unknownLevels.length > 0) {
        problems.push(`filters.levels contains unknown levels: ${unknownLevels.join(", ")}`);
      }
      filters = {
        levels: levels?.filter(isSkillLevel),
        minDuration: optionalNumber(raw, "minDuration", "filters.minDuration", problems),
        maxDuration: optionalNumber(raw, "maxDuration", "filters.maxDuration", problems),
        minPrice: optionalNumber(raw, "minPrice", "filters.minPrice", problems),
        maxPrice: optionalNumber(raw, "maxPrice", "filters.maxPrice", problems),
        categories: optionalStrings(raw, "categories", "filters.categories", problems),
        providers: optionalStrings(raw, "providers", "filters.providers", problems),
        modalities: optionalStrings(raw, "modalities", "filters.modalities", problems),
        excludeTags: optionalStrings(raw, "excludeTags", "filters.excludeTags", problems),
      };
    }
  }

  const limit = optionalNumber(body, "limit", "limit", problems);
  const threshold = optionalNumber(body, "threshold", "threshold", problems);
  const durationBudgetHours = optionalNumber(body, "durationBudgetHours", "durationBudgetHours", problems);
  const completedCourseIds = optionalStrings(body, "completedCourseIds", "completedCourseIds", problems);

  if (problems.length > 0) {
    throw new InvalidQueryError(problems);
  }

  return {
    text: typeof body.text === "string" ? body.text : "",
    ...(filters && { filters }),
    ...(limit !== undefined && { limit }),
    ...(threshold !== undefined && { threshold }),
    ...(durationBudgetHours !== undefined && { durationBudgetHours }),
    ...(completedCourseIds && { completedCourseIds }),
  };
}

function checkRange(
  min: number | undefined,
  max: number | undefined,
  label: string,
  problems: string[],
): void {
  if (min !== undefined && min < 0) problems.push(`filters.min${label} must not be negative`);
  if (max !== undefined && max < 0) problems.push(`filters.max${label} must not be negative`);
  if (min !== undefined && max !== undefined && min > max) {
    problems.push(`filters.min${label} must not exceed filters.max${label}`);
  }
}

/**
 * Semantic checks on a typed query. Returns every problem found; an empty
 * list means the query may proceed to the embedding call.
 */
export function validateQuery(
  query: RecommendationQuery,
  settings: RecommenderSettings = DEFAULT_SETTINGS,
): string[] {
  const problems: string[] = [];

  if (!query.text.trim()) {
    problems.push("text must not be empty");
  }

  if (query.limit !== undefined) {
    if (!Number.isInteger(query.limit) || query.limit <= 0) {
      problems.push("limit must be a positive integer");
    } else if (query.limit > settings.maxLimit) {
      problems.push(`limit must not exceed ${settings.maxLimit}`);
    }
  }

  if (query.threshold !== undefined && (query.threshold < -1 || query.threshold > 1)) {
    problems.push("threshold must be between -1 and 1");
  }

  if (query.durationBudgetHours !== undefined && query.durationBudgetHours <= 0) {
    problems.push("durationBudgetHours must be positive");
  }

  const filters = query.filters ?? {};
  for (const level of filters.levels ?? []) {
    if (!isSkillLevel(level)) problems.push(`unknown skill level: ${String(level)}`);
  }
  checkRange(filters.minDuration, filters.maxDuration, "Duration", problems);
  checkRange(filters.minPrice, filters.maxPrice, "Price", problems);

  return problems;
}

/** Drop unset and empty filters so diagnostics show only what was applied. */
export function normalizeFilters(filters: QueryFilters | undefined): QueryFilters {
  const applied: QueryFilters = {};
  if (!filters) return applied;
  if (filters.levels && filters.levels.length > 0) applied.levels = [...new Set(filters.levels)];
  if (filters.minDuration !== undefined) applied.minDuration = filters.minDuration;
  if (filters.maxDuration !== undefined) applied.maxDuration = filters.maxDuration;
  if (filters.minPrice !== undefined) applied.minPrice = filters.minPrice;
  if (filters.maxPrice !== undefined) applied.maxPrice = filters.maxPrice;
  if (filters.categories && filters.categories.length > 0) {
    applied.categories = [...new Set(filters.categories)];
  }
  if (filters.providers && filters.providers.length > 0) {
    applied.providers = [...new Set(filters.providers)];
  }
  if (filters.modalities && filters.modalities.length > 0) {
    applied.modalities = [...new Set(filters.modalities)];
  }
  if (filters.excludeTags && filters.excludeTags.length > 0) {
    applied.excludeTags = [...new Set(filters.excludeTags)];
  }
  return applied;
}

// ---------------------------------------------------------------------------
// Store access
// ---------------------------------------------------------------------------

/** Run a store operation; anything but a typed catalog error means storage is unavailable. */
async function guardStore<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    if (
      err instanceof StoreUnavailableError ||
      err instanceof NotFoundError ||
      err instanceof DimensionMismatchError ||
      err instanceof DegenerateVectorError
    ) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new StoreUnavailableError(`Catalog storage failed: ${message}`);
  }
}

// ---------------------------------------------------------------------------
// Recommender
// ---------------------------------------------------------------------------

export interface RecommenderDeps {
  store: CatalogStore;
  provider: EmbeddingProvider;
  settings?: Partial<RecommenderSettings>;
}

export interface HandleOptions {
  /** Lets the caller abandon the embedding call. */
  signal?: AbortSignal;
}

export interface Recommender {
  /**
   * Run one query. Rejects with InvalidQueryError, EmbeddingServiceError or
   * StoreUnavailableError; never returns a partial result.
   */
  handle(query: RecommendationQuery, options?: HandleOptions): Promise<RecommendationResult>;
}

export function createRecommender(deps: RecommenderDeps): Recommender {
  const settings: RecommenderSettings = { ...DEFAULT_SETTINGS, ...deps.settings };
  const { store, provider } = deps;

  return {
    async handle(query, options = {}) {
      const requestId = randomUUID();
      const stages: QueryStage[] = [];
      const enter = (stage: QueryStage, fields: Record<string, unknown> = {}) => {
        stages.push(stage);
        logEvent("query_stage", { requestId, stage, ...fields });
      };

      enter("RECEIVED");

      try {
        const problems = validateQuery(query, settings);
        if (problems.length > 0) {
          throw new InvalidQueryError(problems);
        }

        const filters = normalizeFilters(query.filters);
        const limit = query.limit ?? settings.defaultLimit;
        const threshold = query.threshold ?? settings.threshold;
        const budget = query.durationBudgetHours ?? settings.durationBudgetHours;

        const vector = await embedWithTimeout(provider, query.text, {
          timeoutMs: settings.embeddingTimeoutMs,
          signal: options.signal,
        });
        const dimension = store.dimension();
        if (dimension !== null && vector.length !== dimension) {
          throw new EmbeddingServiceError(
            "rejected",
            `Embedding service returned ${vector.length} dimensions, catalog uses ${dimension}`,
          );
        }
        enter("EMBEDDED", { dimension: vector.length });

        const entries = await guardStore(() => store.getAll());
        const { ranked, rejected } = rankBySimilarity(vector, entries, { threshold });
        for (const issue of rejected) {
          logEvent("record_excluded", { requestId, ...issue });
        }
        enter("RANKED", { scanned: entries.length, aboveThreshold: ranked.length });

        const { candidates, afterFilters } = scoreCandidates(ranked, {
          filters,
          limit,
          weights: settings.weights,
        });
        enter("FILTERED_SCORED", { afterFilters, returned: candidates.length });

        const learningPath = composeLearningPath(candidates, budget);
        enter("PATH_COMPOSED", { steps: learningPath.steps.length, degraded: learningPath.degraded });

        const skillGaps = await guardStore(() =>
          findSkillGaps(learningPath, store, query.completedCourseIds),
        );

        enter("RETURNED");

        return {
          outcome: candidates.length === 0 ? "no-matches" : "matched",
          candidates,
          learningPath,
          analytics: summarizeCandidates(candidates),
          skillGaps,
          diagnostics: {
            appliedFilters: filters,
            threshold,
            limit,
            degraded: learningPath.degraded,
            excluded: rejected,
            scanned: entries.length,
            aboveThreshold: ranked.length,
            afterFilters,
            stages: [...stages],
          },
        };
      } catch (err) {
        enter("ERRORED");
        logEvent("query_failed", {
          requestId,
          error: err instanceof Error ? err.name : "Error",
          message: err instanceof Error ? err.message : String(err),
          ...(err instanceof EmbeddingServiceError && { kind: err.kind }),
        });
        throw err;
      }
    },
  };
}
