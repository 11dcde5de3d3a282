/**
 * Centralized configuration for the course recommender.
 *
 * Every tunable lives here. Values fall back to sensible defaults
 * and can be overridden via environment variables.
 *
 * Required environment variables are validated lazily (on first access)
 * so that importing this module in tests does not throw.
 */

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalNumericEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

/**
 * Create a lazy getter that defers validation until first access.
 * The resolved value is cached after the first successful read.
 */
function lazyRequired(name: string): { get value(): string } {
  let cached: string | undefined;
  return {
    get value(): string {
      if (cached === undefined) {
        cached = requireEnv(name);
      }
      return cached;
    },
  };
}

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

const _recommenderApiKey = lazyRequired("RECOMMENDER_API_KEY");

/** Shared secret used to authenticate inbound API requests (validated on first access). */
export function getRecommenderApiKey(): string {
  return _recommenderApiKey.value;
}

// ---------------------------------------------------------------------------
// Embedding
// ---------------------------------------------------------------------------

/** OpenAI model used for query embeddings. Must match the catalog's model. */
export const EMBEDDING_MODEL = optionalEnv(
  "EMBEDDING_MODEL",
  "text-embedding-3-small",
);

const _openaiApiKey = lazyRequired("OPENAI_API_KEY");

/** OpenAI API key (validated on first access). */
export function getOpenAIApiKey(): string {
  return _openaiApiKey.value;
}

/** Milliseconds to wait for the embedding service before giving up. */
export const EMBEDDING_TIMEOUT_MS = optionalNumericEnv(
  "EMBEDDING_TIMEOUT_MS",
  10_000,
);

/** Lifetime of cached query embeddings. 0 disables the cache. */
export const QUERY_CACHE_TTL_MS = optionalNumericEnv("QUERY_CACHE_TTL_MS", 0);

/** Most query embeddings held at once; the oldest is evicted beyond it. */
export const QUERY_CACHE_MAX_ENTRIES = optionalNumericEnv("QUERY_CACHE_MAX_ENTRIES", 1000);

// ---------------------------------------------------------------------------
// Ranking & scoring
// ---------------------------------------------------------------------------

/** Minimum cosine similarity for a course to be considered at all. */
export const SIMILARITY_THRESHOLD = optionalNumericEnv(
  "SIMILARITY_THRESHOLD",
  0.3,
);

/** Number of candidates returned when the query does not set a limit. */
export const DEFAULT_RESULT_LIMIT = optionalNumericEnv(
  "DEFAULT_RESULT_LIMIT",
  10,
);

/** Upper bound on the per-query limit. */
export const MAX_RESULT_LIMIT = optionalNumericEnv("MAX_RESULT_LIMIT", 50);

/** Weights of the composite score. */
export interface ScoreWeights {
  similarity: number;
  popularity: number;
  filterMatch: number;
}

export const SCORE_WEIGHTS: ScoreWeights = {
  similarity: optionalNumericEnv("SCORE_WEIGHT_SIMILARITY", 0.7),
  popularity: optionalNumericEnv("SCORE_WEIGHT_POPULARITY", 0.2),
  filterMatch: optionalNumericEnv("SCORE_WEIGHT_FILTER_MATCH", 0.1),
};

// ---------------------------------------------------------------------------
// Learning paths
// ---------------------------------------------------------------------------

/** Total hours a learning path may take before later steps become optional. */
export const PATH_DURATION_BUDGET_HOURS = optionalNumericEnv(
  "PATH_DURATION_BUDGET_HOURS",
  40,
);

// ---------------------------------------------------------------------------
// GitHub / catalog repository
// ---------------------------------------------------------------------------

/** GitHub API base URL (override for GitHub Enterprise). */
export const GITHUB_API_BASE = optionalEnv(
  "GITHUB_API_BASE",
  "https://api.github.com",
);

const _githubToken = lazyRequired("GITHUB_TOKEN");
const _catalogOwner = lazyRequired("CATALOG_OWNER");
const _catalogRepo = lazyRequired("CATALOG_REPO");

/** Fine-grained GitHub PAT with Contents read/write on the catalog repository (validated on first access). */
export function getGitHubToken(): string {
  return _githubToken.value;
}

/** GitHub owner (user or org) of the catalog repository (validated on first access). */
export function getCatalogOwner(): string {
  return _catalogOwner.value;
}

/** Catalog repository name (validated on first access). */
export function getCatalogRepo(): string {
  return _catalogRepo.value;
}

/** Repo-relative path of the catalog file. */
export const CATALOG_PATH = optionalEnv("CATALOG_PATH", "index/catalog.json");
