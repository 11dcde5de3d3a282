/**
 * Embedding module — pluggable provider interface + OpenAI implementation.
 *
 * Turns query text into a dense vector. The provider interface lets tests
 * and other backends stand in without touching the recommender. The
 * embedding call is the only place a query waits on the network, so it is
 * bounded by a timeout here.
 */

import type { EmbeddingVector } from "@/types";
import {
  EMBEDDING_MODEL,
  EMBEDDING_TIMEOUT_MS,
  QUERY_CACHE_MAX_ENTRIES,
  QUERY_CACHE_TTL_MS,
  getOpenAIApiKey,
} from "./config";
import { EmbeddingServiceError } from "./errors";
import { logEvent } from "./log";
import { hasDirection } from "./similarity";

// ---------------------------------------------------------------------------
// Provider Interface
// ---------------------------------------------------------------------------

export interface EmbedOptions {
  /** Aborts the underlying request. */
  signal?: AbortSignal;
}

/** A pluggable embedding provider. */
export interface EmbeddingProvider {
  /** Generate an embedding vector for the given text. */
  embed(text: string, options?: EmbedOptions): Promise<EmbeddingVector>;
  /** Identifier of the model this provider uses. */
  readonly model: string;
}

// ---------------------------------------------------------------------------
// OpenAI Provider
// ---------------------------------------------------------------------------

/** Response shape from the OpenAI embeddings endpoint. */
interface OpenAIEmbeddingResponse {
  data: { embedding: number[]; index: number }[];
  model: string;
  usage: { prompt_tokens: number; total_tokens: number };
}

/**
 * Create an EmbeddingProvider backed by the OpenAI embeddings API.
 *
 * Uses `fetch` directly (no SDK dependency).
 */
export function createOpenAIProvider(
  apiKey: string = getOpenAIApiKey(),
  model: string = EMBEDDING_MODEL,
): EmbeddingProvider {
  return {
    model,

    async embed(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
      if (!text.trim()) {
        throw new Error("Cannot embed empty text");
      }

      const response = await fetch("https://api.openai.com/v1/embeddings", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({ input: text, model }),
        signal: options.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(
          `OpenAI embedding request failed (${response.status}): ${body}`,
        );
      }

      const json = (await response.json()) as OpenAIEmbeddingResponse;

      if (!json.data?.[0]?.embedding) {
        throw new Error("Unexpected OpenAI response: missing embedding data");
      }

      return json.data[0].embedding;
    },
  };
}

// ---------------------------------------------------------------------------
// Bounded call
// ---------------------------------------------------------------------------

export interface BoundedEmbedOptions {
  timeoutMs?: number;
  /** The caller's own cancellation signal. */
  signal?: AbortSignal;
}

/**
 * Embed text with a single attempt bounded by a timeout.
 *
 * Every failure becomes an EmbeddingServiceError: `timeout` when the
 * deadline passes, `rejected` for anything else (HTTP errors, caller
 * aborts, vectors with no direction). The race against the timer holds
 * even for providers that ignore the abort signal.
 */
export async function embedWithTimeout(
  provider: EmbeddingProvider,
  text: string,
  options: BoundedEmbedOptions = {},
): Promise<EmbeddingVector> {
  const timeoutMs = options.timeoutMs ?? EMBEDDING_TIMEOUT_MS;
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;

  const onCallerAbort = () => controller.abort();
  if (options.signal?.aborted) {
    throw new EmbeddingServiceError("rejected", "Embedding request aborted by caller");
  }
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(
        new EmbeddingServiceError(
          "timeout",
          `Embedding service did not respond within ${timeoutMs} ms`,
        ),
      );
    }, timeoutMs);
  });

  try {
    const vector = await Promise.race([
      provider.embed(text, { signal: controller.signal }),
      deadline,
    ]);

    if (vector.length === 0 || !hasDirection(vector)) {
      throw new EmbeddingServiceError(
        "rejected",
        "Embedding service returned a vector with zero magnitude",
      );
    }
    return vector;
  } catch (err) {
    if (err instanceof EmbeddingServiceError) throw err;
    if (timedOut) {
      throw new EmbeddingServiceError(
        "timeout",
        `Embedding service did not respond within ${timeoutMs} ms`,
      );
    }
    if (options.signal?.aborted) {
      throw new EmbeddingServiceError("rejected", "Embedding request aborted by caller");
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new EmbeddingServiceError("rejected", message);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCallerAbort);
  }
}

// ---------------------------------------------------------------------------
// Query cache
// ---------------------------------------------------------------------------

/** A provider behind the query cache. */
export interface CachedEmbeddingProvider extends EmbeddingProvider {
  /** Entries currently held. */
  cacheSize(): number;
}

/**
 * Wrap a provider with a TTL cache keyed by exact query text.
 *
 * Only vectors are cached. Ranking and thresholding still run on every
 * query, so a cache hit can never stand in for a fresh similarity pass.
 * Every insert sweeps expired entries and evicts the oldest beyond
 * `maxEntries`.
 *
 * @param ttlMs - Entry lifetime. 0 or less disables caching.
 * @param now   - Clock, injectable for tests.
 * @param maxEntries - Size cap. 0 or less disables caching.
 */
export function withQueryCache(
  provider: EmbeddingProvider,
  ttlMs: number,
  now: () => number = Date.now,
  maxEntries: number = QUERY_CACHE_MAX_ENTRIES,
): CachedEmbeddingProvider {
  if (ttlMs <= 0 || maxEntries <= 0) {
    return {
      model: provider.model,
      embed: (text, options) => provider.embed(text, options),
      cacheSize: () => 0,
    };
  }

  // Insertion order is expiry order: every entry gets the same TTL.
  const cache = new Map<string, { vector: EmbeddingVector; expiresAt: number }>();

  function sweep(at: number): void {
    for (const [key, entry] of cache) {
      if (entry.expiresAt > at && cache.size < maxEntries) break;
      cache.delete(key);
    }
  }

  return {
    model: provider.model,

    async embed(text: string, options?: EmbedOptions): Promise<EmbeddingVector> {
      const cached = cache.get(text);
      if (cached && cached.expiresAt > now()) {
        logEvent("query_embedding_cache_hit", { model: provider.model });
        return [...cached.vector];
      }
      cache.delete(text);

      const vector = await provider.embed(text, options);
      const at = now();
      sweep(at);
      cache.set(text, { vector: [...vector], expiresAt: at + ttlMs });
      return vector;
    },

    cacheSize: () => cache.size,
  };
}

// ---------------------------------------------------------------------------
// Process-wide provider
// ---------------------------------------------------------------------------

let shared: EmbeddingProvider | null = null;

/**
 * The provider used by the HTTP routes: OpenAI behind the query cache.
 * Created on first use so the API key is only required once a query runs.
 */
export function getQueryEmbeddingProvider(): EmbeddingProvider {
  shared ??= withQueryCache(createOpenAIProvider(), QUERY_CACHE_TTL_MS);
  return shared;
}
