import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import {
  createOpenAIProvider,
  embedWithTimeout,
  withQueryCache,
  type EmbeddingProvider,
} from "./embeddings";
import { EmbeddingServiceError } from "./errors";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A fake embedding vector for testing. */
const FAKE_VECTOR = [0.1, 0.2, 0.3, 0.4, 0.5];

/** Build a successful OpenAI-shaped response. */
function fakeOpenAIResponse(embedding: number[] = FAKE_VECTOR) {
  return {
    ok: true,
    status: 200,
    json: async () => ({
      data: [{ embedding, index: 0 }],
      model: "text-embedding-3-small",
      usage: { prompt_tokens: 5, total_tokens: 5 },
    }),
    text: async () => "",
  } as unknown as Response;
}

/** Build a failed response. */
function fakeErrorResponse(status: number, body: string) {
  return {
    ok: false,
    status,
    json: async () => ({}),
    text: async () => body,
  } as unknown as Response;
}

/** Create a deterministic in-memory provider for tests. */
function stubProvider(vector: number[] = FAKE_VECTOR): EmbeddingProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    model: "stub-model",
    calls,
    async embed(text: string) {
      calls.push(text);
      return vector;
    },
  };
}

/** A provider that only settles when its signal aborts. */
function hangingProvider(): EmbeddingProvider {
  return {
    model: "hanging",
    embed(_text, options) {
      return new Promise<number[]>((_, reject) => {
        options?.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
      });
    },
  };
}

async function embedError(promise: Promise<unknown>): Promise<EmbeddingServiceError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof EmbeddingServiceError) return err;
    throw err;
  }
  throw new Error("expected the embedding call to fail");
}

// ---------------------------------------------------------------------------
// createOpenAIProvider
// ---------------------------------------------------------------------------

describe("createOpenAIProvider", () => {
  let fetchSpy: MockInstance<Parameters<typeof fetch>, ReturnType<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it("returns an EmbeddingProvider with the specified model", () => {
    const provider = createOpenAIProvider("test-key", "text-embedding-3-large");
    expect(provider.model).toBe("text-embedding-3-large");
  });

  it("calls the OpenAI embeddings endpoint and returns the vector", async () => {
    fetchSpy.mockResolvedValueOnce(fakeOpenAIResponse());

    const provider = createOpenAIProvider("test-key", "text-embedding-3-small");
    const result = await provider.embed("hello world");

    expect(result).toEqual(FAKE_VECTOR);
    expect(fetchSpy).toHaveBeenCalledTimes(1);

    const [url, init] = fetchSpy.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("https://api.openai.com/v1/embeddings");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(JSON.parse(String(init.body))).toEqual({
      input: "hello world",
      model: "text-embedding-3-small",
    });
  });

  it("throws on empty text", async () => {
    const provider = createOpenAIProvider("test-key");
    await expect(provider.embed("   ")).rejects.toThrow("Cannot embed empty text");
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("throws on non-OK HTTP response", async () => {
    fetchSpy.mockResolvedValueOnce(fakeErrorResponse(401, "Unauthorized"));

    const provider = createOpenAIProvider("bad-key");
    await expect(provider.embed("test")).rejects.toThrow(
      "OpenAI embedding request failed (401): Unauthorized",
    );
  });

  it("throws when response data is malformed", async () => {
    fetchSpy.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: async () => ({ data: [] }),
      text: async () => "",
    } as unknown as Response);

    const provider = createOpenAIProvider("test-key");
    await expect(provider.embed("test")).rejects.toThrow(
      "Unexpected OpenAI response: missing embedding data",
    );
  });
});

// ---------------------------------------------------------------------------
// embedWithTimeout
// ---------------------------------------------------------------------------

describe("embedWithTimeout", () => {
  it("returns the provider's vector", async () => {
    await expect(embedWithTimeout(stubProvider(), "sql", { timeoutMs: 1000 })).resolves.toEqual(
      FAKE_VECTOR,
    );
  });

  it("fails with a timeout when the provider does not answer in time", async () => {
    const err = await embedError(embedWithTimeout(hangingProvider(), "sql", { timeoutMs: 5 }));
    expect(err.kind).toBe("timeout");
    expect(err.message).toBe("Embedding service did not respond within 5 ms");
  });

  it("wraps provider failures as rejected", async () => {
    const failing: EmbeddingProvider = {
      model: "failing",
      embed: async () => {
        throw new Error("OpenAI embedding request failed (500): boom");
      },
    };
    const err = await embedError(embedWithTimeout(failing, "sql", { timeoutMs: 1000 }));
    expect(err.kind).toBe("rejected");
    expect(err.message).toBe("OpenAI embedding request failed (500): boom");
  });

  it("rejects a zero vector", async () => {
    const err = await embedError(embedWithTimeout(stubProvider([0, 0, 0]), "sql", { timeoutMs: 1000 }));
    expect(err.kind).toBe("rejected");
    expect(err.message).toBe("Embedding service returned a vector with zero magnitude");
  });

  it("does not call the provider when the caller already aborted", async () => {
    const provider = stubProvider();
    const controller = new AbortController();
    controller.abort();

    const err = await embedError(
      embedWithTimeout(provider, "sql", { timeoutMs: 1000, signal: controller.signal }),
    );
    expect(err.message).toBe("Embedding request aborted by caller");
    expect(provider.calls).toEqual([]);
  });

  it("passes a caller abort through to the provider", async () => {
    const controller = new AbortController();
    const pending = embedWithTimeout(hangingProvider(), "sql", {
      timeoutMs: 1000,
      signal: controller.signal,
    });
    controller.abort();

    const err = await embedError(pending);
    expect(err.kind).toBe("rejected");
    expect(err.message).toBe("Embedding request aborted by caller");
  });
});

// ---------------------------------------------------------------------------
// withQueryCache
// ---------------------------------------------------------------------------

describe("withQueryCache", () => {
  it("passes every call through when the TTL is 0", async () => {
    const provider = stubProvider();
    const cached = withQueryCache(provider, 0);

    await cached.embed("sql");
    await cached.embed("sql");
    expect(provider.calls).toEqual(["sql", "sql"]);
    expect(cached.cacheSize()).toBe(0);
  });

  it("reuses a vector until it expires", async () => {
    const provider = stubProvider();
    let clock = 1_000;
    const cached = withQueryCache(provider, 500, () => clock);

    await cached.embed("sql");
    await cached.embed("sql");
    expect(provider.calls).toEqual(["sql"]);

    clock += 500;
    await cached.embed("sql");
    expect(provider.calls).toEqual(["sql", "sql"]);
  });

  it("keys entries by exact text", async () => {
    const provider = stubProvider();
    const cached = withQueryCache(provider, 500, () => 0);

    await cached.embed("sql");
    await cached.embed("SQL");
    expect(provider.calls).toEqual(["sql", "SQL"]);
  });

  it("hands out copies the caller cannot use to corrupt the cache", async () => {
    const cached = withQueryCache(stubProvider([1, 2]), 500, () => 0);

    const first = await cached.embed("sql");
    first[0] = 99;
    expect(await cached.embed("sql")).toEqual([1, 2]);
  });

  it("drops expired entries for other texts on insert", async () => {
    let clock = 0;
    const cached = withQueryCache(stubProvider(), 500, () => clock);

    await cached.embed("sql");
    await cached.embed("go");
    expect(cached.cacheSize()).toBe(2);

    clock = 600;
    await cached.embed("rust");
    expect(cached.cacheSize()).toBe(1);
  });

  it("evicts the oldest entry beyond the size cap", async () => {
    const provider = stubProvider();
    const cached = withQueryCache(provider, 500, () => 0, 2);

    await cached.embed("a");
    await cached.embed("b");
    await cached.embed("c");
    expect(cached.cacheSize()).toBe(2);

    await cached.embed("b");
    await cached.embed("a");
    expect(provider.calls).toEqual(["a", "b", "c", "a"]);
  });

  it("keeps the wrapped provider's model", () => {
    expect(withQueryCache(stubProvider(), 500).model).toBe("stub-model");
  });
});
