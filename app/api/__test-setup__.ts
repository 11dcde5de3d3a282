/**
 * Shared test utilities for API route tests.
 *
 * Provides environment setup, fetch spy registration, and GitHub / OpenAI
 * response factories used across all API route test suites.
 */

import { beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import { NextRequest } from "next/server";
import type { CatalogFile, Course, EmbeddingVector } from "@/types";
import { resetCatalogStore } from "@/src/catalog";

/** The test API key used across all route tests. */
export const TEST_API_KEY = "test-secret";

/**
 * Register beforeEach/afterEach hooks to set and clear environment variables
 * required by API route tests, and to drop the cached catalog between tests.
 *
 * Always sets RECOMMENDER_API_KEY, OPENAI_API_KEY, GITHUB_TOKEN,
 * CATALOG_OWNER and CATALOG_REPO. Pass additional variables in `extra`.
 */
export function setupTestEnv(extra: Record<string, string> = {}): void {
  const envVars: Record<string, string> = {
    RECOMMENDER_API_KEY: TEST_API_KEY,
    OPENAI_API_KEY: "test-openai-key",
    GITHUB_TOKEN: "test-github-token",
    CATALOG_OWNER: "test-owner",
    CATALOG_REPO: "test-repo",
    ...extra,
  };

  beforeEach(() => {
    for (const [key, value] of Object.entries(envVars)) {
      process.env[key] = value;
    }
    resetCatalogStore();
  });

  afterEach(() => {
    for (const key of Object.keys(envVars)) {
      delete process.env[key];
    }
  });
}

/**
 * Register beforeEach/afterEach hooks for the global fetch spy.
 *
 * Returns a container whose `.spy` property holds the active spy during each
 * test. Access it as `fetchSpy.spy.mockResolvedValueOnce(...)`.
 *
 * Note: the `.spy` property must be accessed at call time (inside the test
 * body), not at setup time, because it is reassigned before each test.
 */
export function setupFetchSpy(): { spy: MockInstance<Parameters<typeof fetch>, ReturnType<typeof fetch>> } {
  const ref = { spy: null as unknown as MockInstance<Parameters<typeof fetch>, ReturnType<typeof fetch>> };

  beforeEach(() => {
    ref.spy = vi.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    ref.spy.mockRestore();
  });

  return ref;
}

/** URL and init of the fetch call at `index`. */
export function fetchCallAt(
  spy: MockInstance<Parameters<typeof fetch>, ReturnType<typeof fetch>>,
  index: number,
): { url: string; init: RequestInit } {
  const [url, init] = spy.mock.calls[index] as [unknown, RequestInit | undefined];
  return { url: String(url), init: init ?? {} };
}

/** Build an authenticated request against a route. */
export function makeRequest(
  path: string,
  init: { method?: string; body?: unknown } = {},
): NextRequest {
  return new NextRequest(`http://localhost${path}`, {
    method: init.method ?? "GET",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${TEST_API_KEY}`,
    },
    ...(init.body !== undefined && { body: JSON.stringify(init.body) }),
  });
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** A course with every field filled in; override what the test cares about. */
export function makeCourse(id: string, overrides: Partial<Course> = {}): Course {
  return {
    id,
    title: `Course ${id}`,
    description: `About ${id}`,
    level: "beginner",
    durationHours: 10,
    price: 20,
    tags: [],
    prerequisites: [],
    popularity: 100,
    ...overrides,
  };
}

/** Serialize courses and vectors into catalog file content. */
export function catalogJson(
  records: { course: Course; vector: EmbeddingVector }[],
): string {
  const file: CatalogFile = { dimension: records[0]?.vector.length ?? null, courses: {} };
  for (const { course, vector } of records) {
    file.courses[course.id] = {
      course,
      vector,
      model: "text-embedding-3-small",
      updatedAt: "2026-01-01T00:00:00.000Z",
    };
  }
  return JSON.stringify(file);
}

// ---------------------------------------------------------------------------
// Fake responses
// ---------------------------------------------------------------------------

/** Fake response for a GitHub 404 (file not found). */
export function fakeGitHub404(): Response {
  return {
    ok: false,
    status: 404,
    json: async () => ({ message: "Not Found" }),
    text: async () => "Not Found",
  } as unknown as Response;
}

/** Fake response for a GitHub server error. */
export function fakeGitHubError(status: number = 500): Response {
  return {
    ok: false,
    status,
    json: async () => ({ message: "Server Error" }),
    text: async () => "Server Error",
  } as unknown as Response;
}

/**
 * Fake response for a GitHub file read (GET /contents).
 * Encodes content as base64, matching the real API response.
 */
export function fakeGitHubContents(
  content: string,
  sha: string = "sha123",
): Response {
  const encoded = Buffer.from(content, "utf-8").toString("base64");
  return {
    ok: true,
    status: 200,
    json: async () => ({ content: encoded, sha, encoding: "base64" }),
    text: async () => "",
  } as unknown as Response;
}

/** Fake response for a successful GitHub file write (PUT /contents). */
export function fakeGitHubPut(sha: string = "newsha"): Response {
  return {
    ok: true,
    status: 201,
    json: async () => ({ content: { sha } }),
    text: async () => "",
  } as unknown as Response;
}

/** Fake response from the OpenAI embeddings endpoint. */
export function fakeOpenAIEmbedding(embedding: number[]): Response {
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

/** Fake error response from the OpenAI embeddings endpoint. */
export function fakeOpenAIError(status: number, body: string): Response {
  return {
    ok: false,
    status,
    json: async () => ({ error: { message: body } }),
    text: async () => body,
  } as unknown as Response;
}
