import { describe, expect, it } from "vitest";
import { NextRequest } from "next/server";
import { POST } from "./route";
import {
  TEST_API_KEY,
  catalogJson,
  fakeGitHub404,
  fakeGitHubContents,
  fakeGitHubError,
  fakeOpenAIEmbedding,
  fakeOpenAIError,
  fetchCallAt,
  makeCourse,
  makeRequest,
  setupFetchSpy,
  setupTestEnv,
} from "../__test-setup__";

setupTestEnv();
const fetchSpy = setupFetchSpy();

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** A unit vector whose cosine similarity with [1, 0] is `s`. */
function at(s: number): number[] {
  return [s, Math.sqrt(1 - s * s)];
}

const CATALOG = catalogJson([
  { course: makeCourse("A", { level: "beginner" }), vector: at(0.9) },
  { course: makeCourse("B", { level: "intermediate", prerequisites: ["A"] }), vector: at(0.85) },
  { course: makeCourse("C", { level: "advanced" }), vector: at(0.95) },
]);

function recommend(body: unknown) {
  return POST(makeRequest("/api/recommend", { method: "POST", body }));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("POST /api/recommend", () => {
  it("returns 401 without an Authorization header", async () => {
    const request = new NextRequest("http://localhost/api/recommend", {
      method: "POST",
      body: JSON.stringify({ text: "python" }),
    });
    const response = await POST(request);
    expect(response.status).toBe(401);
  });

  it("ranks, scores and orders the catalog into a learning path", async () => {
    // 1. Read catalog.json (store load)
    // 2. OpenAI query embedding
    fetchSpy.spy
      .mockResolvedValueOnce(fakeGitHubContents(CATALOG))
      .mockResolvedValueOnce(fakeOpenAIEmbedding([1, 0]));

    const response = await recommend({ text: "data pipelines", limit: 2 });
    expect(response.status).toBe(200);

    const json = await response.json();
    expect(json.outcome).toBe("matched");
    expect(json.candidates.map((c: { course: { id: string } }) => c.course.id)).toEqual(["C", "A"]);
    expect(json.candidates[0].score).toBeCloseTo(0.665, 6);
    expect(json.candidates[1].score).toBeCloseTo(0.63, 6);
    expect(json.learningPath.steps.map((s: { course: { id: string } }) => s.course.id)).toEqual(["A", "C"]);
    expect(json.learningPath.name).toBe("Learning Path");
    expect(json.learningPath.totalDurationHours).toBe(20);
    expect(json.learningPath.estimatedCompletionMonths).toBe(1);
    expect(json.learningPath.degraded).toBe(false);
    expect(json.skillGaps).toEqual([]);
    expect(json.diagnostics.scanned).toBe(3);
    expect(json.diagnostics.aboveThreshold).toBe(3);
    expect(json.diagnostics.afterFilters).toBe(3);
    expect(json.diagnostics.stages).toEqual([
      "RECEIVED",
      "EMBEDDED",
      "RANKED",
      "FILTERED_SCORED",
      "PATH_COMPOSED",
      "RETURNED",
    ]);
  });

  it("sends the query text to the embeddings endpoint", async () => {
    fetchSpy.spy
      .mockResolvedValueOnce(fakeGitHubContents(CATALOG))
      .mockResolvedValueOnce(fakeOpenAIEmbedding([1, 0]));

    await recommend({ text: "data pipelines" });

    const { url, init } = fetchCallAt(fetchSpy.spy, 1);
    expect(url).toBe("https://api.openai.com/v1/embeddings");
    expect(JSON.parse(String(init.body))).toEqual({
      input: "data pipelines",
      model: "text-embedding-3-small",
    });
  });

  it("reports no matches when every course is filtered out", async () => {
    fetchSpy.spy
      .mockResolvedValueOnce(fakeGitHubContents(CATALOG))
      .mockResolvedValueOnce(fakeOpenAIEmbedding([1, 0]));

    const response = await recommend({ text: "free courses", filters: { maxPrice: 10 } });
    expect(response.status).toBe(200);

    const json = await response.json();
    expect(json.outcome).toBe("no-matches");
    expect(json.candidates).toEqual([]);
    expect(json.learningPath.steps).toEqual([]);
    expect(json.diagnostics.aboveThreshold).toBe(3);
    expect(json.diagnostics.afterFilters).toBe(0);
    expect(json.diagnostics.appliedFilters).toEqual({ maxPrice: 10 });
  });

  it("treats a missing catalog file as an empty catalog", async () => {
    fetchSpy.spy
      .mockResolvedValueOnce(fakeGitHub404())
      .mockResolvedValueOnce(fakeOpenAIEmbedding([1, 0]));

    const response = await recommend({ text: "anything" });
    const json = await response.json();
    expect(json.outcome).toBe("no-matches");
    expect(json.diagnostics.scanned).toBe(0);
  });

  it("returns 400 for a body that is not JSON", async () => {
    const request = new NextRequest("http://localhost/api/recommend", {
      method: "POST",
      headers: { Authorization: `Bearer ${TEST_API_KEY}` },
      body: "not json",
    });
    const response = await POST(request);
    expect(response.status).toBe(400);

    const json = await response.json();
    expect(json.code).toBe("INVALID_QUERY");
    expect(json.problems).toEqual(["request body must be valid JSON"]);
    expect(fetchSpy.spy).not.toHaveBeenCalled();
  });

  it("returns 400 for mistyped fields without touching the catalog", async () => {
    const response = await recommend({ text: 42, limit: "ten" });
    expect(response.status).toBe(400);

    const json = await response.json();
    expect(json.problems).toEqual(["text must be a string", "limit must be a number"]);
    expect(fetchSpy.spy).not.toHaveBeenCalled();
  });

  it("rejects empty text before calling the embedding service", async () => {
    fetchSpy.spy.mockResolvedValueOnce(fakeGitHubContents(CATALOG));

    const response = await recommend({ text: "   " });
    expect(response.status).toBe(400);

    const json = await response.json();
    expect(json.problems).toEqual(["text must not be empty"]);
    expect(fetchSpy.spy).toHaveBeenCalledTimes(1);
  });

  it("returns 502 when the embedding service rejects the request", async () => {
    fetchSpy.spy
      .mockResolvedValueOnce(fakeGitHubContents(CATALOG))
      .mockResolvedValueOnce(fakeOpenAIError(429, "rate limited"));

    const response = await recommend({ text: "python" });
    expect(response.status).toBe(502);

    const json = await response.json();
    expect(json.code).toBe("EMBEDDING_SERVICE_ERROR");
    expect(json.kind).toBe("rejected");
    expect(json.error).toBe("OpenAI embedding request failed (429): rate limited");
  });

  it("returns 503 when the catalog cannot be read", async () => {
    fetchSpy.spy.mockResolvedValueOnce(fakeGitHubError(500));

    const response = await recommend({ text: "python" });
    expect(response.status).toBe(503);

    const json = await response.json();
    expect(json.code).toBe("STORE_UNAVAILABLE");
    expect(json.error).toBe(
      "Catalog could not be loaded: GitHub read failed for index/catalog.json (500): Server Error",
    );
  });
});
