import { describe, expect, it } from "vitest";
import { GET } from "./route";
import {
  catalogJson,
  fakeGitHubContents,
  makeCourse,
  makeRequest,
  setupFetchSpy,
  setupTestEnv,
} from "../__test-setup__";

setupTestEnv();
const fetchSpy = setupFetchSpy();

describe("GET /api/catalog-stats", () => {
  it("summarizes the loaded catalog", async () => {
    fetchSpy.spy.mockResolvedValueOnce(
      fakeGitHubContents(
        catalogJson([
          { course: makeCourse("A", { durationHours: 10, price: 20 }), vector: [1, 0] },
          { course: makeCourse("B", { level: "advanced", durationHours: 30, price: 40 }), vector: [0, 1] },
          { course: makeCourse("C", { durationHours: 20, price: null }), vector: [1, 1] },
        ]),
      ),
    );

    const response = await GET(makeRequest("/api/catalog-stats"));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      courseCount: 3,
      dimension: 2,
      levelDistribution: { beginner: 2, advanced: 1 },
      duration: { min: 10, max: 30, mean: 20 },
      price: { min: 20, max: 40, mean: 30 },
      freeCourseCount: 1,
    });
  });

  it("skips malformed records instead of failing the load", async () => {
    const content = JSON.stringify({
      dimension: 2,
      courses: {
        A: { course: makeCourse("A"), vector: [1, 0] },
        B: { course: makeCourse("B"), vector: [1, 0, 0] },
        C: { course: { id: "C" }, vector: [1, 0] },
      },
    });
    fetchSpy.spy.mockResolvedValueOnce(fakeGitHubContents(content));

    const json = await (await GET(makeRequest("/api/catalog-stats"))).json();
    expect(json.courseCount).toBe(1);
  });
});
