import { describe, expect, it } from "vitest";
import type { CatalogEntry, Course, LearningPath, ScoredCandidate } from "@/types";
import { findSkillGaps, summarizeCandidates, summarizeCatalog } from "./analytics";
import { composeLearningPath } from "./path";
import type { CatalogStore } from "./store";
import { createMemoryStore } from "./store";

function course(id: string, overrides: Partial<Course> = {}): Course {
  return {
    id,
    title: `Course ${id}`,
    description: "",
    level: "beginner",
    durationHours: 10,
    price: 25,
    tags: [],
    prerequisites: [],
    popularity: 0,
    ...overrides,
  };
}

function candidate(c: Course, similarity: number): ScoredCandidate {
  return {
    course: c,
    similarity,
    score: similarity,
    normalizedPopularity: 0,
    filterMatchBonus: 0,
    matched: {
      level: false,
      duration: false,
      price: false,
      categories: false,
      provider: false,
      modality: false,
      excludeTags: false,
    },
    reasons: [],
  };
}

describe("summarizeCandidates", () => {
  it("summarizes similarity, levels, durations and tags", () => {
    const summary = summarizeCandidates([
      candidate(course("a", { tags: ["SQL", "data"], durationHours: 4 }), 0.9),
      candidate(course("b", { tags: ["sql"], level: "advanced", durationHours: 0 }), 0.7),
      candidate(course("c", { tags: ["python", "data"], durationHours: 8 }), 0.5),
    ]);

    expect(summary.count).toBe(3);
    expect(summary.averageSimilarity).toBeCloseTo(0.7, 10);
    expect(summary.levelDistribution).toEqual({ beginner: 2, advanced: 1 });
    expect(summary.duration).toEqual({ min: 4, max: 8, mean: 6 });
    expect(summary.topTags).toEqual([
      { tag: "data", count: 2 },
      { tag: "sql", count: 2 },
      { tag: "python", count: 1 },
    ]);
  });

  it("returns zeros for no candidates", () => {
    expect(summarizeCandidates([])).toEqual({
      count: 0,
      averageSimilarity: 0,
      levelDistribution: {},
      duration: null,
      topTags: [],
    });
  });
});

describe("findSkillGaps", () => {
  async function setup(): Promise<{ store: CatalogStore; path: LearningPath }> {
    const store = createMemoryStore();
    await store.upsert(course("intro", { title: "Intro" }), [1]);
    const deep = course("deep", { prerequisites: ["intro", "ghost", "intro"] });
    const side = course("side", { prerequisites: ["deep"] });
    await store.upsert(deep, [1]);
    await store.upsert(side, [1]);
    return { store, path: composeLearningPath([candidate(deep, 0.9), candidate(side, 0.8)]) };
  }

  it("lists prerequisites that are neither on the path nor completed", async () => {
    const { store, path } = await setup();
    expect(await findSkillGaps(path, store)).toEqual([
      { courseId: "deep", prerequisiteId: "intro", prerequisiteTitle: "Intro", alternatives: [] },
      { courseId: "deep", prerequisiteId: "ghost", prerequisiteTitle: null, alternatives: [] },
    ]);
  });

  it("suggests off-path courses sharing the blocked course's first tag", async () => {
    const store = createMemoryStore();
    const blocked = course("ml", { tags: ["Data", "python"], prerequisites: ["stats"] });
    for (const c of [
      blocked,
      course("stats"),
      course("sql", { tags: ["data"] }),
      course("viz", { tags: ["charts", "DATA"] }),
      course("etl", { tags: ["data"] }),
      course("web", { tags: ["python"] }),
      course("warehouse", { tags: ["data"] }),
    ]) {
      await store.upsert(c, [1]);
    }
    const path = composeLearningPath([
      candidate(blocked, 0.9),
      candidate(course("etl", { tags: ["data"] }), 0.8),
    ]);

    expect(await findSkillGaps(path, store)).toEqual([
      {
        courseId: "ml",
        prerequisiteId: "stats",
        prerequisiteTitle: "Course stats",
        alternatives: ["sql", "viz", "warehouse"],
      },
    ]);
  });

  it("skips completed courses", async () => {
    const { store, path } = await setup();
    expect(await findSkillGaps(path, store, ["intro", "ghost"])).toEqual([]);
  });

  it("propagates storage failures other than a missing course", async () => {
    const { path } = await setup();
    const broken: CatalogStore = {
      ...createMemoryStore(),
      get: async () => {
        throw new Error("offline");
      },
    };
    await expect(findSkillGaps(path, broken)).rejects.toThrow("offline");
  });
});

describe("summarizeCatalog", () => {
  it("reports counts and paid-course price statistics", () => {
    const entries: CatalogEntry[] = [
      { course: course("a", { price: 10, durationHours: 2 }), vector: [1] },
      { course: course("b", { price: 30, durationHours: 6, level: "intermediate" }), vector: [1] },
      { course: course("c", { price: null, durationHours: 4 }), vector: [1] },
      { course: course("d", { price: 0, durationHours: 0 }), vector: [1] },
    ];
    expect(summarizeCatalog(entries, 1)).toEqual({
      courseCount: 4,
      dimension: 1,
      levelDistribution: { beginner: 3, intermediate: 1 },
      duration: { min: 2, max: 6, mean: 4 },
      price: { min: 10, max: 30, mean: 20 },
      freeCourseCount: 2,
    });
  });

  it("handles an empty catalog", () => {
    expect(summarizeCatalog([], null)).toEqual({
      courseCount: 0,
      dimension: null,
      levelDistribution: {},
      duration: null,
      price: null,
      freeCourseCount: 0,
    });
  });
});
