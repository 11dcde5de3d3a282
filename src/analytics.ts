/**
 * Analytics module — summaries over a result set and the catalog.
 *
 * Also finds skill gaps: prerequisites a learner would still need before
 * starting the courses on their path.
 */

import type {
  CandidateAnalytics,
  CatalogEntry,
  Course,
  CourseId,
  LearningPath,
  ScoredCandidate,
  SkillGap,
  SkillLevel,
} from "@/types";
import { NotFoundError } from "./errors";
import { compareCourseIds } from "./similarity";
import type { CatalogStore } from "./store";

const TOP_TAG_COUNT = 10;

function levelDistribution(levels: readonly SkillLevel[]): Partial<Record<SkillLevel, number>> {
  const distribution: Partial<Record<SkillLevel, number>> = {};
  for (const level of levels) {
    distribution[level] = (distribution[level] ?? 0) + 1;
  }
  return distribution;
}

function rangeStats(values: readonly number[]): { min: number; max: number; mean: number } | null {
  if (values.length === 0) return null;
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    mean: values.reduce((sum, v) => sum + v, 0) / values.length,
  };
}

/**
 * Summarize the returned candidates: averages, distributions and the most
 * frequent tags. Courses without a positive duration are left out of the
 * duration statistics.
 */
export function summarizeCandidates(candidates: readonly ScoredCandidate[]): CandidateAnalytics {
  if (candidates.length === 0) {
    return {
      count: 0,
      averageSimilarity: 0,
      levelDistribution: {},
      duration: null,
      topTags: [],
    };
  }

  const tagCounts = new Map<string, number>();
  for (const c of candidates) {
    for (const tag of c.course.tags) {
      const key = tag.toLowerCase();
      tagCounts.set(key, (tagCounts.get(key) ?? 0) + 1);
    }
  }

  const topTags = [...tagCounts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0))
    .slice(0, TOP_TAG_COUNT);

  return {
    count: candidates.length,
    averageSimilarity:
      candidates.reduce((sum, c) => sum + c.similarity, 0) / candidates.length,
    levelDistribution: levelDistribution(candidates.map((c) => c.course.level)),
    duration: rangeStats(
      candidates.map((c) => c.course.durationHours).filter((h) => h > 0),
    ),
    topTags,
  };
}

const ALTERNATIVE_COUNT = 3;

/**
 * Off-path courses carrying the course's first tag, by ID, for a learner
 * who cannot take the course yet.
 */
export function suggestAlternatives(
  course: Course,
  entries: readonly CatalogEntry[],
  onPath: ReadonlySet<CourseId>,
): CourseId[] {
  const [tag] = course.tags;
  if (tag === undefined) return [];
  const wanted = tag.trim().toLowerCase();
  return entries
    .filter((e) => e.course.id !== course.id && !onPath.has(e.course.id))
    .filter((e) => e.course.tags.some((t) => t.trim().toLowerCase() === wanted))
    .map((e) => e.course.id)
    .sort(compareCourseIds)
    .slice(0, ALTERNATIVE_COUNT);
}

/**
 * Prerequisites of path courses that are neither on the path nor already
 * completed. Titles are resolved through the store; a prerequisite missing
 * from the catalog keeps a `null` title.
 */
export async function findSkillGaps(
  path: LearningPath,
  store: CatalogStore,
  completedCourseIds: readonly CourseId[] = [],
): Promise<SkillGap[]> {
  const onPath = new Set(path.steps.map((s) => s.course.id));
  const completed = new Set(completedCourseIds);
  const gaps: SkillGap[] = [];
  let catalog: CatalogEntry[] | null = null;

  for (const step of path.steps) {
    const missing = [...new Set(step.course.prerequisites)].filter(
      (id) => !onPath.has(id) && !completed.has(id),
    );
    if (missing.length === 0) continue;

    let alternatives: CourseId[] = [];
    if (step.course.tags.length > 0) {
      catalog ??= await store.getAll();
      alternatives = suggestAlternatives(step.course, catalog, onPath);
    }

    for (const prerequisiteId of missing) {
      let prerequisiteTitle: string | null = null;
      try {
        prerequisiteTitle = (await store.get(prerequisiteId)).course.title;
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
      }

      gaps.push({ courseId: step.course.id, prerequisiteId, prerequisiteTitle, alternatives });
    }
  }

  return gaps;
}

/** Catalog-wide statistics. */
export interface CatalogStats {
  courseCount: number;
  dimension: number | null;
  levelDistribution: Partial<Record<SkillLevel, number>>;
  duration: { min: number; max: number; mean: number } | null;
  /** Statistics over paid courses only. */
  price: { min: number; max: number; mean: number } | null;
  freeCourseCount: number;
}

/** Summarize a catalog snapshot. */
export function summarizeCatalog(
  entries: readonly CatalogEntry[],
  dimension: number | null,
): CatalogStats {
  const prices = entries
    .map((e) => e.course.price)
    .filter((p): p is number => p !== null && p > 0);

  return {
    courseCount: entries.length,
    dimension,
    levelDistribution: levelDistribution(entries.map((e) => e.course.level)),
    duration: rangeStats(
      entries.map((e) => e.course.durationHours).filter((h) => h > 0),
    ),
    price: rangeStats(prices),
    freeCourseCount: entries.length - prices.length,
  };
}
