/**
 * Filter & scoring pipeline.
 *
 * Hard filters remove candidates outright. Survivors get a composite score
 * blending similarity, popularity (rescaled across this query's survivors)
 * and a category-overlap bonus, then are re-sorted and truncated.
 */

import type {
  Course,
  FilterMatchFlags,
  QueryFilters,
  ScoredCandidate,
} from "@/types";
import { SCORE_WEIGHTS, type ScoreWeights } from "./config";
import { compareCourseIds, type RankedCourse } from "./similarity";

// ---------------------------------------------------------------------------
// Hard filters
// ---------------------------------------------------------------------------

/** Outcome of checking one course against the requested filters. */
export interface FilterVerdict {
  passed: boolean;
  matched: FilterMatchFlags;
}

function normalizeCategory(category: string): string {
  return category.trim().toLowerCase();
}

/** Requested categories present in the course's tags (case-insensitive). */
export function matchingCategories(course: Course, categories: readonly string[]): string[] {
  const tags = new Set(course.tags.map(normalizeCategory));
  return categories.filter((c) => tags.has(normalizeCategory(c)));
}

/** Whether an optional course attribute is one of the allowed values (case-insensitive). */
function oneOf(value: string | undefined, allowed: readonly string[]): boolean {
  if (value === undefined) return false;
  const normalized = normalizeCategory(value);
  return allowed.some((a) => normalizeCategory(a) === normalized);
}

function inRange(value: number, min: number | undefined, max: number | undefined): boolean {
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

/**
 * Check a course against every requested filter.
 *
 * A filter that was not requested neither passes nor fails; its flag is
 * `false`. Empty lists count as not requested.
 */
export function evaluateFilters(course: Course, filters: QueryFilters): FilterVerdict {
  const matched: FilterMatchFlags = {
    level: false,
    duration: false,
    price: false,
    categories: false,
    provider: false,
    modality: false,
    excludeTags: false,
  };
  let passed = true;

  if (filters.levels && filters.levels.length > 0) {
    matched.level = filters.levels.includes(course.level);
    passed = passed && matched.level;
  }

  if (filters.minDuration !== undefined || filters.maxDuration !== undefined) {
    matched.duration = inRange(course.durationHours, filters.minDuration, filters.maxDuration);
    passed = passed && matched.duration;
  }

  if (filters.minPrice !== undefined || filters.maxPrice !== undefined) {
    matched.price = inRange(course.price ?? 0, filters.minPrice, filters.maxPrice);
    passed = passed && matched.price;
  }

  if (filters.categories && filters.categories.length > 0) {
    matched.categories = matchingCategories(course, filters.categories).length > 0;
    passed = passed && matched.categories;
  }

  if (filters.providers && filters.providers.length > 0) {
    matched.provider = oneOf(course.provider, filters.providers);
    passed = passed && matched.provider;
  }

  if (filters.modalities && filters.modalities.length > 0) {
    matched.modality = oneOf(course.modality, filters.modalities);
    passed = passed && matched.modality;
  }

  if (filters.excludeTags && filters.excludeTags.length > 0) {
    matched.excludeTags = matchingCategories(course, filters.excludeTags).length === 0;
    passed = passed && matched.excludeTags;
  }

  return { passed, matched };
}

// ---------------------------------------------------------------------------
// Composite score
// ---------------------------------------------------------------------------

/**
 * Build a min/max rescaler for popularity over the given values.
 * When every value is equal the rescaler returns 0.
 */
export function popularityScaler(values: readonly number[]): (popularity: number) => number {
  if (values.length === 0) return () => 0;
  const min = Math.min(...values);
  const max = Math.max(...values);
  const span = max - min;
  return (popularity) => (span === 0 ? 0 : (popularity - min) / span);
}

/**
 * Share of requested categories the course carries, in [0, 1].
 * 0 when no category filter was requested.
 */
export function categoryMatchBonus(course: Course, categories: readonly string[] | undefined): number {
  if (!categories || categories.length === 0) return 0;
  const requested = new Set(categories.map(normalizeCategory));
  return matchingCategories(course, [...requested]).length / requested.size;
}

/** Weighted blend. Non-decreasing in each input for non-negative weights. */
export function compositeScore(
  similarity: number,
  normalizedPopularity: number,
  filterMatchBonus: number,
  weights: ScoreWeights = SCORE_WEIGHTS,
): number {
  return (
    weights.similarity * similarity +
    weights.popularity * normalizedPopularity +
    weights.filterMatch * filterMatchBonus
  );
}

/** Human-readable reasons shown next to a recommendation. */
export function recommendationReasons(
  candidate: Pick<ScoredCandidate, "course" | "similarity" | "normalizedPopularity" | "filterMatchBonus">,
  filters: QueryFilters,
): string[] {
  const reasons: string[] = [];
  if (candidate.similarity > 0.8) {
    reasons.push("highly relevant to your query");
  }
  if (candidate.normalizedPopularity >= 0.75) {
    reasons.push("popular with other learners");
  }
  if ((filters.categories?.length ?? 0) >= 2 && candidate.filterMatchBonus === 1) {
    reasons.push("covers every requested category");
  }
  if (!candidate.course.price) {
    reasons.push("free");
  }
  return reasons;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface ScoringOptions {
  filters?: QueryFilters;
  /** Keep at most this many after re-sorting. */
  limit: number;
  weights?: ScoreWeights;
}

export interface ScoringResult {
  /** Score descending, ties by course ID ascending, truncated to the limit. */
  candidates: ScoredCandidate[];
  /** Number of candidates that passed every hard filter, before truncation. */
  afterFilters: number;
}

/**
 * Filter, score, sort and truncate ranked courses.
 */
export function scoreCandidates(
  ranked: readonly RankedCourse[],
  options: ScoringOptions,
): ScoringResult {
  const filters = options.filters ?? {};
  const weights = options.weights ?? SCORE_WEIGHTS;

  const survivors: { ranked: RankedCourse; matched: FilterMatchFlags }[] = [];
  for (const r of ranked) {
    const verdict = evaluateFilters(r.course, filters);
    if (verdict.passed) {
      survivors.push({ ranked: r, matched: verdict.matched });
    }
  }

  const scale = popularityScaler(survivors.map((s) => s.ranked.course.popularity));

  const scored: ScoredCandidate[] = survivors.map(({ ranked: r, matched }) => {
    const normalizedPopularity = scale(r.course.popularity);
    const filterMatchBonus = categoryMatchBonus(r.course, filters.categories);
    const base = {
      course: r.course,
      similarity: r.similarity,
      normalizedPopularity,
      filterMatchBonus,
    };
    return {
      ...base,
      score: compositeScore(r.similarity, normalizedPopularity, filterMatchBonus, weights),
      matched,
      reasons: recommendationReasons(base, filters),
    };
  });

  scored.sort((a, b) => b.score - a.score || compareCourseIds(a.course.id, b.course.id));

  return {
    candidates: scored.slice(0, options.limit),
    afterFilters: survivors.length,
  };
}
