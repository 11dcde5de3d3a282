/**
 * Result types returned by the recommender.
 *
 * Everything here is transient: built for one response and discarded.
 */

import type { Course, CourseId, SkillLevel } from "./course";
import type { RecordIssue } from "./embedding";
import type { QueryFilters } from "./query";

/** Which requested filters a candidate satisfied. Absent filters are `false`. */
export interface FilterMatchFlags {
  level: boolean;
  duration: boolean;
  price: boolean;
  categories: boolean;
  provider: boolean;
  modality: boolean;
  excludeTags: boolean;
}

/** A course that survived ranking and filtering, with its scores. */
export interface ScoredCandidate {
  course: Course;
  /** Cosine similarity to the query, clamped to [-1, 1]. */
  similarity: number;
  /** Weighted composite score used for the final ordering. */
  score: number;
  /** Popularity rescaled to [0, 1] across this query's candidates. */
  normalizedPopularity: number;
  /** Share of the requested categories present on the course. */
  filterMatchBonus: number;
  matched: FilterMatchFlags;
  /** Human-readable reasons the course was recommended. */
  reasons: string[];
}

/** One position in a learning path. */
export interface LearningPathStep {
  /** Zero-based position in the path. */
  index: number;
  course: Course;
  score: number;
  /** Total hours up to and including this step. */
  cumulativeHours: number;
  /** True when this step pushes the path past the duration budget. */
  optional: boolean;
}

/** An ordered course sequence built from the final candidates. */
export interface LearningPath {
  name: string;
  steps: LearningPathStep[];
  totalDurationHours: number;
  /** Distinct levels in the order they appear. */
  skillProgression: SkillLevel[];
  estimatedCompletionMonths: number;
  /** True when a prerequisite cycle forced the fallback ordering. */
  degraded: boolean;
  /** Courses found on prerequisite cycles (empty unless degraded). */
  cycle: CourseId[];
}

/** Summary statistics over the returned candidates. */
export interface CandidateAnalytics {
  count: number;
  averageSimilarity: number;
  levelDistribution: Partial<Record<SkillLevel, number>>;
  duration: { min: number; max: number; mean: number } | null;
  /** Most frequent tags (lower-cased) with their counts. */
  topTags: { tag: string; count: number }[];
}

/** A prerequisite of a path course that the learner still lacks. */
export interface SkillGap {
  /** The path course that needs the prerequisite. */
  courseId: CourseId;
  prerequisiteId: CourseId;
  /** Title of the prerequisite, or `null` when it is not in the catalog. */
  prerequisiteTitle: string | null;
  /** Off-path catalog courses sharing the path course's first tag. */
  alternatives: CourseId[];
}

/** Lifecycle stages of a single query. */
export type QueryStage =
  | "RECEIVED"
  | "EMBEDDED"
  | "RANKED"
  | "FILTERED_SCORED"
  | "PATH_COMPOSED"
  | "RETURNED"
  | "ERRORED";

/** Diagnostics attached to every result. */
export interface RecommendationDiagnostics {
  appliedFilters: QueryFilters;
  threshold: number;
  limit: number;
  degraded: boolean;
  /** Records excluded from the scan because of data-integrity problems. */
  excluded: RecordIssue[];
  /** Number of catalog entries scanned. */
  scanned: number;
  aboveThreshold: number;
  afterFilters: number;
  stages: QueryStage[];
}

/** The full response for one query. */
export interface RecommendationResult {
  /** `no-matches` is a valid empty outcome, not an error. */
  outcome: "matched" | "no-matches";
  candidates: ScoredCandidate[];
  learningPath: LearningPath;
  analytics: CandidateAnalytics;
  skillGaps: SkillGap[];
  diagnostics: RecommendationDiagnostics;
}
