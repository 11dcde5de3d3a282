/**
 * Request-scoped query types.
 *
 * A query lives for the duration of one `handle` call and is never stored.
 */

import type { CourseId, SkillLevel } from "./course";

/** Structured hard-filter constraints. Every field is optional. */
export interface QueryFilters {
  /** Allowed skill levels. */
  levels?: SkillLevel[];
  /** Inclusive duration range, in hours. */
  minDuration?: number;
  maxDuration?: number;
  /** Inclusive price range. Free courses count as price 0. */
  minPrice?: number;
  maxPrice?: number;
  /** At least one of these categories must appear in a course's tags. */
  categories?: string[];
  /** Allowed providers (case-insensitive). A course without one fails. */
  providers?: string[];
  /** Allowed delivery formats (case-insensitive). A course without one fails. */
  modalities?: string[];
  /** A course carrying any of these tags is removed. */
  excludeTags?: string[];
}

/** A recommendation request. */
export interface RecommendationQuery {
  /** Raw free-text query. */
  text: string;
  filters?: QueryFilters;
  /** Maximum number of candidates to return. */
  limit?: number;
  /** Overrides the configured similarity threshold for this query. */
  threshold?: number;
  /** Overrides the configured learning-path duration budget. */
  durationBudgetHours?: number;
  /** Courses the learner has already completed, used for skill-gap analysis. */
  completedCourseIds?: CourseId[];
}
