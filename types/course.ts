/**
 * Course types for the recommender catalog.
 *
 * A course is an immutable catalog record created by ingestion. The query
 * path only ever reads it.
 */

/** Unique identifier for a course. */
export type CourseId = string;

/** All valid skill levels, in progression order. */
export const SKILL_LEVELS = ["beginner", "intermediate", "advanced"] as const;

export type SkillLevel = typeof SKILL_LEVELS[number];

/** Position of each level in the progression (beginner first). */
export const SKILL_LEVEL_RANK: Record<SkillLevel, number> = {
  beginner: 0,
  intermediate: 1,
  advanced: 2,
};

/** A catalog course. */
export interface Course {
  /** Unique course identifier. */
  id: CourseId;
  title: string;
  description: string;
  /** Difficulty level of the course. */
  level: SkillLevel;
  /** Estimated time to complete, in hours. */
  durationHours: number;
  /** Price in the catalog currency, or `null` for a free course. */
  price: number | null;
  /** Category tags. */
  tags: string[];
  /** IDs of courses that should be taken first. May be empty. */
  prerequisites: CourseId[];
  /** Popularity signal maintained outside this service (e.g. enrollments). */
  popularity: number;
  /** Organisation offering the course. */
  provider?: string;
  /** Delivery format, e.g. "online" or "in-person". */
  modality?: string;
}

/** Type guard for skill level strings. */
export function isSkillLevel(value: unknown): value is SkillLevel {
  return SKILL_LEVELS.some((level) => level === value);
}
