/**
 * Similarity module — cosine similarity and exhaustive threshold ranking.
 *
 * Pure math over the catalog snapshot. Given a query vector, scores every
 * catalog entry, drops those under the threshold and returns the rest in a
 * deterministic order. Records with broken vectors are reported, not thrown.
 */

import type { CatalogEntry, Course, CourseId, RecordIssue } from "@/types";
import { SIMILARITY_THRESHOLD } from "./config";
import { DegenerateVectorError, DimensionMismatchError } from "./errors";
import type { CatalogStore } from "./store";

// ---------------------------------------------------------------------------
// Cosine Similarity
// ---------------------------------------------------------------------------

/**
 * Compute the cosine similarity between two vectors.
 *
 * Returns a value in [-1, 1] where 1 means identical direction,
 * 0 means orthogonal, and -1 means opposite direction. The result is
 * clamped so rounding drift never escapes that range.
 *
 * Throws DimensionMismatchError if the lengths differ and
 * DegenerateVectorError if either vector is empty or has zero magnitude.
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  if (a.length === 0) {
    throw new DegenerateVectorError("Cannot compute similarity of empty vectors");
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(magA) * Math.sqrt(magB);

  if (magnitude === 0) {
    throw new DegenerateVectorError();
  }

  return Math.min(1, Math.max(-1, dot / magnitude));
}

/** True when the vector has at least one component and a non-zero norm. */
export function hasDirection(vector: readonly number[]): boolean {
  return vector.some((x) => x !== 0);
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

/** A catalog course with its similarity to the query. */
export interface RankedCourse {
  course: Readonly<Course>;
  similarity: number;
}

export interface RankOptions {
  /** Minimum similarity to keep (defaults to config value). */
  threshold?: number;
  /** Keep at most this many after sorting. */
  topK?: number;
  /** Course IDs to skip (e.g. the course being compared). */
  excludeIds?: ReadonlySet<CourseId>;
}

export interface RankingResult {
  /** Similarity descending, ties by course ID ascending. */
  ranked: RankedCourse[];
  /** Records left out because their vectors could not be compared. */
  rejected: RecordIssue[];
}

/** Order course IDs by UTF-16 code unit, independent of locale. */
export function compareCourseIds(a: CourseId, b: CourseId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score every entry against the query vector and keep those at or above
 * the threshold.
 *
 * Never pads: when fewer entries pass than `topK`, the shorter list is
 * returned. Throws DegenerateVectorError when the query itself has no
 * direction, since every comparison would then be meaningless.
 */
export function rankBySimilarity(
  query: readonly number[],
  entries: readonly CatalogEntry[],
  options: RankOptions = {},
): RankingResult {
  const threshold = options.threshold ?? SIMILARITY_THRESHOLD;
  const excludeIds = options.excludeIds ?? new Set<CourseId>();

  if (!hasDirection(query)) {
    throw new DegenerateVectorError("Query vector has zero magnitude");
  }

  const ranked: RankedCourse[] = [];
  const rejected: RecordIssue[] = [];

  for (const entry of entries) {
    if (excludeIds.has(entry.course.id)) continue;

    let similarity: number;
    try {
      similarity = cosineSimilarity(query, entry.vector);
    } catch (err) {
      if (err instanceof DimensionMismatchError) {
        rejected.push({
          courseId: entry.course.id,
          kind: "dimension-mismatch",
          detail: err.message,
        });
        continue;
      }
      if (err instanceof DegenerateVectorError) {
        rejected.push({
          courseId: entry.course.id,
          kind: "degenerate-vector",
          detail: err.message,
        });
        continue;
      }
      throw err;
    }

    if (similarity >= threshold) {
      ranked.push({ course: entry.course, similarity });
    }
  }

  ranked.sort(
    (a, b) =>
      b.similarity - a.similarity || compareCourseIds(a.course.id, b.course.id),
  );

  return {
    ranked: options.topK === undefined ? ranked : ranked.slice(0, options.topK),
    rejected,
  };
}

// ---------------------------------------------------------------------------
// Course-to-course similarity
// ---------------------------------------------------------------------------

/**
 * Find catalog courses similar to an existing course, excluding it.
 *
 * Throws NotFoundError (from the store) when the course does not exist.
 */
export async function findSimilarCourses(
  store: CatalogStore,
  courseId: CourseId,
  options: { limit: number; threshold?: number },
): Promise<RankingResult> {
  const reference = await store.get(courseId);
  const entries = await store.getAll();

  return rankBySimilarity(reference.vector, entries, {
    threshold: options.threshold,
    topK: options.limit,
    excludeIds: new Set([courseId]),
  });
}
