/**
 * Embedding types for the course catalog.
 *
 * Every course has exactly one embedding. All embeddings in a catalog share
 * the same length, the catalog dimension.
 */

import type { Course, CourseId } from "./course";

/** A dense vector representing a course's (or query's) semantic position. */
export type EmbeddingVector = number[];

/** A course together with its embedding, as handed out by the store. */
export interface CatalogEntry {
  readonly course: Readonly<Course>;
  readonly vector: readonly number[];
}

/** One course record in the persisted catalog file. */
export interface CatalogRecord {
  course: Course;
  /** The dense embedding vector. */
  vector: EmbeddingVector;
  /** Identifier of the model that produced this embedding. */
  model: string;
  /** ISO-8601 timestamp of the last write. */
  updatedAt: string;
}

/** The catalog file stored at CATALOG_PATH in the catalog repository. */
export interface CatalogFile {
  /** Shared embedding length, or `null` until the first record is written. */
  dimension: number | null;
  /** Map of course IDs to their records. */
  courses: Record<CourseId, CatalogRecord>;
}

/** Create an empty catalog file for bootstrapping. */
export const emptyCatalogFile = (): CatalogFile => ({
  dimension: null,
  courses: {},
});

/** Why a single record was left out of a scan. */
export type RecordIssueKind = "dimension-mismatch" | "degenerate-vector";

/** A per-record data-integrity problem. Never fails a whole request. */
export interface RecordIssue {
  courseId: CourseId;
  kind: RecordIssueKind;
  detail: string;
}
