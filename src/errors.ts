/**
 * Typed errors raised by the recommender.
 *
 * Route handlers map these to HTTP statuses in `withAuth`. Record-level
 * errors (DimensionMismatchError, DegenerateVectorError) are normally
 * caught during a scan and turned into diagnostics.
 */

import type { CourseId } from "@/types";

/** The query is malformed. Caller error; retrying will not help. */
export class InvalidQueryError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid query: ${problems.join("; ")}`);
    this.name = "InvalidQueryError";
    this.problems = problems;
  }
}

export type EmbeddingFailureKind = "timeout" | "rejected";

/** The embedding service timed out or refused the request. */
export class EmbeddingServiceError extends Error {
  readonly kind: EmbeddingFailureKind;

  constructor(kind: EmbeddingFailureKind, message: string) {
    super(message);
    this.name = "EmbeddingServiceError";
    this.kind = kind;
  }
}

/** The catalog storage could not be read. */
export class StoreUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreUnavailableError";
  }
}

/** No catalog entry exists for the given course ID. */
export class NotFoundError extends Error {
  readonly courseId: CourseId;

  constructor(courseId: CourseId) {
    super(`Course not found: ${courseId}`);
    this.name = "NotFoundError";
    this.courseId = courseId;
  }
}

/** A vector's length differs from the catalog dimension. */
export class DimensionMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Vector length mismatch: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** A vector is empty or has zero magnitude, so no direction exists. */
export class DegenerateVectorError extends Error {
  constructor(message = "Cannot compute similarity: zero magnitude vector") {
    super(message);
    this.name = "DegenerateVectorError";
  }
}
