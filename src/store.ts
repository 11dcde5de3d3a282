/**
 * Embedding store — the catalog's courses and their vectors.
 *
 * The store is the only owner of catalog state. Entries are frozen and
 * replaced whole on upsert, so a reader holding an entry never sees it
 * change underneath. `getAll` hands out a point-in-time array: a scan that
 * overlaps an upsert sees either the old or the new entry, never a mix.
 */

import type { CatalogEntry, Course, CourseId } from "@/types";
import { DimensionMismatchError, NotFoundError } from "./errors";

/** Logical contract the recommender needs from catalog storage. */
export interface CatalogStore {
  /** Every catalog entry. Rejects with StoreUnavailableError when storage cannot be read. */
  getAll(): Promise<CatalogEntry[]>;
  /** A single entry. Rejects with NotFoundError for an unknown ID. */
  get(courseId: CourseId): Promise<CatalogEntry>;
  /** Insert or replace. Rejects with DimensionMismatchError on a length mismatch. */
  upsert(course: Course, vector: readonly number[]): Promise<CatalogEntry>;
  /** Number of entries. */
  size(): number;
  /** Shared vector length, or `null` while the store is empty. */
  dimension(): number | null;
}

function freezeEntry(course: Course, vector: readonly number[]): CatalogEntry {
  return Object.freeze({
    course: Object.freeze({
      ...course,
      tags: [...course.tags],
      prerequisites: [...course.prerequisites],
    }),
    vector: Object.freeze([...vector]),
  });
}

/**
 * Create an in-memory store.
 *
 * @param dimension - Fix the vector length up front. When omitted, the
 *                    first upsert establishes it.
 */
export function createMemoryStore(dimension: number | null = null): CatalogStore {
  const entries = new Map<CourseId, CatalogEntry>();
  let established = dimension;

  return {
    async getAll(): Promise<CatalogEntry[]> {
      return Array.from(entries.values());
    },

    async get(courseId: CourseId): Promise<CatalogEntry> {
      const entry = entries.get(courseId);
      if (!entry) {
        throw new NotFoundError(courseId);
      }
      return entry;
    },

    async upsert(course: Course, vector: readonly number[]): Promise<CatalogEntry> {
      if (established !== null && vector.length !== established) {
        throw new DimensionMismatchError(established, vector.length);
      }
      const entry = freezeEntry(course, vector);
      established = vector.length;
      entries.set(course.id, entry);
      return entry;
    },

    size(): number {
      return entries.size;
    },

    dimension(): number | null {
      return established;
    },
  };
}
