/**
 * Catalog lifecycle — loads the persisted catalog into the process-wide store.
 *
 * The catalog file is read once per process and validated record by record.
 * Malformed records and records whose vector length disagrees with the
 * catalog dimension are skipped and logged; the rest of the catalog still
 * loads. The query path only ever reads the resulting store.
 */

import type {
  CatalogRecord,
  Course,
  CourseId,
  EmbeddingVector,
} from "@/types";
import { isSkillLevel } from "@/types";
import { EMBEDDING_MODEL } from "./config";
import { DimensionMismatchError, StoreUnavailableError } from "./errors";
import { readCatalogFile, upsertCatalogRecordWithRetry } from "./github";
import { logEvent } from "./log";
import { type CatalogStore, createMemoryStore } from "./store";

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Outcome of validating an untrusted value. */
export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** Validate an untrusted course object. */
export function parseCourse(value: unknown): Parsed<Course> {
  if (!isRecord(value)) {
    return { ok: false, error: "course must be an object" };
  }

  const { id, title, description, level, durationHours, price, tags, prerequisites, popularity, provider, modality } = value;

  if (typeof id !== "string" || !id.trim()) {
    return { ok: false, error: "course.id must be a non-empty string" };
  }
  if (typeof title !== "string") {
    return { ok: false, error: `course ${id}: title must be a string` };
  }
  if (typeof description !== "string") {
    return { ok: false, error: `course ${id}: description must be a string` };
  }
  if (!isSkillLevel(level)) {
    return { ok: false, error: `course ${id}: level must be beginner, intermediate or advanced` };
  }
  if (!isFiniteNumber(durationHours) || durationHours < 0) {
    return { ok: false, error: `course ${id}: durationHours must be a non-negative number` };
  }
  let parsedPrice: number | null = null;
  if (price !== null) {
    if (!isFiniteNumber(price) || price < 0) {
      return { ok: false, error: `course ${id}: price must be null or a non-negative number` };
    }
    parsedPrice = price;
  }
  if (!isStringArray(tags)) {
    return { ok: false, error: `course ${id}: tags must be an array of strings` };
  }
  if (!isStringArray(prerequisites)) {
    return { ok: false, error: `course ${id}: prerequisites must be an array of strings` };
  }
  if (!isFiniteNumber(popularity)) {
    return { ok: false, error: `course ${id}: popularity must be a number` };
  }
  let parsedProvider: string | undefined;
  if (provider !== undefined) {
    if (typeof provider !== "string") {
      return { ok: false, error: `course ${id}: provider must be a string` };
    }
    parsedProvider = provider;
  }
  let parsedModality: string | undefined;
  if (modality !== undefined) {
    if (typeof modality !== "string") {
      return { ok: false, error: `course ${id}: modality must be a string` };
    }
    parsedModality = modality;
  }

  return {
    ok: true,
    value: {
      id,
      title,
      description,
      level,
      durationHours,
      price: parsedPrice,
      tags,
      prerequisites,
      popularity,
      ...(parsedProvider !== undefined && { provider: parsedProvider }),
      ...(parsedModality !== undefined && { modality: parsedModality }),
    },
  };
}

/** Validate an untrusted embedding vector. */
export function parseVector(value: unknown): Parsed<EmbeddingVector> {
  if (!Array.isArray(value) || value.length === 0) {
    return { ok: false, error: "vector must be a non-empty array of numbers" };
  }
  const vector: number[] = [];
  for (const x of value) {
    if (!isFiniteNumber(x)) {
      return { ok: false, error: "vector must contain only finite numbers" };
    }
    vector.push(x);
  }
  return { ok: true, value: vector };
}

/** A record left out while loading the catalog. */
export interface SkippedRecord {
  courseId: CourseId;
  reason: string;
}

/** A validated catalog, ready to load into a store. */
export interface ParsedCatalog {
  dimension: number | null;
  records: { course: Course; vector: EmbeddingVector }[];
  skipped: SkippedRecord[];
}

/**
 * Validate a raw catalog file.
 *
 * The declared dimension wins; without one, the first valid record (in
 * course ID order) establishes it. Throws when the file itself is not a
 * catalog, since nothing could be loaded from it.
 */
export function parseCatalogFile(data: unknown): ParsedCatalog {
  if (!isRecord(data) || !isRecord(data.courses)) {
    throw new Error("Catalog file must be an object with a 'courses' map");
  }
  if (data.dimension !== undefined && data.dimension !== null && !isFiniteNumber(data.dimension)) {
    throw new Error("Catalog 'dimension' must be a number or null");
  }

  const courses = data.courses;
  let dimension = isFiniteNumber(data.dimension) ? data.dimension : null;
  const records: ParsedCatalog["records"] = [];
  const skipped: SkippedRecord[] = [];

  for (const key of Object.keys(courses).sort()) {
    const raw = courses[key];
    if (!isRecord(raw)) {
      skipped.push({ courseId: key, reason: "record must be an object" });
      continue;
    }

    const course = parseCourse(raw.course);
    if (!course.ok) {
      skipped.push({ courseId: key, reason: course.error });
      continue;
    }
    if (course.value.id !== key) {
      skipped.push({ courseId: key, reason: `record key does not match course.id ${course.value.id}` });
      continue;
    }

    const vector = parseVector(raw.vector);
    if (!vector.ok) {
      skipped.push({ courseId: key, reason: vector.error });
      continue;
    }

    dimension ??= vector.value.length;
    if (vector.value.length !== dimension) {
      skipped.push({
        courseId: key,
        reason: `Vector length mismatch: expected ${dimension}, got ${vector.value.length}`,
      });
      continue;
    }

    records.push({ course: course.value, vector: vector.value });
  }

  return { dimension, records, skipped };
}

// ---------------------------------------------------------------------------
// Process-wide store
// ---------------------------------------------------------------------------

let current: Promise<CatalogStore> | null = null;

/**
 * Read the catalog file and build a fresh in-memory store.
 * Any failure to read or parse the file becomes StoreUnavailableError.
 */
export async function loadCatalogStore(): Promise<CatalogStore> {
  let parsed: ParsedCatalog;
  try {
    const { data } = await readCatalogFile();
    parsed = parseCatalogFile(data);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StoreUnavailableError(`Catalog could not be loaded: ${message}`);
  }

  for (const skip of parsed.skipped) {
    logEvent("catalog_record_skipped", { ...skip });
  }

  const store = createMemoryStore(parsed.dimension);
  for (const record of parsed.records) {
    await store.upsert(record.course, record.vector);
  }

  logEvent("catalog_loaded", {
    courses: store.size(),
    skipped: parsed.skipped.length,
    dimension: store.dimension(),
  });

  return store;
}

/**
 * Load the catalog once for this process. Concurrent callers share the same
 * load; a failed load is forgotten so the next call retries.
 */
export function initCatalogStore(): Promise<CatalogStore> {
  if (!current) {
    current = loadCatalogStore().catch((err: unknown) => {
      current = null;
      throw err;
    });
  }
  return current;
}

/** The process-wide store, loading it on first use. */
export function getCatalogStore(): Promise<CatalogStore> {
  return initCatalogStore();
}

/** Forget the loaded store. The next access reloads from storage. */
export function resetCatalogStore(): void {
  current = null;
}

// ---------------------------------------------------------------------------
// Maintenance
// ---------------------------------------------------------------------------

/**
 * Persist a course to the catalog file, then upsert it into the store.
 * The dimension is checked first, so a mismatched vector is never written,
 * and the store only serves what the file holds.
 */
export async function upsertAndPersist(
  store: CatalogStore,
  course: Course,
  vector: EmbeddingVector,
  model: string = EMBEDDING_MODEL,
): Promise<void> {
  const dimension = store.dimension();
  if (dimension !== null && vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }

  const record: CatalogRecord = {
    course,
    vector,
    model,
    updatedAt: new Date().toISOString(),
  };
  await upsertCatalogRecordWithRetry(course.id, record);
  await store.upsert(course, vector);
}
