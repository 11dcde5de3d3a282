/**
 * POST /api/courses
 *
 * Catalog maintenance: inserts or replaces one course together with its
 * embedding vector. The in-memory catalog is updated first (which enforces
 * the catalog dimension), then the record is committed to the catalog file.
 *
 * Body: { course: Course, vector: number[], model?: string }
 */

import { NextRequest, NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { getCatalogStore, parseCourse, parseVector, upsertAndPersist } from "@/src/catalog";
import { EMBEDDING_MODEL } from "@/src/config";
import { NotFoundError } from "@/src/errors";
import { logEvent } from "@/src/log";
import type { CatalogStore } from "@/src/store";

async function courseExists(store: CatalogStore, courseId: string): Promise<boolean> {
  try {
    await store.get(courseId);
    return true;
  } catch (err) {
    if (err instanceof NotFoundError) return false;
    throw err;
  }
}

export const POST = withAuth(async (request: NextRequest) => {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Request body must be valid JSON" }, { status: 400 });
  }

  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return NextResponse.json({ error: "Request body must be a JSON object" }, { status: 400 });
  }

  const rawCourse: unknown = "course" in body ? body.course : undefined;
  const rawVector: unknown = "vector" in body ? body.vector : undefined;
  const rawModel: unknown = "model" in body ? body.model : undefined;

  const course = parseCourse(rawCourse);
  if (!course.ok) {
    return NextResponse.json({ error: course.error }, { status: 400 });
  }
  const vector = parseVector(rawVector);
  if (!vector.ok) {
    return NextResponse.json({ error: vector.error }, { status: 400 });
  }
  if (rawModel !== undefined && typeof rawModel !== "string") {
    return NextResponse.json({ error: "'model' must be a string" }, { status: 400 });
  }
  const model = rawModel ?? EMBEDDING_MODEL;

  const store = await getCatalogStore();
  const existed = await courseExists(store, course.value.id);

  await upsertAndPersist(store, course.value, vector.value, model);
  logEvent("course_upserted", { courseId: course.value.id, created: !existed, model });

  return NextResponse.json(
    { courseId: course.value.id, created: !existed, dimension: store.dimension() },
    { status: existed ? 200 : 201 },
  );
});
