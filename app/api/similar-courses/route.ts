/**
 * GET /api/similar-courses?courseId=<id>&limit=<n>
 *
 * Returns the catalog courses closest to an existing course, using its
 * stored vector. No embedding call is made.
 */

import { NextRequest, NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { getCatalogStore } from "@/src/catalog";
import { DEFAULT_RESULT_LIMIT, MAX_RESULT_LIMIT } from "@/src/config";
import { findSimilarCourses } from "@/src/similarity";

export const GET = withAuth(async (request: NextRequest) => {
  const { searchParams } = new URL(request.url);
  const courseId = searchParams.get("courseId");

  if (!courseId) {
    return NextResponse.json(
      { error: "Query parameter 'courseId' is required" },
      { status: 400 },
    );
  }

  let limit = DEFAULT_RESULT_LIMIT;
  const rawLimit = searchParams.get("limit");
  if (rawLimit !== null) {
    limit = Number(rawLimit);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RESULT_LIMIT) {
      return NextResponse.json(
        { error: `'limit' must be an integer between 1 and ${MAX_RESULT_LIMIT}` },
        { status: 400 },
      );
    }
  }

  const store = await getCatalogStore();
  const { ranked, rejected } = await findSimilarCourses(store, courseId, { limit });

  return NextResponse.json({ courseId, similar: ranked, excluded: rejected });
});
