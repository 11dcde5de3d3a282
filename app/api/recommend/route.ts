/**
 * POST /api/recommend
 *
 * Runs a recommendation query against the catalog. The query text is
 * embedded once, ranked against every course, filtered and scored, and the
 * surviving candidates are composed into a learning path.
 *
 * Body: RecommendationQuery (`text` required; `filters`, `limit`,
 * `threshold`, `durationBudgetHours`, `completedCourseIds` optional).
 */

import { NextRequest, NextResponse } from "next/server";
import { withAuth } from "@/src/auth";
import { getCatalogStore } from "@/src/catalog";
import { getQueryEmbeddingProvider } from "@/src/embeddings";
import { InvalidQueryError } from "@/src/errors";
import { createRecommender, parseQuery } from "@/src/recommender";

export const POST = withAuth(async (request: NextRequest) => {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new InvalidQueryError(["request body must be valid JSON"]);
  }

  const query = parseQuery(body);
  const store = await getCatalogStore();

  const recommender = createRecommender({
    store,
    provider: getQueryEmbeddingProvider(),
  });
  const result = await recommender.handle(query, { signal: request.signal });

  return NextResponse.json(result);
});
