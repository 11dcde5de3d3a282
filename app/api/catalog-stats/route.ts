/**
 * GET /api/catalog-stats
 *
 * Summary of the loaded catalog: course count, vector dimension, level
 * distribution and duration / price statistics.
 */

import { NextResponse } from "next/server";
import { summarizeCatalog } from "@/src/analytics";
import { withAuth } from "@/src/auth";
import { getCatalogStore } from "@/src/catalog";

export const GET = withAuth(async () => {
  const store = await getCatalogStore();
  const entries = await store.getAll();
  return NextResponse.json(summarizeCatalog(entries, store.dimension()));
});
