/**
 * GET /api/health
 *
 * Liveness probe. Returns HTTP 200 when the service is running, along with
 * the embedding model queries are embedded with. No authentication required
 * and no catalog access.
 */

import { NextResponse } from "next/server";
import { EMBEDDING_MODEL } from "@/src/config";

export async function GET() {
  return NextResponse.json({ status: "ok", embeddingModel: EMBEDDING_MODEL });
}
