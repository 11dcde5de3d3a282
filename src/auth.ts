/**
 * Inbound API authentication and error mapping.
 *
 * Validates that incoming requests carry a Bearer token matching the
 * RECOMMENDER_API_KEY environment variable, and turns the recommender's
 * typed errors into HTTP responses.
 */

import { NextRequest, NextResponse } from "next/server";
import { getRecommenderApiKey } from "./config";
import {
  DegenerateVectorError,
  DimensionMismatchError,
  EmbeddingServiceError,
  InvalidQueryError,
  NotFoundError,
  StoreUnavailableError,
} from "./errors";

export type AuthResult =
  | { ok: true }
  | { ok: false; response: NextResponse };

/**
 * Constant-time string comparison. The runtime depends on the longer
 * input, not on where the strings diverge.
 */
export function timingSafeEqual(a: string, b: string): boolean {
  const encoder = new TextEncoder();
  const bufA = encoder.encode(a);
  const bufB = encoder.encode(b);
  const len = Math.max(bufA.length, bufB.length);
  let mismatch = bufA.length !== bufB.length ? 1 : 0;
  for (let i = 0; i < len; i++) {
    mismatch |= (bufA[i] ?? 0) ^ (bufB[i] ?? 0);
  }
  return mismatch === 0;
}

/**
 * Verify the Authorization header on an inbound request.
 *
 * Returns `{ ok: true }` when the token matches, or
 * `{ ok: false, response }` with a 401/403 response.
 */
export function verifyAuth(req: NextRequest): AuthResult {
  const header = req.headers.get("authorization");

  if (!header) {
    return {
      ok: false,
      response: NextResponse.json(
        { error: "Missing Authorization header" },
        { status: 401 },
      ),
    };
  }

  if (!header.startsWith("Bearer ")) {
    return {
      ok: false,
      response: NextResponse.json(
        { error: "Authorization header must use Bearer scheme" },
        { status: 401 },
      ),
    };
  }

  const token = header.slice("Bearer ".length);

  if (!timingSafeEqual(token, getRecommenderApiKey())) {
    return {
      ok: false,
      response: NextResponse.json({ error: "Invalid API key" }, { status: 403 }),
    };
  }

  return { ok: true };
}

/**
 * Map an error to a JSON response. Typed recommender errors get their own
 * status and a machine-readable `code`; anything else is a 500.
 */
export function errorResponse(error: unknown): NextResponse {
  if (error instanceof InvalidQueryError) {
    return NextResponse.json(
      { error: error.message, code: "INVALID_QUERY", problems: error.problems },
      { status: 400 },
    );
  }
  if (error instanceof EmbeddingServiceError) {
    return NextResponse.json(
      { error: error.message, code: "EMBEDDING_SERVICE_ERROR", kind: error.kind, retryable: true },
      { status: error.kind === "timeout" ? 504 : 502 },
    );
  }
  if (error instanceof StoreUnavailableError) {
    return NextResponse.json(
      { error: error.message, code: "STORE_UNAVAILABLE", retryable: true },
      { status: 503 },
    );
  }
  if (error instanceof NotFoundError) {
    return NextResponse.json(
      { error: error.message, code: "NOT_FOUND", courseId: error.courseId },
      { status: 404 },
    );
  }
  if (error instanceof DimensionMismatchError) {
    return NextResponse.json(
      { error: error.message, code: "DIMENSION_MISMATCH", expected: error.expected, actual: error.actual },
      { status: 409 },
    );
  }
  if (error instanceof DegenerateVectorError) {
    return NextResponse.json(
      { error: error.message, code: "DEGENERATE_VECTOR" },
      { status: 422 },
    );
  }

  const message = error instanceof Error ? error.message : "Internal server error";
  return NextResponse.json({ error: message }, { status: 500 });
}

/**
 * Higher-order function that wraps a route handler with:
 * 1. Bearer token authentication (returns 401/403 on failure)
 * 2. Centralized error mapping via `errorResponse`
 *
 * Usage:
 *   export const GET = withAuth(async (request) => {
 *     return NextResponse.json({ ... });
 *   });
 */
export function withAuth(
  handler: (request: NextRequest) => Promise<NextResponse>,
): (request: NextRequest) => Promise<NextResponse> {
  return async (request) => {
    const auth = verifyAuth(request);
    if (!auth.ok) return auth.response;
    try {
      return await handler(request);
    } catch (error) {
      return errorResponse(error);
    }
  };
}
