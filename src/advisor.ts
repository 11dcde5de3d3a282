/**
 * Advisor capability — the conversational layer that explains results.
 *
 * The advisor never influences ranking. It receives the finished result as
 * plain-text context and answers the learner's question about it. Any
 * backend (an LLM client, a canned responder in tests) can implement it.
 */

import type { RecommendationQuery, RecommendationResult } from "@/types";

/** A pluggable advisor. */
export interface Advisor {
  /** Answer a question given a plain-text description of the results. */
  answer(question: string, context: string): Promise<string>;
}

/** Number of candidates described in the advisor context. */
const CONTEXT_CANDIDATES = 3;

function describeFilters(result: RecommendationResult): string {
  const f = result.diagnostics.appliedFilters;
  const parts: string[] = [];
  if (f.levels) parts.push(`levels ${f.levels.join("/")}`);
  if (f.minDuration !== undefined || f.maxDuration !== undefined) {
    parts.push(`duration ${f.minDuration ?? 0}-${f.maxDuration ?? "any"}h`);
  }
  if (f.minPrice !== undefined || f.maxPrice !== undefined) {
    parts.push(`price ${f.minPrice ?? 0}-${f.maxPrice ?? "any"}`);
  }
  if (f.categories) parts.push(`categories ${f.categories.join(", ")}`);
  if (f.providers) parts.push(`providers ${f.providers.join(", ")}`);
  if (f.modalities) parts.push(`formats ${f.modalities.join(", ")}`);
  if (f.excludeTags) parts.push(`excluding ${f.excludeTags.join(", ")}`);
  return parts.length > 0 ? parts.join("; ") : "none";
}

/**
 * Render a result as the context block handed to the advisor.
 */
export function buildAdvisorContext(
  query: RecommendationQuery,
  result: RecommendationResult,
): string {
  const lines: string[] = [`User query: ${query.text}`];

  if (result.outcome === "no-matches") {
    lines.push(`No courses matched. Filters applied: ${describeFilters(result)}`);
    return lines.join("\n");
  }

  lines.push(`Found ${result.candidates.length} relevant courses:`);
  for (const c of result.candidates.slice(0, CONTEXT_CANDIDATES)) {
    const provider = c.course.provider ? ` (${c.course.provider})` : "";
    lines.push(`- ${c.course.title}${provider} - Score: ${c.score.toFixed(2)}`);
  }

  const path = result.learningPath;
  lines.push(
    `Learning path: ${path.name} (${path.totalDurationHours}h, ${path.estimatedCompletionMonths} months)`,
  );
  if (path.degraded) {
    lines.push("Prerequisite order could not be fully honoured.");
  }

  if (result.skillGaps.length > 0) {
    lines.push(`Skill gaps: ${result.skillGaps.length} missing prerequisites`);
  }

  return lines.join("\n");
}

/** Ask the advisor about a finished result. */
export async function askAdvisor(
  advisor: Advisor,
  question: string,
  query: RecommendationQuery,
  result: RecommendationResult,
): Promise<string> {
  return advisor.answer(question, buildAdvisorContext(query, result));
}
