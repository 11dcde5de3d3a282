/**
 * Learning path composer — orders the final candidates into a progression.
 *
 * Skill level is the primary ordering key: no course ever follows a course
 * of a higher level. Within a level, prerequisite edges between candidates
 * are honoured with a topological pass. Prerequisites outside the candidate
 * set are ignored, so the path is self-contained.
 *
 * A prerequisite cycle among the candidates cannot be honoured; the path
 * then falls back to plain level/score ordering and is flagged `degraded`.
 * A course listing itself as a prerequisite is a one-course cycle.
 */

import type {
  CourseId,
  LearningPath,
  LearningPathStep,
  ScoredCandidate,
  SkillLevel,
} from "@/types";
import { SKILL_LEVELS, SKILL_LEVEL_RANK } from "@/types";
import { PATH_DURATION_BUDGET_HOURS } from "./config";
import { compareCourseIds } from "./similarity";

/** Hours of study assumed per month when estimating completion. */
const HOURS_PER_MONTH = 20;

// ---------------------------------------------------------------------------
// Prerequisite graph
// ---------------------------------------------------------------------------

/**
 * Prerequisite edges restricted to the candidate set, self-edges included.
 * Maps each course to the in-set courses it depends on.
 */
export function buildPrerequisiteGraph(
  candidates: readonly ScoredCandidate[],
): Map<CourseId, CourseId[]> {
  const ids = new Set(candidates.map((c) => c.course.id));
  const graph = new Map<CourseId, CourseId[]>();

  for (const c of candidates) {
    const deps = new Set<CourseId>();
    for (const prereq of c.course.prerequisites) {
      if (ids.has(prereq)) {
        deps.add(prereq);
      }
    }
    graph.set(c.course.id, [...deps].sort(compareCourseIds));
  }

  return graph;
}

/**
 * Courses that sit on a prerequisite cycle (Tarjan's strongly connected
 * components; a component is a cycle when it has more than one member or
 * its single member depends on itself).
 * Returned sorted by ID.
 */
export function findCycleMembers(graph: ReadonlyMap<CourseId, CourseId[]>): CourseId[] {
  let counter = 0;
  const index = new Map<CourseId, number>();
  const lowLink = new Map<CourseId, number>();
  const onStack = new Set<CourseId>();
  const stack: CourseId[] = [];
  const members: CourseId[] = [];

  function visit(node: CourseId): void {
    index.set(node, counter);
    lowLink.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const next of graph.get(node) ?? []) {
      if (!index.has(next)) {
        visit(next);
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(next) ?? 0));
      } else if (onStack.has(next)) {
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (lowLink.get(node) === index.get(node)) {
      const component: CourseId[] = [];
      let popped: CourseId | undefined;
      do {
        popped = stack.pop();
        if (popped === undefined) break;
        onStack.delete(popped);
        component.push(popped);
      } while (popped !== node);

      if (component.length > 1 || (graph.get(node) ?? []).includes(node)) {
        members.push(...component);
      }
    }
  }

  for (const node of graph.keys()) {
    if (!index.has(node)) visit(node);
  }

  return members.sort(compareCourseIds);
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/** Level rank, then score descending, then fewer prerequisites, then ID. */
function fallbackOrder(graph: ReadonlyMap<CourseId, CourseId[]>) {
  const prereqCount = (id: CourseId) => graph.get(id)?.length ?? 0;
  return (a: ScoredCandidate, b: ScoredCandidate): number =>
    SKILL_LEVEL_RANK[a.course.level] - SKILL_LEVEL_RANK[b.course.level] ||
    b.score - a.score ||
    prereqCount(a.course.id) - prereqCount(b.course.id) ||
    compareCourseIds(a.course.id, b.course.id);
}

/**
 * Topological order of one level's courses. Edges to courses of other
 * levels are ignored: lower levels are already placed, and a prerequisite
 * at a higher level cannot come first without breaking level precedence.
 * The ready set is drained in fallback order. Assumes no cycles.
 */
function orderLevel(
  group: ScoredCandidate[],
  graph: ReadonlyMap<CourseId, CourseId[]>,
  compare: (a: ScoredCandidate, b: ScoredCandidate) => number,
): ScoredCandidate[] {
  const inGroup = new Set(group.map((c) => c.course.id));
  const pending = new Map<CourseId, number>();
  const dependents = new Map<CourseId, CourseId[]>();

  for (const c of group) {
    const deps = (graph.get(c.course.id) ?? []).filter((d) => inGroup.has(d));
    pending.set(c.course.id, deps.length);
    for (const d of deps) {
      dependents.set(d, [...(dependents.get(d) ?? []), c.course.id]);
    }
  }

  const byId = new Map(group.map((c) => [c.course.id, c]));
  const ready = group.filter((c) => pending.get(c.course.id) === 0);
  const ordered: ScoredCandidate[] = [];

  while (ready.length > 0) {
    ready.sort(compare);
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);

    for (const dependentId of dependents.get(next.course.id) ?? []) {
      const remaining = (pending.get(dependentId) ?? 0) - 1;
      pending.set(dependentId, remaining);
      const dependent = byId.get(dependentId);
      if (remaining === 0 && dependent) {
        ready.push(dependent);
      }
    }
  }

  return ordered;
}

// ---------------------------------------------------------------------------
// Path metadata
// ---------------------------------------------------------------------------

/** "<tag> & <tag> Learning Path" from tags shared by two or more courses. */
function pathName(steps: readonly LearningPathStep[]): string {
  const counts = new Map<string, number>();
  for (const step of steps) {
    for (const tag of new Set(step.course.tags)) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  const shared = [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([tag]) => tag)
    .sort()
    .slice(0, 2);

  return shared.length > 0 ? `${shared.join(" & ")} Learning Path` : "Learning Path";
}

function skillProgression(steps: readonly LearningPathStep[]): SkillLevel[] {
  const seen = new Set(steps.map((s) => s.course.level));
  return SKILL_LEVELS.filter((level) => seen.has(level));
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

/**
 * Order the final candidates into a learning path.
 *
 * @param candidates   - The scored, filtered, truncated candidate list.
 * @param budgetHours  - Steps whose running total exceeds this are marked optional.
 */
export function composeLearningPath(
  candidates: readonly ScoredCandidate[],
  budgetHours: number = PATH_DURATION_BUDGET_HOURS,
): LearningPath {
  const graph = buildPrerequisiteGraph(candidates);
  const compare = fallbackOrder(graph);
  const cycle = findCycleMembers(graph);
  const degraded = cycle.length > 0;

  let ordered: ScoredCandidate[];
  if (degraded) {
    ordered = [...candidates].sort(compare);
  } else {
    ordered = SKILL_LEVELS.flatMap((level) =>
      orderLevel(
        candidates.filter((c) => c.course.level === level),
        graph,
        compare,
      ),
    );
  }

  let cumulativeHours = 0;
  const steps: LearningPathStep[] = ordered.map((c, index) => {
    cumulativeHours += c.course.durationHours;
    return {
      index,
      course: c.course,
      score: c.score,
      cumulativeHours,
      optional: cumulativeHours > budgetHours,
    };
  });

  return {
    name: pathName(steps),
    steps,
    totalDurationHours: cumulativeHours,
    skillProgression: skillProgression(steps),
    estimatedCompletionMonths:
      steps.length === 0 ? 0 : Math.max(1, Math.floor(cumulativeHours / HOURS_PER_MONTH)),
    degraded,
    cycle,
  };
}
