export type { CourseId, SkillLevel, Course } from "./course";
export { SKILL_LEVELS, SKILL_LEVEL_RANK, isSkillLevel } from "./course";

export type {
  EmbeddingVector,
  CatalogEntry,
  CatalogRecord,
  CatalogFile,
  RecordIssueKind,
  RecordIssue,
} from "./embedding";
export { emptyCatalogFile } from "./embedding";

export type { QueryFilters, RecommendationQuery } from "./query";

export type {
  FilterMatchFlags,
  ScoredCandidate,
  LearningPathStep,
  LearningPath,
  CandidateAnalytics,
  SkillGap,
  QueryStage,
  RecommendationDiagnostics,
  RecommendationResult,
} from "./result";
