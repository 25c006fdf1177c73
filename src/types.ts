/**
 * Core domain types shared across the conversation, research, strategy and
 * execution layers.
 */

// ─── Conversation ───────────────────────────────────────────────

export const CONVERSATION_STAGES = [
  "greeting",
  "context_gathering",
  "researching",
  "strategizing",
  "planning",
  "executing",
  "monitoring",
  "completed",
] as const;

export type SequenceStage = (typeof CONVERSATION_STAGES)[number];

export type ConversationStage = SequenceStage | "error";

export type ExperienceLevel = "beginner" | "intermediate" | "advanced";

export interface GoalContext {
  niche?: string;
  currentFollowers?: number;
  targetFollowers?: number;
  timeframeDays?: number;
  constraints: string[];
  platform: string;
  experienceLevel?: ExperienceLevel;
  targetAudience: string[];
}

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
  at: string;
}

export interface SessionError {
  code: string;
  message: string;
  retryable: boolean;
}

export interface ConversationSession {
  userId: string;
  stage: ConversationStage;
  /** Sequence stage to resume from while `stage` is "error". */
  resumeStage: SequenceStage | null;
  context: GoalContext;
  researchResult: ResearchResult | null;
  strategy: Strategy | null;
  executionPlan: ExecutionPlan | null;
  executionId: string | null;
  rejectedTasks: RejectedTask[];
  lastError: SessionError | null;
  history: ConversationTurn[];
  createdAt: string;
  updatedAt: string;
}

// ─── Research ───────────────────────────────────────────────────

export type QueryIntent =
  | "simple_chat"
  | "growth_research"
  | "competitor_analysis"
  | "strategy"
  | "general";

export interface ResearchInsight {
  providerName: string;
  query: string;
  summaryText: string;
  confidence: number;
  retrievedAt: string;
  rawPayload: unknown;
  simulated: boolean;
  sourceUrl?: string;
}

export interface ResearchResult {
  queryFingerprint: string;
  query: string;
  intent: QueryIntent;
  insights: ResearchInsight[];
  degraded: boolean;
  synthesizedSummary: string;
  providersSucceeded: string[];
  providersFailed: string[];
  reranked: boolean;
  cachedAt: string;
  ttlSeconds: number;
}

// ─── Strategy ───────────────────────────────────────────────────

export const SPECIALIST_IDS = ["growth", "engagement", "content", "funnel"] as const;

export type SpecialistId = (typeof SPECIALIST_IDS)[number];

export const RECOMMENDATION_KINDS = [
  "posting_frequency",
  "content_theme",
  "engagement_like",
  "engagement_follow",
  "hashtag_strategy",
  "audience_targeting",
  "analytics_review",
  "direct_outreach",
  "collaboration",
] as const;

export type RecommendationKind = (typeof RECOMMENDATION_KINDS)[number];

export interface Recommendation {
  kind: RecommendationKind;
  /** Content category or target the tactic applies to, e.g. "reels". */
  subject: string;
  /** Tactic setting, e.g. "daily" for a posting frequency. */
  value: string;
  description: string;
  rationale: string;
  parameters: Record<string, number | string | string[]>;
}

export interface StrategyProposal {
  specialistName: SpecialistId;
  recommendations: Recommendation[];
  rationale: string;
}

export interface UnifiedRecommendation extends Recommendation {
  key: string;
  sources: SpecialistId[];
  auxiliaryRationale: string[];
}

export interface ConflictResolution {
  key: string;
  winner: SpecialistId;
  winningValue: string;
  loser: SpecialistId;
  losingValue: string;
  reason: string;
}

export interface Strategy {
  title: string;
  unifiedRecommendations: UnifiedRecommendation[];
  contributingSpecialists: SpecialistId[];
  resolutions: ConflictResolution[];
}

// ─── Execution ──────────────────────────────────────────────────

export const TASK_CATEGORIES = [
  "engagement-like",
  "engagement-follow",
  "hashtag-research",
  "audience-research",
  "analytics-pull",
  "content-posting",
  "direct-message",
] as const;

export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export function isTaskCategory(value: string): value is TaskCategory {
  return (TASK_CATEGORIES as readonly string[]).includes(value);
}

export interface Task {
  taskId: string;
  category: TaskCategory;
  scheduledOffsetMs: number;
  priority: number;
  estimatedDurationMinutes: number;
  sourceRecommendation: string;
  parameters: Record<string, number | string | string[]>;
}

export interface ExecutionPlan {
  planId: string;
  tasks: Task[];
  timeframeDays: number;
  createdAt: string;
}

export interface RejectedTask {
  task: Task;
  reasonCode: string;
  reason: string;
}

export type DispatchState = "queued" | "in_progress" | "completed" | "failed";

export interface DispatchRecord {
  taskId: string;
  category: TaskCategory;
  state: DispatchState;
  attempts: number;
  lastError: string | null;
  handle: string | null;
  updatedAt: string;
}

export interface ExecutionRecordSet {
  executionId: string;
  userId: string;
  persistence: "primary" | "local-fallback";
  records: DispatchRecord[];
  createdAt: string;
  updatedAt: string;
}
