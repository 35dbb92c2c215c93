/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AncestorStep,
  IdeaSubmission,
  LineageEdge,
  RefinementType,
  TimeCapsuleEntry,
} from './models.js';

// ── Requests ──

export interface SubmitIdeaRequest {
  ownerId: string;
  text: string;
  confidence?: number | null;
  classification?: string | null;
}

export interface LinkIdeasRequest {
  parentId: string;
  childId: string;
  refinementType: RefinementType;
  depthIncrease: number;
  question?: string;
}

export interface RecordOutcomeRequest {
  result: number;
  source: string;
  validatedAt?: Date;
  url?: string;
  notes?: string;
}

// ── Responses ──

export interface SubmitIdeaResponse {
  trackingId: string;
}

export interface LinkIdeasResponse {
  edgeId: string;
}

export interface IntegrityWarningPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface RecordOutcomeResponse {
  outcomeId: string;
  accuracyScore: number;
  earlyBirdMultiplier: number;
  calibrationPenalty: number;
  daysElapsed: number;
  creditedAncestors: number;
  warnings: IntegrityWarningPayload[];
}

export interface AncestorsResponse {
  trackingId: string;
  ancestors: AncestorStep[];
}

export interface LineageTreeResponse {
  submission: IdeaSubmission;
  parent: LineageEdge | null;
  children: LineageEdge[];
}

export interface TimeCapsuleResponse {
  ownerId: string;
  since: string | null;
  entries: TimeCapsuleEntry[];
}

export type QuestionTier = 'opening' | 'surface' | 'medium' | 'deep';

export interface NextQuestionResponse {
  ownerId: string;
  tier: QuestionTier;
  question: string;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
