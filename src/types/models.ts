/**
 * Domain models: core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Submissions ──

export const SUBMISSION_STATUSES = ['submitted', 'validated', 'superseded'] as const;
export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

export interface IdeaSubmission {
  /** Shareable tracking code, e.g. IDEA-A3B9F2. */
  id: string;
  ownerId: string;
  text: string;
  confidence: number | null;
  /** Opaque tag from the classification collaborator; never interpreted here. */
  classification: string | null;
  status: SubmissionStatus;
  createdAt: Date;
}

// ── Lineage ──

export const REFINEMENT_TYPES = [
  'clarification',
  'technical_depth',
  'expansion',
  'pivot',
  'validation',
  'general_improvement',
] as const;
export type RefinementType = (typeof REFINEMENT_TYPES)[number];

export interface LineageEdge {
  id: string;
  parentId: string;
  childId: string;
  refinementType: RefinementType;
  depthIncrease: number;
  /** The prompt that led the owner to refine. */
  question: string | null;
  createdAt: Date;
}

export interface AncestorStep {
  /** Path distance from the starting submission; the direct parent is 1. */
  distance: number;
  ancestorId: string;
  edge: LineageEdge;
}

// ── Outcomes ──

export interface Outcome {
  id: string;
  submissionId: string;
  /** How right the idea turned out to be, 0..1. */
  result: number;
  validationSource: string;
  validationUrl: string | null;
  validationNotes: string | null;
  validatedAt: Date;
  daysElapsed: number;
  earlyBirdMultiplier: number;
  calibrationPenalty: number;
  accuracyScore: number;
}

export interface CreditLedgerEntry {
  /** Ancestor receiving the credit. */
  submissionId: string;
  sourceDescendantId: string;
  distance: number;
  creditedAmount: number;
  appliedAt: Date;
}

// ── Reputation ──

export interface UserAccuracyProfile {
  ownerId: string;
  totalSubmissions: number;
  totalValidations: number;
  accuracyRate: number;
  calibrationScore: number;
  reputationScore: number;
  meanDaysEarly: number;
  /** Sum of the owner's own outcome scores. */
  directScore: number;
  /** Sum of ledger credit earned by the owner's submissions. */
  inheritedCredit: number;
  depthLevel: number;
  lastValidationAt: Date | null;
  updatedAt: Date;
}

export interface TimeCapsuleEntry {
  submission: IdeaSubmission;
  outcome: Outcome | null;
  accuracyScore: number | null;
  parent: LineageEdge | null;
  childCount: number;
  inheritedCredit: number;
}

// ── Guards ──

export function isSubmissionStatus(value: string): value is SubmissionStatus {
  return (SUBMISSION_STATUSES as readonly string[]).includes(value);
}

export function isRefinementType(value: string): value is RefinementType {
  return (REFINEMENT_TYPES as readonly string[]).includes(value);
}
