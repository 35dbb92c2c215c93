/**
 * Database row types: mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface SubmissionRow {
  id: string;
  owner_id: string;
  text: string;
  confidence: number | null;
  classification: string | null;
  status: string;
  created_at: string;
}

export interface LineageEdgeRow {
  id: string;
  parent_id: string;
  child_id: string;
  refinement_type: string;
  depth_increase: number;
  question: string | null;
  created_at: string;
}

export interface OutcomeRow {
  id: string;
  submission_id: string;
  result: number;
  validation_source: string;
  validation_url: string | null;
  validation_notes: string | null;
  validated_at: string;
  days_elapsed: number;
  early_bird_multiplier: number;
  calibration_penalty: number;
  accuracy_score: number;
}

export interface CreditLedgerRow {
  id: string;
  submission_id: string;
  source_descendant_id: string;
  distance: number;
  credited_amount: number;
  applied_at: string;
}

export interface ProfileRow {
  owner_id: string;
  total_submissions: number;
  total_validations: number;
  accuracy_rate: number;
  calibration_score: number;
  reputation_score: number;
  mean_days_early: number;
  direct_score: number;
  inherited_credit: number;
  depth_level: number;
  last_validation_at: string | null;
  updated_at: string;
}
