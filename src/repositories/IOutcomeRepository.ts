/**
 * Outcome data access interface.
 * One live outcome per submission.
 */

import type { OutcomeRow } from '../types/database.js';

export type UpsertOutcomeInput = Omit<OutcomeRow, 'id'>;

export interface IOutcomeRepository {
  findBySubmission(submissionId: string): Promise<OutcomeRow | null>;

  findBySubmissions(submissionIds: string[]): Promise<OutcomeRow[]>;
}
