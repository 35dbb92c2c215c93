/**
 * Submission data access interface.
 * Submissions are immutable apart from their status, which only moves
 * inside a chain commit.
 */

import type { SubmissionRow } from '../types/database.js';

export interface ISubmissionRepository {
  /** Insert a new submission. Rejects if the id is already taken. */
  insert(row: SubmissionRow): Promise<SubmissionRow>;

  findById(id: string): Promise<SubmissionRow | null>;

  findByIds(ids: string[]): Promise<SubmissionRow[]>;

  /** All submissions of an owner, oldest first (ties by id). */
  findByOwner(ownerId: string, options?: { since?: string }): Promise<SubmissionRow[]>;
}
