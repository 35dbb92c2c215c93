/**
 * In-memory mock for IOutcomeRepository.
 * Keyed by submission id; a replaced outcome keeps its id.
 */

import type {
  IOutcomeRepository,
  UpsertOutcomeInput,
} from '../../src/repositories/IOutcomeRepository.js';
import type { OutcomeRow } from '../../src/types/database.js';

export class MockOutcomeRepository implements IOutcomeRepository {
  private outcomes = new Map<string, OutcomeRow>();
  private nextId = 1;

  /** Insert or replace the outcome of a submission. */
  put(input: UpsertOutcomeInput): OutcomeRow {
    const existing = this.outcomes.get(input.submission_id);
    const row: OutcomeRow = { ...input, id: existing?.id ?? `outcome-${this.nextId++}` };
    this.outcomes.set(input.submission_id, row);
    return { ...row };
  }

  async findBySubmission(submissionId: string): Promise<OutcomeRow | null> {
    const row = this.outcomes.get(submissionId);
    return row ? { ...row } : null;
  }

  async findBySubmissions(submissionIds: string[]): Promise<OutcomeRow[]> {
    return submissionIds.flatMap((id) => {
      const row = this.outcomes.get(id);
      return row ? [{ ...row }] : [];
    });
  }

  get count(): number {
    return this.outcomes.size;
  }

  clear(): void {
    this.outcomes.clear();
    this.nextId = 1;
  }
}
