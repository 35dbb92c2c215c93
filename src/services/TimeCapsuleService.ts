/**
 * Time capsule.
 * Read-only, oldest-first view of an owner's ideas with how each one
 * played out: its outcome, where it came from, how often it was refined
 * and what credit its descendants sent back.
 */

import type { ICreditLedgerRepository } from '../repositories/ICreditLedgerRepository.js';
import type { ILineageRepository } from '../repositories/ILineageRepository.js';
import type { IOutcomeRepository } from '../repositories/IOutcomeRepository.js';
import type { ISubmissionRepository } from '../repositories/ISubmissionRepository.js';
import type { TimeCapsuleEntry } from '../types/models.js';
import { toLineageEdge, toOutcome, toSubmission } from '../types/mappers.js';
import { lazySequence } from './sequence.js';

export class TimeCapsuleService {
  constructor(
    private readonly submissionRepo: ISubmissionRepository,
    private readonly outcomeRepo: IOutcomeRepository,
    private readonly lineageRepo: ILineageRepository,
    private readonly ledgerRepo: ICreditLedgerRepository
  ) {}

  /**
   * Entries are fetched one submission at a time as the sequence is
   * consumed. An unknown owner yields nothing.
   */
  get(ownerId: string, since?: Date): AsyncIterable<TimeCapsuleEntry> {
    const { submissionRepo, outcomeRepo, lineageRepo, ledgerRepo } = this;

    return lazySequence(async function* () {
      const rows = await submissionRepo.findByOwner(ownerId, { since: since?.toISOString() });

      for (const row of rows) {
        const submission = toSubmission(row);
        const [outcomeRow, parentRow, children, credits] = await Promise.all([
          outcomeRepo.findBySubmission(submission.id),
          lineageRepo.findParentEdge(submission.id),
          lineageRepo.findChildren(submission.id),
          ledgerRepo.findBySubmissions([submission.id]),
        ]);
        const outcome = outcomeRow ? toOutcome(outcomeRow) : null;

        yield {
          submission,
          outcome,
          accuracyScore: outcome?.accuracyScore ?? null,
          parent: parentRow ? toLineageEdge(parentRow) : null,
          childCount: children.length,
          inheritedCredit: credits.reduce((acc, c) => acc + c.credited_amount, 0),
        };
      }
    });
  }
}
