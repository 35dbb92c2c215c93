/**
 * Chain write interface.
 * Every write that touches a lineage chain lands through one of these
 * commits. A commit holds the lock of each chain root named in its guard,
 * checks that no other writer moved or bumped those chains since the caller
 * planned the write, then applies everything in one transaction. A stale
 * guard fails with ChainMovedError and nothing is written.
 */

import type { CreditLedgerInput } from './ICreditLedgerRepository.js';
import type { InsertLineageEdgeInput } from './ILineageRepository.js';
import type { UpsertOutcomeInput } from './IOutcomeRepository.js';
import type { CreditLedgerRow, LineageEdgeRow, OutcomeRow } from '../types/database.js';

/** A submission with the root and version its chain had when the write was planned. */
export interface ChainGuard {
  trackingId: string;
  root: string;
  version: number;
}

/** New ledger entries for one validated descendant. */
export interface LedgerReplacementInput {
  sourceDescendantId: string;
  entries: CreditLedgerInput[];
}

export interface LedgerReplacement {
  sourceDescendantId: string;
  entries: CreditLedgerRow[];
  /** The entries this replacement retracted. */
  retracted: CreditLedgerRow[];
}

export interface CommitOutcomeInput {
  chain: ChainGuard[];
  outcome: UpsertOutcomeInput;
  credit: LedgerReplacementInput;
}

export interface CommitOutcomeResult {
  outcome: OutcomeRow;
  ledger: LedgerReplacement;
}

export interface CommitLinkInput {
  chain: ChainGuard[];
  edge: InsertLineageEdgeInput;
  credit: LedgerReplacementInput[];
}

export interface CommitLinkResult {
  edge: LineageEdgeRow;
  ledger: LedgerReplacement[];
}

export interface IChainCommitRepository {
  /** Current version of each root. A root nobody has written to is at 0. */
  versions(roots: string[]): Promise<Map<string, number>>;

  /**
   * Upsert the outcome (a replaced outcome keeps its id), replace the
   * submission's ledger entries and mark it validated.
   */
  commitOutcome(input: CommitOutcomeInput): Promise<CommitOutcomeResult>;

  /**
   * Insert the edge, supersede the parent if it is still submitted and
   * replace the ledger of every descendant the graft re-planned.
   */
  commitLink(input: CommitLinkInput): Promise<CommitLinkResult>;
}
