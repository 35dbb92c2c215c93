/**
 * Supabase implementation of IChainCommitRepository.
 * Each commit is a single call to a plpgsql function, so it runs in one
 * transaction. The functions take pg_advisory_xact_lock on every chain root
 * and raise CHAIN_MOVED_SQLSTATE, with the stale tracking id as DETAIL,
 * when the guard is stale.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  ChainGuard,
  CommitLinkInput,
  CommitLinkResult,
  CommitOutcomeInput,
  CommitOutcomeResult,
  IChainCommitRepository,
  LedgerReplacement,
} from './IChainCommitRepository.js';
import type { CreditLedgerRow, LineageEdgeRow, OutcomeRow } from '../types/database.js';
import { ChainMovedError } from '../errors.js';

export const CHAIN_MOVED_SQLSTATE = 'LN409';

interface LedgerReplacementPayload {
  source_descendant_id: string;
  entries: CreditLedgerRow[];
  retracted: CreditLedgerRow[];
}

function toLedgerReplacement(payload: LedgerReplacementPayload): LedgerReplacement {
  return {
    sourceDescendantId: payload.source_descendant_id,
    entries: payload.entries,
    retracted: payload.retracted,
  };
}

export class SupabaseChainCommitRepository implements IChainCommitRepository {
  constructor(private readonly db: SupabaseClient) {}

  async versions(roots: string[]): Promise<Map<string, number>> {
    const versions = new Map(roots.map((root) => [root, 0]));
    if (roots.length === 0) return versions;

    const { data, error } = await this.db
      .from('chain_versions')
      .select('root_id, version')
      .in('root_id', roots);

    if (error) throw new Error(`Failed to read chain versions: ${error.message}`);
    for (const row of (data ?? []) as Array<{ root_id: string; version: number }>) {
      versions.set(row.root_id, row.version);
    }
    return versions;
  }

  async commitOutcome(input: CommitOutcomeInput): Promise<CommitOutcomeResult> {
    const { data, error } = await this.db.rpc('commit_outcome', {
      p_chain: input.chain.map(toGuardPayload),
      p_outcome: input.outcome,
      p_credit: input.credit.entries,
    });

    if (error) this.fail('commit outcome', error);
    const payload = data as { outcome: OutcomeRow; ledger: LedgerReplacementPayload };
    return { outcome: payload.outcome, ledger: toLedgerReplacement(payload.ledger) };
  }

  async commitLink(input: CommitLinkInput): Promise<CommitLinkResult> {
    const { data, error } = await this.db.rpc('commit_link', {
      p_chain: input.chain.map(toGuardPayload),
      p_edge: input.edge,
      p_credit: input.credit.map((c) => ({
        source_descendant_id: c.sourceDescendantId,
        entries: c.entries,
      })),
    });

    if (error) this.fail('commit link', error);
    const payload = data as { edge: LineageEdgeRow; ledger: LedgerReplacementPayload[] };
    return { edge: payload.edge, ledger: payload.ledger.map(toLedgerReplacement) };
  }

  private fail(action: string, error: { code: string; message: string; details: string }): never {
    if (error.code === CHAIN_MOVED_SQLSTATE) {
      throw new ChainMovedError(error.details);
    }
    throw new Error(`Failed to ${action}: ${error.message}`);
  }
}

function toGuardPayload(guard: ChainGuard) {
  return { tracking_id: guard.trackingId, root: guard.root, version: guard.version };
}
