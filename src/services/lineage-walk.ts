/**
 * Bounded ancestor walk shared by the lineage graph and the
 * backpropagation engine.
 */

import type { ILineageRepository } from '../repositories/ILineageRepository.js';
import type { AncestorStep } from '../types/models.js';
import { toLineageEdge } from '../types/mappers.js';
import { TruncatedError } from '../errors.js';
import { lazySequence } from './sequence.js';

export const DEFAULT_ANCESTOR_LIMIT = 1000;

/** All a walk reads. Lets a caller walk a tree with an edge not yet stored. */
export type ParentLookup = Pick<ILineageRepository, 'findParentEdge'>;

/**
 * Walk from `startId` to its root, one edge per step, nearest parent first.
 * Throws TruncatedError instead of following more than `limit` edges.
 */
export function walkAncestors(
  lineageRepo: ParentLookup,
  startId: string,
  limit: number = DEFAULT_ANCESTOR_LIMIT
): AsyncIterable<AncestorStep> {
  return lazySequence(async function* () {
    let currentId = startId;
    for (let distance = 1; ; distance++) {
      const row = await lineageRepo.findParentEdge(currentId);
      if (!row) return;
      if (distance > limit) throw new TruncatedError(startId, limit);

      const edge = toLineageEdge(row);
      yield { distance, ancestorId: edge.parentId, edge };
      currentId = edge.parentId;
    }
  });
}
