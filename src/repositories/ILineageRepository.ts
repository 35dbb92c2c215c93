/**
 * Lineage data access interface.
 * Handles persistence of parent → child refinement edges.
 */

import type { LineageEdgeRow } from '../types/database.js';

export type InsertLineageEdgeInput = Omit<LineageEdgeRow, 'id'>;

export interface ILineageRepository {
  /** The single edge pointing at childId, if any. */
  findParentEdge(childId: string): Promise<LineageEdgeRow | null>;

  /** Edges whose parent is parentId, oldest first. */
  findChildren(parentId: string): Promise<LineageEdgeRow[]>;

  /** Edges whose child is one of childIds. */
  findByChildIds(childIds: string[]): Promise<LineageEdgeRow[]>;
}
