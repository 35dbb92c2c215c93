/**
 * In-memory mock for ILineageRepository.
 * Enforces one parent per child like the unique index does.
 */

import type {
  ILineageRepository,
  InsertLineageEdgeInput,
} from '../../src/repositories/ILineageRepository.js';
import type { LineageEdgeRow } from '../../src/types/database.js';

export class MockLineageRepository implements ILineageRepository {
  private edges: LineageEdgeRow[] = [];
  private nextId = 1;

  async findParentEdge(childId: string): Promise<LineageEdgeRow | null> {
    const edge = this.edges.find((e) => e.child_id === childId);
    return edge ? { ...edge } : null;
  }

  async findChildren(parentId: string): Promise<LineageEdgeRow[]> {
    return this.edges.filter((e) => e.parent_id === parentId).map((e) => ({ ...e }));
  }

  async findByChildIds(childIds: string[]): Promise<LineageEdgeRow[]> {
    const wanted = new Set(childIds);
    return this.edges.filter((e) => wanted.has(e.child_id)).map((e) => ({ ...e }));
  }

  /** Insert an edge. Rejects a second parent like the unique index does. */
  add(input: InsertLineageEdgeInput): LineageEdgeRow {
    if (this.hasParent(input.child_id)) {
      throw new Error(`Failed to insert lineage edge: ${input.child_id} already has a parent`);
    }
    const row: LineageEdgeRow = { ...input, id: `edge-${this.nextId++}` };
    this.edges.push(row);
    return { ...row };
  }

  hasParent(childId: string): boolean {
    return this.edges.some((e) => e.child_id === childId);
  }

  /** Root of the chain holding `id`. Stops on a stored cycle. */
  rootOf(id: string): string {
    const seen = new Set<string>();
    let current = id;
    while (!seen.has(current)) {
      seen.add(current);
      const edge = this.edges.find((e) => e.child_id === current);
      if (!edge) return current;
      current = edge.parent_id;
    }
    return current;
  }

  /** Test helper: insert an edge without any checks (e.g. a corrupt cycle). */
  seed(row: LineageEdgeRow): void {
    this.edges.push({ ...row });
  }

  get count(): number {
    return this.edges.length;
  }

  clear(): void {
    this.edges = [];
    this.nextId = 1;
  }
}
