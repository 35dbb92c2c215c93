/**
 * Profile data access interface.
 * Profiles are a derived cache; the aggregator can rebuild them at any time.
 */

import type { ProfileRow } from '../types/database.js';

export interface IProfileRepository {
  upsert(row: ProfileRow): Promise<ProfileRow>;

  findByOwner(ownerId: string): Promise<ProfileRow | null>;
}
