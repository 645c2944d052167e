import type { Database } from '../infrastructure/db/index.js';
import { findArchivedRuns } from '../infrastructure/db/index.js';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export interface ListArchivedRunsParams {
  limit?: number;
}

/**
 * Use case: archived runs of one entity, newest first.
 * Clamps limit to [1, 100], defaults to 20.
 */
export async function listArchivedRuns(db: Database, entityId: string, params: ListArchivedRunsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);

  const data = await findArchivedRuns(db, entityId, limit);

  return {
    entity_id: entityId,
    data,
    pagination: { limit, count: data.length },
  };
}
