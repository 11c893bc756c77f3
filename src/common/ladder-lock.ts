import { EntityManager } from 'typeorm';

export const LADDER_LOCK_KEY = 741_205;

/**
 * Transaction-scoped advisory lock shared by every ladder write: match
 * recording, season transitions and both replays. Released on commit or
 * rollback.
 */
export async function acquireLadderLock(manager: EntityManager) {
  await manager.query('SELECT pg_advisory_xact_lock($1)', [LADDER_LOCK_KEY]);
}
