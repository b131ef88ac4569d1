import { asc, eq, sql } from 'drizzle-orm';
import type { DrizzleExecutor, DrizzleTransaction } from '../adapters/connection.js';
import { DbError, DbErrorCode } from '../instrumentation/metrics.js';
import type { DbSchema } from '../schema/index.js';
import { tournamentRankings, tournaments, type Tournament } from '../schema/tournaments.js';

export interface RankingEntry {
  userId: string;
  placement: number;
}

export interface MarkRewardsDistributedParams {
  tournamentId: string;
  distributedAt: Date;
  distributedBy: string | null;
}

export async function findTournament(db: DrizzleExecutor<DbSchema>, tournamentId: string): Promise<Tournament | null> {
  const [row] = await db.select().from(tournaments).where(eq(tournaments.id, tournamentId)).limit(1);
  return row ?? null;
}

/**
 * Row-locks the tournament for the rest of the transaction. Concurrent
 * distributions for the same tournament queue here.
 */
export async function lockTournament(tx: DrizzleTransaction<DbSchema>, tournamentId: string): Promise<Tournament> {
  const [row] = await tx.select().from(tournaments).where(eq(tournaments.id, tournamentId)).limit(1).for('update');

  if (!row) {
    throw new DbError(DbErrorCode.NOT_FOUND, `Tournament ${tournamentId} not found`, {
      detail: { reason: 'record_missing', context: { tournamentId } }
    });
  }

  return row;
}

export async function markRewardsDistributed(
  tx: DrizzleTransaction<DbSchema>,
  params: MarkRewardsDistributedParams
): Promise<Tournament> {
  const [row] = await tx
    .update(tournaments)
    .set({
      status: 'REWARDS_DISTRIBUTED',
      rewardsDistributedAt: params.distributedAt,
      rewardsDistributedBy: params.distributedBy,
      updatedAt: sql`now()`
    })
    .where(eq(tournaments.id, params.tournamentId))
    .returning();

  if (!row) {
    throw new DbError(DbErrorCode.NOT_FOUND, `Tournament ${params.tournamentId} not found`, {
      detail: { reason: 'record_missing', context: { tournamentId: params.tournamentId } }
    });
  }

  return row;
}

export async function listRankings(db: DrizzleExecutor<DbSchema>, tournamentId: string): Promise<RankingEntry[]> {
  return db
    .select({ userId: tournamentRankings.userId, placement: tournamentRankings.placement })
    .from(tournamentRankings)
    .where(eq(tournamentRankings.tournamentId, tournamentId))
    .orderBy(asc(tournamentRankings.placement), asc(tournamentRankings.userId));
}
