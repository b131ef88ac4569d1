import { and, asc, count, eq, inArray, ne, sql } from 'drizzle-orm';
import type { DrizzleExecutor, DrizzleTransaction } from '../adapters/connection.js';
import { DbError, DbErrorCode } from '../instrumentation/metrics.js';
import type { DbSchema } from '../schema/index.js';
import { tournamentParticipations, type TournamentParticipation } from '../schema/rewards.js';

export interface ParticipationWrite {
  userId: string;
  tournamentId: string;
  placement: number;
  skillPoints: Record<string, number>;
  baseXp: number;
  bonusXp: number;
  totalXp: number;
  credits: number;
  distributedAt: Date;
  distributedBy: string | null;
}

export interface PlacementHistoryRow {
  tournamentId: string;
  placement: number;
  totalParticipants: number;
  skillPoints: Record<string, number>;
  distributedAt: Date;
}

export async function listParticipations(
  db: DrizzleExecutor<DbSchema>,
  tournamentId: string,
  userIds?: readonly string[]
): Promise<TournamentParticipation[]> {
  if (userIds && userIds.length === 0) {
    return [];
  }

  const byTournament = eq(tournamentParticipations.tournamentId, tournamentId);
  return db
    .select()
    .from(tournamentParticipations)
    .where(userIds ? and(byTournament, inArray(tournamentParticipations.userId, [...userIds])) : byTournament)
    .orderBy(asc(tournamentParticipations.placement), asc(tournamentParticipations.userId));
}

export async function findParticipation(
  db: DrizzleExecutor<DbSchema>,
  tournamentId: string,
  userId: string
): Promise<TournamentParticipation | null> {
  const [row] = await db
    .select()
    .from(tournamentParticipations)
    .where(and(eq(tournamentParticipations.tournamentId, tournamentId), eq(tournamentParticipations.userId, userId)))
    .limit(1);
  return row ?? null;
}

/** Plain insert: a concurrent writer that got here first surfaces as a unique violation. */
export async function insertParticipation(
  tx: DrizzleTransaction<DbSchema>,
  params: ParticipationWrite
): Promise<TournamentParticipation> {
  const [row] = await tx.insert(tournamentParticipations).values(params).returning();
  if (!row) {
    throw new DbError(DbErrorCode.INTERNAL_ERROR, 'Participation insert returned no row', {
      detail: { reason: 'unclassified_error', context: { userId: params.userId, tournamentId: params.tournamentId } }
    });
  }
  return row;
}

export async function replaceParticipation(
  tx: DrizzleTransaction<DbSchema>,
  params: ParticipationWrite
): Promise<TournamentParticipation> {
  const [row] = await tx
    .insert(tournamentParticipations)
    .values(params)
    .onConflictDoUpdate({
      target: [tournamentParticipations.userId, tournamentParticipations.tournamentId],
      set: {
        placement: params.placement,
        skillPoints: params.skillPoints,
        baseXp: params.baseXp,
        bonusXp: params.bonusXp,
        totalXp: params.totalXp,
        credits: params.credits,
        distributedAt: params.distributedAt,
        distributedBy: params.distributedBy,
        redistributionCount: sql`${tournamentParticipations.redistributionCount} + 1`,
        updatedAt: sql`now()`
      }
    })
    .returning();

  if (!row) {
    throw new DbError(DbErrorCode.INTERNAL_ERROR, 'Participation upsert returned no row');
  }
  return row;
}

/** Rewarded tournaments per user, leaving one tournament out. */
export async function countPriorParticipations(
  db: DrizzleExecutor<DbSchema>,
  userIds: readonly string[],
  excludingTournamentId: string
): Promise<Map<string, number>> {
  if (userIds.length === 0) {
    return new Map();
  }

  const rows = await db
    .select({ userId: tournamentParticipations.userId, total: count() })
    .from(tournamentParticipations)
    .where(
      and(
        inArray(tournamentParticipations.userId, [...userIds]),
        ne(tournamentParticipations.tournamentId, excludingTournamentId)
      )
    )
    .groupBy(tournamentParticipations.userId);

  return new Map(rows.map((row) => [row.userId, row.total]));
}

export async function listPlacementHistory(
  db: DrizzleExecutor<DbSchema>,
  userId: string
): Promise<PlacementHistoryRow[]> {
  const fieldSizes = db
    .select({ tournamentId: tournamentParticipations.tournamentId, total: count().as('total') })
    .from(tournamentParticipations)
    .groupBy(tournamentParticipations.tournamentId)
    .as('field_sizes');

  return db
    .select({
      tournamentId: tournamentParticipations.tournamentId,
      placement: tournamentParticipations.placement,
      totalParticipants: fieldSizes.total,
      skillPoints: tournamentParticipations.skillPoints,
      distributedAt: tournamentParticipations.distributedAt
    })
    .from(tournamentParticipations)
    .innerJoin(fieldSizes, eq(fieldSizes.tournamentId, tournamentParticipations.tournamentId))
    .where(eq(tournamentParticipations.userId, userId))
    .orderBy(asc(tournamentParticipations.distributedAt));
}
