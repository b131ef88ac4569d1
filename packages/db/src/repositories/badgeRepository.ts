import { and, count, desc, eq, inArray, ne } from 'drizzle-orm';
import type { DrizzleExecutor, DrizzleTransaction } from '../adapters/connection.js';
import type { DbSchema } from '../schema/index.js';
import {
  tournamentBadges,
  type BadgeCategoryValue,
  type BadgeRarityValue,
  type TournamentBadge
} from '../schema/rewards.js';

export interface BadgeWrite {
  userId: string;
  tournamentId: string;
  badgeType: string;
  category: BadgeCategoryValue;
  title: string;
  description: string | null;
  icon: string;
  rarity: BadgeRarityValue;
  metadata: Record<string, unknown>;
}

/**
 * Inserts badges, silently keeping any (user, tournament, type) that already
 * exists. Returns only the rows written by this call.
 */
export async function insertBadges(
  tx: DrizzleTransaction<DbSchema>,
  badges: readonly BadgeWrite[]
): Promise<TournamentBadge[]> {
  if (badges.length === 0) {
    return [];
  }

  return tx
    .insert(tournamentBadges)
    .values(badges.map((badge) => ({ ...badge, metadata: { ...badge.metadata } })))
    .onConflictDoNothing({
      target: [tournamentBadges.userId, tournamentBadges.tournamentId, tournamentBadges.badgeType]
    })
    .returning();
}

export async function listTournamentBadges(
  db: DrizzleExecutor<DbSchema>,
  tournamentId: string,
  userIds?: readonly string[]
): Promise<TournamentBadge[]> {
  if (userIds && userIds.length === 0) {
    return [];
  }

  const byTournament = eq(tournamentBadges.tournamentId, tournamentId);
  return db
    .select()
    .from(tournamentBadges)
    .where(userIds ? and(byTournament, inArray(tournamentBadges.userId, [...userIds])) : byTournament)
    .orderBy(desc(tournamentBadges.createdAt));
}

export async function listUserBadges(db: DrizzleExecutor<DbSchema>, userId: string): Promise<TournamentBadge[]> {
  return db
    .select()
    .from(tournamentBadges)
    .where(eq(tournamentBadges.userId, userId))
    .orderBy(desc(tournamentBadges.createdAt));
}

/** Badges of the given types per user, leaving one tournament out. Users and types without a badge are absent. */
export async function countPriorBadges(
  db: DrizzleExecutor<DbSchema>,
  userIds: readonly string[],
  badgeTypes: readonly string[],
  excludingTournamentId: string
): Promise<Map<string, Record<string, number>>> {
  if (userIds.length === 0 || badgeTypes.length === 0) {
    return new Map();
  }

  const rows = await db
    .select({ userId: tournamentBadges.userId, badgeType: tournamentBadges.badgeType, total: count() })
    .from(tournamentBadges)
    .where(
      and(
        inArray(tournamentBadges.userId, [...userIds]),
        inArray(tournamentBadges.badgeType, [...badgeTypes]),
        ne(tournamentBadges.tournamentId, excludingTournamentId)
      )
    )
    .groupBy(tournamentBadges.userId, tournamentBadges.badgeType);

  const counts = new Map<string, Record<string, number>>();
  for (const row of rows) {
    counts.set(row.userId, { ...counts.get(row.userId), [row.badgeType]: row.total });
  }
  return counts;
}
