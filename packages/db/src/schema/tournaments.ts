import { relations, sql } from 'drizzle-orm';
import {
  check,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid
} from 'drizzle-orm/pg-core';

export const tournamentStatusEnum = pgEnum('tournament_status', [
  'IN_PROGRESS',
  'COMPLETED',
  'REWARDS_DISTRIBUTED',
  'CANCELLED'
]);

export const tournaments = pgTable(
  'tournaments',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    status: tournamentStatusEnum('status').notNull().default('IN_PROGRESS'),
    rewardTemplate: text('reward_template'),
    rewardPolicy: jsonb('reward_policy'),
    rewardsDistributedAt: timestamp('rewards_distributed_at', { withTimezone: true }),
    rewardsDistributedBy: text('rewards_distributed_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    statusIdx: index('tournaments_status_idx').on(table.status)
  })
);

export const tournamentRankings = pgTable(
  'tournament_rankings',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    tournamentId: text('tournament_id')
      .notNull()
      .references(() => tournaments.id, { onDelete: 'cascade' }),
    userId: text('user_id').notNull(),
    placement: integer('placement').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    tournamentUserUnique: uniqueIndex('tournament_rankings_tournament_user_unique').on(table.tournamentId, table.userId),
    placementPositive: check('tournament_rankings_placement_positive', sql`${table.placement} > 0`)
  })
);

export const tournamentRelations = relations(tournaments, ({ many }) => ({
  rankings: many(tournamentRankings)
}));

export const tournamentRankingRelations = relations(tournamentRankings, ({ one }) => ({
  tournament: one(tournaments, {
    fields: [tournamentRankings.tournamentId],
    references: [tournaments.id]
  })
}));

export type Tournament = typeof tournaments.$inferSelect;
export type NewTournament = typeof tournaments.$inferInsert;
export type TournamentRanking = typeof tournamentRankings.$inferSelect;
export type NewTournamentRanking = typeof tournamentRankings.$inferInsert;
export type TournamentStatus = (typeof tournamentStatusEnum.enumValues)[number];
