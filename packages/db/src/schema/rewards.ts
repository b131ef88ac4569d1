import { relations, sql } from 'drizzle-orm';
import {
  check,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  uuid
} from 'drizzle-orm/pg-core';
import { tournaments } from './tournaments.js';

export const skillRewardSourceEnum = pgEnum('skill_reward_source', ['TOURNAMENT', 'TRAINING', 'ASSESSMENT', 'ADJUSTMENT']);

export const badgeCategoryEnum = pgEnum('badge_category', ['PLACEMENT', 'PARTICIPATION', 'MILESTONE', 'ACHIEVEMENT']);

export const badgeRarityEnum = pgEnum('badge_rarity', ['COMMON', 'UNCOMMON', 'RARE', 'EPIC', 'LEGENDARY']);

export const tournamentParticipations = pgTable(
  'tournament_participations',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userId: text('user_id').notNull(),
    tournamentId: text('tournament_id')
      .notNull()
      .references(() => tournaments.id, { onDelete: 'cascade' }),
    placement: integer('placement').notNull(),
    skillPoints: jsonb('skill_points').$type<Record<string, number>>().notNull().default(sql`'{}'::jsonb`),
    baseXp: integer('base_xp').notNull(),
    bonusXp: integer('bonus_xp').notNull(),
    totalXp: integer('total_xp').notNull(),
    credits: integer('credits').notNull(),
    distributedAt: timestamp('distributed_at', { withTimezone: true }).notNull(),
    distributedBy: text('distributed_by'),
    redistributionCount: integer('redistribution_count').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    userTournamentUnique: uniqueIndex('tournament_participations_user_tournament_unique').on(
      table.userId,
      table.tournamentId
    ),
    tournamentIdx: index('tournament_participations_tournament_idx').on(table.tournamentId),
    placementPositive: check('tournament_participations_placement_positive', sql`${table.placement} > 0`),
    xpConsistent: check(
      'tournament_participations_xp_consistent',
      sql`${table.totalXp} = ${table.baseXp} + ${table.bonusXp}`
    )
  })
);

// Append-only: an UPDATE trigger is installed by the migration.
export const skillRewards = pgTable(
  'skill_rewards',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userId: text('user_id').notNull(),
    sourceType: skillRewardSourceEnum('source_type').notNull(),
    sourceId: text('source_id').notNull(),
    skillName: text('skill_name').notNull(),
    pointsAwarded: doublePrecision('points_awarded').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    userSkillIdx: index('skill_rewards_user_skill_idx').on(table.userId, table.skillName),
    sourceIdx: index('skill_rewards_source_idx').on(table.sourceType, table.sourceId),
    pointsNonZero: check('skill_rewards_points_non_zero', sql`${table.pointsAwarded} <> 0`)
  })
);

export const tournamentBadges = pgTable(
  'tournament_badges',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userId: text('user_id').notNull(),
    tournamentId: text('tournament_id')
      .notNull()
      .references(() => tournaments.id, { onDelete: 'cascade' }),
    badgeType: text('badge_type').notNull(),
    category: badgeCategoryEnum('category').notNull(),
    title: text('title').notNull(),
    description: text('description'),
    icon: text('icon').notNull(),
    rarity: badgeRarityEnum('rarity').notNull(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default(sql`'{}'::jsonb`),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    userTournamentTypeUnique: uniqueIndex('tournament_badges_user_tournament_type_unique').on(
      table.userId,
      table.tournamentId,
      table.badgeType
    ),
    userCreatedIdx: index('tournament_badges_user_created_idx').on(table.userId, table.createdAt.desc())
  })
);

export const userSkillBaselines = pgTable(
  'user_skill_baselines',
  {
    userId: text('user_id').notNull(),
    skillName: text('skill_name').notNull(),
    baseline: doublePrecision('baseline').notNull(),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    compositePk: primaryKey({ columns: [table.userId, table.skillName], name: 'user_skill_baselines_pkey' }),
    baselineRange: check('user_skill_baselines_range', sql`${table.baseline} BETWEEN 0 AND 100`)
  })
);

export const tournamentParticipationRelations = relations(tournamentParticipations, ({ one }) => ({
  tournament: one(tournaments, {
    fields: [tournamentParticipations.tournamentId],
    references: [tournaments.id]
  })
}));

export const tournamentBadgeRelations = relations(tournamentBadges, ({ one }) => ({
  tournament: one(tournaments, {
    fields: [tournamentBadges.tournamentId],
    references: [tournaments.id]
  })
}));

export type TournamentParticipation = typeof tournamentParticipations.$inferSelect;
export type NewTournamentParticipation = typeof tournamentParticipations.$inferInsert;
export type SkillReward = typeof skillRewards.$inferSelect;
export type NewSkillReward = typeof skillRewards.$inferInsert;
export type TournamentBadge = typeof tournamentBadges.$inferSelect;
export type NewTournamentBadge = typeof tournamentBadges.$inferInsert;
export type UserSkillBaseline = typeof userSkillBaselines.$inferSelect;
export type SkillRewardSource = (typeof skillRewardSourceEnum.enumValues)[number];
export type BadgeCategoryValue = (typeof badgeCategoryEnum.enumValues)[number];
export type BadgeRarityValue = (typeof badgeRarityEnum.enumValues)[number];
