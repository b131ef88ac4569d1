import { and, asc, eq, sql } from 'drizzle-orm';
import type { DrizzleExecutor, DrizzleTransaction } from '../adapters/connection.js';
import type { DbSchema } from '../schema/index.js';
import {
  skillRewards,
  userSkillBaselines,
  type SkillReward,
  type SkillRewardSource
} from '../schema/rewards.js';

export interface SkillRewardWrite {
  userId: string;
  sourceType: SkillRewardSource;
  sourceId: string;
  skillName: string;
  pointsAwarded: number;
}

export interface SkillRewardSourceParams {
  userId: string;
  sourceType: SkillRewardSource;
  sourceId: string;
}

/** Ledger rows are only ever appended; zero deltas are dropped before the write. */
export async function appendSkillRewards(
  tx: DrizzleTransaction<DbSchema>,
  rows: readonly SkillRewardWrite[]
): Promise<number> {
  const entries = rows.filter((row) => row.pointsAwarded !== 0);
  if (entries.length === 0) {
    return 0;
  }

  const inserted = await tx.insert(skillRewards).values(entries).returning({ id: skillRewards.id });
  return inserted.length;
}

export async function listSkillRewardsForSource(
  db: DrizzleExecutor<DbSchema>,
  params: SkillRewardSourceParams
): Promise<SkillReward[]> {
  return db
    .select()
    .from(skillRewards)
    .where(
      and(
        eq(skillRewards.userId, params.userId),
        eq(skillRewards.sourceType, params.sourceType),
        eq(skillRewards.sourceId, params.sourceId)
      )
    )
    .orderBy(asc(skillRewards.createdAt), asc(skillRewards.skillName));
}

export async function sumSkillRewardsBySkill(
  db: DrizzleExecutor<DbSchema>,
  userId: string
): Promise<Record<string, number>> {
  const rows = await db
    .select({
      skillName: skillRewards.skillName,
      total: sql<number>`coalesce(sum(${skillRewards.pointsAwarded}), 0)`.mapWith(Number)
    })
    .from(skillRewards)
    .where(eq(skillRewards.userId, userId))
    .groupBy(skillRewards.skillName);

  return Object.fromEntries(rows.map((row) => [row.skillName, row.total]));
}

export async function listSkillBaselines(
  db: DrizzleExecutor<DbSchema>,
  userId: string
): Promise<Record<string, number>> {
  const rows = await db
    .select({ skillName: userSkillBaselines.skillName, baseline: userSkillBaselines.baseline })
    .from(userSkillBaselines)
    .where(eq(userSkillBaselines.userId, userId));

  return Object.fromEntries(rows.map((row) => [row.skillName, row.baseline]));
}
