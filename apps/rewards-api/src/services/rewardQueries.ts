import type { Logger } from 'pino';
import {
  buildBadgeShowcase,
  buildSkillProfile,
  notFoundError,
  type AwardedBadge,
  type BadgeShowcase,
  type SkillProfile
} from '@podium/engine';
import type { RewardReader, SkillReward, TournamentBadge, TournamentParticipation } from '@podium/db';

export interface UserTournamentReward {
  participation: TournamentParticipation;
  /** Ledger rows sourced from this tournament, including redistribution offsets. */
  skillPoints: SkillReward[];
  badges: TournamentBadge[];
}

export interface RewardQueriesDependencies {
  reader: RewardReader;
  logger: Logger;
}

export interface RewardQueries {
  getUserReward(tournamentId: string, userId: string): Promise<UserTournamentReward>;
  getUserBadgeShowcase(userId: string): Promise<BadgeShowcase>;
  getUserSkillProfile(userId: string): Promise<SkillProfile>;
}

const toAwardedBadge = (badge: TournamentBadge): AwardedBadge => ({
  id: badge.id,
  userId: badge.userId,
  tournamentId: badge.tournamentId,
  badgeType: badge.badgeType,
  category: badge.category,
  title: badge.title,
  description: badge.description,
  icon: badge.icon,
  rarity: badge.rarity,
  metadata: badge.metadata,
  createdAt: badge.createdAt
});

export const createRewardQueries = (dependencies: RewardQueriesDependencies): RewardQueries => {
  const { reader, logger } = dependencies;

  const getUserReward = async (tournamentId: string, userId: string): Promise<UserTournamentReward> => {
    const participation = await reader.findParticipation(tournamentId, userId);
    if (!participation) {
      throw notFoundError(`User ${userId} has no reward for tournament ${tournamentId}`, { tournamentId, userId });
    }

    const skillPoints = await reader.listSkillRewardsForSource({
      userId,
      sourceType: 'TOURNAMENT',
      sourceId: tournamentId
    });
    const badges = await reader.listTournamentBadges(tournamentId, [userId]);

    return { participation, skillPoints, badges };
  };

  const getUserBadgeShowcase = async (userId: string): Promise<BadgeShowcase> => {
    const badges = await reader.listUserBadges(userId);
    return buildBadgeShowcase(badges.map(toAwardedBadge));
  };

  const getUserSkillProfile = async (userId: string): Promise<SkillProfile> => {
    const baselines = await reader.listSkillBaselines(userId);
    const history = await reader.listPlacementHistory(userId);
    const ledgerTotals = await reader.sumSkillRewardsBySkill(userId);

    const profile = buildSkillProfile({
      baselines,
      ledgerTotals,
      history: history.map((row) => ({
        tournamentId: row.tournamentId,
        placement: row.placement,
        totalParticipants: row.totalParticipants,
        distributedAt: row.distributedAt,
        skills: Object.entries(row.skillPoints)
          .filter(([, points]) => points > 0)
          .map(([skill]) => skill)
      }))
    });

    logger.debug({ userId, skills: Object.keys(profile.skills).length }, 'skill profile built');
    return profile;
  };

  return { getUserReward, getUserBadgeShowcase, getUserSkillProfile };
};
