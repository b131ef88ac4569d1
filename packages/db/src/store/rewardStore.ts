import type { MarkRewardsDistributedParams, RankingEntry } from '../repositories/tournamentRepository.js';
import type { ParticipationWrite, PlacementHistoryRow } from '../repositories/participationRepository.js';
import type { SkillRewardSourceParams, SkillRewardWrite } from '../repositories/skillRewardRepository.js';
import type { BadgeWrite } from '../repositories/badgeRepository.js';
import type { SkillReward, TournamentBadge, TournamentParticipation } from '../schema/rewards.js';
import type { Tournament } from '../schema/tournaments.js';

/** Read side of the reward tables; never mutates. */
export interface RewardReader {
  findTournament(tournamentId: string): Promise<Tournament | null>;
  listRankings(tournamentId: string): Promise<RankingEntry[]>;
  listParticipations(tournamentId: string, userIds?: readonly string[]): Promise<TournamentParticipation[]>;
  findParticipation(tournamentId: string, userId: string): Promise<TournamentParticipation | null>;
  listTournamentBadges(tournamentId: string, userIds?: readonly string[]): Promise<TournamentBadge[]>;
  listUserBadges(userId: string): Promise<TournamentBadge[]>;
  countPriorParticipations(userIds: readonly string[], excludingTournamentId: string): Promise<Map<string, number>>;
  countPriorBadges(
    userIds: readonly string[],
    badgeTypes: readonly string[],
    excludingTournamentId: string
  ): Promise<Map<string, Record<string, number>>>;
  listSkillRewardsForSource(params: SkillRewardSourceParams): Promise<SkillReward[]>;
  sumSkillRewardsBySkill(userId: string): Promise<Record<string, number>>;
  listSkillBaselines(userId: string): Promise<Record<string, number>>;
  listPlacementHistory(userId: string): Promise<PlacementHistoryRow[]>;
}

/**
 * Everything a distribution may do while it holds the tournament lock. All
 * calls share one transaction: either every write lands or none does.
 */
export interface RewardWriteSession {
  readonly tournament: Tournament;
  readonly reader: RewardReader;
  insertParticipation(params: ParticipationWrite): Promise<TournamentParticipation>;
  replaceParticipation(params: ParticipationWrite): Promise<TournamentParticipation>;
  appendSkillRewards(rows: readonly SkillRewardWrite[]): Promise<number>;
  insertBadges(badges: readonly BadgeWrite[]): Promise<TournamentBadge[]>;
  markRewardsDistributed(params: Omit<MarkRewardsDistributedParams, 'tournamentId'>): Promise<Tournament>;
}

export interface RewardStore extends RewardReader {
  withTournamentLock<TResult>(
    tournamentId: string,
    work: (session: RewardWriteSession) => Promise<TResult>
  ): Promise<TResult>;
  ping(): Promise<void>;
}
