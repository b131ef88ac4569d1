import {
  tournamentRankingRelations,
  tournamentRankings,
  tournamentRelations,
  tournaments
} from './tournaments.js';
import {
  skillRewards,
  tournamentBadgeRelations,
  tournamentBadges,
  tournamentParticipationRelations,
  tournamentParticipations,
  userSkillBaselines
} from './rewards.js';

export {
  tournamentRankingRelations,
  tournamentRankings,
  tournamentRelations,
  tournamentStatusEnum,
  tournaments
} from './tournaments.js';

export {
  badgeCategoryEnum,
  badgeRarityEnum,
  skillRewardSourceEnum,
  skillRewards,
  tournamentBadgeRelations,
  tournamentBadges,
  tournamentParticipationRelations,
  tournamentParticipations,
  userSkillBaselines
} from './rewards.js';

export type { NewTournament, NewTournamentRanking, Tournament, TournamentRanking, TournamentStatus } from './tournaments.js';
export type {
  BadgeCategoryValue,
  BadgeRarityValue,
  NewSkillReward,
  NewTournamentBadge,
  NewTournamentParticipation,
  SkillReward,
  SkillRewardSource,
  TournamentBadge,
  TournamentParticipation,
  UserSkillBaseline
} from './rewards.js';

export const dbSchema = {
  tournaments,
  tournamentRankings,
  tournamentParticipations,
  skillRewards,
  tournamentBadges,
  userSkillBaselines,
  tournamentRelations,
  tournamentRankingRelations,
  tournamentParticipationRelations,
  tournamentBadgeRelations
};

export type DbSchema = typeof dbSchema;
