import type { DatabasePool, DrizzleExecutor, DrizzleTransaction } from '../adapters/connection.js';
import { withMetrics } from '../instrumentation/metrics.js';
import {
  countPriorBadges,
  insertBadges,
  listTournamentBadges,
  listUserBadges
} from '../repositories/badgeRepository.js';
import {
  countPriorParticipations,
  findParticipation,
  insertParticipation,
  listParticipations,
  listPlacementHistory,
  replaceParticipation
} from '../repositories/participationRepository.js';
import {
  appendSkillRewards,
  listSkillBaselines,
  listSkillRewardsForSource,
  sumSkillRewardsBySkill
} from '../repositories/skillRewardRepository.js';
import {
  findTournament,
  listRankings,
  lockTournament,
  markRewardsDistributed
} from '../repositories/tournamentRepository.js';
import type { DbSchema } from '../schema/index.js';
import type { Tournament } from '../schema/tournaments.js';
import type { RewardReader, RewardStore, RewardWriteSession } from './rewardStore.js';

const createReader = (db: DrizzleExecutor<DbSchema>): RewardReader => ({
  findTournament: (tournamentId) => withMetrics('findTournament', () => findTournament(db, tournamentId)),
  listRankings: (tournamentId) => withMetrics('listRankings', () => listRankings(db, tournamentId)),
  listParticipations: (tournamentId, userIds) =>
    withMetrics('listParticipations', () => listParticipations(db, tournamentId, userIds)),
  findParticipation: (tournamentId, userId) =>
    withMetrics('findParticipation', () => findParticipation(db, tournamentId, userId)),
  listTournamentBadges: (tournamentId, userIds) =>
    withMetrics('listTournamentBadges', () => listTournamentBadges(db, tournamentId, userIds)),
  listUserBadges: (userId) => withMetrics('listUserBadges', () => listUserBadges(db, userId)),
  countPriorParticipations: (userIds, excludingTournamentId) =>
    withMetrics('countPriorParticipations', () => countPriorParticipations(db, userIds, excludingTournamentId)),
  countPriorBadges: (userIds, badgeTypes, excludingTournamentId) =>
    withMetrics('countPriorBadges', () => countPriorBadges(db, userIds, badgeTypes, excludingTournamentId)),
  listSkillRewardsForSource: (params) =>
    withMetrics('listSkillRewardsForSource', () => listSkillRewardsForSource(db, params)),
  sumSkillRewardsBySkill: (userId) => withMetrics('sumSkillRewardsBySkill', () => sumSkillRewardsBySkill(db, userId)),
  listSkillBaselines: (userId) => withMetrics('listSkillBaselines', () => listSkillBaselines(db, userId)),
  listPlacementHistory: (userId) => withMetrics('listPlacementHistory', () => listPlacementHistory(db, userId))
});

const createWriteSession = (tx: DrizzleTransaction<DbSchema>, tournament: Tournament): RewardWriteSession => ({
  tournament,
  reader: createReader(tx),
  insertParticipation: (params) => withMetrics('insertParticipation', () => insertParticipation(tx, params)),
  replaceParticipation: (params) => withMetrics('replaceParticipation', () => replaceParticipation(tx, params)),
  appendSkillRewards: (rows) => withMetrics('appendSkillRewards', () => appendSkillRewards(tx, rows)),
  insertBadges: (badges) => withMetrics('insertBadges', () => insertBadges(tx, badges)),
  markRewardsDistributed: (params) =>
    withMetrics('markRewardsDistributed', () =>
      markRewardsDistributed(tx, { ...params, tournamentId: tournament.id })
    )
});

/** {@link RewardStore} over PostgreSQL. */
export function createDrizzleRewardStore(
  database: Pick<DatabasePool<DbSchema>, 'db' | 'withTransaction' | 'ping'>
): RewardStore {
  return {
    ...createReader(database.db),
    withTournamentLock: (tournamentId, work) => {
      // errors raised by the caller's work belong to the caller, not to the database
      const workFailures = new Set<unknown>();
      return withMetrics(
        'withTournamentLock',
        () =>
          database.withTransaction(async (tx) => {
            const tournament = await lockTournament(tx, tournamentId);
            try {
              return await work(createWriteSession(tx, tournament));
            } catch (error) {
              workFailures.add(error);
              throw error;
            }
          }),
        { passThrough: (error) => workFailures.has(error) }
      );
    },
    ping: () => withMetrics('ping', () => database.ping())
  };
}
