import type { Logger } from 'pino';
import { planDistribution, validateParticipants } from '@podium/engine';
import type { RewardReader } from '@podium/db';
import {
  buildPlanInput,
  loadParticipants,
  requireTournament,
  selectRewardPolicy,
  summarisePlan,
  type DistributionRequest,
  type DistributionSummary
} from './distributionContext.js';

export type PreviewRequest = Omit<DistributionRequest, 'actorId'>;

export interface RewardPreviewDependencies {
  reader: RewardReader;
  logger: Logger;
}

export interface RewardPreviewService {
  previewRewards(request: PreviewRequest): Promise<DistributionSummary>;
}

/**
 * Dry run of a distribution. Reads what the orchestrator would read but takes
 * no lock and writes nothing; the tournament status is not checked so a
 * running tournament can be previewed.
 */
export const createRewardPreviewService = (dependencies: RewardPreviewDependencies): RewardPreviewService => {
  const { reader } = dependencies;

  const previewRewards = async (request: PreviewRequest): Promise<DistributionSummary> => {
    const logger = dependencies.logger.child({ tournamentId: request.tournamentId, preview: true });
    const forceRedistribution = request.forceRedistribution ?? false;

    if (request.participants) {
      validateParticipants(request.participants);
    }

    const tournament = await requireTournament(reader, request.tournamentId);
    const participants = await loadParticipants(reader, tournament.id, request.participants);
    const resolution = selectRewardPolicy(tournament, request, logger);

    const plan = planDistribution(
      await buildPlanInput(reader, tournament, participants, resolution.policy, forceRedistribution)
    );

    logger.debug(
      { rewardsDistributedCount: plan.totals.rewardsDistributedCount, skippedCount: plan.totals.skippedCount },
      'reward preview computed'
    );

    return summarisePlan(plan, {
      tournamentId: tournament.id,
      dryRun: true,
      forcedRedistribution: forceRedistribution,
      policySource: resolution.source,
      distributedAt: null
    });
  };

  return { previewRewards };
};
