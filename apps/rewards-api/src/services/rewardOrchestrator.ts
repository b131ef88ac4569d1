import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import {
  RewardEngineError,
  formatRewardEngineError,
  isRewardEngineError,
  notFoundError,
  planDistribution,
  validateParticipants,
  type ParticipantPlan
} from '@podium/engine';
import {
  DbError,
  DbErrorCode,
  isUniqueViolation,
  type ParticipationWrite,
  type RewardStore,
  type RewardWriteSession
} from '@podium/db';
import {
  assertDistributable,
  buildPlanInput,
  loadParticipants,
  requireTournament,
  selectRewardPolicy,
  summariseExisting,
  summarisePlan,
  type DistributionRequest,
  type DistributionSummary
} from './distributionContext.js';
import { getDistributionLogger } from '../telemetry/logger.js';
import {
  recordDistribution,
  recordParticipantsRewarded,
  type DistributionOutcome,
  type RewardMetrics
} from '../telemetry/metrics.js';

export interface RewardOrchestratorDependencies {
  store: RewardStore;
  logger: Logger;
  metrics?: RewardMetrics;
  clock?: () => Date;
}

export interface RewardOrchestrator {
  distributeRewards(request: DistributionRequest): Promise<DistributionSummary>;
}

interface PersistOutcome {
  badgesAwarded: number;
  ledgerRows: number;
  created: number;
  replaced: number;
}

const participationWrite = (
  entry: ParticipantPlan,
  tournamentId: string,
  distributedAt: Date,
  distributedBy: string | null
): ParticipationWrite | null =>
  entry.reward
    ? {
        userId: entry.userId,
        tournamentId,
        placement: entry.placement,
        skillPoints: { ...entry.reward.skillPoints },
        baseXp: entry.reward.baseXp,
        bonusXp: entry.reward.bonusXp,
        totalXp: entry.reward.totalXp,
        credits: entry.reward.credits,
        distributedAt,
        distributedBy
      }
    : null;

const persistEntry = async (
  session: RewardWriteSession,
  entry: ParticipantPlan,
  write: ParticipationWrite
): Promise<{ badges: number; ledgerRows: number }> => {
  if (entry.action === 'replace') {
    await session.replaceParticipation(write);
  } else {
    await session.insertParticipation(write);
  }

  const ledgerRows = await session.appendSkillRewards(
    Object.entries(entry.skillDeltas).map(([skillName, pointsAwarded]) => ({
      userId: entry.userId,
      sourceType: 'TOURNAMENT' as const,
      sourceId: write.tournamentId,
      skillName,
      pointsAwarded
    }))
  );

  const inserted = await session.insertBadges(
    entry.badges.map((badge) => ({ ...badge, metadata: { ...badge.metadata } }))
  );

  return { badges: inserted.length, ledgerRows };
};

/** Maps anything thrown during a distribution onto the engine taxonomy. */
export const toRewardEngineError = (error: unknown, tournamentId: string): RewardEngineError => {
  if (isRewardEngineError(error)) {
    return error;
  }

  if (error instanceof DbError) {
    if (error.code === DbErrorCode.NOT_FOUND && error.detail?.reason === 'record_missing') {
      return notFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }

    return new RewardEngineError('PERSISTENCE_FAILED', 'Reward persistence failed; nothing was written', {
      cause: error,
      retryable: true,
      severity: 'error',
      details: { tournamentId, dbCode: error.code, reason: error.detail?.reason ?? null }
    });
  }

  return new RewardEngineError('INTERNAL_ERROR', 'Reward distribution failed unexpectedly', {
    cause: error,
    severity: 'error',
    details: { tournamentId }
  });
};

const outcomeOf = (error: RewardEngineError): DistributionOutcome =>
  error.code === 'VALIDATION_FAILED' || error.code === 'NOT_FOUND' ? 'rejected' : 'failed';

export const createRewardOrchestrator = (dependencies: RewardOrchestratorDependencies): RewardOrchestrator => {
  const { store, metrics } = dependencies;
  const clock = dependencies.clock ?? (() => new Date());

  const distribute = async (request: DistributionRequest, logger: Logger): Promise<DistributionSummary> => {
    const forceRedistribution = request.forceRedistribution ?? false;
    const actorId = request.actorId ?? null;

    if (request.participants) {
      validateParticipants(request.participants);
    }

    const tournament = await requireTournament(store, request.tournamentId);
    assertDistributable(tournament);

    const participants = await loadParticipants(store, tournament.id, request.participants);
    const resolution = selectRewardPolicy(tournament, request, logger, metrics);

    try {
      return await store.withTournamentLock(tournament.id, async (session) => {
        assertDistributable(session.tournament);

        const planInput = await buildPlanInput(
          session.reader,
          session.tournament,
          participants,
          resolution.policy,
          forceRedistribution
        );
        const plan = planDistribution(planInput);
        const distributedAt = clock();

        const outcome: PersistOutcome = { badgesAwarded: 0, ledgerRows: 0, created: 0, replaced: 0 };
        for (const entry of plan.entries) {
          const write = participationWrite(entry, tournament.id, distributedAt, actorId);
          if (!write) {
            continue;
          }

          const persisted = await persistEntry(session, entry, write);
          outcome.badgesAwarded += persisted.badges;
          outcome.ledgerRows += persisted.ledgerRows;
          if (entry.action === 'replace') {
            outcome.replaced += 1;
          } else {
            outcome.created += 1;
          }
        }

        if (plan.totals.rewardsDistributedCount > 0 || session.tournament.status === 'COMPLETED') {
          await session.markRewardsDistributed({ distributedAt, distributedBy: actorId });
        }

        if (metrics) {
          recordParticipantsRewarded(metrics, 'create', outcome.created);
          recordParticipantsRewarded(metrics, 'replace', outcome.replaced);
        }

        logger.debug(
          { created: outcome.created, replaced: outcome.replaced, ledgerRows: outcome.ledgerRows },
          'reward rows written'
        );

        return summarisePlan(plan, {
          tournamentId: tournament.id,
          dryRun: false,
          forcedRedistribution: forceRedistribution,
          policySource: resolution.source,
          distributedAt: plan.totals.rewardsDistributedCount > 0 ? distributedAt : null,
          badgesAwarded: outcome.badgesAwarded
        });
      });
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }

      const conflict = new RewardEngineError('CONCURRENCY_CONFLICT', 'Another distribution wrote these rewards first', {
        cause: error,
        severity: 'warn',
        details: { tournamentId: tournament.id }
      });
      logger.warn({ err: formatRewardEngineError(conflict) }, 'concurrent distribution detected, reporting persisted rewards');

      const rows = await store.listParticipations(
        tournament.id,
        participants.map((participant) => participant.userId)
      );
      return summariseExisting(tournament.id, rows, {
        forcedRedistribution: forceRedistribution,
        policySource: resolution.source
      });
    }
  };

  const distributeRewards = async (request: DistributionRequest): Promise<DistributionSummary> => {
    const logger = getDistributionLogger(dependencies.logger, {
      tournamentId: request.tournamentId,
      actorId: request.actorId,
      forced: request.forceRedistribution ?? false
    });
    const startedAt = performance.now();

    try {
      const summary = await distribute(request, logger);
      if (metrics) {
        recordDistribution(metrics, summary.status, (performance.now() - startedAt) / 1000);
      }

      logger.info(
        {
          status: summary.status,
          rewardsDistributedCount: summary.rewardsDistributedCount,
          totalXpAwarded: summary.totalXpAwarded,
          totalCreditsAwarded: summary.totalCreditsAwarded,
          totalBadgesAwarded: summary.totalBadgesAwarded,
          skippedCount: summary.skippedCount,
          policySource: summary.policySource
        },
        'reward distribution finished'
      );
      return summary;
    } catch (error) {
      const engineError = toRewardEngineError(error, request.tournamentId);
      if (metrics) {
        recordDistribution(metrics, outcomeOf(engineError), (performance.now() - startedAt) / 1000);
      }

      const payload = { err: formatRewardEngineError(engineError) };
      if (engineError.severity === 'error') {
        logger.error(payload, 'reward distribution failed');
      } else {
        logger.warn(payload, 'reward distribution rejected');
      }
      throw engineError;
    }
  };

  return { distributeRewards } satisfies RewardOrchestrator;
};
