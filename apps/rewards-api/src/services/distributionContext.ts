import type { Logger } from 'pino';
import {
  CAREER_BADGE_TYPES,
  notFoundError,
  resolveRewardPolicy,
  validateParticipants,
  validationError,
  type DistributionPlan,
  type DistributionPlanInput,
  type ParticipantPlacement,
  type PlanAction,
  type PolicyResolution,
  type PolicySource,
  type PreviouslyDistributed,
  type RewardPolicy
} from '@podium/engine';
import type { RewardReader, Tournament, TournamentParticipation, TournamentStatus } from '@podium/db';
import { recordPolicyFallback, type RewardMetrics } from '../telemetry/metrics.js';

export const DISTRIBUTABLE_STATUSES: readonly TournamentStatus[] = ['COMPLETED', 'REWARDS_DISTRIBUTED'];

export interface DistributionRequest {
  tournamentId: string;
  /** Loaded from the tournament rankings when omitted. */
  participants?: readonly ParticipantPlacement[];
  policy?: unknown;
  templateName?: string;
  forceRedistribution?: boolean;
  actorId?: string | null;
}

export type DistributionStatus = 'distributed' | 'redistributed' | 'already_distributed';

export interface ParticipantBreakdown {
  userId: string;
  placement: number;
  action: PlanAction;
  tier: string | null;
  baseXp: number;
  bonusXp: number;
  totalXp: number;
  credits: number;
  skillPoints: Readonly<Record<string, number>>;
  badges: string[];
}

export interface DistributionSummary {
  tournamentId: string;
  status: DistributionStatus;
  dryRun: boolean;
  rewardsDistributedCount: number;
  totalXpAwarded: number;
  totalCreditsAwarded: number;
  totalBadgesAwarded: number;
  skippedCount: number;
  forcedRedistribution: boolean;
  policySource: PolicySource;
  distributedAt: Date | null;
  previouslyDistributed: PreviouslyDistributed;
  participants: ParticipantBreakdown[];
}

export const assertDistributable = (tournament: Tournament): void => {
  if (!DISTRIBUTABLE_STATUSES.includes(tournament.status)) {
    throw validationError(`Tournament ${tournament.id} is ${tournament.status}; rewards need a completed tournament`, {
      tournamentId: tournament.id,
      status: tournament.status
    });
  }
};

export const requireTournament = async (reader: RewardReader, tournamentId: string): Promise<Tournament> => {
  const tournament = await reader.findTournament(tournamentId);
  if (!tournament) {
    throw notFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
  }
  return tournament;
};

export const loadParticipants = async (
  reader: RewardReader,
  tournamentId: string,
  explicit: readonly ParticipantPlacement[] | undefined
): Promise<readonly ParticipantPlacement[]> => {
  const participants = explicit ?? (await reader.listRankings(tournamentId));
  validateParticipants(participants);
  return participants;
};

/**
 * A policy given with the request wins over the one stored on the
 * tournament. Falling back to the default policy is logged and counted.
 */
export const selectRewardPolicy = (
  tournament: Tournament,
  request: Pick<DistributionRequest, 'policy' | 'templateName'>,
  logger: Logger,
  metrics?: RewardMetrics
): PolicyResolution => {
  const explicit = (request.policy !== undefined && request.policy !== null) || Boolean(request.templateName);
  const resolution = explicit
    ? resolveRewardPolicy({ policy: request.policy, templateName: request.templateName })
    : resolveRewardPolicy({ policy: tournament.rewardPolicy, templateName: tournament.rewardTemplate });

  if (resolution.fallback) {
    logger.warn(
      { reason: resolution.fallback.reason, issues: resolution.fallback.issues },
      'reward policy unusable, using the default policy'
    );
    if (metrics) {
      recordPolicyFallback(metrics, resolution.fallback.reason);
    }
  }

  return resolution;
};

export const buildPlanInput = async (
  reader: RewardReader,
  tournament: Tournament,
  participants: readonly ParticipantPlacement[],
  policy: RewardPolicy,
  forceRedistribution: boolean
): Promise<DistributionPlanInput> => {
  const userIds = participants.map((participant) => participant.userId);
  const existing = await reader.listParticipations(tournament.id, userIds);
  const badges = await reader.listTournamentBadges(tournament.id, userIds);
  const priorTournamentCounts = await reader.countPriorParticipations(userIds, tournament.id);
  const priorBadgeCounts = await reader.countPriorBadges(userIds, CAREER_BADGE_TYPES, tournament.id);

  const presentBadgeTypes = new Map<string, Set<string>>();
  for (const badge of badges) {
    const types = presentBadgeTypes.get(badge.userId) ?? new Set<string>();
    types.add(badge.badgeType);
    presentBadgeTypes.set(badge.userId, types);
  }

  return {
    tournamentId: tournament.id,
    tournamentName: tournament.name,
    participants,
    policy,
    existing,
    presentBadgeTypes,
    priorTournamentCounts,
    priorBadgeCounts,
    forceRedistribution
  };
};

export const resolveStatus = (plan: DistributionPlan): DistributionStatus => {
  if (plan.totals.rewardsDistributedCount === 0) {
    return 'already_distributed';
  }
  return plan.entries.some((entry) => entry.action === 'replace') ? 'redistributed' : 'distributed';
};

export const breakdownOf = (plan: DistributionPlan): ParticipantBreakdown[] =>
  plan.entries.map((entry) => ({
    userId: entry.userId,
    placement: entry.placement,
    action: entry.action,
    tier: entry.reward?.tierKey ?? null,
    baseXp: entry.reward?.baseXp ?? 0,
    bonusXp: entry.reward?.bonusXp ?? 0,
    totalXp: entry.reward?.totalXp ?? 0,
    credits: entry.reward?.credits ?? 0,
    skillPoints: entry.reward?.skillPoints ?? {},
    badges: entry.badges.map((badge) => badge.badgeType)
  }));

export interface SummaryOptions {
  tournamentId: string;
  dryRun: boolean;
  forcedRedistribution: boolean;
  policySource: PolicySource;
  distributedAt: Date | null;
  badgesAwarded?: number;
}

export const summarisePlan = (plan: DistributionPlan, options: SummaryOptions): DistributionSummary => ({
  tournamentId: options.tournamentId,
  status: resolveStatus(plan),
  dryRun: options.dryRun,
  rewardsDistributedCount: plan.totals.rewardsDistributedCount,
  totalXpAwarded: plan.totals.totalXpAwarded,
  totalCreditsAwarded: plan.totals.totalCreditsAwarded,
  totalBadgesAwarded: options.badgesAwarded ?? plan.totals.totalBadgesAwarded,
  skippedCount: plan.totals.skippedCount,
  forcedRedistribution: options.forcedRedistribution,
  policySource: options.policySource,
  distributedAt: options.distributedAt,
  previouslyDistributed: plan.previouslyDistributed,
  participants: breakdownOf(plan)
});

/** Summary for a call that lost the race: every participant already holds a reward. */
export const summariseExisting = (
  tournamentId: string,
  rows: readonly TournamentParticipation[],
  options: Pick<SummaryOptions, 'forcedRedistribution' | 'policySource'>
): DistributionSummary => ({
  tournamentId,
  status: 'already_distributed',
  dryRun: false,
  rewardsDistributedCount: 0,
  totalXpAwarded: 0,
  totalCreditsAwarded: 0,
  totalBadgesAwarded: 0,
  skippedCount: rows.length,
  forcedRedistribution: options.forcedRedistribution,
  policySource: options.policySource,
  distributedAt: null,
  previouslyDistributed: {
    participants: rows.length,
    totalXp: rows.reduce((sum, row) => sum + row.totalXp, 0),
    totalCredits: rows.reduce((sum, row) => sum + row.credits, 0)
  },
  participants: rows.map((row) => ({
    userId: row.userId,
    placement: row.placement,
    action: 'skip',
    tier: null,
    baseXp: 0,
    bonusXp: 0,
    totalXp: 0,
    credits: 0,
    skillPoints: {},
    badges: []
  }))
});
