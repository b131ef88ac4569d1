import { assignBadges, type BadgeDraft } from '../badges/badgeAssignmentEngine.js';
import { validationError } from '../errors/rewardEngineError.js';
import type { RewardPolicy } from '../policy/rewardPolicy.js';
import {
  calculateBonusXp,
  distributeSkillPoints,
  roundToTenth,
  type SkillPointAllocation
} from '../skills/skillPointDistributor.js';
import { resolveTier, type TierKind } from './tierResolution.js';

export interface ParticipantPlacement {
  readonly userId: string;
  readonly placement: number;
}

export interface ExistingParticipation {
  readonly userId: string;
  readonly placement: number;
  readonly skillPoints: SkillPointAllocation;
  readonly baseXp: number;
  readonly bonusXp: number;
  readonly totalXp: number;
  readonly credits: number;
  readonly distributedAt: Date;
}

export interface ParticipantReward {
  readonly userId: string;
  readonly placement: number;
  readonly tierKind: TierKind;
  readonly tierKey: string;
  readonly baseXp: number;
  readonly bonusXp: number;
  readonly totalXp: number;
  readonly credits: number;
  readonly skillPoints: SkillPointAllocation;
}

export type PlanAction = 'create' | 'replace' | 'skip';

export interface ParticipantPlan {
  readonly userId: string;
  readonly placement: number;
  readonly action: PlanAction;
  /** `null` when the participant is skipped. */
  readonly reward: ParticipantReward | null;
  readonly previous: ExistingParticipation | null;
  /** Signed ledger entries: new points minus previously recorded points. */
  readonly skillDeltas: SkillPointAllocation;
  readonly badges: readonly BadgeDraft[];
}

export interface DistributionTotals {
  readonly rewardsDistributedCount: number;
  readonly totalXpAwarded: number;
  readonly totalCreditsAwarded: number;
  readonly totalBadgesAwarded: number;
  readonly skippedCount: number;
}

export interface PreviouslyDistributed {
  readonly participants: number;
  readonly totalXp: number;
  readonly totalCredits: number;
}

export interface DistributionPlan {
  readonly entries: readonly ParticipantPlan[];
  readonly totals: DistributionTotals;
  readonly previouslyDistributed: PreviouslyDistributed;
}

export interface DistributionPlanInput {
  readonly tournamentId: string;
  readonly tournamentName: string;
  readonly participants: readonly ParticipantPlacement[];
  readonly policy: RewardPolicy;
  readonly existing: readonly ExistingParticipation[];
  readonly presentBadgeTypes: ReadonlyMap<string, ReadonlySet<string>>;
  readonly priorTournamentCounts: ReadonlyMap<string, number>;
  /** Career badge counts per user from other tournaments; see CAREER_BADGE_TYPES. */
  readonly priorBadgeCounts: ReadonlyMap<string, Readonly<Record<string, number>>>;
  readonly forceRedistribution: boolean;
}

/** Rejects lists the engine cannot reward without guessing. */
export const validateParticipants = (participants: readonly ParticipantPlacement[]): void => {
  if (participants.length === 0) {
    throw validationError('No participants to reward');
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { userId, placement } of participants) {
    if (userId.trim().length === 0) {
      throw validationError('Participant user id must not be blank');
    }
    if (!Number.isInteger(placement) || placement < 1) {
      throw validationError('Placement must be a positive integer', { userId, placement });
    }
    if (seen.has(userId)) {
      duplicates.add(userId);
    }
    seen.add(userId);
  }

  if (duplicates.size > 0) {
    throw validationError('Participant list repeats user ids', { duplicates: [...duplicates].sort() });
  }
};

export const computeParticipantReward = (
  policy: RewardPolicy,
  participant: ParticipantPlacement,
  totalParticipants: number
): ParticipantReward => {
  const tier = resolveTier(policy, participant.placement, totalParticipants);
  const skillPoints = distributeSkillPoints(tier.skillPoints, policy.skillMappings);
  const baseXp = Math.trunc(tier.baseXp * tier.xpMultiplier);
  const bonusXp = calculateBonusXp(skillPoints, policy.skillMappings);

  return {
    userId: participant.userId,
    placement: participant.placement,
    tierKind: tier.kind,
    tierKey: tier.key,
    baseXp,
    bonusXp,
    totalXp: baseXp + bonusXp,
    credits: tier.credits,
    skillPoints
  };
};

export const skillPointDeltas = (
  next: SkillPointAllocation,
  previous: SkillPointAllocation
): SkillPointAllocation => {
  const deltas: Record<string, number> = {};
  const skills = new Set([...Object.keys(previous), ...Object.keys(next)]);
  for (const skill of [...skills].sort()) {
    const delta = roundToTenth((next[skill] ?? 0) - (previous[skill] ?? 0));
    if (delta !== 0) {
      deltas[skill] = delta;
    }
  }
  return Object.freeze(deltas);
};

/**
 * Decides, per participant, whether to create, replace or skip a reward and
 * what to write for it. Pure: the orchestrator persists the plan, the
 * preview returns it as is.
 */
export const planDistribution = (input: DistributionPlanInput): DistributionPlan => {
  validateParticipants(input.participants);

  const existingByUser = new Map(input.existing.map((row) => [row.userId, row]));
  const totalParticipants = input.participants.length;
  const entries: ParticipantPlan[] = [];

  for (const participant of input.participants) {
    const previous = existingByUser.get(participant.userId) ?? null;

    if (previous && !input.forceRedistribution) {
      entries.push({
        userId: participant.userId,
        placement: participant.placement,
        action: 'skip',
        reward: null,
        previous,
        skillDeltas: Object.freeze({}),
        badges: []
      });
      continue;
    }

    const reward = computeParticipantReward(input.policy, participant, totalParticipants);
    const tier = resolveTier(input.policy, participant.placement, totalParticipants);
    const badges = assignBadges({
      userId: participant.userId,
      tournamentId: input.tournamentId,
      tournamentName: input.tournamentName,
      placement: participant.placement,
      totalParticipants,
      tier,
      participationBadges: input.policy.participation.badges,
      presentTypes: input.presentBadgeTypes.get(participant.userId) ?? new Set<string>(),
      priorTournamentCount: input.priorTournamentCounts.get(participant.userId) ?? 0,
      priorBadgeCounts: input.priorBadgeCounts.get(participant.userId) ?? {}
    });

    entries.push({
      userId: participant.userId,
      placement: participant.placement,
      action: previous ? 'replace' : 'create',
      reward,
      previous,
      skillDeltas: skillPointDeltas(reward.skillPoints, previous?.skillPoints ?? {}),
      badges
    });
  }

  return {
    entries,
    totals: summarisePlan(entries),
    previouslyDistributed: summarisePrevious(entries)
  };
};

const summarisePlan = (entries: readonly ParticipantPlan[]): DistributionTotals =>
  entries.reduce<DistributionTotals>(
    (totals, entry) =>
      entry.reward
        ? {
            ...totals,
            rewardsDistributedCount: totals.rewardsDistributedCount + 1,
            totalXpAwarded: totals.totalXpAwarded + entry.reward.totalXp,
            totalCreditsAwarded: totals.totalCreditsAwarded + entry.reward.credits,
            totalBadgesAwarded: totals.totalBadgesAwarded + entry.badges.length
          }
        : { ...totals, skippedCount: totals.skippedCount + 1 },
    {
      rewardsDistributedCount: 0,
      totalXpAwarded: 0,
      totalCreditsAwarded: 0,
      totalBadgesAwarded: 0,
      skippedCount: 0
    }
  );

const summarisePrevious = (entries: readonly ParticipantPlan[]): PreviouslyDistributed =>
  entries
    .filter((entry) => entry.action === 'skip')
    .reduce<PreviouslyDistributed>(
      (totals, entry) => ({
        participants: totals.participants + 1,
        totalXp: totals.totalXp + (entry.previous?.totalXp ?? 0),
        totalCredits: totals.totalCredits + (entry.previous?.credits ?? 0)
      }),
      { participants: 0, totalXp: 0, totalCredits: 0 }
    );
