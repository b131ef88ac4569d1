import type { RewardPolicy, TierReward } from '../policy/rewardPolicy.js';

export type TierKind = 'placement' | 'top_percent' | 'participation';

export interface ResolvedTier extends TierReward {
  readonly kind: TierKind;
  /** Stable label stored in badge metadata, e.g. `placement:1`. */
  readonly key: string;
}

export const topPercentCutoff = (totalParticipants: number, percent: number): number =>
  Math.ceil((totalParticipants * percent) / 100);

export const resolveTier = (
  policy: RewardPolicy,
  placement: number,
  totalParticipants: number
): ResolvedTier => {
  const exact = policy.placementTiers.find((tier) => tier.placement === placement);
  if (exact) {
    return { ...exact, kind: 'placement', key: `placement:${placement}` };
  }

  const { topPercent } = policy;
  if (topPercent && placement <= topPercentCutoff(totalParticipants, topPercent.percent)) {
    return { ...topPercent, kind: 'top_percent', key: `top_percent:${topPercent.percent}` };
  }

  return { ...policy.participation, kind: 'participation', key: 'participation' };
};
