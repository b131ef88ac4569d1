import type { BadgeCategory } from '../policy/rewardPolicy.js';
import type { BadgeDraft } from './badgeAssignmentEngine.js';
import { BADGE_RARITY_RANK } from './badgeDefinitions.js';

export interface AwardedBadge extends BadgeDraft {
  readonly id: string;
  readonly createdAt: Date;
}

export interface BadgeShowcaseSection {
  readonly count: number;
  readonly badges: readonly AwardedBadge[];
}

export interface BadgeShowcase {
  readonly totalBadges: number;
  readonly rarest: readonly AwardedBadge[];
  readonly recent: readonly AwardedBadge[];
  readonly byCategory: Readonly<Record<BadgeCategory, BadgeShowcaseSection>>;
}

const SHOWCASE_HIGHLIGHTS = 5;
const SECTION_PREVIEW = 3;

const newestFirst = (left: AwardedBadge, right: AwardedBadge): number =>
  right.createdAt.getTime() - left.createdAt.getTime();

// Rarity descending; ties go to the newer badge.
const rarestFirst = (left: AwardedBadge, right: AwardedBadge): number =>
  BADGE_RARITY_RANK[right.rarity] - BADGE_RARITY_RANK[left.rarity] || newestFirst(left, right);

export const buildBadgeShowcase = (badges: readonly AwardedBadge[]): BadgeShowcase => {
  const recent = [...badges].sort(newestFirst);

  const section = (category: BadgeCategory): BadgeShowcaseSection => {
    const inCategory = recent.filter((badge) => badge.category === category);
    return { count: inCategory.length, badges: inCategory.slice(0, SECTION_PREVIEW) };
  };

  return {
    totalBadges: badges.length,
    rarest: [...badges].sort(rarestFirst).slice(0, SHOWCASE_HIGHLIGHTS),
    recent: recent.slice(0, SHOWCASE_HIGHLIGHTS),
    byCategory: {
      PLACEMENT: section('PLACEMENT'),
      PARTICIPATION: section('PARTICIPATION'),
      MILESTONE: section('MILESTONE'),
      ACHIEVEMENT: section('ACHIEVEMENT')
    }
  };
};
