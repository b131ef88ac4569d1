import type { SkillCategory, SkillMapping } from '../policy/rewardPolicy.js';

export type SkillPointAllocation = Readonly<Record<string, number>>;

export const CATEGORY_XP_RATES: Readonly<Record<SkillCategory, number>> = Object.freeze({
  PHYSICAL: 8,
  TECHNICAL: 10,
  TACTICAL: 10,
  MENTAL: 12
});

export const roundToTenth = (value: number): number => Math.round(value * 10) / 10;

/**
 * Splits a point pool across the enabled mappings in proportion to their
 * weights, rounding each share to one decimal. The rounding remainder is
 * dropped, so the shares may sum to slightly more or less than the pool.
 */
export const distributeSkillPoints = (
  totalPoints: number,
  mappings: readonly SkillMapping[]
): SkillPointAllocation => {
  const enabled = mappings.filter((mapping) => mapping.enabled);
  const totalWeight = enabled.reduce((sum, mapping) => sum + mapping.weight, 0);

  if (totalPoints <= 0 || enabled.length === 0 || totalWeight <= 0) {
    return Object.freeze({});
  }

  const allocation: Record<string, number> = {};
  for (const mapping of enabled) {
    allocation[mapping.skill] = roundToTenth((totalPoints * mapping.weight) / totalWeight);
  }
  return Object.freeze(allocation);
};

/**
 * XP earned from an allocation. Points are tenths, so each product is taken
 * in integer tenths before truncating to whole XP.
 */
export const calculateBonusXp = (
  allocation: SkillPointAllocation,
  mappings: readonly SkillMapping[]
): number => {
  const categories = new Map(mappings.map((mapping) => [mapping.skill, mapping.category]));

  return Object.entries(allocation).reduce((sum, [skill, points]) => {
    const category = categories.get(skill);
    if (!category) {
      return sum;
    }
    const tenths = Math.round(points * 10);
    return sum + Math.trunc((tenths * CATEGORY_XP_RATES[category]) / 10);
  }, 0);
};
