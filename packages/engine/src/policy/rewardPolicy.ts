import { z } from 'zod';
import { policyError } from '../errors/rewardEngineError.js';

export const SKILL_CATEGORIES = ['PHYSICAL', 'TECHNICAL', 'TACTICAL', 'MENTAL'] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const BADGE_RARITIES = ['COMMON', 'UNCOMMON', 'RARE', 'EPIC', 'LEGENDARY'] as const;
export type BadgeRarity = (typeof BADGE_RARITIES)[number];

export const BADGE_CATEGORIES = ['PLACEMENT', 'PARTICIPATION', 'MILESTONE', 'ACHIEVEMENT'] as const;
export type BadgeCategory = (typeof BADGE_CATEGORIES)[number];

export const BADGE_CONDITIONS = ['always', 'first_tournament'] as const;
export type BadgeCondition = (typeof BADGE_CONDITIONS)[number];

export interface SkillMapping {
  readonly skill: string;
  readonly weight: number;
  readonly category: SkillCategory;
  readonly enabled: boolean;
}

export interface BadgeSpec {
  readonly badgeType: string;
  readonly title: string;
  readonly description: string | null;
  readonly icon: string;
  readonly rarity: BadgeRarity;
  /** `null` lets the assigning tier decide. */
  readonly category: BadgeCategory | null;
  readonly condition: BadgeCondition;
  readonly enabled: boolean;
}

export interface TierReward {
  readonly baseXp: number;
  readonly xpMultiplier: number;
  readonly credits: number;
  readonly skillPoints: number;
  /** `null` means "use the built-in badges for this tier". */
  readonly badges: readonly BadgeSpec[] | null;
}

export interface PlacementTier extends TierReward {
  readonly placement: number;
}

export interface TopPercentTier extends TierReward {
  readonly percent: number;
}

export interface RewardPolicy {
  readonly templateName: string | null;
  readonly skillMappings: readonly SkillMapping[];
  readonly placementTiers: readonly PlacementTier[];
  readonly topPercent: TopPercentTier | null;
  readonly participation: TierReward;
}

const BADGE_TYPE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

const badgeSpecSchema = z
  .object({
    badge_type: z.string().regex(BADGE_TYPE_PATTERN, 'badge_type must be UPPER_SNAKE_CASE'),
    title: z.string().trim().min(1),
    description: z.string().nullish(),
    icon: z.string().min(1).default('🏆'),
    rarity: z.enum(BADGE_RARITIES).default('COMMON'),
    category: z.enum(BADGE_CATEGORIES).optional(),
    condition: z.enum(BADGE_CONDITIONS).default('always'),
    enabled: z.boolean().default(true)
  })
  .strict();

const skillMappingSchema = z
  .object({
    skill: z.string().trim().min(1),
    weight: z.number().min(0.1).max(5),
    category: z.enum(SKILL_CATEGORIES).default('PHYSICAL'),
    enabled: z.boolean().default(false)
  })
  .strict();

const tierRewardShape = {
  base_xp: z.number().int().min(0),
  xp_multiplier: z.number().min(0).max(5).default(1),
  credits: z.number().int().min(0).default(0),
  skill_points: z.number().min(0).max(1000).default(0),
  badges: z.array(badgeSpecSchema).optional()
};

const tierRewardSchema = z.object(tierRewardShape).strict();

const placementTierSchema = z
  .object({ ...tierRewardShape, placement: z.number().int().positive() })
  .strict();

const topPercentTierSchema = z
  .object({ ...tierRewardShape, percent: z.number().positive().max(100) })
  .strict();

export const rewardPolicySchema = z
  .object({
    template_name: z.string().trim().min(1).nullish(),
    skill_mappings: z.array(skillMappingSchema).default([]),
    placement_tiers: z.array(placementTierSchema).default([]),
    top_percent: topPercentTierSchema.nullish(),
    participation: tierRewardSchema
  })
  .strict()
  .superRefine((value, ctx) => {
    const placements = new Set<number>();
    value.placement_tiers.forEach((tier, index) => {
      if (placements.has(tier.placement)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['placement_tiers', index, 'placement'],
          message: `placement ${tier.placement} is configured more than once`
        });
      }
      placements.add(tier.placement);
    });

    const skills = new Set<string>();
    value.skill_mappings.forEach((mapping, index) => {
      if (skills.has(mapping.skill)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['skill_mappings', index, 'skill'],
          message: `skill ${mapping.skill} is mapped more than once`
        });
      }
      skills.add(mapping.skill);
    });
  });

/** Wire shape of a policy blob, as stored on a tournament or sent by an operator. */
export type RewardPolicyInput = z.input<typeof rewardPolicySchema>;

type ParsedPolicy = z.output<typeof rewardPolicySchema>;
type ParsedTier = z.output<typeof tierRewardSchema>;
type ParsedBadge = z.output<typeof badgeSpecSchema>;

const toBadgeSpec = (badge: ParsedBadge): BadgeSpec =>
  Object.freeze({
    badgeType: badge.badge_type,
    title: badge.title,
    description: badge.description ?? null,
    icon: badge.icon,
    rarity: badge.rarity,
    category: badge.category ?? null,
    condition: badge.condition,
    enabled: badge.enabled
  });

const toTierReward = (tier: ParsedTier): TierReward => ({
  baseXp: tier.base_xp,
  xpMultiplier: tier.xp_multiplier,
  credits: tier.credits,
  skillPoints: tier.skill_points,
  badges: tier.badges ? Object.freeze(tier.badges.map(toBadgeSpec)) : null
});

const toRewardPolicy = (parsed: ParsedPolicy): RewardPolicy =>
  Object.freeze({
    templateName: parsed.template_name ?? null,
    skillMappings: Object.freeze(parsed.skill_mappings.map((mapping) => Object.freeze({ ...mapping }))),
    placementTiers: Object.freeze(
      [...parsed.placement_tiers]
        .sort((left, right) => left.placement - right.placement)
        .map((tier) => Object.freeze({ ...toTierReward(tier), placement: tier.placement }))
    ),
    topPercent: parsed.top_percent
      ? Object.freeze({ ...toTierReward(parsed.top_percent), percent: parsed.top_percent.percent })
      : null,
    participation: Object.freeze(toTierReward(parsed.participation))
  });

/**
 * Parses a raw policy blob into a frozen {@link RewardPolicy}.
 * Throws a `POLICY_INVALID` {@link RewardEngineError} listing every issue.
 */
export const parseRewardPolicy = (input: unknown): RewardPolicy => {
  const result = rewardPolicySchema.safeParse(input);
  if (!result.success) {
    throw policyError('Reward policy is malformed', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    });
  }
  return toRewardPolicy(result.data);
};
