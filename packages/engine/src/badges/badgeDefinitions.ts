import type { BadgeCategory, BadgeRarity, BadgeSpec } from '../policy/rewardPolicy.js';

export const BADGE_RARITY_RANK: Readonly<Record<BadgeRarity, number>> = Object.freeze({
  LEGENDARY: 5,
  EPIC: 4,
  RARE: 3,
  UNCOMMON: 2,
  COMMON: 1
});

const define = (
  badgeType: string,
  icon: string,
  title: string,
  description: string,
  rarity: BadgeRarity,
  category: BadgeCategory
): BadgeSpec =>
  Object.freeze({ badgeType, icon, title, description, rarity, category, condition: 'always', enabled: true });

export const PARTICIPANT_BADGE = define(
  'PARTICIPANT',
  '⚽',
  'Tournament Participant',
  'Participated in {tournament_name}',
  'COMMON',
  'PARTICIPATION'
);

/** Granted on a user's first rewarded tournament unless the policy brings its own debut badge. */
export const DEBUT_BADGE = define(
  'FIRST_TOURNAMENT',
  '🌟',
  'Tournament Debut',
  'First ever tournament: {tournament_name}',
  'UNCOMMON',
  'PARTICIPATION'
);

export const CHAMPION_BADGE = define(
  'CHAMPION',
  '🥇',
  'Champion',
  'Won 1st place in {tournament_name}',
  'EPIC',
  'PLACEMENT'
);

export const DEFAULT_PLACEMENT_BADGES: Readonly<Record<number, BadgeSpec>> = Object.freeze({
  1: CHAMPION_BADGE,
  2: define('RUNNER_UP', '🥈', 'Runner-Up', 'Finished 2nd in {tournament_name}', 'RARE', 'PLACEMENT'),
  3: define('THIRD_PLACE', '🥉', 'Third Place', 'Secured 3rd place in {tournament_name}', 'RARE', 'PLACEMENT')
});

export const DEFAULT_TOP_PERCENT_BADGE = define(
  'TOP_PERFORMER',
  '🌟',
  'Top Performer',
  'Finished near the top of {tournament_name}',
  'RARE',
  'ACHIEVEMENT'
);

export interface MilestoneBadge {
  readonly threshold: number;
  readonly spec: BadgeSpec;
}

export const MILESTONE_BADGES: readonly MilestoneBadge[] = Object.freeze([
  {
    threshold: 5,
    spec: define('TOURNAMENT_VETERAN', '🎖️', 'Tournament Veteran', 'Completed {count} tournaments', 'RARE', 'MILESTONE')
  },
  {
    threshold: 10,
    spec: define('TOURNAMENT_LEGEND', '👑', 'Tournament Legend', 'Completed {count} tournaments', 'LEGENDARY', 'MILESTONE')
  }
]);

export const TRIPLE_CROWN_WINS = 3;

/** Career milestone, granted once, when the user's champion badges reach {@link TRIPLE_CROWN_WINS}. */
export const TRIPLE_CROWN_BADGE = define(
  'TRIPLE_CROWN',
  '🔥',
  'Triple Crown',
  'Won {champion_count} tournaments, the latest being {tournament_name}',
  'LEGENDARY',
  'MILESTONE'
);

/** Badge types counted across a user's other tournaments before badges are assigned. */
export const CAREER_BADGE_TYPES: readonly string[] = Object.freeze([
  CHAMPION_BADGE.badgeType,
  TRIPLE_CROWN_BADGE.badgeType
]);
