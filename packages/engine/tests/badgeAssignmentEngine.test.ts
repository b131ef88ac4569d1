import { describe, expect, it } from 'vitest';
import {
  DEFAULT_REWARD_POLICY,
  assignBadges,
  getRewardTemplate,
  parseRewardPolicy,
  resolveTier,
  type BadgeAssignmentInput,
  type RewardPolicy
} from '../src/index.js';

const inputFor = (
  policy: RewardPolicy,
  placement: number,
  overrides: Partial<BadgeAssignmentInput> = {}
): BadgeAssignmentInput => ({
  userId: 'user-1',
  tournamentId: 'tournament-1',
  tournamentName: 'Spring Cup',
  placement,
  totalParticipants: 8,
  tier: resolveTier(policy, placement, 8),
  participationBadges: policy.participation.badges,
  presentTypes: new Set<string>(),
  priorTournamentCount: 2,
  priorBadgeCounts: {},
  ...overrides
});

const typesOf = (input: BadgeAssignmentInput): string[] => assignBadges(input).map((badge) => badge.badgeType);

describe('assignBadges', () => {
  it('awards the built-in champion badge and the participant badge', () => {
    const badges = assignBadges(inputFor(DEFAULT_REWARD_POLICY, 1));

    expect(badges).toEqual([
      {
        userId: 'user-1',
        tournamentId: 'tournament-1',
        badgeType: 'CHAMPION',
        category: 'PLACEMENT',
        title: 'Champion',
        description: 'Won 1st place in Spring Cup',
        icon: '🥇',
        rarity: 'EPIC',
        metadata: { placement: 1, totalParticipants: 8, tier: 'placement:1' }
      },
      {
        userId: 'user-1',
        tournamentId: 'tournament-1',
        badgeType: 'PARTICIPANT',
        category: 'PARTICIPATION',
        title: 'Tournament Participant',
        description: 'Participated in Spring Cup',
        icon: '⚽',
        rarity: 'COMMON',
        metadata: { placement: 1, totalParticipants: 8 }
      }
    ]);
  });

  it('uses the built-in runner-up and third place badges', () => {
    const [runnerUp] = assignBadges(inputFor(DEFAULT_REWARD_POLICY, 2));
    const [third] = assignBadges(inputFor(DEFAULT_REWARD_POLICY, 3));

    expect(runnerUp).toMatchObject({ badgeType: 'RUNNER_UP', icon: '🥈', rarity: 'RARE' });
    expect(third).toMatchObject({ badgeType: 'THIRD_PLACE', icon: '🥉', rarity: 'RARE' });
  });

  it('gives everyone else only the participant badge', () => {
    expect(typesOf(inputFor(DEFAULT_REWARD_POLICY, 6))).toEqual(['PARTICIPANT']);
  });

  it('skips types the user already holds for the tournament', () => {
    const presentTypes = new Set(['CHAMPION', 'PARTICIPANT']);

    expect(assignBadges(inputFor(DEFAULT_REWARD_POLICY, 1, { presentTypes }))).toEqual([]);
  });

  it('grants first-tournament participation badges only on debut', () => {
    const standard = getRewardTemplate('STANDARD') ?? DEFAULT_REWARD_POLICY;

    expect(typesOf(inputFor(standard, 6, { priorTournamentCount: 0 }))).toEqual(['TOURNAMENT_DEBUT', 'PARTICIPANT']);
    expect(typesOf(inputFor(standard, 6, { priorTournamentCount: 2 }))).toEqual(['PARTICIPANT']);
  });

  it('welcomes a newcomer with the built-in debut badge', () => {
    const badges = assignBadges(inputFor(DEFAULT_REWARD_POLICY, 2, { priorTournamentCount: 0 }));

    expect(badges.map((badge) => badge.badgeType)).toEqual(['RUNNER_UP', 'FIRST_TOURNAMENT', 'PARTICIPANT']);
    expect(badges[1]).toMatchObject({
      category: 'PARTICIPATION',
      title: 'Tournament Debut',
      description: 'First ever tournament: Spring Cup',
      icon: '🌟',
      rarity: 'UNCOMMON',
      metadata: { placement: 2, totalParticipants: 8 }
    });
  });

  it('prefers a debut badge from the policy over the built-in one', () => {
    const standard = getRewardTemplate('STANDARD') ?? DEFAULT_REWARD_POLICY;

    expect(typesOf(inputFor(standard, 6, { priorTournamentCount: 0 }))).not.toContain('FIRST_TOURNAMENT');
  });

  it('lets a policy participant badge replace the built-in one', () => {
    const championship = getRewardTemplate('CHAMPIONSHIP') ?? DEFAULT_REWARD_POLICY;
    const participant = assignBadges(inputFor(championship, 6)).filter((badge) => badge.badgeType === 'PARTICIPANT');

    expect(participant).toHaveLength(1);
    expect(participant[0]?.title).toBe('Championship Participant');
  });

  it('awards a milestone on the tournament that reaches it', () => {
    const badges = assignBadges(inputFor(DEFAULT_REWARD_POLICY, 6, { priorTournamentCount: 4 }));

    expect(badges.map((badge) => badge.badgeType)).toEqual(['PARTICIPANT', 'TOURNAMENT_VETERAN']);
    expect(badges[1]).toMatchObject({
      category: 'MILESTONE',
      description: 'Completed 5 tournaments',
      metadata: { placement: 6, totalParticipants: 8, tournamentCount: 5 }
    });
    expect(typesOf(inputFor(DEFAULT_REWARD_POLICY, 6, { priorTournamentCount: 5 }))).toEqual(['PARTICIPANT']);
  });

  it('crowns the third champion title', () => {
    const badges = assignBadges(inputFor(DEFAULT_REWARD_POLICY, 1, { priorBadgeCounts: { CHAMPION: 2 } }));

    expect(badges.map((badge) => badge.badgeType)).toEqual(['CHAMPION', 'PARTICIPANT', 'TRIPLE_CROWN']);
    expect(badges[2]).toMatchObject({
      category: 'MILESTONE',
      title: 'Triple Crown',
      description: 'Won 3 tournaments, the latest being Spring Cup',
      icon: '🔥',
      rarity: 'LEGENDARY',
      metadata: { placement: 1, totalParticipants: 8, championCount: 3 }
    });
  });

  it('withholds the crown without a win here or when it is already held', () => {
    expect(typesOf(inputFor(DEFAULT_REWARD_POLICY, 2, { priorBadgeCounts: { CHAMPION: 2 } }))).toEqual([
      'RUNNER_UP',
      'PARTICIPANT'
    ]);
    expect(
      typesOf(inputFor(DEFAULT_REWARD_POLICY, 1, { priorBadgeCounts: { CHAMPION: 4, TRIPLE_CROWN: 1 } }))
    ).toEqual(['CHAMPION', 'PARTICIPANT']);
  });

  it('crowns on a forced redistribution that keeps the champion badge', () => {
    const presentTypes = new Set(['CHAMPION', 'PARTICIPANT']);

    expect(
      typesOf(inputFor(DEFAULT_REWARD_POLICY, 1, { presentTypes, priorBadgeCounts: { CHAMPION: 2 } }))
    ).toEqual(['TRIPLE_CROWN']);
  });

  it('leaves out disabled badge specs', () => {
    const policy = parseRewardPolicy({
      placement_tiers: [{ placement: 1, base_xp: 100, badges: [{ badge_type: 'GOLD', title: 'Gold', enabled: false }] }],
      participation: { base_xp: 10 }
    });

    expect(typesOf(inputFor(policy, 1))).toEqual(['PARTICIPANT']);
  });

  it('gives policy badges without a category the category of their tier', () => {
    const policy = parseRewardPolicy({
      placement_tiers: [{ placement: 1, base_xp: 100, badges: [{ badge_type: 'GOLD', title: 'Gold' }] }],
      top_percent: { percent: 50, base_xp: 20 },
      participation: { base_xp: 10 }
    });

    expect(assignBadges(inputFor(policy, 1))[0]).toMatchObject({ badgeType: 'GOLD', category: 'PLACEMENT' });
    expect(assignBadges(inputFor(policy, 3))[0]).toMatchObject({
      badgeType: 'TOP_PERFORMER',
      category: 'ACHIEVEMENT',
      metadata: { tier: 'top_percent:50' }
    });
  });
});
