import { describe, expect, it } from 'vitest';
import { buildBadgeShowcase, type AwardedBadge, type BadgeCategory, type BadgeRarity } from '../src/index.js';

const badge = (
  id: string,
  rarity: BadgeRarity,
  category: BadgeCategory,
  day: number
): AwardedBadge => ({
  id,
  userId: 'user-1',
  tournamentId: `tournament-${day}`,
  badgeType: id.toUpperCase(),
  category,
  title: id,
  description: null,
  icon: '🏆',
  rarity,
  metadata: {},
  createdAt: new Date(Date.UTC(2026, 0, day))
});

describe('buildBadgeShowcase', () => {
  const badges = [
    badge('participant-1', 'COMMON', 'PARTICIPATION', 1),
    badge('champion', 'EPIC', 'PLACEMENT', 2),
    badge('participant-2', 'COMMON', 'PARTICIPATION', 3),
    badge('runner-up', 'RARE', 'PLACEMENT', 4),
    badge('legend', 'LEGENDARY', 'MILESTONE', 5),
    badge('participant-3', 'COMMON', 'PARTICIPATION', 6),
    badge('participant-4', 'COMMON', 'PARTICIPATION', 7)
  ];

  it('ranks the rarest badges first, newest first among equals', () => {
    const showcase = buildBadgeShowcase(badges);

    expect(showcase.totalBadges).toBe(7);
    expect(showcase.rarest.map((entry) => entry.id)).toEqual([
      'legend',
      'champion',
      'runner-up',
      'participant-4',
      'participant-3'
    ]);
  });

  it('lists the five most recent badges', () => {
    expect(buildBadgeShowcase(badges).recent.map((entry) => entry.id)).toEqual([
      'participant-4',
      'participant-3',
      'legend',
      'runner-up',
      'participant-2'
    ]);
  });

  it('groups by category with counts and a three badge preview', () => {
    const { byCategory } = buildBadgeShowcase(badges);

    expect(byCategory.PARTICIPATION.count).toBe(4);
    expect(byCategory.PARTICIPATION.badges.map((entry) => entry.id)).toEqual([
      'participant-4',
      'participant-3',
      'participant-2'
    ]);
    expect(byCategory.PLACEMENT.count).toBe(2);
    expect(byCategory.MILESTONE.count).toBe(1);
    expect(byCategory.ACHIEVEMENT).toEqual({ count: 0, badges: [] });
  });

  it('handles a user without badges', () => {
    expect(buildBadgeShowcase([])).toMatchObject({ totalBadges: 0, rarest: [], recent: [] });
  });
});
