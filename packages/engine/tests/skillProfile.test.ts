import { describe, expect, it } from 'vitest';
import { buildSkillProfile } from '../src/index.js';

describe('buildSkillProfile', () => {
  const history = [
    {
      tournamentId: 'tournament-2',
      placement: 1,
      totalParticipants: 10,
      skills: ['speed'],
      distributedAt: new Date('2026-02-01T00:00:00.000Z')
    },
    {
      tournamentId: 'tournament-1',
      placement: 10,
      totalParticipants: 10,
      skills: ['speed', 'agility'],
      distributedAt: new Date('2026-01-01T00:00:00.000Z')
    }
  ];

  const profile = buildSkillProfile({
    baselines: { speed: 70 },
    history,
    ledgerTotals: { speed: 6.6, agility: 3.3, passing: 1 }
  });

  it('blends the baseline with the latest placement for each trained skill', () => {
    expect(profile.skills.speed).toEqual({
      skill: 'speed',
      baseline: 70,
      currentLevel: 90,
      tournamentDelta: 20,
      ledgerPoints: 6.6,
      tournamentCount: 2,
      tier: 'ADVANCED'
    });
    expect(profile.skills.agility).toMatchObject({
      baseline: 50,
      currentLevel: 45,
      tournamentDelta: -5,
      tournamentCount: 1,
      tier: 'BEGINNER'
    });
  });

  it('reports untrained skills at their baseline', () => {
    expect(profile.skills.passing).toMatchObject({
      baseline: 50,
      currentLevel: 50,
      tournamentDelta: 0,
      ledgerPoints: 1,
      tournamentCount: 0,
      tier: 'DEVELOPING'
    });
  });

  it('summarises the profile', () => {
    expect(Object.keys(profile.skills)).toEqual(['agility', 'passing', 'speed']);
    expect(profile.averageLevel).toBe(61.7);
    expect(profile.totalTournaments).toBe(2);
  });

  it('treats a placement past the rewarded field as last place', () => {
    const gapped = buildSkillProfile({
      baselines: {},
      history: [
        {
          tournamentId: 'tournament-3',
          placement: 4,
          totalParticipants: 3,
          skills: ['speed'],
          distributedAt: new Date('2026-03-01T00:00:00.000Z')
        }
      ],
      ledgerTotals: {}
    });

    expect(gapped.skills.speed).toMatchObject({ currentLevel: 45, tournamentDelta: -5, tier: 'BEGINNER' });
  });

  it('is empty for a user without history', () => {
    expect(buildSkillProfile({ baselines: {}, history: [], ledgerTotals: {} })).toEqual({
      skills: {},
      averageLevel: 0,
      totalTournaments: 0
    });
  });
});
