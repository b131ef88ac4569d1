import { describe, expect, it } from 'vitest';
import { DEFAULT_REWARD_POLICY, getRewardTemplate, resolveTier, topPercentCutoff } from '../src/index.js';

const standard = getRewardTemplate('STANDARD') ?? DEFAULT_REWARD_POLICY;

describe('resolveTier', () => {
  it('prefers an exact placement tier', () => {
    const tier = resolveTier(standard, 1, 20);

    expect(tier.kind).toBe('placement');
    expect(tier.key).toBe('placement:1');
    expect(tier.baseXp).toBe(500);
  });

  it('grants the top-percent tier up to the rounded-up cutoff', () => {
    expect(topPercentCutoff(20, 25)).toBe(5);
    expect(resolveTier(standard, 5, 20).key).toBe('top_percent:25');
    expect(resolveTier(standard, 6, 20).key).toBe('participation');
  });

  it('lets a placement tier win inside the top-percent range', () => {
    expect(topPercentCutoff(8, 25)).toBe(2);
    expect(resolveTier(standard, 2, 8).kind).toBe('placement');
    expect(resolveTier(standard, 4, 8).kind).toBe('participation');
  });

  it('falls through to participation without a top-percent tier', () => {
    const tier = resolveTier(DEFAULT_REWARD_POLICY, 4, 8);

    expect(tier.kind).toBe('participation');
    expect(tier.skillPoints).toBe(1);
  });
});
