import { describe, expect, it } from 'vitest';
import { createRewardOrchestrator } from '../../src/services/rewardOrchestrator.js';
import { createRewardPreviewService } from '../../src/services/rewardPreview.js';
import { InMemoryRewardStore } from '../fixtures/inMemoryRewardStore.js';
import { silentLogger } from '../fixtures/logging.js';
import { EIGHT_PLAYERS, FIXED_NOW, SPRING_CUP, seedSpringCup } from '../fixtures/tournaments.js';

describe('RewardPreviewService.previewRewards', () => {
  it('computes the distribution without writing anything', async () => {
    const store = seedSpringCup();
    const preview = createRewardPreviewService({ reader: store, logger: silentLogger() });

    const summary = await preview.previewRewards({ tournamentId: SPRING_CUP });

    expect(summary).toMatchObject({
      status: 'distributed',
      dryRun: true,
      rewardsDistributedCount: 8,
      totalXpAwarded: 970,
      totalCreditsAwarded: 100,
      totalBadgesAwarded: 17,
      distributedAt: null
    });
    expect(store.writes).toEqual([]);
    expect(store.participations).toHaveLength(0);
    expect(store.tournament(SPRING_CUP)?.status).toBe('COMPLETED');
  });

  it('previews a tournament that is still running', async () => {
    const store = new InMemoryRewardStore();
    store.addTournament({ id: 'live', status: 'IN_PROGRESS' });
    const preview = createRewardPreviewService({ reader: store, logger: silentLogger() });

    const summary = await preview.previewRewards({
      tournamentId: 'live',
      participants: [
        { userId: 'user-a', placement: 1 },
        { userId: 'user-b', placement: 2 }
      ]
    });

    expect(summary.policySource).toBe('default');
    expect(summary.participants.map((entry) => [entry.userId, entry.totalXp, entry.badges])).toEqual([
      ['user-a', 500, ['CHAMPION', 'FIRST_TOURNAMENT', 'PARTICIPANT']],
      ['user-b', 300, ['RUNNER_UP', 'FIRST_TOURNAMENT', 'PARTICIPANT']]
    ]);
  });

  it('shows what a forced redistribution would replace', async () => {
    const store = seedSpringCup();
    await createRewardOrchestrator({ store, logger: silentLogger(), clock: () => FIXED_NOW }).distributeRewards({
      tournamentId: SPRING_CUP
    });
    const preview = createRewardPreviewService({ reader: store, logger: silentLogger() });

    const plain = await preview.previewRewards({ tournamentId: SPRING_CUP });
    const forced = await preview.previewRewards({ tournamentId: SPRING_CUP, forceRedistribution: true });

    expect(plain).toMatchObject({
      status: 'already_distributed',
      skippedCount: EIGHT_PLAYERS.length,
      previouslyDistributed: { participants: 8, totalXp: 970, totalCredits: 100 }
    });
    expect(forced).toMatchObject({ status: 'redistributed', rewardsDistributedCount: 8, totalBadgesAwarded: 0 });
  });
});
