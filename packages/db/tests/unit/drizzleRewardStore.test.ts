import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { wrapPool } from '../../src/adapters/connection.js';
import { DbError, DbErrorCode, isUniqueViolation, registerMetricsHook } from '../../src/instrumentation/metrics.js';
import { dbSchema, skillRewards, tournamentBadges, tournamentParticipations, tournaments } from '../../src/schema/index.js';
import { createDrizzleRewardStore } from '../../src/store/drizzleRewardStore.js';
import type { RewardStore } from '../../src/store/rewardStore.js';
import { RecordingPool, rowOf } from '../fixtures/recordingPool.js';

const CREATED_AT = new Date('2026-03-01T09:00:00.000Z');
const DISTRIBUTED_AT = new Date('2026-03-02T12:00:00.000Z');

const tournamentRow = rowOf(tournaments, {
  id: 'tournament-1',
  name: 'Spring Cup',
  status: 'COMPLETED',
  created_at: CREATED_AT,
  updated_at: CREATED_AT
});

const participationRow = (redistributionCount: number): unknown[] =>
  rowOf(tournamentParticipations, {
    id: 'participation-1',
    user_id: 'user-1',
    tournament_id: 'tournament-1',
    placement: 1,
    skill_points: { speed: 4.4 },
    base_xp: 500,
    bonus_xp: 35,
    total_xp: 535,
    credits: 100,
    distributed_at: DISTRIBUTED_AT,
    distributed_by: 'operator-1',
    redistribution_count: redistributionCount,
    created_at: CREATED_AT,
    updated_at: DISTRIBUTED_AT
  });

const participationWrite = {
  userId: 'user-1',
  tournamentId: 'tournament-1',
  placement: 1,
  skillPoints: { speed: 4.4 },
  baseXp: 500,
  bonusXp: 35,
  totalXp: 535,
  credits: 100,
  distributedAt: DISTRIBUTED_AT,
  distributedBy: 'operator-1'
};

const pgError = (code: string): Error => Object.assign(new Error(`pg error ${code}`), { code });

class StaleTournamentError extends Error {}

const BEGIN = 'begin isolation level read committed';

describe('createDrizzleRewardStore', () => {
  let recording: RecordingPool;
  let store: RewardStore;
  const hook = vi.fn();

  beforeEach(() => {
    hook.mockReset();
    registerMetricsHook(hook);
    recording = new RecordingPool();
    recording.respondTo(/^select .* from "tournaments"/, () => [tournamentRow]);
    store = createDrizzleRewardStore(wrapPool(recording.pool, { schema: dbSchema }));
  });

  afterEach(() => {
    registerMetricsHook(null);
  });

  describe('withTournamentLock', () => {
    it('row-locks the tournament inside a read committed transaction', async () => {
      const locked = await store.withTournamentLock('tournament-1', async (session) => session.tournament);

      expect(locked).toMatchObject({ id: 'tournament-1', name: 'Spring Cup', status: 'COMPLETED', rewardPolicy: null });
      expect(recording.statements()).toEqual([BEGIN, expect.stringContaining(' for update'), 'commit']);
      expect(recording.queries.every((query) => query.transactional)).toBe(true);
      expect(recording.queries[1]?.params).toContain('tournament-1');
      expect(recording.releasedClients).toBe(1);
    });

    it('rolls back and reports a missing tournament as not found', async () => {
      recording = new RecordingPool().respondTo(/^select .* from "tournaments"/, () => []);
      store = createDrizzleRewardStore(wrapPool(recording.pool, { schema: dbSchema }));

      const failure = store.withTournamentLock('tournament-9', async () => 'unreachable');

      await expect(failure).rejects.toBeInstanceOf(DbError);
      await expect(failure).rejects.toMatchObject({ code: DbErrorCode.NOT_FOUND, detail: { reason: 'record_missing' } });
      expect(recording.statements().at(-1)).toBe('rollback');
    });

    it('rethrows errors raised by the work unchanged', async () => {
      const rejection = new StaleTournamentError('Tournament is no longer completed');

      await expect(
        store.withTournamentLock('tournament-1', async () => {
          throw rejection;
        })
      ).rejects.toBe(rejection);

      expect(recording.statements()).toEqual([BEGIN, expect.stringContaining(' for update'), 'rollback']);
      expect(hook).toHaveBeenCalledWith({
        operation: 'withTournamentLock',
        outcome: 'error',
        durationMs: expect.any(Number)
      });
    });

    it('keeps the classification of a failed write inside the lock', async () => {
      recording.respondTo(/^insert into "tournament_participations"/, () => {
        throw pgError('23505');
      });

      const failure = store.withTournamentLock('tournament-1', (session) =>
        session.insertParticipation(participationWrite)
      );

      await expect(failure).rejects.toSatisfy(isUniqueViolation);
      expect(recording.statements().at(-1)).toBe('rollback');
      expect(hook).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'insertParticipation', outcome: 'error', errorCode: DbErrorCode.CONFLICT })
      );
      expect(hook).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'withTournamentLock', outcome: 'error', errorCode: DbErrorCode.CONFLICT })
      );
    });
  });

  describe('write session', () => {
    it('replaces a participation through an upsert that counts the redistribution', async () => {
      recording.respondTo(/^insert into "tournament_participations"/, () => [participationRow(2)]);

      const replaced = await store.withTournamentLock('tournament-1', (session) =>
        session.replaceParticipation(participationWrite)
      );

      const upsert = recording.queries.find((query) => query.text.startsWith('insert into "tournament_participations"'));
      expect(upsert?.text).toMatch(/on conflict .* do update set/);
      expect(upsert?.text).toMatch(/"redistribution_count" = .*"redistribution_count" \+ 1/);
      expect(replaced).toMatchObject({ userId: 'user-1', totalXp: 535, redistributionCount: 2 });
    });

    it('inserts badges without overwriting existing types and returns only new rows', async () => {
      recording.respondTo(/^insert into "tournament_badges"/, () => [
        rowOf(tournamentBadges, {
          id: 'badge-1',
          user_id: 'user-1',
          tournament_id: 'tournament-1',
          badge_type: 'CHAMPION',
          category: 'PLACEMENT',
          title: 'Champion',
          description: 'Won 1st place in Spring Cup',
          icon: '🥇',
          rarity: 'EPIC',
          metadata: { placement: 1 },
          created_at: DISTRIBUTED_AT
        })
      ]);

      const badge = {
        userId: 'user-1',
        tournamentId: 'tournament-1',
        category: 'PLACEMENT' as const,
        description: null,
        icon: '🥇',
        rarity: 'EPIC' as const,
        metadata: { placement: 1 }
      };
      const inserted = await store.withTournamentLock('tournament-1', (session) =>
        session.insertBadges([
          { ...badge, badgeType: 'CHAMPION', title: 'Champion' },
          { ...badge, badgeType: 'PARTICIPANT', title: 'Tournament Participant' }
        ])
      );

      const insert = recording.queries.find((query) => query.text.startsWith('insert into "tournament_badges"'));
      expect(insert?.text).toMatch(/on conflict \(.*"badge_type".*\) do nothing/);
      expect(inserted.map((row) => row.badgeType)).toEqual(['CHAMPION']);
    });

    it('appends only non-zero ledger rows', async () => {
      recording.respondTo(/^insert into "skill_rewards"/, () => [rowOf(skillRewards, { id: 'ledger-1' }).slice(0, 1)]);

      const written = await store.withTournamentLock('tournament-1', (session) =>
        session.appendSkillRewards([
          { userId: 'user-1', sourceType: 'TOURNAMENT', sourceId: 'tournament-1', skillName: 'speed', pointsAwarded: 1.5 },
          { userId: 'user-1', sourceType: 'TOURNAMENT', sourceId: 'tournament-1', skillName: 'agility', pointsAwarded: 0 }
        ])
      );

      const inserts = recording.queries.filter((query) => query.text.startsWith('insert into "skill_rewards"'));
      expect(written).toBe(1);
      expect(inserts).toHaveLength(1);
      expect(inserts[0]?.params).toEqual(['user-1', 'TOURNAMENT', 'tournament-1', 'speed', 1.5]);
    });

    it('skips the ledger round trip when every delta is zero', async () => {
      await store.withTournamentLock('tournament-1', (session) => session.appendSkillRewards([]));

      expect(recording.statements()).toEqual([BEGIN, expect.stringContaining(' for update'), 'commit']);
    });
  });

  describe('reader', () => {
    it('runs outside any transaction and converts counts to numbers', async () => {
      recording.respondTo(/^select .* from "tournament_participations"/, () => [['user-1', '3']]);

      const counts = await store.countPriorParticipations(['user-1'], 'tournament-1');

      expect(counts).toEqual(new Map([['user-1', 3]]));
      expect(recording.queries).toHaveLength(1);
      expect(recording.queries[0]?.transactional).toBe(false);
    });

    it('groups career badge counts by user and type', async () => {
      recording.respondTo(/^select .* from "tournament_badges"/, () => [
        ['user-1', 'CHAMPION', '2'],
        ['user-1', 'TRIPLE_CROWN', '1'],
        ['user-2', 'CHAMPION', '1']
      ]);

      const counts = await store.countPriorBadges(['user-1', 'user-2'], ['CHAMPION', 'TRIPLE_CROWN'], 'tournament-1');

      expect(counts).toEqual(
        new Map([
          ['user-1', { CHAMPION: 2, TRIPLE_CROWN: 1 }],
          ['user-2', { CHAMPION: 1 }]
        ])
      );
      expect(recording.queries[0]?.text).toMatch(/group by .*"user_id".*"badge_type"/);
      expect(recording.queries[0]?.params).toEqual(['user-1', 'user-2', 'CHAMPION', 'TRIPLE_CROWN', 'tournament-1']);
    });

    it('skips the badge count query when there is nothing to count', async () => {
      await expect(store.countPriorBadges(['user-1'], [], 'tournament-1')).resolves.toEqual(new Map());
      expect(recording.queries).toHaveLength(0);
    });

    it('classifies driver failures on reads', async () => {
      recording.respondTo(/^select .* from "tournament_participations"/, () => {
        throw pgError('57P01');
      });

      await expect(store.listParticipations('tournament-1')).rejects.toMatchObject({
        code: DbErrorCode.TRANSIENT,
        detail: { reason: 'connection_failure' }
      });
    });
  });
});
