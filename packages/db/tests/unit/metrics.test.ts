import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  DbError,
  DbErrorCode,
  ensureDbError,
  isUniqueViolation,
  registerMetricsHook,
  withMetrics
} from '../../src/instrumentation/metrics.js';

const pgError = (code: string): Error =>
  Object.assign(new Error(`pg error ${code}`), {
    code,
    constraint: 'tournament_participations_user_tournament_unique',
    table: 'tournament_participations'
  });

afterEach(() => {
  registerMetricsHook(null);
});

describe('ensureDbError', () => {
  it('classifies a unique violation as a conflict', () => {
    const error = ensureDbError(pgError('23505'));

    expect(error.code).toBe(DbErrorCode.CONFLICT);
    expect(error.detail).toEqual({
      reason: 'unique_violation',
      context: {
        code: '23505',
        constraint: 'tournament_participations_user_tournament_unique',
        table: 'tournament_participations'
      }
    });
    expect(isUniqueViolation(error)).toBe(true);
  });

  it.each([
    ['23503', DbErrorCode.NOT_FOUND, 'foreign_key_violation'],
    ['23514', DbErrorCode.INPUT_INVALID, 'constraint_violation'],
    ['22P02', DbErrorCode.INPUT_INVALID, 'constraint_violation'],
    ['40001', DbErrorCode.TRANSIENT, 'serialization_failure'],
    ['40P01', DbErrorCode.TRANSIENT, 'serialization_failure'],
    ['55P03', DbErrorCode.TRANSIENT, 'lock_unavailable'],
    ['XX000', DbErrorCode.INTERNAL_ERROR, 'unclassified_pg_error']
  ])('maps SQLSTATE %s to %s', (sqlState, code, reason) => {
    const error = ensureDbError(pgError(sqlState));

    expect(error.code).toBe(code);
    expect(error.detail?.reason).toBe(reason);
    expect(isUniqueViolation(error)).toBe(false);
  });

  it('marks only transient failures as retryable', () => {
    expect(ensureDbError(pgError('40001')).retryable).toBe(true);
    expect(ensureDbError(pgError('23505')).retryable).toBe(false);
  });

  it('wraps errors that carry no SQLSTATE', () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    const error = ensureDbError(cause);

    expect(error.code).toBe(DbErrorCode.INTERNAL_ERROR);
    expect(error.message).toBe('connect ECONNREFUSED');
    expect(error.cause).toBe(cause);
  });

  it('wraps non-error values', () => {
    expect(ensureDbError('boom').message).toBe('Unhandled database error');
  });

  it('returns an existing DbError unchanged', () => {
    const original = new DbError(DbErrorCode.NOT_FOUND, 'missing');

    expect(ensureDbError(original)).toBe(original);
  });
});

describe('withMetrics', () => {
  it('reports successful operations', async () => {
    const hook = vi.fn();
    registerMetricsHook(hook);

    await expect(withMetrics('findTournament', async () => 'ok')).resolves.toBe('ok');
    expect(hook).toHaveBeenCalledWith(expect.objectContaining({ operation: 'findTournament', outcome: 'success' }));
  });

  it('classifies and rethrows failures', async () => {
    const hook = vi.fn();
    registerMetricsHook(hook);

    const failure = withMetrics('insertParticipation', async () => {
      throw pgError('23505');
    });

    await expect(failure).rejects.toBeInstanceOf(DbError);
    await expect(failure).rejects.toMatchObject({ code: DbErrorCode.CONFLICT });
    expect(hook).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'insertParticipation', outcome: 'error', errorCode: DbErrorCode.CONFLICT })
    );
  });

  it('reports and rethrows accepted errors without classifying them', async () => {
    const hook = vi.fn();
    registerMetricsHook(hook);
    const rejection = new Error('tournament changed state');

    await expect(
      withMetrics(
        'withTournamentLock',
        async () => {
          throw rejection;
        },
        { passThrough: (error) => error === rejection }
      )
    ).rejects.toBe(rejection);
    expect(hook).toHaveBeenCalledWith({ operation: 'withTournamentLock', outcome: 'error', durationMs: expect.any(Number) });
  });
});
