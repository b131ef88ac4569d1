export const REWARD_ENGINE_ERROR_CODES = [
  'VALIDATION_FAILED',
  'NOT_FOUND',
  'POLICY_INVALID',
  'CONCURRENCY_CONFLICT',
  'PERSISTENCE_FAILED',
  'INTERNAL_ERROR'
] as const;

export type RewardEngineErrorCode = (typeof REWARD_ENGINE_ERROR_CODES)[number];

export type RewardEngineErrorSeverity = 'info' | 'warn' | 'error';

export interface RewardEngineErrorOptions {
  readonly cause?: unknown;
  readonly details?: Record<string, unknown>;
  readonly severity?: RewardEngineErrorSeverity;
  readonly retryable?: boolean;
  readonly timestamp?: string;
}

const freezeDetails = (details: Record<string, unknown> | undefined): Readonly<Record<string, unknown>> =>
  details ? Object.freeze({ ...details }) : Object.freeze({});

export const isRewardEngineErrorCode = (value: unknown): value is RewardEngineErrorCode =>
  REWARD_ENGINE_ERROR_CODES.some((code) => code === value);

export class RewardEngineError extends Error {
  public readonly code: RewardEngineErrorCode;

  public readonly retryable: boolean;

  public readonly severity: RewardEngineErrorSeverity;

  public readonly details: Readonly<Record<string, unknown>>;

  public readonly timestamp: string;

  constructor(code: RewardEngineErrorCode, message: string, options: RewardEngineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RewardEngineError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.severity = options.severity ?? 'error';
    this.details = freezeDetails(options.details);
    this.timestamp = options.timestamp ?? new Date().toISOString();
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      severity: this.severity,
      details: this.details,
      timestamp: this.timestamp
    };
  }
}

export const isRewardEngineError = (error: unknown): error is RewardEngineError => error instanceof RewardEngineError;

/** Input rejected before anything was written. */
export const validationError = (message: string, details?: Record<string, unknown>): RewardEngineError =>
  new RewardEngineError('VALIDATION_FAILED', message, { details, severity: 'warn' });

export const notFoundError = (message: string, details?: Record<string, unknown>): RewardEngineError =>
  new RewardEngineError('NOT_FOUND', message, { details, severity: 'info' });

export const policyError = (message: string, details?: Record<string, unknown>): RewardEngineError =>
  new RewardEngineError('POLICY_INVALID', message, { details, severity: 'warn' });

export const formatRewardEngineError = (error: RewardEngineError): string => {
  const parts = [
    `${error.name}[${error.code}] ${error.message}`,
    `retryable=${error.retryable}`,
    `severity=${error.severity}`
  ];

  if (Object.keys(error.details).length > 0) {
    parts.push(`details=${JSON.stringify(error.details)}`);
  }

  return parts.join(' | ');
};
