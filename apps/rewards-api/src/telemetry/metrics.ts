import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface MetricsOptions {
  prefix?: string;
  defaultLabels?: Record<string, string>;
  collectDefaults?: boolean;
}

export type DistributionOutcome =
  | 'distributed'
  | 'redistributed'
  | 'already_distributed'
  | 'rejected'
  | 'failed';

export type DbOperationOutcome = 'success' | 'failure';

export interface RewardMetrics {
  registry: Registry;
  distributionCounter: Counter<'outcome'>;
  distributionDuration: Histogram<'outcome'>;
  participantsRewarded: Counter<'action'>;
  policyFallbackCounter: Counter<'reason'>;
  dbOperationDuration: Histogram<'operation' | 'outcome'>;
}

export const createRewardMetrics = (options: MetricsOptions = {}): RewardMetrics => {
  const prefix = options.prefix ?? 'rewards_api_';
  const registry = new Registry();

  if (options.defaultLabels) {
    registry.setDefaultLabels(options.defaultLabels);
  }

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const distributionCounter = new Counter({
    name: `${prefix}distributions_total`,
    help: 'Reward distribution calls grouped by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry]
  });

  const distributionDuration = new Histogram({
    name: `${prefix}distribution_duration_seconds`,
    help: 'Reward distribution duration in seconds',
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    labelNames: ['outcome'] as const,
    registers: [registry]
  });

  const participantsRewarded = new Counter({
    name: `${prefix}participants_rewarded_total`,
    help: 'Participants rewarded, split by whether the reward was new or replaced',
    labelNames: ['action'] as const,
    registers: [registry]
  });

  const policyFallbackCounter = new Counter({
    name: `${prefix}policy_fallbacks_total`,
    help: 'Distributions that fell back to the default reward policy',
    labelNames: ['reason'] as const,
    registers: [registry]
  });

  const dbOperationDuration = new Histogram({
    name: `${prefix}db_operation_duration_seconds`,
    help: 'Reward store operation duration in seconds',
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
    labelNames: ['operation', 'outcome'] as const,
    registers: [registry]
  });

  return {
    registry,
    distributionCounter,
    distributionDuration,
    participantsRewarded,
    policyFallbackCounter,
    dbOperationDuration
  };
};

export const recordDistribution = (
  metrics: RewardMetrics,
  outcome: DistributionOutcome,
  durationSeconds: number
): void => {
  metrics.distributionCounter.labels(outcome).inc();
  metrics.distributionDuration.labels(outcome).observe(durationSeconds);
};

export const recordParticipantsRewarded = (
  metrics: RewardMetrics,
  action: 'create' | 'replace',
  count: number
): void => {
  if (count > 0) {
    metrics.participantsRewarded.labels(action).inc(count);
  }
};

export const recordPolicyFallback = (metrics: RewardMetrics, reason: string): void => {
  metrics.policyFallbackCounter.labels(reason).inc();
};

export const recordDbOperation = (
  metrics: RewardMetrics,
  operation: string,
  outcome: DbOperationOutcome,
  durationSeconds: number
): void => {
  metrics.dbOperationDuration.labels(operation, outcome).observe(durationSeconds);
};

export const serializeRewardMetrics = async (metrics: RewardMetrics): Promise<string> =>
  metrics.registry.metrics();
