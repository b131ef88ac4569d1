import { isRewardEngineError } from '../errors/rewardEngineError.js';
import { parseRewardPolicy, type RewardPolicy } from './rewardPolicy.js';
import { REWARD_TEMPLATES, isRewardTemplateName } from './templates.js';

export type PolicySource = 'custom' | 'template' | 'default';

export type PolicyFallbackReason = 'policy_missing' | 'policy_invalid' | 'template_unknown';

export interface PolicyResolution {
  readonly policy: RewardPolicy;
  readonly source: PolicySource;
  /** Set whenever the default policy stands in for a requested one. */
  readonly fallback: {
    readonly reason: PolicyFallbackReason;
    readonly issues: readonly string[];
  } | null;
}

export interface PolicyResolutionInput {
  readonly policy?: unknown;
  readonly templateName?: string | null;
}

export const DEFAULT_REWARD_POLICY: RewardPolicy = parseRewardPolicy({
  template_name: null,
  skill_mappings: [],
  placement_tiers: [
    { placement: 1, base_xp: 500, credits: 100, skill_points: 10 },
    { placement: 2, base_xp: 300, credits: 50, skill_points: 7 },
    { placement: 3, base_xp: 200, credits: 25, skill_points: 5 }
  ],
  participation: { base_xp: 50, credits: 0, skill_points: 1 }
});

export const getRewardTemplate = (name: string): RewardPolicy | null =>
  isRewardTemplateName(name) ? parseRewardPolicy(REWARD_TEMPLATES[name]) : null;

const issuesOf = (error: unknown): string[] => {
  if (isRewardEngineError(error) && Array.isArray(error.details.issues)) {
    return error.details.issues.filter((issue): issue is string => typeof issue === 'string');
  }
  return [];
};

const fallbackTo = (reason: PolicyFallbackReason, issues: readonly string[] = []): PolicyResolution => ({
  policy: DEFAULT_REWARD_POLICY,
  source: 'default',
  fallback: { reason, issues: Object.freeze([...issues]) }
});

/**
 * Picks the policy for a distribution: an explicit policy blob wins, then a
 * named template, then the system default. Never throws; the caller logs
 * `fallback` when it is set.
 */
export const resolveRewardPolicy = (input: PolicyResolutionInput): PolicyResolution => {
  if (input.policy !== undefined && input.policy !== null) {
    try {
      return { policy: parseRewardPolicy(input.policy), source: 'custom', fallback: null };
    } catch (error) {
      if (isRewardEngineError(error) && error.code === 'POLICY_INVALID') {
        return fallbackTo('policy_invalid', issuesOf(error));
      }
      throw error;
    }
  }

  if (input.templateName) {
    const template = getRewardTemplate(input.templateName);
    return template
      ? { policy: template, source: 'template', fallback: null }
      : fallbackTo('template_unknown', [`unknown template ${input.templateName}`]);
  }

  return fallbackTo('policy_missing');
};
