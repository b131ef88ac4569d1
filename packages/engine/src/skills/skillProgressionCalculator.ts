import { validationError } from '../errors/rewardEngineError.js';

export const MIN_SKILL_VALUE = 40;
export const MAX_SKILL_CAP = 100;
export const DEFAULT_BASELINE = 50;

export const SKILL_TIERS = ['MASTER', 'ADVANCED', 'INTERMEDIATE', 'DEVELOPING', 'BEGINNER'] as const;
export type SkillTier = (typeof SKILL_TIERS)[number];

export interface SkillProgressionInput {
  readonly baseline: number;
  readonly placement: number;
  readonly totalParticipants: number;
  /** Tournaments counted for this skill, including the current one. Zero yields the baseline. */
  readonly tournamentCount: number;
  readonly weightMultiplier?: number;
}

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/** Linear from {@link MAX_SKILL_CAP} for 1st down to {@link MIN_SKILL_VALUE} for last. */
export const placementValue = (placement: number, totalParticipants: number): number => {
  if (totalParticipants <= 1) {
    return MAX_SKILL_CAP;
  }
  const percentile = (placement - 1) / (totalParticipants - 1);
  return MAX_SKILL_CAP - percentile * (MAX_SKILL_CAP - MIN_SKILL_VALUE);
};

export const calculateSkillValue = (input: SkillProgressionInput): number => {
  const { baseline, placement, totalParticipants, tournamentCount } = input;
  const weightMultiplier = input.weightMultiplier ?? 1;

  if (!Number.isInteger(placement) || placement < 1 || placement > totalParticipants) {
    throw validationError('Placement must lie within the participant count', { placement, totalParticipants });
  }
  if (!Number.isInteger(tournamentCount) || tournamentCount < 0) {
    throw validationError('Tournament count must be a non-negative integer', { tournamentCount });
  }

  const baselineWeight = 1 / (tournamentCount + 1);
  const placementWeight = tournamentCount / (tournamentCount + 1);
  const blended = baseline * baselineWeight + placementValue(placement, totalParticipants) * placementWeight;
  const adjusted = baseline + (blended - baseline) * weightMultiplier;

  return clamp(adjusted, MIN_SKILL_VALUE, MAX_SKILL_CAP);
};

export const resolveSkillTier = (value: number): SkillTier => {
  if (value >= 95) return 'MASTER';
  if (value >= 85) return 'ADVANCED';
  if (value >= 70) return 'INTERMEDIATE';
  if (value >= 50) return 'DEVELOPING';
  return 'BEGINNER';
};
