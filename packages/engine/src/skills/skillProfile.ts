import { roundToTenth } from './skillPointDistributor.js';
import {
  DEFAULT_BASELINE,
  calculateSkillValue,
  resolveSkillTier,
  type SkillTier
} from './skillProgressionCalculator.js';

export interface PlacementHistoryEntry {
  readonly tournamentId: string;
  readonly placement: number;
  readonly totalParticipants: number;
  /** Skills that received points in that tournament. */
  readonly skills: readonly string[];
  readonly distributedAt: Date;
}

export interface SkillProfileInput {
  readonly baselines: Readonly<Record<string, number>>;
  readonly history: readonly PlacementHistoryEntry[];
  readonly ledgerTotals: Readonly<Record<string, number>>;
}

export interface SkillProfileEntry {
  readonly skill: string;
  readonly baseline: number;
  readonly currentLevel: number;
  readonly tournamentDelta: number;
  readonly ledgerPoints: number;
  readonly tournamentCount: number;
  readonly tier: SkillTier;
}

export interface SkillProfile {
  readonly skills: Readonly<Record<string, SkillProfileEntry>>;
  readonly averageLevel: number;
  readonly totalTournaments: number;
}

/**
 * Derives a profile on read. The level of a skill blends its onboarding
 * baseline with the most recent placement that trained it, weighted by how
 * many tournaments have trained it so far.
 */
export const buildSkillProfile = (input: SkillProfileInput): SkillProfile => {
  const chronological = [...input.history].sort(
    (left, right) => left.distributedAt.getTime() - right.distributedAt.getTime()
  );

  const names = new Set<string>([
    ...Object.keys(input.baselines),
    ...Object.keys(input.ledgerTotals),
    ...chronological.flatMap((entry) => entry.skills)
  ]);

  const skills: Record<string, SkillProfileEntry> = {};
  for (const skill of [...names].sort()) {
    const baseline = input.baselines[skill] ?? DEFAULT_BASELINE;
    const trained = chronological.filter((entry) => entry.skills.includes(skill));
    const latest = trained.at(-1);

    const currentLevel = latest
      ? calculateSkillValue({
          baseline,
          placement: latest.placement,
          // gaps in the final standings can leave a placement above the rewarded field
          totalParticipants: Math.max(latest.totalParticipants, latest.placement),
          tournamentCount: trained.length
        })
      : baseline;

    const reportedLevel = roundToTenth(currentLevel);
    skills[skill] = {
      skill,
      baseline,
      currentLevel: reportedLevel,
      tournamentDelta: roundToTenth(currentLevel - baseline),
      ledgerPoints: roundToTenth(input.ledgerTotals[skill] ?? 0),
      tournamentCount: trained.length,
      tier: resolveSkillTier(reportedLevel)
    };
  }

  const levels = Object.values(skills).map((entry) => entry.currentLevel);
  const averageLevel = levels.length === 0 ? 0 : roundToTenth(levels.reduce((sum, level) => sum + level, 0) / levels.length);

  return {
    skills,
    averageLevel,
    totalTournaments: new Set(chronological.map((entry) => entry.tournamentId)).size
  };
};
