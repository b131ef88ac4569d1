import type { BadgeCategory, BadgeRarity, BadgeSpec } from '../policy/rewardPolicy.js';
import type { ResolvedTier } from '../rewards/tierResolution.js';
import {
  CHAMPION_BADGE,
  DEBUT_BADGE,
  DEFAULT_PLACEMENT_BADGES,
  DEFAULT_TOP_PERCENT_BADGE,
  MILESTONE_BADGES,
  PARTICIPANT_BADGE,
  TRIPLE_CROWN_BADGE,
  TRIPLE_CROWN_WINS
} from './badgeDefinitions.js';

/** A badge ready to be written; identity and timestamps come from storage. */
export interface BadgeDraft {
  readonly userId: string;
  readonly tournamentId: string;
  readonly badgeType: string;
  readonly category: BadgeCategory;
  readonly title: string;
  readonly description: string | null;
  readonly icon: string;
  readonly rarity: BadgeRarity;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface BadgeAssignmentInput {
  readonly userId: string;
  readonly tournamentId: string;
  readonly tournamentName: string;
  readonly placement: number;
  readonly totalParticipants: number;
  readonly tier: ResolvedTier;
  /** Badges the policy grants to every participant. */
  readonly participationBadges: readonly BadgeSpec[] | null;
  readonly presentTypes: ReadonlySet<string>;
  /** Tournaments the user was rewarded for before this one. */
  readonly priorTournamentCount: number;
  /** Career badge counts from the user's other tournaments, keyed by badge type. */
  readonly priorBadgeCounts: Readonly<Record<string, number>>;
}

interface Candidate {
  readonly spec: BadgeSpec;
  readonly category: BadgeCategory;
  readonly metadata: Record<string, unknown>;
}

const renderDescription = (template: string | null, values: Record<string, string | number>): string | null =>
  template === null
    ? null
    : template.replace(/\{(\w+)\}/g, (token, key: string) => (key in values ? String(values[key]) : token));

const tierCandidates = (tier: ResolvedTier, placement: number): Candidate[] => {
  if (tier.kind === 'participation') {
    return [];
  }

  const fallbackCategory: BadgeCategory = tier.kind === 'placement' ? 'PLACEMENT' : 'ACHIEVEMENT';
  let specs: readonly BadgeSpec[];
  if (tier.badges) {
    specs = tier.badges;
  } else if (tier.kind === 'top_percent') {
    specs = [DEFAULT_TOP_PERCENT_BADGE];
  } else {
    const builtIn = DEFAULT_PLACEMENT_BADGES[placement];
    specs = builtIn ? [builtIn] : [];
  }

  return specs.map((spec) => ({
    spec,
    category: spec.category ?? fallbackCategory,
    metadata: { tier: tier.key }
  }));
};

const toDraft = (
  input: BadgeAssignmentInput,
  { spec, category, metadata }: Candidate,
  values: Record<string, string | number>
): BadgeDraft => ({
  userId: input.userId,
  tournamentId: input.tournamentId,
  badgeType: spec.badgeType,
  category,
  title: spec.title,
  description: renderDescription(spec.description, values),
  icon: spec.icon,
  rarity: spec.rarity,
  metadata: Object.freeze({
    placement: input.placement,
    totalParticipants: input.totalParticipants,
    ...metadata
  })
});

/**
 * Badges a participant earns for one tournament: the tier's badges, a debut
 * badge, the policy's participation badges, the participant badge, any
 * milestone reached and the triple crown. Types already held for this
 * tournament are left out, so calling it again after a write yields nothing new.
 */
export const assignBadges = (input: BadgeAssignmentInput): BadgeDraft[] => {
  const tournamentCount = input.priorTournamentCount + 1;
  const isFirstTournament = input.priorTournamentCount === 0;
  const policyBadges = input.participationBadges ?? [];
  const policyHasDebut = policyBadges.some((spec) => spec.condition === 'first_tournament');

  const candidates: Candidate[] = [
    ...tierCandidates(input.tier, input.placement),
    ...(isFirstTournament && !policyHasDebut
      ? [{ spec: DEBUT_BADGE, category: 'PARTICIPATION' as const, metadata: {} }]
      : []),
    ...policyBadges
      .filter((spec) => spec.condition === 'always' || isFirstTournament)
      .map((spec) => ({ spec, category: spec.category ?? 'PARTICIPATION', metadata: {} })),
    { spec: PARTICIPANT_BADGE, category: 'PARTICIPATION', metadata: {} },
    ...MILESTONE_BADGES.filter((milestone) => milestone.threshold === tournamentCount).map((milestone) => ({
      spec: milestone.spec,
      category: 'MILESTONE' as const,
      metadata: { tournamentCount }
    }))
  ];

  const values = { tournament_name: input.tournamentName, count: tournamentCount, placement: input.placement };
  const seen = new Set(input.presentTypes);
  const drafts: BadgeDraft[] = [];

  for (const candidate of candidates) {
    if (!candidate.spec.enabled || seen.has(candidate.spec.badgeType)) {
      continue;
    }
    seen.add(candidate.spec.badgeType);
    drafts.push(toDraft(input, candidate, values));
  }

  // the crown needs the champion badge of this tournament, already held or just drafted
  const championCount =
    (input.priorBadgeCounts[CHAMPION_BADGE.badgeType] ?? 0) + (seen.has(CHAMPION_BADGE.badgeType) ? 1 : 0);
  const crownHeld = (input.priorBadgeCounts[TRIPLE_CROWN_BADGE.badgeType] ?? 0) > 0;
  if (championCount >= TRIPLE_CROWN_WINS && !crownHeld && !seen.has(TRIPLE_CROWN_BADGE.badgeType)) {
    drafts.push(
      toDraft(
        input,
        { spec: TRIPLE_CROWN_BADGE, category: 'MILESTONE', metadata: { championCount } },
        { ...values, champion_count: championCount }
      )
    );
  }

  return drafts;
};
