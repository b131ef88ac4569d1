import type { RewardPolicyInput } from './rewardPolicy.js';

export const REWARD_TEMPLATE_NAMES = ['STANDARD', 'CHAMPIONSHIP', 'FRIENDLY'] as const;
export type RewardTemplateName = (typeof REWARD_TEMPLATE_NAMES)[number];

export const isRewardTemplateName = (value: unknown): value is RewardTemplateName =>
  typeof value === 'string' && (REWARD_TEMPLATE_NAMES as readonly string[]).includes(value);

// Skill mappings ship disabled: operators enable the skills a tournament actually trains.
export const REWARD_TEMPLATES: Readonly<Record<RewardTemplateName, RewardPolicyInput>> = {
  STANDARD: {
    template_name: 'STANDARD',
    skill_mappings: [
      { skill: 'speed', weight: 1.5, category: 'PHYSICAL' },
      { skill: 'agility', weight: 1.2, category: 'PHYSICAL' },
      { skill: 'stamina', weight: 1.0, category: 'PHYSICAL' },
      { skill: 'strength', weight: 1.3, category: 'PHYSICAL' },
      { skill: 'ball_control', weight: 1.2, category: 'TECHNICAL' },
      { skill: 'passing', weight: 1.0, category: 'TECHNICAL' },
      { skill: 'shooting', weight: 1.1, category: 'TECHNICAL' },
      { skill: 'positioning', weight: 1.0, category: 'TACTICAL' },
      { skill: 'decision_making', weight: 1.0, category: 'MENTAL' },
      { skill: 'composure', weight: 1.0, category: 'MENTAL' }
    ],
    placement_tiers: [
      {
        placement: 1,
        base_xp: 500,
        xp_multiplier: 1.5,
        credits: 500,
        skill_points: 10,
        badges: [
          {
            badge_type: 'CHAMPION',
            icon: '🥇',
            title: 'Champion',
            description: 'Won 1st place in {tournament_name}',
            rarity: 'EPIC'
          }
        ]
      },
      {
        placement: 2,
        base_xp: 300,
        xp_multiplier: 1.3,
        credits: 300,
        skill_points: 7,
        badges: [
          {
            badge_type: 'RUNNER_UP',
            icon: '🥈',
            title: 'Runner-Up',
            description: 'Finished 2nd in {tournament_name}',
            rarity: 'RARE'
          }
        ]
      },
      {
        placement: 3,
        base_xp: 200,
        xp_multiplier: 1.2,
        credits: 200,
        skill_points: 5,
        badges: [
          {
            badge_type: 'THIRD_PLACE',
            icon: '🥉',
            title: 'Third Place',
            description: 'Secured 3rd place in {tournament_name}',
            rarity: 'UNCOMMON'
          }
        ]
      }
    ],
    top_percent: {
      percent: 25,
      base_xp: 100,
      xp_multiplier: 1.1,
      credits: 100,
      skill_points: 3,
      badges: [
        {
          badge_type: 'TOP_PERFORMER',
          icon: '🌟',
          title: 'Top Performer',
          description: 'Finished in top 25% of {tournament_name}',
          rarity: 'RARE'
        }
      ]
    },
    participation: {
      base_xp: 50,
      credits: 50,
      skill_points: 1,
      badges: [
        {
          badge_type: 'TOURNAMENT_DEBUT',
          icon: '⚽',
          title: 'Tournament Debut',
          description: 'First tournament participation',
          condition: 'first_tournament'
        }
      ]
    }
  },
  CHAMPIONSHIP: {
    template_name: 'CHAMPIONSHIP',
    skill_mappings: [
      { skill: 'speed', weight: 2.0, category: 'PHYSICAL' },
      { skill: 'agility', weight: 1.8, category: 'PHYSICAL' },
      { skill: 'stamina', weight: 1.5, category: 'PHYSICAL' },
      { skill: 'strength', weight: 1.7, category: 'PHYSICAL' },
      { skill: 'ball_control', weight: 1.5, category: 'TECHNICAL' },
      { skill: 'passing', weight: 1.3, category: 'TECHNICAL' },
      { skill: 'shooting', weight: 1.4, category: 'TECHNICAL' },
      { skill: 'decision_making', weight: 1.2, category: 'MENTAL' }
    ],
    placement_tiers: [
      {
        placement: 1,
        base_xp: 500,
        xp_multiplier: 2.0,
        credits: 1000,
        skill_points: 15,
        badges: [
          {
            badge_type: 'CHAMPION',
            icon: '🥇',
            title: 'Champion',
            description: 'Won {tournament_name}',
            rarity: 'LEGENDARY'
          }
        ]
      },
      {
        placement: 2,
        base_xp: 300,
        xp_multiplier: 1.5,
        credits: 600,
        skill_points: 10,
        badges: [
          {
            badge_type: 'RUNNER_UP',
            icon: '🥈',
            title: 'Runner-Up',
            description: 'Finished 2nd in {tournament_name}',
            rarity: 'EPIC'
          }
        ]
      },
      {
        placement: 3,
        base_xp: 200,
        xp_multiplier: 1.3,
        credits: 400,
        skill_points: 7,
        badges: [
          {
            badge_type: 'THIRD_PLACE',
            icon: '🥉',
            title: 'Third Place',
            description: 'Secured 3rd place in {tournament_name}',
            rarity: 'RARE'
          }
        ]
      }
    ],
    top_percent: {
      percent: 25,
      base_xp: 100,
      xp_multiplier: 1.2,
      credits: 200,
      skill_points: 4,
      badges: [
        {
          badge_type: 'TOP_PERFORMER',
          icon: '🌟',
          title: 'Top Performer',
          description: 'Elite performance in {tournament_name}',
          rarity: 'RARE'
        }
      ]
    },
    participation: {
      base_xp: 50,
      credits: 100,
      skill_points: 1,
      badges: [
        {
          badge_type: 'PARTICIPANT',
          icon: '⚽',
          title: 'Championship Participant',
          description: 'Participated in {tournament_name}'
        }
      ]
    }
  },
  FRIENDLY: {
    template_name: 'FRIENDLY',
    skill_mappings: [
      { skill: 'speed', weight: 1.0, category: 'PHYSICAL' },
      { skill: 'agility', weight: 1.0, category: 'PHYSICAL' },
      { skill: 'stamina', weight: 1.0, category: 'PHYSICAL' },
      { skill: 'ball_control', weight: 1.0, category: 'TECHNICAL' },
      { skill: 'passing', weight: 1.0, category: 'TECHNICAL' }
    ],
    placement_tiers: [
      {
        placement: 1,
        base_xp: 250,
        xp_multiplier: 1.2,
        credits: 200,
        skill_points: 5,
        badges: [
          { badge_type: 'WINNER', icon: '🏆', title: 'Winner', description: 'Won {tournament_name}', rarity: 'RARE' }
        ]
      },
      {
        placement: 2,
        base_xp: 150,
        xp_multiplier: 1.1,
        credits: 100,
        skill_points: 3,
        badges: [
          {
            badge_type: 'RUNNER_UP',
            icon: '🥈',
            title: 'Runner-Up',
            description: 'Finished 2nd in {tournament_name}',
            rarity: 'UNCOMMON'
          }
        ]
      },
      {
        placement: 3,
        base_xp: 100,
        credits: 50,
        skill_points: 2,
        badges: [
          {
            badge_type: 'THIRD_PLACE',
            icon: '🥉',
            title: 'Third Place',
            description: 'Secured 3rd place in {tournament_name}',
            rarity: 'UNCOMMON'
          }
        ]
      }
    ],
    participation: {
      base_xp: 25,
      credits: 25,
      skill_points: 1,
      badges: [
        {
          badge_type: 'PARTICIPANT',
          icon: '⚽',
          title: 'Participant',
          description: 'Participated in {tournament_name}'
        }
      ]
    }
  }
};
