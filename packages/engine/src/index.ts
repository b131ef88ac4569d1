export * from './errors/rewardEngineError.js';
export * from './policy/rewardPolicy.js';
export * from './policy/templates.js';
export * from './policy/policyResolution.js';
export * from './rewards/tierResolution.js';
export * from './rewards/distributionPlanner.js';
export * from './skills/skillPointDistributor.js';
export * from './skills/skillProgressionCalculator.js';
export * from './skills/skillProfile.js';
export * from './badges/badgeDefinitions.js';
export * from './badges/badgeAssignmentEngine.js';
export * from './badges/badgeShowcase.js';
