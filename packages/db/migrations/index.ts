import createRewardTables from './20260301_create_reward_tables.js';
import type { Migration } from '../src/adapters/migrator.js';

export const rewardMigrations: readonly Migration[] = [createRewardTables];
