import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/engine', 'packages/db', 'apps/rewards-api']);
