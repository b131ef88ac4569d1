import { describe, expect, it } from 'vitest';
import { PgDialect, getTableConfig, type PgTable } from 'drizzle-orm/pg-core';
import { rewardMigrations } from '../../migrations/index.js';
import type { MigrationExecutor } from '../../src/adapters/migrator.js';
import {
  badgeCategoryEnum,
  badgeRarityEnum,
  skillRewardSourceEnum,
  skillRewards,
  tournamentBadges,
  tournamentParticipations,
  tournamentRankings,
  tournamentStatusEnum,
  tournaments,
  userSkillBaselines
} from '../../src/schema/index.js';

const collectSql = async (direction: 'up' | 'down'): Promise<string> => {
  const dialect = new PgDialect();
  const statements: string[] = [];
  const executor: MigrationExecutor = {
    execute: async (query) => {
      statements.push(dialect.sqlToQuery(query).sql);
      return { rows: [] };
    }
  };

  for (const migration of rewardMigrations) {
    await migration[direction](executor);
  }
  return statements.join('\n');
};

const tables: PgTable[] = [
  tournaments,
  tournamentRankings,
  tournamentParticipations,
  skillRewards,
  tournamentBadges,
  userSkillBaselines
];

describe('reward migrations', () => {
  it('create every table, column, index and check the schema declares', async () => {
    const upSql = await collectSql('up');

    for (const table of tables) {
      const config = getTableConfig(table);

      expect(upSql).toContain(`CREATE TABLE IF NOT EXISTS ${config.name} (`);
      for (const column of config.columns) {
        expect(upSql).toMatch(new RegExp(`\\n\\s+${column.name} `));
      }
      for (const index of config.indexes) {
        expect(upSql).toContain(`INDEX IF NOT EXISTS ${index.config.name ?? '<unnamed>'}`);
      }
      for (const check of config.checks) {
        expect(upSql).toContain(`CONSTRAINT ${check.name} CHECK`);
      }
    }
  });

  it('create every enum with the schema values', async () => {
    const upSql = await collectSql('up');

    for (const pgEnum of [tournamentStatusEnum, skillRewardSourceEnum, badgeCategoryEnum, badgeRarityEnum]) {
      expect(upSql).toContain(`CREATE TYPE ${pgEnum.enumName} AS ENUM ('${pgEnum.enumValues.join("', '")}')`);
    }
  });

  it('guard the ledger against updates', async () => {
    expect(await collectSql('up')).toContain('BEFORE UPDATE ON skill_rewards');
  });

  it('drop every table on the way down', async () => {
    const downSql = await collectSql('down');

    for (const table of tables) {
      expect(downSql).toContain(`DROP TABLE IF EXISTS ${getTableConfig(table).name};`);
    }
  });
});
