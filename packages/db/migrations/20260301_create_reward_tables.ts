import { sql } from 'drizzle-orm';
import type { Migration, MigrationExecutor } from '../src/adapters/migrator.js';

const createEnums = sql`
  DO $$
  BEGIN
    CREATE TYPE tournament_status AS ENUM ('IN_PROGRESS', 'COMPLETED', 'REWARDS_DISTRIBUTED', 'CANCELLED');
  EXCEPTION
    WHEN duplicate_object THEN NULL;
  END
  $$;
  DO $$
  BEGIN
    CREATE TYPE skill_reward_source AS ENUM ('TOURNAMENT', 'TRAINING', 'ASSESSMENT', 'ADJUSTMENT');
  EXCEPTION
    WHEN duplicate_object THEN NULL;
  END
  $$;
  DO $$
  BEGIN
    CREATE TYPE badge_category AS ENUM ('PLACEMENT', 'PARTICIPATION', 'MILESTONE', 'ACHIEVEMENT');
  EXCEPTION
    WHEN duplicate_object THEN NULL;
  END
  $$;
  DO $$
  BEGIN
    CREATE TYPE badge_rarity AS ENUM ('COMMON', 'UNCOMMON', 'RARE', 'EPIC', 'LEGENDARY');
  EXCEPTION
    WHEN duplicate_object THEN NULL;
  END
  $$;
`;

const createTournaments = sql`
  CREATE TABLE IF NOT EXISTS tournaments (
    id text PRIMARY KEY,
    name text NOT NULL,
    status tournament_status NOT NULL DEFAULT 'IN_PROGRESS',
    reward_template text,
    reward_policy jsonb,
    rewards_distributed_at timestamptz,
    rewards_distributed_by text,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS tournaments_status_idx ON tournaments (status);

  CREATE TABLE IF NOT EXISTS tournament_rankings (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    tournament_id text NOT NULL REFERENCES tournaments (id) ON DELETE CASCADE,
    user_id text NOT NULL,
    placement integer NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    CONSTRAINT tournament_rankings_placement_positive CHECK (placement > 0)
  );
  CREATE UNIQUE INDEX IF NOT EXISTS tournament_rankings_tournament_user_unique
    ON tournament_rankings (tournament_id, user_id);
`;

const createRewardTables = sql`
  CREATE TABLE IF NOT EXISTS tournament_participations (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id text NOT NULL,
    tournament_id text NOT NULL REFERENCES tournaments (id) ON DELETE CASCADE,
    placement integer NOT NULL,
    skill_points jsonb NOT NULL DEFAULT '{}'::jsonb,
    base_xp integer NOT NULL,
    bonus_xp integer NOT NULL,
    total_xp integer NOT NULL,
    credits integer NOT NULL,
    distributed_at timestamptz NOT NULL,
    distributed_by text,
    redistribution_count integer NOT NULL DEFAULT 0,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now(),
    CONSTRAINT tournament_participations_placement_positive CHECK (placement > 0),
    CONSTRAINT tournament_participations_xp_consistent CHECK (total_xp = base_xp + bonus_xp)
  );
  CREATE UNIQUE INDEX IF NOT EXISTS tournament_participations_user_tournament_unique
    ON tournament_participations (user_id, tournament_id);
  CREATE INDEX IF NOT EXISTS tournament_participations_tournament_idx
    ON tournament_participations (tournament_id);

  CREATE TABLE IF NOT EXISTS skill_rewards (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id text NOT NULL,
    source_type skill_reward_source NOT NULL,
    source_id text NOT NULL,
    skill_name text NOT NULL,
    points_awarded double precision NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    CONSTRAINT skill_rewards_points_non_zero CHECK (points_awarded <> 0)
  );
  CREATE INDEX IF NOT EXISTS skill_rewards_user_skill_idx ON skill_rewards (user_id, skill_name);
  CREATE INDEX IF NOT EXISTS skill_rewards_source_idx ON skill_rewards (source_type, source_id);

  CREATE TABLE IF NOT EXISTS tournament_badges (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id text NOT NULL,
    tournament_id text NOT NULL REFERENCES tournaments (id) ON DELETE CASCADE,
    badge_type text NOT NULL,
    category badge_category NOT NULL,
    title text NOT NULL,
    description text,
    icon text NOT NULL,
    rarity badge_rarity NOT NULL,
    metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
    created_at timestamptz NOT NULL DEFAULT now()
  );
  CREATE UNIQUE INDEX IF NOT EXISTS tournament_badges_user_tournament_type_unique
    ON tournament_badges (user_id, tournament_id, badge_type);
  CREATE INDEX IF NOT EXISTS tournament_badges_user_created_idx ON tournament_badges (user_id, created_at DESC);

  CREATE TABLE IF NOT EXISTS user_skill_baselines (
    user_id text NOT NULL,
    skill_name text NOT NULL,
    baseline double precision NOT NULL,
    recorded_at timestamptz NOT NULL DEFAULT now(),
    CONSTRAINT user_skill_baselines_pkey PRIMARY KEY (user_id, skill_name),
    CONSTRAINT user_skill_baselines_range CHECK (baseline BETWEEN 0 AND 100)
  );
`;

const createLedgerGuard = sql`
  CREATE OR REPLACE FUNCTION skill_rewards_reject_update() RETURNS trigger AS $$
  BEGIN
    RAISE EXCEPTION 'skill_rewards is append-only' USING ERRCODE = '55000';
  END
  $$ LANGUAGE plpgsql;

  DROP TRIGGER IF EXISTS skill_rewards_append_only ON skill_rewards;
  CREATE TRIGGER skill_rewards_append_only
    BEFORE UPDATE ON skill_rewards
    FOR EACH ROW EXECUTE FUNCTION skill_rewards_reject_update();
`;

const dropAll = sql`
  DROP TRIGGER IF EXISTS skill_rewards_append_only ON skill_rewards;
  DROP FUNCTION IF EXISTS skill_rewards_reject_update();
  DROP TABLE IF EXISTS user_skill_baselines;
  DROP TABLE IF EXISTS tournament_badges;
  DROP TABLE IF EXISTS skill_rewards;
  DROP TABLE IF EXISTS tournament_participations;
  DROP TABLE IF EXISTS tournament_rankings;
  DROP TABLE IF EXISTS tournaments;
  DROP TYPE IF EXISTS badge_rarity;
  DROP TYPE IF EXISTS badge_category;
  DROP TYPE IF EXISTS skill_reward_source;
  DROP TYPE IF EXISTS tournament_status;
`;

export const up = async (db: MigrationExecutor): Promise<void> => {
  await db.execute(createEnums);
  await db.execute(createTournaments);
  await db.execute(createRewardTables);
  await db.execute(createLedgerGuard);
};

export const down = async (db: MigrationExecutor): Promise<void> => {
  await db.execute(dropAll);
};

const migration: Migration = { id: '20260301_create_reward_tables', up, down };

export default migration;
