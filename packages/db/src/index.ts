import knex, { Knex } from "knex";
import * as membershipLedger from "../migrations/001_membership_ledger.js";

export type DbClient = Knex;

type Migration = {
  up: (knex: Knex) => Promise<void>;
  down?: (knex: Knex) => Promise<void>;
};

const migrations: Array<{ name: string; migration: Migration }> = [
  { name: "001_membership_ledger", migration: membershipLedger }
];

// Bundled with the package rather than discovered on disk.
const migrationSource: Knex.MigrationSource<string> = {
  getMigrations: async () => migrations.map((entry) => entry.name),
  getMigrationName: (name) => name,
  getMigration: async (name) => {
    const entry = migrations.find((candidate) => candidate.name === name);
    if (!entry) {
      throw new Error(`migration_not_found:${name}`);
    }
    return entry.migration;
  }
};

export const createDb = (connectionString: string) =>
  knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: 10 }
  });

/** In-process SQLite database, used by tests in place of Postgres. */
export const createMemoryDb = () =>
  knex({
    client: "better-sqlite3",
    connection: { filename: ":memory:" },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 }
  });

export const runMigrations = async (db: DbClient) => {
  await db.migrate.latest({ migrationSource });
};

export const rollbackMigrations = async (db: DbClient) => {
  await db.migrate.rollback({ migrationSource }, true);
};

export const closeDb = async (db: DbClient) => {
  await db.destroy();
};
