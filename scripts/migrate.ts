import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { closeDb, createDb, rollbackMigrations, runMigrations } from "@membership-ledger/db";
import { createLogger } from "@membership-ledger/shared";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

dotenv.config({ path: path.join(repoRoot, ".env") });

const log = createLogger("migrate");

const databaseUrl = process.env.MIGRATIONS_DATABASE_URL ?? process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error("missing_required_envs:MIGRATIONS_DATABASE_URL|DATABASE_URL");
}
if (process.env.NODE_ENV === "production" && !process.env.MIGRATIONS_DATABASE_URL) {
  throw new Error("migrations_database_url_required_in_production");
}

const direction = process.argv[2] === "down" ? "down" : "up";

const run = async () => {
  const db = createDb(databaseUrl);
  try {
    if (direction === "down") {
      await rollbackMigrations(db);
    } else {
      await runMigrations(db);
    }
    log.info("migrations_complete", { direction });
  } finally {
    await closeDb(db);
  }
};

run().catch((error) => {
  log.error("migrations_failed", { direction, error });
  process.exit(1);
});
