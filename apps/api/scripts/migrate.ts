import "dotenv/config";
import { join } from "path";
import { Pool } from "pg";
import { createLogger } from "../../../packages/runtime/src";
import { runMigrations } from "../src/migrations";

const logger = createLogger({ name: "migrate", level: "info" });

async function main() {
  const url = process.env.STRATA_DB_URL;
  if (!url) {
    logger.warn("STRATA_DB_URL not set, skipping migrations");
    return;
  }
  const dir = process.env.STRATA_MIGRATIONS_DIR ?? join(process.cwd(), "migrations");
  const pool = new Pool({ connectionString: url });
  try {
    const report = await runMigrations(pool, dir, logger);
    logger.info({ applied: report.applied.length, skipped: report.skipped.length }, "migrations done");
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  logger.error({ err }, "migration failed");
  process.exit(1);
});
