import { readdir, readFile } from "fs/promises";
import { join } from "path";
import { Pool } from "pg";
import { Logger, silentLogger } from "../../../packages/runtime/src";

export type MigrationReport = { applied: string[]; skipped: string[] };

/**
 * Applies every `*.sql` file in `dir` in name order, each in its own transaction, and
 * records it in `schema_migrations` so reruns skip it.
 */
export const runMigrations = async (pool: Pool, dir: string, logger: Logger = silentLogger()): Promise<MigrationReport> => {
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations(
        version TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);
    const files = (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
    const appliedRes = await client.query<{ version: string }>("SELECT version FROM schema_migrations");
    const alreadyApplied = new Set(appliedRes.rows.map((r) => r.version));

    const report: MigrationReport = { applied: [], skipped: [] };
    for (const file of files) {
      const version = file.replace(/\.sql$/, "");
      if (alreadyApplied.has(version)) {
        logger.debug({ version }, "migration already applied");
        report.skipped.push(version);
        continue;
      }
      const sql = await readFile(join(dir, file), "utf-8");
      logger.info({ file }, "applying migration");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations(version) VALUES($1)", [version]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
      report.applied.push(version);
    }
    return report;
  } finally {
    client.release();
  }
};
