import { join } from "path";
import { newDb } from "pg-mem";
import { describe, expect, it } from "vitest";
import { PostgresEventStore } from "../../../packages/runtime/src";
import { runMigrations } from "./migrations";

const migrationsDir = join(__dirname, "..", "..", "..", "migrations");

describe("runMigrations", () => {
  it("applies each migration once and leaves a working schema", async () => {
    const { Pool } = newDb().adapters.createPg();
    const pool = new Pool();

    expect(await runMigrations(pool, migrationsDir)).toEqual({
      applied: ["001_event_store", "002_projections"],
      skipped: [],
    });
    expect(await runMigrations(pool, migrationsDir)).toEqual({
      applied: [],
      skipped: ["001_event_store", "002_projections"],
    });

    const store = new PostgresEventStore({ pool });
    const result = await store.append("acc-1", 0, [{ eventType: "AccountOpened", payload: { owner: "ana" } }]);
    expect(result.ok && result.version).toBe(1);
  });
});
