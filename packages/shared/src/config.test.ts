import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ValidationError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults and picks the json adapter without a database url", () => {
    const config = loadConfig({});
    expect(config.adapter).toBe("json");
    expect(config.snapshotEvery).toBe(50);
    expect(config.projections).toEqual({
      batchSize: 200,
      pollIntervalMs: 500,
      failurePolicy: "skip",
      partitionConcurrency: 1,
      rebuildLeaseMs: 60_000,
    });
  });

  it("prefers postgres when a database url is set", () => {
    const config = loadConfig({ STRATA_DB_URL: "postgres://localhost/strata", STRATA_SNAPSHOT_EVERY: "10" });
    expect(config.adapter).toBe("postgres");
    expect(config.snapshotEvery).toBe(10);
  });

  it("rejects invalid values with a validation error", () => {
    expect(() => loadConfig({ STRATA_PROJECTION_FAILURE_POLICY: "retry" })).toThrow(ValidationError);
    const missingUrl = () => loadConfig({ STRATA_EVENTSTORE_ADAPTER: "postgres" });
    expect(missingUrl).toThrow(ValidationError);
    expect(missingUrl).toThrow("invalid configuration");
  });
});
