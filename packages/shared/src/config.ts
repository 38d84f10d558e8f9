import { join } from "path";
import { z } from "zod";
import { ValidationError } from "./errors";
import { LOG_LEVELS, LogLevel } from "./logger";

export const envSchema = z.object({
  STRATA_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  STRATA_EVENTSTORE_ADAPTER: z.enum(["postgres", "json", "memory"]).optional(),
  STRATA_DB_URL: z.string().min(1).optional(),
  STRATA_STORAGE_PATH: z.string().default(join(process.cwd(), "data", "events.json")),
  STRATA_REDIS_URL: z.string().min(1).optional(),
  STRATA_PUBLISH_STREAM: z.string().min(1).default("strata:events"),
  STRATA_SNAPSHOT_EVERY: z.coerce.number().int().nonnegative().default(50),
  STRATA_PROJECTION_BATCH_SIZE: z.coerce.number().int().positive().default(200),
  STRATA_PROJECTION_POLL_MS: z.coerce.number().int().positive().default(500),
  STRATA_PROJECTION_FAILURE_POLICY: z.enum(["skip", "halt"]).default("skip"),
  STRATA_PROJECTION_PARTITIONS: z.coerce.number().int().positive().default(1),
  STRATA_PROJECTION_REBUILD_LEASE_MS: z.coerce.number().int().positive().default(60_000),
  STRATA_SAGA_STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  STRATA_API_PORT: z.coerce.number().int().positive().default(3000),
});

export type Env = z.infer<typeof envSchema>;
export type EventStoreAdapter = "postgres" | "json" | "memory";
export type FailurePolicy = "skip" | "halt";

export type RuntimeConfig = {
  logLevel: LogLevel;
  adapter: EventStoreAdapter;
  databaseUrl?: string;
  storagePath: string;
  redisUrl?: string;
  publishStream: string;
  snapshotEvery: number;
  projections: {
    batchSize: number;
    pollIntervalMs: number;
    failurePolicy: FailurePolicy;
    partitionConcurrency: number;
    rebuildLeaseMs: number;
  };
  sagaStepTimeoutMs: number;
  apiPort: number;
};

export const loadConfig = (
  source: Record<string, string | undefined> = process.env,
  overrides: Partial<Env> = {}
): RuntimeConfig => {
  const parsed = envSchema.safeParse({ ...source, ...overrides });
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, "invalid configuration");
  }
  const env = parsed.data;
  const adapter = env.STRATA_EVENTSTORE_ADAPTER ?? (env.STRATA_DB_URL ? "postgres" : "json");
  if (adapter === "postgres" && !env.STRATA_DB_URL) {
    throw new ValidationError("invalid configuration", ["STRATA_DB_URL: required for the postgres adapter"]);
  }
  return {
    logLevel: env.STRATA_LOG_LEVEL,
    adapter,
    databaseUrl: env.STRATA_DB_URL,
    storagePath: env.STRATA_STORAGE_PATH,
    redisUrl: env.STRATA_REDIS_URL,
    publishStream: env.STRATA_PUBLISH_STREAM,
    snapshotEvery: env.STRATA_SNAPSHOT_EVERY,
    projections: {
      batchSize: env.STRATA_PROJECTION_BATCH_SIZE,
      pollIntervalMs: env.STRATA_PROJECTION_POLL_MS,
      failurePolicy: env.STRATA_PROJECTION_FAILURE_POLICY,
      partitionConcurrency: env.STRATA_PROJECTION_PARTITIONS,
      rebuildLeaseMs: env.STRATA_PROJECTION_REBUILD_LEASE_MS,
    },
    sagaStepTimeoutMs: env.STRATA_SAGA_STEP_TIMEOUT_MS,
    apiPort: env.STRATA_API_PORT,
  };
};
