import Redis from "ioredis";
import { Pool } from "pg";
import { z } from "zod";
import { AggregateDefinition, AggregateRepository } from "../../aggregates/src";
import { EventStore, InMemoryEventStore, JsonFileEventStore, PostgresEventStore } from "../../event-store/src";
import {
  CheckpointStore,
  DeadLetterStore,
  InMemoryCheckpointStore,
  InMemoryDeadLetterStore,
  InMemoryReadModelStore,
  PostgresCheckpointStore,
  PostgresDeadLetterStore,
  PostgresReadModelStore,
  ProjectionEngine,
  ReadModelStore,
} from "../../projections/src";
import { EventPublisher, EventRelay, RedisStreamPublisher } from "../../publication/src";
import { SagaCoordinator, sagaAggregate } from "../../sagas/src";
import { EventShape, Logger, RuntimeConfig, createLogger } from "../../shared/src";
import { InMemorySnapshotStore, PostgresSnapshotStore, SnapshotStore } from "../../snapshot-store/src";

export type RuntimeOverrides = {
  logger?: Logger;
  pool?: Pool;
  store?: EventStore;
  snapshots?: SnapshotStore;
  checkpoints?: CheckpointStore;
  deadLetters?: DeadLetterStore;
  publisher?: EventPublisher;
  clock?: () => Date;
};

type Closable = () => Promise<void>;

/**
 * Owns every long-lived component of one process. Nothing in the runtime is module state;
 * callers get components from here and hand them on explicitly.
 */
export class Runtime {
  readonly projections: ProjectionEngine;
  readonly sagas: SagaCoordinator;
  readonly relay: EventRelay | null;
  private started = false;

  constructor(
    readonly config: RuntimeConfig,
    readonly logger: Logger,
    readonly store: EventStore,
    readonly snapshots: SnapshotStore,
    readonly checkpoints: CheckpointStore,
    readonly deadLetters: DeadLetterStore,
    private readonly pool: Pool | null,
    publisher: EventPublisher | null,
    private readonly closables: Closable[],
    private readonly clock: () => Date
  ) {
    this.projections = new ProjectionEngine({
      store,
      checkpoints,
      deadLetters,
      logger,
      clock,
      settings: config.projections,
    });
    this.sagas = new SagaCoordinator({
      repository: this.repository(sagaAggregate),
      store,
      logger,
      defaultTimeoutMs: config.sagaStepTimeoutMs,
      clock,
    });
    this.relay = publisher
      ? new EventRelay({
          store,
          checkpoints,
          publisher,
          logger,
          clock,
          pollIntervalMs: config.projections.pollIntervalMs,
        })
      : null;
  }

  get adapter() {
    return this.config.adapter;
  }

  get isStarted(): boolean {
    return this.started;
  }

  repository<S, E extends EventShape>(definition: AggregateDefinition<S, E>): AggregateRepository<S, E> {
    return new AggregateRepository(definition, {
      store: this.store,
      snapshots: this.snapshots,
      snapshotEvery: this.config.snapshotEvery,
      logger: this.logger,
      clock: this.clock,
    });
  }

  /** A read model backed by the runtime's adapter: PostgreSQL rows or process memory. */
  readModel<Row>(name: string, rowSchema: z.ZodType<Row, z.ZodTypeDef, unknown>): ReadModelStore<Row> {
    if (this.pool) {
      return new PostgresReadModelStore({ pool: this.pool, name, rowSchema });
    }
    return new InMemoryReadModelStore<Row>(name);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.projections.start();
    this.relay?.start();
    this.logger.info(
      { adapter: this.config.adapter, projections: this.projections.names(), relay: this.relay !== null },
      "runtime started"
    );
  }

  async stop(): Promise<void> {
    if (this.started) {
      this.started = false;
      await this.relay?.stop();
      await this.projections.stop();
    }
    for (const close of this.closables.splice(0)) {
      await close();
    }
    this.logger.info("runtime stopped");
  }
}

/**
 * Builds a runtime for the configured adapter. Anything passed in `overrides` is used as is
 * and left for the caller to close.
 */
export const createRuntime = (config: RuntimeConfig, overrides: RuntimeOverrides = {}): Runtime => {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const clock = overrides.clock ?? (() => new Date());
  const closables: Closable[] = [];

  let pool: Pool | null = overrides.pool ?? null;
  if (!pool && config.adapter === "postgres") {
    const owned = new Pool({ connectionString: config.databaseUrl });
    closables.push(() => owned.end());
    pool = owned;
  }

  let store: EventStore;
  if (overrides.store) {
    store = overrides.store;
  } else if (pool) {
    store = new PostgresEventStore({ pool, logger, clock });
  } else if (config.adapter === "json") {
    store = new JsonFileEventStore(config.storagePath, { logger, clock });
  } else {
    store = new InMemoryEventStore({ logger, clock });
  }

  const snapshots = overrides.snapshots ?? (pool ? new PostgresSnapshotStore(pool) : new InMemorySnapshotStore());
  const checkpoints = overrides.checkpoints ?? (pool ? new PostgresCheckpointStore(pool) : new InMemoryCheckpointStore());
  const deadLetters = overrides.deadLetters ?? (pool ? new PostgresDeadLetterStore(pool) : new InMemoryDeadLetterStore());

  let publisher: EventPublisher | null = overrides.publisher ?? null;
  if (!publisher && config.redisUrl) {
    const redis = new Redis(config.redisUrl, { maxRetriesPerRequest: 3 });
    redis.on("error", (err: unknown) => logger.warn({ err }, "redis connection error"));
    closables.push(async () => {
      await redis.quit();
    });
    publisher = new RedisStreamPublisher(
      { xadd: (key, id, ...fields) => redis.xadd(key, id, ...fields) },
      config.publishStream
    );
  }

  logger.debug({ adapter: config.adapter, ownsPool: closables.length > 0 }, "runtime created");
  return new Runtime(config, logger, store, snapshots, checkpoints, deadLetters, pool, publisher, closables, clock);
};
