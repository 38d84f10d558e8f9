import { setImmediate as yieldToLoop } from "timers/promises";
import { EventStore } from "../../event-store/src";
import {
  EventShape,
  FailurePolicy,
  KeyedMutex,
  Logger,
  ProjectionHandlerError,
  RebuildCancelledError,
  RecordedEvent,
  StorageFailureError,
  ValidationError,
  WakeSignal,
  errorMessage,
  eventHeader,
  withTimeout,
} from "../../shared/src";
import { Checkpoint, CheckpointStore, ProjectionStatus } from "./checkpointStore";
import { DeadLetterStore } from "./deadLetterStore";
import { ProjectionDefinition } from "./projection";
import { ReadModelView } from "./readModelStore";

export type WorkerSettings = {
  batchSize: number;
  pollIntervalMs: number;
  partitionConcurrency: number;
  failurePolicy: FailurePolicy;
  /** How long a `rebuilding` checkpoint stays claimed without a heartbeat. */
  rebuildLeaseMs: number;
};

export type ProjectionWorkerDeps = {
  store: EventStore;
  checkpoints: CheckpointStore;
  deadLetters: DeadLetterStore;
  logger: Logger;
  clock: () => Date;
  settings: WorkerSettings;
};

export type ProjectionReport = Checkpoint & {
  eventTypes: string[];
  failurePolicy: FailurePolicy;
  lag: number;
};

export type RebuildResult = {
  projectionName: string;
  position: number;
  eventsApplied: number;
  deadLettered: number;
};

type ApplyOutcome = { status: "applied" } | { status: "dead_lettered" | "halted"; error: ProjectionHandlerError };

/** Lifecycle surface the engine needs, independent of the projection's event and row types. */
export interface ManagedProjection {
  readonly name: string;
  start(): void;
  stop(): Promise<void>;
  rebuild(signal?: AbortSignal): Promise<RebuildResult>;
  cancelRebuild(): boolean;
  resume(): Promise<boolean>;
  report(): Promise<ProjectionReport>;
  waitForPosition(position: number, timeoutMs: number): Promise<void>;
}

const LOCK = "projection";
const CLAIM_ATTEMPTS = 5;

// A rebuild that fails hands back the status it found, except a stale lease of its own kind.
const statusAfterRebuild = (previous: Checkpoint | null): ProjectionStatus => {
  if (previous === null) return "idle";
  return previous.status === "rebuilding" ? "running" : previous.status;
};

const partitionByStream = (events: readonly RecordedEvent[]): RecordedEvent[][] => {
  const partitions = new Map<string, RecordedEvent[]>();
  for (const event of events) {
    const partition = partitions.get(event.streamId);
    if (partition) {
      partition.push(event);
    } else {
      partitions.set(event.streamId, [event]);
    }
  }
  return [...partitions.values()];
};

/**
 * Tails the log for one projection. Batch processing and rebuilds take the same lock,
 * so a rebuild pauses tailing until the swap is done.
 */
export class ProjectionWorker<E extends EventShape, Row> implements ManagedProjection {
  private readonly lock = new KeyedMutex();
  private readonly types: string[];
  private readonly policy: FailurePolicy;
  private readonly logger: Logger;
  private running = false;
  private loop: Promise<void> | null = null;
  private readonly wakeup = new WakeSignal();
  private unsubscribe: (() => void) | null = null;
  private position = 0;
  private waiters: { position: number; resolve: () => void }[] = [];
  private readonly rebuilds = new Set<AbortController>();

  constructor(
    readonly definition: ProjectionDefinition<E, Row>,
    private readonly deps: ProjectionWorkerDeps
  ) {
    this.types = [...definition.eventTypes];
    this.policy = definition.failurePolicy ?? deps.settings.failurePolicy;
    this.logger = deps.logger.child({ projection: definition.name });
  }

  get name(): string {
    return this.definition.name;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.wakeup.notify();
    this.unsubscribe = this.deps.store.onCommit(() => this.wakeup.notify());
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.cancelRebuild();
    this.wakeup.notify();
    await this.loop;
    this.loop = null;
    await this.lock.run(LOCK, async () => {
      const checkpoint = await this.loadStored();
      if (checkpoint?.status === "running") {
        await this.replaceCheckpoint(checkpoint, checkpoint.position, "idle");
      }
    });
  }

  private async run(): Promise<void> {
    this.logger.info({ eventTypes: this.types, failurePolicy: this.policy }, "projection started");
    while (this.running) {
      let progressed = false;
      try {
        progressed = await this.lock.run(LOCK, () => this.processBatch());
      } catch (err) {
        this.logger.error({ err }, "projection batch failed, retrying");
      }
      if (!progressed && this.running) {
        await this.wakeup.wait(this.deps.settings.pollIntervalMs);
      }
    }
    this.logger.info({ position: this.position }, "projection stopped");
  }

  /** Returns true when the checkpoint moved, meaning more work may be waiting. */
  private async processBatch(): Promise<boolean> {
    let stored = await this.loadStored();
    let checkpoint = stored ?? this.initialCheckpoint();
    if (checkpoint.status === "rebuilding") {
      // The lock is ours, so the rebuild belongs to another process; a fresh lease means it is alive.
      if (!this.leaseExpired(checkpoint)) return false;
      this.logger.warn(
        { position: checkpoint.position, leaseAt: checkpoint.updatedAt },
        "discarding interrupted rebuild"
      );
      await this.definition.readModel.abortRebuild();
      const next = await this.replaceCheckpoint(checkpoint, checkpoint.position, "running");
      if (!next) return true;
      stored = next;
      checkpoint = next;
    }
    if (checkpoint.status === "failed") return false;

    const head = await this.deps.store.headPosition();
    if (head <= checkpoint.position) {
      if (checkpoint.status === "idle") await this.replaceCheckpoint(stored, checkpoint.position, "running");
      return false;
    }

    const { batchSize } = this.deps.settings;
    const batch: RecordedEvent[] = [];
    for await (const event of this.deps.store.readAll(checkpoint.position, head, this.types)) {
      batch.push(event);
      if (batch.length >= batchSize) break;
    }
    // A short batch means nothing else matches up to the head, so the checkpoint can skip there.
    const end = batch.length >= batchSize ? (batch.at(-1)?.globalPosition ?? head) : head;

    const view = await this.definition.readModel.current();
    const haltedAt = await this.applyBatch(batch, view);
    const saved =
      haltedAt === null
        ? await this.replaceCheckpoint(stored, end, "running")
        : await this.replaceCheckpoint(stored, haltedAt - 1, "failed");
    if (!saved) {
      this.logger.info({ from: checkpoint.position, to: end }, "checkpoint moved underneath the batch, reloading");
      return true;
    }
    return haltedAt === null;
  }

  private leaseExpired(checkpoint: Checkpoint): boolean {
    return this.deps.clock().getTime() - Date.parse(checkpoint.updatedAt) > this.deps.settings.rebuildLeaseMs;
  }

  /**
   * Applies a batch in commit order, or partitioned by stream when concurrency allows.
   * Returns the lowest position not applied when the projection halted, otherwise null.
   */
  private async applyBatch(batch: readonly RecordedEvent[], view: ReadModelView<Row>): Promise<number | null> {
    const concurrency = Math.max(1, Math.floor(this.deps.settings.partitionConcurrency));
    const queue = concurrency === 1 ? [[...batch]] : partitionByStream(batch);
    const failed: number[] = [];
    const unapplied: number[] = [];

    const drain = async () => {
      for (let partition = queue.shift(); partition; partition = queue.shift()) {
        for (const event of partition) {
          if (failed.length > 0) {
            unapplied.push(event.globalPosition);
            break;
          }
          const outcome = await this.apply(event, view);
          if (outcome.status === "halted") {
            failed.push(event.globalPosition);
            break;
          }
        }
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, queue.length) }, drain));

    return failed.length > 0 ? Math.min(...failed, ...unapplied) : null;
  }

  private decode(event: RecordedEvent): RecordedEvent<E> {
    const parsed = this.definition.events.safeParse({ eventType: event.eventType, payload: event.payload });
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `cannot decode '${event.eventType}'`);
    }
    return { ...eventHeader(event), ...parsed.data };
  }

  private async apply(event: RecordedEvent, view: ReadModelView<Row>): Promise<ApplyOutcome> {
    try {
      await this.definition.handle(this.decode(event), view);
      return { status: "applied" };
    } catch (cause) {
      if (cause instanceof StorageFailureError) throw cause;
      const error = new ProjectionHandlerError(this.name, event.eventType, event.globalPosition, cause);
      await this.deps.deadLetters.record({
        projectionName: this.name,
        event,
        error: errorMessage(cause),
        failedAt: this.deps.clock().toISOString(),
      });
      const bindings = { err: error, eventId: event.eventId, globalPosition: event.globalPosition };
      if (this.policy === "halt") {
        this.logger.error(bindings, "projection halted on handler failure");
        return { status: "halted", error };
      }
      this.logger.warn(bindings, "event dead-lettered and skipped");
      return { status: "dead_lettered", error };
    }
  }

  async rebuild(signal?: AbortSignal): Promise<RebuildResult> {
    const controller = new AbortController();
    const forward = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forward, { once: true });
    }
    this.rebuilds.add(controller);
    try {
      return await this.lock.run(LOCK, () => this.runRebuild(controller.signal));
    } finally {
      signal?.removeEventListener("abort", forward);
      this.rebuilds.delete(controller);
    }
  }

  cancelRebuild(): boolean {
    if (this.rebuilds.size === 0) return false;
    this.rebuilds.forEach((controller) => controller.abort());
    return true;
  }

  private async runRebuild(signal: AbortSignal): Promise<RebuildResult> {
    const { readModel } = this.definition;
    const previous = await this.loadStored();
    if (signal.aborted) throw new RebuildCancelledError(this.name);

    const head = await this.deps.store.headPosition();
    let lease: Checkpoint | null = await this.claimRebuild(previous);
    this.logger.info({ head, previousStatus: previous?.status ?? "idle" }, "rebuild started");

    let eventsApplied = 0;
    let deadLettered = 0;
    try {
      const staging = await readModel.beginRebuild();
      for await (const event of this.deps.store.readAll(0, head, this.types)) {
        if (signal.aborted) throw new RebuildCancelledError(this.name);
        const outcome = await this.apply(event, staging);
        if (outcome.status === "halted") throw outcome.error;
        if (outcome.status === "applied") {
          eventsApplied += 1;
        } else {
          deadLettered += 1;
        }
        if ((eventsApplied + deadLettered) % this.deps.settings.batchSize === 0) {
          lease = await this.replaceCheckpoint(lease, lease.position, "rebuilding");
          if (!lease) throw new RebuildCancelledError(this.name, "rebuild lease lost");
          await yieldToLoop();
        }
      }
      if (signal.aborted) throw new RebuildCancelledError(this.name);
      lease = await this.replaceCheckpoint(lease, lease.position, "rebuilding");
      if (!lease) throw new RebuildCancelledError(this.name, "rebuild lease lost");
      await readModel.commitRebuild();
    } catch (err) {
      // Without the lease the staging generation may already belong to another rebuild.
      const restoredStatus = statusAfterRebuild(previous);
      if (lease) {
        await readModel.abortRebuild();
        await this.replaceCheckpoint(lease, lease.position, restoredStatus);
      }
      this.logger.warn({ err, restoredStatus, leaseHeld: lease !== null }, "rebuild abandoned");
      throw err;
    }

    await this.saveCheckpoint(head, "running");
    this.logger.info({ head, eventsApplied, deadLettered }, "rebuild committed");
    this.wakeup.notify();
    return { projectionName: this.name, position: head, eventsApplied, deadLettered };
  }

  /** Marks the checkpoint `rebuilding`, retrying while a tailing worker elsewhere moves it. */
  private async claimRebuild(previous: Checkpoint | null): Promise<Checkpoint> {
    let expected = previous;
    for (let attempt = 0; attempt < CLAIM_ATTEMPTS; attempt += 1) {
      if (expected?.status === "rebuilding" && !this.leaseExpired(expected)) {
        throw new RebuildCancelledError(this.name, "rebuild already in progress");
      }
      const claimed = await this.replaceCheckpoint(expected, expected?.position ?? 0, "rebuilding");
      if (claimed) return claimed;
      expected = await this.loadStored();
    }
    throw new RebuildCancelledError(this.name, "checkpoint kept moving while claiming the rebuild");
  }

  /** Clears a `failed` halt so tailing retries from the checkpoint. */
  async resume(): Promise<boolean> {
    const resumed = await this.lock.run(LOCK, async () => {
      const checkpoint = await this.loadStored();
      if (checkpoint?.status !== "failed") return false;
      return (await this.replaceCheckpoint(checkpoint, checkpoint.position, "running")) !== null;
    });
    if (resumed) {
      this.logger.info({ position: this.position }, "projection resumed");
      this.wakeup.notify();
    }
    return resumed;
  }

  async report(): Promise<ProjectionReport> {
    const checkpoint = await this.loadCheckpoint();
    const head = await this.deps.store.headPosition();
    return {
      ...checkpoint,
      eventTypes: [...this.types],
      failurePolicy: this.policy,
      lag: Math.max(0, head - checkpoint.position),
    };
  }

  async waitForPosition(position: number, timeoutMs: number): Promise<void> {
    if (this.position >= position) return;
    if ((await this.loadCheckpoint()).position >= position) return;
    await withTimeout(`waitForPosition(${this.name}, ${position})`, timeoutMs, (signal) => {
      return new Promise<void>((resolve) => {
        const waiter = { position, resolve };
        this.waiters.push(waiter);
        signal.addEventListener(
          "abort",
          () => {
            this.waiters = this.waiters.filter((w) => w !== waiter);
          },
          { once: true }
        );
      });
    });
  }

  private initialCheckpoint(): Checkpoint {
    return { projectionName: this.name, position: 0, status: "idle", updatedAt: this.deps.clock().toISOString() };
  }

  private async loadStored(): Promise<Checkpoint | null> {
    const checkpoint = await this.deps.checkpoints.load(this.name);
    this.position = checkpoint?.position ?? 0;
    return checkpoint;
  }

  private async loadCheckpoint(): Promise<Checkpoint> {
    return (await this.loadStored()) ?? this.initialCheckpoint();
  }

  private async saveCheckpoint(position: number, status: ProjectionStatus): Promise<Checkpoint> {
    const checkpoint = { projectionName: this.name, position, status, updatedAt: this.deps.clock().toISOString() };
    await this.deps.checkpoints.save(checkpoint);
    this.advanced(position);
    return checkpoint;
  }

  /** Returns the written checkpoint, or null when another process changed it first. */
  private async replaceCheckpoint(
    expected: Checkpoint | null,
    position: number,
    status: ProjectionStatus
  ): Promise<Checkpoint | null> {
    const checkpoint = { projectionName: this.name, position, status, updatedAt: this.deps.clock().toISOString() };
    if (!(await this.deps.checkpoints.replace(checkpoint, expected))) return null;
    this.advanced(position);
    return checkpoint;
  }

  private advanced(position: number): void {
    this.position = position;
    const ready = this.waiters.filter((w) => w.position <= position);
    this.waiters = this.waiters.filter((w) => w.position > position);
    ready.forEach((w) => w.resolve());
  }
}
