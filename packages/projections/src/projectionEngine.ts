import { EventStore } from "../../event-store/src";
import {
  EventShape,
  Logger,
  ProjectionAlreadyRegisteredError,
  ProjectionNotFoundError,
  silentLogger,
} from "../../shared/src";
import { CheckpointStore } from "./checkpointStore";
import { DeadLetterStore } from "./deadLetterStore";
import { ProjectionDefinition } from "./projection";
import {
  ManagedProjection,
  ProjectionReport,
  ProjectionWorker,
  RebuildResult,
  WorkerSettings,
} from "./projectionWorker";

export type ProjectionEngineDeps = {
  store: EventStore;
  checkpoints: CheckpointStore;
  deadLetters: DeadLetterStore;
  logger?: Logger;
  clock?: () => Date;
  settings?: Partial<WorkerSettings>;
};

export const DEFAULT_WORKER_SETTINGS: WorkerSettings = {
  batchSize: 200,
  pollIntervalMs: 500,
  partitionConcurrency: 1,
  failurePolicy: "skip",
  rebuildLeaseMs: 60_000,
};

export class ProjectionEngine {
  private readonly projections = new Map<string, ManagedProjection>();
  private readonly logger: Logger;
  private readonly settings: WorkerSettings;
  private started = false;

  constructor(private readonly deps: ProjectionEngineDeps) {
    this.logger = deps.logger ?? silentLogger();
    this.settings = { ...DEFAULT_WORKER_SETTINGS, ...deps.settings };
  }

  subscribe<E extends EventShape, Row>(definition: ProjectionDefinition<E, Row>): void {
    if (this.projections.has(definition.name)) {
      throw new ProjectionAlreadyRegisteredError(definition.name);
    }
    const worker = new ProjectionWorker(definition, {
      store: this.deps.store,
      checkpoints: this.deps.checkpoints,
      deadLetters: this.deps.deadLetters,
      logger: this.logger,
      clock: this.deps.clock ?? (() => new Date()),
      settings: this.settings,
    });
    this.projections.set(definition.name, worker);
    if (this.started) worker.start();
  }

  names(): string[] {
    return [...this.projections.keys()];
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.projections.forEach((projection) => projection.start());
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await Promise.all([...this.projections.values()].map((projection) => projection.stop()));
  }

  private get(name: string): ManagedProjection {
    const projection = this.projections.get(name);
    if (!projection) throw new ProjectionNotFoundError(name);
    return projection;
  }

  rebuild(name: string, options: { signal?: AbortSignal } = {}): Promise<RebuildResult> {
    return this.get(name).rebuild(options.signal);
  }

  /** Returns false when no rebuild of `name` is in progress. */
  cancelRebuild(name: string): boolean {
    return this.get(name).cancelRebuild();
  }

  resume(name: string): Promise<boolean> {
    return this.get(name).resume();
  }

  status(name: string): Promise<ProjectionReport> {
    return this.get(name).report();
  }

  statuses(): Promise<ProjectionReport[]> {
    return Promise.all([...this.projections.values()].map((projection) => projection.report()));
  }

  /** Resolves once the projection's checkpoint reaches `position`; rejects with `StepTimeoutError`. */
  waitForPosition(name: string, position: number, timeoutMs = 5_000): Promise<void> {
    return this.get(name).waitForPosition(position, timeoutMs);
  }
}
