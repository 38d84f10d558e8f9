import { AppendResult, EventStore } from "../../event-store/src";
import { SnapshotStore } from "../../snapshot-store/src";
import { EventShape, Logger, RecordedEvent, ValidationError, silentLogger } from "../../shared/src";
import { Aggregate, AggregateDefinition } from "./aggregate";

export type RepositoryDeps = {
  store: EventStore;
  snapshots?: SnapshotStore;
  /** Write a snapshot each time a save crosses a multiple of this many events. 0 disables. */
  snapshotEvery?: number;
  logger?: Logger;
  clock?: () => Date;
};

export class AggregateRepository<S, E extends EventShape> {
  private readonly store: EventStore;
  private readonly snapshots?: SnapshotStore;
  private readonly snapshotEvery: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    readonly definition: AggregateDefinition<S, E>,
    deps: RepositoryDeps
  ) {
    this.store = deps.store;
    this.snapshots = deps.snapshots;
    this.snapshotEvery = deps.snapshotEvery ?? 0;
    this.logger = (deps.logger ?? silentLogger()).child({ aggregate: definition.category });
    this.now = deps.clock ?? (() => new Date());
  }

  streamIdFor(id: string): string {
    return `${this.definition.category}-${id}`;
  }

  create(streamId: string): Aggregate<S, E> {
    return new Aggregate(this.definition, streamId, this.definition.initialState(), 0);
  }

  /** Rebuilds the aggregate from its newest usable snapshot plus the events after it. */
  async load(streamId: string): Promise<Aggregate<S, E>> {
    let state = this.definition.initialState();
    let version = 0;

    const snapshot = this.snapshots ? await this.snapshots.latest(streamId) : null;
    if (snapshot) {
      const decoded = this.definition.stateSchema.safeParse(snapshot.state);
      if (decoded.success) {
        state = decoded.data;
        version = snapshot.version;
      } else {
        this.logger.warn(
          { streamId, version: snapshot.version, issues: decoded.error.issues.length },
          "snapshot does not decode, replaying from the start"
        );
      }
    }

    for await (const event of this.store.readStream(streamId, version)) {
      state = this.definition.applyEvent(state, this.decode(event));
      version = event.streamVersion;
    }
    return new Aggregate(this.definition, streamId, state, version);
  }

  decode(event: RecordedEvent): E {
    const parsed = this.definition.events.safeParse({ eventType: event.eventType, payload: event.payload });
    if (!parsed.success) {
      throw ValidationError.fromZod(
        parsed.error,
        `stream '${event.streamId}' holds an undecodable '${event.eventType}' at version ${event.streamVersion}`
      );
    }
    return parsed.data;
  }

  /**
   * Appends pending events at the version the aggregate was loaded at. Conflicts and
   * validation failures come back unchanged; nothing is retried or merged.
   */
  async save(aggregate: Aggregate<S, E>): Promise<AppendResult> {
    const pending = aggregate.pendingEvents;
    if (pending.length === 0) {
      return { ok: true, version: aggregate.version, events: [] };
    }
    for (const event of pending) {
      const parsed = this.definition.events.safeParse({ eventType: event.eventType, payload: event.payload });
      if (!parsed.success) {
        return { ok: false, error: ValidationError.fromZod(parsed.error, `invalid '${event.eventType}' event`) };
      }
    }

    const previous = aggregate.version;
    const result = await this.store.append(aggregate.streamId, previous, pending);
    if (!result.ok) return result;

    aggregate.markCommitted(result.version);
    if (this.snapshots && this.crossesSnapshotBoundary(previous, result.version)) {
      this.scheduleSnapshot(this.snapshots, aggregate);
    }
    return result;
  }

  /** Resolves once every snapshot write started so far has settled. */
  async flushSnapshots(): Promise<void> {
    await Promise.all([...this.inflight]);
  }

  private crossesSnapshotBoundary(previous: number, next: number): boolean {
    const every = this.snapshotEvery;
    return every > 0 && Math.floor(next / every) > Math.floor(previous / every);
  }

  private scheduleSnapshot(snapshots: SnapshotStore, aggregate: Aggregate<S, E>): void {
    const { streamId, version, state } = aggregate;
    const write: Promise<void> = snapshots
      .save({ streamId, version, state, timestamp: this.now().toISOString() })
      .then(
        () => {
          this.logger.debug({ streamId, version }, "snapshot written");
        },
        (err: unknown) => {
          this.logger.warn({ streamId, version, err }, "snapshot write failed");
        }
      )
      .finally(() => {
        this.inflight.delete(write);
      });
    this.inflight.add(write);
  }
}
