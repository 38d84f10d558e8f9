import { promises as fs } from "fs";
import { dirname } from "path";
import { z } from "zod";
import {
  KeyedMutex,
  Logger,
  NewEvent,
  RecordedEvent,
  StorageFailureError,
  ValidationError,
  VersionConflictError,
  silentLogger,
} from "../../shared/src";
import { EventDraft, prepareAppend, readBound, recordedEventSchema } from "./validation";

export type AppendResult =
  | { ok: true; version: number; events: RecordedEvent[] }
  | { ok: false; error: VersionConflictError | ValidationError };

export type CommitListener = (events: readonly RecordedEvent[]) => void;

export interface EventStore {
  /**
   * Appends a batch to one stream if its current version equals `expectedVersion`.
   * Conflicts and invalid input come back as `ok: false`; storage faults throw.
   */
  append(streamId: string, expectedVersion: number, events: readonly NewEvent[]): Promise<AppendResult>;
  /** Events with `streamVersion > fromVersion`, bounded by the stream head when iteration starts. */
  readStream(streamId: string, fromVersion?: number): AsyncIterable<RecordedEvent>;
  /** Events with `fromPosition < globalPosition <= toPosition`, in global order. */
  readAll(fromPosition?: number, toPosition?: number, eventTypes?: readonly string[]): AsyncIterable<RecordedEvent>;
  streamVersion(streamId: string): Promise<number>;
  headPosition(): Promise<number>;
  /** In-process wake-up signal after each commit. Returns an unsubscribe function. */
  onCommit(listener: CommitListener): () => void;
}

export class CommitNotifier {
  private readonly listeners = new Set<CommitListener>();

  constructor(private readonly logger: Logger) {}

  subscribe(listener: CommitListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  notify(events: readonly RecordedEvent[]): void {
    for (const listener of this.listeners) {
      try {
        listener(events);
      } catch (err) {
        this.logger.warn({ err }, "commit listener threw");
      }
    }
  }
}

/** Wraps a generator factory so every `for await` starts a fresh read. */
export const restartable = <T>(factory: () => AsyncIterator<T>): AsyncIterable<T> => ({
  [Symbol.asyncIterator]: factory,
});

export const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
};

export type EventStoreOptions = {
  logger?: Logger;
  clock?: () => Date;
};

const toRecord = (draft: EventDraft, streamId: string, streamVersion: number, globalPosition: number): RecordedEvent =>
  Object.freeze({ ...draft, streamId, streamVersion, globalPosition });

export class InMemoryEventStore implements EventStore {
  private log: RecordedEvent[] = [];
  private streams = new Map<string, RecordedEvent[]>();
  private readonly streamLocks = new KeyedMutex();
  private readonly commitLock = new KeyedMutex();
  private readonly notifier: CommitNotifier;
  protected readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: EventStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.now = options.clock ?? (() => new Date());
    this.notifier = new CommitNotifier(this.logger);
  }

  protected async ready(): Promise<void> {}

  /** Durable adapters write `log` here before the batch becomes visible. */
  protected async persist(_log: readonly RecordedEvent[]): Promise<void> {}

  protected restore(events: readonly RecordedEvent[]): void {
    this.log = [];
    this.streams = new Map();
    events.forEach((event) => this.index(event));
  }

  private index(event: RecordedEvent): void {
    this.log.push(event);
    const stream = this.streams.get(event.streamId);
    if (stream) {
      stream.push(event);
    } else {
      this.streams.set(event.streamId, [event]);
    }
  }

  async append(streamId: string, expectedVersion: number, events: readonly NewEvent[]): Promise<AppendResult> {
    const prepared = prepareAppend(streamId, expectedVersion, events, this.now());
    if (!prepared.ok) return prepared;
    await this.ready();

    return this.streamLocks.run(streamId, async (): Promise<AppendResult> => {
      const actual = this.streams.get(streamId)?.length ?? 0;
      if (actual !== expectedVersion) {
        return { ok: false, error: new VersionConflictError(streamId, expectedVersion, actual) };
      }
      // Position assignment, persistence and visibility happen in one serialized step so
      // global positions follow commit order across streams.
      const committed = await this.commitLock.run("log", async () => {
        const base = this.log.length;
        const records = prepared.drafts.map((draft, i) => toRecord(draft, streamId, expectedVersion + i + 1, base + i + 1));
        try {
          await this.persist([...this.log, ...records]);
        } catch (err) {
          throw err instanceof StorageFailureError ? err : new StorageFailureError(`append to '${streamId}' failed`, err);
        }
        records.forEach((record) => this.index(record));
        this.notifier.notify(records);
        return records;
      });
      return { ok: true, version: expectedVersion + committed.length, events: committed };
    });
  }

  readStream(streamId: string, fromVersion = 0): AsyncIterable<RecordedEvent> {
    return restartable(() => this.streamEvents(streamId, fromVersion));
  }

  private async *streamEvents(streamId: string, fromVersion: number): AsyncGenerator<RecordedEvent> {
    const from = readBound("fromVersion", fromVersion);
    await this.ready();
    const stream = this.streams.get(streamId) ?? [];
    const end = stream.length;
    for (let i = from; i < end; i += 1) {
      yield stream[i];
    }
  }

  readAll(fromPosition = 0, toPosition = Number.POSITIVE_INFINITY, eventTypes?: readonly string[]): AsyncIterable<RecordedEvent> {
    return restartable(() => this.allEvents(fromPosition, toPosition, eventTypes));
  }

  private async *allEvents(
    fromPosition: number,
    toPosition: number,
    eventTypes?: readonly string[]
  ): AsyncGenerator<RecordedEvent> {
    const from = readBound("fromPosition", fromPosition);
    const to = readBound("toPosition", toPosition);
    await this.ready();
    const types = eventTypes && eventTypes.length > 0 ? new Set(eventTypes) : null;
    const end = Math.min(to, this.log.length);
    for (let i = from; i < end; i += 1) {
      const event = this.log[i];
      if (types && !types.has(event.eventType)) continue;
      yield event;
    }
  }

  async streamVersion(streamId: string): Promise<number> {
    await this.ready();
    return this.streams.get(streamId)?.length ?? 0;
  }

  async headPosition(): Promise<number> {
    await this.ready();
    return this.log.length;
  }

  onCommit(listener: CommitListener): () => void {
    return this.notifier.subscribe(listener);
  }
}

const logFileSchema = z.array(recordedEventSchema);

const isMissingFile = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * In-memory log mirrored to a JSON file. Each commit rewrites the file through a
 * temporary file and a rename; the batch is visible only after the rename succeeds.
 */
export class JsonFileEventStore extends InMemoryEventStore {
  private loading: Promise<void> | null = null;

  constructor(
    private readonly filePath: string,
    options: EventStoreOptions = {}
  ) {
    super(options);
  }

  protected ready(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        throw new StorageFailureError(`cannot read ${this.filePath}`, err);
      }
      this.restore([]);
      return;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new StorageFailureError(`corrupted event log ${this.filePath}`, err);
    }
    const parsed = logFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageFailureError(`corrupted event log ${this.filePath}`, parsed.error);
    }
    this.restore(parsed.data);
    this.logger.debug({ filePath: this.filePath, events: parsed.data.length }, "event log loaded");
  }

  protected async persist(log: readonly RecordedEvent[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(log, null, 2), "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}
