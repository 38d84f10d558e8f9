import { Pool, PoolClient, QueryResultRow } from "pg";
import {
  EventMetadata,
  KeyedMutex,
  Logger,
  NewEvent,
  RecordedEvent,
  StorageFailureError,
  VersionConflictError,
  silentLogger,
} from "../../shared/src";
import { AppendResult, CommitListener, CommitNotifier, EventStore, restartable } from "./eventStore";
import { prepareAppend, readBound } from "./validation";

type PgDeps = {
  pool: Pool;
  logger?: Logger;
  pageSize?: number;
  clock?: () => Date;
};

type EventRow = {
  global_position: string | number;
  event_id: string;
  stream_id: string;
  stream_version: number;
  event_type: string;
  ts: Date | string;
  causation_id: string | null;
  correlation_id: string | null;
  metadata: EventMetadata | null;
  payload: unknown;
};

const isUniqueViolation = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "23505";

/**
 * Events live in `events`, keyed by `(stream_id, stream_version)` with `global_position`
 * as primary key. Positions come from the single-row `event_log_head` counter, whose
 * row lock is held until commit, so position order equals commit order.
 */
export class PostgresEventStore implements EventStore {
  private pool: Pool;
  private readonly logger: Logger;
  private readonly pageSize: number;
  private readonly now: () => Date;
  private readonly streamLocks = new KeyedMutex();
  private readonly notifier: CommitNotifier;

  constructor({ pool, logger, pageSize, clock }: PgDeps) {
    this.pool = pool;
    this.logger = logger ?? silentLogger();
    this.pageSize = pageSize ?? 500;
    this.now = clock ?? (() => new Date());
    this.notifier = new CommitNotifier(this.logger);
  }

  private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StorageFailureError("cannot connect to postgres", err);
    }
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  private async select<R extends QueryResultRow>(sql: string, values: unknown[]): Promise<R[]> {
    try {
      const res = await this.pool.query<R>(sql, values);
      return res.rows;
    } catch (err) {
      throw new StorageFailureError("event query failed", err);
    }
  }

  async append(streamId: string, expectedVersion: number, events: readonly NewEvent[]): Promise<AppendResult> {
    const prepared = prepareAppend(streamId, expectedVersion, events, this.now());
    if (!prepared.ok) return prepared;
    const { drafts } = prepared;

    const result = await this.streamLocks.run(streamId, () =>
      this.withClient(async (client): Promise<AppendResult> => {
        await client.query("BEGIN");
        try {
          const current = await client.query<{ stream_version: number }>(
            `SELECT stream_version FROM events WHERE stream_id = $1 ORDER BY stream_version DESC LIMIT 1`,
            [streamId]
          );
          const actual = Number(current.rows[0]?.stream_version ?? 0);
          if (actual !== expectedVersion) {
            await client.query("ROLLBACK");
            return { ok: false, error: new VersionConflictError(streamId, expectedVersion, actual) };
          }

          const head = await client.query<{ position: string | number }>(
            `UPDATE event_log_head SET position = position + $1 WHERE id = 1 RETURNING position`,
            [drafts.length]
          );
          if (head.rows.length === 0) {
            throw new Error("event_log_head is not initialised");
          }
          const first = Number(head.rows[0].position) - drafts.length + 1;
          const records: RecordedEvent[] = drafts.map((draft, i) => ({
            ...draft,
            streamId,
            streamVersion: expectedVersion + i + 1,
            globalPosition: first + i,
          }));

          const values: unknown[] = [];
          const tuples = records.map((record) => {
            const base = values.length;
            values.push(
              record.globalPosition,
              record.eventId,
              record.streamId,
              record.streamVersion,
              record.eventType,
              record.timestamp,
              record.causationId,
              record.correlationId,
              JSON.stringify(record.metadata),
              JSON.stringify(record.payload)
            );
            return `(${Array.from({ length: 10 }, (_, j) => `$${base + j + 1}`).join(",")})`;
          });
          await client.query(
            `
            INSERT INTO events(
              global_position, event_id, stream_id, stream_version, event_type, ts,
              causation_id, correlation_id, metadata, payload
            ) VALUES ${tuples.join(",")}
          `,
            values
          );
          await client.query("COMMIT");
          return { ok: true, version: expectedVersion + records.length, events: records };
        } catch (err) {
          await client.query("ROLLBACK");
          if (isUniqueViolation(err)) {
            const actual = await this.streamVersion(streamId);
            return { ok: false, error: new VersionConflictError(streamId, expectedVersion, actual) };
          }
          throw new StorageFailureError(`append to '${streamId}' failed`, err);
        }
      })
    );
    if (result.ok) {
      this.notifier.notify(result.events);
    }
    return result;
  }

  readStream(streamId: string, fromVersion = 0): AsyncIterable<RecordedEvent> {
    return restartable(() => this.streamEvents(streamId, fromVersion));
  }

  private async *streamEvents(streamId: string, fromVersion: number): AsyncGenerator<RecordedEvent> {
    let cursor = readBound("fromVersion", fromVersion);
    const end = await this.streamVersion(streamId);
    while (cursor < end) {
      const rows = await this.select<EventRow>(
        `SELECT * FROM events WHERE stream_id = $1 AND stream_version > $2 AND stream_version <= $3
         ORDER BY stream_version ASC LIMIT ${this.pageSize}`,
        [streamId, cursor, end]
      );
      if (rows.length === 0) return;
      for (const row of rows) {
        const event = rowToEvent(row);
        cursor = event.streamVersion;
        yield event;
      }
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
    let cursor = readBound("fromPosition", fromPosition);
    const end = Math.min(readBound("toPosition", toPosition), await this.headPosition());
    while (cursor < end) {
      const values: unknown[] = [cursor, end];
      let typeClause = "";
      if (eventTypes && eventTypes.length > 0) {
        const placeholders = eventTypes.map((type) => {
          values.push(type);
          return `$${values.length}`;
        });
        typeClause = ` AND event_type IN (${placeholders.join(",")})`;
      }
      const rows = await this.select<EventRow>(
        `SELECT * FROM events WHERE global_position > $1 AND global_position <= $2${typeClause}
         ORDER BY global_position ASC LIMIT ${this.pageSize}`,
        values
      );
      if (rows.length === 0) return;
      for (const row of rows) {
        const event = rowToEvent(row);
        cursor = event.globalPosition;
        yield event;
      }
    }
  }

  async streamVersion(streamId: string): Promise<number> {
    const rows = await this.select<{ version: number | string }>(
      `SELECT stream_version AS version FROM events WHERE stream_id = $1 ORDER BY stream_version DESC LIMIT 1`,
      [streamId]
    );
    return Number(rows[0]?.version ?? 0);
  }

  async headPosition(): Promise<number> {
    const rows = await this.select<{ version: number | string }>(
      `SELECT position AS version FROM event_log_head WHERE id = 1`,
      []
    );
    return Number(rows[0]?.version ?? 0);
  }

  onCommit(listener: CommitListener): () => void {
    return this.notifier.subscribe(listener);
  }
}

function rowToEvent(row: EventRow): RecordedEvent {
  return {
    eventId: row.event_id,
    streamId: row.stream_id,
    eventType: row.event_type,
    streamVersion: Number(row.stream_version),
    globalPosition: Number(row.global_position),
    timestamp: new Date(row.ts).toISOString(),
    causationId: row.causation_id,
    correlationId: row.correlation_id,
    metadata: row.metadata ?? {},
    payload: row.payload,
  };
}
