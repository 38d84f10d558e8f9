import { Pool, QueryResultRow } from "pg";
import { StorageFailureError } from "../../shared/src";

export type Snapshot = {
  streamId: string;
  version: number;
  state: unknown;
  timestamp: string;
};

export interface SnapshotStore {
  save(snapshot: Snapshot): Promise<void>;
  /** Newest snapshot for the stream with `version <= maxVersion`, or null. */
  latest(streamId: string, maxVersion?: number): Promise<Snapshot | null>;
  /** Drops all but the newest `keep` snapshots of a stream. Returns how many were removed. */
  prune(streamId: string, keep: number): Promise<number>;
}

export class InMemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, Snapshot[]>();

  async save(snapshot: Snapshot): Promise<void> {
    const existing = (this.snapshots.get(snapshot.streamId) ?? []).filter((s) => s.version !== snapshot.version);
    existing.push({ ...snapshot, state: structuredClone(snapshot.state) });
    existing.sort((a, b) => a.version - b.version);
    this.snapshots.set(snapshot.streamId, existing);
  }

  async latest(streamId: string, maxVersion = Number.POSITIVE_INFINITY): Promise<Snapshot | null> {
    const candidates = (this.snapshots.get(streamId) ?? []).filter((s) => s.version <= maxVersion);
    const found = candidates[candidates.length - 1];
    return found ? { ...found, state: structuredClone(found.state) } : null;
  }

  async prune(streamId: string, keep: number): Promise<number> {
    const existing = this.snapshots.get(streamId) ?? [];
    const kept = existing.slice(Math.max(0, existing.length - keep));
    this.snapshots.set(streamId, kept);
    return existing.length - kept.length;
  }
}

type SnapshotRow = {
  stream_id: string;
  version: number;
  state: unknown;
  ts: Date | string;
};

export class PostgresSnapshotStore implements SnapshotStore {
  constructor(private readonly pool: Pool) {}

  private async run<R extends QueryResultRow>(sql: string, values: unknown[]) {
    try {
      return await this.pool.query<R>(sql, values);
    } catch (err) {
      throw new StorageFailureError("snapshot query failed", err);
    }
  }

  async save(snapshot: Snapshot): Promise<void> {
    await this.run(
      `
      INSERT INTO snapshots(stream_id, version, state, ts) VALUES($1,$2,$3,$4)
      ON CONFLICT (stream_id, version) DO UPDATE SET state = EXCLUDED.state, ts = EXCLUDED.ts
    `,
      [snapshot.streamId, snapshot.version, JSON.stringify(snapshot.state), snapshot.timestamp]
    );
  }

  async latest(streamId: string, maxVersion?: number): Promise<Snapshot | null> {
    const values: unknown[] = [streamId];
    let where = "stream_id = $1";
    if (maxVersion !== undefined && Number.isFinite(maxVersion)) {
      values.push(maxVersion);
      where += ` AND version <= $${values.length}`;
    }
    const res = await this.run<SnapshotRow>(`SELECT * FROM snapshots WHERE ${where} ORDER BY version DESC LIMIT 1`, values);
    const row = res.rows[0];
    if (!row) return null;
    return {
      streamId: row.stream_id,
      version: Number(row.version),
      state: row.state,
      timestamp: new Date(row.ts).toISOString(),
    };
  }

  async prune(streamId: string, keep: number): Promise<number> {
    const res = await this.run<{ version: number }>(
      `SELECT version FROM snapshots WHERE stream_id = $1 ORDER BY version DESC`,
      [streamId]
    );
    const doomed = res.rows.slice(Math.max(0, keep)).map((row) => Number(row.version));
    for (const version of doomed) {
      await this.run(`DELETE FROM snapshots WHERE stream_id = $1 AND version = $2`, [streamId, version]);
    }
    return doomed.length;
  }
}
