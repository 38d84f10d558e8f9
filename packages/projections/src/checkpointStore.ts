import { Pool } from "pg";
import { StorageFailureError } from "../../shared/src";

export const PROJECTION_STATUSES = ["idle", "running", "rebuilding", "failed"] as const;
export type ProjectionStatus = (typeof PROJECTION_STATUSES)[number];

export type Checkpoint = {
  projectionName: string;
  position: number;
  status: ProjectionStatus;
  updatedAt: string;
};

/**
 * Several processes may share one checkpoint: a worker tails while an API process rebuilds.
 * `replace` is the compare-and-set they coordinate through.
 */
export interface CheckpointStore {
  load(projectionName: string): Promise<Checkpoint | null>;
  save(checkpoint: Checkpoint): Promise<void>;
  /** Writes `next` only if the stored checkpoint still equals `expected` (null: none stored). */
  replace(next: Checkpoint, expected: Checkpoint | null): Promise<boolean>;
  list(): Promise<Checkpoint[]>;
}

const sameCheckpoint = (a: Checkpoint, b: Checkpoint): boolean =>
  a.position === b.position && a.status === b.status && Date.parse(a.updatedAt) === Date.parse(b.updatedAt);

export class InMemoryCheckpointStore implements CheckpointStore {
  private checkpoints = new Map<string, Checkpoint>();

  async load(projectionName: string): Promise<Checkpoint | null> {
    const found = this.checkpoints.get(projectionName);
    return found ? { ...found } : null;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.checkpoints.set(checkpoint.projectionName, { ...checkpoint });
  }

  async replace(next: Checkpoint, expected: Checkpoint | null): Promise<boolean> {
    const stored = this.checkpoints.get(next.projectionName) ?? null;
    const matches = stored === null || expected === null ? stored === expected : sameCheckpoint(stored, expected);
    if (!matches) return false;
    this.checkpoints.set(next.projectionName, { ...next });
    return true;
  }

  async list(): Promise<Checkpoint[]> {
    return [...this.checkpoints.values()]
      .map((checkpoint) => ({ ...checkpoint }))
      .sort((a, b) => a.projectionName.localeCompare(b.projectionName));
  }
}

type CheckpointRow = {
  projection_name: string;
  position: string | number;
  status: string;
  updated_at: Date | string;
};

const isStatus = (value: string): value is ProjectionStatus =>
  PROJECTION_STATUSES.some((status) => status === value);

const rowToCheckpoint = (row: CheckpointRow): Checkpoint => ({
  projectionName: row.projection_name,
  position: Number(row.position),
  status: isStatus(row.status) ? row.status : "idle",
  updatedAt: new Date(row.updated_at).toISOString(),
});

export class PostgresCheckpointStore implements CheckpointStore {
  constructor(private readonly pool: Pool) {}

  async load(projectionName: string): Promise<Checkpoint | null> {
    try {
      const res = await this.pool.query<CheckpointRow>(`SELECT * FROM checkpoints WHERE projection_name = $1`, [
        projectionName,
      ]);
      return res.rows[0] ? rowToCheckpoint(res.rows[0]) : null;
    } catch (err) {
      throw new StorageFailureError(`cannot load checkpoint '${projectionName}'`, err);
    }
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    try {
      await this.pool.query(
        `
        INSERT INTO checkpoints(projection_name, position, status, updated_at) VALUES($1,$2,$3,$4)
        ON CONFLICT (projection_name) DO UPDATE
          SET position = EXCLUDED.position, status = EXCLUDED.status, updated_at = EXCLUDED.updated_at
      `,
        [checkpoint.projectionName, checkpoint.position, checkpoint.status, checkpoint.updatedAt]
      );
    } catch (err) {
      throw new StorageFailureError(`cannot save checkpoint '${checkpoint.projectionName}'`, err);
    }
  }

  async replace(next: Checkpoint, expected: Checkpoint | null): Promise<boolean> {
    try {
      const res =
        expected === null
          ? await this.pool.query<{ projection_name: string }>(
              `
              INSERT INTO checkpoints(projection_name, position, status, updated_at) VALUES($1,$2,$3,$4)
              ON CONFLICT (projection_name) DO NOTHING
              RETURNING projection_name
            `,
              [next.projectionName, next.position, next.status, next.updatedAt]
            )
          : await this.pool.query<{ projection_name: string }>(
              `
              UPDATE checkpoints SET position = $2, status = $3, updated_at = $4
              WHERE projection_name = $1 AND position = $5 AND status = $6 AND updated_at = $7
              RETURNING projection_name
            `,
              [
                next.projectionName,
                next.position,
                next.status,
                next.updatedAt,
                expected.position,
                expected.status,
                expected.updatedAt,
              ]
            );
      return res.rows.length > 0;
    } catch (err) {
      throw new StorageFailureError(`cannot replace checkpoint '${next.projectionName}'`, err);
    }
  }

  async list(): Promise<Checkpoint[]> {
    try {
      const res = await this.pool.query<CheckpointRow>(`SELECT * FROM checkpoints ORDER BY projection_name ASC`);
      return res.rows.map(rowToCheckpoint);
    } catch (err) {
      throw new StorageFailureError("cannot list checkpoints", err);
    }
  }
}
