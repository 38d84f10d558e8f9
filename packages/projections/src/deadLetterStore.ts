import { randomUUID } from "crypto";
import { Pool } from "pg";
import { RecordedEvent, StorageFailureError } from "../../shared/src";
import { recordedEventSchema } from "../../event-store/src";

export type DeadLetter = {
  id: string;
  projectionName: string;
  event: RecordedEvent;
  error: string;
  failedAt: string;
};

export type DeadLetterInput = Omit<DeadLetter, "id">;

export interface DeadLetterStore {
  record(input: DeadLetterInput): Promise<DeadLetter>;
  list(projectionName?: string, limit?: number): Promise<DeadLetter[]>;
}

export class InMemoryDeadLetterStore implements DeadLetterStore {
  private letters: DeadLetter[] = [];

  async record(input: DeadLetterInput): Promise<DeadLetter> {
    const letter = { id: randomUUID(), ...input };
    this.letters.push(letter);
    return letter;
  }

  async list(projectionName?: string, limit = 100): Promise<DeadLetter[]> {
    return this.letters
      .filter((letter) => projectionName === undefined || letter.projectionName === projectionName)
      .slice(0, limit);
  }
}

type DeadLetterRow = {
  id: string;
  projection_name: string;
  event: unknown;
  error: string;
  failed_at: Date | string;
};

export class PostgresDeadLetterStore implements DeadLetterStore {
  constructor(private readonly pool: Pool) {}

  async record(input: DeadLetterInput): Promise<DeadLetter> {
    const letter = { id: randomUUID(), ...input };
    try {
      await this.pool.query(
        `INSERT INTO dead_letters(id, projection_name, global_position, event, error, failed_at) VALUES($1,$2,$3,$4,$5,$6)`,
        [
          letter.id,
          letter.projectionName,
          letter.event.globalPosition,
          JSON.stringify(letter.event),
          letter.error,
          letter.failedAt,
        ]
      );
    } catch (err) {
      throw new StorageFailureError(`cannot record dead letter for '${input.projectionName}'`, err);
    }
    return letter;
  }

  async list(projectionName?: string, limit = 100): Promise<DeadLetter[]> {
    const values: unknown[] = [];
    let where = "";
    if (projectionName !== undefined) {
      values.push(projectionName);
      where = "WHERE projection_name = $1";
    }
    let rows: DeadLetterRow[];
    try {
      const res = await this.pool.query<DeadLetterRow>(
        `SELECT * FROM dead_letters ${where} ORDER BY failed_at ASC, global_position ASC LIMIT ${Math.max(0, Math.floor(limit))}`,
        values
      );
      rows = res.rows;
    } catch (err) {
      throw new StorageFailureError("cannot list dead letters", err);
    }
    return rows.map((row) => {
      const event = recordedEventSchema.safeParse(row.event);
      if (!event.success) {
        throw new StorageFailureError(`dead letter '${row.id}' holds a malformed event`, event.error);
      }
      return {
        id: row.id,
        projectionName: row.projection_name,
        event: event.data,
        error: row.error,
        failedAt: new Date(row.failed_at).toISOString(),
      };
    });
  }
}
