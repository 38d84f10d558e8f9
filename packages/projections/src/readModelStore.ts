import { Pool, PoolClient, QueryResultRow } from "pg";
import { z } from "zod";
import { StorageFailureError, ValidationError } from "../../shared/src";

export type ReadModelEntry<Row> = { key: string; row: Row };

export type ListOptions = { limit?: number; offset?: number };

/** One generation of a read model. Projection handlers write through this. */
export interface ReadModelView<Row> {
  get(key: string): Promise<Row | null>;
  put(key: string, row: Row): Promise<void>;
  delete(key: string): Promise<void>;
  list(options?: ListOptions): Promise<ReadModelEntry<Row>[]>;
  count(): Promise<number>;
}

/**
 * Keyed rows of one projection, stored by generation. Queries always see the current
 * generation; a rebuild fills a staging generation that replaces it in one step.
 */
export interface ReadModelStore<Row> {
  readonly name: string;
  current(): Promise<ReadModelView<Row>>;
  beginRebuild(): Promise<ReadModelView<Row>>;
  commitRebuild(): Promise<void>;
  abortRebuild(): Promise<void>;
  get(key: string): Promise<Row | null>;
  list(options?: ListOptions): Promise<ReadModelEntry<Row>[]>;
  count(): Promise<number>;
}

const page = <T>(items: T[], options: ListOptions = {}): T[] => {
  const offset = Math.max(0, options.offset ?? 0);
  return options.limit === undefined ? items.slice(offset) : items.slice(offset, offset + Math.max(0, options.limit));
};

class MapView<Row> implements ReadModelView<Row> {
  constructor(private readonly rows: Map<string, Row>) {}

  async get(key: string): Promise<Row | null> {
    const row = this.rows.get(key);
    return row === undefined ? null : structuredClone(row);
  }

  async put(key: string, row: Row): Promise<void> {
    this.rows.set(key, structuredClone(row));
  }

  async delete(key: string): Promise<void> {
    this.rows.delete(key);
  }

  async list(options?: ListOptions): Promise<ReadModelEntry<Row>[]> {
    const keys = [...this.rows.keys()].sort();
    return page(keys, options).flatMap((key) => {
      const row = this.rows.get(key);
      return row === undefined ? [] : [{ key, row: structuredClone(row) }];
    });
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

export class InMemoryReadModelStore<Row> implements ReadModelStore<Row> {
  private rows = new Map<string, Row>();
  private staging: Map<string, Row> | null = null;

  constructor(readonly name: string) {}

  async current(): Promise<ReadModelView<Row>> {
    return new MapView(this.rows);
  }

  async beginRebuild(): Promise<ReadModelView<Row>> {
    this.staging = new Map();
    return new MapView(this.staging);
  }

  async commitRebuild(): Promise<void> {
    if (!this.staging) throw new Error(`read model '${this.name}' has no rebuild in progress`);
    this.rows = this.staging;
    this.staging = null;
  }

  async abortRebuild(): Promise<void> {
    this.staging = null;
  }

  async get(key: string): Promise<Row | null> {
    return new MapView(this.rows).get(key);
  }

  async list(options?: ListOptions): Promise<ReadModelEntry<Row>[]> {
    return new MapView(this.rows).list(options);
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

class PostgresView<Row> implements ReadModelView<Row> {
  constructor(
    private readonly pool: Pool,
    private readonly name: string,
    private readonly generation: number,
    private readonly rowSchema: z.ZodType<Row, z.ZodTypeDef, unknown>
  ) {}

  private decode(key: string, doc: unknown): Row {
    const parsed = this.rowSchema.safeParse(doc);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `read model '${this.name}' row '${key}' does not decode`);
    }
    return parsed.data;
  }

  async get(key: string): Promise<Row | null> {
    const res = await query<{ doc: unknown }>(
      this.pool,
      `SELECT doc FROM read_model_rows WHERE projection_name = $1 AND generation = $2 AND row_key = $3`,
      [this.name, this.generation, key]
    );
    return res[0] ? this.decode(key, res[0].doc) : null;
  }

  async put(key: string, row: Row): Promise<void> {
    await query(
      this.pool,
      `
      INSERT INTO read_model_rows(projection_name, generation, row_key, doc) VALUES($1,$2,$3,$4)
      ON CONFLICT (projection_name, generation, row_key) DO UPDATE SET doc = EXCLUDED.doc
    `,
      [this.name, this.generation, key, JSON.stringify(row)]
    );
  }

  async delete(key: string): Promise<void> {
    await query(
      this.pool,
      `DELETE FROM read_model_rows WHERE projection_name = $1 AND generation = $2 AND row_key = $3`,
      [this.name, this.generation, key]
    );
  }

  async list(options: ListOptions = {}): Promise<ReadModelEntry<Row>[]> {
    const limit = options.limit === undefined ? "" : ` LIMIT ${Math.max(0, Math.floor(options.limit))}`;
    const offset = options.offset ? ` OFFSET ${Math.max(0, Math.floor(options.offset))}` : "";
    const rows = await query<{ row_key: string; doc: unknown }>(
      this.pool,
      `SELECT row_key, doc FROM read_model_rows WHERE projection_name = $1 AND generation = $2
       ORDER BY row_key ASC${limit}${offset}`,
      [this.name, this.generation]
    );
    return rows.map((row) => ({ key: row.row_key, row: this.decode(row.row_key, row.doc) }));
  }

  async count(): Promise<number> {
    const rows = await query<{ total: string | number }>(
      this.pool,
      `SELECT COUNT(*) AS total FROM read_model_rows WHERE projection_name = $1 AND generation = $2`,
      [this.name, this.generation]
    );
    return Number(rows[0]?.total ?? 0);
  }
}

const query = async <R extends QueryResultRow>(pool: Pool, sql: string, values: unknown[]): Promise<R[]> => {
  try {
    const res = await pool.query<R>(sql, values);
    return res.rows;
  } catch (err) {
    throw new StorageFailureError("read model query failed", err);
  }
};

export type PostgresReadModelDeps<Row> = {
  pool: Pool;
  name: string;
  rowSchema: z.ZodType<Row, z.ZodTypeDef, unknown>;
};

/**
 * Rows live in `read_model_rows` tagged with a generation number; `read_model_generations`
 * points at the current one. The pointer is read on every call: a rebuild committed by
 * another process swaps it underneath this one.
 */
export class PostgresReadModelStore<Row> implements ReadModelStore<Row> {
  readonly name: string;
  private readonly pool: Pool;
  private readonly rowSchema: z.ZodType<Row, z.ZodTypeDef, unknown>;
  private staging: number | null = null;

  constructor({ pool, name, rowSchema }: PostgresReadModelDeps<Row>) {
    this.pool = pool;
    this.name = name;
    this.rowSchema = rowSchema;
  }

  private async currentGeneration(): Promise<number> {
    const rows = await query<{ generation: number | string }>(
      this.pool,
      `SELECT generation FROM read_model_generations WHERE projection_name = $1`,
      [this.name]
    );
    return Number(rows[0]?.generation ?? 0);
  }

  private view(generation: number): ReadModelView<Row> {
    return new PostgresView(this.pool, this.name, generation, this.rowSchema);
  }

  async current(): Promise<ReadModelView<Row>> {
    return this.view(await this.currentGeneration());
  }

  async beginRebuild(): Promise<ReadModelView<Row>> {
    const staging = (await this.currentGeneration()) + 1;
    await query(this.pool, `DELETE FROM read_model_rows WHERE projection_name = $1 AND generation = $2`, [
      this.name,
      staging,
    ]);
    this.staging = staging;
    return this.view(staging);
  }

  async commitRebuild(): Promise<void> {
    const staging = this.staging;
    if (staging === null) throw new Error(`read model '${this.name}' has no rebuild in progress`);
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StorageFailureError("cannot connect to postgres", err);
    }
    try {
      await client.query("BEGIN");
      await client.query(
        `
        INSERT INTO read_model_generations(projection_name, generation) VALUES($1,$2)
        ON CONFLICT (projection_name) DO UPDATE SET generation = EXCLUDED.generation
      `,
        [this.name, staging]
      );
      await client.query(`DELETE FROM read_model_rows WHERE projection_name = $1 AND generation <> $2`, [
        this.name,
        staging,
      ]);
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK");
      throw new StorageFailureError(`read model '${this.name}' swap failed`, err);
    } finally {
      client.release();
    }
    this.staging = null;
  }

  async abortRebuild(): Promise<void> {
    const staging = this.staging ?? (await this.currentGeneration()) + 1;
    this.staging = null;
    await query(this.pool, `DELETE FROM read_model_rows WHERE projection_name = $1 AND generation = $2`, [
      this.name,
      staging,
    ]);
  }

  async get(key: string): Promise<Row | null> {
    return (await this.current()).get(key);
  }

  async list(options?: ListOptions): Promise<ReadModelEntry<Row>[]> {
    return (await this.current()).list(options);
  }

  async count(): Promise<number> {
    return (await this.current()).count();
  }
}
