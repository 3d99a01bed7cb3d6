import { Pool } from "pg";
import { describeError, IndexWriteError } from "../../domain/errors.js";
import { IndexEntry } from "../../domain/types.js";
import {
  assertAlignedUpsert,
  UpsertInput,
  VectorQueryHit,
  VectorStore,
} from "../../domain/vectorStore.js";

interface PgEntryRow {
  id: string;
  source: string;
  page: number;
  char_start: number | null;
  document: string;
}

interface PgHitRow extends PgEntryRow {
  distance: number;
}

interface PgFullRow extends PgEntryRow {
  embedding: string;
}

interface Queryable {
  query(text: string): Promise<unknown>;
}

const DEFAULT_TABLE = "index_entries";

export class PgVectorStore implements VectorStore {
  private initialized = false;

  private readonly table: string;

  constructor(
    private readonly pool: Pool,
    private readonly dimension: number,
    table: string = DEFAULT_TABLE,
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
    this.table = table;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.createCollection();
    this.initialized = true;
  }

  async upsert(input: UpsertInput): Promise<void> {
    await this.initialize();
    assertAlignedUpsert(input, this.dimension);

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      for (let i = 0; i < input.ids.length; i += 1) {
        const metadata = input.metadatas[i];
        await client.query(
          `
            INSERT INTO ${this.table} (id, source, page, char_start, document, embedding)
            VALUES ($1, $2, $3, $4, $5, $6::vector)
            ON CONFLICT (id)
            DO UPDATE SET
              source = EXCLUDED.source,
              page = EXCLUDED.page,
              char_start = EXCLUDED.char_start,
              document = EXCLUDED.document,
              embedding = EXCLUDED.embedding
          `,
          [
            input.ids[i],
            metadata.source,
            metadata.page,
            metadata.char_start ?? null,
            input.documents[i],
            toVectorLiteral(input.vectors[i]),
          ],
        );
      }

      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw new IndexWriteError(`Upsert into ${this.table} failed: ${describeError(error)}`, [...input.ids], {
        cause: error,
      });
    } finally {
      client.release();
    }
  }

  async query(vector: number[], k: number): Promise<VectorQueryHit[]> {
    await this.initialize();
    if (k <= 0) {
      return [];
    }

    // Squared L2, the same metric as the in-memory store.
    const result = await this.pool.query<PgHitRow>(
      `
        SELECT id, source, page, char_start, document,
               POWER(embedding <-> $1::vector, 2) AS distance
        FROM ${this.table}
        ORDER BY embedding <-> $1::vector
        LIMIT $2
      `,
      [toVectorLiteral(vector), Math.floor(k)],
    );

    return result.rows.map((row) => ({
      id: row.id,
      document: row.document,
      metadata: toMetadata(row),
      distance: Number(row.distance),
    }));
  }

  async getAll(): Promise<IndexEntry[]> {
    await this.initialize();
    const result = await this.pool.query<PgFullRow>(
      `
        SELECT id, source, page, char_start, document, embedding::text AS embedding
        FROM ${this.table}
        ORDER BY source ASC, page ASC, char_start ASC
      `,
    );

    return result.rows.map((row) => ({
      id: row.id,
      document: row.document,
      vector: parseVectorLiteral(row.embedding),
      metadata: toMetadata(row),
    }));
  }

  async count(): Promise<number> {
    await this.initialize();
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM ${this.table}`,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async deleteBySource(source: string, keep?: ReadonlySet<string>): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(
      `DELETE FROM ${this.table} WHERE source = $1 AND NOT (id = ANY($2::text[]))`,
      [source, [...(keep ?? [])]],
    );
    return result.rowCount ?? 0;
  }

  async reset(): Promise<{ cleared_entries: number }> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const counted = await client.query<{ count: string }>(
        `SELECT COUNT(*)::text AS count FROM ${this.table}`,
      );
      await client.query(`DROP TABLE IF EXISTS ${this.table}`);
      await this.createCollection(client);
      await client.query("COMMIT");
      return { cleared_entries: Number(counted.rows[0]?.count ?? 0) };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  private async createCollection(executor: Queryable = this.pool): Promise<void> {
    await executor.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        page INTEGER NOT NULL,
        char_start INTEGER,
        document TEXT NOT NULL,
        embedding VECTOR(${this.dimension}) NOT NULL
      )
    `);
    await executor.query(
      `CREATE INDEX IF NOT EXISTS idx_${this.table}_source ON ${this.table}(source)`,
    );
  }
}

function toMetadata(row: PgEntryRow) {
  return row.char_start === null
    ? { source: row.source, page: row.page }
    : { source: row.source, page: row.page, char_start: row.char_start };
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}

function parseVectorLiteral(literal: string): number[] {
  const body = literal.trim().replace(/^\[/, "").replace(/\]$/, "");
  if (!body) {
    return [];
  }
  return body.split(",").map((value) => Number(value));
}
