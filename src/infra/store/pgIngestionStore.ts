import { Pool, PoolClient } from "pg";
import {
  IngestionSession,
  IngestionStore,
  ListChunksInput,
} from "../../domain/ingestionStore.js";
import { UniqueViolationError } from "../../domain/errors.js";
import {
  ChunkMetadata,
  DatabaseStatistics,
  EmbeddedChunk,
  EmbeddingCheck,
  StoredChunk,
} from "../../domain/types.js";
import { isUniqueViolation, toVectorLiteral } from "../db/postgres.js";

interface PgStoredChunkRow {
  chunk_id: number;
  source_id: number;
  content: string;
  embedding: string;
  metadata: ChunkMetadata;
  chunk_created_at: Date;
  copyright_holder_id: number;
  url: string;
  source_created_at: Date;
  copyright_holder: string;
}

export class PgIngestionStore implements IngestionStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS copyright_holders (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS sources (
        id SERIAL PRIMARY KEY,
        copyright_holder_id INTEGER NOT NULL
          REFERENCES copyright_holders(id) ON DELETE CASCADE,
        url TEXT NOT NULL UNIQUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chunks (
        id SERIAL PRIMARY KEY,
        source_id INTEGER NOT NULL REFERENCES sources(id) ON DELETE CASCADE,
        content TEXT NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_sources_copyright_holder_id ON sources(copyright_holder_id)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chunks_source_id ON chunks(source_id)`,
    );

    this.initialized = true;
  }

  async openSession(): Promise<IngestionSession> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
    } catch (error) {
      client.release();
      throw error;
    }
    return new PgIngestionSession(client);
  }

  async listChunks(input?: ListChunksInput): Promise<StoredChunk[]> {
    await this.initialize();

    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : 100000;
    const result = await this.pool.query<PgStoredChunkRow>(
      `
        SELECT
          c.id AS chunk_id,
          c.source_id,
          c.content,
          c.embedding::text AS embedding,
          c.metadata,
          c.created_at AS chunk_created_at,
          s.copyright_holder_id,
          s.url,
          s.created_at AS source_created_at,
          h.name AS copyright_holder
        FROM chunks c
        JOIN sources s ON s.id = c.source_id
        JOIN copyright_holders h ON h.id = s.copyright_holder_id
        WHERE ($1::text IS NULL OR s.url = $1::text)
        ORDER BY c.id ASC
        LIMIT $2
      `,
      [input?.sourceUrl ?? null, limit],
    );

    return result.rows.map((row) => ({
      chunk: {
        id: row.chunk_id,
        sourceId: row.source_id,
        content: row.content,
        embedding: parseVectorLiteral(row.embedding),
        metadata: row.metadata,
        createdAt: row.chunk_created_at.toISOString(),
      },
      source: {
        id: row.source_id,
        copyrightHolderId: row.copyright_holder_id,
        url: row.url,
        createdAt: row.source_created_at.toISOString(),
      },
      copyrightHolder: row.copyright_holder,
    }));
  }

  async getStatistics(): Promise<DatabaseStatistics> {
    await this.initialize();
    const result = await this.pool.query<{
      copyright_holders: string;
      sources: string;
      chunks: string;
    }>(`
      SELECT
        (SELECT COUNT(*) FROM copyright_holders)::text AS copyright_holders,
        (SELECT COUNT(*) FROM sources)::text AS sources,
        (SELECT COUNT(*) FROM chunks)::text AS chunks
    `);

    const row = result.rows[0];
    return {
      copyright_holders: Number(row?.copyright_holders ?? 0),
      sources: Number(row?.sources ?? 0),
      chunks: Number(row?.chunks ?? 0),
    };
  }

  async checkEmbeddings(): Promise<EmbeddingCheck> {
    await this.initialize();
    const result = await this.pool.query<{ content: string; dimension: number }>(`
      SELECT content, vector_dims(embedding) AS dimension
      FROM chunks
      WHERE embedding IS NOT NULL
      ORDER BY id ASC
      LIMIT 1
    `);

    const row = result.rows[0];
    if (!row) {
      return { hasEmbeddings: false, embeddingDimension: null, sampleText: null };
    }
    return {
      hasEmbeddings: true,
      embeddingDimension: Number(row.dimension),
      sampleText: `${row.content.slice(0, 100)}...`,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export type SessionClient = Pick<PoolClient, "query" | "release">;

export class PgIngestionSession implements IngestionSession {
  private savepointCounter = 0;

  private released = false;

  constructor(private readonly client: SessionClient) {}

  async findCopyrightHolderId(name: string): Promise<number | null> {
    const result = await this.client.query<{ id: number }>(
      `SELECT id FROM copyright_holders WHERE name = $1`,
      [name],
    );
    return result.rows[0]?.id ?? null;
  }

  async insertCopyrightHolder(name: string): Promise<number> {
    return this.insertReturningId(
      `INSERT INTO copyright_holders (name) VALUES ($1) RETURNING id`,
      [name],
      "copyright_holders_name_key",
    );
  }

  async findSourceId(url: string): Promise<number | null> {
    const result = await this.client.query<{ id: number }>(
      `SELECT id FROM sources WHERE url = $1`,
      [url],
    );
    return result.rows[0]?.id ?? null;
  }

  async insertSource(copyrightHolderId: number, url: string): Promise<number> {
    return this.insertReturningId(
      `INSERT INTO sources (copyright_holder_id, url) VALUES ($1, $2) RETURNING id`,
      [copyrightHolderId, url],
      "sources_url_key",
    );
  }

  async insertChunks(sourceId: number, chunks: EmbeddedChunk[]): Promise<void> {
    for (const chunk of chunks) {
      await this.client.query(
        `
          INSERT INTO chunks (source_id, content, embedding, metadata)
          VALUES ($1, $2, $3::vector, $4::jsonb)
        `,
        [
          sourceId,
          chunk.content,
          toVectorLiteral(chunk.embedding),
          JSON.stringify(chunk.metadata),
        ],
      );
    }
  }

  async savepoint(): Promise<string> {
    this.savepointCounter += 1;
    const name = `sp_${this.savepointCounter}`;
    await this.client.query(`SAVEPOINT ${name}`);
    return name;
  }

  async rollbackToSavepoint(name: string): Promise<void> {
    await this.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
    await this.client.query(`RELEASE SAVEPOINT ${name}`);
  }

  async releaseSavepoint(name: string): Promise<void> {
    await this.client.query(`RELEASE SAVEPOINT ${name}`);
  }

  async commit(): Promise<void> {
    await this.client.query("COMMIT");
    await this.client.query("BEGIN");
  }

  async rollback(): Promise<void> {
    await this.client.query("ROLLBACK");
    await this.client.query("BEGIN");
  }

  async close(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    // A client whose rollback failed is handed back with the error, so the pool drops it.
    let failure: Error | undefined;
    try {
      await this.client.query("ROLLBACK");
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error));
      throw error;
    } finally {
      this.client.release(failure);
    }
  }

  private async insertReturningId(
    sql: string,
    params: unknown[],
    constraint: string,
  ): Promise<number> {
    try {
      const result = await this.client.query<{ id: number }>(sql, params);
      return result.rows[0].id;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError(error.constraint ?? constraint, {
          cause: error,
        });
      }
      throw error;
    }
  }
}

function parseVectorLiteral(literal: string): number[] {
  const body = literal.trim().replace(/^\[/, "").replace(/\]$/, "");
  if (!body) {
    return [];
  }
  return body.split(",").map((value) => Number(value));
}
