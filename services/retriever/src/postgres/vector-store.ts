/**
 * PostgreSQL Vector Store
 * Cosine-similarity search over a pgvector column
 *
 * Schema bootstrap (extension, table, ivfflat index) is managed outside this
 * service; the table needs content, metadata (jsonb), embedding (vector) and
 * source columns.
 */

import pg from 'pg';
import type { Pool } from 'pg';
import type { DatabaseConfig } from '../config/retrieval-config.js';
import type { RetrieverLogger } from '../utils/logger.js';

/** Row returned by a similarity search */
export interface VectorSearchRow {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  source: string;
  /** 1 - cosine distance */
  similarity: number;
}

/**
 * Nearest-neighbour query contract used by the local search adapter
 */
export interface VectorStore {
  similaritySearch(embedding: readonly number[], limit: number): Promise<VectorSearchRow[]>;
}

/**
 * Query surface of a pg Pool
 */
export interface SqlQueryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PgVectorStoreOptions {
  table: string;
  logger: RetrieverLogger;
}

/**
 * Serialize an embedding as a pgvector literal: [0.1,0.2,...]
 */
export function toVectorLiteral(embedding: readonly number[]): string {
  return `[${embedding.join(',')}]`;
}

export class PgVectorStore implements VectorStore {
  private readonly sql: string;

  constructor(
    private readonly db: SqlQueryable,
    private readonly options: PgVectorStoreOptions
  ) {
    // Table name is validated as an identifier by the config loader
    this.sql = `
      SELECT id::text AS id, content, metadata, source,
             1 - (embedding <=> $1::vector) AS similarity
      FROM ${options.table}
      ORDER BY embedding <=> $1::vector
      LIMIT $2
    `;
  }

  async similaritySearch(embedding: readonly number[], limit: number): Promise<VectorSearchRow[]> {
    const result = await this.db.query(this.sql, [toVectorLiteral(embedding), limit]);

    const rows: VectorSearchRow[] = [];
    for (const raw of result.rows) {
      const row = toSearchRow(raw);
      if (row) {
        rows.push(row);
      } else {
        this.options.logger.warn('Skipping malformed row from vector search', { table: this.options.table });
      }
    }
    return rows;
  }
}

function toSearchRow(raw: unknown): VectorSearchRow | null {
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }

  const row = raw as Record<string, unknown>;
  const similarity = typeof row['similarity'] === 'string' ? parseFloat(row['similarity']) : row['similarity'];

  if (typeof row['content'] !== 'string' || typeof similarity !== 'number' || Number.isNaN(similarity)) {
    return null;
  }

  const metadata = row['metadata'];
  return {
    id: typeof row['id'] === 'string' ? row['id'] : '',
    content: row['content'],
    metadata: typeof metadata === 'object' && metadata !== null && !Array.isArray(metadata)
      ? { ...metadata }
      : {},
    source: typeof row['source'] === 'string' ? row['source'] : 'unknown',
    similarity,
  };
}

/**
 * Create the connection pool for the document store
 */
export function createPgPool(config: DatabaseConfig, queryTimeoutMs: number): Pool {
  return new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: 10,
    connectionTimeoutMillis: queryTimeoutMs,
    query_timeout: queryTimeoutMs,
  });
}
