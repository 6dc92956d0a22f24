import crypto from "node:crypto";
import { existsSync } from "node:fs";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import initSqlJs, {
  type BindParams,
  type Database,
  type SqlJsStatic,
} from "sql.js";
import { z } from "zod";
import { DEFAULT_COLLECTION_NAME, type StorageConfig } from "../config";
import type {
  IChunkMetadata,
  IVectorIndex,
  IVectorIndexWriter,
  IVectorRecord,
  IVectorSearchResult,
} from "../interfaces";

export const INDEX_FILE_NAME = "index.sqlite3";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS collections (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    dimension INTEGER
  );

  CREATE TABLE IF NOT EXISTS embeddings (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    collection_id TEXT NOT NULL REFERENCES collections(id) ON DELETE CASCADE,
    document TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    embedding TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS embeddings_collection_idx
  ON embeddings(collection_id);
`;

const CollectionRowSchema = z.object({
  id: z.string(),
  dimension: z.number().nullable(),
});

const CountRowSchema = z.object({ count: z.number() });

const EmbeddingRowSchema = z.object({
  id: z.string(),
  document: z.string(),
  metadata: z.string(),
  embedding: z.string(),
});

const ChunkMetadataSchema = z.object({
  source: z.string(),
  page: z.number().int().optional(),
  chunkIndex: z.number().int(),
  startPos: z.number().int(),
  endPos: z.number().int(),
});

let sqlJs: Promise<SqlJsStatic> | undefined;

/** Loads the sql.js WASM module once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

export function parseVectorLiteral(literal: string): number[] {
  const inner = literal.trim().replace(/^\[/, "").replace(/\]$/, "");
  if (inner.length === 0) return [];
  return inner.split(",").map((v) => Number.parseFloat(v));
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function parseMetadata(raw: string): IChunkMetadata {
  return ChunkMetadataSchema.parse(JSON.parse(raw));
}

function queryAll<T>(
  db: Database,
  sql: string,
  params: BindParams,
  schema: z.ZodType<T>,
): T[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: T[] = [];
    while (stmt.step()) {
      rows.push(schema.parse(stmt.getAsObject()));
    }
    return rows;
  } finally {
    stmt.free();
  }
}

function queryOne<T>(
  db: Database,
  sql: string,
  params: BindParams,
  schema: z.ZodType<T>,
): T | undefined {
  return queryAll(db, sql, params, schema)[0];
}

/** sql.js keeps the database in memory; the file is replaced as a whole. */
async function persist(db: Database, filePath: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, db.export());
  await rename(tmpPath, filePath);
}

class SqliteIndexWriter implements IVectorIndexWriter {
  private db: Database;
  private filePath: string;
  private collectionId: string;
  private closed = false;

  constructor(db: Database, filePath: string, collectionId: string) {
    this.db = db;
    this.filePath = filePath;
    this.collectionId = collectionId;
  }

  /** Inserts the records in one transaction and writes the file before returning. */
  async add(records: IVectorRecord[]): Promise<void> {
    if (records.length === 0) return;

    this.db.run("BEGIN TRANSACTION");
    try {
      const insert = this.db.prepare(
        `INSERT INTO embeddings (id, collection_id, document, metadata, embedding)
         VALUES (?, ?, ?, ?, ?)`,
      );
      try {
        for (const record of records) {
          insert.run([
            record.id,
            this.collectionId,
            record.content,
            JSON.stringify(record.metadata),
            toVectorLiteral(record.embedding),
          ]);
        }
      } finally {
        insert.free();
      }
      this.db.run("COMMIT");
    } catch (error) {
      this.db.run("ROLLBACK");
      throw error;
    }

    await persist(this.db, this.filePath);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}

/**
 * Vector index persisted as a directory holding one SQLite file. The
 * `collections` table records a single dimensionality per collection.
 */
export class SqliteVectorIndex implements IVectorIndex {
  readonly location: string;
  private collectionName: string;

  constructor(config: StorageConfig) {
    this.location = path.resolve(config.directory);
    this.collectionName = config.collectionName ?? DEFAULT_COLLECTION_NAME;
  }

  get databasePath(): string {
    return path.join(this.location, INDEX_FILE_NAME);
  }

  async exists(): Promise<boolean> {
    return existsSync(this.location);
  }

  async readDimension(): Promise<number | null> {
    const db = await this.load();
    try {
      const row = queryOne(
        db,
        "SELECT id, dimension FROM collections WHERE name = ?",
        [this.collectionName],
        CollectionRowSchema,
      );
      return row?.dimension ?? null;
    } finally {
      db.close();
    }
  }

  async open(dimension: number): Promise<IVectorIndexWriter> {
    await mkdir(this.location, { recursive: true });
    const db = existsSync(this.databasePath)
      ? await this.load()
      : new (await loadSqlJs()).Database();
    try {
      db.run("PRAGMA foreign_keys = ON");
      db.exec(SCHEMA);

      db.run(
        `INSERT INTO collections (id, name, dimension) VALUES (?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET dimension = COALESCE(collections.dimension, excluded.dimension)`,
        [crypto.randomUUID(), this.collectionName, dimension],
      );

      const row = queryOne(
        db,
        "SELECT id, dimension FROM collections WHERE name = ?",
        [this.collectionName],
        CollectionRowSchema,
      );
      if (!row) {
        throw new Error(`Collection ${this.collectionName} was not created`);
      }

      await persist(db, this.databasePath);
      return new SqliteIndexWriter(db, this.databasePath, row.id);
    } catch (error) {
      db.close();
      throw error;
    }
  }

  async destroy(): Promise<void> {
    await rm(this.location, { recursive: true, force: true });
  }

  async count(): Promise<number> {
    return this.withReader((db) => {
      const row = queryOne(
        db,
        `SELECT COUNT(*) AS count FROM embeddings e
         JOIN collections c ON c.id = e.collection_id
         WHERE c.name = ?`,
        [this.collectionName],
        CountRowSchema,
      );
      return row?.count ?? 0;
    }, 0);
  }

  async search(
    embedding: number[],
    limit = 5,
    threshold = 0,
  ): Promise<IVectorSearchResult[]> {
    return this.withReader((db) => {
      const rows = queryAll(
        db,
        `SELECT e.id, e.document, e.metadata, e.embedding FROM embeddings e
         JOIN collections c ON c.id = e.collection_id
         WHERE c.name = ?
         ORDER BY e.seq`,
        [this.collectionName],
        EmbeddingRowSchema,
      );

      return rows
        .map((row) => {
          const vector = parseVectorLiteral(row.embedding);
          return {
            id: row.id,
            content: row.document,
            embedding: vector,
            metadata: parseMetadata(row.metadata),
            similarity: cosineSimilarity(embedding, vector),
          };
        })
        .filter((r) => r.similarity >= threshold)
        .sort((a, b) => b.similarity - a.similarity)
        .slice(0, limit);
    }, []);
  }

  /** Throws when the file is missing or is not a SQLite database. */
  private async load(): Promise<Database> {
    const SQL = await loadSqlJs();
    const db = new SQL.Database(await readFile(this.databasePath));
    try {
      // sql.js opens any bytes; the header is only checked on first read.
      db.exec("SELECT count(*) FROM sqlite_master");
      return db;
    } catch (error) {
      db.close();
      throw error;
    }
  }

  private async withReader<T>(fn: (db: Database) => T, empty: T): Promise<T> {
    if (!existsSync(this.databasePath)) return empty;
    const db = await this.load();
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }
}
