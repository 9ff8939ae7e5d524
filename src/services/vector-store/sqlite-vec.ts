/**
 * SqliteVecStore - local vector storage on sqlite-vec
 *
 * One vec0 virtual table per collection (vectors keyed by point id) plus a
 * shared vector_points table holding each point's chunk metadata.
 * Similarity is vec_distance_cosine(); score = 1 - distance.
 *
 * @module services/vector-store/sqlite-vec
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as sqliteVec from 'sqlite-vec';
import type { ChunkMetadata } from '../../models/chunk.js';
import { ChunkMetadataSchema, StoreError, assertVector } from './types.js';
import type { StoreErrorCode, VectorMatch, VectorPoint, VectorStore } from './types.js';

const CREATE_COLLECTIONS_TABLE = `
CREATE TABLE IF NOT EXISTS vector_collections (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  dimension INTEGER NOT NULL CHECK (dimension > 0),
  created_at TEXT NOT NULL
)
`;

const CREATE_POINTS_TABLE = `
CREATE TABLE IF NOT EXISTS vector_points (
  collection_id INTEGER NOT NULL REFERENCES vector_collections(id),
  point_id TEXT NOT NULL,
  file_path TEXT NOT NULL,
  payload TEXT NOT NULL,
  PRIMARY KEY (collection_id, point_id)
)
`;

const CREATE_POINTS_FILE_INDEX =
  'CREATE INDEX IF NOT EXISTS idx_vector_points_file ON vector_points(collection_id, file_path)';

interface CollectionRow {
  id: number;
  name: string;
  dimension: number;
}

interface MatchRow {
  point_id: string;
  payload: string;
  distance: number;
}

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

function vecTable(collection: CollectionRow): string {
  return `vec_c${collection.id}`;
}

function isBusy(error: unknown): boolean {
  return error instanceof Error && /SQLITE_BUSY|database is locked/i.test(error.message);
}

/**
 * Whether the sqlite-vec extension loads on this platform
 */
export function isSqliteVecAvailable(): boolean {
  const db = new Database(':memory:');
  try {
    sqliteVec.load(db);
    return true;
  } catch (error) {
    console.error(
      '[VectorStore] sqlite-vec unavailable:',
      error instanceof Error ? error.message : String(error)
    );
    return false;
  } finally {
    db.close();
  }
}

export class SqliteVecStore implements VectorStore {
  readonly kind = 'sqlite-vec';
  private readonly db: Database.Database;
  private closed = false;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * @throws StoreError COLLECTION_FAILED when the file or the extension cannot be opened
   */
  static open(dbPath: string): SqliteVecStore {
    let db: Database.Database | undefined;
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      db = new Database(dbPath);
      sqliteVec.load(db);
      db.pragma('journal_mode = WAL');
      db.pragma('busy_timeout = 5000');
      db.pragma('foreign_keys = ON');
      db.exec(CREATE_COLLECTIONS_TABLE);
      db.exec(CREATE_POINTS_TABLE);
      db.exec(CREATE_POINTS_FILE_INDEX);
    } catch (error) {
      db?.close();
      throw new StoreError(
        `Failed to open sqlite-vec store at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        'COLLECTION_FAILED',
        false,
        { dbPath }
      );
    }
    return new SqliteVecStore(db);
  }

  static inMemory(): SqliteVecStore {
    return SqliteVecStore.open(':memory:');
  }

  private getCollection(name: string): CollectionRow | undefined {
    return this.db
      .prepare<[string], CollectionRow>('SELECT id, name, dimension FROM vector_collections WHERE name = ?')
      .get(name);
  }

  private requireCollection(name: string, code: StoreErrorCode): CollectionRow {
    const collection = this.getCollection(name);
    if (!collection) {
      throw new StoreError(`Collection "${name}" does not exist`, code, false, { collection: name });
    }
    return collection;
  }

  private wrap<T>(code: StoreErrorCode, context: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(
        `${context}: ${error instanceof Error ? error.message : String(error)}`,
        code,
        isBusy(error)
      );
    }
  }

  async ensureCollection(collection: string, dimension: number): Promise<void> {
    this.wrap('COLLECTION_FAILED', `Failed to create collection "${collection}"`, () => {
      const existing = this.getCollection(collection);
      if (existing) {
        if (existing.dimension !== dimension) {
          throw new StoreError(
            `Collection "${collection}" has dimension ${existing.dimension}, requested ${dimension}`,
            'COLLECTION_FAILED',
            false,
            { collection, existing: existing.dimension, requested: dimension }
          );
        }
        return;
      }

      this.db.transaction(() => {
        const result = this.db
          .prepare('INSERT INTO vector_collections (name, dimension, created_at) VALUES (?, ?, ?)')
          .run(collection, dimension, new Date().toISOString());
        const row: CollectionRow = { id: Number(result.lastInsertRowid), name: collection, dimension };
        this.db.exec(
          `CREATE VIRTUAL TABLE ${vecTable(row)} USING vec0(point_id TEXT PRIMARY KEY, embedding float[${dimension}])`
        );
      })();
    });
  }

  async upsert(collection: string, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    this.wrap('UPSERT_FAILED', `Failed to upsert ${points.length} point(s) into "${collection}"`, () => {
      const coll = this.requireCollection(collection, 'UPSERT_FAILED');
      for (const point of points) {
        assertVector(point.vector, coll.dimension, `point ${point.id}`);
      }

      const table = vecTable(coll);
      const deleteVec = this.db.prepare(`DELETE FROM ${table} WHERE point_id = ?`);
      const insertVec = this.db.prepare(`INSERT INTO ${table} (point_id, embedding) VALUES (?, ?)`);
      const upsertMeta = this.db.prepare(`
        INSERT INTO vector_points (collection_id, point_id, file_path, payload)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(collection_id, point_id) DO UPDATE SET
          file_path = excluded.file_path,
          payload = excluded.payload
      `);

      this.db.transaction(() => {
        for (const point of points) {
          deleteVec.run(point.id);
          insertVec.run(point.id, toBlob(point.vector));
          upsertMeta.run(coll.id, point.id, point.metadata.file_path, JSON.stringify(point.metadata));
        }
      })();
    });
  }

  async query(collection: string, vector: Float32Array, k: number): Promise<VectorMatch[]> {
    return this.wrap('QUERY_FAILED', `Query on "${collection}" failed`, () => {
      const coll = this.requireCollection(collection, 'QUERY_FAILED');
      assertVector(vector, coll.dimension, 'query');
      if (k <= 0) return [];

      const rows = this.db
        .prepare<[Buffer, number, number], MatchRow>(
          `SELECT p.point_id, p.payload, vec_distance_cosine(v.embedding, ?) AS distance
           FROM ${vecTable(coll)} v
           JOIN vector_points p ON p.collection_id = ? AND p.point_id = v.point_id
           ORDER BY distance ASC, p.point_id ASC
           LIMIT ?`
        )
        .all(toBlob(vector), coll.id, k);

      return rows.map((row) => ({
        id: row.point_id,
        score: 1 - row.distance,
        metadata: this.parsePayload(row),
      }));
    });
  }

  private parsePayload(row: MatchRow): ChunkMetadata {
    const parsed = ChunkMetadataSchema.safeParse(JSON.parse(row.payload));
    if (!parsed.success) {
      throw new StoreError(`Stored metadata for point ${row.point_id} is invalid`, 'QUERY_FAILED');
    }
    return parsed.data;
  }

  async deleteByFile(collection: string, filePath: string): Promise<void> {
    this.wrap('DELETE_FAILED', `Failed to delete points of ${filePath} from "${collection}"`, () => {
      const coll = this.getCollection(collection);
      if (!coll) return;

      const ids = this.db
        .prepare<[number, string], { point_id: string }>(
          'SELECT point_id FROM vector_points WHERE collection_id = ? AND file_path = ?'
        )
        .all(coll.id, filePath);
      if (ids.length === 0) return;

      const deleteVec = this.db.prepare(`DELETE FROM ${vecTable(coll)} WHERE point_id = ?`);
      this.db.transaction(() => {
        for (const { point_id } of ids) deleteVec.run(point_id);
        this.db
          .prepare('DELETE FROM vector_points WHERE collection_id = ? AND file_path = ?')
          .run(coll.id, filePath);
      })();
    });
  }

  async count(collection: string): Promise<number> {
    return this.wrap('QUERY_FAILED', `Count on "${collection}" failed`, () => {
      const coll = this.getCollection(collection);
      if (!coll) return 0;
      const row = this.db
        .prepare<[number], { cnt: number }>('SELECT COUNT(*) AS cnt FROM vector_points WHERE collection_id = ?')
        .get(coll.id);
      return row?.cnt ?? 0;
    });
  }

  async healthCheck(): Promise<boolean> {
    if (this.closed) return false;
    try {
      this.db.prepare('SELECT vec_version() AS version').get();
      return true;
    } catch (error) {
      console.error(
        '[VectorStore] sqlite-vec health check failed:',
        error instanceof Error ? error.message : String(error)
      );
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }
}
