/**
 * Vector Index with sqlite-vec
 *
 * Exact nearest-neighbour search over item embeddings by Euclidean (L2)
 * distance. Vectors are float32 BLOBs in an in-memory SQLite database and
 * sqlite-vec's `vec_distance_l2` ranks them; row `id` i belongs to items[i].
 *
 * On disk the index is two files saved and loaded as a pair:
 *   - vector file: the serialized SQLite database (index_info + vectors)
 *   - metadata file: JSON array of catalog items in row order
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { z } from 'zod';
import { logger } from '../config/index.js';
import { CatalogSchema, type CatalogItem } from '../catalog/catalog.js';
import { uniformDimensions } from '../embeddings/utils.js';
import type { EmbeddingVector } from '../embeddings/types.js';
import { DimensionMismatchError, IndexCorruptError, IndexStaleError } from '../errors.js';

const FORMAT_VERSION = '1';

const SCHEMA = `
  CREATE TABLE index_info (key TEXT PRIMARY KEY, value TEXT NOT NULL);
  CREATE TABLE vectors (id INTEGER PRIMARY KEY, embedding BLOB NOT NULL);
`;

// Ties fall back to row order so equal distances come out in insertion order
const SEARCH_SQL = `
  SELECT id, vec_distance_l2(embedding, ?) AS distance
  FROM vectors
  ORDER BY distance, id
  LIMIT ?
`;

const IndexInfoSchema = z.object({
  format_version: z.literal(FORMAT_VERSION),
  dimensions: z.coerce.number().int().nonnegative(),
  model: z.string(),
});

const InfoRowsSchema = z.array(z.object({ key: z.string(), value: z.string() }));
const CountRowSchema = z.object({ count: z.number().int() });
const RangeRowSchema = z.object({ low: z.number().int().nullable(), high: z.number().int().nullable() });

export interface IndexEntry {
  vector: EmbeddingVector;
  item: CatalogItem;
}

export interface Candidate {
  item: CatalogItem;
  /** Euclidean (L2) distance; lower is more similar */
  distance: number;
  /** Position in the search result, 0-based */
  rank: number;
}

export interface IndexLocation {
  indexPath: string;
  metadataPath: string;
}

export interface IndexExpectation {
  /** Dimensionality the active provider declares */
  dimensions: number;
  /**
   * When set, an index built with another model is rejected as stale, and an
   * index built with this model is trusted at its stored dimensionality.
   */
  model?: string;
}

interface SearchRow {
  id: number;
  distance: number;
}

interface IndexState {
  db: Database.Database;
  search: Database.Statement<[Buffer, number], SearchRow>;
  items: CatalogItem[];
  dimensions: number;
  model: string;
}

function openDatabase(image?: Buffer): Database.Database {
  const db = image ? new Database(image) : new Database(':memory:');
  sqliteVec.load(db);
  return db;
}

function toBlob(vector: ArrayLike<number>): Buffer {
  const data = Float32Array.from(vector);
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function createState(db: Database.Database, items: CatalogItem[], dimensions: number, model: string): IndexState {
  return {
    db,
    search: db.prepare<[Buffer, number], SearchRow>(SEARCH_SQL),
    items,
    dimensions,
    model,
  };
}

function buildState(entries: readonly IndexEntry[], dimensions: number, model: string): IndexState {
  const db = openDatabase();
  db.exec(SCHEMA);

  const insertInfo = db.prepare<[string, string]>('INSERT INTO index_info (key, value) VALUES (?, ?)');
  const insertVector = db.prepare<[number, Buffer]>('INSERT INTO vectors (id, embedding) VALUES (?, ?)');

  db.transaction(() => {
    insertInfo.run('format_version', FORMAT_VERSION);
    insertInfo.run('dimensions', String(dimensions));
    insertInfo.run('model', model);
    entries.forEach((entry, row) => insertVector.run(row, toBlob(entry.vector)));
  })();

  return createState(db, entries.map((entry) => entry.item), dimensions, model);
}

export class VectorIndex {
  private state: IndexState = buildState([], 0, 'unknown');

  static exists(location: IndexLocation): boolean {
    return existsSync(location.indexPath) && existsSync(location.metadataPath);
  }

  get size(): number {
    return this.state.items.length;
  }

  get dimensions(): number {
    return this.state.dimensions;
  }

  get model(): string {
    return this.state.model;
  }

  /**
   * Replace the index contents. Nothing is replaced when the vectors do not
   * share one dimensionality.
   */
  build(entries: readonly IndexEntry[], model = 'unknown'): void {
    const vectors = entries.map((entry) => entry.vector);
    const dimensions = uniformDimensions(vectors);

    if (dimensions === null) {
      const expected = vectors[0].length;
      const offender = vectors.find((vector) => vector.length !== expected);
      throw new DimensionMismatchError(expected, offender?.length ?? 0, 'build');
    }

    this.replace(buildState(entries, dimensions, model));

    logger.debug({ entries: entries.length, dimensions, model }, 'Vector index built');
  }

  /**
   * Up to `k` nearest items, closest first. Equal distances keep insertion
   * order so results are reproducible.
   */
  search(query: ArrayLike<number>, k: number): Candidate[] {
    const { search, items, dimensions } = this.state;
    const limit = Math.min(Math.floor(k), items.length);

    if (limit <= 0) {
      return [];
    }
    if (query.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, query.length, 'search');
    }

    return search.all(toBlob(query), limit).map(({ id, distance }, rank) => ({
      item: items[id],
      distance,
      rank,
    }));
  }

  async save(location: IndexLocation): Promise<void> {
    const { db, items, dimensions } = this.state;

    await writeAtomic(location.indexPath, db.serialize());
    await writeAtomic(location.metadataPath, JSON.stringify(items, null, 2));

    logger.info({
      indexPath: location.indexPath,
      metadataPath: location.metadataPath,
      entries: items.length,
      dimensions,
    }, 'Vector index saved');
  }

  /**
   * Replace the in-memory index with the persisted one. The current state is
   * kept when loading fails.
   */
  async load(location: IndexLocation, expected: IndexExpectation): Promise<void> {
    const [indexFile, metadataFile] = await Promise.all([
      readFile(location.indexPath),
      readFile(location.metadataPath, 'utf-8'),
    ]);

    const items = decodeMetadata(metadataFile, location.metadataPath);
    const db = openPersisted(indexFile, location.indexPath);

    try {
      const { dimensions, count, model } = inspectPersisted(db, location.indexPath);

      if (items.length !== count) {
        throw new IndexCorruptError(
          `Index holds ${count} vectors but metadata holds ${items.length} items`
        );
      }
      if (count > 0 && dimensions !== expected.dimensions) {
        if (expected.model === undefined || model !== expected.model) {
          throw new DimensionMismatchError(expected.dimensions, dimensions, 'load');
        }
        logger.warn({
          model,
          declared: expected.dimensions,
          stored: dimensions,
        }, 'Index was written by the active model at another dimensionality, keeping the stored one');
      }
      if (expected.model !== undefined && model !== expected.model) {
        throw new IndexStaleError(expected.model, model);
      }

      this.replace(createState(db, items, dimensions, model));
      logger.info({ entries: count, dimensions, model }, 'Vector index loaded');
    } catch (error) {
      db.close();
      throw error;
    }
  }

  private replace(next: IndexState): void {
    const previous = this.state;
    this.state = next;
    previous.db.close();
  }
}

function openPersisted(file: Buffer, filePath: string): Database.Database {
  try {
    return openDatabase(file);
  } catch (error) {
    throw new IndexCorruptError(`${filePath} is not a vector index file`, { cause: error });
  }
}

function inspectPersisted(db: Database.Database, filePath: string) {
  try {
    const infoRows = InfoRowsSchema.parse(db.prepare('SELECT key, value FROM index_info').all());
    const info = IndexInfoSchema.safeParse(Object.fromEntries(infoRows.map((row) => [row.key, row.value])));
    if (!info.success) {
      throw new IndexCorruptError(`${filePath} has unreadable index info: ${formatIssues(info.error)}`);
    }

    const { count } = CountRowSchema.parse(db.prepare('SELECT count(*) AS count FROM vectors').get());
    const range = RangeRowSchema.parse(db.prepare('SELECT min(id) AS low, max(id) AS high FROM vectors').get());
    if (count > 0 && (range.low !== 0 || range.high !== count - 1)) {
      throw new IndexCorruptError(`${filePath} rows are not numbered 0..${count - 1}`);
    }

    const malformed = CountRowSchema.parse(
      db.prepare('SELECT count(*) AS count FROM vectors WHERE length(embedding) != ?')
        .get(info.data.dimensions * Float32Array.BYTES_PER_ELEMENT)
    );
    if (malformed.count > 0) {
      throw new IndexCorruptError(
        `${filePath} holds ${malformed.count} vectors that are not ${info.data.dimensions} float32 values`
      );
    }

    return { dimensions: info.data.dimensions, count, model: info.data.model };
  } catch (error) {
    if (error instanceof IndexCorruptError) {
      throw error;
    }
    throw new IndexCorruptError(`${filePath} is not a vector index file`, { cause: error });
  }
}

function decodeMetadata(raw: string, filePath: string): CatalogItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IndexCorruptError(`${filePath} is not valid JSON`, { cause: error });
  }

  const result = CatalogSchema.safeParse(parsed);
  if (!result.success) {
    throw new IndexCorruptError(
      `${filePath} does not hold catalog items: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

async function writeAtomic(filePath: string, contents: string | Buffer): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, contents);
  await rename(tmpPath, filePath);
}
