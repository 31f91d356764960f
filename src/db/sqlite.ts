import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import type { DateTime } from 'luxon';
import { parseCollectionDate } from '../schedule/dates.js';
import { STORAGE_COLUMN_KEYS } from '../types.js';
import type { CollectionRecord, StorageColumnKey } from '../types.js';

const PLACEHOLDER_DATES = new Set(['unknown', 'n/a', '']);

export type CollectionColumn = `${StorageColumnKey}_${'last' | 'next'}_collection`;

export type CollectionsDbRow = { address: string; site_last_checked: string } & Record<CollectionColumn, string | null>;

export interface CollectionsDatabaseOptions {
  zone: string;
}

function lastColumn(key: StorageColumnKey): CollectionColumn {
  return `${key}_last_collection`;
}

function nextColumn(key: StorageColumnKey): CollectionColumn {
  return `${key}_next_collection`;
}

export class CollectionsDatabase {
  private sql!: SqlJsStatic;
  private db!: Database;
  private readonly zone: string;

  constructor(
    private readonly filePath: string,
    options: CollectionsDatabaseOptions,
  ) {
    this.zone = options.zone;
  }

  async init(): Promise<void> {
    const wasmPath = join(process.cwd(), 'node_modules', 'sql.js', 'dist', 'sql-wasm.wasm');
    this.sql = await initSqlJs({
      locateFile: () => wasmPath,
    });

    let existing: Uint8Array | undefined;
    try {
      const buffer = await readFile(this.filePath);
      existing = new Uint8Array(buffer);
    } catch {
      existing = undefined;
    }

    this.db = existing ? new this.sql.Database(existing) : new this.sql.Database();
    this.ensureSchema();
  }

  ensureSchema(): void {
    const binColumns = STORAGE_COLUMN_KEYS.flatMap((key) => [`${lastColumn(key)} TEXT`, `${nextColumn(key)} TEXT`]);
    this.db.run(`
      CREATE TABLE IF NOT EXISTS collections (
        address TEXT PRIMARY KEY,
        ${binColumns.join(',\n        ')},
        site_last_checked TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_collections_site_last_checked ON collections(site_last_checked);
    `);
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const bytes = this.db.export();
    await writeFile(this.filePath, Buffer.from(bytes));
  }

  close(): void {
    this.db.close();
  }

  /**
   * Replaces the stored schedule for an address. Every bin column is written,
   * so bin types missing from `records` are cleared. Returns the number of
   * recognized bin types stored.
   */
  upsertCollections(address: string, records: CollectionRecord[], checkedAt: DateTime): number {
    const values = new Map<CollectionColumn, string | null>();

    for (const record of records) {
      if (!record.collection_type || !record.storage_key) {
        continue;
      }
      values.set(lastColumn(record.storage_key), this.toTimestamp(record.last_collection));
      values.set(nextColumn(record.storage_key), this.toTimestamp(record.next_collection));
    }

    const columns: string[] = ['address', 'site_last_checked'];
    const params: SqlValue[] = [address, checkedAt.toISO() ?? new Date(checkedAt.toMillis()).toISOString()];
    const updates: string[] = ['site_last_checked = excluded.site_last_checked'];

    for (const key of STORAGE_COLUMN_KEYS) {
      for (const column of [lastColumn(key), nextColumn(key)]) {
        columns.push(column);
        params.push(values.get(column) ?? null);
        updates.push(`${column} = excluded.${column}`);
      }
    }

    this.db.run(
      `
      INSERT INTO collections (${columns.join(', ')})
      VALUES (${columns.map(() => '?').join(', ')})
      ON CONFLICT (address) DO UPDATE SET
        ${updates.join(',\n        ')}
      `,
      params,
    );

    return values.size / 2;
  }

  getCollections(address: string): CollectionsDbRow | null {
    const stmt = this.db.prepare('SELECT * FROM collections WHERE address = ?', [address]);
    try {
      if (!stmt.step()) {
        return null;
      }
      return stmt.getAsObject() as CollectionsDbRow;
    } finally {
      stmt.free();
    }
  }

  private toTimestamp(text: string | undefined): string | null {
    if (!text || PLACEHOLDER_DATES.has(text.trim().toLowerCase())) {
      return null;
    }
    return parseCollectionDate(text, this.zone)?.toISO() ?? null;
  }
}
