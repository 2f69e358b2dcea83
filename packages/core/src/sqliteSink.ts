/**
 * SQLite sink (better-sqlite3)
 *
 * The database is built at `<path>.partial` and renamed over `path` on
 * commit, so an aborted run never leaves a usable database behind.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import { GenerationError } from './errors.js';
import { TABLES, toRow } from './rows.js';
import { runLog } from './runLog.js';
import type { Sink } from './sink.js';
import type { EntityName, EntityRecordMap } from './types.js';

const SCHEMA_URL = new URL('../schema/schema.sql', import.meta.url);

export function loadSchema(): string {
  return readFileSync(SCHEMA_URL, 'utf-8');
}

export class SqliteSink implements Sink {
  readonly path: string;
  readonly partialPath: string;
  private db: Database.Database | null;

  constructor(path: string) {
    this.path = path;
    this.partialPath = `${path}.partial`;

    mkdirSync(dirname(path), { recursive: true });
    rmSync(this.partialPath, { force: true });

    this.db = new Database(this.partialPath);
    this.db.pragma('foreign_keys = ON');
    this.db.exec(loadSchema());
    runLog('sink', `Building ${this.partialPath}`);
  }

  insertBatch<K extends EntityName>(entity: K, records: readonly EntityRecordMap[K][]): void {
    const db = this.open();
    if (records.length === 0) return;

    const rows = records.map((record) => toRow(entity, record));
    const columns = Object.keys(rows[0]);
    const insert = db.prepare(
      `INSERT INTO ${TABLES[entity]} (${columns.join(', ')}) VALUES (${columns.map((c) => `@${c}`).join(', ')})`
    );

    const transaction = db.transaction(() => {
      for (const row of rows) {
        insert.run(row);
      }
    });

    transaction();
  }

  commit(): void {
    const db = this.open();
    db.close();
    this.db = null;
    renameSync(this.partialPath, this.path);
    runLog('sink', `Wrote ${this.path}`);
  }

  abort(): void {
    this.db?.close();
    this.db = null;
    if (existsSync(this.partialPath)) {
      rmSync(this.partialPath, { force: true });
    }
    runLog('sink', `Discarded ${this.partialPath}`);
  }

  private open(): Database.Database {
    if (!this.db) {
      throw new GenerationError(`SQLite sink for ${this.path} is already closed`);
    }
    return this.db;
  }
}
