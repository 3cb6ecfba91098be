import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { SuggestionFile, SuggestionRecord } from '../contracts';
import { SuggestionFileSchema, SuggestionRecordSchema } from '../contracts';
import { runMigrations } from './migrations';

/**
 * Durable backends for the suggestion cache.
 *
 * - JsonFileSuggestionStore: default; a pretty-printed JSON document a human can inspect and edit
 * - SqliteSuggestionStore: better-sqlite3 table for very large trees
 *
 * Stores are not safe for concurrent writers on their own; SuggestionCache serializes calls.
 */
export interface SuggestionStore {
  readonly location: string;
  readAll(): Promise<SuggestionRecord[]>;
  put(record: SuggestionRecord): Promise<void>;
  clear(): Promise<void>;
  close?(): void;
}

export class JsonFileSuggestionStore implements SuggestionStore {
  private entries = new Map<string, SuggestionRecord>();

  constructor(readonly location: string) {}

  async readAll(): Promise<SuggestionRecord[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.location, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.entries.clear();
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      console.warn(`[SuggestionStore] ${this.location} is not valid JSON, starting with an empty cache:`, error);
      this.entries.clear();
      return [];
    }

    const result = SuggestionFileSchema.safeParse(parsed);
    if (!result.success) {
      console.warn(
        `[SuggestionStore] ${this.location} does not match the cache schema, starting with an empty cache: ${result.error.message}`
      );
      this.entries.clear();
      return [];
    }

    this.entries = new Map(Object.entries(result.data.entries));
    return [...this.entries.values()];
  }

  async put(record: SuggestionRecord): Promise<void> {
    this.entries.set(record.signature, record);
    await this.write();
  }

  async clear(): Promise<void> {
    this.entries.clear();
    await this.write();
  }

  private async write(): Promise<void> {
    const document: SuggestionFile = {
      version: 1,
      entries: Object.fromEntries(this.entries),
    };
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    const tmpPath = `${this.location}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmpPath, JSON.stringify(document, null, 2), 'utf-8');
    await fs.promises.rename(tmpPath, this.location);
  }
}

type SuggestionRow = {
  signature: string;
  resolved_path: string;
  source_file_path: string;
  timestamp: number;
  context_snapshot: string;
};

export class SqliteSuggestionStore implements SuggestionStore {
  private db: InstanceType<typeof Database>;

  constructor(readonly location: string) {
    if (location !== ':memory:') {
      fs.mkdirSync(path.dirname(location), { recursive: true });
    }
    this.db = new Database(location);
    this.db.pragma('journal_mode = WAL');
    runMigrations(this.db);
  }

  async readAll(): Promise<SuggestionRecord[]> {
    const rows = this.db
      .prepare<[], SuggestionRow>(`
        SELECT signature, resolved_path, source_file_path, timestamp, context_snapshot
        FROM suggestions
      `)
      .all();

    const records: SuggestionRecord[] = [];
    for (const row of rows) {
      const record = SuggestionRecordSchema.safeParse({
        ...row,
        context_snapshot: parseSnapshot(row.context_snapshot),
      });
      if (record.success) {
        records.push(record.data);
      } else {
        console.warn(`[SuggestionStore] Skipping malformed row ${row.signature}: ${record.error.message}`);
      }
    }
    return records;
  }

  async put(record: SuggestionRecord): Promise<void> {
    this.db
      .prepare(`
        INSERT INTO suggestions (signature, resolved_path, source_file_path, timestamp, context_snapshot)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(signature) DO UPDATE SET
          resolved_path = excluded.resolved_path,
          source_file_path = excluded.source_file_path,
          timestamp = excluded.timestamp,
          context_snapshot = excluded.context_snapshot
      `)
      .run(
        record.signature,
        record.resolved_path,
        record.source_file_path,
        record.timestamp,
        JSON.stringify(record.context_snapshot)
      );
  }

  async clear(): Promise<void> {
    this.db.prepare(`DELETE FROM suggestions`).run();
  }

  close(): void {
    this.db.close();
  }
}

function parseSnapshot(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return {};
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export type SuggestionStoreBackend = 'json' | 'sqlite';

export function createSuggestionStore(backend: SuggestionStoreBackend, location: string): SuggestionStore {
  switch (backend) {
    case 'json':
      return new JsonFileSuggestionStore(location);
    case 'sqlite':
      return new SqliteSuggestionStore(location);
  }
}
