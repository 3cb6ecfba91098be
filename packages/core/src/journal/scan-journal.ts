import * as fs from 'fs';
import * as path from 'path';
import type { JournalEntry } from '../contracts';
import { JournalEntrySchema } from '../contracts';
import { Mutex } from '../cache/mutex';

/**
 * Append-only JSON-lines record of what each file resolved to during a scan:
 * one line after the first pass and one after the file completes.
 * Appends are serialized so lines from concurrent workers never interleave.
 */
export class ScanJournal {
  private lock = new Mutex();

  constructor(readonly location: string) {}

  /**
   * Append one entry. Failures are logged and reported as false; the scan carries on.
   */
  async append(entry: JournalEntry): Promise<boolean> {
    try {
      await this.lock.runExclusive(async () => {
        await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
        await fs.promises.appendFile(this.location, `${JSON.stringify(entry)}\n`, 'utf-8');
      });
      return true;
    } catch (error) {
      console.warn(`[ScanJournal] Failed to append to ${this.location}:`, error);
      return false;
    }
  }

  async readAll(): Promise<JournalEntry[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.location, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: JournalEntry[] = [];
    for (const line of text.split('\n')) {
      if (!line.trim()) continue;
      try {
        const result = JournalEntrySchema.safeParse(JSON.parse(line));
        if (result.success) {
          entries.push(result.data);
        } else {
          console.warn(`[ScanJournal] Skipping malformed line: ${result.error.message}`);
        }
      } catch (error) {
        console.warn('[ScanJournal] Skipping unparseable line:', error);
      }
    }
    return entries;
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(() => fs.promises.rm(this.location, { force: true }));
  }
}
