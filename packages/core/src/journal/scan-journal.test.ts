import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { JournalEntry } from '../contracts';
import { ScanJournal } from './scan-journal';

function entry(source: string, status: string): JournalEntry {
  return { ts: 1, source, hint: 'Type=Doc', first_path: 'Home/Documents', refined_path: null, status };
}

describe('ScanJournal', () => {
  let dir: string;
  let location: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scan-journal-'));
    location = path.join(dir, 'logs', 'scan.jsonl');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads nothing before the first append', async () => {
    expect(await new ScanJournal(location).readAll()).toEqual([]);
  });

  it('appends one JSON line per entry', async () => {
    const journal = new ScanJournal(location);

    expect(await journal.append(entry('/a.pdf', 'ai-suggested'))).toBe(true);
    expect(await journal.append(entry('/b.pdf', 'refined'))).toBe(true);

    expect(fs.readFileSync(location, 'utf-8').split('\n')).toHaveLength(3);
    expect(await journal.readAll()).toEqual([entry('/a.pdf', 'ai-suggested'), entry('/b.pdf', 'refined')]);
  });

  it('keeps concurrent appends on separate lines', async () => {
    const journal = new ScanJournal(location);

    await Promise.all(Array.from({ length: 20 }, (_, i) => journal.append(entry(`/${i}.pdf`, 'ai-suggested'))));

    const entries = await journal.readAll();
    expect(entries).toHaveLength(20);
    expect(new Set(entries.map((item) => item.source)).size).toBe(20);
  });

  it('skips malformed lines', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.mkdirSync(path.dirname(location), { recursive: true });
    fs.writeFileSync(location, `${JSON.stringify(entry('/a.pdf', 'refined'))}\nnot json\n{"ts":"x"}\n`);

    expect(await new ScanJournal(location).readAll()).toEqual([entry('/a.pdf', 'refined')]);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it('reports a failed append without throwing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(path.join(dir, 'blocker'), '');
    const journal = new ScanJournal(path.join(dir, 'blocker', 'scan.jsonl'));

    expect(await journal.append(entry('/a.pdf', 'refined'))).toBe(false);
    warn.mockRestore();
  });

  it('clears the journal', async () => {
    const journal = new ScanJournal(location);
    await journal.append(entry('/a.pdf', 'refined'));

    await journal.clear();

    expect(await journal.readAll()).toEqual([]);
  });
});
