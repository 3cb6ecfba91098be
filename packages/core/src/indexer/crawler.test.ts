import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { crawlFiles, describeFile } from './crawler';
import { FsDirectoryReader } from './directory-reader';

describe('crawler', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-'));
    fs.mkdirSync(path.join(root, 'sub'));
    fs.mkdirSync(path.join(root, 'node_modules'));
    fs.writeFileSync(path.join(root, 'a.txt'), 'hello');
    fs.writeFileSync(path.join(root, 'sub', 'b.md'), '# b');
    fs.writeFileSync(path.join(root, '.hidden'), 'x');
    fs.writeFileSync(path.join(root, 'node_modules', 'x.js'), 'x');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns regular files and skips hidden and tool folders', async () => {
    const files = await crawlFiles(root);
    expect(files.map((file) => file.relative_path).sort()).toEqual(['a.txt', 'sub/b.md']);
  });

  it('stops when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await crawlFiles(root, { signal: controller.signal })).toEqual([]);
  });

  it('reports unreadable roots through onError', async () => {
    const errors: string[] = [];
    const files = await crawlFiles(path.join(root, 'missing'), { onError: (message) => errors.push(message) });
    expect(files).toEqual([]);
    expect(errors).toHaveLength(1);
  });

  it('describes a file relative to the root', async () => {
    const filePath = path.join(root, 'sub', 'Photo.JPG');
    fs.writeFileSync(filePath, 'abc');
    const entry = await describeFile(filePath, root);
    expect(entry).toMatchObject({
      path: filePath,
      name: 'Photo.JPG',
      extension: '.jpg',
      size: 3,
      relative_path: 'sub/Photo.JPG',
    });
  });

  it('lists files and directories through the fs reader', async () => {
    const entries = await new FsDirectoryReader().listEntries(root);
    expect(entries.files.sort()).toEqual(['.hidden', 'a.txt']);
    expect(entries.directories.sort()).toEqual(['node_modules', 'sub']);
  });
});
