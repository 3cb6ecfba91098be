import type { FileEntry } from '../contracts';

/**
 * Cache identity of a file: name, size and modification time (whole milliseconds).
 * Independent of where the file lives, so a moved but unchanged file still hits the cache.
 * Two distinct files sharing all three collide; no content hash is taken.
 */
export function fileSignature(file: Pick<FileEntry, 'name' | 'size' | 'mtimeMs'>): string {
  return `${file.name}|${file.size}|${Math.floor(file.mtimeMs)}`;
}
