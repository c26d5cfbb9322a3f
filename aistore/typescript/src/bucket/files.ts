/**
 * Local directory listing for bulk uploads
 * @module aistore-client/bucket/files
 */

import { readdir, stat } from 'fs/promises';
import path from 'path';

/**
 * A local file scheduled for upload
 */
export interface LocalFile {
  /** Absolute or caller-relative path on disk */
  path: string;
  /** Path relative to the listed directory, `/`-separated */
  relativePath: string;
  size: number;
}

/**
 * Lists the regular files under a directory, sorted by relative path.
 * Filesystem errors propagate unchanged.
 */
export async function listFiles(root: string, recursive: boolean): Promise<LocalFile[]> {
  const files: LocalFile[] = [];
  await walk(root, root, recursive, files);
  files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  return files;
}

async function walk(
  root: string,
  dir: string,
  recursive: boolean,
  files: LocalFile[]
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        await walk(root, fullPath, recursive, files);
      }
      continue;
    }

    if (!entry.isFile()) {
      continue;
    }

    const stats = await stat(fullPath);
    files.push({
      path: fullPath,
      relativePath: path.relative(root, fullPath).split(path.sep).join('/'),
      size: stats.size,
    });
  }
}
