/**
 * File Scanner
 *
 * Discovers the files to ingest with fast-glob, applying the extension
 * filter and the ignore rules. A single file path is taken as is.
 */

import { statSync, type Stats } from 'node:fs';
import { basename, extname, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { createIgnoreFilter } from './ignore.js';
import type { DiscoveredFile, ScanOptions } from './types.js';

/**
 * Absolute path with forward slashes: the stable `source` identity of a file.
 */
export function toSourcePath(filePath: string): string {
  return resolve(filePath).split(sep).join('/');
}

function toDiscoveredFile(absolutePath: string, root: string, stat: Stats): DiscoveredFile {
  return {
    path: toSourcePath(absolutePath),
    relativePath: relative(root, absolutePath).split(sep).join('/') || basename(absolutePath),
    extension: extname(absolutePath).slice(1).toLowerCase(),
    size: stat.size,
    modifiedAt: stat.mtime.toISOString(),
  };
}

/**
 * Scan a file or directory.
 *
 * @returns Files sorted by path
 * @throws FileNotFoundError if the target does not exist
 *
 * @example
 * ```ts
 * const files = await scanPath('./docs', { extensions: ['md', 'pdf'] });
 * ```
 */
export async function scanPath(target: string, options: ScanOptions): Promise<DiscoveredFile[]> {
  const absoluteTarget = resolve(target);

  let stat: Stats;
  try {
    stat = statSync(absoluteTarget);
  } catch {
    throw new FileNotFoundError(absoluteTarget);
  }

  if (stat.isFile()) {
    return [toDiscoveredFile(absoluteTarget, absoluteTarget, stat)];
  }

  const extensions = new Set(options.extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()));
  const shouldIgnore = createIgnoreFilter({
    rootPath: absoluteTarget,
    additionalPatterns: options.ignorePatterns,
  });

  const entries = await fg('**/*', {
    cwd: absoluteTarget,
    absolute: true,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: options.followSymlinks ?? false,
    suppressErrors: true,
    stats: true,
  });

  const files: DiscoveredFile[] = [];
  for (const entry of entries) {
    const extension = extname(entry.path).slice(1).toLowerCase();
    if (!extensions.has(extension)) continue;

    const relativePath = relative(absoluteTarget, entry.path);
    if (shouldIgnore(relativePath)) continue;

    const entryStat = entry.stats ?? statSync(entry.path);
    files.push(toDiscoveredFile(entry.path, absoluteTarget, entryStat));
  }

  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
