/**
 * Release file collection.
 * @module collect
 */
import * as fs from 'fs';
import * as path from 'path';
import { IOFailureError, toError } from './errors';
import type { ReleaseFile } from './types';

export const README_ARCHIVE_NAME = 'README.md';
export const MANIFEST_ARCHIVE_NAME = 'manifest.xml';

export interface CollectOptions {
  /** Extension including the leading dot, e.g. '.lua' */
  scriptExtension: string;
  manifestArchiveName?: string;
}

/**
 * Code-unit comparison; independent of locale and of the host's listing order.
 */
function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function isRegularFile(dir: string, entry: fs.Dirent): boolean {
  if (entry.isFile()) {
    return true;
  }
  if (entry.isSymbolicLink()) {
    try {
      return fs.statSync(path.join(dir, entry.name)).isFile();
    } catch {
      // dangling link
      return false;
    }
  }
  return false;
}

/**
 * List the regular files directly inside a directory, sorted by name.
 */
export function listTopLevelFiles(dir: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new IOFailureError('Failed to list directory', dir, toError(error));
  }
  return entries
    .filter((entry) => isRegularFile(dir, entry))
    .map((entry) => entry.name)
    .sort(compareNames);
}

/**
 * Pick the readme among the given file names.
 * Matching is case-insensitive; `readme.md` wins, otherwise the first name in sorted order.
 */
export function selectReadme(fileNames: string[]): string | undefined {
  const candidates = fileNames.filter((name) => name.toLowerCase() === 'readme.md').sort(compareNames);
  if (candidates.includes('readme.md')) {
    return 'readme.md';
  }
  return candidates[0];
}

/**
 * Collect the files that make up a release.
 * Only the top level of `cwd` is scanned. The manifest is taken from memory so
 * the archive always carries the patched text.
 * @param cwd - Project directory
 * @param manifestContent - Post-bump manifest text
 * @param options - Collection options
 * @returns Scripts in name order, then the readme, then the manifest
 */
export function collectReleaseFiles(cwd: string, manifestContent: string, options: CollectOptions): ReleaseFile[] {
  const fileNames = listTopLevelFiles(cwd);
  const files: ReleaseFile[] = [];

  for (const name of fileNames) {
    if (path.extname(name) === options.scriptExtension) {
      files.push({ name, source: { kind: 'path', path: path.join(cwd, name) } });
    }
  }

  const readme = selectReadme(fileNames);
  if (readme) {
    files.push({ name: README_ARCHIVE_NAME, source: { kind: 'path', path: path.join(cwd, readme) } });
  }

  files.push({
    name: options.manifestArchiveName ?? MANIFEST_ARCHIVE_NAME,
    source: { kind: 'buffer', data: Buffer.from(manifestContent, 'utf8') },
  });

  return files;
}
