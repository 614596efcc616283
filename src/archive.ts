/**
 * Deterministic release archive writer.
 * @module archive
 *
 * Entries are written in the order given, with a fixed timestamp and fixed
 * permission bits, so identical inputs produce identical archive bytes. The
 * archive is assembled in a temp directory beside the destination and renamed
 * into place, so the published path never holds a partial file.
 */
import * as fs from 'fs';
import * as path from 'path';
import archiver from 'archiver';
import { IOFailureError, toError } from './errors';
import { Logger } from './utils/logger';
import type { ArchiveOptions, ArchiveResult, ReleaseFile } from './types';

export const FILE_MODE = 0o644;
export const DIRECTORY_MODE = 0o755;
export const DEFAULT_COMPRESSION_LEVEL = 9;
/** DOS epoch; zip timestamps cannot go earlier */
export const DEFAULT_TIMESTAMP = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

export interface ArchiveEntry {
  name: string;
  data: Buffer;
  mode: number;
  directory: boolean;
}

/**
 * Normalize an archive-relative name to forward slashes without a leading slash.
 */
export function toArchivePath(name: string): string {
  return name.replace(/\\/g, '/').replace(/^\/+/, '');
}

function readSource(file: ReleaseFile): Buffer {
  if (file.source.kind === 'buffer') {
    return file.source.data;
  }
  try {
    return fs.readFileSync(file.source.path);
  } catch (error) {
    throw new IOFailureError('Failed to read release file', file.source.path, toError(error));
  }
}

/**
 * Read every release file and lay the entries out for the requested layout.
 * @throws IOFailureError naming the first unreadable file
 */
export function planArchiveEntries(files: ReleaseFile[], options: ArchiveOptions): ArchiveEntry[] {
  const entries: ArchiveEntry[] = [];
  let prefix = '';

  if (options.layout === 'wrapped') {
    if (!options.rootDir) {
      throw new Error('The wrapped layout requires a root directory name');
    }
    prefix = `${toArchivePath(options.rootDir).replace(/\/+$/, '')}/`;
    entries.push({ name: prefix, data: Buffer.alloc(0), mode: DIRECTORY_MODE, directory: true });
  }

  for (const file of files) {
    entries.push({
      name: prefix + toArchivePath(file.name),
      data: readSource(file),
      mode: FILE_MODE,
      directory: false,
    });
  }

  return entries;
}

function writeZip(entries: ArchiveEntry[], destination: string, options: ArchiveOptions): Promise<number> {
  const logger = Logger.getInstance();
  const date = options.timestamp ?? DEFAULT_TIMESTAMP;

  return new Promise<number>((resolve, reject) => {
    const output = fs.createWriteStream(destination);
    const archive = archiver('zip', { zlib: { level: options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL } });

    output.on('close', () => resolve(archive.pointer()));
    output.on('error', reject);
    archive.on('error', reject);
    archive.on('warning', (warning: Error) => {
      logger.warn('Archive warning', warning);
    });

    archive.pipe(output);
    for (const entry of entries) {
      archive.append(entry.data, { name: entry.name, date, mode: entry.mode });
      logger.debug(`Added ${entry.name} (${entry.data.length} bytes)`);
    }
    archive.finalize().catch(reject);
  });
}

/**
 * Move a finished file to its final path, replacing whatever is there.
 * A directory in the way is removed first; a file is replaced by the rename itself.
 */
export function placeFile(tempPath: string, finalPath: string): void {
  try {
    if (fs.existsSync(finalPath) && fs.lstatSync(finalPath).isDirectory()) {
      fs.rmSync(finalPath, { recursive: true, force: true });
    }
    fs.renameSync(tempPath, finalPath);
  } catch (error) {
    throw new IOFailureError('Failed to place archive', finalPath, toError(error));
  }
}

/**
 * Write the release files into a zip archive at `outputPath`.
 * @param files - Files in archive order
 * @param outputPath - Final archive path
 * @param options - Layout and determinism settings
 * @returns Final path, archive size and entry names in write order
 */
export async function writeArchive(
  files: ReleaseFile[],
  outputPath: string,
  options: ArchiveOptions,
): Promise<ArchiveResult> {
  const logger = Logger.getInstance();
  const entries = planArchiveEntries(files, options);
  const outputDir = path.dirname(outputPath);

  let tempDir: string;
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    tempDir = fs.mkdtempSync(path.join(outputDir, '.tmp-'));
  } catch (error) {
    throw new IOFailureError('Failed to prepare output directory', outputDir, toError(error));
  }

  try {
    const tempPath = path.join(tempDir, path.basename(outputPath));
    logger.debug(`Writing ${entries.length} entries to ${tempPath}`);
    let bytes: number;
    try {
      bytes = await writeZip(entries, tempPath, options);
    } catch (error) {
      throw new IOFailureError('Failed to write archive', tempPath, toError(error));
    }
    placeFile(tempPath, outputPath);
    logger.debug(`Archive finalized: ${bytes} bytes`);
    return { path: outputPath, bytes, entries: entries.map((entry) => entry.name) };
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
}
