/**
 * Release orchestration.
 * @module release
 *
 * Steps, each depending on the previous one:
 *   1. check the manifest exists (nothing is created when it does not)
 *   2. read and parse it
 *   3. compute the bumped version
 *   4. patch the version text and write the manifest back
 *   5. collect the release files from the project directory
 *   6. write the archive and place it at <releaseDir>/<Id>.<archiveExtension>
 *
 * Steps 1-4 fail without touching the filesystem. Once the manifest has been
 * written it is not rolled back; later failures surface as ReleaseAbortedError.
 */
import * as fs from 'fs';
import * as path from 'path';
import { writeArchive } from './archive';
import { collectReleaseFiles, MANIFEST_ARCHIVE_NAME } from './collect';
import { loadReleaseConfig } from './config';
import {
  InvalidIdentifierError,
  IOFailureError,
  MalformedDocumentError,
  ManifestNotFoundError,
  ReleaseAbortedError,
  toError,
} from './errors';
import { parseManifest } from './manifest';
import { patchManifestVersion } from './patch';
import { bumpVersion } from './version';
import { Logger } from './utils/logger';
import type { ReleaseConfig, ReleaseResult } from './types';

export interface ReleaseOptions {
  /** Project directory; defaults to process.cwd() */
  cwd?: string;
  /** Fully resolved configuration; loaded from `cwd` when omitted */
  config?: ReleaseConfig;
}

/**
 * Name of the archive (and of the wrapping directory in the wrapped layout).
 */
export function archiveFileName(identifier: string, archiveExtension: string): string {
  return `${identifier}.${archiveExtension}`;
}

/**
 * Reject an Id that would resolve outside the release directory.
 * @throws InvalidIdentifierError for separators, `.`, `..` or anything that is not its own base name
 */
export function assertSafeIdentifier(identifier: string): void {
  if (
    identifier === '.' ||
    identifier === '..' ||
    /[/\\]/.test(identifier) ||
    path.basename(identifier) !== identifier
  ) {
    throw new InvalidIdentifierError(identifier);
  }
}

// BOM kept so the write-back reproduces it
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function readManifest(manifestPath: string): string {
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestNotFoundError(path.basename(manifestPath));
  }
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(manifestPath);
  } catch (error) {
    throw new IOFailureError('Failed to read manifest', manifestPath, toError(error));
  }
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new MalformedDocumentError('not valid UTF-8');
  }
}

function writeManifest(manifestPath: string, content: string): void {
  try {
    fs.writeFileSync(manifestPath, content, 'utf8');
  } catch (error) {
    throw new IOFailureError('Failed to write manifest', manifestPath, toError(error));
  }
}

/**
 * Bump the manifest version and package the project into a release archive.
 * @returns Versions, final archive path and entry names
 */
export async function runRelease(options: ReleaseOptions = {}): Promise<ReleaseResult> {
  const logger = Logger.getInstance();
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const config = options.config ?? loadReleaseConfig(cwd);
  const manifestPath = path.join(cwd, config.manifestFile);

  const original = readManifest(manifestPath);
  const manifest = parseManifest(original);
  logger.info(`Releasing ${manifest.identifier} (current version ${manifest.version})`);
  assertSafeIdentifier(manifest.identifier);

  const version = bumpVersion(manifest.version);
  const patched = patchManifestVersion(original, manifest.version, version);
  writeManifest(manifestPath, patched);
  logger.info(`Updated ${config.manifestFile}: ${manifest.version} -> ${version}`);

  try {
    const fileName = archiveFileName(manifest.identifier, config.archiveExtension);
    const releaseDir = path.resolve(cwd, config.releaseDir);
    const archivePath = path.join(releaseDir, fileName);

    const files = collectReleaseFiles(cwd, patched, {
      scriptExtension: config.scriptExtension,
      manifestArchiveName: MANIFEST_ARCHIVE_NAME,
    });
    logger.debug(`Collected ${files.length} files: ${files.map((file) => file.name).join(', ')}`);

    const archive = await writeArchive(files, archivePath, {
      layout: config.layout,
      rootDir: fileName,
      compressionLevel: config.compressionLevel,
      timestamp: config.timestamp,
    });
    logger.info(`Created ${archive.path} (${archive.bytes} bytes)`);

    return {
      identifier: manifest.identifier,
      previousVersion: manifest.version,
      version,
      archivePath: archive.path,
      layout: config.layout,
      entries: archive.entries,
    };
  } catch (error) {
    throw new ReleaseAbortedError(config.manifestFile, version, toError(error));
  }
}
