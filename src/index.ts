/**
 * xrnx-release
 *
 * Bumps a tool's manifest version and packages it into a deterministic release archive.
 * @module xrnx-release
 */

// Type exports
export type {
  Manifest,
  ParsedVersion,
  ArchiveLayout,
  ReleaseFile,
  ReleaseFileSource,
  ReleaseConfig,
  ArchiveOptions,
  ArchiveResult,
  ReleaseResult,
} from './types';

// Errors
export {
  ReleaseError,
  ManifestNotFoundError,
  MalformedDocumentError,
  MissingFieldError,
  InvalidVersionError,
  InvalidIdentifierError,
  PatchMismatchError,
  IOFailureError,
  ConfigError,
  ReleaseAbortedError,
} from './errors';
export type { ReleaseErrorCode } from './errors';

// Manifest and version
export { parseManifest, ID_FIELD, VERSION_FIELD } from './manifest';
export { normalizeVersion, parseVersion, formatVersion, bumpVersion } from './version';
export { patchManifestVersion, versionMarkup } from './patch';

// Packaging
export { collectReleaseFiles, selectReadme, listTopLevelFiles } from './collect';
export { writeArchive, planArchiveEntries, placeFile, FILE_MODE, DIRECTORY_MODE, DEFAULT_TIMESTAMP } from './archive';

// Orchestration
export { runRelease, archiveFileName } from './release';
export type { ReleaseOptions } from './release';
export { loadReleaseConfig, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config';
export { Logger } from './utils/logger';
export type { LogLevel } from './utils/logger';
