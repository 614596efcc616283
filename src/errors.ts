export type ReleaseErrorCode =
  | 'MANIFEST_NOT_FOUND'
  | 'MALFORMED_DOCUMENT'
  | 'MISSING_FIELD'
  | 'INVALID_VERSION'
  | 'INVALID_IDENTIFIER'
  | 'PATCH_MISMATCH'
  | 'IO_FAILURE'
  | 'CONFIG_ERROR'
  | 'RELEASE_ABORTED';

export class ReleaseError extends Error {
  constructor(
    message: string,
    public readonly code: ReleaseErrorCode,
  ) {
    super(message);
    this.name = 'ReleaseError';
  }
}

export class ManifestNotFoundError extends ReleaseError {
  constructor(public readonly manifestPath: string) {
    super(`${manifestPath} not found in working directory`, 'MANIFEST_NOT_FOUND');
    this.name = 'ManifestNotFoundError';
  }
}

export class MalformedDocumentError extends ReleaseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(
      line !== undefined ? `Malformed manifest (line ${line}, column ${column ?? 0}): ${message}` : `Malformed manifest: ${message}`,
      'MALFORMED_DOCUMENT',
    );
    this.name = 'MalformedDocumentError';
  }
}

export class MissingFieldError extends ReleaseError {
  constructor(public readonly field: string) {
    super(`${field} not found in manifest`, 'MISSING_FIELD');
    this.name = 'MissingFieldError';
  }
}

export class InvalidVersionError extends ReleaseError {
  constructor(public readonly version: string) {
    super(`Invalid version "${version}": expected MAJOR[.MINOR[.PATCH]][-PRERELEASE][+BUILD]`, 'INVALID_VERSION');
    this.name = 'InvalidVersionError';
  }
}

/**
 * The manifest Id cannot be used as a file name inside the release directory.
 */
export class InvalidIdentifierError extends ReleaseError {
  constructor(public readonly identifier: string) {
    super(`Invalid Id "${identifier}": it must be a plain file name without path separators`, 'INVALID_IDENTIFIER');
    this.name = 'InvalidIdentifierError';
  }
}

export class PatchMismatchError extends ReleaseError {
  constructor(public readonly expected: string) {
    super(`Could not find ${expected} in manifest text; the version was not updated`, 'PATCH_MISMATCH');
    this.name = 'PatchMismatchError';
  }
}

export class IOFailureError extends ReleaseError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: Error,
  ) {
    super(cause ? `${message}: ${path} (${cause.message})` : `${message}: ${path}`, 'IO_FAILURE');
    this.name = 'IOFailureError';
  }
}

export class ConfigError extends ReleaseError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(problems.length ? `${message}:\n  - ${problems.join('\n  - ')}` : message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a step fails after the manifest has already been rewritten.
 * The manifest is not rolled back.
 */
export class ReleaseAbortedError extends ReleaseError {
  readonly manifestUpdated = true;

  constructor(
    public readonly manifestPath: string,
    public readonly version: string,
    public readonly cause: Error,
  ) {
    super(`Release aborted after ${manifestPath} was updated to ${version}: ${cause.message}`, 'RELEASE_ABORTED');
    this.name = 'ReleaseAbortedError';
  }
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
