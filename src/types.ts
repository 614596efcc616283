/**
 * Type definitions for the release packager.
 * @module types
 */

export interface Manifest {
  identifier: string;
  version: string;
  name?: string;
  author?: string;
  description?: string;
  category?: string;
  homepage?: string;
  apiVersion?: string;
}

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
  build: string[];
}

export type ArchiveLayout = 'flat' | 'wrapped';

export type ReleaseFileSource =
  | { kind: 'path'; path: string }
  | { kind: 'buffer'; data: Buffer };

export interface ReleaseFile {
  /** Archive-relative name, always with forward slashes */
  name: string;
  source: ReleaseFileSource;
}

export interface ReleaseConfig {
  manifestFile: string;
  releaseDir: string;
  scriptExtension: string;
  archiveExtension: string;
  layout: ArchiveLayout;
  compressionLevel: number;
  /** Modification time stamped on every entry */
  timestamp?: Date;
}

export interface ArchiveOptions {
  layout: ArchiveLayout;
  /** Name of the wrapping directory, required by the wrapped layout */
  rootDir?: string;
  compressionLevel?: number;
  timestamp?: Date;
}

export interface ArchiveResult {
  path: string;
  bytes: number;
  entries: string[];
}

export interface ReleaseResult {
  identifier: string;
  previousVersion: string;
  version: string;
  archivePath: string;
  layout: ArchiveLayout;
  entries: string[];
}
