/**
 * Version normalization and minor-version bumping.
 * @module version
 */
import * as semver from 'semver';
import { InvalidVersionError } from './errors';
import type { ParsedVersion } from './types';

/**
 * Split a version string into its numeric core and the `-pre` / `+build` suffix.
 * The suffix starts at the first `-` or `+`, whichever comes first.
 */
export function splitVersionSuffix(version: string): { core: string; suffix: string } {
  const index = version.search(/[-+]/);
  if (index === -1) {
    return { core: version, suffix: '' };
  }
  return { core: version.slice(0, index), suffix: version.slice(index) };
}

/**
 * Zero-pad a version with fewer than three components.
 * @param version - Raw version string
 * @returns The padded string, or the input unchanged when it already has 3+ components
 *
 * @example
 * normalizeVersion('1.2-beta') // '1.2.0-beta'
 */
export function normalizeVersion(version: string): string {
  const { core, suffix } = splitVersionSuffix(version);
  const parts = core.split('.');
  while (parts.length > 1 && parts[parts.length - 1] === '') {
    parts.pop();
  }
  if (parts.length >= 3) {
    return version;
  }
  while (parts.length < 3) {
    parts.push('0');
  }
  return `${parts.join('.')}${suffix}`;
}

function strictParse(version: string): ParsedVersion | null {
  // semver accepts a leading "v" even in strict mode; a manifest version must start with a digit
  if (!/^\d/.test(version)) {
    return null;
  }
  const parsed = semver.parse(version, { loose: false });
  if (!parsed) {
    return null;
  }
  const { suffix } = splitVersionSuffix(version);
  const buildIndex = suffix.indexOf('+');
  const pre = buildIndex === -1 ? suffix : suffix.slice(0, buildIndex);
  const build = buildIndex === -1 ? '' : suffix.slice(buildIndex + 1);
  return {
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
    prerelease: pre ? pre.slice(1).split('.') : [],
    build: build ? build.split('.') : [],
  };
}

/**
 * Parse `major.minor.patch[-pre][+build]`, padding short versions first.
 * @throws InvalidVersionError when the string cannot be parsed even after padding
 */
export function parseVersion(version: string): ParsedVersion {
  const parsed = strictParse(version) ?? strictParse(normalizeVersion(version));
  if (!parsed) {
    throw new InvalidVersionError(version);
  }
  return parsed;
}

/**
 * Render a parsed version in canonical text form.
 */
export function formatVersion(version: ParsedVersion): string {
  let text = `${version.major}.${version.minor}.${version.patch}`;
  if (version.prerelease.length > 0) {
    text += `-${version.prerelease.join('.')}`;
  }
  if (version.build.length > 0) {
    text += `+${version.build.join('.')}`;
  }
  return text;
}

/**
 * Increment the minor component. The patch component is reset to 0 only when the
 * version carries neither pre-release nor build metadata.
 *
 * @example
 * bumpVersion('1.4')        // '1.5.0'
 * bumpVersion('1.2.3-beta') // '1.3.3-beta'
 */
export function bumpVersion(version: string): string {
  const parsed = parseVersion(version);
  const minor = parsed.minor + 1;
  if (!Number.isSafeInteger(minor)) {
    throw new InvalidVersionError(version);
  }
  const keepPatch = parsed.prerelease.length > 0 || parsed.build.length > 0;
  return formatVersion({
    ...parsed,
    minor,
    patch: keepPatch ? parsed.patch : 0,
  });
}
