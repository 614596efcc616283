/**
 * Targeted rewrite of the manifest version field.
 * @module patch
 *
 * The manifest is never re-serialized: only the text of the first
 * `<Version>old</Version>` is swapped so comments, attribute order and
 * whitespace stay exactly as they were.
 */
import { VERSION_FIELD } from './manifest';
import { PatchMismatchError } from './errors';

/**
 * Build the literal markup for a version field.
 */
export function versionMarkup(version: string): string {
  return `<${VERSION_FIELD}>${version}</${VERSION_FIELD}>`;
}

/**
 * Replace the first occurrence of the old version markup with the new one.
 * @param content - Original manifest text
 * @param oldVersion - Version text exactly as it appears in the manifest
 * @param newVersion - Version to write
 * @returns Updated manifest text
 * @throws PatchMismatchError if the old markup does not occur in the text
 */
export function patchManifestVersion(content: string, oldVersion: string, newVersion: string): string {
  const expected = versionMarkup(oldVersion);
  const index = content.indexOf(expected);
  if (index === -1) {
    throw new PatchMismatchError(expected);
  }
  return content.slice(0, index) + versionMarkup(newVersion) + content.slice(index + expected.length);
}
