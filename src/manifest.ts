/**
 * Manifest parsing.
 * @module manifest
 *
 * The manifest is an XML document such as:
 *
 *   <?xml version="1.0" encoding="UTF-8"?>
 *   <RenoiseScriptingTool doc_version="0">
 *     <ApiVersion>6</ApiVersion>
 *     <Id>com.example.MyTool</Id>
 *     <Version>1.2</Version>
 *     <Name>My Tool</Name>
 *   </RenoiseScriptingTool>
 *
 * Only `Id` and `Version` are required. They may appear at any depth; the first
 * non-empty occurrence in document order wins.
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedDocumentError, MissingFieldError } from './errors';
import type { Manifest } from './types';

export const ID_FIELD = 'Id';
export const VERSION_FIELD = 'Version';

/**
 * Optional elements copied onto the manifest model as-is
 */
const OPTIONAL_FIELDS: ReadonlyArray<[Exclude<keyof Manifest, 'identifier' | 'version'>, string]> = [
  ['name', 'Name'],
  ['author', 'Author'],
  ['description', 'Description'],
  ['category', 'Category'],
  ['homepage', 'Homepage'],
  ['apiVersion', 'ApiVersion'],
];

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // keep "0.10" a string instead of the number 0.1
  parseTagValue: false,
  trimValues: true,
  processEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function directText(children: unknown): string {
  if (!Array.isArray(children)) {
    return '';
  }
  let text = '';
  for (const child of children) {
    if (isRecord(child) && typeof child['#text'] === 'string') {
      text += child['#text'];
    }
  }
  return text.trim();
}

/**
 * Depth-first search of the ordered node tree for the first element named `tag`
 * with non-empty text content.
 */
function findElementText(nodes: unknown, tag: string): string | undefined {
  if (!Array.isArray(nodes)) {
    return undefined;
  }
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [key, children] of Object.entries(node)) {
      if (key === ':@' || key === '#text') {
        continue;
      }
      if (key === tag) {
        const text = directText(children);
        if (text) {
          return text;
        }
      }
      const nested = findElementText(children, tag);
      if (nested !== undefined) {
        return nested;
      }
    }
  }
  return undefined;
}

/**
 * Parse manifest text.
 * @param content - Raw manifest text
 * @returns The parsed manifest model
 * @throws MalformedDocumentError if the text is not well-formed XML
 * @throws MissingFieldError if `Id` or `Version` is absent or blank
 */
export function parseManifest(content: string): Manifest {
  if (!content.trim()) {
    throw new MalformedDocumentError('document is empty');
  }

  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    throw new MalformedDocumentError(validation.err.msg, validation.err.line, validation.err.col);
  }

  const tree: unknown = parser.parse(content);

  const identifier = findElementText(tree, ID_FIELD);
  if (!identifier) {
    throw new MissingFieldError(ID_FIELD);
  }
  const version = findElementText(tree, VERSION_FIELD);
  if (!version) {
    throw new MissingFieldError(VERSION_FIELD);
  }

  const manifest: Manifest = { identifier, version };
  for (const [property, tag] of OPTIONAL_FIELDS) {
    const value = findElementText(tree, tag);
    if (value !== undefined) {
      manifest[property] = value;
    }
  }
  return manifest;
}
