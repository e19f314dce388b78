/**
 * OOXML Package handling utilities
 *
 * Word-processing and spreadsheet documents (.docx, .xlsx) are ZIP archives
 * containing XML parts. This module reads those parts.
 */

import JSZip from 'jszip';
import { CorruptDocumentError, describeFailure } from './errors';
import { parseXml, getAttribute, getChildren, getRootElement, getTagName, type XmlNode } from './xml';

export type PackageFileType = 'word' | 'excel' | 'powerpoint' | 'unknown';

/**
 * Represents an OOXML package (ZIP archive)
 */
export interface OoxmlPackage {
  /** The JSZip instance */
  zip: JSZip;
  /** Parsed content types */
  contentTypes: ContentTypes;
  /** File type determined from content types */
  fileType: PackageFileType;
}

/**
 * Content types from [Content_Types].xml
 */
export interface ContentTypes {
  defaults: Map<string, string>;
  overrides: Map<string, string>;
}

/**
 * Open an OOXML package from a buffer
 *
 * @throws CorruptDocumentError if the data is not a ZIP archive or has no content types
 */
export async function openPackage(
  data: Buffer | Uint8Array | ArrayBuffer
): Promise<OoxmlPackage> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new CorruptDocumentError(`Not a readable OOXML package: ${describeFailure(error)}`, {
      cause: error,
    });
  }

  const contentTypesXml = await zip.file('[Content_Types].xml')?.async('string');
  if (!contentTypesXml) {
    throw new CorruptDocumentError('Invalid OOXML package: missing [Content_Types].xml', {
      location: '[Content_Types].xml',
    });
  }

  const contentTypes = parseContentTypes(contentTypesXml);
  const fileType = determineFileType(contentTypes);

  return { zip, contentTypes, fileType };
}

/**
 * Parse [Content_Types].xml
 *
 * With fast-xml-parser preserveOrder: true, structure is:
 * [ { Types: [ { Default: [], ':@': { '@_Extension': '...', '@_ContentType': '...' } } ], ':@': {...} } ]
 */
function parseContentTypes(xml: string): ContentTypes {
  const defaults = new Map<string, string>();
  const overrides = new Map<string, string>();

  const types = getRootElement(parseXml(xml), 'Types');
  if (!types) return { defaults, overrides };

  for (const child of getChildren(types)) {
    const tag = getTagName(child);
    const type = getAttribute(child, 'ContentType');
    if (!type) continue;

    if (tag === 'Default') {
      const ext = getAttribute(child, 'Extension');
      if (ext) defaults.set(ext, type);
    } else if (tag === 'Override') {
      const partName = getAttribute(child, 'PartName');
      if (partName) overrides.set(partName, type);
    }
  }

  return { defaults, overrides };
}

/**
 * Determine file type from content types
 */
function determineFileType(contentTypes: ContentTypes): PackageFileType {
  for (const [, contentType] of contentTypes.overrides) {
    if (contentType.includes('wordprocessingml')) return 'word';
    if (contentType.includes('spreadsheetml')) return 'excel';
    if (contentType.includes('presentationml')) return 'powerpoint';
  }
  return 'unknown';
}

/**
 * Get a part from the package as a string
 */
export async function getPartAsString(
  pkg: OoxmlPackage,
  partPath: string
): Promise<string | null> {
  const file = pkg.zip.file(partPath);
  if (!file) return null;
  return file.async('string');
}

/**
 * Get a part from the package as raw bytes
 */
export async function getPartAsBytes(
  pkg: OoxmlPackage,
  partPath: string
): Promise<Uint8Array | null> {
  const file = pkg.zip.file(partPath);
  if (!file) return null;
  return file.async('uint8array');
}

/**
 * Get a part from the package as parsed XML
 */
export async function getPartAsXml(
  pkg: OoxmlPackage,
  partPath: string
): Promise<XmlNode[] | null> {
  const content = await getPartAsString(pkg, partPath);
  if (!content) return null;
  return parseXml(content);
}

/**
 * Get a part as parsed XML, failing if it is absent
 *
 * @throws CorruptDocumentError
 */
export async function requirePartAsXml(pkg: OoxmlPackage, partPath: string): Promise<XmlNode[]> {
  const nodes = await getPartAsXml(pkg, partPath);
  if (!nodes) {
    throw new CorruptDocumentError(`Package is missing part ${partPath}`, { location: partPath });
  }
  return nodes;
}

/**
 * A relationship entry from a .rels file
 */
export interface Relationship {
  id: string;
  type: string;
  target: string;
  targetMode?: 'Internal' | 'External';
}

/**
 * Get relationships from a .rels file
 */
export async function getRelationships(
  pkg: OoxmlPackage,
  partPath: string
): Promise<Relationship[]> {
  // e.g., "word/document.xml" -> "word/_rels/document.xml.rels"
  const slash = partPath.lastIndexOf('/');
  const dir = partPath.slice(0, slash + 1);
  const fileName = partPath.slice(slash + 1);
  const relsPath = `${dir}_rels/${fileName}.rels`;

  const nodes = await getPartAsXml(pkg, relsPath);
  const root = nodes ? getRootElement(nodes, 'Relationships') : undefined;
  if (!root) return [];

  const relationships: Relationship[] = [];
  for (const child of getChildren(root)) {
    if (getTagName(child) !== 'Relationship') continue;

    const targetMode = getAttribute(child, 'TargetMode');
    relationships.push({
      id: getAttribute(child, 'Id') ?? '',
      type: getAttribute(child, 'Type') ?? '',
      target: getAttribute(child, 'Target') ?? '',
      ...(targetMode === 'Internal' || targetMode === 'External' ? { targetMode } : {}),
    });
  }

  return relationships;
}

/**
 * Resolve a relationship target against the part that owns it.
 *
 * "media/image1.png" from "word/document.xml" -> "word/media/image1.png";
 * absolute targets ("/xl/worksheets/sheet1.xml") are package-rooted.
 */
export function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }

  const segments = sourcePart.split('/').slice(0, -1);
  for (const segment of target.split('/')) {
    if (segment === '..') {
      segments.pop();
    } else if (segment !== '.' && segment !== '') {
      segments.push(segment);
    }
  }
  return segments.join('/');
}

/**
 * First relationship whose type ends with the given name ("image",
 * "worksheet", ...). Matching on the final segment covers both the
 * transitional and the strict relationship namespaces.
 */
export function findRelationship(
  relationships: readonly Relationship[],
  typeName: string
): Relationship | undefined {
  return relationships.find((rel) => rel.type.endsWith(`/${typeName}`));
}

/**
 * Path of the package's main part, from the package relationships
 */
export async function getMainPartPath(pkg: OoxmlPackage, fallback: string): Promise<string> {
  const rel = findRelationship(await getRelationships(pkg, ''), 'officeDocument');
  return rel ? resolveTarget('', rel.target) : fallback;
}
