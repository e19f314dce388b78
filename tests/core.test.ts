/**
 * Core infrastructure tests
 *
 * Verifies that XML parsing, hashing and OOXML package access work correctly.
 */

import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';

import {
  parseXml,
  getTagName,
  getChildren,
  getChild,
  getAttribute,
  getTextContent,
  findByTagName,
  hashString,
  hashBytes,
  openPackage,
  getPartAsXml,
  getRelationships,
  findRelationship,
  getMainPartPath,
  requirePartAsXml,
  resolveTarget,
  CorruptDocumentError,
} from '../src/core';

const WORD_CONTENT_TYPES =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
  '<Default Extension="xml" ContentType="application/xml"/>' +
  '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
  '</Types>';

async function zipOf(files: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [path, content] of Object.entries(files)) {
    zip.file(path, content);
  }
  return zip.generateAsync({ type: 'uint8array' });
}

describe('XML Utilities', () => {
  it('parses simple XML', () => {
    const nodes = parseXml('<root><child>text</child></root>');

    expect(nodes).toHaveLength(1);
    expect(getTagName(nodes[0])).toBe('root');
    expect(getChildren(nodes[0]).map(getTagName)).toEqual(['child']);
  });

  it('reads prefixed attributes', () => {
    const nodes = parseXml('<w:p><w:r w:rsid="00AB"/></w:p>');
    const run = getChild(nodes[0], 'w:r');

    expect(run).toBeDefined();
    expect(run && getAttribute(run, 'w:rsid')).toBe('00AB');
    expect(run && getAttribute(run, 'w:missing')).toBeUndefined();
  });

  it('extracts text content', () => {
    const nodes = parseXml('<root><a>Hello</a><b> World</b></root>');

    expect(getTextContent(nodes[0])).toBe('Hello World');
  });

  it('keeps values as strings', () => {
    const nodes = parseXml('<v>007</v>');

    expect(getTextContent(nodes[0])).toBe('007');
  });

  it('finds descendants by tag name', () => {
    const nodes = parseXml('<root><a><t>1</t></a><t>2</t></root>');

    expect(findByTagName(nodes[0], 't').map(getTextContent)).toEqual(['1', '2']);
  });
});

describe('Hash Utilities', () => {
  it('produces consistent hashes', () => {
    const hash1 = hashString('test content');
    const hash2 = hashString('test content');

    expect(hash1).toBe(hash2);
    expect(hash1).toHaveLength(64); // SHA-256 produces 64 hex chars
  });

  it('produces different hashes for different content', () => {
    expect(hashString('content a')).not.toBe(hashString('content b'));
  });

  it('hashes bytes', () => {
    expect(hashBytes(new Uint8Array([1, 2, 3]))).toBe(hashBytes(new Uint8Array([1, 2, 3])));
    expect(hashBytes(new Uint8Array([1, 2, 3]))).not.toBe(hashBytes(new Uint8Array([1, 2, 4])));
  });
});

describe('Package Utilities', () => {
  it('rejects bytes that are not a ZIP archive', async () => {
    await expect(openPackage(new Uint8Array([1, 2, 3, 4]))).rejects.toBeInstanceOf(CorruptDocumentError);
  });

  it('rejects an archive without content types', async () => {
    const data = await zipOf({ 'word/document.xml': '<w:document/>' });

    await expect(openPackage(data)).rejects.toThrow('Invalid OOXML package: missing [Content_Types].xml');
  });

  it('determines the file type from content type overrides', async () => {
    const pkg = await openPackage(await zipOf({ '[Content_Types].xml': WORD_CONTENT_TYPES }));

    expect(pkg.fileType).toBe('word');
    expect(pkg.contentTypes.defaults.get('xml')).toBe('application/xml');
  });

  it('reads relationships and the main part', async () => {
    const pkg = await openPackage(
      await zipOf({
        '[Content_Types].xml': WORD_CONTENT_TYPES,
        '_rels/.rels':
          '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
          '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/main.xml"/>' +
          '</Relationships>',
        'word/_rels/main.xml.rels':
          '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
          '<Relationship Id="rId7" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/image" Target="media/image1.png"/>' +
          '<Relationship Id="rId8" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink" Target="https://example.com" TargetMode="External"/>' +
          '</Relationships>',
        'word/main.xml': '<w:document><w:body/></w:document>',
      })
    );

    const mainPath = await getMainPartPath(pkg, 'word/document.xml');
    expect(mainPath).toBe('word/main.xml');

    const rels = await getRelationships(pkg, mainPath);
    expect(rels).toEqual([
      {
        id: 'rId7',
        type: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/image',
        target: 'media/image1.png',
      },
      {
        id: 'rId8',
        type: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink',
        target: 'https://example.com',
        targetMode: 'External',
      },
    ]);
    expect(findRelationship(rels, 'image')?.id).toBe('rId7');
    expect(findRelationship(rels, 'styles')).toBeUndefined();
  });

  it('returns null for an absent part and throws when one is required', async () => {
    const pkg = await openPackage(await zipOf({ '[Content_Types].xml': WORD_CONTENT_TYPES }));

    expect(await getPartAsXml(pkg, 'word/document.xml')).toBeNull();
    await expect(requirePartAsXml(pkg, 'word/document.xml')).rejects.toThrow(
      'Package is missing part word/document.xml'
    );
  });

  it('resolves relationship targets against their source part', () => {
    expect(resolveTarget('word/document.xml', 'media/image1.png')).toBe('word/media/image1.png');
    expect(resolveTarget('xl/workbook.xml', '/xl/worksheets/sheet1.xml')).toBe('xl/worksheets/sheet1.xml');
    expect(resolveTarget('word/document.xml', '../customXml/item1.xml')).toBe('customXml/item1.xml');
    expect(resolveTarget('', 'word/document.xml')).toBe('word/document.xml');
  });
});
