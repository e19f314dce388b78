/**
 * Word-processing document (.docx) parser
 *
 * Walks the main document body in order and produces one block per
 * non-empty paragraph, table and embedded picture.
 */

import { CorruptDocumentError, describeFailure } from '../core/errors';
import {
  findRelationship,
  getMainPartPath,
  getPartAsBytes,
  getPartAsXml,
  getRelationships,
  openPackage,
  requirePartAsXml,
  resolveTarget,
  type OoxmlPackage,
} from '../core/package';
import {
  findByTagName,
  getAttribute,
  getChild,
  getChildren,
  getRootElement,
  getTagName,
  getTextContent,
  type XmlNode,
} from '../core/xml';
import {
  createDocument,
  imageBlock,
  tableBlock,
  tableCell,
  textBlock,
  FORMATTING_FIELDS,
  type BlockDraft,
  type Document,
  type FormattingAttributes,
  type ImageAnchor,
  type TableCell,
} from '../model/document';
import { log } from '../settings';
import { decodeImage } from './image-decoder';
import type { ParseOptions } from './types';

/** Elements whose children are read as if they were inline in the paragraph */
const RUN_CONTAINERS = new Set([
  'w:hyperlink',
  'w:ins',
  'w:smartTag',
  'w:sdt',
  'w:sdtContent',
  'w:fldSimple',
  'w:customXml',
]);

/** Elements whose children are read as if they were in the body */
const BLOCK_CONTAINERS = new Set(['w:sdt', 'w:sdtContent', 'w:customXml']);

interface RunInfo {
  text: string;
  formatting: FormattingAttributes;
}

interface DocxContext {
  pkg: OoxmlPackage;
  /** Relationship id -> part path */
  images: Map<string, string>;
  options: ParseOptions;
}

/**
 * Parse a .docx package into a document
 *
 * @throws CorruptDocumentError if the package or its main part cannot be read
 */
export async function parseDocx(
  data: Buffer | Uint8Array | ArrayBuffer,
  options: ParseOptions = {}
): Promise<Document> {
  const pkg = await openPackage(data);
  if (pkg.fileType !== 'word') {
    throw new CorruptDocumentError(`Package is not a word-processing document (found ${pkg.fileType})`);
  }

  const mainPath = await getMainPartPath(pkg, 'word/document.xml');
  const nodes = await requirePartAsXml(pkg, mainPath);
  const body = getBody(nodes);
  if (!body) {
    throw new CorruptDocumentError(`${mainPath} has no document body`, { location: mainPath });
  }

  const images = new Map<string, string>();
  for (const rel of await getRelationships(pkg, mainPath)) {
    if (rel.type.endsWith('/image') && rel.targetMode !== 'External') {
      images.set(rel.id, resolveTarget(mainPath, rel.target));
    }
  }

  const context: DocxContext = { pkg, images, options };
  const drafts: BlockDraft[] = [];
  await readBlocks(getChildren(body), context, drafts);

  const pageCount = await readPageCount(pkg);
  log(options, `DocxParser.parse: ${drafts.length} blocks from ${mainPath}`);

  return createDocument(drafts, pageCount === undefined ? { format: 'docx' } : { format: 'docx', pageCount });
}

function getBody(nodes: XmlNode[]): XmlNode | undefined {
  const document = getRootElement(nodes, 'w:document');
  return document ? getChild(document, 'w:body') : undefined;
}

async function readBlocks(children: XmlNode[], context: DocxContext, drafts: BlockDraft[]): Promise<void> {
  for (const child of children) {
    const tag = getTagName(child);

    if (tag === 'w:p') {
      const runs = collectRuns(child);
      const text = runs.map((run) => run.text).join('');
      if (text !== '') {
        drafts.push(textBlock(text, paragraphFormatting(child, runs)));
      }
      for (const drawing of findByTagName(child, 'w:drawing')) {
        drafts.push(await readDrawing(drawing, context));
      }
    } else if (tag === 'w:tbl') {
      drafts.push(tableBlock(readTableRows(child)));
    } else if (tag && BLOCK_CONTAINERS.has(tag)) {
      await readBlocks(getChildren(child), context, drafts);
    }
  }
}

// ============================================================================
// Text runs
// ============================================================================

function collectRuns(paragraph: XmlNode): RunInfo[] {
  const runs: RunInfo[] = [];

  function walk(node: XmlNode): void {
    for (const child of getChildren(node)) {
      const tag = getTagName(child);
      if (tag === 'w:r') {
        runs.push({ text: runText(child), formatting: runFormatting(getChild(child, 'w:rPr')) });
      } else if (tag && RUN_CONTAINERS.has(tag)) {
        walk(child);
      }
    }
  }

  walk(paragraph);
  return runs;
}

function runText(run: XmlNode): string {
  let text = '';
  for (const child of getChildren(run)) {
    switch (getTagName(child)) {
      case 'w:t':
        text += getTextContent(child);
        break;
      case 'w:tab':
        text += '\t';
        break;
      case 'w:br':
      case 'w:cr':
        text += '\n';
        break;
    }
  }
  return text;
}

/**
 * On/off property: present means on unless w:val says otherwise
 */
function toggle(node: XmlNode | undefined): boolean | undefined {
  if (!node) return undefined;
  const val = getAttribute(node, 'w:val');
  return val !== 'false' && val !== '0' && val !== 'off';
}

function runFormatting(rPr: XmlNode | undefined): FormattingAttributes {
  const formatting: FormattingAttributes = {};
  if (!rPr) return formatting;

  const fonts = getChild(rPr, 'w:rFonts');
  const fontName = fonts ? (getAttribute(fonts, 'w:ascii') ?? getAttribute(fonts, 'w:hAnsi')) : undefined;
  if (fontName) formatting.fontName = fontName;

  const size = getChild(rPr, 'w:sz');
  const halfPoints = size ? Number(getAttribute(size, 'w:val')) : NaN;
  if (Number.isFinite(halfPoints)) formatting.fontSize = halfPoints / 2;

  const color = getChild(rPr, 'w:color');
  const colorValue = color ? getAttribute(color, 'w:val') : undefined;
  if (colorValue && colorValue !== 'auto') formatting.color = colorValue;

  const bold = toggle(getChild(rPr, 'w:b'));
  if (bold !== undefined) formatting.bold = bold;
  const italic = toggle(getChild(rPr, 'w:i'));
  if (italic !== undefined) formatting.italic = italic;

  const underline = getChild(rPr, 'w:u');
  if (underline) formatting.underline = getAttribute(underline, 'w:val') !== 'none';

  return formatting;
}

/**
 * Attributes on which every text-bearing run agrees
 */
function uniformFormatting(runs: readonly RunInfo[]): FormattingAttributes {
  const texts = runs.filter((run) => run.text !== '');
  const formatting: FormattingAttributes = {};
  if (texts.length === 0) return formatting;

  for (const field of FORMATTING_FIELDS) {
    const first = texts[0].formatting[field];
    if (first !== undefined && texts.every((run) => run.formatting[field] === first)) {
      Object.assign(formatting, { [field]: first });
    }
  }
  return formatting;
}

/**
 * Fill from w:shd and border style from the first border edge
 */
function shadingAndBorder(properties: XmlNode | undefined, borderTag: string): FormattingAttributes {
  const formatting: FormattingAttributes = {};
  if (!properties) return formatting;

  const shading = getChild(properties, 'w:shd');
  const fill = shading ? getAttribute(shading, 'w:fill') : undefined;
  if (fill && fill !== 'auto') formatting.fillColor = fill;

  const borders = getChild(properties, borderTag);
  const edge = borders ? getChildren(borders)[0] : undefined;
  const style = edge ? getAttribute(edge, 'w:val') : undefined;
  if (style) formatting.borderStyle = style;

  return formatting;
}

function paragraphFormatting(paragraph: XmlNode, runs: readonly RunInfo[]): FormattingAttributes {
  return {
    ...uniformFormatting(runs),
    ...shadingAndBorder(getChild(paragraph, 'w:pPr'), 'w:pBdr'),
  };
}

// ============================================================================
// Tables
// ============================================================================

function readTableRows(table: XmlNode): TableCell[][] {
  return getChildren(table)
    .filter((row) => getTagName(row) === 'w:tr')
    .map((row) =>
      getChildren(row)
        .filter((cell) => getTagName(cell) === 'w:tc')
        .map(readTableCell)
    );
}

function readTableCell(cell: XmlNode): TableCell {
  const paragraphs = getChildren(cell).filter((child) => getTagName(child) === 'w:p');
  const runs = paragraphs.map(collectRuns);
  const text = runs.map((paragraphRuns) => paragraphRuns.map((run) => run.text).join('')).join('\n');

  return tableCell(text, {
    ...uniformFormatting(runs.flat()),
    ...shadingAndBorder(getChild(cell, 'w:tcPr'), 'w:tcBorders'),
  });
}

// ============================================================================
// Pictures
// ============================================================================

async function readDrawing(drawing: XmlNode, context: DocxContext): Promise<BlockDraft> {
  const anchor = readAnchor(drawing);
  const extra = anchor ? { anchor } : {};

  const blip = findByTagName(drawing, 'a:blip')[0];
  const relId = blip ? getAttribute(blip, 'r:embed') : undefined;
  const partPath = relId ? context.images.get(relId) : undefined;
  if (!partPath) {
    return failedImage(`picture ${relId ?? '(no reference)'} has no embedded image part`, extra, context);
  }

  const bytes = await getPartAsBytes(context.pkg, partPath);
  if (!bytes) {
    return failedImage(`image part ${partPath} is missing`, extra, context);
  }

  try {
    const raster = await decodeImage(bytes);
    return imageBlock(raster.width, raster.height, raster.channels, raster.pixels, extra);
  } catch (error) {
    return failedImage(`image part ${partPath} could not be decoded: ${describeFailure(error)}`, extra, context);
  }
}

function failedImage(reason: string, extra: { anchor?: ImageAnchor }, context: DocxContext): BlockDraft {
  log(context.options, `DocxParser.parse: ${reason}`);
  return imageBlock(0, 0, 3, new Uint8Array(0), { ...extra, decodeError: reason });
}

/**
 * Position offsets of a floating picture, in EMU
 */
function readAnchor(drawing: XmlNode): ImageAnchor | undefined {
  const anchor = getChild(drawing, 'wp:anchor');
  if (!anchor) return undefined;

  const offset = (tag: string): number => {
    const position = getChild(anchor, tag);
    const posOffset = position ? getChild(position, 'wp:posOffset') : undefined;
    const value = posOffset ? parseInt(getTextContent(posOffset), 10) : NaN;
    return Number.isFinite(value) ? value : 0;
  };

  return { x: offset('wp:positionH'), y: offset('wp:positionV') };
}

// ============================================================================
// Properties
// ============================================================================

async function readPageCount(pkg: OoxmlPackage): Promise<number | undefined> {
  const rel = findRelationship(await getRelationships(pkg, ''), 'extended-properties');
  const nodes = await getPartAsXml(pkg, rel ? resolveTarget('', rel.target) : 'docProps/app.xml');
  const properties = nodes ? getRootElement(nodes, 'Properties') : undefined;
  const pages = properties ? getChild(properties, 'Pages') : undefined;
  if (!pages) return undefined;

  const count = parseInt(getTextContent(pages), 10);
  return Number.isInteger(count) && count >= 0 ? count : undefined;
}
