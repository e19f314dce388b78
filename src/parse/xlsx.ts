// Copyright (c) Microsoft. All rights reserved.
// Licensed under MIT license. See LICENSE file in the project root for full license information.

/**
 * Spreadsheet workbook (.xlsx) parser
 *
 * Each worksheet becomes one table named after the sheet. Rows are dense by
 * row number starting at 1, each as wide as its last cell. Shared strings,
 * inline strings and booleans are resolved to their displayed text; style
 * indices are expanded through cellXfs to font, fill and border attributes.
 */

import { CorruptDocumentError } from '../core/errors';
import {
  findRelationship,
  getMainPartPath,
  getPartAsXml,
  getRelationships,
  openPackage,
  requirePartAsXml,
  resolveTarget,
  type OoxmlPackage,
  type Relationship,
} from '../core/package';
import {
  findByTagName,
  getAttribute,
  getChild,
  getChildren,
  getChildrenByTagName,
  getRootElement,
  getTagName,
  getTextContent,
  type XmlNode,
} from '../core/xml';
import { parseCellAddress } from '../model/address';
import {
  createDocument,
  tableBlock,
  tableCell,
  type BlockDraft,
  type Document,
  type FormattingAttributes,
  type TableCell,
} from '../model/document';
import { log } from '../settings';
import type { ParseOptions } from './types';

interface SheetEntry {
  name: string;
  partPath: string;
}

/**
 * Parse a .xlsx package into a document
 *
 * @throws CorruptDocumentError if the package, workbook or a worksheet cannot be read
 */
export async function parseXlsx(
  data: Buffer | Uint8Array | ArrayBuffer,
  options: ParseOptions = {}
): Promise<Document> {
  const pkg = await openPackage(data);
  if (pkg.fileType !== 'excel') {
    throw new CorruptDocumentError(`Package is not a spreadsheet workbook (found ${pkg.fileType})`);
  }

  const workbookPath = await getMainPartPath(pkg, 'xl/workbook.xml');
  const workbook = getRootElement(await requirePartAsXml(pkg, workbookPath), 'workbook');
  if (!workbook) {
    throw new CorruptDocumentError(`${workbookPath} has no workbook element`, { location: workbookPath });
  }

  const relationships = await getRelationships(pkg, workbookPath);
  const sheets = extractSheets(workbook, workbookPath, relationships);

  const sharedStringsRel = findRelationship(relationships, 'sharedStrings');
  const sharedStrings = sharedStringsRel
    ? await extractSharedStrings(pkg, resolveTarget(workbookPath, sharedStringsRel.target))
    : [];

  const stylesRel = findRelationship(relationships, 'styles');
  const styles = stylesRel ? await parseStyles(pkg, resolveTarget(workbookPath, stylesRel.target)) : [];

  const drafts: BlockDraft[] = [];
  for (const sheet of sheets) {
    const rows = await readWorksheet(pkg, sheet, sharedStrings, styles);
    log(options, `XlsxParser.parse: sheet "${sheet.name}" has ${rows.length} rows`);
    drafts.push(tableBlock(rows, sheet.name));
  }

  return createDocument(drafts, {
    format: 'xlsx',
    sheetCount: sheets.length,
    sheetNames: sheets.map((sheet) => sheet.name),
  });
}

/**
 * Sheets in workbook order, with their worksheet parts
 */
function extractSheets(
  workbook: XmlNode,
  workbookPath: string,
  relationships: readonly Relationship[]
): SheetEntry[] {
  const sheetsNode = getChild(workbook, 'sheets');
  if (!sheetsNode) return [];

  return getChildrenByTagName(sheetsNode, 'sheet').map((sheet, index) => {
    const name = getAttribute(sheet, 'name') ?? `Sheet${index + 1}`;
    const relId = getAttribute(sheet, 'r:id');
    const rel = relationships.find((r) => r.id === relId);
    if (!rel) {
      throw new CorruptDocumentError(`Sheet "${name}" has no worksheet relationship`, {
        location: `sheet "${name}"`,
      });
    }
    return { name, partPath: resolveTarget(workbookPath, rel.target) };
  });
}

/**
 * Shared string table from xl/sharedStrings.xml
 */
async function extractSharedStrings(pkg: OoxmlPackage, partPath: string): Promise<string[]> {
  const nodes = await getPartAsXml(pkg, partPath);
  const sst = nodes ? getRootElement(nodes, 'sst') : undefined;
  if (!sst) return [];

  return getChildrenByTagName(sst, 'si').map(extractItemText);
}

/**
 * Text of an si or is element: plain t, or the t of each rich text run.
 * Phonetic runs (rPh) are not displayed text.
 */
function extractItemText(item: XmlNode): string {
  let text = '';

  for (const child of getChildren(item)) {
    const tagName = getTagName(child);

    if (tagName === 't') {
      text += getTextContent(child);
    } else if (tagName === 'r') {
      for (const t of findByTagName(child, 't')) {
        text += getTextContent(t);
      }
    }
  }

  return text;
}

// ============================================================================
// Styles
// ============================================================================

/**
 * Resolve each cellXfs entry to formatting attributes
 */
async function parseStyles(pkg: OoxmlPackage, partPath: string): Promise<FormattingAttributes[]> {
  const nodes = await getPartAsXml(pkg, partPath);
  const styleSheet = nodes ? getRootElement(nodes, 'styleSheet') : undefined;
  if (!styleSheet) return [];

  const section = (tag: string, itemTag: string): XmlNode[] => {
    const node = getChild(styleSheet, tag);
    return node ? getChildrenByTagName(node, itemTag) : [];
  };

  const fonts = section('fonts', 'font').map(parseFont);
  const fills = section('fills', 'fill').map(parseFill);
  const borders = section('borders', 'border').map(parseBorder);

  return section('cellXfs', 'xf').map((xf) => ({
    ...pick(fonts, getAttribute(xf, 'fontId')),
    ...pick(fills, getAttribute(xf, 'fillId')),
    ...pick(borders, getAttribute(xf, 'borderId')),
  }));
}

function pick(list: readonly FormattingAttributes[], id: string | undefined): FormattingAttributes {
  const index = id === undefined ? 0 : parseInt(id, 10);
  return list[index] ?? {};
}

function parseFont(font: XmlNode): FormattingAttributes {
  const formatting: FormattingAttributes = {};

  const name = getChild(font, 'name');
  const fontName = name ? getAttribute(name, 'val') : undefined;
  if (fontName) formatting.fontName = fontName;

  const size = getChild(font, 'sz');
  const points = size ? Number(getAttribute(size, 'val')) : NaN;
  if (Number.isFinite(points)) formatting.fontSize = points;

  const color = getChild(font, 'color');
  const rgb = color ? getAttribute(color, 'rgb') : undefined;
  if (rgb) formatting.color = rgb;

  const bold = getChild(font, 'b');
  if (bold) formatting.bold = isOn(bold);
  const italic = getChild(font, 'i');
  if (italic) formatting.italic = isOn(italic);
  const underline = getChild(font, 'u');
  if (underline) formatting.underline = getAttribute(underline, 'val') !== 'none';

  return formatting;
}

function isOn(node: XmlNode): boolean {
  const val = getAttribute(node, 'val');
  return val !== '0' && val !== 'false';
}

function parseFill(fill: XmlNode): FormattingAttributes {
  const pattern = getChild(fill, 'patternFill');
  if (!pattern) return {};

  const patternType = getAttribute(pattern, 'patternType');
  if (!patternType || patternType === 'none') return {};

  const foreground = getChild(pattern, 'fgColor');
  const rgb = foreground ? getAttribute(foreground, 'rgb') : undefined;
  return rgb ? { fillColor: rgb } : {};
}

function parseBorder(border: XmlNode): FormattingAttributes {
  for (const edge of ['left', 'right', 'top', 'bottom']) {
    const node = getChild(border, edge);
    const style = node ? getAttribute(node, 'style') : undefined;
    if (style && style !== 'none') {
      return { borderStyle: style };
    }
  }
  return {};
}

// ============================================================================
// Worksheets
// ============================================================================

async function readWorksheet(
  pkg: OoxmlPackage,
  sheet: SheetEntry,
  sharedStrings: readonly string[],
  styles: readonly FormattingAttributes[]
): Promise<TableCell[][]> {
  const worksheet = getRootElement(await requirePartAsXml(pkg, sheet.partPath), 'worksheet');
  const sheetData = worksheet ? getChild(worksheet, 'sheetData') : undefined;
  if (!sheetData) return [];

  const defaultFormatting = styles[0] ?? {};
  const blank = (): TableCell => tableCell('', { ...defaultFormatting });
  const rows: TableCell[][] = [];
  let nextRow = 0;

  for (const rowNode of getChildrenByTagName(sheetData, 'row')) {
    const r = parseInt(getAttribute(rowNode, 'r') ?? '', 10);
    const rowIndex = Number.isInteger(r) && r >= 1 ? r - 1 : nextRow;
    nextRow = rowIndex + 1;

    while (rows.length <= rowIndex) {
      rows.push([]);
    }
    const row = rows[rowIndex];

    let nextColumn = 0;
    for (const cellNode of getChildrenByTagName(rowNode, 'c')) {
      const address = parseCellAddress(getAttribute(cellNode, 'r') ?? '');
      const column = address ? address.column : nextColumn;
      nextColumn = column + 1;

      while (row.length < column) {
        row.push(blank());
      }
      row[column] = readCell(cellNode, sharedStrings, styles, defaultFormatting);
    }
  }

  return rows;
}

function readCell(
  cellNode: XmlNode,
  sharedStrings: readonly string[],
  styles: readonly FormattingAttributes[],
  defaultFormatting: FormattingAttributes
): TableCell {
  const styleId = getAttribute(cellNode, 's');
  const formatting = styleId === undefined ? defaultFormatting : (styles[parseInt(styleId, 10)] ?? {});
  return tableCell(cellText(cellNode, sharedStrings), { ...formatting });
}

/**
 * Displayed text of a cell. Formulas are shown by their cached value.
 */
function cellText(cellNode: XmlNode, sharedStrings: readonly string[]): string {
  const type = getAttribute(cellNode, 't');

  if (type === 'inlineStr') {
    const inline = getChild(cellNode, 'is');
    return inline ? extractItemText(inline) : '';
  }

  const valueNode = getChild(cellNode, 'v');
  const raw = valueNode ? getTextContent(valueNode) : '';

  switch (type) {
    case 's': {
      const index = parseInt(raw, 10);
      return sharedStrings[index] ?? '';
    }
    case 'b':
      return raw === '' ? '' : raw === '1' ? 'TRUE' : 'FALSE';
    default:
      return raw;
  }
}
