/**
 * Normalized document model
 *
 * Format-agnostic representation of a word-processor document, workbook or
 * paginated document. Parsers produce it; every comparison engine consumes it.
 * A Document belongs to one comparison request and is never mutated after
 * it is built.
 */

import { CorruptDocumentError } from '../core/errors';
import { hashBytes, hashString } from '../core/hash';

export type DocumentFormat = 'docx' | 'xlsx' | 'pdf';

/**
 * Formatting of a paragraph or cell. An absent field is inherited or
 * unspecified, which is distinct from any concrete value.
 */
export interface FormattingAttributes {
  fontName?: string;
  /** Points */
  fontSize?: number;
  color?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  borderStyle?: string;
  fillColor?: string;
}

export type FormattingField = keyof FormattingAttributes;
export type FormattingValue = NonNullable<FormattingAttributes[FormattingField]>;

/**
 * Fields in reporting order
 */
export const FORMATTING_FIELDS = [
  'fontName',
  'fontSize',
  'color',
  'bold',
  'italic',
  'underline',
  'borderStyle',
  'fillColor',
] as const satisfies readonly FormattingField[];

export interface TextBlock {
  kind: 'text';
  position: number;
  text: string;
  formatting: FormattingAttributes;
}

export interface TableCell {
  text: string;
  formatting: FormattingAttributes;
}

export type TableRow = readonly TableCell[];

export interface TableBlock {
  kind: 'table';
  position: number;
  rows: readonly TableRow[];
  /** Sheet name for spreadsheet tables */
  name?: string;
}

export type ChannelCount = 1 | 3 | 4;

export interface ImageAnchor {
  x: number;
  y: number;
}

export interface ImageBlock {
  kind: 'image';
  position: number;
  width: number;
  height: number;
  channels: ChannelCount;
  /** 8-bit samples, row-major, channels interleaved */
  pixels: Uint8Array;
  anchor?: ImageAnchor;
  /** Set by a parser that found the picture but could not decode it */
  decodeError?: string;
}

export type Block = TextBlock | TableBlock | ImageBlock;
export type BlockKind = Block['kind'];

export interface DocumentMetadata {
  format?: DocumentFormat;
  pageCount?: number;
  sheetCount?: number;
  sheetNames?: readonly string[];
}

export interface Document {
  blocks: readonly Block[];
  metadata: DocumentMetadata;
}

const BLOCK_KINDS: ReadonlySet<string> = new Set<BlockKind>(['text', 'table', 'image']);
const FORMATS: ReadonlySet<string> = new Set<DocumentFormat>(['docx', 'xlsx', 'pdf']);

// ============================================================================
// Builders
// ============================================================================

/**
 * A block before it has been given its position in the document
 */
export type BlockDraft =
  | Omit<TextBlock, 'position'>
  | Omit<TableBlock, 'position'>
  | Omit<ImageBlock, 'position'>;

/**
 * Build a document, numbering blocks by their order
 */
export function createDocument(
  drafts: readonly BlockDraft[],
  metadata: DocumentMetadata = {}
): Document {
  const blocks = drafts.map((draft, position): Block => ({ ...draft, position }));
  return { blocks, metadata };
}

export function textBlock(text: string, formatting: FormattingAttributes = {}): Omit<TextBlock, 'position'> {
  return { kind: 'text', text, formatting };
}

export function tableCell(text: string, formatting: FormattingAttributes = {}): TableCell {
  return { text, formatting };
}

/**
 * Build a table from cell texts or ready-made cells
 */
export function tableBlock(
  rows: readonly (readonly (string | TableCell)[])[],
  name?: string
): Omit<TableBlock, 'position'> {
  const cells = rows.map((row) =>
    row.map((cell) => (typeof cell === 'string' ? tableCell(cell) : cell))
  );
  return name === undefined ? { kind: 'table', rows: cells } : { kind: 'table', rows: cells, name };
}

export function imageBlock(
  width: number,
  height: number,
  channels: ChannelCount,
  pixels: Uint8Array,
  extra: Pick<ImageBlock, 'anchor' | 'decodeError'> = {}
): Omit<ImageBlock, 'position'> {
  return { kind: 'image', width, height, channels, pixels, ...extra };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Reject documents whose block list or metadata cannot be read at all.
 *
 * Element-level problems (a malformed table, a bad raster) are left to the
 * comparison engines so they can be reported per element.
 */
export function validateDocument(doc: Document, label: string): void {
  if (!doc || !Array.isArray(doc.blocks)) {
    throw new CorruptDocumentError(`${label} document has no readable block list`, {
      location: label,
    });
  }

  doc.blocks.forEach((block, index) => {
    if (!block || !BLOCK_KINDS.has(block.kind)) {
      throw new CorruptDocumentError(`${label} block ${index} has an unknown variant`, {
        location: `${label} block ${index}`,
      });
    }
  });

  const metadata = doc.metadata;
  if (!metadata || typeof metadata !== 'object') {
    throw new CorruptDocumentError(`${label} document has no readable metadata`, {
      location: label,
    });
  }

  if (metadata.format !== undefined && !FORMATS.has(metadata.format)) {
    throw new CorruptDocumentError(`${label} document has unknown format "${metadata.format}"`, {
      location: `${label} format`,
    });
  }

  for (const field of ['pageCount', 'sheetCount'] as const) {
    const value = metadata[field];
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new CorruptDocumentError(`${label} ${field} is not a non-negative integer: ${value}`, {
        location: `${label} ${field}`,
      });
    }
  }

  if (metadata.sheetNames !== undefined) {
    if (
      !Array.isArray(metadata.sheetNames) ||
      metadata.sheetNames.some((name) => typeof name !== 'string')
    ) {
      throw new CorruptDocumentError(`${label} sheet names are not a list of strings`, {
        location: `${label} sheetNames`,
      });
    }
  }
}

/**
 * Check the structure of a table: every row a list, every cell a text with
 * a formatting object. Rows may differ in length.
 */
export function isWellFormedTable(table: TableBlock): boolean {
  if (!Array.isArray(table.rows)) return false;
  return table.rows.every(
    (row) =>
      Array.isArray(row) &&
      row.every(
        (cell) =>
          typeof cell === 'object' &&
          cell !== null &&
          typeof cell.text === 'string' &&
          typeof cell.formatting === 'object' &&
          cell.formatting !== null
      )
  );
}

// ============================================================================
// Content keys
// ============================================================================

/**
 * Canonical string for a formatting object, stable under key order
 */
export function formattingKey(formatting: FormattingAttributes): string {
  return JSON.stringify(FORMATTING_FIELDS.map((field) => formatting[field] ?? null));
}

/**
 * Content hash of a block: variant plus content. The position is not part of
 * it, so a block keeps its identity when content is inserted before it.
 * Block equality for alignment is therefore content equality, not "same
 * variant, same position, same content".
 */
export function blockHash(block: Block): string {
  switch (block.kind) {
    case 'text':
      return hashString(`text\u0000${block.text}\u0000${formattingKey(block.formatting ?? {})}`);

    case 'table': {
      const content = isWellFormedTable(block)
        ? JSON.stringify(block.rows.map((row) => row.map((cell) => [cell.text, formattingKey(cell.formatting)])))
        : `malformed\u0000${JSON.stringify(block.rows)}`;
      return hashString(`table\u0000${block.name ?? ''}\u0000${content}`);
    }

    case 'image': {
      const pixels = block.pixels instanceof Uint8Array ? hashBytes(block.pixels) : 'unreadable';
      const anchor = block.anchor ? `${block.anchor.x},${block.anchor.y}` : '';
      return hashString(
        `image\u0000${block.width}x${block.height}x${block.channels}\u0000${anchor}\u0000${block.decodeError ?? ''}\u0000${pixels}`
      );
    }
  }
}
