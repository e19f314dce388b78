/**
 * Parsing entry point: bytes plus a format hint to a normalized document
 */

import { UnsupportedFormatError } from '../core/errors';
import type { Document } from '../model/document';
import { parseDocx } from './docx';
import { parseXlsx } from './xlsx';
import type { ParseOptions, SupportedFormat } from './types';

export type { ParseOptions, SupportedFormat } from './types';
export { parseDocx } from './docx';
export { parseXlsx } from './xlsx';
export { decodeImage, type DecodedRaster } from './image-decoder';

/**
 * Format named by a hint: a format name, an extension or a file name
 * ("docx", ".XLSX", "report.docx")
 */
export function resolveFormat(formatHint: string): string {
  const hint = formatHint.trim().toLowerCase();
  const dot = hint.lastIndexOf('.');
  return dot >= 0 ? hint.slice(dot + 1) : hint;
}

export function isSupportedFormat(format: string): format is SupportedFormat {
  return format === 'docx' || format === 'xlsx';
}

/**
 * Parse document bytes
 *
 * @throws UnsupportedFormatError for pdf and any other format without a parser
 * @throws CorruptDocumentError if the bytes cannot be read as the named format
 */
export async function parse(
  data: Buffer | Uint8Array | ArrayBuffer,
  formatHint: string,
  options: ParseOptions = {}
): Promise<Document> {
  const format = resolveFormat(formatHint);

  switch (format) {
    case 'docx':
      return parseDocx(data, options);
    case 'xlsx':
      return parseXlsx(data, options);
    case 'pdf':
      throw new UnsupportedFormatError('PDF documents cannot be parsed; supply a normalized document instead', {
        location: formatHint,
      });
    default:
      throw new UnsupportedFormatError(`Unsupported document format "${formatHint}"`, {
        location: formatHint,
      });
  }
}
