/**
 * docdelta - structured change detection between two document versions
 *
 * @packageDocumentation
 */

export * from './types';
export * from './core';
export * from './model/document';
export * from './model/address';

export { normalizeSettings } from './settings';
export { compare, compareMetadata, severityFor } from './comparer';

export { compareText, compareLines, similarityRatio, diffWords, splitLines, tokenize } from './diff/text-diff';
export { compareFormatting, diffFormatting } from './diff/formatting-diff';
export { compareTables } from './diff/table-diff';
export { compareImages, imageSimilarity } from './diff/image-diff';
export { structuralSimilarity } from './image/ssim';
export { toLuminance, resizeArea, type LumaRaster } from './image/raster';

export {
  toReportPayload,
  buildChangeList,
  describeChange,
  type ReportPayload,
  type ReportRecord,
  type ChangeListItem,
  type ChangeListOptions,
  type ChangeWordCount,
} from './report';

export { parse, parseDocx, parseXlsx, resolveFormat, type ParseOptions } from './parse';
