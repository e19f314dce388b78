/**
 * Core type definitions for document comparison
 */

import type { ComparisonErrorKind } from './core/errors';
import type { FormattingAttributes, FormattingField, FormattingValue, ImageAnchor } from './model/document';

// ============================================================================
// Settings
// ============================================================================

/**
 * Settings for a comparison. Passed per call; nothing is kept between calls.
 */
export interface ComparerSettings {
  /**
   * Word-level similarity (0-1) at or above which a replaced line is
   * reported as one modification instead of a deletion plus an addition.
   * Default: 0.8
   */
  similarityThreshold?: number;

  /**
   * Structural similarity (0-1) at or above which two images are
   * considered to have the same content. Default: 0.95
   */
  imageSimilarityThreshold?: number;

  /**
   * Largest width or height difference, in pixels, that is not reported
   * as a dimension change. Default: 0
   */
  dimensionTolerance?: number;

  /** Receives diagnostic messages */
  logCallback?: (message: string) => void;
}

export interface ResolvedSettings {
  similarityThreshold: number;
  imageSimilarityThreshold: number;
  dimensionTolerance: number;
  logCallback?: (message: string) => void;
}

// ============================================================================
// Change records
// ============================================================================

export type ChangeType = 'added' | 'deleted' | 'modified';

export type ChangeCategory = 'text' | 'formatting' | 'table' | 'image' | 'structural';

/**
 * Reason a single element could not be compared
 */
export interface ChangeFailure {
  kind: ComparisonErrorKind;
  reason: string;
}

interface ChangeRecordBase<C extends ChangeCategory, V, D> {
  category: C;
  changeType: ChangeType;
  /** Human-addressable position, e.g. "paragraph 3" or "table 1, cell B2" */
  location: string;
  before?: V;
  after?: V;
  detail?: D;
  /** Present when the element could not be compared */
  error?: ChangeFailure;
}

/**
 * A run of word-level diff output
 */
export interface DiffSegment {
  type: 'equal' | 'insert' | 'delete';
  value: string;
}

/**
 * One-based inclusive line range
 */
export interface LineRange {
  start: number;
  end: number;
}

export interface TextChangeDetail {
  linesBefore?: LineRange;
  linesAfter?: LineRange;
  /** Word-level similarity of a replaced span */
  similarity?: number;
  segments?: DiffSegment[];
  addedTerms?: string[];
  deletedTerms?: string[];
}

export interface AttributeChange {
  attribute: FormattingField;
  before?: FormattingValue;
  after?: FormattingValue;
}

export interface FormattingChangeDetail {
  attributes: AttributeChange[];
}

export type TableChangeDetail =
  | { kind: 'table'; rowCount: number }
  | { kind: 'row'; row: number; columnCount: number }
  | { kind: 'columns' }
  | ({ kind: 'cell-text'; cell: string; row: number; column: number } & TextChangeDetail)
  | { kind: 'cell-formatting'; cell: string; row: number; column: number; attributes: AttributeChange[] };

export type TableChangeValue =
  | string
  | number
  | readonly string[]
  | readonly (readonly string[])[]
  | FormattingAttributes;

export interface ImageSnapshot {
  width: number;
  height: number;
  anchor?: ImageAnchor;
}

export interface ImageChangeDetail {
  /** Structural similarity of the compared rasters */
  similarity?: number;
  /** Revised minus original, when beyond the dimension tolerance */
  dimensionDelta?: { width: number; height: number };
  moved?: boolean;
  contentChanged?: boolean;
}

export type StructuralField = 'format' | 'pageCount' | 'sheetCount' | 'sheetNames';

export type StructuralChangeValue = string | number | readonly string[];

export interface StructuralChangeDetail {
  field: StructuralField;
}

export type TextChange = ChangeRecordBase<'text', string, TextChangeDetail>;
export type FormattingChange = ChangeRecordBase<'formatting', FormattingAttributes, FormattingChangeDetail>;
export type TableChange = ChangeRecordBase<'table', TableChangeValue, TableChangeDetail>;
export type ImageChange = ChangeRecordBase<'image', ImageSnapshot, ImageChangeDetail>;
export type StructuralChange = ChangeRecordBase<'structural', StructuralChangeValue, StructuralChangeDetail>;

export type ChangeRecord = TextChange | FormattingChange | TableChange | ImageChange | StructuralChange;

// ============================================================================
// Result
// ============================================================================

export type Severity = 'low' | 'medium' | 'high';

export interface Summary {
  textChanges: number;
  formattingChanges: number;
  tableChanges: number;
  imageChanges: number;
  structuralChanges: number;
  totalChanges: number;
  /** Records that carry an error instead of a comparison outcome */
  errorCount: number;
  severity: Severity;
}

export interface ComparisonResult {
  textChanges: readonly TextChange[];
  formattingChanges: readonly FormattingChange[];
  tableChanges: readonly TableChange[];
  imageChanges: readonly ImageChange[];
  structuralChanges: readonly StructuralChange[];
  summary: Summary;
}
