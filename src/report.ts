/**
 * Report helpers: the serialized payload consumed by report renderers, a
 * flat change list for navigation, and one-line change descriptions.
 */

import type {
  ChangeCategory,
  ChangeFailure,
  ChangeRecord,
  ChangeType,
  ComparisonResult,
  DiffSegment,
  Severity,
} from './types';

// ============================================================================
// Report payload
// ============================================================================

export interface ReportRecord {
  change_type: ChangeType;
  location: string;
  before?: ChangeRecord['before'];
  after?: ChangeRecord['after'];
  detail?: ChangeRecord['detail'];
  error?: ChangeFailure;
}

export interface ReportPayload {
  summary: {
    total_changes: number;
    text_changes_count: number;
    formatting_changes_count: number;
    table_changes_count: number;
    image_changes_count: number;
    structural_changes_count: number;
    severity: Severity;
  };
  text_changes: ReportRecord[];
  formatting_changes: ReportRecord[];
  table_changes: ReportRecord[];
  image_changes: ReportRecord[];
  structural_changes: ReportRecord[];
}

/**
 * Serialize a result into the snake_case payload report renderers depend on
 */
export function toReportPayload(result: ComparisonResult): ReportPayload {
  const { summary } = result;
  return {
    summary: {
      total_changes: summary.totalChanges,
      text_changes_count: summary.textChanges,
      formatting_changes_count: summary.formattingChanges,
      table_changes_count: summary.tableChanges,
      image_changes_count: summary.imageChanges,
      structural_changes_count: summary.structuralChanges,
      severity: summary.severity,
    },
    text_changes: result.textChanges.map(toReportRecord),
    formatting_changes: result.formattingChanges.map(toReportRecord),
    table_changes: result.tableChanges.map(toReportRecord),
    image_changes: result.imageChanges.map(toReportRecord),
    structural_changes: result.structuralChanges.map(toReportRecord),
  };
}

function toReportRecord(change: ChangeRecord): ReportRecord {
  const record: ReportRecord = { change_type: change.changeType, location: change.location };
  if (change.before !== undefined) record.before = change.before;
  if (change.after !== undefined) record.after = change.after;
  if (change.detail !== undefined) record.detail = change.detail;
  if (change.error !== undefined) record.error = change.error;
  return record;
}

// ============================================================================
// Change list
// ============================================================================

export interface ChangeListOptions {
  /** Default: 100 */
  maxPreviewLength?: number;
  /** Categories to include, default all */
  categories?: readonly ChangeCategory[];
}

export interface ChangeWordCount {
  deleted: number;
  inserted: number;
}

export interface ChangeListItem {
  id: string;
  category: ChangeCategory;
  changeType: ChangeType;
  location: string;
  summary: string;
  previewText?: string;
  wordCount?: ChangeWordCount;
  anchor: string;
}

const CATEGORY_ORDER: readonly ChangeCategory[] = ['text', 'formatting', 'table', 'image', 'structural'];

/**
 * Flatten a result into one list, in category order, with per-category ids
 */
export function buildChangeList(
  result: ComparisonResult,
  options: ChangeListOptions = {}
): ChangeListItem[] {
  const maxPreviewLength = options.maxPreviewLength ?? 100;
  const included = new Set(options.categories ?? CATEGORY_ORDER);

  const byCategory: Record<ChangeCategory, readonly ChangeRecord[]> = {
    text: result.textChanges,
    formatting: result.formattingChanges,
    table: result.tableChanges,
    image: result.imageChanges,
    structural: result.structuralChanges,
  };

  const items: ChangeListItem[] = [];
  for (const category of CATEGORY_ORDER) {
    if (!included.has(category)) continue;

    byCategory[category].forEach((change, index) => {
      const item: ChangeListItem = {
        id: `${category}-${index + 1}`,
        category,
        changeType: change.changeType,
        location: change.location,
        summary: describeChange(change),
        anchor: buildAnchor(change.location),
      };

      const previewText = buildPreviewText(change, maxPreviewLength);
      if (previewText !== undefined) item.previewText = previewText;
      const wordCount = computeWordCount(change);
      if (wordCount !== undefined) item.wordCount = wordCount;

      items.push(item);
    });
  }

  return items;
}

function buildAnchor(location: string): string {
  return location
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Text carried by a record, for previews and word counts
 */
function textOf(value: ChangeRecord['before']): string | undefined {
  if (typeof value === 'string') return value;
  if (isStringList(value)) return value.join(' | ');
  if (isStringGrid(value)) return value.map((row) => row.join(' | ')).join('; ');
  return undefined;
}

function isStringGrid(value: unknown): value is readonly (readonly string[])[] {
  return Array.isArray(value) && value.every(isStringList);
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function segmentsOf(change: ChangeRecord): DiffSegment[] | undefined {
  if (change.category === 'text') return change.detail?.segments;
  if (change.category === 'table') {
    const detail = change.detail;
    return detail?.kind === 'cell-text' ? detail.segments : undefined;
  }
  return undefined;
}

function buildPreviewText(change: ChangeRecord, maxLength: number): string | undefined {
  const segments = segmentsOf(change);
  if (segments) {
    const parts: string[] = [];
    for (const segment of segments) {
      if (segment.type === 'delete') parts.push(`-"${segment.value}"`);
      else if (segment.type === 'insert') parts.push(`+"${segment.value}"`);
    }
    return truncate(parts.join(' '), maxLength);
  }

  const oldText = textOf(change.before);
  const newText = textOf(change.after);
  if (oldText !== undefined && newText !== undefined) {
    return truncate(`"${oldText}" → "${newText}"`, maxLength);
  }
  if (oldText !== undefined) {
    return truncate(`-"${oldText}"`, maxLength);
  }
  if (newText !== undefined) {
    return truncate(`+"${newText}"`, maxLength);
  }

  return undefined;
}

function countWords(text: string | undefined): number {
  if (!text) return 0;
  return text.trim().split(/\s+/).filter(Boolean).length;
}

function computeWordCount(change: ChangeRecord): ChangeWordCount | undefined {
  if (change.category !== 'text' && change.category !== 'table') return undefined;

  const segments = segmentsOf(change);
  let deleted: number;
  let inserted: number;
  if (segments) {
    deleted = segments
      .filter((s) => s.type === 'delete')
      .reduce((sum, s) => sum + countWords(s.value), 0);
    inserted = segments
      .filter((s) => s.type === 'insert')
      .reduce((sum, s) => sum + countWords(s.value), 0);
  } else {
    deleted = countWords(textOf(change.before));
    inserted = countWords(textOf(change.after));
  }

  return deleted > 0 || inserted > 0 ? { deleted, inserted } : undefined;
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

// ============================================================================
// Descriptions
// ============================================================================

const STRUCTURAL_LABELS = {
  format: 'Document format',
  pageCount: 'Page count',
  sheetCount: 'Sheet count',
  sheetNames: 'Sheet names',
} as const;

function formatValue(value: ChangeRecord['before']): string {
  if (value === undefined) return '';
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  const text = textOf(value);
  if (text !== undefined) return text;
  return JSON.stringify(value);
}

/**
 * One-line description of a change
 */
export function describeChange(change: ChangeRecord): string {
  if (change.error) {
    return `Could not compare ${change.location}: ${change.error.reason}`;
  }

  switch (change.category) {
    case 'text':
      return `Text ${change.changeType} at ${change.location}`;

    case 'formatting': {
      const fields = change.detail?.attributes.map((a) => a.attribute).join(', ') ?? '';
      return `Formatting changed at ${change.location}: ${fields}`;
    }

    case 'table': {
      const detail = change.detail;
      switch (detail?.kind) {
        case 'table':
          return `Table ${change.changeType} at ${change.location}`;
        case 'row':
          return `Row ${change.changeType} at ${change.location}`;
        case 'columns':
          return `Column count changed at ${change.location}: ${formatValue(change.before)} → ${formatValue(change.after)}`;
        case 'cell-formatting':
          return `Cell formatting changed at ${change.location}: ${detail.attributes
            .map((a) => a.attribute)
            .join(', ')}`;
        default:
          return `Cell text ${change.changeType} at ${change.location}`;
      }
    }

    case 'image': {
      if (change.changeType !== 'modified') {
        return `Image ${change.changeType} at ${change.location}`;
      }
      const parts: string[] = [];
      const detail = change.detail;
      if (detail?.contentChanged && detail.similarity !== undefined) {
        parts.push(`content changed (similarity ${detail.similarity.toFixed(3)})`);
      }
      if (detail?.dimensionDelta) {
        parts.push(`resized ${formatValue(change.before?.width)}x${formatValue(change.before?.height)} → ${formatValue(change.after?.width)}x${formatValue(change.after?.height)}`);
      }
      if (detail?.moved) {
        parts.push('moved');
      }
      return `Image modified at ${change.location}: ${parts.join(', ')}`;
    }

    case 'structural': {
      const label = change.detail ? STRUCTURAL_LABELS[change.detail.field] : change.location;
      if (change.changeType === 'added') return `${label} added: ${formatValue(change.after)}`;
      if (change.changeType === 'deleted') return `${label} removed: ${formatValue(change.before)}`;
      return `${label} changed: ${formatValue(change.before)} → ${formatValue(change.after)}`;
    }
  }
}
