// Copyright (c) Microsoft. All rights reserved.
// Licensed under MIT license. See LICENSE file in the project root for full license information.

/**
 * DocumentComparer - change aggregation over two normalized documents
 *
 * Named tables (sheets) pair by name. The other blocks are aligned by
 * content hash, and unequal blocks of one variant between two matches are
 * paired. Pairs go to the engine for their variant; unpaired blocks become
 * one added or deleted record each. Document metadata is compared field by
 * field.
 */

import { alignWithPairing, type AlignmentStep, type Hashable } from './core/lcs';
import { CorruptDocumentError, describeFailure } from './core/errors';
import {
  blockHash,
  isWellFormedTable,
  validateDocument,
  type Block,
  type BlockKind,
  type Document,
  type DocumentMetadata,
  type ImageBlock,
  type TableBlock,
  type TextBlock,
} from './model/document';
import { normalizeSettings, log } from './settings';
import { compareText } from './diff/text-diff';
import { compareFormatting } from './diff/formatting-diff';
import { compareTables, rowTexts } from './diff/table-diff';
import { compareImages, imageSnapshot } from './diff/image-diff';
import { assertDecodable } from './image/raster';
import type {
  ChangeFailure,
  ChangeRecord,
  ComparerSettings,
  ComparisonResult,
  FormattingChange,
  ImageChange,
  ResolvedSettings,
  Severity,
  StructuralChange,
  StructuralChangeValue,
  StructuralField,
  Summary,
  TableChange,
  TextChange,
} from './types';

interface BlockUnit extends Hashable {
  block: Block;
  /** Index in the document's block list */
  index: number;
  /** One-based index among blocks of the same variant */
  ordinal: number;
}

interface ChangeCollector {
  text: TextChange[];
  formatting: FormattingChange[];
  table: TableChange[];
  image: ImageChange[];
}

/**
 * Compare two documents.
 *
 * Pure and synchronous: the same inputs and settings always give an
 * identical, deep-frozen result.
 *
 * @throws ConfigurationError if a setting is out of range
 * @throws CorruptDocumentError if either document's blocks or metadata are unreadable
 */
export function compare(
  original: Document,
  revised: Document,
  settings: ComparerSettings = {}
): ComparisonResult {
  const resolved = normalizeSettings(settings);
  validateDocument(original, 'original');
  validateDocument(revised, 'revised');

  log(
    resolved,
    `DocumentComparer.compare: ${original.blocks.length} original blocks, ${revised.blocks.length} revised blocks`
  );

  const units1 = toBlockUnits(original.blocks);
  const units2 = toBlockUnits(revised.blocks);
  const changes: ChangeCollector = { text: [], formatting: [], table: [], image: [] };

  const { named, rest1, rest2 } = pairTablesByName(units1, units2);
  let nextNamed = 0;
  const flushNamed = (beforeIndex: number): void => {
    while (nextNamed < named.length && named[nextNamed][0].index < beforeIndex) {
      const [unit1, unit2] = named[nextNamed++];
      if (unit1.hash !== unit2.hash) {
        comparePair(unit1, unit2, changes, resolved);
      }
    }
  };

  for (const step of alignWithPairing(rest1, rest2, blockGroup)) {
    if (step.op !== 'insert') {
      flushNamed(step.item1.index);
    }
    handleStep(step, changes, resolved);
  }
  flushNamed(Infinity);

  const structural = compareMetadata(original.metadata, revised.metadata);
  const summary = summarize(changes, structural);

  log(
    resolved,
    `DocumentComparer.compare: ${summary.totalChanges} changes, ${summary.errorCount} errors, severity ${summary.severity}`
  );

  return deepFreeze({
    textChanges: changes.text,
    formattingChanges: changes.formatting,
    tableChanges: changes.table,
    imageChanges: changes.image,
    structuralChanges: structural,
    summary,
  });
}

function toBlockUnits(blocks: readonly Block[]): BlockUnit[] {
  const counters: Record<BlockKind, number> = { text: 0, table: 0, image: 0 };
  return blocks.map((block, index) => ({
    block,
    index,
    ordinal: ++counters[block.kind],
    hash: blockHash(block),
  }));
}

const BLOCK_GROUPS: Record<BlockKind, number> = { table: 0, image: 1, text: 2 };

function blockGroup(unit: BlockUnit): number {
  return BLOCK_GROUPS[unit.block.kind];
}

/**
 * The k-th original table named N pairs with the k-th revised table named N,
 * wherever the two sit in their documents.
 */
function pairTablesByName(
  units1: BlockUnit[],
  units2: BlockUnit[]
): { named: Array<[BlockUnit, BlockUnit]>; rest1: BlockUnit[]; rest2: BlockUnit[] } {
  const byName = new Map<string, BlockUnit[]>();
  for (const unit of units2) {
    if (unit.block.kind === 'table' && unit.block.name !== undefined) {
      const queue = byName.get(unit.block.name) ?? [];
      queue.push(unit);
      byName.set(unit.block.name, queue);
    }
  }

  const named: Array<[BlockUnit, BlockUnit]> = [];
  const taken = new Set<BlockUnit>();
  const rest1: BlockUnit[] = [];
  for (const unit of units1) {
    const queue =
      unit.block.kind === 'table' && unit.block.name !== undefined
        ? byName.get(unit.block.name)
        : undefined;
    const unit2 = queue?.shift();
    if (unit2) {
      named.push([unit, unit2]);
      taken.add(unit2);
    } else {
      rest1.push(unit);
    }
  }

  return { named, rest1, rest2: units2.filter((unit) => !taken.has(unit)) };
}

function handleStep(
  step: AlignmentStep<BlockUnit>,
  changes: ChangeCollector,
  settings: ResolvedSettings
): void {
  switch (step.op) {
    case 'equal':
      break;
    case 'pair':
      comparePair(step.item1, step.item2, changes, settings);
      break;
    case 'delete':
      reportUnmatched('deleted', step.item1, changes, settings);
      break;
    case 'insert':
      reportUnmatched('added', step.item2, changes, settings);
      break;
  }
}

export function blockLabel(block: Block, ordinal: number): string {
  switch (block.kind) {
    case 'text':
      return `paragraph ${ordinal}`;
    case 'table':
      return block.name !== undefined ? `sheet "${block.name}"` : `table ${ordinal}`;
    case 'image':
      return `image ${ordinal}`;
  }
}

// ============================================================================
// Matched pairs
// ============================================================================

function comparePair(
  unit1: BlockUnit,
  unit2: BlockUnit,
  changes: ChangeCollector,
  settings: ResolvedSettings
): void {
  const block1 = unit1.block;
  const block2 = unit2.block;
  const location = blockLabel(block2, unit2.ordinal);

  if (block1.kind === 'text' && block2.kind === 'text') {
    compareTextBlocks(block1, block2, location, changes, settings);
  } else if (block1.kind === 'table' && block2.kind === 'table') {
    const tableChanges = guarded(
      settings,
      location,
      () => compareTables(block1, block2, location, settings.similarityThreshold),
      (failure): TableChange => ({ category: 'table', changeType: 'modified', ...failure })
    );
    for (const change of tableChanges) {
      changes.table.push(change);
    }
  } else if (block1.kind === 'image' && block2.kind === 'image') {
    changes.image.push(
      ...guarded(
        settings,
        location,
        () => {
          const change = compareImages(block1, block2, location, settings);
          return change ? [change] : [];
        },
        (failure): ImageChange => ({ category: 'image', changeType: 'modified', ...failure })
      )
    );
  }
}

function compareTextBlocks(
  block1: TextBlock,
  block2: TextBlock,
  location: string,
  changes: ChangeCollector,
  settings: ResolvedSettings
): void {
  for (const change of compareText(block1.text, block2.text, location, settings.similarityThreshold)) {
    changes.text.push(change);
  }

  const formatting = compareFormatting(block1.formatting, block2.formatting, location);
  if (formatting) {
    changes.formatting.push(formatting);
  }
}

/**
 * Run one element comparison. A corrupt element becomes a single
 * error-marked record; anything else propagates.
 */
function guarded<T extends ChangeRecord>(
  settings: ResolvedSettings,
  location: string,
  run: () => T[],
  toRecord: (failure: { location: string; error: ChangeFailure }) => T
): T[] {
  try {
    return run();
  } catch (error) {
    if (!(error instanceof CorruptDocumentError)) {
      throw error;
    }
    const reason = describeFailure(error);
    log(settings, `DocumentComparer.compare: ${location} could not be compared: ${reason}`);
    return [toRecord({ location: error.location ?? location, error: { kind: error.kind, reason } })];
  }
}

// ============================================================================
// Unmatched blocks
// ============================================================================

function reportUnmatched(
  changeType: 'added' | 'deleted',
  unit: BlockUnit,
  changes: ChangeCollector,
  settings: ResolvedSettings
): void {
  const block = unit.block;
  const location = blockLabel(block, unit.ordinal);

  switch (block.kind) {
    case 'text':
      changes.text.push({
        category: 'text',
        changeType,
        location,
        ...(changeType === 'added' ? { after: block.text } : { before: block.text }),
      });
      break;

    case 'table':
      changes.table.push(tableRecord(changeType, block, location, settings));
      break;

    case 'image':
      changes.image.push(
        ...guarded(
          settings,
          location,
          () => [imageRecord(changeType, block, location)],
          (failure): ImageChange => ({ category: 'image', changeType: 'modified', ...failure })
        )
      );
      break;
  }
}

function tableRecord(
  changeType: 'added' | 'deleted',
  table: TableBlock,
  location: string,
  settings: ResolvedSettings
): TableChange {
  if (!isWellFormedTable(table)) {
    const reason = `${location} has rows or cells that are not well formed`;
    log(settings, `DocumentComparer.compare: ${reason}`);
    return {
      category: 'table',
      changeType: 'modified',
      location,
      error: { kind: 'CorruptDocument', reason },
    };
  }

  const rows = table.rows.map(rowTexts);
  return {
    category: 'table',
    changeType,
    location,
    ...(changeType === 'added' ? { after: rows } : { before: rows }),
    detail: { kind: 'table', rowCount: rows.length },
  };
}

/**
 * @throws CorruptDocumentError if the image was not decoded
 */
function imageRecord(changeType: 'added' | 'deleted', image: ImageBlock, location: string): ImageChange {
  assertDecodable(image, location);
  const snapshot = imageSnapshot(image);
  return {
    category: 'image',
    changeType,
    location,
    ...(changeType === 'added' ? { after: snapshot } : { before: snapshot }),
  };
}

// ============================================================================
// Metadata
// ============================================================================

const STRUCTURAL_FIELDS: ReadonlyArray<{ field: StructuralField; label: string }> = [
  { field: 'format', label: 'document format' },
  { field: 'pageCount', label: 'page count' },
  { field: 'sheetCount', label: 'sheet count' },
  { field: 'sheetNames', label: 'sheet names' },
];

function metadataValue(
  metadata: DocumentMetadata,
  field: StructuralField
): StructuralChangeValue | undefined {
  const value = metadata[field];
  return typeof value === 'object' ? [...value] : value;
}

function sameValue(a: StructuralChangeValue, b: StructuralChangeValue): boolean {
  if (typeof a === 'object' && typeof b === 'object') {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

/**
 * One record per differing metadata field
 */
export function compareMetadata(
  original: DocumentMetadata,
  revised: DocumentMetadata
): StructuralChange[] {
  const changes: StructuralChange[] = [];

  for (const { field, label } of STRUCTURAL_FIELDS) {
    const before = metadataValue(original, field);
    const after = metadataValue(revised, field);

    if (before === undefined && after === undefined) continue;
    if (before !== undefined && after !== undefined && sameValue(before, after)) continue;

    const changeType = before === undefined ? 'added' : after === undefined ? 'deleted' : 'modified';
    const change: StructuralChange = {
      category: 'structural',
      changeType,
      location: label,
      detail: { field },
    };
    if (before !== undefined) change.before = before;
    if (after !== undefined) change.after = after;
    changes.push(change);
  }

  return changes;
}

// ============================================================================
// Summary
// ============================================================================

export function severityFor(totalChanges: number): Severity {
  if (totalChanges > 50) return 'high';
  if (totalChanges > 10) return 'medium';
  return 'low';
}

function summarize(changes: ChangeCollector, structural: StructuralChange[]): Summary {
  const all: ChangeRecord[] = [
    ...changes.text,
    ...changes.formatting,
    ...changes.table,
    ...changes.image,
    ...structural,
  ];

  return {
    textChanges: changes.text.length,
    formattingChanges: changes.formatting.length,
    tableChanges: changes.table.length,
    imageChanges: changes.image.length,
    structuralChanges: structural.length,
    totalChanges: all.length,
    errorCount: all.filter((change) => change.error !== undefined).length,
    severity: severityFor(all.length),
  };
}

function deepFreeze<T>(value: T): T {
  freezeAll(value);
  return value;
}

function freezeAll(value: unknown): void {
  if (typeof value !== 'object' || value === null || ArrayBuffer.isView(value)) return;
  const children: unknown[] = Object.values(value);
  children.forEach(freezeAll);
  Object.freeze(value);
}
