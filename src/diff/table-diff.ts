// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.

import { alignWithPairing, type Hashable } from '../core/lcs';
import { CorruptDocumentError } from '../core/errors';
import { cellAddress } from '../model/address';
import { isWellFormedTable, tableCell, type TableBlock, type TableCell, type TableRow } from '../model/document';
import type { TableChange } from '../types';
import { compareLines } from './text-diff';
import { diffFormatting } from './formatting-diff';

interface RowUnit extends Hashable {
  index: number;
  row: TableRow;
}

const EMPTY_CELL: TableCell = tableCell('');

/**
 * Compare two versions of a table.
 *
 * Rows are aligned by their cell texts. Unequal rows between two matches
 * are paired in order; surplus rows are reported whole as added or deleted.
 * Paired rows are padded with empty cells to the same width and compared
 * cell by cell.
 *
 * @param label Location prefix, e.g. `table 2` or `sheet "Budget"`
 * @throws CorruptDocumentError if either table is not well formed
 */
export function compareTables(
  table1: TableBlock,
  table2: TableBlock,
  label: string,
  similarityThreshold: number
): TableChange[] {
  if (!isWellFormedTable(table1) || !isWellFormedTable(table2)) {
    throw new CorruptDocumentError(`${label} has rows or cells that are not well formed`, {
      location: label,
    });
  }

  const rows1 = toRowUnits(table1);
  const rows2 = toRowUnits(table2);
  const rowChanges: TableChange[] = [];
  // Widest paired row on each side
  let columns1 = 0;
  let columns2 = 0;

  for (const step of alignWithPairing(rows1, rows2)) {
    switch (step.op) {
      case 'equal':
      case 'pair':
        columns1 = Math.max(columns1, step.item1.row.length);
        columns2 = Math.max(columns2, step.item2.row.length);
        for (const change of compareRows(step.item1, step.item2, label, similarityThreshold)) {
          rowChanges.push(change);
        }
        break;
      case 'delete':
        rowChanges.push(rowRecord('deleted', step.item1, label));
        break;
      case 'insert':
        rowChanges.push(rowRecord('added', step.item2, label));
        break;
    }
  }

  if (columns1 === columns2) {
    return rowChanges;
  }

  const changes: TableChange[] = [
    {
      category: 'table',
      changeType: 'modified',
      location: `${label}, columns`,
      before: columns1,
      after: columns2,
      detail: { kind: 'columns' },
    },
  ];
  for (const change of rowChanges) {
    changes.push(change);
  }
  return changes;
}

function toRowUnits(table: TableBlock): RowUnit[] {
  return table.rows.map((row, index) => ({
    index,
    row,
    hash: JSON.stringify(row.map((cell) => cell.text)),
  }));
}

export function rowTexts(row: TableRow): string[] {
  return row.map((cell) => cell.text);
}

function rowRecord(changeType: 'added' | 'deleted', unit: RowUnit, label: string): TableChange {
  const rowNumber = unit.index + 1;
  return {
    category: 'table',
    changeType,
    location: `${label}, row ${rowNumber}`,
    ...(changeType === 'added' ? { after: rowTexts(unit.row) } : { before: rowTexts(unit.row) }),
    detail: { kind: 'row', row: rowNumber, columnCount: unit.row.length },
  };
}

/**
 * Cell-by-cell comparison of a matched row pair. Cell addresses use the
 * revised row number.
 */
function compareRows(
  unit1: RowUnit,
  unit2: RowUnit,
  label: string,
  similarityThreshold: number
): TableChange[] {
  const changes: TableChange[] = [];
  const width = Math.max(unit1.row.length, unit2.row.length);

  for (let column = 0; column < width; column++) {
    const cell1 = unit1.row[column];
    const cell2 = unit2.row[column];
    const cell = cellAddress(unit2.index, column);
    const location = `${label}, cell ${cell}`;
    const position = { cell, row: unit2.index + 1, column: column + 1 };

    const text1 = (cell1 ?? EMPTY_CELL).text;
    const text2 = (cell2 ?? EMPTY_CELL).text;
    for (const change of compareLines(cellLines(text1), cellLines(text2), similarityThreshold)) {
      const { linesBefore: _before, linesAfter: _after, ...detail } = change.detail;
      changes.push({
        category: 'table',
        changeType: change.changeType,
        location,
        ...(change.before !== undefined ? { before: change.before } : {}),
        ...(change.after !== undefined ? { after: change.after } : {}),
        detail: { kind: 'cell-text', ...position, ...detail },
      });
    }

    if (cell1 && cell2) {
      const attributes = diffFormatting(cell1.formatting, cell2.formatting);
      if (attributes.length > 0) {
        changes.push({
          category: 'table',
          changeType: 'modified',
          location,
          before: { ...cell1.formatting },
          after: { ...cell2.formatting },
          detail: { kind: 'cell-formatting', ...position, attributes },
        });
      }
    }
  }

  return changes;
}

/**
 * A cell is one line; an empty cell has none
 */
function cellLines(text: string): string[] {
  return text === '' ? [] : [text];
}
