/**
 * Text diff engine
 *
 * Lines are aligned with `computeOpcodes`. A replaced span is scored by
 * word-level similarity: at or above the threshold it is one modification,
 * below it a deletion plus an addition.
 */

import {
  computeCorrelation,
  computeOpcodes,
  countMatchedItems,
  flattenCorrelation,
  CorrelationStatus,
  type Hashable,
  type Opcode,
} from '../core/lcs';
import type { ChangeType, DiffSegment, LineRange, TextChange, TextChangeDetail } from '../types';

/**
 * A word, punctuation run or whitespace run
 */
interface WordToken extends Hashable {
  text: string;
}

interface LineUnit extends Hashable {
  text: string;
}

/**
 * One line-level outcome, before a location is attached
 */
export interface LineChange {
  changeType: ChangeType;
  before?: string;
  after?: string;
  detail: TextChangeDetail;
}

const TOKEN_PATTERN = /[\p{L}\p{N}_]+|[^\p{L}\p{N}_\s]+|\s+/gu;

/**
 * Split text into lines on newline. The empty string has no lines.
 */
export function splitLines(text: string): string[] {
  return text === '' ? [] : text.split('\n');
}

export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

function toTokens(text: string): WordToken[] {
  return tokenize(text).map((t) => ({ text: t, hash: t }));
}

/**
 * Word-level similarity in [0, 1]: twice the matched token count over the
 * total token count. Two empty texts are identical.
 */
export function similarityRatio(text1: string, text2: string): number {
  const tokens1 = toTokens(text1);
  const tokens2 = toTokens(text2);
  const total = tokens1.length + tokens2.length;
  if (total === 0) return 1;

  const matched = countMatchedItems(computeCorrelation(tokens1, tokens2));
  return (2 * matched) / total;
}

/**
 * Word-level diff of two texts
 */
export function diffWords(
  text1: string,
  text2: string
): { segments: DiffSegment[]; addedTerms: string[]; deletedTerms: string[] } {
  const sequences = flattenCorrelation(computeCorrelation(toTokens(text1), toTokens(text2)));
  const segments: DiffSegment[] = [];
  const addedTerms: string[] = [];
  const deletedTerms: string[] = [];

  for (const seq of sequences) {
    switch (seq.status) {
      case CorrelationStatus.Equal:
        if (seq.items1) {
          segments.push({ type: 'equal', value: joinTokens(seq.items1) });
        }
        break;
      case CorrelationStatus.Deleted:
        if (seq.items1) {
          segments.push({ type: 'delete', value: joinTokens(seq.items1) });
          for (const term of significantTerms(seq.items1)) {
            deletedTerms.push(term);
          }
        }
        break;
      case CorrelationStatus.Inserted:
        if (seq.items2) {
          segments.push({ type: 'insert', value: joinTokens(seq.items2) });
          for (const term of significantTerms(seq.items2)) {
            addedTerms.push(term);
          }
        }
        break;
    }
  }

  return { segments, addedTerms, deletedTerms };
}

function joinTokens(tokens: readonly WordToken[]): string {
  return tokens.map((t) => t.text).join('');
}

function significantTerms(tokens: readonly WordToken[]): string[] {
  return tokens.map((t) => t.text).filter((t) => t.trim() !== '');
}

/**
 * Line alignment opcodes
 */
export function lineOpcodes(lines1: readonly string[], lines2: readonly string[]): Opcode[] {
  const units1: LineUnit[] = lines1.map((text) => ({ text, hash: text }));
  const units2: LineUnit[] = lines2.map((text) => ({ text, hash: text }));
  return computeOpcodes(units1, units2);
}

/**
 * Compare two line sequences and return changes in document order
 */
export function compareLines(
  lines1: readonly string[],
  lines2: readonly string[],
  similarityThreshold: number
): LineChange[] {
  const changes: LineChange[] = [];

  for (const op of lineOpcodes(lines1, lines2)) {
    const before = lines1.slice(op.i1, op.i2).join('\n');
    const after = lines2.slice(op.j1, op.j2).join('\n');
    const linesBefore = toRange(op.i1, op.i2);
    const linesAfter = toRange(op.j1, op.j2);

    switch (op.tag) {
      case 'equal':
        break;

      case 'delete':
        changes.push({ changeType: 'deleted', before, detail: { linesBefore } });
        break;

      case 'insert':
        changes.push({ changeType: 'added', after, detail: { linesAfter } });
        break;

      case 'replace': {
        const similarity = similarityRatio(before, after);
        if (similarity >= similarityThreshold) {
          changes.push({
            changeType: 'modified',
            before,
            after,
            detail: { linesBefore, linesAfter, similarity, ...diffWords(before, after) },
          });
        } else {
          changes.push({ changeType: 'deleted', before, detail: { linesBefore, similarity } });
          changes.push({ changeType: 'added', after, detail: { linesAfter, similarity } });
        }
        break;
      }
    }
  }

  return changes;
}

function toRange(start: number, end: number): LineRange | undefined {
  return end > start ? { start: start + 1, end } : undefined;
}

/**
 * Compare two texts at line granularity and attach locations.
 *
 * Line numbers are appended to `location` only when either text spans more
 * than one line.
 */
export function compareText(
  text1: string,
  text2: string,
  location: string,
  similarityThreshold: number
): TextChange[] {
  const lines1 = splitLines(text1);
  const lines2 = splitLines(text2);
  const multiLine = lines1.length > 1 || lines2.length > 1;

  return compareLines(lines1, lines2, similarityThreshold).map((change) => ({
    category: 'text',
    ...change,
    location: multiLine ? `${location}, ${describeLines(change)}` : location,
  }));
}

function describeLines(change: LineChange): string {
  const range =
    change.changeType === 'deleted' ? change.detail.linesBefore : change.detail.linesAfter;
  if (!range) return 'lines';
  return range.start === range.end ? `line ${range.start}` : `lines ${range.start}-${range.end}`;
}
