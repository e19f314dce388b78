/**
 * Text diff engine tests
 */

import { describe, it, expect } from 'vitest';
import {
  compareLines,
  compareText,
  diffWords,
  similarityRatio,
  splitLines,
  tokenize,
} from '../src/diff/text-diff';

describe('tokenize', () => {
  it('splits words, punctuation and whitespace', () => {
    expect(tokenize('Hello, world!')).toEqual(['Hello', ',', ' ', 'world', '!']);
  });

  it('returns no tokens for empty text', () => {
    expect(tokenize('')).toEqual([]);
  });
});

describe('splitLines', () => {
  it('has no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('splits on newline', () => {
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });
});

describe('similarityRatio', () => {
  it('is 1 for identical and for two empty texts', () => {
    expect(similarityRatio('same words', 'same words')).toBe(1);
    expect(similarityRatio('', '')).toBe(1);
  });

  it('counts matched tokens on both sides', () => {
    // 7 tokens each, 6 matched
    expect(similarityRatio('The quick brown fox', 'The quick red fox')).toBeCloseTo(12 / 14, 10);
    expect(similarityRatio('a b c', 'a b d')).toBe(0.8);
    expect(similarityRatio('a b c', 'a x d')).toBe(0.6);
  });

  it('is 0 when nothing matches', () => {
    expect(similarityRatio('100', '150')).toBe(0);
  });
});

describe('diffWords', () => {
  it('produces word-level segments and changed terms', () => {
    const diff = diffWords('The quick brown fox', 'The quick red fox');

    expect(diff.segments).toEqual([
      { type: 'equal', value: 'The quick ' },
      { type: 'delete', value: 'brown' },
      { type: 'insert', value: 'red' },
      { type: 'equal', value: ' fox' },
    ]);
    expect(diff.addedTerms).toEqual(['red']);
    expect(diff.deletedTerms).toEqual(['brown']);
  });
});

describe('compareLines', () => {
  it('reports nothing for identical lines', () => {
    expect(compareLines(['one', 'two'], ['one', 'two'], 0.8)).toEqual([]);
  });

  it('reports a replacement at the threshold as one modification', () => {
    const changes = compareLines(['a b c'], ['a b d'], 0.8);

    expect(changes).toHaveLength(1);
    expect(changes[0].changeType).toBe('modified');
    expect(changes[0].before).toBe('a b c');
    expect(changes[0].after).toBe('a b d');
    expect(changes[0].detail.similarity).toBe(0.8);
    expect(changes[0].detail.addedTerms).toEqual(['d']);
    expect(changes[0].detail.deletedTerms).toEqual(['c']);
  });

  it('reports a replacement below the threshold as deletion plus addition', () => {
    const changes = compareLines(['a b c'], ['a b d'], 0.81);

    expect(changes).toEqual([
      {
        changeType: 'deleted',
        before: 'a b c',
        detail: { linesBefore: { start: 1, end: 1 }, similarity: 0.8 },
      },
      {
        changeType: 'added',
        after: 'a b d',
        detail: { linesAfter: { start: 1, end: 1 }, similarity: 0.8 },
      },
    ]);
  });

  it('reports inserted and deleted lines with their ranges', () => {
    expect(compareLines(['one'], ['one', 'two', 'three'], 0.8)).toEqual([
      { changeType: 'added', after: 'two\nthree', detail: { linesAfter: { start: 2, end: 3 } } },
    ]);
    expect(compareLines(['one', 'two'], ['two'], 0.8)).toEqual([
      { changeType: 'deleted', before: 'one', detail: { linesBefore: { start: 1, end: 1 } } },
    ]);
  });
});

describe('compareText', () => {
  it('reports the word diff of a modified paragraph', () => {
    const changes = compareText('The quick brown fox', 'The quick red fox', 'paragraph 1', 0.8);

    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({
      category: 'text',
      changeType: 'modified',
      location: 'paragraph 1',
      before: 'The quick brown fox',
      after: 'The quick red fox',
    });
    expect(changes[0].detail?.segments?.map((s) => s.type)).toEqual(['equal', 'delete', 'insert', 'equal']);
  });

  it('reports text added to an empty paragraph', () => {
    expect(compareText('', 'Hello', 'paragraph 2', 0.8)).toEqual([
      {
        category: 'text',
        changeType: 'added',
        after: 'Hello',
        location: 'paragraph 2',
        detail: { linesAfter: { start: 1, end: 1 } },
      },
    ]);
  });

  it('reports all text removed as a deletion', () => {
    const changes = compareText('Goodbye', '', 'paragraph 1', 0.8);

    expect(changes).toHaveLength(1);
    expect(changes[0].changeType).toBe('deleted');
    expect(changes[0].before).toBe('Goodbye');
  });

  it('reports nothing for identical text', () => {
    expect(compareText('Unchanged', 'Unchanged', 'paragraph 1', 0.8)).toEqual([]);
  });

  it('adds line numbers when either text has several lines', () => {
    const changes = compareText('one\ntwo', 'one\ntwo\nthree\nfour', 'paragraph 3', 0.8);

    expect(changes.map((c) => c.location)).toEqual(['paragraph 3, lines 3-4']);

    const deleted = compareText('one\ntwo\nthree', 'one\nthree', 'paragraph 3', 0.8);
    expect(deleted.map((c) => c.location)).toEqual(['paragraph 3, line 2']);
  });
});
