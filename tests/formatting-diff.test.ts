import { describe, it, expect } from 'vitest';
import { compareFormatting, diffFormatting } from '../src/diff/formatting-diff';
import type { FormattingAttributes } from '../src/model/document';

describe('diffFormatting', () => {
  it('lists changed fields in reporting order', () => {
    const changes = diffFormatting({ bold: true, fontSize: 12 }, { bold: false, fontSize: 12, color: 'FF0000' });

    expect(changes).toEqual([
      { attribute: 'color', after: 'FF0000' },
      { attribute: 'bold', before: true, after: false },
    ]);
  });

  it('treats a removed field as a change', () => {
    expect(diffFormatting({ fontName: 'Arial' }, {})).toEqual([{ attribute: 'fontName', before: 'Arial' }]);
  });

  it('ignores fields unspecified on both sides', () => {
    expect(diffFormatting({}, {})).toEqual([]);
  });
});

describe('compareFormatting', () => {
  it('returns null when nothing changed', () => {
    expect(compareFormatting({ italic: true }, { italic: true }, 'paragraph 1')).toBeNull();
  });

  it('returns one record with every changed field', () => {
    const before: FormattingAttributes = { bold: true, fillColor: 'FFFFFF' };
    const after: FormattingAttributes = { bold: false, fillColor: 'CCCCCC' };

    const change = compareFormatting(before, after, 'paragraph 4');

    expect(change).toEqual({
      category: 'formatting',
      changeType: 'modified',
      location: 'paragraph 4',
      before: { bold: true, fillColor: 'FFFFFF' },
      after: { bold: false, fillColor: 'CCCCCC' },
      detail: {
        attributes: [
          { attribute: 'bold', before: true, after: false },
          { attribute: 'fillColor', before: 'FFFFFF', after: 'CCCCCC' },
        ],
      },
    });
    expect(change?.before).not.toBe(before);
  });
});
