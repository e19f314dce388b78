/**
 * Formatting diff engine
 *
 * Exact field-wise comparison. An unspecified field against a concrete value
 * is a change; unspecified on both sides is not.
 */

import { FORMATTING_FIELDS, type FormattingAttributes } from '../model/document';
import type { AttributeChange, FormattingChange } from '../types';

/**
 * Differing fields, in reporting order
 */
export function diffFormatting(
  before: FormattingAttributes,
  after: FormattingAttributes
): AttributeChange[] {
  const changes: AttributeChange[] = [];

  for (const attribute of FORMATTING_FIELDS) {
    const oldValue = before[attribute];
    const newValue = after[attribute];
    if (oldValue === newValue) continue;

    const change: AttributeChange = { attribute };
    if (oldValue !== undefined) change.before = oldValue;
    if (newValue !== undefined) change.after = newValue;
    changes.push(change);
  }

  return changes;
}

/**
 * One record listing every changed field of an element, or null
 */
export function compareFormatting(
  before: FormattingAttributes,
  after: FormattingAttributes,
  location: string
): FormattingChange | null {
  const attributes = diffFormatting(before, after);
  if (attributes.length === 0) return null;

  return {
    category: 'formatting',
    changeType: 'modified',
    location,
    before: { ...before },
    after: { ...after },
    detail: { attributes },
  };
}
