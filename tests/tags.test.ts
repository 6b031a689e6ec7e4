/**
 * dnt-codec — type tag resolution
 *
 * The column section's type byte maps many-to-one onto three semantic types.
 * Anything outside 1–5 is a format error, never a default.
 */

import { describe, it, expect } from 'vitest';
import {
  resolveTypeTag,
  isKnownTypeTag,
  CANONICAL_TAGS,
  column,
  columnOfType,
  DntFormatError,
} from '../src/index';

describe('resolveTypeTag', () => {
  it('maps 1 to text', () => {
    expect(resolveTypeTag(1)).toBe('text');
  });

  it('maps both 2 and 3 to int32', () => {
    expect(resolveTypeTag(2)).toBe('int32');
    expect(resolveTypeTag(3)).toBe('int32');
  });

  it('maps both 4 and 5 to float32', () => {
    expect(resolveTypeTag(4)).toBe('float32');
    expect(resolveTypeTag(5)).toBe('float32');
  });

  it.each([0, 6, 7, 255])('rejects tag %i with UnknownTypeTag', (tag) => {
    expect(() => resolveTypeTag(tag)).toThrow(DntFormatError);
    try {
      resolveTypeTag(tag, 42);
    } catch (err) {
      expect(err).toBeInstanceOf(DntFormatError);
      expect(err).toMatchObject({ code: 'UnknownTypeTag', tag, offset: 42 });
    }
  });

  it('names the byte offset in the message when one is given', () => {
    expect(() => resolveTypeTag(9, 13)).toThrow(
      'Unknown column type tag 9 at byte 13; expected 1 (text), 2–3 (int32) or 4–5 (float32).',
    );
  });
});

describe('isKnownTypeTag', () => {
  it('accepts exactly 1 through 5', () => {
    const known = Array.from({ length: 256 }, (_, i) => i).filter(isKnownTypeTag);
    expect(known).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('column constructors', () => {
  it('column() keeps the raw tag next to the resolved type', () => {
    expect(column('count', 2)).toEqual({ name: 'count', type: 'int32', rawTag: 2 });
    expect(column('ratio', 4)).toEqual({ name: 'ratio', type: 'float32', rawTag: 4 });
  });

  it('column() rejects an unknown tag', () => {
    expect(() => column('bad', 0)).toThrow(DntFormatError);
  });

  it('columnOfType() uses the canonical tag', () => {
    expect(CANONICAL_TAGS).toEqual({ text: 1, int32: 3, float32: 5 });
    expect(columnOfType('label', 'text')).toEqual({ name: 'label', type: 'text', rawTag: 1 });
    expect(columnOfType('score', 'float32')).toEqual({ name: 'score', type: 'float32', rawTag: 5 });
  });
});
