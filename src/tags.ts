/**
 * dnt-codec — type tag resolution
 *
 * The column section stores one type byte per wire column. The mapping is
 * many-to-one: 2 and 3 both mean int32, 4 and 5 both mean float32. Callers
 * keep the raw byte next to the resolved type so a rewrite reproduces it.
 */

import {
  TAG_TEXT,
  TAG_INT32_ALT,
  TAG_INT32,
  TAG_FLOAT32_ALT,
  TAG_FLOAT32,
} from './constants';
import { DntFormatError } from './errors';
import type { ValueType } from './types';

// ─── Tag Mappings ─────────────────────────────────────────────────────────────

const TAG_TO_TYPE: ReadonlyMap<number, ValueType> = new Map<number, ValueType>([
  [TAG_TEXT,        'text'],
  [TAG_INT32_ALT,   'int32'],
  [TAG_INT32,       'int32'],
  [TAG_FLOAT32_ALT, 'float32'],
  [TAG_FLOAT32,     'float32'],
]);

/** Tag used when a column is built from a semantic type rather than read. */
export const CANONICAL_TAGS: Readonly<Record<ValueType, number>> = {
  text:    TAG_TEXT,
  int32:   TAG_INT32,
  float32: TAG_FLOAT32,
};

// ─── Resolution ───────────────────────────────────────────────────────────────

export function isKnownTypeTag(tag: number): boolean {
  return TAG_TO_TYPE.has(tag);
}

/**
 * Map a raw type byte to its semantic type.
 *
 * @param offset  Stream position of the byte, reported in the error.
 * @throws DntFormatError('UnknownTypeTag') for any byte outside 1–5.
 */
export function resolveTypeTag(tag: number, offset?: number): ValueType {
  const type = TAG_TO_TYPE.get(tag);
  if (type === undefined) {
    throw new DntFormatError(
      'UnknownTypeTag',
      `Unknown column type tag ${tag}` +
      (offset !== undefined ? ` at byte ${offset}` : '') +
      `; expected 1 (text), 2–3 (int32) or 4–5 (float32).`,
      { offset, tag },
    );
  }
  return type;
}
