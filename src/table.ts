/**
 * dnt-codec — table construction and shape validation
 *
 * Helpers for callers that build a table by hand before writing it, and the
 * invariant check DntWriter runs before emitting any byte.
 */

import {
  ID_COLUMN,
  MAX_U16,
  MAX_U32,
  INT32_MIN,
  INT32_MAX,
} from './constants';
import { DntContractError } from './errors';
import { CANONICAL_TAGS, isKnownTypeTag, resolveTypeTag } from './tags';
import type {
  DntColumn,
  DntRow,
  DntTable,
  DntValue,
  Float32Value,
  Int32Value,
  TextValue,
  ValueType,
} from './types';

// ─── Value Constructors ───────────────────────────────────────────────────────

export function text(value: string): TextValue {
  return { type: 'text', value };
}

export function int32(value: number): Int32Value {
  return { type: 'int32', value };
}

export function float32(value: number): Float32Value {
  return { type: 'float32', value };
}

// ─── Column Constructors ──────────────────────────────────────────────────────

/**
 * Build a column from its raw wire tag.
 *
 * @throws DntFormatError('UnknownTypeTag') if rawTag is outside 1–5.
 */
export function column(name: string, rawTag: number): DntColumn {
  return { name, type: resolveTypeTag(rawTag), rawTag };
}

/** Build a column from a semantic type, using that type's canonical tag. */
export function columnOfType(name: string, type: ValueType): DntColumn {
  return { name, type, rawTag: CANONICAL_TAGS[type] };
}

// ─── Table Constructor ────────────────────────────────────────────────────────

/**
 * Build a table from its wire columns. The implicit `id` column is prepended,
 * so each row must start with the id value:
 *
 *   const table = createTable(
 *     [column('name', 1), column('score', 5)],
 *     [[int32(1), text('alpha'), float32(0.5)]],
 *   );
 *
 * The result is validated; a shape error throws DntContractError.
 */
export function createTable(
  wireColumns: readonly DntColumn[],
  rows:        ReadonlyArray<readonly DntValue[]>,
): DntTable {
  const table: DntTable = {
    head: [ID_COLUMN, ...wireColumns],
    body: rows.map((values): DntRow => ({ values })),
  };
  validateTable(table);
  return table;
}

// ─── Validation ───────────────────────────────────────────────────────────────

function checkText(path: string, value: string): void {
  if (value.length > MAX_U16) {
    throw new DntContractError(
      path,
      `text is ${value.length} characters; the u16 length prefix allows at most ${MAX_U16}.`,
    );
  }
}

function checkValue(path: string, col: DntColumn, value: DntValue): void {
  if (value.type !== col.type) {
    throw new DntContractError(
      path,
      `value is ${value.type} but column '${col.name}' is ${col.type}.`,
    );
  }

  switch (value.type) {
    case 'text':
      checkText(path, value.value);
      return;
    case 'int32':
      if (!Number.isInteger(value.value) || value.value < INT32_MIN || value.value > INT32_MAX) {
        throw new DntContractError(
          path,
          `int32 value ${value.value} is not an integer in [${INT32_MIN}, ${INT32_MAX}].`,
        );
      }
      // A two's-complement i32 has no negative zero.
      if (Object.is(value.value, -0)) {
        throw new DntContractError(path, 'int32 value is -0; use 0.');
      }
      return;
    case 'float32':
      if (typeof value.value !== 'number') {
        throw new DntContractError(path, `float32 value is not a number.`);
      }
      if (!Number.isNaN(value.value) && Math.fround(value.value) !== value.value) {
        throw new DntContractError(
          path,
          `float32 value ${value.value} is not representable in single precision; ` +
          `nearest is ${Math.fround(value.value)} (use Math.fround).`,
        );
      }
      return;
  }
}

/**
 * Check every invariant the writer relies on:
 *
 *   - head is non-empty and head[0] is int32 (it is written as the id value)
 *   - every column's rawTag is known and resolves to the column's type
 *   - at most 65535 wire columns; column names fit a u16 length
 *   - every row has exactly head.length values
 *   - every value's variant matches its column; int32 values fit 32 bits
 *     and are not -0; float32 values are exact in single precision
 *
 * @throws DntContractError on the first violation found.
 */
export function validateTable(table: DntTable): void {
  const { head, body } = table;

  if (head.length === 0) {
    throw new DntContractError(
      'head',
      'header is empty; column 0 must be the implicit int32 id column.',
    );
  }

  if (head.length - 1 > MAX_U16) {
    throw new DntContractError(
      'head',
      `${head.length - 1} wire columns; the u16 column count allows at most ${MAX_U16}.`,
    );
  }

  if (body.length > MAX_U32) {
    throw new DntContractError(
      'body',
      `${body.length} rows; the u32 row count allows at most ${MAX_U32}.`,
    );
  }

  for (let i = 0; i < head.length; i++) {
    const col  = head[i]!;
    const path = `head[${i}]`;
    if (!isKnownTypeTag(col.rawTag)) {
      throw new DntContractError(path, `raw type tag ${col.rawTag} is not one of 1–5.`);
    }
    if (resolveTypeTag(col.rawTag) !== col.type) {
      throw new DntContractError(
        path,
        `raw type tag ${col.rawTag} resolves to ${resolveTypeTag(col.rawTag)}, ` +
        `but the column declares ${col.type}.`,
      );
    }
    if (i > 0) checkText(`${path}.name`, col.name);
  }

  if (head[0]!.type !== 'int32') {
    throw new DntContractError(
      'head[0]',
      `column 0 is ${head[0]!.type}; the implicit id column is always int32.`,
    );
  }

  for (let r = 0; r < body.length; r++) {
    const values = body[r]!.values;
    if (values.length !== head.length) {
      throw new DntContractError(
        `body[${r}]`,
        `row has ${values.length} values; header has ${head.length} columns.`,
      );
    }
    for (let c = 0; c < values.length; c++) {
      checkValue(`body[${r}].values[${c}]`, head[c]!, values[c]!);
    }
  }
}
