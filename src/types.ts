/**
 * dnt-codec — type definitions
 *
 * These types describe a DNT table in memory. A table is plain data: the
 * reader builds a fresh one per call and the writer only ever reads it.
 */

// ─── Value Types ──────────────────────────────────────────────────────────────

/**
 * Semantic column types.
 *
 * text:    u16 length prefix + one byte per character (latin-1, not UTF-8).
 * int32:   4 bytes, signed, little-endian.
 * float32: 4 bytes, IEEE-754 single precision, little-endian.
 */
export type ValueType = 'text' | 'int32' | 'float32';

// ─── Values ───────────────────────────────────────────────────────────────────

export interface TextValue {
  readonly type:  'text';
  readonly value: string;
}

export interface Int32Value {
  readonly type:  'int32';
  readonly value: number;
}

export interface Float32Value {
  readonly type:  'float32';
  readonly value: number;
}

/** One cell. Exactly one variant is active. */
export type DntValue = TextValue | Int32Value | Float32Value;

// ─── Table ────────────────────────────────────────────────────────────────────

/**
 * One column of the header.
 *
 * rawTag is the type byte exactly as it appeared on the wire. Several raw tags
 * share a semantic type (2 and 3 are both int32), so the writer emits rawTag,
 * never a tag derived from `type`.
 */
export interface DntColumn {
  readonly name:   string;
  readonly type:   ValueType;
  readonly rawTag: number;
}

/** One row. values[i] belongs to head[i]. */
export interface DntRow {
  readonly values: readonly DntValue[];
}

/**
 * A decoded table.
 *
 * head[0] is the implicit `id` column (int32, raw tag 3). It is synthesized by
 * the reader and skipped by the writer; it never appears in the wire header.
 */
export interface DntTable {
  readonly head: readonly DntColumn[];
  readonly body: readonly DntRow[];
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface DecodeOptions {
  /**
   * Read the `THEND` trailer after the last row and fail with
   * DntFormatError('BadSentinel') if it is missing or different.
   * Off by default.
   */
  readonly validateSentinel?: boolean;
}
