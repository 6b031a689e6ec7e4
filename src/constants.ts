/**
 * dnt-codec — layout constants
 *
 * These constants define the binary contract of a DNT file. All multi-byte
 * integers and floats are little-endian.
 *
 *   [0..3]   reserved prefix      4 bytes  skipped on read, zeros on write
 *   [4..5]   wire column count    u16      excludes the implicit `id` column
 *   [6..9]   row count            u32
 *   ── Column section ─────────────────────────────────────────────────────
 *   per wire column:  [name_len: u16][name: name_len bytes][type_tag: u8]
 *   ── Row section ────────────────────────────────────────────────────────
 *   per row, per column (id first):  text | i32 | f32
 *   ── Trailer (written only) ─────────────────────────────────────────────
 *   [len: u8 = 5]['THEND']
 */

import type { DntColumn } from './types';

// ─── Header Layout ────────────────────────────────────────────────────────────

export const PREFIX_SIZE = 4; // bytes

export const OFFSET_COLUMN_COUNT = 4; // u16, followed by the u32 row count

/** First byte of the column section. */
export const OFFSET_COLUMNS = 10;

// ─── Limits ───────────────────────────────────────────────────────────────────

/** Wire column count and text lengths are both stored as u16. */
export const MAX_U16 = 0xffff;
export const MAX_U32 = 0xffffffff;

export const INT32_MIN = -0x80000000;
export const INT32_MAX =  0x7fffffff;

// ─── Type Tags ────────────────────────────────────────────────────────────────

export const TAG_TEXT        = 1;
export const TAG_INT32_ALT   = 2;
export const TAG_INT32       = 3;
export const TAG_FLOAT32_ALT = 4;
export const TAG_FLOAT32     = 5;

// ─── Implicit Column ──────────────────────────────────────────────────────────

/**
 * Column 0 of every table. Never written to the column section; the reader
 * prepends it and the writer skips it.
 */
export const ID_COLUMN: DntColumn = {
  name:   'id',
  type:   'int32',
  rawTag: TAG_INT32,
};

// ─── Trailer ──────────────────────────────────────────────────────────────────

export const SENTINEL_TEXT = 'THEND';

/** Byte length of the full trailer: u8 length + 'THEND'. */
export const SENTINEL_SIZE = 1 + SENTINEL_TEXT.length; // 6

/** Smallest valid file: prefix + counts + trailer, zero wire columns, zero rows. */
export const MIN_FILE_SIZE = OFFSET_COLUMNS + SENTINEL_SIZE; // 16
