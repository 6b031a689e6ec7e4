/**
 * dnt-codec — DntReader (Decoder)
 *
 * Rebuilds a DntTable from a ByteSource in one forward pass:
 *
 *   1. seek     — skip the 4-byte reserved prefix (not interpreted)
 *   2. counts   — u16 wire column count, u32 row count
 *   3. header   — prepend the implicit `id` column, then per wire column read
 *                 [name: string][type_tag: u8] and resolve the tag
 *   4. rows     — per row, per column in header order: text | i32 | f32
 *   5. trailer  — only with { validateSentinel: true }: [5: u8]['THEND']
 *
 * The table is assembled in locals and returned only after the last step, so
 * a DntIOError or DntFormatError thrown anywhere leaves nothing behind.
 */

import {
  OFFSET_COLUMN_COUNT,
  ID_COLUMN,
  SENTINEL_TEXT,
} from './constants';
import { DntFormatError } from './errors';
import { BufferSource, type ByteSource } from './stream';
import { resolveTypeTag } from './tags';
import type {
  DecodeOptions,
  DntColumn,
  DntRow,
  DntTable,
  DntValue,
  ValueType,
} from './types';

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ─── DntReader ────────────────────────────────────────────────────────────────

export class DntReader {
  constructor(private readonly source: ByteSource) {}

  /**
   * Decode the whole table.
   *
   * @throws DntIOError      if the source ends before a field is complete.
   * @throws DntFormatError  on an unknown type tag, or a bad trailer when
   *                         validateSentinel is set.
   */
  read(options: DecodeOptions = {}): DntTable {
    this.source.seek(OFFSET_COLUMN_COUNT);

    const wireColumns = this.readU16();
    const rowCount    = this.readU32();

    const head: DntColumn[] = [ID_COLUMN];
    for (let i = 0; i < wireColumns; i++) {
      const name      = this.readString();
      const tagOffset = this.source.position;
      const rawTag    = this.readU8();
      head.push({ name, type: resolveTypeTag(rawTag, tagOffset), rawTag });
    }

    const body: DntRow[] = [];
    for (let r = 0; r < rowCount; r++) {
      const values: DntValue[] = [];
      for (const col of head) {
        values.push(this.readValue(col.type));
      }
      body.push({ values });
    }

    if (options.validateSentinel === true) {
      this.readSentinel();
    }

    return { head, body };
  }

  // ── Field readers ──────────────────────────────────────────────────────────

  private readValue(type: ValueType): DntValue {
    switch (type) {
      case 'text':    return { type, value: this.readString() };
      case 'int32':   return { type, value: this.readI32() };
      case 'float32': return { type, value: this.readF32() };
    }
  }

  private readU8(): number {
    return this.source.readExact(1)[0]!;
  }

  private readU16(): number {
    return viewOf(this.source.readExact(2)).getUint16(0, /* le */ true);
  }

  private readU32(): number {
    return viewOf(this.source.readExact(4)).getUint32(0, true);
  }

  private readI32(): number {
    return viewOf(this.source.readExact(4)).getInt32(0, true);
  }

  private readF32(): number {
    return viewOf(this.source.readExact(4)).getFloat32(0, true);
  }

  /**
   * [length: u16][length bytes]. One byte is one character (latin-1);
   * multi-byte sequences are not recombined.
   */
  private readString(): string {
    const length = this.readU16();
    if (length === 0) return '';
    return latin1(this.source.readExact(length));
  }

  private readSentinel(): void {
    const offset = this.source.position;
    const length = this.readU8();
    if (length !== SENTINEL_TEXT.length) {
      throw new DntFormatError(
        'BadSentinel',
        `Trailer length byte at ${offset} is ${length}; expected ${SENTINEL_TEXT.length} ('${SENTINEL_TEXT}').`,
        { offset },
      );
    }
    const found = latin1(this.source.readExact(length));
    if (found !== SENTINEL_TEXT) {
      throw new DntFormatError(
        'BadSentinel',
        `Trailer at ${offset + 1} reads '${found}'; expected '${SENTINEL_TEXT}'.`,
        { offset: offset + 1 },
      );
    }
  }
}

function latin1(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) out += String.fromCharCode(byte);
  return out;
}

// ─── decodeTable ──────────────────────────────────────────────────────────────

/** Decode a complete DNT image held in memory. */
export function decodeTable(bytes: Uint8Array, options: DecodeOptions = {}): DntTable {
  return new DntReader(new BufferSource(bytes)).read(options);
}
