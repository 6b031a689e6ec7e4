/**
 * dnt-codec — DntWriter (Encoder)
 *
 * Serializes a DntTable into the layout DntReader consumes:
 *
 *   1. validate — validateTable(); a shape error throws before any byte is
 *                 written, so the sink never holds a partial image
 *   2. prefix   — 4 zero bytes
 *   3. counts   — u16 (head.length − 1), u32 body.length
 *   4. header   — per column from index 1: [name: string][rawTag: u8]
 *   5. rows     — per row, per value (id first): text | i32 | f32
 *   6. trailer  — [5: u8]['THEND'], always
 *
 * head[0] is the implicit `id` column and is never written to the column
 * section; its values are still written at position 0 of every row.
 *
 * rawTag is emitted as stored. A column read with tag 2 is written with tag 2,
 * not the canonical 3.
 */

import { PREFIX_SIZE, SENTINEL_TEXT } from './constants';
import { BufferSink, type ByteSink } from './stream';
import { validateTable } from './table';
import type { DntTable, DntValue } from './types';

// ─── DntWriter ────────────────────────────────────────────────────────────────

export class DntWriter {
  // One scratch word reused for every fixed-width field.
  private readonly scratch     = new Uint8Array(4);
  private readonly scratchView = new DataView(this.scratch.buffer);

  constructor(private readonly sink: ByteSink) {}

  /**
   * Write the whole table. The table is read, never mutated or retained.
   *
   * @throws DntContractError if the table breaks a shape invariant.
   * @throws DntIOError       if the sink rejects a write.
   */
  write(table: DntTable): void {
    validateTable(table);

    this.sink.writeExact(new Uint8Array(PREFIX_SIZE));

    this.writeU16(table.head.length - 1);
    this.writeU32(table.body.length);

    for (let i = 1; i < table.head.length; i++) {
      const col = table.head[i]!;
      this.writeString(col.name);
      this.writeU8(col.rawTag);
    }

    for (const row of table.body) {
      for (const value of row.values) {
        this.writeValue(value);
      }
    }

    this.writeU8(SENTINEL_TEXT.length);
    this.writeChars(SENTINEL_TEXT);
  }

  // ── Field writers ──────────────────────────────────────────────────────────

  private writeValue(value: DntValue): void {
    switch (value.type) {
      case 'text':    this.writeString(value.value); return;
      case 'int32':   this.writeI32(value.value);    return;
      case 'float32': this.writeF32(value.value);    return;
    }
  }

  private writeU8(value: number): void {
    this.sink.writeExact(Uint8Array.of(value & 0xff));
  }

  private writeU16(value: number): void {
    this.scratchView.setUint16(0, value, /* le */ true);
    this.sink.writeExact(this.scratch.subarray(0, 2));
  }

  private writeU32(value: number): void {
    this.scratchView.setUint32(0, value, true);
    this.sink.writeExact(this.scratch);
  }

  private writeI32(value: number): void {
    this.scratchView.setInt32(0, value, true);
    this.sink.writeExact(this.scratch);
  }

  /** Narrows to single precision; a value that is already an f32 is exact. */
  private writeF32(value: number): void {
    this.scratchView.setFloat32(0, value, true);
    this.sink.writeExact(this.scratch);
  }

  /** [length: u16][one byte per character]. */
  private writeString(value: string): void {
    this.writeU16(value.length);
    if (value.length > 0) this.writeChars(value);
  }

  /** Each UTF-16 code unit narrowed to its low 8 bits. */
  private writeChars(value: string): void {
    const out = new Uint8Array(value.length);
    for (let i = 0; i < value.length; i++) {
      out[i] = value.charCodeAt(i) & 0xff;
    }
    this.sink.writeExact(out);
  }
}

// ─── encodeTable ──────────────────────────────────────────────────────────────

/** Encode a table into a fresh byte array. */
export function encodeTable(table: DntTable): Uint8Array {
  const sink = new BufferSink();
  new DntWriter(sink).write(table);
  return sink.toBytes();
}
