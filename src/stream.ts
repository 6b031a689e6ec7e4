/**
 * dnt-codec — byte streams
 *
 * The reader and writer never touch a buffer or file directly. They drive a
 * ByteSource or ByteSink with one forward cursor; the only random access the
 * format needs is the initial seek past the reserved prefix.
 *
 * BufferSource / BufferSink are the in-memory implementations. The fd-backed
 * ones live in file.ts.
 */

import { DntIOError } from './errors';

// ─── Contracts ────────────────────────────────────────────────────────────────

export interface ByteSource {
  /** Absolute cursor position in bytes. */
  readonly position: number;

  /** Move the cursor to an absolute offset. */
  seek(offset: number): void;

  /**
   * Read exactly `length` bytes and advance the cursor.
   * @throws DntIOError if fewer than `length` bytes remain.
   */
  readExact(length: number): Uint8Array;
}

export interface ByteSink {
  /** Bytes written so far. */
  readonly position: number;

  /**
   * Write all of `bytes`.
   * @throws DntIOError if the underlying storage rejects the write.
   */
  writeExact(bytes: Uint8Array): void;
}

// ─── BufferSource ─────────────────────────────────────────────────────────────

/**
 * A ByteSource over an in-memory byte array. readExact returns subarrays —
 * zero copy; callers that keep the bytes past the source's lifetime must
 * copy them.
 */
export class BufferSource implements ByteSource {
  private _position = 0;

  constructor(private readonly _bytes: Uint8Array) {}

  get position(): number {
    return this._position;
  }

  get byteLength(): number {
    return this._bytes.byteLength;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this._bytes.byteLength) {
      throw new DntIOError(
        `Cannot seek to byte ${offset}: source is ${this._bytes.byteLength} bytes.`,
        offset,
      );
    }
    this._position = offset;
  }

  readExact(length: number): Uint8Array {
    const start = this._position;
    const end   = start + length;
    if (end > this._bytes.byteLength) {
      throw new DntIOError(
        `Unexpected end of data: needed ${length} bytes at byte ${start}, ` +
        `only ${this._bytes.byteLength - start} remain.`,
        start,
      );
    }
    this._position = end;
    return this._bytes.subarray(start, end);
  }
}

// ─── BufferSink ───────────────────────────────────────────────────────────────

const INITIAL_SINK_CAPACITY = 256;

/** A ByteSink that grows an in-memory buffer by doubling. */
export class BufferSink implements ByteSink {
  private _buf:    Uint8Array;
  private _length = 0;

  constructor(initialCapacity: number = INITIAL_SINK_CAPACITY) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 0) {
      throw new RangeError(
        `BufferSink initial capacity must be a non-negative integer; got ${initialCapacity}.`,
      );
    }
    this._buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  get position(): number {
    return this._length;
  }

  writeExact(bytes: Uint8Array): void {
    const needed = this._length + bytes.byteLength;
    if (needed > this._buf.byteLength) {
      let capacity = this._buf.byteLength;
      while (capacity < needed) capacity *= 2;
      const grown = new Uint8Array(capacity);
      grown.set(this._buf.subarray(0, this._length));
      this._buf = grown;
    }
    this._buf.set(bytes, this._length);
    this._length = needed;
  }

  /** A copy of everything written, trimmed to length. */
  toBytes(): Uint8Array {
    return this._buf.slice(0, this._length);
  }
}
