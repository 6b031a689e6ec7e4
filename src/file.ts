/**
 * dnt-codec — file I/O (Node.js only)
 *
 * fd-backed ByteSource / ByteSink, plus one-call helpers that open a file,
 * run the reader or writer over it and close the descriptor on every path.
 * fs failures surface as DntIOError with the original error as `cause`.
 */

import { closeSync, fstatSync, openSync, readSync, writeSync } from 'node:fs';

import { DntIOError } from './errors';
import { DntReader } from './reader';
import type { ByteSink, ByteSource } from './stream';
import { validateTable } from './table';
import type { DecodeOptions, DntTable } from './types';
import { DntWriter } from './writer';

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── FileSource ───────────────────────────────────────────────────────────────

/**
 * Positional reads against an open descriptor. The descriptor is borrowed;
 * the caller closes it.
 */
export class FileSource implements ByteSource {
  private _position = 0;

  constructor(private readonly fd: number) {}

  get position(): number {
    return this._position;
  }

  seek(offset: number): void {
    let size: number;
    try {
      size = fstatSync(this.fd).size;
    } catch (err) {
      throw new DntIOError(`fstat failed: ${messageOf(err)}`, offset, { cause: err });
    }
    if (!Number.isInteger(offset) || offset < 0 || offset > size) {
      throw new DntIOError(`Cannot seek to byte ${offset}: file is ${size} bytes.`, offset);
    }
    this._position = offset;
  }

  readExact(length: number): Uint8Array {
    const out  = new Uint8Array(length);
    let   done = 0;
    while (done < length) {
      let n: number;
      try {
        n = readSync(this.fd, out, done, length - done, this._position + done);
      } catch (err) {
        throw new DntIOError(
          `read failed at byte ${this._position + done}: ${messageOf(err)}`,
          this._position + done,
          { cause: err },
        );
      }
      if (n === 0) {
        throw new DntIOError(
          `Unexpected end of file: needed ${length} bytes at byte ${this._position}, ` +
          `got ${done}.`,
          this._position,
        );
      }
      done += n;
    }
    this._position += length;
    return out;
  }
}

// ─── FileSink ─────────────────────────────────────────────────────────────────

/** Sequential writes to an open descriptor. The caller closes it. */
export class FileSink implements ByteSink {
  private _position = 0;

  constructor(private readonly fd: number) {}

  get position(): number {
    return this._position;
  }

  writeExact(bytes: Uint8Array): void {
    let done = 0;
    while (done < bytes.byteLength) {
      try {
        done += writeSync(this.fd, bytes, done, bytes.byteLength - done);
      } catch (err) {
        throw new DntIOError(
          `write failed at byte ${this._position + done}: ${messageOf(err)}`,
          this._position + done,
          { cause: err },
        );
      }
    }
    this._position += bytes.byteLength;
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function open(path: string, flags: 'r' | 'w'): number {
  try {
    return openSync(path, flags);
  } catch (err) {
    throw new DntIOError(`Cannot open '${path}': ${messageOf(err)}`, undefined, { cause: err });
  }
}

function close(path: string, fd: number): void {
  try {
    closeSync(fd);
  } catch (err) {
    throw new DntIOError(`Cannot close '${path}': ${messageOf(err)}`, undefined, { cause: err });
  }
}

/**
 * Run `body` against a freshly opened descriptor and close it. A close failure
 * is reported as DntIOError, unless `body` already threw: that error wins.
 */
function withFile<T>(path: string, flags: 'r' | 'w', body: (fd: number) => T): T {
  const fd = open(path, flags);
  let result: T;
  try {
    result = body(fd);
  } catch (err) {
    try {
      closeSync(fd);
    } catch {
      // The read or write error below is the one reported.
    }
    throw err;
  }
  close(path, fd);
  return result;
}

/**
 * Read and decode a DNT file.
 *
 * @throws DntIOError      if the file cannot be opened, read or closed, or is truncated.
 * @throws DntFormatError  on an unknown type tag or (optionally) a bad trailer.
 */
export function readDntFile(path: string, options: DecodeOptions = {}): DntTable {
  return withFile(path, 'r', fd => new DntReader(new FileSource(fd)).read(options));
}

/**
 * Encode a table into a file, creating or truncating it.
 *
 * The table is validated before the file is opened, so a DntContractError
 * leaves any existing file untouched.
 */
export function writeDntFile(path: string, table: DntTable): void {
  validateTable(table);
  withFile(path, 'w', fd => new DntWriter(new FileSink(fd)).write(table));
}
