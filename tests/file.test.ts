/**
 * dnt-codec — file helpers
 *
 * readDntFile / writeDntFile against a scratch directory under the OS temp
 * dir, removed after each test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  readDntFile,
  writeDntFile,
  encodeTable,
  createTable,
  column,
  text,
  int32,
  float32,
  DntContractError,
  DntFormatError,
  DntIOError,
  ID_COLUMN,
} from '../src/index';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'dnt-codec-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

const sample = () => createTable(
  [column('name', 1), column('rank', 2), column('score', 4)],
  [
    [int32(1), text('alpha'), int32(3), float32(0.5)],
    [int32(2), text('beta'),  int32(1), float32(-8)],
  ],
);

describe('writeDntFile / readDntFile', () => {
  it('writes the same bytes as encodeTable', () => {
    const path  = join(dir, 'sample.dnt');
    const table = sample();

    writeDntFile(path, table);
    expect(Array.from(readFileSync(path))).toEqual(Array.from(encodeTable(table)));
  });

  it('reads back the table it wrote', () => {
    const path = join(dir, 'sample.dnt');
    writeDntFile(path, sample());

    expect(readDntFile(path, { validateSentinel: true })).toEqual(sample());
  });

  it('truncates an existing file', () => {
    const path = join(dir, 'sample.dnt');
    writeFileSync(path, new Uint8Array(1024).fill(0xff));
    writeDntFile(path, createTable([], []));

    expect(readFileSync(path).length).toBe(16);
  });

  it('leaves an existing file untouched when the table is rejected', () => {
    const path = join(dir, 'keep.dnt');
    writeFileSync(path, Uint8Array.of(1, 2, 3));

    expect(() => writeDntFile(path, { head: [ID_COLUMN], body: [{ values: [text('x')] }] }))
      .toThrow(DntContractError);
    expect(Array.from(readFileSync(path))).toEqual([1, 2, 3]);
  });

  it('reports a missing file as DntIOError with the fs error as cause', () => {
    try {
      readDntFile(join(dir, 'missing.dnt'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DntIOError);
      expect(err).toMatchObject({ cause: { code: 'ENOENT' } });
    }
  });

  it('reports a truncated file as DntIOError', () => {
    const path  = join(dir, 'short.dnt');
    const bytes = encodeTable(sample());
    writeFileSync(path, bytes.subarray(0, 30));

    expect(() => readDntFile(path)).toThrow(DntIOError);
  });

  it('reports an unknown type tag as DntFormatError', () => {
    const path  = join(dir, 'bad-tag.dnt');
    const bytes = encodeTable(createTable([column('n', 1)], []));
    bytes[13] = 6; // [10..11] length, [12] 'n', [13] tag
    writeFileSync(path, bytes);

    expect(() => readDntFile(path)).toThrow(DntFormatError);
  });
});
