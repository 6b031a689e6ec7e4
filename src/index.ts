// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  ValueType,
  TextValue,
  Int32Value,
  Float32Value,
  DntValue,
  DntColumn,
  DntRow,
  DntTable,
  DecodeOptions,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  PREFIX_SIZE,
  OFFSET_COLUMN_COUNT,
  OFFSET_COLUMNS,
  TAG_TEXT,
  TAG_INT32_ALT,
  TAG_INT32,
  TAG_FLOAT32_ALT,
  TAG_FLOAT32,
  ID_COLUMN,
  SENTINEL_TEXT,
  SENTINEL_SIZE,
  MIN_FILE_SIZE,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  DntError,
  DntIOError,
  DntFormatError,
  DntContractError,
} from './errors';
export type { DntFormatErrorCode } from './errors';

// ─── Type Tags ────────────────────────────────────────────────────────────────
export { resolveTypeTag, isKnownTypeTag, CANONICAL_TAGS } from './tags';

// ─── Table ────────────────────────────────────────────────────────────────────
export {
  text,
  int32,
  float32,
  column,
  columnOfType,
  createTable,
  validateTable,
} from './table';

// ─── Streams ──────────────────────────────────────────────────────────────────
export { BufferSource, BufferSink } from './stream';
export type { ByteSource, ByteSink } from './stream';

// ─── Reader / Writer ──────────────────────────────────────────────────────────
export { DntReader, decodeTable } from './reader';
export { DntWriter, encodeTable } from './writer';

// ─── Files ────────────────────────────────────────────────────────────────────
export { FileSource, FileSink, readDntFile, writeDntFile } from './file';
