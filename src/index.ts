// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  ByteOrder,
  NumericColumn,
  StructColumn,
  StringColumn,
  TypedColumn,
  ColumnKind,
  ValidatedColumn,
  OutputType,
  TypedOutput,
  StringOutput,
  FixedWidthOutput,
  Unknown,
  FrameOutputInfo,
  FrameInfo,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  NUMERIC_ELEMENT_WIDTHS,
  STRING_LENGTH_BYTES,
  TYPE_CODE_SERIAL,
  TYPE_CODE_STRUCT,
  TYPE_CODE_NUMERIC,
  TYPE_CODE_STRING,
  LEVEL_MIN,
  LEVEL_MAX,
  outputTypeFromCode,
} from './constants';

// ─── Engine port ──────────────────────────────────────────────────────────────
export type {
  ZlEngine,
  EngineHandle,
  HandleKind,
  CompressionContextHandle,
  DecompressionContextHandle,
  GraphHandle,
  TypedRefHandle,
  TypedBufferHandle,
  FrameInfoHandle,
  GraphId,
  EngineErrorCode,
  EngineResult,
  CompressionParameter,
  TypedRefShape,
  TypedBufferContents,
} from './engine';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  ZlError,
  ZlValidationError,
  ZlEngineError,
  ZlCompileError,
  ZlAllocationError,
  ZlStateError,
} from './errors';
export type { ZlErrorKind } from './errors';

// ─── Columns ──────────────────────────────────────────────────────────────────
export {
  validateColumn,
  validateColumns,
  numericColumn,
  structColumn,
  stringColumn,
  packStringLengths,
  unpackStringLengths,
  outputStrings,
} from './column';

// ─── Sessions & compressors ───────────────────────────────────────────────────
export { ZlCompressionSession, ZlDecompressionSession } from './session';
export type { CompressionSessionOptions, DecompressionSessionOptions } from './session';
export { ZlCompressor } from './compressor';
export type { CompressorOptions } from './compressor';
export { compileDescription } from './compiler';

// ─── Frames ───────────────────────────────────────────────────────────────────
export { encodeColumn, encodeColumns, decodeOne, decodeAll } from './codec';
export { readFrameInfo } from './inspect';
export { compress, decompress, compressBound, engineVersion } from './oneshot';
export type { OneShotOptions } from './oneshot';

// ─── Logging ──────────────────────────────────────────────────────────────────
export {
  StructuredLogger,
  createNoopLogger,
  createStreamLogger,
  renderRecord,
  resolveLogLevel,
  isLogLevelEnabled,
  LOG_LEVEL_PRIORITY,
} from './logger';
export type {
  Logger,
  LogLevel,
  LogContext,
  LogRecord,
  LogFormat,
  StructuredLoggerConfig,
  StreamLoggerConfig,
} from './logger';
