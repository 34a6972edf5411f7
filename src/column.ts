/**
 * @zlframe/core — typed column validation and builders
 *
 * validateColumn() is the only gate between caller data and the engine.
 * It runs before any handle is allocated, so a rejected column leaves no
 * engine state behind. Rules, checked in this order:
 *
 *   all      — data must not be empty
 *   numeric  — elementWidth ∈ {1, 2, 4, 8}; data.byteLength % elementWidth == 0
 *   struct   — recordWidth is a positive integer; data.byteLength % recordWidth == 0
 *   string   — packed lengths are a multiple of 4 bytes; Σ lengths == data.byteLength
 */

import { NUMERIC_ELEMENT_WIDTHS, STRING_LENGTH_BYTES } from './constants';
import { ZlValidationError } from './errors';
import type {
  ByteOrder,
  NumericColumn,
  StringColumn,
  StructColumn,
  TypedColumn,
  TypedOutput,
  ValidatedColumn,
} from './types';

// ─── String lengths ───────────────────────────────────────────────────────────

/** Pack u32 lengths into bytes in the given byte order. */
export function packStringLengths(lengths: Uint32Array | readonly number[], byteOrder: ByteOrder = 'little'): Uint8Array {
  const out = new Uint8Array(lengths.length * STRING_LENGTH_BYTES);
  const dv  = new DataView(out.buffer);
  const le  = byteOrder === 'little';
  let i = 0;
  for (const length of lengths) {
    if (!Number.isInteger(length) || length < 0 || length > 0xffffffff) {
      throw new ZlValidationError(`string length at index ${i} is not a u32: ${length}`);
    }
    dv.setUint32(i * STRING_LENGTH_BYTES, length, le);
    i++;
  }
  return out;
}

/** Unpack a buffer of u32 lengths. Its size must be a multiple of 4. */
export function unpackStringLengths(bytes: Uint8Array, byteOrder: ByteOrder = 'little'): Uint32Array {
  if (bytes.byteLength % STRING_LENGTH_BYTES !== 0) {
    throw new ZlValidationError(
      `string lengths buffer is ${bytes.byteLength} bytes; ` +
      `size must be a multiple of ${STRING_LENGTH_BYTES}`,
    );
  }
  const count = bytes.byteLength / STRING_LENGTH_BYTES;
  const dv    = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const le    = byteOrder === 'little';
  const out   = new Uint32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = dv.getUint32(i * STRING_LENGTH_BYTES, le);
  }
  return out;
}

// ─── Validation ───────────────────────────────────────────────────────────────

function validateNumeric(column: NumericColumn): ValidatedColumn {
  const width = column.elementWidth;
  if (!NUMERIC_ELEMENT_WIDTHS.includes(width)) {
    throw new ZlValidationError(`numeric elementWidth must be 1, 2, 4, or 8; got ${width}`);
  }
  if (column.data.byteLength % width !== 0) {
    throw new ZlValidationError(
      `numeric data size ${column.data.byteLength} must be a multiple of elementWidth ${width}`,
    );
  }
  return {
    kind:         'numeric',
    data:         column.data,
    elementWidth: width,
    elementCount: column.data.byteLength / width,
  };
}

function validateStruct(column: StructColumn): ValidatedColumn {
  const width = column.recordWidth;
  if (!Number.isInteger(width) || width <= 0) {
    throw new ZlValidationError(`struct recordWidth must be a positive integer; got ${width}`);
  }
  if (column.data.byteLength % width !== 0) {
    throw new ZlValidationError(
      `struct data size ${column.data.byteLength} must be a multiple of recordWidth ${width}`,
    );
  }
  return {
    kind:        'struct',
    data:        column.data,
    recordWidth: width,
    recordCount: column.data.byteLength / width,
  };
}

function validateString(column: StringColumn): ValidatedColumn {
  const lengths = column.lengths instanceof Uint32Array
    ? column.lengths
    : unpackStringLengths(column.lengths, column.byteOrder);

  let total = 0;
  for (const length of lengths) total += length;
  if (total !== column.data.byteLength) {
    throw new ZlValidationError(
      `string lengths sum to ${total} bytes but data is ${column.data.byteLength} bytes`,
    );
  }
  return { kind: 'string', data: column.data, lengths };
}

/**
 * Check one column and reduce it to the shape the engine port takes.
 * Throws ZlValidationError; never touches the engine.
 */
export function validateColumn(column: TypedColumn): ValidatedColumn {
  if (column.data.byteLength === 0) {
    throw new ZlValidationError(`${column.kind} column data must not be empty`);
  }
  switch (column.kind) {
    case 'numeric': return validateNumeric(column);
    case 'struct':  return validateStruct(column);
    case 'string':  return validateString(column);
  }
}

/**
 * Validate every column before any of them reaches the engine.
 * The first failure aborts the whole list; its message names the index.
 */
export function validateColumns(columns: readonly TypedColumn[]): ValidatedColumn[] {
  if (columns.length === 0) {
    throw new ZlValidationError('column list must not be empty');
  }
  return columns.map((column, i) => {
    try {
      return validateColumn(column);
    } catch (err) {
      if (err instanceof ZlValidationError) {
        throw new ZlValidationError(`column ${i}: ${err.message}`);
      }
      throw err;
    }
  });
}

/** Total payload bytes across validated columns. Used for output sizing. */
export function totalByteLength(columns: readonly ValidatedColumn[]): number {
  return columns.reduce((sum, column) => sum + column.data.byteLength, 0);
}

// ─── Builders ─────────────────────────────────────────────────────────────────

type NumericArray =
  | Uint8Array | Int8Array
  | Uint16Array | Int16Array
  | Uint32Array | Int32Array | Float32Array
  | BigUint64Array | BigInt64Array | Float64Array;

/** Numeric column over a typed array's bytes. No copy. */
export function numericColumn(values: NumericArray): NumericColumn {
  return {
    kind:         'numeric',
    data:         new Uint8Array(values.buffer, values.byteOffset, values.byteLength),
    elementWidth: values.BYTES_PER_ELEMENT,
  };
}

export function structColumn(data: Uint8Array, recordWidth: number): StructColumn {
  return { kind: 'struct', data, recordWidth };
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

/** UTF-8 encode `strings` into one string column. */
export function stringColumn(strings: readonly string[]): StringColumn {
  const encoded = strings.map((s) => utf8Encoder.encode(s));
  const lengths = new Uint32Array(encoded.length);
  const data    = new Uint8Array(encoded.reduce((sum, bytes) => sum + bytes.byteLength, 0));

  let offset = 0;
  encoded.forEach((bytes, i) => {
    lengths[i] = bytes.byteLength;
    data.set(bytes, offset);
    offset += bytes.byteLength;
  });
  return { kind: 'string', data, lengths };
}

/** Split a decoded string output back into JS strings. */
export function outputStrings(output: TypedOutput): string[] {
  if (output.type !== 'string') {
    throw new ZlValidationError(`expected a string output; got ${output.type}`);
  }
  const strings: string[] = [];
  let offset = 0;
  for (const length of output.stringLengths) {
    strings.push(utf8Decoder.decode(output.data.subarray(offset, offset + length)));
    offset += length;
  }
  return strings;
}
