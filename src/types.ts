/**
 * @zlframe/core — type definitions
 *
 * These types describe the typed-column marshalling contract.
 * A column is borrowed for the duration of one encode call and never kept;
 * an output owns its bytes (they are copied out of engine memory).
 */

// ─── Typed columns ────────────────────────────────────────────────────────────

/** Byte order of a packed string-lengths buffer. */
export type ByteOrder = 'little' | 'big';

/**
 * Fixed-width numeric column. Elements are stored in platform byte order,
 * which is what a typed array view produces.
 */
export interface NumericColumn {
  readonly kind:         'numeric';
  readonly data:         Uint8Array;
  readonly elementWidth: number;
}

/** Fixed-width records, opaque to this layer beyond their width. */
export interface StructColumn {
  readonly kind:        'struct';
  readonly data:        Uint8Array;
  readonly recordWidth: number;
}

/**
 * Variable-length strings, concatenated in `data`.
 *
 * lengths:   either one u32 per string, or a packed buffer of u32 values in
 *            `byteOrder` (default 'little'). The count is implied by length.
 *            The lengths must sum to data.byteLength.
 */
export interface StringColumn {
  readonly kind:       'string';
  readonly data:       Uint8Array;
  readonly lengths:    Uint32Array | Uint8Array;
  readonly byteOrder?: ByteOrder;
}

export type TypedColumn = NumericColumn | StructColumn | StringColumn;

export type ColumnKind = TypedColumn['kind'];

/**
 * A column that passed validation, reduced to the shape the engine port takes.
 * String lengths are always unpacked to a Uint32Array here.
 */
export type ValidatedColumn =
  | { readonly kind: 'numeric'; readonly data: Uint8Array; readonly elementWidth: number; readonly elementCount: number }
  | { readonly kind: 'struct';  readonly data: Uint8Array; readonly recordWidth:  number; readonly recordCount:  number }
  | { readonly kind: 'string';  readonly data: Uint8Array; readonly lengths: Uint32Array };

// ─── Outputs ──────────────────────────────────────────────────────────────────

/**
 * Output types as reported back from a frame. 'serial' is untyped bytes
 * (plain compress); 'unknown' is any code this layer does not recognise.
 */
export type OutputType = 'serial' | 'struct' | 'numeric' | 'string' | 'unknown';

interface OutputBase {
  readonly data:         Uint8Array;
  readonly elementWidth: number;
  readonly elementCount: number;
}

export interface StringOutput extends OutputBase {
  readonly type:          'string';
  readonly stringLengths: Uint32Array;
}

export interface FixedWidthOutput extends OutputBase {
  readonly type: Exclude<OutputType, 'string'>;
}

/** One decoded output. stringLengths exists only on string outputs. */
export type TypedOutput = StringOutput | FixedWidthOutput;

// ─── Frame introspection ──────────────────────────────────────────────────────

/** Marker for a per-output field the engine could not read. */
export type Unknown = 'unknown';

export interface FrameOutputInfo {
  readonly type:             OutputType;
  readonly decompressedSize: number | Unknown;
  readonly elementCount:     number | Unknown;
}

export interface FrameInfo {
  readonly formatVersion: number;
  readonly outputCount:   number;
  readonly outputs:       readonly FrameOutputInfo[];
}
