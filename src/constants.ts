/**
 * @zlframe/core — marshalling constants
 *
 * These constants define the contract between callers and the engine port.
 * The engine owns the physical frame bytes; everything here describes what
 * this layer checks before handing a column over, and how it names the
 * engine's output types on the way back.
 */

// ─── Column geometry ──────────────────────────────────────────────────────────

/** Element widths a numeric column may declare, in bytes. */
export const NUMERIC_ELEMENT_WIDTHS: readonly number[] = [1, 2, 4, 8];

/** Each string length is a u32; packed length buffers are multiples of this. */
export const STRING_LENGTH_BYTES = 4;

// ─── Engine output type codes ─────────────────────────────────────────────────

/**
 * Output type codes as the engine reports them.
 * Bit flags in the engine's numbering; a frame output carries exactly one.
 */
export const TYPE_CODE_SERIAL  = 1;
export const TYPE_CODE_STRUCT  = 2;
export const TYPE_CODE_NUMERIC = 4;
export const TYPE_CODE_STRING  = 8;

// ─── Compression level ────────────────────────────────────────────────────────

/**
 * Documented level range. Not enforced locally: integers outside it are
 * forwarded and the engine decides (see DESIGN.md, "Out-of-range levels").
 */
export const LEVEL_MIN = 1;
export const LEVEL_MAX = 19;

// ─── Engine version number ────────────────────────────────────────────────────

/** versionNumber = major × 10000 + minor × 100 + patch */
export const VERSION_MAJOR_DIVISOR = 10_000;
export const VERSION_MINOR_DIVISOR = 100;

// ─── Type code helpers ────────────────────────────────────────────────────────

const CODE_TO_TYPE: Readonly<Record<number, 'serial' | 'struct' | 'numeric' | 'string'>> = {
  [TYPE_CODE_SERIAL]:  'serial',
  [TYPE_CODE_STRUCT]:  'struct',
  [TYPE_CODE_NUMERIC]: 'numeric',
  [TYPE_CODE_STRING]:  'string',
};

/** Name an engine type code; codes this layer does not know are 'unknown'. */
export function outputTypeFromCode(code: number): 'serial' | 'struct' | 'numeric' | 'string' | 'unknown' {
  return CODE_TO_TYPE[code] ?? 'unknown';
}
