/**
 * Typed frame encode / decode
 *
 * ── Scenarios ────────────────────────────────────────────────────────────────
 *
 *   single column   100 u64 values → one numeric output of 800 bytes
 *   multi column    numeric + struct + string → three outputs, in order
 *   validation      a bad column aborts before any engine handle exists
 *   resources       typed refs and typed buffers never outlive the call
 *   sizing          a too-small bound or an over-reported write is fatal
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ZlAllocationError,
  ZlCompressionSession,
  ZlDecompressionSession,
  ZlEngineError,
  ZlValidationError,
  decodeAll,
  encodeColumns,
  numericColumn,
  outputStrings,
  stringColumn,
  structColumn,
} from '../src/index';
import type { TypedColumn } from '../src/index';
import { FakeEngine } from './support/fake-engine';

let engine: FakeEngine;
let cs:     ZlCompressionSession;
let ds:     ZlDecompressionSession;

beforeEach(() => {
  engine = new FakeEngine();
  cs     = ZlCompressionSession.create(engine);
  ds     = ZlDecompressionSession.create(engine);
});

afterEach(() => {
  cs.close();
  ds.close();
  expect(engine.liveHandles()).toBe(0);
});

// ── Fixtures ──────────────────────────────────────────────────────────────────

function u64Sequence(): BigUint64Array {
  return BigUint64Array.from({ length: 100 }, (_, i) => BigInt(1000 + i));
}

/** Two 6-byte records: u16 id + u32 value, little-endian. */
function sampleRecords(): Uint8Array {
  const bytes = new Uint8Array(12);
  const dv    = new DataView(bytes.buffer);
  dv.setUint16(0, 1, true);
  dv.setUint32(2, 500, true);
  dv.setUint16(6, 2, true);
  dv.setUint32(8, 700, true);
  return bytes;
}

function threeColumns(): TypedColumn[] {
  return [
    numericColumn(new Uint32Array([1, 2, 3])),
    structColumn(sampleRecords(), 6),
    stringColumn(['alpha', 'be', '']),
  ];
}

// ─── Single column ────────────────────────────────────────────────────────────

describe('single column', () => {
  it('round-trips 100 u64 values as one numeric output', () => {
    const values = u64Sequence();
    const frame  = cs.compressColumn(numericColumn(values));
    const output = ds.decompressOne(frame);

    expect(output.type).toBe('numeric');
    expect(output.elementWidth).toBe(8);
    expect(output.elementCount).toBe(100);
    expect(output.data.byteLength).toBe(800);
    expect(Array.from(new BigUint64Array(output.data.buffer))).toEqual(Array.from(values));
  });

  it('round-trips a struct column', () => {
    const output = ds.decompressOne(cs.compressColumn(structColumn(sampleRecords(), 6)));
    expect(output.type).toBe('struct');
    expect(output.elementWidth).toBe(6);
    expect(output.elementCount).toBe(2);
    expect(output.data).toEqual(sampleRecords());
  });

  it('round-trips a string column', () => {
    const output = ds.decompressOne(cs.compressColumn(stringColumn(['α', 'beta', ''])));
    expect(output.type).toBe('string');
    expect(output.elementCount).toBe(3);
    if (output.type === 'string') {
      expect(Array.from(output.stringLengths)).toEqual([2, 4, 0]);
    }
    expect(outputStrings(output)).toEqual(['α', 'beta', '']);
  });

  it('returns output bytes the caller owns', () => {
    const values = new Uint8Array([9, 8, 7, 6]);
    const output = ds.decompressOne(cs.compressColumn(numericColumn(values)));
    output.data[0] = 0;
    expect(ds.decompressOne(cs.compressColumn(numericColumn(values))).data[0]).toBe(9);
  });

  it('rejects a frame with more than one output', () => {
    const frame = cs.compressColumns(threeColumns());
    expect(() => ds.decompressOne(frame)).toThrow(ZlEngineError);
    expect(engine.liveHandles('typed_buffer')).toBe(0);
  });
});

// ─── Multi column ─────────────────────────────────────────────────────────────

describe('multi column', () => {
  it('decodes every output in submitted order', () => {
    const outputs = ds.decompressAll(cs.compressColumns(threeColumns()));
    expect(outputs.map((o) => o.type)).toEqual(['numeric', 'struct', 'string']);

    const [numeric, struct, strings] = outputs;
    expect(numeric?.elementCount).toBe(3);
    expect(Array.from(new Uint32Array(numeric?.data.buffer ?? new ArrayBuffer(0)))).toEqual([1, 2, 3]);
    expect(struct?.elementWidth).toBe(6);
    expect(struct?.elementCount).toBe(2);
    expect(struct?.data).toEqual(sampleRecords());
    expect(strings?.type).toBe('string');
    expect(strings ? outputStrings(strings) : []).toEqual(['alpha', 'be', '']);
  });

  it('timestamps, 12-byte records and strings come back byte for byte', () => {
    const ts      = BigUint64Array.from([1_700_000_000n, 1_700_000_060n, 1_700_000_120n]);
    const records = Uint8Array.from({ length: 36 }, (_, i) => i * 7);
    const names   = stringColumn(['north', 'south', 'east']);

    const outputs = ds.decompressAll(cs.compressColumns([
      numericColumn(ts),
      structColumn(records, 12),
      names,
    ]));

    expect(outputs).toHaveLength(3);
    expect(outputs[0]?.data).toEqual(new Uint8Array(ts.buffer));
    expect(outputs[1]?.data).toEqual(records);
    expect(outputs[1]?.elementCount).toBe(3);
    expect(outputs[2]?.data).toEqual(names.data);
    expect(outputs[2] ? outputStrings(outputs[2]) : []).toEqual(['north', 'south', 'east']);
  });

  it('a single-column list decodes to one output', () => {
    const outputs = decodeAll(ds, encodeColumns(cs, [numericColumn(new Int16Array([-1, 1]))]));
    expect(outputs).toHaveLength(1);
    expect(outputs[0]?.type).toBe('numeric');
  });

  it('uses one typed ref per column and frees them all', () => {
    engine.resetCalls();
    cs.compressColumns(threeColumns());
    expect(engine.calls.filter((c) => c === 'createTypedRef')).toHaveLength(3);
    expect(engine.calls.filter((c) => c === 'freeTypedRef')).toHaveLength(3);
    expect(engine.liveHandles('typed_ref')).toBe(0);
  });

  it('reads the output count before creating buffers', () => {
    const frame = cs.compressColumns(threeColumns());
    engine.resetCalls();
    ds.decompressAll(frame);
    expect(engine.calls.indexOf('frameOutputCount')).toBeLessThan(engine.calls.indexOf('createTypedBuffer'));
    expect(engine.calls.filter((c) => c === 'createTypedBuffer')).toHaveLength(3);
    expect(engine.liveHandles('typed_buffer')).toBe(0);
  });
});

// ─── Validation ───────────────────────────────────────────────────────────────

describe('validation before allocation', () => {
  it('a bad column makes no engine call at all', () => {
    const columns: TypedColumn[] = [
      numericColumn(new Uint32Array([1])),
      { kind: 'numeric', data: new Uint8Array(6), elementWidth: 4 },
    ];
    engine.resetCalls();
    expect(() => cs.compressColumns(columns))
      .toThrow('column 1: numeric data size 6 must be a multiple of elementWidth 4');
    expect(engine.calls).toEqual([]);
  });

  it('an empty column list is rejected', () => {
    expect(() => cs.compressColumns([])).toThrow(ZlValidationError);
  });

  it('an empty frame is rejected by both decoders', () => {
    expect(() => ds.decompressOne(new Uint8Array(0))).toThrow('frame must not be empty');
    expect(() => ds.decompressAll(new Uint8Array(0))).toThrow('frame must not be empty');
  });
});

// ─── Failures ─────────────────────────────────────────────────────────────────

describe('engine failures', () => {
  it('a typed ref allocation failure leaves no refs behind', () => {
    engine.failAllocation('typed_ref');
    expect(() => cs.compressColumns(threeColumns())).toThrow('failed to create numeric typed ref');
    expect(engine.liveHandles('typed_ref')).toBe(0);
  });

  it('a typed buffer allocation failure is an allocation error', () => {
    const frame = cs.compressColumn(numericColumn(new Uint8Array([1, 2])));
    engine.failAllocation('typed_buffer');
    expect(() => ds.decompressOne(frame)).toThrow(ZlAllocationError);
  });

  it('an undersized output buffer is fatal', () => {
    engine.boundOverride = 4;
    expect(() => cs.compressColumn(numericColumn(new Uint32Array([1, 2]))))
      .toThrow(/^output buffer of 4 bytes is too small: frame needs \d+ bytes; buffer holds 4$/);
    expect(engine.liveHandles('typed_ref')).toBe(0);
  });

  it('a write past the output buffer is fatal', () => {
    engine.boundOverride     = 4096;
    engine.overreportWritten = true;
    expect(() => cs.compressColumn(numericColumn(new Uint32Array([1, 2]))))
      .toThrow('engine reported 4097 bytes written into a 4096-byte output buffer');
  });

  it('decodeAll on a frame without a header fails before allocating buffers', () => {
    engine.resetCalls();
    expect(() => ds.decompressAll(new Uint8Array([1, 2, 3]))).toThrow(ZlEngineError);
    expect(engine.calls).toEqual(['frameOutputCount']);
  });

  it('a truncated payload surfaces the engine code', () => {
    const frame     = cs.compressColumn(numericColumn(new Uint32Array([5, 6, 7])));
    const truncated = frame.subarray(0, frame.byteLength - 2);
    let caught: unknown;
    try {
      ds.decompressOne(truncated);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ZlEngineError);
    if (caught instanceof ZlEngineError) {
      expect(caught.code).toBe('corruption');
      expect(caught.message).toBe('output 0 payload runs past end of frame');
    }
    expect(engine.liveHandles('typed_buffer')).toBe(0);
  });
});
