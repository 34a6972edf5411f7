/**
 * @zlframe/core — typed frame encode / decode
 *
 * ── Encode ───────────────────────────────────────────────────────────────────
 *
 *   1. validate      — every column, before anything is allocated
 *   2. typed refs    — one engine ref per column, in submitted order
 *   3. size          — compressBound(Σ column bytes)
 *   4. compress      — one call with all refs; output i is column i
 *   5. release refs  — always, success or failure
 *
 * A column that fails step 1 aborts the call with nothing allocated, so
 * a partial frame can never be produced.
 *
 * ── Decode ───────────────────────────────────────────────────────────────────
 *
 * decodeAll reads the frame's output count before creating any typed
 * buffer. Output bytes are copied out before the buffers are freed.
 *
 * ── Output sizing ────────────────────────────────────────────────────────────
 *
 * The output buffer is sized once from the engine's bound. If the engine
 * still reports it too small, or claims to have written past its end, the
 * call fails with ZlAllocationError. A frame is never truncated to fit.
 */

import { outputTypeFromCode } from './constants';
import { validateColumn, validateColumns, totalByteLength } from './column';
import {
  ZlAllocationError,
  ZlEngineError,
  ZlValidationError,
  unwrap,
} from './errors';
import { acquire, type HandleGuard } from './guard';
import type { Logger } from './logger';
import type { ZlCompressionSession, ZlDecompressionSession } from './session';
import type {
  EngineResult,
  TypedBufferContents,
  TypedBufferHandle,
  TypedRefHandle,
  ZlEngine,
} from './engine';
import type { TypedColumn, TypedOutput, ValidatedColumn } from './types';

// ─── Output sizing ────────────────────────────────────────────────────────────

/**
 * The written prefix of `dst`, copied. Capacity failures are fatal
 * (ZlAllocationError); any other engine failure is a ZlEngineError.
 */
export function takeWritten(
  dst:      Uint8Array,
  result:   EngineResult<number>,
  fallback: string,
  logger:   Logger,
): Uint8Array {
  if (!result.ok && result.code === 'dst_capacity_too_small') {
    logger.error('output buffer too small', { capacity: dst.byteLength });
    throw new ZlAllocationError(
      `output buffer of ${dst.byteLength} bytes is too small: ${result.context ?? fallback}`,
    );
  }
  const written = unwrap(result, fallback, logger);
  if (written > dst.byteLength) {
    logger.error('engine wrote past output buffer', { capacity: dst.byteLength, written });
    throw new ZlAllocationError(
      `engine reported ${written} bytes written into a ${dst.byteLength}-byte output buffer`,
    );
  }
  return dst.slice(0, written);
}

// ─── Encode ───────────────────────────────────────────────────────────────────

function compressValidated(session: ZlCompressionSession, columns: readonly ValidatedColumn[]): Uint8Array {
  const [first] = columns;
  const fallback = columns.length === 1 && first
    ? `typed ${first.kind} compression failed`
    : 'multi-typed compression failed';

  return session.run('compressTyped', ({ engine, handle, logger }) => {
    const refs: HandleGuard<TypedRefHandle>[] = [];
    try {
      for (const column of columns) {
        refs.push(acquire(
          engine.createTypedRef(column),
          (ref) => engine.freeTypedRef(ref),
          () => new ZlAllocationError(`failed to create ${column.kind} typed ref`),
        ));
      }
      const dst = new Uint8Array(engine.compressBound(totalByteLength(columns)));
      const result = engine.compressTyped(handle, dst, refs.map((ref) => ref.handle));
      return takeWritten(dst, result, fallback, logger);
    } finally {
      for (const ref of refs) ref.release();
    }
  });
}

/** Compress one column into a single-output frame. */
export function encodeColumn(session: ZlCompressionSession, column: TypedColumn): Uint8Array {
  return compressValidated(session, [validateColumn(column)]);
}

/**
 * Compress columns into one frame. Output i of the frame is column i.
 * All columns are validated before the engine sees any of them.
 */
export function encodeColumns(session: ZlCompressionSession, columns: readonly TypedColumn[]): Uint8Array {
  return compressValidated(session, validateColumns(columns));
}

// ─── Decode ───────────────────────────────────────────────────────────────────

function requireFrame(frame: Uint8Array): void {
  if (frame.byteLength === 0) {
    throw new ZlValidationError('frame must not be empty');
  }
}

/** Copy a filled typed buffer out of engine memory. */
function toOutput(contents: TypedBufferContents): TypedOutput {
  const type = outputTypeFromCode(contents.typeCode);
  const base = {
    data:         contents.data.slice(),
    elementWidth: contents.elementWidth,
    elementCount: contents.elementCount,
  };
  if (type !== 'string') {
    return { type, ...base };
  }
  if (contents.stringLengths === null) {
    throw new ZlEngineError('string output is missing its lengths', 'corruption');
  }
  return { type, ...base, stringLengths: contents.stringLengths.slice() };
}

function createTypedBuffer(engine: ZlEngine): HandleGuard<TypedBufferHandle> {
  return acquire(
    engine.createTypedBuffer(),
    (buffer) => engine.freeTypedBuffer(buffer),
    () => new ZlAllocationError('failed to create typed buffer'),
  );
}

/** Decode a frame holding exactly one output. */
export function decodeOne(session: ZlDecompressionSession, frame: Uint8Array): TypedOutput {
  requireFrame(frame);
  return session.run('decompressTyped', ({ engine, handle, logger }) => {
    const buffer = createTypedBuffer(engine);
    try {
      unwrap(engine.decompressTyped(handle, [buffer.handle], frame), 'typed decompression failed', logger);
      return toOutput(engine.readTypedBuffer(buffer.handle));
    } finally {
      buffer.release();
    }
  });
}

/** Decode every output of a frame, in the order they were encoded. */
export function decodeAll(session: ZlDecompressionSession, frame: Uint8Array): TypedOutput[] {
  requireFrame(frame);
  return session.run('decompressMultiTyped', ({ engine, handle, logger }) => {
    const count = unwrap(engine.frameOutputCount(frame), 'failed to get number of outputs from frame', logger);

    const buffers: HandleGuard<TypedBufferHandle>[] = [];
    try {
      for (let i = 0; i < count; i++) {
        buffers.push(createTypedBuffer(engine));
      }
      unwrap(
        engine.decompressTyped(handle, buffers.map((buffer) => buffer.handle), frame),
        'multi-typed decompression failed',
        logger,
      );
      return buffers.map((buffer) => toOutput(engine.readTypedBuffer(buffer.handle)));
    } finally {
      for (const buffer of buffers) buffer.release();
    }
  });
}
