/**
 * @zlframe/core — frame introspection
 *
 * readFrameInfo() reports what a frame declares without decoding it and
 * without any session. The header fields (format version, output count)
 * must be readable or the call fails. Per-output fields degrade
 * independently: one unreadable field becomes 'unknown' and the rest of the
 * report still comes back.
 */

import { outputTypeFromCode } from './constants';
import { ZlEngineError, ZlValidationError, unwrap } from './errors';
import { acquire } from './guard';
import type { EngineResult, ZlEngine } from './engine';
import type { FrameInfo, FrameOutputInfo, Unknown } from './types';

function orUnknown(result: EngineResult<number>): number | Unknown {
  return result.ok ? result.value : 'unknown';
}

export function readFrameInfo(engine: ZlEngine, frame: Uint8Array): FrameInfo {
  if (frame.byteLength === 0) {
    throw new ZlValidationError('frame must not be empty');
  }

  const info = acquire(
    engine.openFrameInfo(frame),
    (handle) => engine.freeFrameInfo(handle),
    () => new ZlEngineError('failed to open frame header', 'corruption'),
  );

  try {
    const handle        = info.handle;
    const formatVersion = unwrap(engine.frameFormatVersion(handle), 'failed to get format version');
    const outputCount   = unwrap(engine.frameInfoOutputCount(handle), 'failed to get number of outputs');

    const outputs: FrameOutputInfo[] = [];
    for (let i = 0; i < outputCount; i++) {
      const type = engine.frameOutputType(handle, i);
      outputs.push({
        type:             type.ok ? outputTypeFromCode(type.value) : 'unknown',
        decompressedSize: orUnknown(engine.frameOutputSize(handle, i)),
        elementCount:     orUnknown(engine.frameOutputElementCount(handle, i)),
      });
    }
    return { formatVersion, outputCount, outputs };
  } finally {
    info.release();
  }
}
