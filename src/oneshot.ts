/**
 * @zlframe/core — one-shot helpers
 *
 * Convenience calls that create a session, use it once and close it.
 * Reuse a session instead when compressing many buffers: context setup is
 * paid on every call here.
 */

import { VERSION_MAJOR_DIVISOR, VERSION_MINOR_DIVISOR } from './constants';
import { ZlValidationError } from './errors';
import { ZlCompressionSession, ZlDecompressionSession } from './session';
import type { Logger } from './logger';
import type { ZlEngine } from './engine';

export interface OneShotOptions {
  level?:  number;
  logger?: Logger;
}

export function compress(engine: ZlEngine, data: Uint8Array, options: OneShotOptions = {}): Uint8Array {
  const session = ZlCompressionSession.create(engine, options);
  try {
    return session.compress(data);
  } finally {
    session.close();
  }
}

export function decompress(engine: ZlEngine, frame: Uint8Array, options: Pick<OneShotOptions, 'logger'> = {}): Uint8Array {
  const session = ZlDecompressionSession.create(engine, options);
  try {
    return session.decompress(frame);
  } finally {
    session.close();
  }
}

/** Upper bound on the compressed size of `srcSize` input bytes. */
export function compressBound(engine: ZlEngine, srcSize: number): number {
  if (!Number.isInteger(srcSize) || srcSize < 0) {
    throw new ZlValidationError(`srcSize must be a non-negative integer; got ${srcSize}`);
  }
  return engine.compressBound(srcSize);
}

/** Engine library version as 'major.minor.patch'. */
export function engineVersion(engine: ZlEngine): string {
  const n     = engine.versionNumber();
  const major = Math.floor(n / VERSION_MAJOR_DIVISOR);
  const minor = Math.floor(n / VERSION_MINOR_DIVISOR) % 100;
  const patch = n % 100;
  return `${major}.${minor}.${patch}`;
}
