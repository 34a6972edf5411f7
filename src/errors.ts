/**
 * @zlframe/core — error classes
 *
 * Every failure this layer reports is a ZlError subclass. `kind` separates
 * the categories callers branch on:
 *
 *   validation  — caught locally, before any engine call. Nothing was allocated
 *                 and no session state changed.
 *   engine      — the engine rejected a call. `code` is the engine's error
 *                 code; the message is the engine's context when it gave one.
 *   compile     — a description source did not compile. `diagnostic` is the
 *                 compiler's own message.
 *   allocation  — an engine handle could not be created, or an output buffer
 *                 was too small for what the engine produced. Fatal for the call.
 *   state       — a closed handle was used, or a session call re-entered
 *                 while another call on the same session was in flight.
 */

import type { EngineErrorCode, EngineResult } from './engine';
import type { Logger } from './logger';

export type ZlErrorKind = 'validation' | 'engine' | 'compile' | 'allocation' | 'state';

export abstract class ZlError extends Error {
  abstract readonly kind: ZlErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ZlValidationError extends ZlError {
  readonly kind = 'validation';
}

export class ZlEngineError extends ZlError {
  readonly kind = 'engine';

  constructor(
    message: string,
    readonly code: EngineErrorCode,
  ) {
    super(message);
  }
}

export class ZlCompileError extends ZlError {
  readonly kind = 'compile';

  constructor(
    message: string,
    readonly diagnostic: string,
  ) {
    super(message);
  }
}

export class ZlAllocationError extends ZlError {
  readonly kind = 'allocation';
}

export class ZlStateError extends ZlError {
  readonly kind = 'state';
}

// ─── Engine results ───────────────────────────────────────────────────────────

/**
 * Value of a successful engine call, or a ZlEngineError carrying the engine's
 * context (or `fallback` when the engine gave none).
 */
export function unwrap<T>(result: EngineResult<T>, fallback: string, logger?: Logger): T {
  if (result.ok) {
    return result.value;
  }
  const message = result.context ?? fallback;
  logger?.debug('engine call failed', { code: result.code, message });
  throw new ZlEngineError(message, result.code);
}
