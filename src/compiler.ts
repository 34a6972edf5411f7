/**
 * @zlframe/core — description compiler
 *
 * Turns format-description source text into the compiled bytes a
 * ZlCompressor is built from. The parser and semantic checks belong to the
 * engine; this wrapper only guards the input and carries the compiler's
 * diagnostic through unchanged. No session is involved.
 */

import { ZlCompileError } from './errors';
import type { ZlEngine } from './engine';

export function compileDescription(engine: ZlEngine, source: string): Uint8Array {
  if (source.length === 0) {
    const diagnostic = 'description source must not be empty';
    throw new ZlCompileError(diagnostic, diagnostic);
  }

  const result = engine.compileDescription(source);
  if (!result.ok) {
    const diagnostic = result.context ?? 'compiler reported no diagnostic';
    throw new ZlCompileError(`description compilation failed: ${diagnostic}`, diagnostic);
  }
  return result.value;
}
