/**
 * Sessions collected without close()
 *
 * Needs --expose-gc (set in vitest.config.ts); skipped without it.
 *
 * ── Scenarios ────────────────────────────────────────────────────────────────
 *
 *   plain session       context and default graph come back to the engine
 *   attached session    the compressor's count drops, so the owner's close frees it
 *   decompression       the context comes back to the engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ZlCompressionSession, ZlCompressor, ZlDecompressionSession } from '../src/index';
import type { HandleKind } from '../src/index';
import { FakeEngine } from './support/fake-engine';

const SOURCE = 'id: UInt32LE\nvalue: Float64LE';

function gcFunction(): (() => void) | null {
  const gc: unknown = Reflect.get(globalThis, 'gc');
  return typeof gc === 'function' ? () => { gc(); } : null;
}

const hasGc = gcFunction() !== null;

/** Collects until the engine holds no handle of `kind`, or gives up. */
async function collectUntilFreed(engine: FakeEngine, kind: HandleKind): Promise<void> {
  const gc = gcFunction();
  for (let i = 0; i < 50 && engine.liveHandles(kind) > 0; i++) {
    gc?.();
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
}

let engine: FakeEngine;

beforeEach(() => {
  engine = new FakeEngine();
});

describe.skipIf(!hasGc)('collection without close', () => {
  it('a dropped compression session frees its context and default graph', async () => {
    (() => {
      ZlCompressionSession.create(engine);
    })();
    await collectUntilFreed(engine, 'cctx');
    expect(engine.liveHandles()).toBe(0);
  });

  it('a dropped session releases the compressor it was attached to', async () => {
    const compressor = ZlCompressor.fromSource(engine, SOURCE);
    (() => {
      ZlCompressionSession.create(engine, { compressor });
    })();
    expect(compressor.referenceCount).toBe(2);

    await collectUntilFreed(engine, 'cctx');
    expect(compressor.referenceCount).toBe(1);

    compressor.close();
    expect(compressor.released).toBe(true);
    expect(engine.liveHandles()).toBe(0);
  });

  it('a session closed before collection is not released twice', async () => {
    const compressor = ZlCompressor.fromSource(engine, SOURCE);
    (() => {
      ZlCompressionSession.create(engine, { compressor }).close();
    })();
    const other = ZlCompressionSession.create(engine);

    const gc = gcFunction();
    for (let i = 0; i < 10; i++) {
      gc?.();
      await new Promise((resolve) => setTimeout(resolve, 0));
    }
    expect(compressor.referenceCount).toBe(1);
    expect(engine.liveHandles('cctx')).toBe(1);

    other.close();
    compressor.close();
    expect(engine.liveHandles()).toBe(0);
  });

  it('a dropped decompression session frees its context', async () => {
    (() => {
      ZlDecompressionSession.create(engine);
    })();
    await collectUntilFreed(engine, 'dctx');
    expect(engine.liveHandles()).toBe(0);
  });
});
