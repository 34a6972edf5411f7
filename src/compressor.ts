/**
 * @zlframe/core — ZlCompressor
 *
 * A compiled compression graph, owned independently of any session.
 *
 * ── Sharing ──────────────────────────────────────────────────────────────────
 *
 * Attaching a compressor to a session only reads its graph, so one
 * compressor may be attached to any number of sessions at once. Each
 * attached session holds one reference; the caller that built the
 * compressor holds the first. The engine graph is freed when the last
 * reference goes:
 *
 *   fromDescription()      refs = 1
 *   session.attach…()      refs + 1
 *   session detach/close   refs − 1   (also when a session is collected unclosed)
 *   compressor.close()     refs − 1   (owner's reference; idempotent)
 *
 * The compressor never points back at its sessions. The count lives in
 * module state rather than on the instance, and only sessions move it.
 */

import { compileDescription } from './compiler';
import { ZlAllocationError, ZlStateError, ZlValidationError, unwrap } from './errors';
import { acquire, type HandleGuard } from './guard';
import { createNoopLogger, type Logger } from './logger';
import type { GraphHandle, ZlEngine } from './engine';

export interface CompressorOptions {
  logger?: Logger;
}

// ─── Reference state ──────────────────────────────────────────────────────────

interface CompressorState {
  readonly graph:  HandleGuard<GraphHandle>;
  readonly logger: Logger;
  refs:            number;
  ownerClosed:     boolean;
}

// Kept off the class so that callers cannot move the count themselves. Only
// session.ts takes references, through the functions below.
const states = new WeakMap<ZlCompressor, CompressorState>();

function stateOf(compressor: ZlCompressor): CompressorState {
  const state = states.get(compressor);
  if (state === undefined) {
    throw new ZlStateError('compressor was not built by ZlCompressor.fromDescription');
  }
  return state;
}

function dropReference(state: CompressorState): void {
  if (state.refs === 0) return;
  state.refs--;
  if (state.refs === 0) {
    state.graph.release();
    state.logger.debug('compressor graph freed');
  }
}

/** Graph handle for attaching to a compression context. */
export function compressorGraph(compressor: ZlCompressor): GraphHandle {
  return stateOf(compressor).graph.handle;
}

/** Add a session's reference. A compressor its owner closed takes no new ones. */
export function retainCompressor(compressor: ZlCompressor): void {
  const state = stateOf(compressor);
  if (state.ownerClosed) {
    throw new ZlStateError('compressor is closed; build a new one to attach');
  }
  state.refs++;
}

/** Drop a session's reference; the last one out frees the graph. */
export function releaseCompressor(compressor: ZlCompressor): void {
  dropReference(stateOf(compressor));
}

// ─── ZlCompressor ─────────────────────────────────────────────────────────────

export class ZlCompressor {
  readonly engine: ZlEngine;

  private constructor(engine: ZlEngine, graph: HandleGuard<GraphHandle>, logger: Logger) {
    this.engine = engine;
    states.set(this, { graph: graph.bindTo(this), logger, refs: 1, ownerClosed: false });
  }

  /**
   * Build a compressor from compiled description bytes.
   *
   * The graph is built and then selected as the starting graph, so a
   * compressor that comes back from here is known to be usable. Either step
   * failing frees the graph before the error propagates.
   */
  static fromDescription(engine: ZlEngine, description: Uint8Array, options: CompressorOptions = {}): ZlCompressor {
    if (description.byteLength === 0) {
      throw new ZlValidationError('compiled description must not be empty');
    }
    const logger = (options.logger ?? createNoopLogger()).child({ scope: 'compressor' });

    const graph = acquire(
      engine.createGraph(),
      (handle) => engine.freeGraph(handle),
      () => new ZlAllocationError('failed to create compressor graph'),
    );
    try {
      const id = unwrap(
        engine.setupDescriptionGraph(graph.handle, description),
        'failed to build description graph',
        logger,
      );
      unwrap(engine.selectStartingGraph(graph.handle, id), 'failed to select starting graph', logger);
      logger.debug('compressor built', { graphId: id, descriptionBytes: description.byteLength });
    } catch (err) {
      graph.release();
      throw err;
    }
    return new ZlCompressor(engine, graph, logger);
  }

  /** Compile `source` and build a compressor from the result. */
  static fromSource(engine: ZlEngine, source: string, options: CompressorOptions = {}): ZlCompressor {
    return ZlCompressor.fromDescription(engine, compileDescription(engine, source), options);
  }

  /** True once the owner has called close(). Attached sessions may still use it. */
  get closed(): boolean {
    return stateOf(this).ownerClosed;
  }

  /** Live references: the owner's (until close) plus one per attached session. */
  get referenceCount(): number {
    return stateOf(this).refs;
  }

  /** True once the engine graph has been freed. */
  get released(): boolean {
    return stateOf(this).graph.released;
  }

  /** Drop the owner's reference. The graph lives on while sessions hold it. */
  close(): void {
    const state = stateOf(this);
    if (state.ownerClosed) return;
    state.ownerClosed = true;
    dropReference(state);
  }
}
