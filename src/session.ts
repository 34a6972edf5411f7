/**
 * @zlframe/core — compression and decompression sessions
 *
 * A session owns one engine context and reuses it across calls.
 *
 * ── Affinity ─────────────────────────────────────────────────────────────────
 *
 * The engine mutates a context in place on every call. A session therefore
 * takes one call at a time from one owner. Every engine-touching method goes
 * through run(), which rejects a closed session and a call that re-enters
 * while another is in flight on the same session. Callers that need
 * parallelism create one session per worker; a ZlCompressor can be shared
 * between them.
 *
 * ── Active graph ─────────────────────────────────────────────────────────────
 *
 * A compression session always has an active graph:
 *
 *   default     — the engine's generic graph, installed by create()
 *   compressor  — an attached ZlCompressor's graph (session holds a reference)
 *
 * detachCompressor() switches back to the default graph, so attach and
 * detach are symmetric and there is no "no graph" state.
 *
 * ── Sticky level ─────────────────────────────────────────────────────────────
 *
 * setLevel() writes the engine's compression-level parameter with sticky
 * parameters enabled, so the level holds for every later call on the
 * session until it is set again.
 */

import { LEVEL_MAX, LEVEL_MIN } from './constants';
import {
  ZlAllocationError,
  ZlStateError,
  ZlValidationError,
  unwrap,
} from './errors';
import { acquire, cancelCollect, releaseOnCollect, type HandleGuard } from './guard';
import { createNoopLogger, type Logger } from './logger';
import { decodeAll, decodeOne, encodeColumn, encodeColumns, takeWritten } from './codec';
import { compressorGraph, releaseCompressor, retainCompressor, type ZlCompressor } from './compressor';
import type {
  CompressionContextHandle,
  DecompressionContextHandle,
  EngineHandle,
  EngineResult,
  GraphHandle,
  ZlEngine,
} from './engine';
import type { TypedColumn, TypedOutput } from './types';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface CompressionSessionOptions {
  /** Applied with setLevel() right after creation. */
  level?:      number;
  /** Applied with attachCompressor() right after creation. */
  compressor?: ZlCompressor;
  logger?:     Logger;
}

export interface DecompressionSessionOptions {
  logger?: Logger;
}

// ─── Call gate ────────────────────────────────────────────────────────────────

/** What a gated call gets to work with. */
export interface SessionCall<H extends EngineHandle> {
  readonly engine: ZlEngine;
  readonly handle: H;
  readonly logger: Logger;
}

class CallGate<H extends EngineHandle> {
  private inFlight: string | null = null;

  constructor(
    private readonly label:   string,
    private readonly engine:  ZlEngine,
    private readonly context: HandleGuard<H>,
    private readonly logger:  Logger,
  ) {}

  get closed(): boolean {
    return this.context.released;
  }

  run<T>(operation: string, fn: (call: SessionCall<H>) => T): T {
    if (this.context.released) {
      throw new ZlStateError(`${this.label} session is closed`);
    }
    if (this.inFlight !== null) {
      throw new ZlStateError(
        `${this.label} session is busy with ${this.inFlight}; ` +
        `cannot start ${operation} (one call at a time per session)`,
      );
    }
    this.inFlight = operation;
    try {
      return fn({ engine: this.engine, handle: this.context.handle, logger: this.logger });
    } finally {
      this.inFlight = null;
    }
  }
}

/** Setup parameters are best-effort: a failure is logged, not thrown. */
function warnOnFailure(result: EngineResult<void>, what: string, logger: Logger): void {
  if (!result.ok) {
    logger.warn(`could not set ${what}`, { code: result.code, message: result.context });
  }
}

function requireData(data: Uint8Array, what: string): void {
  if (data.byteLength === 0) {
    throw new ZlValidationError(`${what} must not be empty`);
  }
}

/** Create the generic graph and make it the context's active graph. */
function installDefaultGraph(
  engine: ZlEngine,
  cctx:   CompressionContextHandle,
  logger: Logger,
): HandleGuard<GraphHandle> {
  const graph = acquire(
    engine.createGraph(),
    (handle) => engine.freeGraph(handle),
    () => new ZlAllocationError('failed to create default compression graph'),
  );
  try {
    unwrap(engine.selectStartingGraph(graph.handle, engine.genericGraphId), 'failed to select generic graph', logger);
    unwrap(engine.referenceGraph(cctx, graph.handle), 'failed to install default graph', logger);
  } catch (err) {
    graph.release();
    throw err;
  }
  return graph;
}

// ─── ZlCompressionSession ─────────────────────────────────────────────────────

type ActiveGraph =
  | { readonly kind: 'default' }
  | { readonly kind: 'compressor'; readonly compressor: ZlCompressor };

/**
 * Everything a compression session owns, kept apart from the session so the
 * collection callback can release it without holding the session alive.
 */
interface CompressionResources {
  readonly cctx:         HandleGuard<CompressionContextHandle>;
  readonly defaultGraph: HandleGuard<GraphHandle>;
  active:                ActiveGraph;
}

/** Context first, then the graphs it referenced. Idempotent. */
function releaseResources(resources: CompressionResources): void {
  resources.cctx.release();
  resources.defaultGraph.release();
  const active = resources.active;
  resources.active = { kind: 'default' };
  if (active.kind === 'compressor') {
    releaseCompressor(active.compressor);
  }
}

function releaserFor(resources: CompressionResources): () => void {
  return () => releaseResources(resources);
}

export class ZlCompressionSession {
  readonly engine: ZlEngine;
  private readonly resources: CompressionResources;
  private readonly logger:    Logger;
  private readonly gate:      CallGate<CompressionContextHandle>;
  private currentLevel: number | undefined;

  private constructor(
    engine:       ZlEngine,
    cctx:         HandleGuard<CompressionContextHandle>,
    defaultGraph: HandleGuard<GraphHandle>,
    logger:       Logger,
  ) {
    this.engine    = engine;
    this.resources = { cctx, defaultGraph, active: { kind: 'default' } };
    this.logger    = logger;
    this.gate      = new CallGate('compression', engine, cctx, logger);
    releaseOnCollect(this, releaserFor(this.resources), this.resources);
  }

  /**
   * Allocate a compression context with the engine's generic graph installed.
   *
   * Succeeds completely or throws; anything allocated before a failure is
   * freed first.
   */
  static create(engine: ZlEngine, options: CompressionSessionOptions = {}): ZlCompressionSession {
    const logger = (options.logger ?? createNoopLogger()).child({ scope: 'cctx' });

    const cctx = acquire(
      engine.createCompressionContext(),
      (handle) => engine.freeCompressionContext(handle),
      () => new ZlAllocationError('failed to create compression context'),
    );

    let graph: HandleGuard<GraphHandle>;
    try {
      warnOnFailure(
        engine.setParameter(cctx.handle, 'format_version', engine.defaultFormatVersion()),
        'format version',
        logger,
      );
      warnOnFailure(engine.setParameter(cctx.handle, 'sticky_parameters', 1), 'sticky parameters', logger);
      graph = installDefaultGraph(engine, cctx.handle, logger);
    } catch (err) {
      cctx.release();
      throw err;
    }

    const session = new ZlCompressionSession(engine, cctx, graph, logger);
    logger.debug('compression session created');

    try {
      if (options.level !== undefined)      session.setLevel(options.level);
      if (options.compressor !== undefined) session.attachCompressor(options.compressor);
    } catch (err) {
      session.close();
      throw err;
    }
    return session;
  }

  get closed(): boolean {
    return this.gate.closed;
  }

  /** Last level accepted by setLevel(); undefined means the engine default. */
  get level(): number | undefined {
    return this.currentLevel;
  }

  /** The attached compressor, or null when the default graph is active. */
  get compressor(): ZlCompressor | null {
    const active = this.resources.active;
    return active.kind === 'compressor' ? active.compressor : null;
  }

  /** @internal Entry point for every engine call made on this session. */
  run<T>(operation: string, fn: (call: SessionCall<CompressionContextHandle>) => T): T {
    return this.gate.run(operation, fn);
  }

  // ── Configuration ─────────────────────────────────────────────────────────

  /**
   * Set the compression level for this and every later call.
   *
   * Integers are passed to the engine as-is, including values outside
   * LEVEL_MIN..LEVEL_MAX; the engine's rejection surfaces as ZlEngineError
   * and the previous level stays in effect.
   */
  setLevel(level: number): void {
    if (!Number.isInteger(level)) {
      throw new ZlValidationError(`compression level must be an integer; got ${level}`);
    }
    this.run('setLevel', ({ engine, handle, logger }) => {
      if (level < LEVEL_MIN || level > LEVEL_MAX) {
        logger.debug('level outside documented range; forwarding to engine', { level });
      }
      unwrap(engine.setParameter(handle, 'compression_level', level), 'failed to set compression level', logger);
    });
    this.currentLevel = level;
    this.logger.debug('compression level set', { level });
  }

  /**
   * Make `compressor`'s graph the active graph. The session keeps the
   * compressor alive until it is detached, replaced, or the session closes.
   */
  attachCompressor(compressor: ZlCompressor): void {
    if (compressor.engine !== this.engine) {
      throw new ZlValidationError('compressor was built by a different engine than this session');
    }
    if (compressor.closed) {
      throw new ZlStateError('compressor is closed; build a new one to attach');
    }
    this.run('attachCompressor', ({ engine, handle, logger }) => {
      unwrap(engine.referenceGraph(handle, compressorGraph(compressor)), 'failed to set compressor', logger);
    });
    retainCompressor(compressor);
    const previous = this.resources.active;
    this.resources.active = { kind: 'compressor', compressor };
    if (previous.kind === 'compressor') {
      releaseCompressor(previous.compressor);
    }
    this.logger.debug('compressor attached');
  }

  /** Switch back to the default graph and drop the compressor reference. */
  detachCompressor(): void {
    const previous = this.resources.active;
    if (previous.kind === 'default') return;
    this.run('detachCompressor', ({ engine, handle, logger }) => {
      unwrap(engine.referenceGraph(handle, this.resources.defaultGraph.handle), 'failed to install default graph', logger);
    });
    this.resources.active = { kind: 'default' };
    releaseCompressor(previous.compressor);
    this.logger.debug('compressor detached');
  }

  // ── Compression ───────────────────────────────────────────────────────────

  /** Compress untyped bytes with the active graph. */
  compress(data: Uint8Array): Uint8Array {
    requireData(data, 'input');
    return this.run('compress', ({ engine, handle, logger }) => {
      const dst = new Uint8Array(engine.compressBound(data.byteLength));
      return takeWritten(dst, engine.compress(handle, dst, data), 'compression failed', logger);
    });
  }

  /** Compress one typed column into a single-output frame. */
  compressColumn(column: TypedColumn): Uint8Array {
    return encodeColumn(this, column);
  }

  /** Compress columns into one frame, one output per column, in order. */
  compressColumns(columns: readonly TypedColumn[]): Uint8Array {
    return encodeColumns(this, columns);
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Free the engine context and drop any compressor reference. Idempotent.
   * A session collected without close() goes through the same release.
   */
  close(): void {
    if (this.resources.cctx.released) return;
    cancelCollect(this.resources);
    releaseResources(this.resources);
    this.logger.debug('compression session closed');
  }
}

// ─── ZlDecompressionSession ───────────────────────────────────────────────────

export class ZlDecompressionSession {
  readonly engine: ZlEngine;
  private readonly dctx:   HandleGuard<DecompressionContextHandle>;
  private readonly logger: Logger;
  private readonly gate:   CallGate<DecompressionContextHandle>;

  private constructor(engine: ZlEngine, dctx: HandleGuard<DecompressionContextHandle>, logger: Logger) {
    this.engine = engine;
    this.dctx   = dctx.bindTo(this);
    this.logger = logger;
    this.gate   = new CallGate('decompression', engine, dctx, logger);
  }

  static create(engine: ZlEngine, options: DecompressionSessionOptions = {}): ZlDecompressionSession {
    const logger = (options.logger ?? createNoopLogger()).child({ scope: 'dctx' });
    const dctx   = acquire(
      engine.createDecompressionContext(),
      (handle) => engine.freeDecompressionContext(handle),
      () => new ZlAllocationError('failed to create decompression context'),
    );
    logger.debug('decompression session created');
    return new ZlDecompressionSession(engine, dctx, logger);
  }

  get closed(): boolean {
    return this.gate.closed;
  }

  /** @internal Entry point for every engine call made on this session. */
  run<T>(operation: string, fn: (call: SessionCall<DecompressionContextHandle>) => T): T {
    return this.gate.run(operation, fn);
  }

  /** Decompress a frame to its untyped bytes. */
  decompress(frame: Uint8Array): Uint8Array {
    requireData(frame, 'frame');
    return this.run('decompress', ({ engine, handle, logger }) => {
      const size = unwrap(engine.decompressedSize(frame), 'failed to read decompressed size from frame', logger);
      const dst  = new Uint8Array(size);
      return takeWritten(dst, engine.decompress(handle, dst, frame), 'decompression failed', logger);
    });
  }

  /** Decode a single-output frame. */
  decompressOne(frame: Uint8Array): TypedOutput {
    return decodeOne(this, frame);
  }

  /** Decode every output of a frame, in frame order. */
  decompressAll(frame: Uint8Array): TypedOutput[] {
    return decodeAll(this, frame);
  }

  /** Free the engine context. Idempotent. */
  close(): void {
    if (this.dctx.released) return;
    this.dctx.release();
    this.logger.debug('decompression session closed');
  }
}
