/**
 * @zlframe/core — engine port
 *
 * The compression engine is an external collaborator: entropy coding, graph
 * execution and the physical frame bytes all live behind this interface.
 * A native addon, a WASM build, or an in-process stand-in implements it;
 * this layer never looks inside a handle.
 *
 * ── Conventions ──────────────────────────────────────────────────────────────
 *
 *   create*()  returns null when the engine cannot allocate the handle.
 *   free*()    releases a handle. Called exactly once per handle by HandleGuard.
 *   Calls that can fail return an EngineResult. `context` is the engine's
 *   own description of the failure, when it has one.
 *
 * Writes go into caller-allocated `dst` buffers; the returned value is the
 * number of bytes written. An engine must never write past dst.byteLength.
 */

// ─── Handles ──────────────────────────────────────────────────────────────────

export type HandleKind = 'cctx' | 'dctx' | 'graph' | 'typed_ref' | 'typed_buffer' | 'frame_info';

/** Opaque engine handle. Implementations add their own state. */
export interface EngineHandle {
  readonly handleKind: HandleKind;
}

export interface CompressionContextHandle   extends EngineHandle { readonly handleKind: 'cctx' }
export interface DecompressionContextHandle extends EngineHandle { readonly handleKind: 'dctx' }
export interface GraphHandle                extends EngineHandle { readonly handleKind: 'graph' }
export interface TypedRefHandle             extends EngineHandle { readonly handleKind: 'typed_ref' }
export interface TypedBufferHandle          extends EngineHandle { readonly handleKind: 'typed_buffer' }
export interface FrameInfoHandle            extends EngineHandle { readonly handleKind: 'frame_info' }

/** Identifier of a graph inside a compressor graph handle. */
export type GraphId = number;

// ─── Results ──────────────────────────────────────────────────────────────────

export type EngineErrorCode =
  | 'generic'
  | 'allocation'
  | 'parameter_invalid'
  | 'src_size_too_small'
  | 'dst_capacity_too_small'
  | 'corruption'
  | 'graph_invalid'
  | 'compilation';

export type EngineResult<T> =
  | { readonly ok: true;  readonly value: T }
  | { readonly ok: false; readonly code: EngineErrorCode; readonly context?: string };

// ─── Parameters ───────────────────────────────────────────────────────────────

export type CompressionParameter = 'compression_level' | 'format_version' | 'sticky_parameters';

// ─── Typed payloads ───────────────────────────────────────────────────────────

/** Shape handed to createTypedRef. The engine borrows `data`; it must not keep it. */
export type TypedRefShape =
  | { readonly kind: 'numeric'; readonly data: Uint8Array; readonly elementWidth: number; readonly elementCount: number }
  | { readonly kind: 'struct';  readonly data: Uint8Array; readonly recordWidth:  number; readonly recordCount:  number }
  | { readonly kind: 'string';  readonly data: Uint8Array; readonly lengths: Uint32Array };

/**
 * Read-only view of a filled typed buffer. `data` and `stringLengths` may
 * alias engine memory that is reclaimed when the buffer is freed.
 */
export interface TypedBufferContents {
  readonly typeCode:      number;
  readonly data:          Uint8Array;
  readonly elementWidth:  number;
  readonly elementCount:  number;
  readonly stringLengths: Uint32Array | null;
}

// ─── ZlEngine ─────────────────────────────────────────────────────────────────

export interface ZlEngine {
  /** major × 10000 + minor × 100 + patch */
  versionNumber(): number;
  defaultFormatVersion(): number;
  /** Graph id of the engine's generic compression graph. */
  readonly genericGraphId: GraphId;

  compressBound(srcSize: number): number;

  // ── Contexts ──────────────────────────────────────────────────────────────
  createCompressionContext(): CompressionContextHandle | null;
  freeCompressionContext(cctx: CompressionContextHandle): void;
  createDecompressionContext(): DecompressionContextHandle | null;
  freeDecompressionContext(dctx: DecompressionContextHandle): void;

  setParameter(cctx: CompressionContextHandle, param: CompressionParameter, value: number): EngineResult<void>;
  /** Make `graph` the context's active compressor graph. The context borrows it. */
  referenceGraph(cctx: CompressionContextHandle, graph: GraphHandle): EngineResult<void>;

  // ── Graphs ────────────────────────────────────────────────────────────────
  createGraph(): GraphHandle | null;
  freeGraph(graph: GraphHandle): void;
  selectStartingGraph(graph: GraphHandle, id: GraphId): EngineResult<void>;
  /** Build the graph a compiled description declares; returns its id. */
  setupDescriptionGraph(graph: GraphHandle, description: Uint8Array): EngineResult<GraphId>;
  compileDescription(source: string): EngineResult<Uint8Array>;

  // ── Serial ────────────────────────────────────────────────────────────────
  compress(cctx: CompressionContextHandle, dst: Uint8Array, src: Uint8Array): EngineResult<number>;
  decompress(dctx: DecompressionContextHandle, dst: Uint8Array, src: Uint8Array): EngineResult<number>;
  decompressedSize(src: Uint8Array): EngineResult<number>;

  // ── Typed ─────────────────────────────────────────────────────────────────
  createTypedRef(shape: TypedRefShape): TypedRefHandle | null;
  freeTypedRef(ref: TypedRefHandle): void;
  compressTyped(cctx: CompressionContextHandle, dst: Uint8Array, refs: readonly TypedRefHandle[]): EngineResult<number>;

  createTypedBuffer(): TypedBufferHandle | null;
  freeTypedBuffer(buffer: TypedBufferHandle): void;
  decompressTyped(dctx: DecompressionContextHandle, buffers: readonly TypedBufferHandle[], src: Uint8Array): EngineResult<number>;
  readTypedBuffer(buffer: TypedBufferHandle): TypedBufferContents;

  // ── Frame metadata ────────────────────────────────────────────────────────
  frameOutputCount(src: Uint8Array): EngineResult<number>;
  openFrameInfo(src: Uint8Array): FrameInfoHandle | null;
  freeFrameInfo(info: FrameInfoHandle): void;
  frameFormatVersion(info: FrameInfoHandle): EngineResult<number>;
  frameInfoOutputCount(info: FrameInfoHandle): EngineResult<number>;
  frameOutputType(info: FrameInfoHandle, index: number): EngineResult<number>;
  frameOutputSize(info: FrameInfoHandle, index: number): EngineResult<number>;
  frameOutputElementCount(info: FrameInfoHandle, index: number): EngineResult<number>;
}
