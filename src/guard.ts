/**
 * @zlframe/core — engine handle guards
 *
 * Every engine handle this layer allocates is owned by exactly one
 * HandleGuard. The guard frees the handle once: on an explicit release(),
 * or, for long-lived owners (sessions, compressors) that are dropped
 * without being closed, when the owner is garbage-collected.
 *
 * A compression session owns two guards and a compressor reference, so it
 * registers one releaseOnCollect() callback for all of them instead.
 *
 * Short-lived handles (typed refs, typed buffers, frame info) are released
 * in a `finally` by the call that created them and never registered.
 */

import { ZlStateError } from './errors';
import type { EngineHandle } from './engine';

// Held values are closures over what the owner holds, never over the owner
// itself, so the registry does not keep the owner alive.
const finalizers = new FinalizationRegistry<() => void>((release) => release());

/**
 * Run `release` when `owner` is collected, unless cancelCollect(token) runs
 * first. For owners that hold more than one guard, or references that are
 * not guards at all.
 */
export function releaseOnCollect(owner: object, release: () => void, token: object): void {
  finalizers.register(owner, release, token);
}

export function cancelCollect(token: object): void {
  finalizers.unregister(token);
}

export class HandleGuard<H extends EngineHandle> {
  readonly kind: H['handleKind'];
  private current: H | null;
  private readonly free: (handle: H) => void;

  constructor(handle: H, free: (handle: H) => void) {
    this.kind    = handle.handleKind;
    this.current = handle;
    this.free    = free;
  }

  /** Release the handle when `owner` is collected, unless released first. */
  bindTo(owner: object): this {
    releaseOnCollect(owner, () => this.release(), this);
    return this;
  }

  get released(): boolean {
    return this.current === null;
  }

  /** The live handle. Throws ZlStateError after release. */
  get handle(): H {
    if (this.current === null) {
      throw new ZlStateError(`${this.kind} handle has already been released`);
    }
    return this.current;
  }

  /** Free the handle. Safe to call more than once; only the first call frees. */
  release(): void {
    const handle = this.current;
    if (handle === null) return;
    this.current = null;
    cancelCollect(this);
    this.free(handle);
  }
}

/** Wrap a freshly created handle; a null handle throws `onNull()`. */
export function acquire<H extends EngineHandle>(
  handle: H | null,
  free: (handle: H) => void,
  onNull: () => Error,
): HandleGuard<H> {
  if (handle === null) {
    throw onNull();
  }
  return new HandleGuard(handle, free);
}
