/**
 * Copy-on-write engine shared by every builder.
 *
 * A builder is either attached to a frozen collection, aliasing its store,
 * or detached, owning its store outright. Every write goes through
 * `writeable()`, which clones the store once when attached. `build()` wraps
 * a detached store and re-attaches to the result, so repeated builds without
 * writes return the same instance and `toBuilder().build()` copies nothing.
 */

import { STORE } from './constants';
import { logger } from './log';
import type { Frozen, Ownership } from './types';

const log = logger.child('builder');

export abstract class CopyOnWriteBuilder<S, C extends Frozen<S>> {
  private ownership: Ownership<S, C>;

  protected constructor(store: S) {
    this.ownership = { kind: 'detached', store };
  }

  /** Clone of `store` that no frozen collection references. */
  protected abstract cloneStore(store: S): S;

  /** Wraps a store no other holder can mutate. */
  protected abstract wrap(store: S): C;

  /** Runs before a detached store is wrapped by `build()`. */
  protected finalize(_store: S): void {}

  protected get store(): S {
    return this.ownership.store;
  }

  protected get isAttached(): boolean {
    return this.ownership.kind === 'attached';
  }

  /** Store safe to mutate in place; clones it first when attached. */
  protected writeable(): S {
    const { ownership } = this;
    if (ownership.kind === 'detached') return ownership.store;

    const store = this.cloneStore(ownership.store);
    this.ownership = { kind: 'detached', store };
    log.debug('cloned backing store', { builder: this.constructor.name });
    return store;
  }

  /** Aliases `owner`'s store without copying. */
  protected attach(owner: C): void {
    this.ownership = { kind: 'attached', owner, store: owner[STORE] };
  }

  /** Takes exclusive ownership of a freshly built store. */
  protected adopt(store: S): void {
    this.ownership = { kind: 'detached', store };
  }

  /**
   * Converts to a frozen collection. The builder can be modified again and
   * used to create any number of frozen collections.
   */
  build(): C {
    const { ownership } = this;
    if (ownership.kind === 'attached') return ownership.owner;

    this.finalize(ownership.store);
    const owner = this.wrap(ownership.store);
    this.ownership = { kind: 'attached', owner, store: ownership.store };
    log.debug('built collection', { builder: this.constructor.name });
    return owner;
  }

  /** Applies `updates` to this builder. */
  update(updates: (builder: this) => void): this {
    updates(this);
    return this;
  }
}
