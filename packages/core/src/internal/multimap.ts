/**
 * Multimap engine shared by list and set multimaps.
 *
 * The outer store maps each key to a frozen value collection. A builder
 * clones only that outer map on its first write; each key it touches gets a
 * nested values builder attached to the key's frozen collection, which in
 * turn copies only when that key's values change. `build()` finalizes the
 * nested builders back into the outer map and drops keys left empty.
 */

import { ArgumentError } from '../errors';
import { CopyOnWriteBuilder } from './builder';
import { checkElement, checkElementType, checkWrap, isIterable, isPair } from './checked';
import { MULTIMAP_SEED, STORE, WRAP } from './constants';
import { hashEntry, hashUnordered, valueEquals, type Hashable } from './hash';
import { logger } from './log';
import type { ElementType, Frozen } from './types';

const log = logger.child('multimap');

/** A frozen value collection held per key. */
export interface FrozenValues<V, VB> extends Iterable<V>, Hashable {
  readonly isEmpty: boolean;
  toBuilder(): VB;
}

/** The builder for one key's values. */
export interface ValuesBuilder<V, VC> {
  add(value: V): unknown;
  remove(value: V): unknown;
  build(): VC;
}

/** A `Map` of iterables, a frozen multimap, or any iterable of such pairs. */
export type MultimapSource<K, V> = Iterable<readonly [K, Iterable<V>]>;

export interface AddIterableOptions<E, K, V> {
  key?: (element: E) => K;
  value?: (element: E) => V;
  values?: (element: E) => Iterable<V>;
}

// =====================================================
// FrozenMultimap
// =====================================================

export abstract class FrozenMultimap<K, V, VC extends FrozenValues<V, unknown>>
  implements Frozen<Map<K, VC>>, Iterable<[K, VC]>, Hashable
{
  readonly [STORE]: Map<K, VC>;
  private _hashCode: number | undefined;

  /**
   * @internal Wraps `store` without copying. No value collection in it may
   * be empty. Throws unless given the package's wrap token.
   */
  constructor(
    token: typeof WRAP,
    readonly keyType: ElementType<K>,
    readonly valueType: ElementType<V>,
    store: Map<K, VC>
  ) {
    checkWrap(token, new.target.name);
    this[STORE] = store;
  }

  protected abstract emptyValues(): VC;

  /** Number of keys. */
  get size(): number {
    return this[STORE].size;
  }

  get isEmpty(): boolean {
    return this[STORE].size === 0;
  }

  get isNotEmpty(): boolean {
    return this[STORE].size !== 0;
  }

  /** Values for `key`; empty when the key is absent. */
  get(key: K): VC {
    return this[STORE].get(key) ?? this.emptyValues();
  }

  has(key: K): boolean {
    return this[STORE].has(key);
  }

  hasEntry(key: K, value: V): boolean {
    const values = this[STORE].get(key);
    if (values === undefined) return false;
    for (const v of values) {
      if (valueEquals(v, value)) return true;
    }
    return false;
  }

  keys(): IterableIterator<K> {
    return this[STORE].keys();
  }

  *values(): IterableIterator<V> {
    for (const values of this[STORE].values()) yield* values;
  }

  /** Key to value collection pairs. */
  entries(): IterableIterator<[K, VC]> {
    return this[STORE].entries();
  }

  [Symbol.iterator](): Iterator<[K, VC]> {
    return this[STORE].entries();
  }

  /** Calls `fn` once per key-value pair. */
  forEach(fn: (value: V, key: K) => void): void {
    for (const [key, values] of this[STORE]) {
      for (const value of values) fn(value, key);
    }
  }

  toMap(): Map<K, VC> {
    return new Map(this[STORE]);
  }

  get hashCode(): number {
    if (this._hashCode === undefined) {
      const hashes: number[] = [];
      for (const [key, values] of this[STORE]) hashes.push(hashEntry(key, values));
      this._hashCode = hashUnordered(MULTIMAP_SEED, hashes);
    }
    return this._hashCode;
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof FrozenMultimap) || other.constructor !== this.constructor) return false;
    if (this.size !== other.size || this.hashCode !== other.hashCode) return false;
    const theirs: Map<unknown, unknown> = other[STORE];
    for (const [key, values] of this[STORE]) {
      if (!values.equals(theirs.get(key))) return false;
    }
    return true;
  }

  toString(): string {
    const parts = Array.from(this[STORE], ([key, values]) => `${String(key)}: ${String(values)}`);
    return `{${parts.join(', ')}}`;
  }

  toJSON(): [K, V[]][] {
    return Array.from(this[STORE], ([key, values]): [K, V[]] => [key, Array.from(values)]);
  }
}

// =====================================================
// MultimapBuilder
// =====================================================

export abstract class MultimapBuilder<
  K,
  V,
  VC extends FrozenValues<V, VB>,
  VB extends ValuesBuilder<V, VC>,
  C extends FrozenMultimap<K, V, VC>,
> extends CopyOnWriteBuilder<Map<K, VC>, C> {
  readonly keyType: ElementType<K>;
  readonly valueType: ElementType<V>;
  // Keys touched since the last build, each with its own copy-on-write cell
  private readonly builders = new Map<K, VB>();

  protected constructor(keyType: ElementType<K> | undefined, valueType: ElementType<V> | undefined, example: string) {
    super(new Map());
    this.keyType = checkElementType(keyType, 'key', example);
    this.valueType = checkElementType(valueType, 'value', example);
  }

  protected abstract newValuesBuilder(): VB;

  protected abstract emptyValues(): VC;

  /** Whether `source` is a frozen multimap this builder can attach to. */
  protected abstract isFrozen(source: unknown): source is C;

  protected cloneStore(store: Map<K, VC>): Map<K, VC> {
    return new Map(store);
  }

  protected finalize(store: Map<K, VC>): void {
    let dropped = 0;
    for (const [key, builder] of this.builders) {
      const values = builder.build();
      if (values.isEmpty) {
        if (store.delete(key)) dropped++;
      } else {
        store.set(key, values);
      }
    }
    this.builders.clear();
    if (dropped > 0) log.debug('dropped empty keys', { count: dropped });
  }

  /**
   * Replaces all entries. A frozen multimap of the same kind and
   * descriptors is attached without copying; any other source is copied
   * and checked.
   */
  replace(source: MultimapSource<K, V>): this {
    if (!isIterable(source)) {
      throw new ArgumentError(`expected a Map, multimap or iterable of entries, got ${typeof source}`);
    }
    this.builders.clear();
    if (this.isFrozen(source) && source.keyType === this.keyType && source.valueType === this.valueType) {
      this.attach(source);
      return this;
    }
    this.adopt(new Map());
    return this.addAll(source);
  }

  /** Current values for `key`, without changing the builder's contents. */
  get(key: K): VC {
    const builder = this.builders.get(key);
    if (builder) return builder.build();
    return this.store.get(key) ?? this.emptyValues();
  }

  add(key: K, value: V): this {
    this.writeable();
    checkElement(this.keyType, key, 'key');
    checkElement(this.valueType, value, 'value');
    this.valuesBuilder(key).add(value);
    return this;
  }

  addValues(key: K, values: Iterable<V>): this {
    for (const value of values) this.add(key, value);
    return this;
  }

  addAll(multimap: MultimapSource<K, V>): this {
    this.writeable();
    for (const entry of multimap) {
      const pair: unknown = entry;
      if (!isPair(pair)) {
        throw new ArgumentError(`expected a [key, values] pair, got ${String(pair)}`);
      }
      const [key, values] = pair;
      checkElement(this.keyType, key, 'key');
      if (!isIterable(values)) {
        throw new ArgumentError(`expected iterable values for key ${String(key)}`);
      }
      for (const value of values) {
        checkElement(this.valueType, value, 'value');
        this.add(key, value);
      }
    }
    return this;
  }

  /**
   * Adds entries derived from each element of `iterable`. Without `key`,
   * the element itself is the key; without `value` or `values`, the element
   * itself is the value. Give `values` to add several values per element.
   */
  addIterable<E>(iterable: Iterable<E>, options: AddIterableOptions<E, K, V> = {}): this {
    if (options.value !== undefined && options.values !== undefined) {
      throw new ArgumentError('only one of value and values may be specified, got both');
    }
    const keyOf: (element: E) => unknown = options.key ?? identity;
    const { values } = options;
    if (values !== undefined) {
      for (const element of iterable) {
        const key = keyOf(element);
        checkElement(this.keyType, key, 'key');
        this.addValues(key, values(element));
      }
      return this;
    }
    const valueOf: (element: E) => unknown = options.value ?? identity;
    for (const element of iterable) {
      const key = keyOf(element);
      const value = valueOf(element);
      checkElement(this.keyType, key, 'key');
      checkElement(this.valueType, value, 'value');
      this.add(key, value);
    }
    return this;
  }

  /** Removes one occurrence of `value` under `key`. */
  remove(key: K, value: V): this {
    this.writeable();
    this.valuesBuilder(key).remove(value);
    return this;
  }

  /** Removes every value under `key`. */
  removeAll(key: K): this {
    this.writeable();
    this.builders.set(key, this.newValuesBuilder());
    return this;
  }

  clear(): this {
    this.adopt(new Map());
    this.builders.clear();
    return this;
  }

  private valuesBuilder(key: K): VB {
    let builder = this.builders.get(key);
    if (builder === undefined) {
      const built = this.store.get(key);
      builder = built === undefined ? this.newValuesBuilder() : built.toBuilder();
      this.builders.set(key, builder);
    }
    return builder;
  }
}

function identity<E>(element: E): E {
  return element;
}
