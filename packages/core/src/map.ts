/**
 * FrozenMap + MapBuilder
 */

import { ArgumentError } from './errors';
import {
  STORE,
  WRAP,
  MAP_SEED,
  CopyOnWriteBuilder,
  checkElementType,
  checkElement,
  checkWrap,
  isIterable,
  isPair,
  hashEntry,
  hashUnordered,
  valueEquals,
  type ElementType,
  type Frozen,
  type Hashable,
} from './internal';

/** A `Map`, a {@link FrozenMap} or any iterable of key-value pairs. */
export type MapSource<K, V> = Iterable<readonly [K, V]>;

// =====================================================
// FrozenMap
// =====================================================

/** An insertion-ordered map that never changes once built. */
export class FrozenMap<K, V> implements Frozen<Map<K, V>>, Iterable<[K, V]>, Hashable {
  readonly [STORE]: Map<K, V>;
  private _hashCode: number | undefined;

  /**
   * @internal Wraps `store` without copying. Throws unless given the
   * package's wrap token.
   */
  constructor(
    token: typeof WRAP,
    readonly keyType: ElementType<K>,
    readonly valueType: ElementType<V>,
    store: Map<K, V>
  ) {
    checkWrap(token, 'FrozenMap');
    this[STORE] = store;
  }

  get size(): number {
    return this[STORE].size;
  }

  get isEmpty(): boolean {
    return this[STORE].size === 0;
  }

  get isNotEmpty(): boolean {
    return this[STORE].size !== 0;
  }

  get(key: K): V | undefined {
    return this[STORE].get(key);
  }

  has(key: K): boolean {
    return this[STORE].has(key);
  }

  keys(): IterableIterator<K> {
    return this[STORE].keys();
  }

  values(): IterableIterator<V> {
    return this[STORE].values();
  }

  entries(): IterableIterator<[K, V]> {
    return this[STORE].entries();
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this[STORE].entries();
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this[STORE]) fn(v, k);
  }

  toMap(): Map<K, V> {
    return new Map(this[STORE]);
  }

  toBuilder(): MapBuilder<K, V> {
    return new MapBuilder(this.keyType, this.valueType, this);
  }

  rebuild(updates: (builder: MapBuilder<K, V>) => void): FrozenMap<K, V> {
    return this.toBuilder().update(updates).build();
  }

  get hashCode(): number {
    if (this._hashCode === undefined) {
      const hashes: number[] = [];
      for (const [k, v] of this[STORE]) hashes.push(hashEntry(k, v));
      this._hashCode = hashUnordered(MAP_SEED, hashes);
    }
    return this._hashCode;
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof FrozenMap)) return false;
    if (this.size !== other.size || this.hashCode !== other.hashCode) return false;
    const theirs: Map<unknown, unknown> = other[STORE];
    for (const [k, v] of this[STORE]) {
      if (!theirs.has(k) || !valueEquals(v, theirs.get(k))) return false;
    }
    return true;
  }

  toString(): string {
    return `{${Array.from(this[STORE], ([k, v]) => `${String(k)}: ${String(v)}`).join(', ')}}`;
  }

  toJSON(): [K, V][] {
    return Array.from(this[STORE]);
  }
}

// =====================================================
// MapBuilder
// =====================================================

/**
 * Mutable staging area for a {@link FrozenMap}.
 *
 * Rejects null and undefined keys and values, and those the descriptors
 * reject. Bulk operations check entry by entry: when one fails, the entries
 * applied before it stay applied.
 */
export class MapBuilder<K, V> extends CopyOnWriteBuilder<Map<K, V>, FrozenMap<K, V>> {
  readonly keyType: ElementType<K>;
  readonly valueType: ElementType<V>;

  /**
   * Must be given both type descriptors.
   *
   * Wrong: `new MapBuilder()`.
   * Right: `new MapBuilder(z.string(), z.number(), [['a', 1]])`.
   */
  constructor(keyType?: ElementType<K>, valueType?: ElementType<V>, source: MapSource<K, V> = []) {
    super(new Map());
    this.keyType = checkElementType(keyType, 'key', 'new MapBuilder(z.string(), z.number())');
    this.valueType = checkElementType(valueType, 'value', 'new MapBuilder(z.string(), z.number())');
    this.replace(source);
  }

  protected cloneStore(store: Map<K, V>): Map<K, V> {
    return new Map(store);
  }

  protected wrap(store: Map<K, V>): FrozenMap<K, V> {
    return new FrozenMap(WRAP, this.keyType, this.valueType, store);
  }

  /**
   * Replaces all entries. A {@link FrozenMap} with the same descriptors is
   * attached without copying; any other source is copied and checked.
   */
  replace(source: MapSource<K, V>): this {
    if (
      source instanceof FrozenMap &&
      source.keyType === this.keyType &&
      source.valueType === this.valueType
    ) {
      this.attach(source);
      return this;
    }
    if (!isIterable(source)) {
      throw new ArgumentError(`expected a Map, FrozenMap or iterable of entries, got ${typeof source}`);
    }
    this.adopt(new Map());
    return this.addAll(source);
  }

  // Reads

  get size(): number {
    return this.store.size;
  }

  get isEmpty(): boolean {
    return this.store.size === 0;
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  // Based on Map.

  set(key: K, value: V): this {
    const map = this.writeable();
    checkElement(this.keyType, key, 'key');
    checkElement(this.valueType, value, 'value');
    map.set(key, value);
    return this;
  }

  /** Returns the value for `key`, storing `ifAbsent()` first when missing. */
  putIfAbsent(key: K, ifAbsent: () => V): V {
    const existing = this.store.get(key);
    if (existing !== undefined) return existing;
    const value = ifAbsent();
    this.set(key, value);
    return value;
  }

  addAll(entries: MapSource<K, V>): this {
    const map = this.writeable();
    for (const entry of entries) {
      const pair: unknown = entry;
      if (!isPair(pair)) {
        throw new ArgumentError(`expected a [key, value] pair, got ${String(pair)}`);
      }
      const [key, value] = pair;
      checkElement(this.keyType, key, 'key');
      checkElement(this.valueType, value, 'value');
      map.set(key, value);
    }
    return this;
  }

  /**
   * Adds an entry per element of `iterable`. Without `key`, the element
   * itself is the key; without `value`, the element itself is the value.
   */
  addIterable<E>(
    iterable: Iterable<E>,
    options: { key?: (element: E) => K; value?: (element: E) => V } = {}
  ): this {
    const map = this.writeable();
    const keyOf: (element: E) => unknown = options.key ?? identity;
    const valueOf: (element: E) => unknown = options.value ?? identity;
    for (const element of iterable) {
      const key = keyOf(element);
      const value = valueOf(element);
      checkElement(this.keyType, key, 'key');
      checkElement(this.valueType, value, 'value');
      map.set(key, value);
    }
    return this;
  }

  /** Removes `key`, returning its value if it was present. */
  remove(key: K): V | undefined {
    const map = this.writeable();
    const value = map.get(key);
    map.delete(key);
    return value;
  }

  removeWhere(test: (key: K, value: V) => boolean): this {
    const map = this.writeable();
    for (const [k, v] of map) {
      if (test(k, v)) map.delete(k);
    }
    return this;
  }

  clear(): this {
    this.adopt(new Map());
    return this;
  }

  /**
   * Replaces the value for `key` with `update(value)`, or stores
   * `ifAbsent()` when the key is missing. Returns the stored value.
   */
  updateValue(key: K, update: (value: V) => V, ifAbsent?: () => V): V {
    const map = this.writeable();
    const current = map.get(key);
    let value: V;
    if (current !== undefined) {
      value = update(current);
    } else if (ifAbsent) {
      value = ifAbsent();
    } else {
      throw new ArgumentError(`key not found: ${String(key)}`);
    }
    checkElement(this.keyType, key, 'key');
    checkElement(this.valueType, value, 'value');
    map.set(key, value);
    return value;
  }

  /**
   * Replaces every value with `update(key, value)`, in insertion order. If
   * a produced value is rejected, earlier values have already been replaced.
   */
  updateAllValues(update: (key: K, value: V) => V): this {
    const map = this.writeable();
    for (const [k, v] of map) {
      const value = update(k, v);
      checkElement(this.valueType, value, 'value');
      map.set(k, value);
    }
    return this;
  }
}

function identity<E>(element: E): E {
  return element;
}

/**
 * Creates a {@link FrozenMap} from `source`, copying and checking each
 * entry. A FrozenMap with the same descriptors is returned as is.
 */
export function frozenMap<K, V>(
  keyType?: ElementType<K>,
  valueType?: ElementType<V>,
  source: MapSource<K, V> = []
): FrozenMap<K, V> {
  if (source instanceof FrozenMap && source.keyType === keyType && source.valueType === valueType) {
    return source;
  }
  return new MapBuilder(keyType, valueType, source).build();
}
