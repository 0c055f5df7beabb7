/**
 * FrozenSet + SetBuilder
 */

import { ArgumentError } from './errors';
import {
  STORE,
  WRAP,
  SET_SEED,
  CopyOnWriteBuilder,
  checkElementType,
  checkElement,
  checked,
  checkWrap,
  isIterable,
  hashValue,
  hashUnordered,
  valueEquals,
  type ElementType,
  type Frozen,
  type Hashable,
} from './internal';

// =====================================================
// FrozenSet
// =====================================================

/**
 * An insertion-ordered set that never changes once built. Membership uses
 * SameValueZero, like the native `Set`; `equals` compares nested frozen
 * collections by content.
 */
export class FrozenSet<T> implements Frozen<Set<T>>, Iterable<T>, Hashable {
  readonly [STORE]: Set<T>;
  private _hashCode: number | undefined;

  /**
   * @internal Wraps `store` without copying. Throws unless given the
   * package's wrap token.
   */
  constructor(token: typeof WRAP, readonly elementType: ElementType<T>, store: Set<T>) {
    checkWrap(token, 'FrozenSet');
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

  has(value: T): boolean {
    return this[STORE].has(value);
  }

  containsAll(values: Iterable<T>): boolean {
    for (const value of values) {
      if (!this[STORE].has(value)) return false;
    }
    return true;
  }

  [Symbol.iterator](): Iterator<T> {
    return this[STORE].values();
  }

  toArray(): T[] {
    return Array.from(this[STORE]);
  }

  toSet(): Set<T> {
    return new Set(this[STORE]);
  }

  toBuilder(): SetBuilder<T> {
    return new SetBuilder(this.elementType, this);
  }

  rebuild(updates: (builder: SetBuilder<T>) => void): FrozenSet<T> {
    return this.toBuilder().update(updates).build();
  }

  get hashCode(): number {
    if (this._hashCode === undefined) {
      const hashes: number[] = [];
      for (const value of this[STORE]) hashes.push(hashValue(value));
      this._hashCode = hashUnordered(SET_SEED, hashes);
    }
    return this._hashCode;
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof FrozenSet)) return false;
    if (this.size !== other.size || this.hashCode !== other.hashCode) return false;
    const theirs: Set<unknown> = other[STORE];
    for (const value of this[STORE]) {
      if (!theirs.has(value) && !someEqual(theirs, value)) return false;
    }
    return true;
  }

  toString(): string {
    return `{${Array.from(this[STORE], String).join(', ')}}`;
  }

  toJSON(): T[] {
    return this.toArray();
  }
}

// =====================================================
// SetBuilder
// =====================================================

/**
 * Mutable staging area for a {@link FrozenSet}.
 *
 * Bulk and transforming operations check element by element: when one
 * fails, the elements applied before it stay applied.
 */
export class SetBuilder<T> extends CopyOnWriteBuilder<Set<T>, FrozenSet<T>> {
  readonly elementType: ElementType<T>;

  /**
   * Must be given a type descriptor.
   *
   * Wrong: `new SetBuilder()`. Right: `new SetBuilder(z.string(), ['a'])`.
   */
  constructor(elementType?: ElementType<T>, source: Iterable<T> = []) {
    super(new Set());
    this.elementType = checkElementType(elementType, 'element', 'new SetBuilder(z.number())');
    this.replace(source);
  }

  protected cloneStore(store: Set<T>): Set<T> {
    return new Set(store);
  }

  protected wrap(store: Set<T>): FrozenSet<T> {
    return new FrozenSet(WRAP, this.elementType, store);
  }

  /**
   * Replaces all elements. A {@link FrozenSet} with the same descriptor is
   * attached without copying; any other iterable is copied and checked.
   */
  replace(source: Iterable<T>): this {
    if (source instanceof FrozenSet && source.elementType === this.elementType) {
      this.attach(source);
      return this;
    }
    if (!isIterable(source)) {
      throw new ArgumentError(`expected an iterable, got ${typeof source}`);
    }
    const set = new Set<T>();
    this.adopt(set);
    for (const element of checked(this.elementType, source)) {
      set.add(element);
    }
    return this;
  }

  // Reads

  get size(): number {
    return this.store.size;
  }

  get isEmpty(): boolean {
    return this.store.size === 0;
  }

  has(value: T): boolean {
    return this.store.has(value);
  }

  // Based on Set.

  add(value: T): this {
    const set = this.writeable();
    checkElement(this.elementType, value);
    set.add(value);
    return this;
  }

  addAll(values: Iterable<T>): this {
    const set = this.writeable();
    for (const value of checked(this.elementType, values)) {
      set.add(value);
    }
    return this;
  }

  remove(value: T): this {
    this.writeable().delete(value);
    return this;
  }

  removeAll(values: Iterable<T>): this {
    const set = this.writeable();
    for (const value of values) set.delete(value);
    return this;
  }

  removeWhere(test: (element: T) => boolean): this {
    const set = this.writeable();
    for (const value of set) {
      if (test(value)) set.delete(value);
    }
    return this;
  }

  retainAll(values: Iterable<T>): this {
    const keep = new Set<unknown>(values);
    return this.removeWhere((element) => !keep.has(element));
  }

  retainWhere(test: (element: T) => boolean): this {
    return this.removeWhere((element) => !test(element));
  }

  clear(): this {
    this.adopt(new Set());
    return this;
  }

  // In-place versions of the Iterable transforms.

  /**
   * Replaces the contents with `fn` applied to each element. The result is
   * collected into a fresh store; if a produced element is rejected, the
   * builder holds only what was produced before it.
   */
  map(fn: (element: T) => T): this {
    const source = this.store;
    const set = new Set<T>();
    this.adopt(set);
    for (const element of source) {
      const value = fn(element);
      checkElement(this.elementType, value);
      set.add(value);
    }
    return this;
  }

  where(test: (element: T) => boolean): this {
    return this.retainWhere(test);
  }

  /** As {@link SetBuilder.map}, with each element producing any number. */
  expand(fn: (element: T) => Iterable<T>): this {
    const source = this.store;
    const set = new Set<T>();
    this.adopt(set);
    for (const element of source) {
      for (const value of checked(this.elementType, fn(element))) {
        set.add(value);
      }
    }
    return this;
  }

  take(count: number): this {
    return this.slice(0, count);
  }

  skip(count: number): this {
    return this.slice(count, this.store.size);
  }

  takeWhile(test: (element: T) => boolean): this {
    let end = 0;
    for (const element of this.store) {
      if (!test(element)) break;
      end++;
    }
    return this.slice(0, end);
  }

  skipWhile(test: (element: T) => boolean): this {
    let start = 0;
    for (const element of this.store) {
      if (!test(element)) break;
      start++;
    }
    return this.slice(start, this.store.size);
  }

  private slice(start: number, end: number): this {
    const set = new Set<T>();
    let i = 0;
    for (const element of this.store) {
      if (i >= end) break;
      if (i >= start) set.add(element);
      i++;
    }
    this.adopt(set);
    return this;
  }
}

// Nested frozen collections are equal by content, not identity
function someEqual(values: Iterable<unknown>, value: unknown): boolean {
  for (const v of values) {
    if (valueEquals(v, value)) return true;
  }
  return false;
}

/**
 * Creates a {@link FrozenSet} from `source`, copying and checking each
 * element. A FrozenSet with the same descriptor is returned as is.
 */
export function frozenSet<T>(elementType?: ElementType<T>, source: Iterable<T> = []): FrozenSet<T> {
  if (source instanceof FrozenSet && source.elementType === elementType) return source;
  return new SetBuilder(elementType, source).build();
}
