/**
 * FrozenList + ListBuilder
 */

import { ArgumentError } from './errors';
import {
  STORE,
  WRAP,
  LIST_SEED,
  CopyOnWriteBuilder,
  checkElementType,
  checkElement,
  checked,
  checkWrap,
  isIterable,
  checkIndex,
  checkRange,
  hashOrdered,
  sameValueZero,
  valueEquals,
  type ElementType,
  type Frozen,
  type Hashable,
} from './internal';

// =====================================================
// FrozenList
// =====================================================

/**
 * An ordered list that never changes once built.
 *
 * Create one with {@link frozenList} or {@link ListBuilder.build}; derive
 * new lists with {@link FrozenList.toBuilder} or {@link FrozenList.rebuild}.
 */
export class FrozenList<T> implements Frozen<T[]>, Iterable<T>, Hashable {
  readonly [STORE]: T[];
  private _hashCode: number | undefined;

  /**
   * @internal Wraps `store` without copying. Throws unless given the
   * package's wrap token.
   */
  constructor(token: typeof WRAP, readonly elementType: ElementType<T>, store: T[]) {
    checkWrap(token, 'FrozenList');
    this[STORE] = store;
  }

  get length(): number {
    return this[STORE].length;
  }

  get isEmpty(): boolean {
    return this[STORE].length === 0;
  }

  get isNotEmpty(): boolean {
    return this[STORE].length !== 0;
  }

  get first(): T | undefined {
    return this[STORE][0];
  }

  get last(): T | undefined {
    const list = this[STORE];
    return list[list.length - 1];
  }

  get(index: number): T | undefined {
    return this[STORE][index];
  }

  includes(value: T): boolean {
    return this[STORE].includes(value);
  }

  indexOf(value: T, fromIndex?: number): number {
    return this[STORE].indexOf(value, fromIndex);
  }

  [Symbol.iterator](): Iterator<T> {
    return this[STORE][Symbol.iterator]();
  }

  toArray(): T[] {
    return this[STORE].slice();
  }

  /** Builder attached to this list; nothing is copied until it is mutated. */
  toBuilder(): ListBuilder<T> {
    return new ListBuilder(this.elementType, this);
  }

  /** Applies `updates` to a builder and returns the result. */
  rebuild(updates: (builder: ListBuilder<T>) => void): FrozenList<T> {
    return this.toBuilder().update(updates).build();
  }

  get hashCode(): number {
    if (this._hashCode === undefined) {
      this._hashCode = hashOrdered(LIST_SEED, this[STORE]);
    }
    return this._hashCode;
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof FrozenList)) return false;
    const a = this[STORE];
    const b = other[STORE];
    if (a.length !== b.length || this.hashCode !== other.hashCode) return false;
    for (let i = 0; i < a.length; i++) {
      if (!valueEquals(a[i], b[i])) return false;
    }
    return true;
  }

  toString(): string {
    return `[${this[STORE].map(String).join(', ')}]`;
  }

  toJSON(): T[] {
    return this.toArray();
  }
}

// =====================================================
// ListBuilder
// =====================================================

/**
 * Mutable staging area for a {@link FrozenList}.
 *
 * Rejects null and undefined, and elements the descriptor rejects. Bulk and
 * transforming operations check element by element: when one fails, the
 * elements applied before it stay applied.
 */
export class ListBuilder<T> extends CopyOnWriteBuilder<T[], FrozenList<T>> {
  readonly elementType: ElementType<T>;

  /**
   * Must be given a type descriptor.
   *
   * Wrong: `new ListBuilder()`. Right: `new ListBuilder(z.number(), [1, 2])`.
   */
  constructor(elementType?: ElementType<T>, source: Iterable<T> = []) {
    super([]);
    this.elementType = checkElementType(elementType, 'element', 'new ListBuilder(z.number())');
    this.replace(source);
  }

  protected cloneStore(store: T[]): T[] {
    return store.slice();
  }

  protected wrap(store: T[]): FrozenList<T> {
    return new FrozenList(WRAP, this.elementType, store);
  }

  /**
   * Replaces all elements. A {@link FrozenList} with the same descriptor is
   * attached without copying; any other iterable is copied and checked.
   */
  replace(source: Iterable<T>): this {
    if (source instanceof FrozenList && source.elementType === this.elementType) {
      this.attach(source);
      return this;
    }
    if (!isIterable(source)) {
      throw new ArgumentError(`expected an iterable, got ${typeof source}`);
    }
    const list: T[] = [];
    this.adopt(list);
    for (const element of checked(this.elementType, source)) {
      list.push(element);
    }
    return this;
  }

  // Reads

  get length(): number {
    return this.store.length;
  }

  get isEmpty(): boolean {
    return this.store.length === 0;
  }

  get first(): T | undefined {
    return this.store[0];
  }

  get last(): T | undefined {
    const list = this.store;
    return list[list.length - 1];
  }

  get(index: number): T | undefined {
    return this.store[index];
  }

  // Based on Array.

  set(index: number, value: T): this {
    const list = this.writeable();
    checkIndex(index, list.length);
    checkElement(this.elementType, value);
    list[index] = value;
    return this;
  }

  add(value: T): this {
    const list = this.writeable();
    checkElement(this.elementType, value);
    list.push(value);
    return this;
  }

  addAll(values: Iterable<T>): this {
    const list = this.writeable();
    for (const value of checked(this.elementType, values)) {
      list.push(value);
    }
    return this;
  }

  insert(index: number, value: T): this {
    const list = this.writeable();
    checkIndex(index, list.length + 1);
    checkElement(this.elementType, value);
    list.splice(index, 0, value);
    return this;
  }

  insertAll(index: number, values: Iterable<T>): this {
    const list = this.writeable();
    checkIndex(index, list.length + 1);
    let at = index;
    for (const value of checked(this.elementType, values)) {
      list.splice(at++, 0, value);
    }
    return this;
  }

  /** Overwrites elements starting at `index` with `values`. */
  setAll(index: number, values: Iterable<T>): this {
    const list = this.writeable();
    checkIndex(index, list.length + 1);
    let at = index;
    for (const value of checked(this.elementType, values)) {
      checkIndex(at, list.length);
      list[at++] = value;
    }
    return this;
  }

  /** Removes the first occurrence of `value`, if any. */
  remove(value: T): this {
    const list = this.writeable();
    const idx = list.findIndex((element) => sameValueZero(element, value));
    if (idx !== -1) list.splice(idx, 1);
    return this;
  }

  removeAt(index: number): T {
    const list = this.writeable();
    checkIndex(index, list.length);
    return list.splice(index, 1)[0];
  }

  removeLast(): T {
    const list = this.writeable();
    checkIndex(list.length - 1, list.length);
    return list.splice(list.length - 1, 1)[0];
  }

  removeRange(start: number, end: number): this {
    const list = this.writeable();
    checkRange(start, end, list.length);
    list.splice(start, end - start);
    return this;
  }

  replaceRange(start: number, end: number, values: Iterable<T>): this {
    this.removeRange(start, end);
    return this.insertAll(start, values);
  }

  fillRange(start: number, end: number, fill: T): this {
    const list = this.writeable();
    checkRange(start, end, list.length);
    checkElement(this.elementType, fill);
    list.fill(fill, start, end);
    return this;
  }

  removeWhere(test: (element: T) => boolean): this {
    return this.retainWhere((element) => !test(element));
  }

  retainWhere(test: (element: T) => boolean): this {
    const list = this.writeable();
    let write = 0;
    for (let read = 0; read < list.length; read++) {
      const element = list[read];
      if (test(element)) list[write++] = element;
    }
    list.length = write;
    return this;
  }

  sort(compare?: (a: T, b: T) => number): this {
    this.writeable().sort(compare);
    return this;
  }

  reverse(): this {
    this.writeable().reverse();
    return this;
  }

  /** Fisher-Yates shuffle; `random` returns a number in [0, 1). */
  shuffle(random: () => number = Math.random): this {
    const list = this.writeable();
    for (let i = list.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      const tmp = list[i];
      list[i] = list[j];
      list[j] = tmp;
    }
    return this;
  }

  clear(): this {
    this.adopt([]);
    return this;
  }

  // In-place versions of the Iterable transforms.

  /**
   * Replaces each element with `fn(element)`, front to back. If a produced
   * element is rejected, the elements before it have already been replaced.
   */
  map(fn: (element: T) => T): this {
    const list = this.writeable();
    for (let i = 0; i < list.length; i++) {
      const value = fn(list[i]);
      checkElement(this.elementType, value);
      list[i] = value;
    }
    return this;
  }

  where(test: (element: T) => boolean): this {
    return this.retainWhere(test);
  }

  /**
   * Replaces each element with the elements of `fn(element)`. The result is
   * collected into a fresh store; if a produced element is rejected, the
   * builder holds only what was produced before it.
   */
  expand(fn: (element: T) => Iterable<T>): this {
    const source = this.store;
    const list: T[] = [];
    this.adopt(list);
    for (const element of source) {
      for (const value of checked(this.elementType, fn(element))) {
        list.push(value);
      }
    }
    return this;
  }

  take(count: number): this {
    this.adopt(this.store.slice(0, Math.max(0, count)));
    return this;
  }

  skip(count: number): this {
    this.adopt(this.store.slice(Math.max(0, count)));
    return this;
  }

  takeWhile(test: (element: T) => boolean): this {
    const list = this.store;
    let end = 0;
    while (end < list.length && test(list[end])) end++;
    this.adopt(list.slice(0, end));
    return this;
  }

  skipWhile(test: (element: T) => boolean): this {
    const list = this.store;
    let start = 0;
    while (start < list.length && test(list[start])) start++;
    this.adopt(list.slice(start));
    return this;
  }

  sublist(start: number, end: number = this.store.length): this {
    checkRange(start, end, this.store.length);
    this.adopt(this.store.slice(start, end));
    return this;
  }
}

/**
 * Creates a {@link FrozenList} from `source`, copying and checking each
 * element. A FrozenList with the same descriptor is returned as is.
 */
export function frozenList<T>(elementType?: ElementType<T>, source: Iterable<T> = []): FrozenList<T> {
  if (source instanceof FrozenList && source.elementType === elementType) return source;
  return new ListBuilder(elementType, source).build();
}
