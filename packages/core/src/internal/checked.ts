/**
 * Checked Store - null and type checks at every mutation entry point
 */

import { ArgumentError, InvalidElementError, UnspecifiedTypeError, type ElementRole } from '../errors';
import { WRAP } from './constants';
import type { ElementType } from './types';

/**
 * Rejects a missing type descriptor. Pass `z.unknown()` to accept any
 * non-null value explicitly.
 */
export function checkElementType<T>(
  elementType: ElementType<T> | null | undefined,
  role: ElementRole,
  example: string
): ElementType<T> {
  if (elementType === null || elementType === undefined) {
    throw new UnspecifiedTypeError(role, example);
  }
  return elementType;
}

export function checkElement<T>(
  elementType: ElementType<T>,
  value: unknown,
  role: ElementRole = 'element'
): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvalidElementError(role, value);
  }
  const result = elementType.safeParse(value);
  if (!result.success) {
    throw new InvalidElementError(role, value, { cause: result.error });
  }
}

/**
 * Yields each element of `source` after checking it. Consumers apply
 * elements as they arrive, so anything yielded before a failing element
 * has already been applied when the error surfaces.
 */
export function* checked<T>(
  elementType: ElementType<T>,
  source: Iterable<unknown>,
  role: ElementRole = 'element'
): Generator<T, void, undefined> {
  for (const value of source) {
    checkElement(elementType, value, role);
    yield value;
  }
}

/** Rejects construction with `new` from outside the package. */
export function checkWrap(token: unknown, kind: string): void {
  if (token !== WRAP) {
    throw new ArgumentError(`${kind} is created by its factory or builder, not with new`);
  }
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'string') &&
    Symbol.iterator in Object(value)
  );
}

export function checkIndex(index: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new RangeError(`index ${index} out of range 0..${length - 1}`);
  }
}

export function checkRange(start: number, end: number, length: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end || end > length) {
    throw new RangeError(`invalid range ${start}..${end} for length ${length}`);
  }
}

export function isPair(value: unknown): value is readonly [unknown, unknown] {
  return Array.isArray(value) && value.length === 2;
}
