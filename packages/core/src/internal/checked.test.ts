import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { InvalidElementError, UnspecifiedTypeError } from '../errors';
import { checkElementType, checkIndex, checkRange, checked, isIterable, isPair } from './checked';
import { hashValue, valueEquals } from './hash';

describe('checked', () => {
  it('yields each element until one is rejected', () => {
    const seen: number[] = [];
    expect(() => {
      for (const n of checked(z.number(), [1, 2, 'x', 4])) seen.push(n);
    }).toThrow(InvalidElementError);
    expect(seen).toEqual([1, 2]);
  });

  it('reports the role of the rejected value', () => {
    expect(() => [...checked(z.string(), ['a', undefined], 'key')]).toThrow('null key');
  });

  it('requires a type descriptor', () => {
    expect(() => checkElementType(undefined, 'value', 'example()')).toThrow(UnspecifiedTypeError);
    expect(() => checkElementType(undefined, 'value', 'example()')).toThrow(
      'explicit value type required, for example "example()"'
    );
  });
});

describe('bounds', () => {
  it('checks indexes', () => {
    expect(() => checkIndex(0, 1)).not.toThrow();
    expect(() => checkIndex(1, 1)).toThrow('index 1 out of range 0..0');
    expect(() => checkIndex(0.5, 2)).toThrow(RangeError);
  });

  it('checks ranges', () => {
    expect(() => checkRange(0, 2, 2)).not.toThrow();
    expect(() => checkRange(2, 1, 3)).toThrow('invalid range 2..1 for length 3');
  });
});

describe('shape guards', () => {
  it('recognizes iterables', () => {
    expect(isIterable('abc')).toBe(true);
    expect(isIterable(new Map())).toBe(true);
    expect(isIterable(5)).toBe(false);
    expect(isIterable(null)).toBe(false);
  });

  it('recognizes pairs', () => {
    expect(isPair(['a', 1])).toBe(true);
    expect(isPair(['a'])).toBe(false);
    expect(isPair('ab')).toBe(false);
  });
});

describe('valueEquals', () => {
  it('follows SameValueZero', () => {
    expect(valueEquals(NaN, NaN)).toBe(true);
    expect(valueEquals(0, -0)).toBe(true);
    expect(hashValue(0)).toBe(hashValue(-0));
    expect(valueEquals({}, {})).toBe(false);
  });

  it('hashes strings by content', () => {
    expect(hashValue('frozen')).toBe(hashValue('frozen'));
    expect(hashValue('frozen')).not.toBe(hashValue('nezorf'));
  });
});
