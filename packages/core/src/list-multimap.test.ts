import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ArgumentError, InvalidElementError, UnspecifiedTypeError } from './errors';
import { logger, type LogEntry, type Transport } from './internal';
import { FrozenListMultimap, ListMultimapBuilder, frozenListMultimap } from './list-multimap';
import { frozenSetMultimap } from './set-multimap';

const int = z.number().int();
const str = z.string();

let entries: LogEntry[] = [];
const record: Transport = (entry) => {
  entries.push(entry);
};
const clonesBy = (builder: string) =>
  entries.filter((e) => e.message === 'cloned backing store' && e.data?.builder === builder);

beforeEach(() => {
  entries = [];
  logger.setLevel('debug').addTransport(record);
});

afterEach(() => {
  logger.removeTransport(record).setLevel('info');
});

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected function to throw');
}

describe('ListMultimapBuilder', () => {
  describe('key and value checks', () => {
    it('throws on attempt to create without type descriptors', () => {
      expect(thrown(() => new ListMultimapBuilder())).toMatchObject({ role: 'key' });
      expect(thrown(() => new ListMultimapBuilder(int))).toMatchObject({ role: 'value' });
      expect(() => frozenListMultimap()).toThrow(UnspecifiedTypeError);
    });

    it('allows the explicit top type', () => {
      const multimap = new ListMultimapBuilder(z.unknown(), z.unknown()).add(1, 'a').add('b', 2).build();
      expect(multimap.toJSON()).toEqual([[1, ['a']], ['b', [2]]]);
    });

    it('throws on null key or value add', () => {
      const builder = new ListMultimapBuilder(int, str);
      expect(thrown(() => builder.add(JSON.parse('null'), 'a'))).toMatchObject({ role: 'key' });
      expect(thrown(() => builder.add(1, JSON.parse('null')))).toMatchObject({ role: 'value' });
    });

    it('throws on wrong type key or value add', () => {
      const builder = new ListMultimapBuilder(int, str);
      expect(() => builder.add(JSON.parse('"1"'), 'a')).toThrow(InvalidElementError);
      expect(() => builder.add(1, JSON.parse('1'))).toThrow(InvalidElementError);
      expect(builder.build().isEmpty).toBe(true);
    });

    it('rejects values that are not iterable', () => {
      const err = thrown(() => new ListMultimapBuilder(int, str).addAll(JSON.parse('[[1, 5]]')));
      expect(err).toBeInstanceOf(ArgumentError);
      expect(err).toMatchObject({ message: 'expected iterable values for key 1' });
    });
  });

  describe('incremental failure', () => {
    it('keeps entries added before a rejected one', () => {
      const builder = new ListMultimapBuilder(int, str);
      expect(() => builder.addAll(JSON.parse('[[1, ["a", "b"]], [2, ["c", null]], [3, ["d"]]]'))).toThrow(
        InvalidElementError
      );
      expect(builder.build().toJSON()).toEqual([[1, ['a', 'b']], [2, ['c']]]);
    });
  });

  describe('nested ownership', () => {
    it('drops a key whose values are all removed', () => {
      const multimap = new ListMultimapBuilder(int, str).add(1, 'a').add(1, 'b').add(2, 'c').removeAll(1).build();
      expect(multimap.toJSON()).toEqual([[2, ['c']]]);
      expect(multimap.has(1)).toBe(false);
      expect(multimap.size).toBe(1);
    });

    it('drops a finalized key emptied by remove', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a']], [2, ['b']]]);
      const rebuilt = multimap.rebuild((b) => b.remove(1, 'a'));
      expect(rebuilt.toJSON()).toEqual([[2, ['b']]]);
      expect(entries.filter((e) => e.message === 'dropped empty keys').map((e) => e.data)).toEqual([{ count: 1 }]);
    });

    it('starts a removed key over on the next add', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a', 'b']]]);
      expect(multimap.rebuild((b) => b.removeAll(1).add(1, 'c')).toJSON()).toEqual([[1, ['c']]]);
      expect(multimap.get(1).toArray()).toEqual(['a', 'b']);
    });

    it('shares the values of untouched keys with the source', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a']], [2, ['b']]]);
      const rebuilt = multimap.rebuild((b) => b.add(1, 'c'));
      expect(rebuilt.get(2)).toBe(multimap.get(2));
      expect(rebuilt.get(1).toArray()).toEqual(['a', 'c']);
      expect(multimap.get(1).toArray()).toEqual(['a']);
    });

    it('clones the outer map once per cycle and each touched key once', () => {
      const builder = frozenListMultimap(int, str, [[1, ['a']], [2, ['b']], [3, ['x']]]).toBuilder();
      builder.add(1, 'c').add(1, 'd').add(2, 'e');
      expect(clonesBy('ListMultimapBuilder')).toHaveLength(1);
      expect(clonesBy('ListBuilder')).toHaveLength(2);

      builder.build();
      builder.add(1, 'f');
      expect(clonesBy('ListMultimapBuilder')).toHaveLength(2);
      expect(clonesBy('ListBuilder')).toHaveLength(3);
      expect(builder.build().toJSON()).toEqual([[1, ['a', 'c', 'd', 'f']], [2, ['b', 'e']], [3, ['x']]]);
    });

    it('returns the same multimap from toBuilder().build()', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a']]]);
      expect(multimap.toBuilder().build()).toBe(multimap);
      expect(multimap.rebuild(() => {})).toBe(multimap);
    });

    it('returns identical multimap on repeated build', () => {
      const builder = new ListMultimapBuilder(int, str).add(1, 'a');
      expect(builder.build()).toBe(builder.build());
    });

    it('does not mutate the multimap following mutates after build', () => {
      const builder = new ListMultimapBuilder(int, str).add(1, 'a');
      const multimap = builder.build();
      builder.add(1, 'b').add(2, 'c');
      expect(multimap.toJSON()).toEqual([[1, ['a']]]);
      expect(builder.build().toJSON()).toEqual([[1, ['a', 'b']], [2, ['c']]]);
    });

    it('keeps pending edits when replace is given a non-iterable source', () => {
      const builder = new ListMultimapBuilder(int, str).add(1, 'a');
      expect(() => builder.replace(JSON.parse('42'))).toThrow(ArgumentError);
      expect(builder.build().toJSON()).toEqual([[1, ['a']]]);
    });

    it('attaches on replace with a multimap of the same descriptors', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a']]]);
      expect(new ListMultimapBuilder(int, str).add(5, 'z').replace(multimap).build()).toBe(multimap);
    });
  });

  describe('multimap methods', () => {
    it('keeps duplicate values in insertion order', () => {
      expect(new ListMultimapBuilder(int, str).add(1, 'a').add(1, 'a').build().get(1).toArray()).toEqual(['a', 'a']);
    });

    it('adds several values for one key', () => {
      expect(new ListMultimapBuilder(int, str).addValues(1, ['a', 'b']).build().toJSON()).toEqual([[1, ['a', 'b']]]);
    });

    it('adds from a Map of iterables', () => {
      const source = new Map([[1, ['a']], [2, ['b', 'c']]]);
      expect(new ListMultimapBuilder(int, str, source).build().toJSON()).toEqual([[1, ['a']], [2, ['b', 'c']]]);
    });

    it('removes one occurrence of a value', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a', 'b', 'a']]]);
      expect(multimap.rebuild((b) => b.remove(1, 'a')).get(1).toArray()).toEqual(['b', 'a']);
    });

    it('adds entries derived from an iterable with key and value', () => {
      const multimap = new ListMultimapBuilder(int, str)
        .addIterable([1, 2, 3], { key: (x) => x % 2, value: (x) => `v${x}` })
        .build();
      expect(multimap.toJSON()).toEqual([[1, ['v1', 'v3']], [0, ['v2']]]);
    });

    it('adds entries derived from an iterable with key and values', () => {
      const multimap = new ListMultimapBuilder(int, str)
        .addIterable(['ab', 'c'], { key: (s) => s.length, values: (s) => s.split('') })
        .build();
      expect(multimap.toJSON()).toEqual([[2, ['a', 'b']], [1, ['c']]]);
    });

    it('rejects both value and values before changing anything', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a']]]);
      const builder = multimap.toBuilder();
      const err = thrown(() =>
        builder.addIterable(['b'], { key: () => 1, value: (s) => s, values: (s) => [s] })
      );
      expect(err).toBeInstanceOf(ArgumentError);
      expect(err).toMatchObject({ message: 'only one of value and values may be specified, got both' });
      expect(builder.build()).toBe(multimap);
    });

    it('reads pending values before build', () => {
      const builder = new ListMultimapBuilder(int, str).add(1, 'a');
      expect(builder.get(1).toArray()).toEqual(['a']);
      expect(builder.get(2).isEmpty).toBe(true);
      builder.add(1, 'b');
      expect(builder.get(1).toArray()).toEqual(['a', 'b']);
    });

    it('clears', () => {
      const multimap = frozenListMultimap(int, str, [[1, ['a']]]);
      expect(multimap.rebuild((b) => b.add(2, 'b').clear()).isEmpty).toBe(true);
      expect(multimap.size).toBe(1);
    });
  });
});

describe('FrozenListMultimap', () => {
  it('returns a multimap with the same descriptors as is', () => {
    const multimap = frozenListMultimap(int, str, [[1, ['a']]]);
    expect(frozenListMultimap(int, str, multimap)).toBe(multimap);
  });

  it('leaves out keys given no values', () => {
    const multimap = frozenListMultimap(int, str, [[1, []], [2, ['b']]]);
    expect(multimap.toJSON()).toEqual([[2, ['b']]]);
  });

  it('has the read-only multimap surface', () => {
    const multimap = frozenListMultimap(int, str, [[1, ['a', 'b']], [2, ['c']]]);
    expect(multimap.size).toBe(2);
    expect(multimap.isNotEmpty).toBe(true);
    expect(multimap.has(2)).toBe(true);
    expect(multimap.hasEntry(1, 'b')).toBe(true);
    expect(multimap.hasEntry(2, 'b')).toBe(false);
    expect(multimap.get(3).isEmpty).toBe(true);
    expect([...multimap.keys()]).toEqual([1, 2]);
    expect([...multimap.values()]).toEqual(['a', 'b', 'c']);

    const seen: string[] = [];
    multimap.forEach((value, key) => seen.push(`${key}=${value}`));
    expect(seen).toEqual(['1=a', '1=b', '2=c']);
  });

  it('compares by content with value order significant', () => {
    const a = frozenListMultimap(int, str, [[1, ['a', 'b']], [2, ['c']]]);
    const b = frozenListMultimap(int, str, [[2, ['c']], [1, ['a', 'b']]]);
    expect(a.equals(b)).toBe(true);
    expect(a.hashCode).toBe(b.hashCode);
    expect(a.equals(frozenListMultimap(int, str, [[1, ['b', 'a']], [2, ['c']]]))).toBe(false);
    expect(a.equals(frozenSetMultimap(int, str, [[1, ['a', 'b']], [2, ['c']]]))).toBe(false);
  });

  it('formats as text and JSON', () => {
    const multimap = frozenListMultimap(int, str, [[1, ['a', 'b']], [2, ['c']]]);
    expect(multimap.toString()).toBe('{1: [a, b], 2: [c]}');
    expect(JSON.stringify(multimap)).toBe('[[1,["a","b"]],[2,["c"]]]');
  });

  it('cannot be constructed around a caller-owned map', () => {
    const store = new Map([[1, frozenListMultimap(int, str, [[1, ['a']]]).get(1)]]);
    expect(thrown(() => new FrozenListMultimap(JSON.parse('null'), int, str, store))).toMatchObject({
      name: 'ArgumentError',
      message: 'FrozenListMultimap is created by its factory or builder, not with new',
    });
  });

  it('is a FrozenListMultimap', () => {
    expect(frozenListMultimap(int, str)).toBeInstanceOf(FrozenListMultimap);
  });
});
