/**
 * Benchmark: ListMultimapBuilder vs Native Map of arrays vs Immer
 * A single key changes; the other keys' values are shared
 */

import { bench, describe } from 'vitest';
import { z } from 'zod';
import { enableMapSet, produce as immerProduce } from 'immer';
import { frozenListMultimap } from '../packages/core/src/index';

enableMapSet();

// ===== Setup =====
const KEYS = 100;
const VALUES = 20;
const nativeMap = new Map<number, number[]>(
  Array.from({ length: KEYS }, (_, k) => [k, Array.from({ length: VALUES }, (_, v) => v)])
);
const frozenMultimap = frozenListMultimap(z.number(), z.number(), nativeMap);

describe('Add one value under one key', () => {
  bench('Native (deep copy)', () => {
    const copy = new Map<number, number[]>();
    for (const [k, values] of nativeMap) copy.set(k, values.slice());
    copy.get(50)?.push(999);
  });

  bench('Native (shallow copy)', () => {
    const copy = new Map(nativeMap);
    copy.set(50, [...(nativeMap.get(50) ?? []), 999]);
  });

  bench('FrozenListMultimap rebuild()', () => {
    frozenMultimap.rebuild(b => {
      b.add(50, 999);
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeMap, draft => {
      draft.get(50)?.push(999);
    });
  });
});

describe('Remove every value under one key', () => {
  bench('FrozenListMultimap rebuild()', () => {
    frozenMultimap.rebuild(b => {
      b.removeAll(50);
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeMap, draft => {
      draft.delete(50);
    });
  });
});
