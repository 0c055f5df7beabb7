/**
 * Benchmark: ListBuilder vs Native vs Immer
 * Tests the cost of a build-mutate-build cycle on a frozen list
 */

import { bench, describe } from 'vitest';
import { z } from 'zod';
import { produce as immerProduce } from 'immer';
import { ListBuilder, frozenList } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const int = z.number().int();
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const frozenArr = frozenList(int, nativeArr);

describe('Single update at index 500', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[500] = 999;
  });

  bench('FrozenList rebuild()', () => {
    frozenArr.rebuild(b => {
      b.set(500, 999);
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      draft[500] = 999;
    });
  });
});

// ===== Push operations =====
describe('Push 10 items', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) {
      copy.push(i);
    }
  });

  bench('FrozenList rebuild()', () => {
    frozenArr.rebuild(b => {
      for (let i = 0; i < 10; i++) {
        b.add(i);
      }
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      for (let i = 0; i < 10; i++) {
        draft.push(i);
      }
    });
  });
});

// ===== No-op cycles =====
describe('toBuilder + build without changes', () => {
  bench('Native (copy)', () => {
    nativeArr.slice();
  });

  bench('FrozenList toBuilder().build()', () => {
    frozenArr.toBuilder().build();
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, () => {});
  });
});

// ===== Construction =====
describe(`Build ${SIZE} elements from scratch`, () => {
  bench('Native (copy)', () => {
    Array.from(nativeArr);
  });

  bench('new ListBuilder().build()', () => {
    new ListBuilder(int, nativeArr).build();
  });
});
