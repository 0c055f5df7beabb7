/**
 * Usage - frozen collections and their builders
 */

import { z } from 'zod';
import {
  ListBuilder,
  configureLogging,
  frozenList,
  frozenListMultimap,
  frozenMap,
  loadConfig,
} from '../packages/core/src/index';

// FROZEN_COLLECTIONS_LOG_LEVEL=debug shows every clone and build
configureLogging(loadConfig());

console.log('=== Frozen collections ===\n');

// ===== Build a list =====
console.log('1️⃣ Create a frozen list');
const list = frozenList(z.number(), [1, 2, 3]);
console.log('list:', list.toString());

// ===== Rebuild =====
console.log('\n2️⃣ Rebuild with changes');
const list2 = list.rebuild(b => {
  b.add(4).set(0, 100);
});
console.log('list:', list.toString());
console.log('list2:', list2.toString());
console.log('✅ Immutable - list unchanged');

// ===== Reference identity =====
console.log('\n3️⃣ Reference identity');
const list3 = list.rebuild(() => {
  // No changes
});
console.log('list === list3:', list === list3);
console.log('✅ Same instance when no changes');

// ===== Builders =====
console.log('\n4️⃣ Reuse one builder');
const builder = new ListBuilder(z.string());
const a = builder.add('a').build();
const b = builder.add('b').build();
console.log('a:', a.toString(), 'b:', b.toString());
console.log('builder.build() === b:', builder.build() === b);

// ===== Element checks =====
console.log('\n5️⃣ Element checks');
try {
  builder.add(JSON.parse('null'));
} catch (err) {
  console.log('rejected:', err instanceof Error ? err.message : err);
}

// ===== Maps and multimaps =====
console.log('\n6️⃣ Maps and multimaps');
const prices = frozenMap(z.string(), z.number(), [['apple', 3]]);
console.log('prices:', prices.rebuild(m => m.set('pear', 4)).toString());

const tags = frozenListMultimap(z.string(), z.string(), [['post-1', ['draft']]]);
const tags2 = tags.rebuild(m => m.removeAll('post-1').add('post-2', 'news'));
console.log('tags:', tags.toString());
console.log('tags2:', tags2.toString());
console.log('✅ Keys with no values are dropped');
