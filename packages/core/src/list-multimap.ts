/**
 * FrozenListMultimap + ListMultimapBuilder
 *
 * Each key maps to a FrozenList of values; values keep insertion order and
 * may repeat.
 */

import { FrozenList, ListBuilder } from './list';
import {
  FrozenMultimap,
  MultimapBuilder,
  WRAP,
  type ElementType,
  type MultimapSource,
} from './internal';

export class FrozenListMultimap<K, V> extends FrozenMultimap<K, V, FrozenList<V>> {
  protected emptyValues(): FrozenList<V> {
    return new FrozenList(WRAP, this.valueType, []);
  }

  toBuilder(): ListMultimapBuilder<K, V> {
    return new ListMultimapBuilder(this.keyType, this.valueType, this);
  }

  rebuild(updates: (builder: ListMultimapBuilder<K, V>) => void): FrozenListMultimap<K, V> {
    return this.toBuilder().update(updates).build();
  }
}

/**
 * Mutable staging area for a {@link FrozenListMultimap}.
 *
 * Wrong: `new ListMultimapBuilder()`.
 * Right: `new ListMultimapBuilder(z.number(), z.string(), new Map([[1, ['a']]]))`.
 */
export class ListMultimapBuilder<K, V> extends MultimapBuilder<
  K,
  V,
  FrozenList<V>,
  ListBuilder<V>,
  FrozenListMultimap<K, V>
> {
  constructor(keyType?: ElementType<K>, valueType?: ElementType<V>, source: MultimapSource<K, V> = []) {
    super(keyType, valueType, 'new ListMultimapBuilder(z.number(), z.string())');
    this.replace(source);
  }

  protected newValuesBuilder(): ListBuilder<V> {
    return new ListBuilder(this.valueType);
  }

  protected emptyValues(): FrozenList<V> {
    return new FrozenList(WRAP, this.valueType, []);
  }

  protected isFrozen(source: unknown): source is FrozenListMultimap<K, V> {
    return source instanceof FrozenListMultimap;
  }

  protected wrap(store: Map<K, FrozenList<V>>): FrozenListMultimap<K, V> {
    return new FrozenListMultimap(WRAP, this.keyType, this.valueType, store);
  }
}

/**
 * Creates a {@link FrozenListMultimap} from `source`, copying and checking
 * every key and value. Keys with no values are left out. A
 * FrozenListMultimap with the same descriptors is returned as is.
 */
export function frozenListMultimap<K, V>(
  keyType?: ElementType<K>,
  valueType?: ElementType<V>,
  source: MultimapSource<K, V> = []
): FrozenListMultimap<K, V> {
  if (
    source instanceof FrozenListMultimap &&
    source.keyType === keyType &&
    source.valueType === valueType
  ) {
    return source;
  }
  return new ListMultimapBuilder(keyType, valueType, source).build();
}
