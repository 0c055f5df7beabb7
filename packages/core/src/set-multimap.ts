/**
 * FrozenSetMultimap + SetMultimapBuilder
 *
 * Each key maps to a FrozenSet of values; a value appears at most once per
 * key.
 */

import { FrozenSet, SetBuilder } from './set';
import {
  FrozenMultimap,
  MultimapBuilder,
  WRAP,
  type ElementType,
  type MultimapSource,
} from './internal';

export class FrozenSetMultimap<K, V> extends FrozenMultimap<K, V, FrozenSet<V>> {
  protected emptyValues(): FrozenSet<V> {
    return new FrozenSet(WRAP, this.valueType, new Set());
  }

  toBuilder(): SetMultimapBuilder<K, V> {
    return new SetMultimapBuilder(this.keyType, this.valueType, this);
  }

  rebuild(updates: (builder: SetMultimapBuilder<K, V>) => void): FrozenSetMultimap<K, V> {
    return this.toBuilder().update(updates).build();
  }
}

/**
 * Mutable staging area for a {@link FrozenSetMultimap}.
 *
 * Wrong: `new SetMultimapBuilder()`.
 * Right: `new SetMultimapBuilder(z.number(), z.string(), new Map([[1, ['a', 'b']]]))`.
 */
export class SetMultimapBuilder<K, V> extends MultimapBuilder<
  K,
  V,
  FrozenSet<V>,
  SetBuilder<V>,
  FrozenSetMultimap<K, V>
> {
  constructor(keyType?: ElementType<K>, valueType?: ElementType<V>, source: MultimapSource<K, V> = []) {
    super(keyType, valueType, 'new SetMultimapBuilder(z.number(), z.string())');
    this.replace(source);
  }

  protected newValuesBuilder(): SetBuilder<V> {
    return new SetBuilder(this.valueType);
  }

  protected emptyValues(): FrozenSet<V> {
    return new FrozenSet(WRAP, this.valueType, new Set());
  }

  protected isFrozen(source: unknown): source is FrozenSetMultimap<K, V> {
    return source instanceof FrozenSetMultimap;
  }

  protected wrap(store: Map<K, FrozenSet<V>>): FrozenSetMultimap<K, V> {
    return new FrozenSetMultimap(WRAP, this.keyType, this.valueType, store);
  }
}

/**
 * Creates a {@link FrozenSetMultimap} from `source`, copying and checking
 * every key and value. Keys with no values are left out. A
 * FrozenSetMultimap with the same descriptors is returned as is.
 */
export function frozenSetMultimap<K, V>(
  keyType?: ElementType<K>,
  valueType?: ElementType<V>,
  source: MultimapSource<K, V> = []
): FrozenSetMultimap<K, V> {
  if (
    source instanceof FrozenSetMultimap &&
    source.keyType === keyType &&
    source.valueType === valueType
  ) {
    return source;
  }
  return new SetMultimapBuilder(keyType, valueType, source).build();
}
