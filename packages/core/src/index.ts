/**
 * Frozen collections with copy-on-write builders
 *
 * - frozenList / ListBuilder                  → ordered list
 * - frozenSet / SetBuilder                    → insertion-ordered set
 * - frozenMap / MapBuilder                    → insertion-ordered map
 * - frozenListMultimap / ListMultimapBuilder  → key → list of values
 * - frozenSetMultimap / SetMultimapBuilder    → key → set of values
 *
 * `toBuilder()` attaches to a frozen collection without copying; the first
 * mutation clones the store, and `build()` hands it back without copying.
 */

export { FrozenList, ListBuilder, frozenList } from './list';
export { FrozenSet, SetBuilder, frozenSet } from './set';
export { FrozenMap, MapBuilder, frozenMap, type MapSource } from './map';
export { FrozenListMultimap, ListMultimapBuilder, frozenListMultimap } from './list-multimap';
export { FrozenSetMultimap, SetMultimapBuilder, frozenSetMultimap } from './set-multimap';

export {
  CollectionError,
  InvalidElementError,
  UnspecifiedTypeError,
  ArgumentError,
  type ElementRole,
} from './errors';

export { loadConfig, configureLogging, type CollectionsConfig } from './config';

export {
  CopyOnWriteBuilder,
  FrozenMultimap,
  MultimapBuilder,
  Logger,
  logger,
  stderrTransport,
  type ElementType,
  type MultimapSource,
  type AddIterableOptions,
  type LogLevel,
  type LogEntry,
  type Transport,
} from './internal';
