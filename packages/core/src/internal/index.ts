/**
 * Internal modules barrel export
 */

// Constants
export {
  STORE,
  LIST_SEED,
  SET_SEED,
  MAP_SEED,
  MULTIMAP_SEED,
  WRAP,
  LOG_LEVEL_ENV,
} from './constants';

// Checked Store
export {
  checkElementType,
  checkElement,
  checked,
  checkWrap,
  isIterable,
  isPair,
  checkIndex,
  checkRange,
} from './checked';

// Hashing
export {
  hashValue,
  sameValueZero,
  valueEquals,
  hashOrdered,
  hashUnordered,
  hashEntry,
  type Hashable,
} from './hash';

// Logging
export {
  Logger,
  logger,
  stderrTransport,
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type Transport,
} from './log';

// Copy-on-write engine
export { CopyOnWriteBuilder } from './builder';
export {
  MultimapBuilder,
  FrozenMultimap,
  type ValuesBuilder,
  type FrozenValues,
  type MultimapSource,
  type AddIterableOptions,
} from './multimap';

// Types
export type { ElementType, Frozen, Ownership } from './types';
