/**
 * Structural hashing and equality for frozen collections
 */

// Hash caches
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new Map<symbol, number>();
let SYM_SEQ = 1;

// Implemented by every frozen collection
export interface Hashable {
  readonly hashCode: number;
  equals(other: unknown): boolean;
}

function isHashable(value: object): value is Hashable {
  return 'hashCode' in value && typeof value.hashCode === 'number' &&
    'equals' in value && typeof value.equals === 'function';
}

// Splitmix32 finalizer
function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

// Murmur3 32-bit hash for strings
function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 4 <= key.length) {
    k =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);
    i += 4;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  k = 0;
  switch (key.length & 3) {
    case 3:
      k ^= (key.charCodeAt(i + 2) & 0xff) << 16;
    // falls through
    case 2:
      k ^= (key.charCodeAt(i + 1) & 0xff) << 8;
    // falls through
    case 1:
      k ^= key.charCodeAt(i) & 0xff;
      k = Math.imul(k, 0xcc9e2d51);
      k = (k << 15) | (k >>> 17);
      k = Math.imul(k, 0x1b873593);
      h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Hash consistent with {@link valueEquals}: frozen collections hash by
 * content, other objects by identity.
 */
export function hashValue(value: unknown): number {
  switch (typeof value) {
    case 'string':
      return murmur3(value);
    case 'number': {
      const n = Object.is(value, -0) ? 0 : value;
      return mix32((n | 0) ^ Math.imul((n * 4294967296) | 0, 0x9e3779b1));
    }
    case 'boolean':
      return value ? 0x27d4eb2d : 0x165667b1;
    case 'bigint':
      return murmur3(value.toString(), 0x2545f491);
    case 'symbol': {
      let id = SYM_HASH.get(value);
      if (id === undefined) {
        id = SYM_SEQ++;
        SYM_HASH.set(value, id);
      }
      return (id * 0x9e3779b1) >>> 0;
    }
    case 'object':
    case 'function':
      if (value === null) return 0x811c9dc5;
      if (isHashable(value)) return value.hashCode;
      {
        let id = OBJ_HASH.get(value);
        if (id === undefined) {
          id = OBJ_SEQ++;
          OBJ_HASH.set(value, id);
        }
        return (id * 0x85ebca77) >>> 0;
      }
    default:
      return 0x9747b28c;
  }
}

// Equality of Array.prototype.includes and Set membership
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

// SameValueZero, except frozen collections compare by content
export function valueEquals(a: unknown, b: unknown): boolean {
  if (sameValueZero(a, b)) return true;
  if (a !== null && typeof a === 'object' && isHashable(a)) return a.equals(b);
  return false;
}

// Order-sensitive combination (lists)
export function hashOrdered(seed: number, values: Iterable<unknown>): number {
  let h = seed;
  let n = 0;
  for (const v of values) {
    h = (Math.imul(h, 31) + hashValue(v)) | 0;
    n++;
  }
  return mix32(h ^ n);
}

// Order-insensitive combination (sets, maps)
export function hashUnordered(seed: number, hashes: Iterable<number>): number {
  let sum = 0;
  let xor = 0;
  let n = 0;
  for (const h of hashes) {
    sum = (sum + h) | 0;
    xor ^= h;
    n++;
  }
  return mix32(seed ^ sum ^ Math.imul(xor, 0x27d4eb2d) ^ n);
}

export function hashEntry(key: unknown, value: unknown): number {
  return mix32(hashValue(key) ^ Math.imul(hashValue(value), 0x85ebca77));
}
