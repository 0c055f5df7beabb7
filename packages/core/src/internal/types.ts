/**
 * Core type definitions
 */

import type { ZodType } from 'zod';
import { STORE } from './constants';

// Runtime descriptor for a type parameter; z.unknown() is the explicit top type
export type ElementType<T> = ZodType<T>;

// Anything that hands its backing store to an attaching builder
export interface Frozen<S> {
  readonly [STORE]: S;
}

// Builder ownership: attached builders alias the owner's store and must clone
// it before the first write
export type Ownership<S, C extends Frozen<S>> =
  | { kind: 'attached'; owner: C; store: S }
  | { kind: 'detached'; store: S };
