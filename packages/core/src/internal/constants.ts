/**
 * Core constants for frozen collections
 */

// Symbol for internal store access; never re-exported from the package entry
export const STORE = Symbol('STORE');

// Token only this package can pass to a frozen collection's constructor
export const WRAP = Symbol('WRAP');

// Hash seeds per collection kind, so equal contents of different kinds differ
export const LIST_SEED = 0x3c6ef372;
export const SET_SEED = 0x1b873593;
export const MAP_SEED = 0x85ebca6b;
export const MULTIMAP_SEED = 0xcc9e2d51;

// Environment variable read by loadConfig()
export const LOG_LEVEL_ENV = 'FROZEN_COLLECTIONS_LOG_LEVEL';
