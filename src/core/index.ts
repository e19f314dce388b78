/**
 * Core utilities: alignment, hashing, errors and OOXML package access
 */

export * from './errors';
export * from './hash';
export * from './lcs';
export * from './xml';
export * from './package';
