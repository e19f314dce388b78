/**
 * Hashing utilities for content comparison
 *
 * Uses js-sha256 for pure JavaScript SHA-256 implementation.
 */

import { sha256 } from 'js-sha256';

/**
 * Compute SHA-256 hash of a string
 */
export function hashString(str: string): string {
  return sha256(str);
}

/**
 * Compute SHA-256 hash of binary data
 */
export function hashBytes(data: Uint8Array | ArrayBuffer): string {
  return sha256(data);
}
