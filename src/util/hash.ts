/**
 * Hash Utility Module
 * 
 * Provides cryptographic hashing functions for change detection.
 * Used to derive the last-update marker without exposing batch internals.
 */

import crypto from 'crypto';

/**
 * Generates SHA256 hash of input data
 * 
 * @param data - String data to hash
 * @returns Hexadecimal hash string (64 characters)
 * 
 * @example
 * const marker = sha256(`${batchId}|${createdAt}|${facts}`);
 * // Clients compare markers to know whether to refetch
 */
export function sha256(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
