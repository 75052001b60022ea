/**
 * Hashing and identifier helpers
 */

import { randomBytes, createHash, timingSafeEqual } from 'crypto';

/**
 * Hash an API key using SHA-256
 */
export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}

/**
 * Constant-time comparison of a presented key against the configured one
 */
export function apiKeysMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(hashApiKey(presented), 'hex');
  const b = Buffer.from(hashApiKey(expected), 'hex');
  return timingSafeEqual(a, b);
}

/**
 * Generate a correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return `corr_${randomBytes(12).toString('base64url')}`;
}

/**
 * Generate a unique ID with prefix
 */
export function generateId(prefix: string): string {
  return `${prefix}_${randomBytes(12).toString('base64url')}`;
}
