/**
 * Crypto utility tests
 */

import { describe, it, expect } from 'vitest';
import { apiKeysMatch, generateCorrelationId, generateId, hashApiKey } from '../../utils/crypto.js';

describe('Crypto Utilities', () => {
  describe('hashApiKey', () => {
    it('should produce consistent hashes for the same input', () => {
      expect(hashApiKey('test-secret')).toBe(hashApiKey('test-secret'));
    });

    it('should produce different hashes for different inputs', () => {
      expect(hashApiKey('test-secret')).not.toBe(hashApiKey('other-secret'));
    });

    it('should produce a 64 character hex digest', () => {
      expect(hashApiKey('test-secret')).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  describe('apiKeysMatch', () => {
    it('should accept an identical key', () => {
      expect(apiKeysMatch('test-secret', 'test-secret')).toBe(true);
    });

    it('should reject a different key, including one of another length', () => {
      expect(apiKeysMatch('test-secreT', 'test-secret')).toBe(false);
      expect(apiKeysMatch('short', 'test-secret')).toBe(false);
    });
  });

  describe('generateCorrelationId', () => {
    it('should generate IDs with correct prefix', () => {
      expect(generateCorrelationId()).toMatch(/^corr_[A-Za-z0-9_-]+$/);
    });

    it('should generate unique IDs', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateCorrelationId()));
      expect(ids.size).toBe(100);
    });
  });

  describe('generateId', () => {
    it('should use the given prefix', () => {
      expect(generateId('exp')).toMatch(/^exp_[A-Za-z0-9_-]{16}$/);
    });
  });
});
