/**
 * Tests for @warden/shield - Cloaking codec
 */
import { describe, it, expect } from 'vitest';
import {
  applyReplacements,
  buildCloakMap,
  buildReplacement,
  uncloakText,
  type Replacement,
} from '@warden/shield';

const placeholder = { format: 'placeholder', preserveFormat: false } as const;

describe('cloaking codec', () => {
  describe('buildReplacement', () => {
    it('numbers placeholder tokens', () => {
      expect(buildReplacement('alice@example.com', 'EMAIL', 3, placeholder)).toBe('[EMAIL_3]');
    });

    it('derives hash tokens from the value and salt', () => {
      const plain = buildReplacement('abc', 'SSN', 1, { format: 'hash', preserveFormat: false });
      const salted = buildReplacement('abc', 'SSN', 1, {
        format: 'hash',
        preserveFormat: false,
        hashSalt: 'test-salt',
      });

      // sha256("abc") starts with ba7816bf
      expect(plain).toBe('[SSN_ba7816bf]');
      expect(salted).toMatch(/^\[SSN_[0-9a-f]{8}\]$/);
      expect(salted).not.toBe(plain);
    });

    it('redacts with a fixed or length-preserving mask', () => {
      expect(buildReplacement('secret', 'X', 1, { format: 'redact', preserveFormat: false })).toBe('****');
      expect(buildReplacement('secret', 'X', 1, { format: 'redact', preserveFormat: true })).toBe('******');
    });
  });

  describe('applyReplacements', () => {
    it('substitutes spans regardless of input order', () => {
      const replacements: Replacement[] = [
        { start: 6, end: 11, original: 'world', replacement: '[W_1]' },
        { start: 0, end: 5, original: 'hello', replacement: '[H]' },
      ];
      expect(applyReplacements('hello world!', replacements)).toBe('[H] [W_1]!');
    });
  });

  describe('buildCloakMap', () => {
    it('keeps repeated tokens that map to the same original', () => {
      const map = buildCloakMap([
        { start: 0, end: 1, original: 'a', replacement: '[A]' },
        { start: 2, end: 3, original: 'a', replacement: '[A]' },
      ]);
      expect(map).toEqual({ '[A]': 'a' });
    });

    it('drops tokens that stand for different originals', () => {
      const map = buildCloakMap([
        { start: 0, end: 1, original: 'a', replacement: '****' },
        { start: 2, end: 3, original: 'b', replacement: '****' },
        { start: 4, end: 5, original: 'c', replacement: '****' },
        { start: 6, end: 7, original: 'd', replacement: '[D]' },
      ]);
      expect(map).toEqual({ '[D]': 'd' });
    });
  });

  describe('uncloakText', () => {
    it('replaces longer tokens first', () => {
      expect(uncloakText('** and ****', { '**': 'ab', '****': 'wxyz' })).toBe('ab and wxyz');
    });

    it('replaces every occurrence', () => {
      expect(uncloakText('[A] then [A]', { '[A]': 'x' })).toBe('x then x');
    });
  });
});
