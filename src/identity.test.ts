import { describe, expect, test } from 'vitest';
import { ResolutionFailed } from './errors.js';
import { normalizeHandle, normalizePhone } from './identity.js';

describe('normalizePhone', () => {
  test('keeps only digits and plus signs', () => {
    expect(normalizePhone(' +1 (555) 123-4567 ')).toBe('+15551234567');
  });

  test('leaves a number without country prefix as is', () => {
    expect(normalizePhone('555.123.4567')).toBe('5551234567');
  });

  test('returns an empty string for blank input', () => {
    expect(normalizePhone('   ')).toBe('');
  });
});

describe('normalizeHandle', () => {
  test('strips a leading @', () => {
    expect(normalizeHandle('@a_bot')).toBe('a_bot');
    expect(normalizeHandle('  lookup_bot ')).toBe('lookup_bot');
  });

  test.each(['', '@', '@abc', '@1abc_bot', '@a_bot_', '@bad-bot', `@a${'b'.repeat(32)}`])('rejects %j', (handle) => {
    expect(() => normalizeHandle(handle)).toThrow(ResolutionFailed);
  });

  test('marks the failure as an invalid handle', () => {
    try {
      normalizeHandle('@x!');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: 'ResolutionFailed', reason: 'InvalidHandle', status: 400 });
    }
  });
});
