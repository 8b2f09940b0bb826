import { describe, it, expect } from 'vitest';
import { isCorrectDottedName, isCorrectName } from '../../../src/lib/grammar.js';

describe('grammar', () => {
  describe('isCorrectName', () => {
    it.each(['_', 'a', 'Aa1', 'a_A'])('accepts %j', (name) => {
      expect(isCorrectName(name)).toBe(true);
    });

    it.each(['', '1', ' a', 'a ', ' a ', '.', 'a.b.c', 'a-b', 'a\n'])('rejects %j', (name) => {
      expect(isCorrectName(name)).toBe(false);
    });
  });

  describe('isCorrectDottedName', () => {
    it.each(['_', 'a', 'A._1', 'a1.b2.c3'])('accepts %j', (name) => {
      expect(isCorrectDottedName(name)).toBe(true);
    });

    it.each([
      '',
      '1',
      ' a.b.c',
      'a.b.c ',
      ' a.b.c ',
      'a..b',
      '.a.b',
      'a.1.b',
      '!',
      '-',
      'a. b.c',
      'a.b.',
      '.',
    ])('rejects %j', (name) => {
      expect(isCorrectDottedName(name)).toBe(false);
    });

    it('agrees with isCorrectName on names without dots', () => {
      for (const name of ['', '_', 'a', '1', 'Aa1', ' a', 'a b', 'int', '$x']) {
        expect(isCorrectDottedName(name)).toBe(isCorrectName(name));
      }
    });
  });
});
