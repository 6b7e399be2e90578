/**
 * Tests for text normalization steps
 */

import { describe, it, expect } from '@jest/globals';
import { collapseWhitespace, normalizeUnicode, removeZeroWidth, trimWhitespace } from './text.js';

describe('collapseWhitespace', () => {
  it('should turn every run into one space', () => {
    expect(collapseWhitespace('a \t\n b\u3000\u00A0c')).toBe('a b c');
  });

  it('should not treat the byte order mark as whitespace', () => {
    expect(collapseWhitespace('a\uFEFFb')).toBe('a\uFEFFb');
  });
});

describe('trimWhitespace', () => {
  it('should remove edge whitespace only', () => {
    expect(trimWhitespace('\n  a b \t')).toBe('a b');
  });
});

describe('normalizeUnicode', () => {
  it('should apply compatibility normalization', () => {
    expect(normalizeUnicode('ＡＢ')).toBe('AB');
    expect(normalizeUnicode('①')).toBe('1');
    expect(normalizeUnicode('ﬁne')).toBe('fine');
  });
});

describe('removeZeroWidth', () => {
  it('should remove every zero-width character', () => {
    expect(removeZeroWidth('a\u200Bb\u200Cc\u200Dd\u2060e\uFEFF')).toBe('abcde');
  });
});
