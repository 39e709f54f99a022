import { describe, expect, it } from 'vitest';
import { toChars } from '../src/width.js';
import { nextBoundaryAfter, nextBoundaryBefore, words } from '../src/words.js';

describe('words', () => {
  it('records the start of each run and the length', () => {
    expect(words(toChars('hello world'))).toEqual([0, 6, 11]);
  });

  it('skips leading spaces', () => {
    expect(words(toChars('  a b'))).toEqual([2, 4, 5]);
  });

  it('records each leading tab', () => {
    expect(words(toChars('\t\tx'))).toEqual([0, 1, 2, 3]);
  });

  it('ignores tabs after text', () => {
    expect(words(toChars('a\tb'))).toEqual([0, 2, 3]);
  });

  it('returns only the length for a blank row', () => {
    expect(words(toChars('   '))).toEqual([3]);
    expect(words([])).toEqual([0]);
  });

  it('treats wide characters as part of a word', () => {
    expect(words(toChars('好好 ab'))).toEqual([0, 3, 5]);
  });
});

describe('nextBoundaryAfter', () => {
  it('returns the first boundary strictly after', () => {
    expect(nextBoundaryAfter([0, 6, 11], 0, 11)).toBe(6);
    expect(nextBoundaryAfter([0, 6, 11], 3, 11)).toBe(6);
  });

  it('falls back to the end', () => {
    expect(nextBoundaryAfter([0, 6, 11], 11, 11)).toBe(11);
  });
});

describe('nextBoundaryBefore', () => {
  it('returns the last boundary strictly before', () => {
    expect(nextBoundaryBefore([0, 6, 11], 11)).toBe(6);
    expect(nextBoundaryBefore([0, 6, 11], 7)).toBe(6);
  });

  it('falls back to zero', () => {
    expect(nextBoundaryBefore([2, 4], 2)).toBe(0);
  });
});
