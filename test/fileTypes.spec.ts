import { describe, expect, it } from 'vitest';
import { fileTypeOf, UNKNOWN_FILE_TYPE } from '../src/fileTypes.js';

describe('fileTypeOf', () => {
  it('labels known extensions', () => {
    expect(fileTypeOf('ts')).toBe('TypeScript');
    expect(fileTypeOf('md')).toBe('Markdown');
  });

  it('ignores case', () => {
    expect(fileTypeOf('TXT')).toBe('Plain Text');
  });

  it('falls back for missing or unlisted extensions', () => {
    expect(fileTypeOf('')).toBe(UNKNOWN_FILE_TYPE);
    expect(fileTypeOf('nope')).toBe('Unknown');
  });
});
