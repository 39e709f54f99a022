import { describe, expect, it } from 'vitest';
import { FileError, NoFileNameError, OutOfRangeError, TextBufferError } from '../src/errors.js';

describe('errors', () => {
  it('gives out-of-range errors a default message', () => {
    const err = new OutOfRangeError();
    expect(err.message).toBe('Out of range');
    expect(err.code).toBe('OUT_OF_RANGE');
    expect(err).toBeInstanceOf(TextBufferError);
  });

  it('keeps the OS error as the cause of a file error', () => {
    const cause = new Error('ENOENT: no such file or directory');
    const err = new FileError('/tmp/x.txt', cause);
    expect(err.message).toBe('File error at /tmp/x.txt: ENOENT: no such file or directory');
    expect(err.cause).toBe(cause);
    expect(err.path).toBe('/tmp/x.txt');
    expect(err.code).toBe('FILE_ERROR');
    expect(err.name).toBe('FileError');
  });

  it('describes a missing file name', () => {
    const err = new NoFileNameError();
    expect(err.message).toBe('No file name for this document');
    expect(err.code).toBe('NO_FILE_NAME');
  });
});
