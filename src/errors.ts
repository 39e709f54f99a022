export type TextBufferErrorCode = 'OUT_OF_RANGE' | 'FILE_ERROR' | 'NO_FILE_NAME';

export abstract class TextBufferError extends Error {
  public abstract readonly code: TextBufferErrorCode;
}

/** A character or row index outside the current bounds. */
export class OutOfRangeError extends TextBufferError {
  public readonly code = 'OUT_OF_RANGE';

  public constructor(message = 'Out of range') {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

/** Reading or writing a file failed. The OS error is kept as `cause`. */
export class FileError extends TextBufferError {
  public readonly code = 'FILE_ERROR';

  public constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`File error at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'FileError';
  }
}

export class NoFileNameError extends TextBufferError {
  public readonly code = 'NO_FILE_NAME';

  public constructor() {
    super('No file name for this document');
    this.name = 'NoFileNameError';
  }
}
