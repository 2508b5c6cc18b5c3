/**
 * Reader error taxonomy.
 *
 * Coordinate and range errors are caller bugs and are thrown before any state
 * changes. `ChapterLoadError` is the only recoverable kind.
 */

export type ReaderErrorCode =
  | 'OutOfRange'
  | 'InvalidChapter'
  | 'InvalidPage'
  | 'NotInitialized'
  | 'LoadFailure'
  | 'InvalidConfig';

export abstract class ReaderError extends Error {
  abstract readonly code: ReaderErrorCode;
}

export class OutOfRangeError extends ReaderError {
  readonly code = 'OutOfRange' as const;

  constructor(
    public readonly globalPageIndex: number,
    public readonly totalPages: number
  ) {
    super(`Global page ${globalPageIndex} is outside [0, ${totalPages})`);
    this.name = 'OutOfRangeError';
  }
}

export class InvalidChapterError extends ReaderError {
  readonly code = 'InvalidChapter' as const;

  constructor(
    public readonly chapterIndex: number,
    public readonly totalChapters: number
  ) {
    super(`Chapter ${chapterIndex} is outside [0, ${totalChapters})`);
    this.name = 'InvalidChapterError';
  }
}

export class InvalidPageError extends ReaderError {
  readonly code = 'InvalidPage' as const;

  constructor(
    public readonly chapterIndex: number,
    public readonly pageIndex: number,
    public readonly pageCount: number
  ) {
    super(`Page ${pageIndex} is outside [0, ${pageCount}) in chapter ${chapterIndex}`);
    this.name = 'InvalidPageError';
  }
}

export class NotInitializedError extends ReaderError {
  readonly code = 'NotInitialized' as const;

  constructor(public readonly operation: string) {
    super(`${operation} called before initialize()`);
    this.name = 'NotInitializedError';
  }
}

export class ChapterLoadError extends ReaderError {
  readonly code = 'LoadFailure' as const;

  constructor(
    public readonly chapterIndex: number,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(`Chapter ${chapterIndex} failed to load after ${attempts} attempt(s): ${describeCause(cause)}`, { cause });
    this.name = 'ChapterLoadError';
  }
}

export class InvalidConfigError extends ReaderError {
  readonly code = 'InvalidConfig' as const;

  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'InvalidConfigError';
  }
}

export function isReaderError(value: unknown, code?: ReaderErrorCode): value is ReaderError {
  if (!(value instanceof ReaderError)) return false;
  return code === undefined || value.code === code;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
