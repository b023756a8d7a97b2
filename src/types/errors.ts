/**
 * Error kinds raised by position conversions and store mutations.
 * The editor catches these at its command boundary; nothing else does.
 */

export type TextErrorKind = 'InvalidBoundary' | 'InvalidRange';

export interface TextErrorDetail {
  readonly offset?: number;
  readonly line?: number;
  readonly column?: number;
  readonly start?: number;
  readonly end?: number;
  /** Document length in bytes at the time of the error */
  readonly lenBytes?: number;
}

export class TextError extends Error {
  readonly kind: TextErrorKind;
  readonly detail: TextErrorDetail;

  constructor(kind: TextErrorKind, message: string, detail: TextErrorDetail = {}) {
    super(message);
    this.name = 'TextError';
    this.kind = kind;
    this.detail = detail;
  }
}

export function isTextError(error: unknown): error is TextError {
  return error instanceof TextError;
}

/**
 * Offset or position is out of bounds or not on a grapheme boundary.
 */
export function invalidBoundary(message: string, detail: TextErrorDetail = {}): TextError {
  return new TextError('InvalidBoundary', message, detail);
}

/**
 * Range end precedes its start.
 */
export function invalidRange(start: number, end: number): TextError {
  return new TextError('InvalidRange', `Range end ${end} precedes start ${start}`, { start, end });
}

/**
 * Recognized no-op result of a mutation. Not an error: returned, never thrown.
 */
export const EMPTY_OPERATION = Object.freeze({ type: 'EmptyOperation' as const });

export type EmptyOperation = typeof EMPTY_OPERATION;

export function isEmptyOperation(value: unknown): value is EmptyOperation {
  return value === EMPTY_OPERATION;
}
