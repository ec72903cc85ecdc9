export type ParseErrorKind = 'invalid-format' | 'out-of-range';

export class ParseError extends Error {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string) {
    super(message);
    this.name = 'ParseError';
    this.kind = kind;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export class NotificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotificationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ParseError };
