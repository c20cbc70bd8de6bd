export interface Position {
  line: number;
  column: number;
}

export type ErrorKind =
  | 'LexError'
  | 'ParseError'
  | 'NameError'
  | 'TypeError'
  | 'ArityError'
  | 'StackOverflowError'
  | 'IndexError'
  | 'ImportError';

/** Every failure raised by the lexer, parser, or runtime. */
export class OxError extends Error {
  constructor(
    public errorType: ErrorKind,
    public detail: string,
    public position?: Position,
  ) {
    super(
      position
        ? `${errorType}: ${detail} at line ${position.line}, column ${position.column}`
        : `${errorType}: ${detail}`,
    );
    this.name = 'OxError';
  }
}

/** True for the host's own "Maximum call stack size exceeded" failure. */
export function isStackExhaustion(error: unknown): error is RangeError {
  return error instanceof RangeError && /call stack/i.test(error.message);
}
