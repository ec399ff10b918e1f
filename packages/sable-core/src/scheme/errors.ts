/**
 * Error types raised by the reader, parser and evaluator.
 *
 * Nothing in the core catches these; the host driver reports `message`
 * and decides whether to keep going.
 */

export type SchemeErrorKind =
  | 'RuntimeError'
  | 'UnboundVariable'
  | 'TypeError'
  | 'ArithmeticError'
  | 'ArityError'
  | 'SyntaxError';

export abstract class SchemeError extends Error {
  abstract readonly kind: SchemeErrorKind;

  protected constructor(kind: SchemeErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = 'SchemeError';
  }
}

export class RuntimeError extends SchemeError {
  readonly kind = 'RuntimeError';

  constructor(message: string) {
    super('RuntimeError', message);
    this.name = 'RuntimeError';
  }
}

export class UnboundVariableError extends SchemeError {
  readonly kind = 'UnboundVariable';

  constructor(public readonly variable: string) {
    super('UnboundVariable', `undefined variable '${variable}'`);
    this.name = 'UnboundVariableError';
  }
}

export class SchemeTypeError extends SchemeError {
  readonly kind = 'TypeError';

  constructor(message: string) {
    super('TypeError', message);
    this.name = 'SchemeTypeError';
  }
}

export class ArithmeticError extends SchemeError {
  readonly kind = 'ArithmeticError';

  constructor(message: string) {
    super('ArithmeticError', message);
    this.name = 'ArithmeticError';
  }
}

export class ArityError extends SchemeError {
  readonly kind = 'ArityError';

  constructor(message: string) {
    super('ArityError', message);
    this.name = 'ArityError';
  }
}

/**
 * Source position of a reader error
 */
export interface Location {
  file: string;
  line: number;
  column: number;
}

export class SchemeSyntaxError extends SchemeError {
  readonly kind = 'SyntaxError';

  constructor(message: string, public readonly location: Location | null = null) {
    super('SyntaxError', location ? `${location.file}:${location.line}:${location.column}: ${message}` : message);
    this.name = 'SchemeSyntaxError';
  }
}

/**
 * Input ended inside a list or string. The REPL uses this to ask for
 * another line instead of reporting an error.
 */
export class IncompleteInputError extends SchemeSyntaxError {
  constructor(message: string, location: Location | null = null) {
    super(message, location);
    this.name = 'IncompleteInputError';
  }
}
