/**
 * Scheme reader
 *
 * Turns source text into syntax trees: integers, exact rationals (n/d),
 * strings, #t/#f, symbols, lists and the ' abbreviation for quote.
 * Comments run from ';' to the end of the line.
 */

import {
  type Syntax,
  numberSyntax,
  rationalSyntax,
  symbolSyntax,
  stringSyntax,
  booleanSyntax,
  listSyntax,
} from './syntax.js';
import { type Location, SchemeSyntaxError, IncompleteInputError } from './errors.js';
import { INT_MIN, INT_MAX } from './numeric.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const RATIONAL_PATTERN = /^([+-]?\d+)\/(\d+)$/;

/**
 * Reader over one source text
 */
export class Reader {
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(
    private readonly input: string,
    private readonly file: string = '<unknown>'
  ) {}

  /**
   * Read every datum in the input
   */
  read(): Syntax[] {
    const datums: Syntax[] = [];

    while (true) {
      this.skipWhitespaceAndComments();
      if (this.isAtEnd()) break;
      datums.push(this.readDatum());
    }

    return datums;
  }

  private readDatum(): Syntax {
    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      throw this.incomplete('Unexpected end of input');
    }

    const c = this.peek();

    if (c === '(') {
      return this.readList();
    }

    if (c === ')') {
      throw this.error("Unexpected ')'");
    }

    if (c === "'") {
      this.advance();
      this.skipWhitespaceAndComments();
      if (this.isAtEnd()) {
        throw this.incomplete('Expected expression after quote');
      }
      return listSyntax([symbolSyntax('quote'), this.readDatum()]);
    }

    if (c === '"') {
      return this.readString();
    }

    if (c === '#') {
      return this.readHash();
    }

    if (c === '`') {
      throw this.error('quasiquote is not supported');
    }

    return this.readAtom();
  }

  private readList(): Syntax {
    const start = this.currentLocation();
    this.expect('(');
    const elements: Syntax[] = [];

    while (true) {
      this.skipWhitespaceAndComments();

      if (this.isAtEnd()) {
        throw new IncompleteInputError(`Unterminated list starting at ${start.line}:${start.column}`, this.currentLocation());
      }

      if (this.peek() === ')') {
        this.advance();
        return listSyntax(elements);
      }

      elements.push(this.readDatum());
    }
  }

  private readString(): Syntax {
    this.expect('"');
    let str = '';

    while (this.peek() !== '"') {
      if (this.isAtEnd()) {
        throw this.incomplete('Unterminated string');
      }
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) {
          throw this.incomplete('Unterminated string');
        }
        const c = this.advance();
        switch (c) {
          case 'n': str += '\n'; break;
          case 't': str += '\t'; break;
          case 'r': str += '\r'; break;
          case '\\': str += '\\'; break;
          case '"': str += '"'; break;
          default: str += c; break;
        }
      } else {
        str += this.advance();
      }
    }

    this.expect('"');
    return stringSyntax(str);
  }

  /**
   * #t and #f
   */
  private readHash(): Syntax {
    const loc = this.currentLocation();
    const token = this.readToken();

    if (token === '#t') return booleanSyntax(true);
    if (token === '#f') return booleanSyntax(false);

    throw new SchemeSyntaxError(`Invalid hash expression: ${token}`, loc);
  }

  /**
   * Number or identifier. Anything that reads as a number is a number.
   */
  private readAtom(): Syntax {
    const loc = this.currentLocation();
    const token = this.readToken();

    if (INTEGER_PATTERN.test(token)) {
      return numberSyntax(this.checkRange(Number(token), token, loc));
    }

    const rational = RATIONAL_PATTERN.exec(token);
    if (rational) {
      const numerator = this.checkRange(Number(rational[1]), token, loc);
      const denominator = this.checkRange(Number(rational[2]), token, loc);
      if (denominator === 0) {
        throw new SchemeSyntaxError(`Zero denominator in ${token}`, loc);
      }
      return rationalSyntax(numerator, denominator);
    }

    const first = token[0];
    if ((first >= '0' && first <= '9') || first === '.' || first === '@') {
      throw new SchemeSyntaxError(`Invalid identifier: ${token}`, loc);
    }
    for (const ch of token) {
      if (ch === '#' || ch === '`') {
        throw new SchemeSyntaxError(`Invalid character '${ch}' in identifier: ${token}`, loc);
      }
    }

    return symbolSyntax(token);
  }

  private checkRange(value: number, token: string, loc: Location): number {
    if (value < INT_MIN || value > INT_MAX) {
      throw new SchemeSyntaxError(`Integer literal out of range: ${token}`, loc);
    }
    return value;
  }

  // ============ Tokenizer helpers ============

  /**
   * Characters up to the next delimiter
   */
  private readToken(): string {
    let token = '';
    while (!this.isAtEnd() && !this.isDelimiter(this.peek())) {
      token += this.advance();
    }
    return token;
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const c = this.peek();

      if (this.isWhitespace(c)) {
        this.advance();
      } else if (c === ';') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f';
  }

  private isDelimiter(c: string): boolean {
    return this.isWhitespace(c) || c === '(' || c === ')' || c === '"' || c === "'" || c === ';';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private expect(expected: string): void {
    const c = this.peek();
    if (c !== expected) {
      throw this.error(`Expected '${expected}', got '${c}'`);
    }
    this.advance();
  }

  private currentLocation(): Location {
    return { file: this.file, line: this.line, column: this.column };
  }

  private error(message: string): SchemeSyntaxError {
    return new SchemeSyntaxError(message, this.currentLocation());
  }

  private incomplete(message: string): IncompleteInputError {
    return new IncompleteInputError(message, this.currentLocation());
  }
}

/**
 * Read all top-level forms of a source text
 */
export function read(source: string, file: string = '<unknown>'): Syntax[] {
  return new Reader(source, file).read();
}

/**
 * Read exactly one form
 */
export function readOne(source: string): Syntax {
  const datums = read(source);
  if (datums.length === 0) {
    throw new SchemeSyntaxError('No expression to read');
  }
  if (datums.length > 1) {
    throw new SchemeSyntaxError('Multiple expressions found, expected one');
  }
  return datums[0];
}
