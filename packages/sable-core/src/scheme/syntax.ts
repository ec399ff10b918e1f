/**
 * Syntax tree produced by the reader and consumed by the parser.
 *
 * Lists carry their children in order; they serve both as s-expressions and
 * as the argument lists of special forms.
 */

export type Syntax =
  | NumberSyntax
  | RationalSyntax
  | SymbolSyntax
  | StringSyntax
  | BooleanSyntax
  | ListSyntax;

export interface NumberSyntax {
  readonly type: 'number';
  readonly value: number;
}

export interface RationalSyntax {
  readonly type: 'rational';
  readonly numerator: number;
  readonly denominator: number;
}

export interface SymbolSyntax {
  readonly type: 'symbol';
  readonly name: string;
}

export interface StringSyntax {
  readonly type: 'string';
  readonly value: string;
}

export interface BooleanSyntax {
  readonly type: 'boolean';
  readonly value: boolean;
}

export interface ListSyntax {
  readonly type: 'list';
  readonly elements: readonly Syntax[];
}

export function numberSyntax(value: number): NumberSyntax {
  return { type: 'number', value };
}

export function rationalSyntax(numerator: number, denominator: number): RationalSyntax {
  return { type: 'rational', numerator, denominator };
}

export function symbolSyntax(name: string): SymbolSyntax {
  return { type: 'symbol', name };
}

export function stringSyntax(value: string): StringSyntax {
  return { type: 'string', value };
}

export function booleanSyntax(value: boolean): BooleanSyntax {
  return { type: 'boolean', value };
}

export function listSyntax(elements: readonly Syntax[]): ListSyntax {
  return { type: 'list', elements };
}

/**
 * Source-like rendering, used in error messages
 */
export function syntaxToString(syntax: Syntax): string {
  switch (syntax.type) {
    case 'number':
      return String(syntax.value);
    case 'rational':
      return `${syntax.numerator}/${syntax.denominator}`;
    case 'symbol':
      return syntax.name;
    case 'string':
      return JSON.stringify(syntax.value);
    case 'boolean':
      return syntax.value ? '#t' : '#f';
    case 'list':
      return `(${syntax.elements.map(syntaxToString).join(' ')})`;
  }
}
