/**
 * Expression tree - the parsed, already-resolved form of a program.
 *
 * One case per evaluable construct. Nodes are built once by the parser and
 * never mutated; a closure body is re-evaluated on every call.
 */

import type { Syntax } from './syntax.js';

export type NullaryOp = 'void' | 'exit';

export type UnaryOp =
  | 'car'
  | 'cdr'
  | 'not'
  | 'display'
  | 'list?'
  | 'boolean?'
  | 'number?'
  | 'null?'
  | 'pair?'
  | 'procedure?'
  | 'symbol?'
  | 'string?';

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | 'modulo'
  | 'expt'
  | '<'
  | '<='
  | '='
  | '>='
  | '>'
  | 'cons'
  | 'set-car!'
  | 'set-cdr!'
  | 'eq?';

export type VariadicOp = '+' | '-' | '*' | '/' | '<' | '<=' | '=' | '>=' | '>' | 'list';

export type ReservedWord =
  | 'quote'
  | 'if'
  | 'cond'
  | 'and'
  | 'or'
  | 'begin'
  | 'lambda'
  | 'define'
  | 'let'
  | 'letrec'
  | 'set!';

export type Expr =
  | IntegerExpr
  | RationalExpr
  | StringExpr
  | BooleanExpr
  | NullaryExpr
  | QuoteExpr
  | VarExpr
  | UnaryExpr
  | BinaryExpr
  | VariadicExpr
  | IfExpr
  | CondExpr
  | AndExpr
  | OrExpr
  | BeginExpr
  | LambdaExpr
  | ApplyExpr
  | DefineExpr
  | LetExpr
  | LetrecExpr
  | SetExpr;

export interface IntegerExpr {
  readonly kind: 'integer';
  readonly value: number;
}

export interface RationalExpr {
  readonly kind: 'rational';
  readonly numerator: number;
  readonly denominator: number;
}

export interface StringExpr {
  readonly kind: 'string';
  readonly value: string;
}

export interface BooleanExpr {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/** (void) and (exit) */
export interface NullaryExpr {
  readonly kind: 'nullary';
  readonly op: NullaryOp;
}

export interface QuoteExpr {
  readonly kind: 'quote';
  readonly datum: Syntax;
}

export interface VarExpr {
  readonly kind: 'var';
  readonly name: string;
}

export interface UnaryExpr {
  readonly kind: 'unary';
  readonly op: UnaryOp;
  readonly operand: Expr;
}

export interface BinaryExpr {
  readonly kind: 'binary';
  readonly op: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;
}

/**
 * `spread`, when present, must evaluate to a proper list whose elements are
 * appended to the operand values. The parser never sets it; it is how a
 * variadic primitive taken as a value receives its rest argument.
 */
export interface VariadicExpr {
  readonly kind: 'variadic';
  readonly op: VariadicOp;
  readonly operands: readonly Expr[];
  readonly spread: Expr | null;
}

export interface IfExpr {
  readonly kind: 'if';
  readonly test: Expr;
  readonly consequent: Expr;
  readonly alternative: Expr | null;
}

/** A null test marks an else clause */
export interface CondClause {
  readonly test: Expr | null;
  readonly body: readonly Expr[];
}

export interface CondExpr {
  readonly kind: 'cond';
  readonly clauses: readonly CondClause[];
}

export interface AndExpr {
  readonly kind: 'and';
  readonly operands: readonly Expr[];
}

export interface OrExpr {
  readonly kind: 'or';
  readonly operands: readonly Expr[];
}

export interface BeginExpr {
  readonly kind: 'begin';
  readonly body: readonly Expr[];
}

export interface LambdaExpr {
  readonly kind: 'lambda';
  readonly params: readonly string[];
  readonly rest: string | null;
  readonly body: Expr;
}

export interface ApplyExpr {
  readonly kind: 'apply';
  readonly operator: Expr;
  readonly operands: readonly Expr[];
}

export interface DefineExpr {
  readonly kind: 'define';
  readonly name: string;
  readonly value: Expr;
}

export interface Binding {
  readonly name: string;
  readonly value: Expr;
}

export interface LetExpr {
  readonly kind: 'let';
  readonly bindings: readonly Binding[];
  readonly body: Expr;
}

export interface LetrecExpr {
  readonly kind: 'letrec';
  readonly bindings: readonly Binding[];
  readonly body: Expr;
}

export interface SetExpr {
  readonly kind: 'set';
  readonly name: string;
  readonly value: Expr;
}

/**
 * How a primitive name is parsed. `variadic` primitives with a `binary`
 * counterpart use the binary node when called with exactly two operands.
 */
export type PrimitiveDef =
  | { readonly shape: 'nullary'; readonly op: NullaryOp }
  | { readonly shape: 'unary'; readonly op: UnaryOp }
  | { readonly shape: 'binary'; readonly op: BinaryOp }
  | { readonly shape: 'variadic'; readonly op: VariadicOp; readonly binary: BinaryOp | null };

/**
 * Fewest operands each variadic primitive accepts
 */
export const VARIADIC_MIN_ARGS: Readonly<Record<VariadicOp, number>> = Object.freeze({
  '+': 0,
  '-': 1,
  '*': 0,
  '/': 1,
  '<': 1,
  '<=': 1,
  '=': 1,
  '>=': 1,
  '>': 1,
  'list': 0,
});

function variadic(op: VariadicOp, binary: BinaryOp | null): PrimitiveDef {
  return { shape: 'variadic', op, binary };
}

/**
 * Primitive operators by surface name
 */
export const PRIMITIVES: ReadonlyMap<string, PrimitiveDef> = new Map<string, PrimitiveDef>([
  ['+', variadic('+', '+')],
  ['-', variadic('-', '-')],
  ['*', variadic('*', '*')],
  ['/', variadic('/', '/')],
  ['<', variadic('<', '<')],
  ['<=', variadic('<=', '<=')],
  ['=', variadic('=', '=')],
  ['>=', variadic('>=', '>=')],
  ['>', variadic('>', '>')],
  ['list', variadic('list', null)],
  ['modulo', { shape: 'binary', op: 'modulo' }],
  ['expt', { shape: 'binary', op: 'expt' }],
  ['cons', { shape: 'binary', op: 'cons' }],
  ['set-car!', { shape: 'binary', op: 'set-car!' }],
  ['set-cdr!', { shape: 'binary', op: 'set-cdr!' }],
  ['eq?', { shape: 'binary', op: 'eq?' }],
  ['car', { shape: 'unary', op: 'car' }],
  ['cdr', { shape: 'unary', op: 'cdr' }],
  ['not', { shape: 'unary', op: 'not' }],
  ['display', { shape: 'unary', op: 'display' }],
  ['list?', { shape: 'unary', op: 'list?' }],
  ['boolean?', { shape: 'unary', op: 'boolean?' }],
  ['number?', { shape: 'unary', op: 'number?' }],
  ['null?', { shape: 'unary', op: 'null?' }],
  ['pair?', { shape: 'unary', op: 'pair?' }],
  ['procedure?', { shape: 'unary', op: 'procedure?' }],
  ['symbol?', { shape: 'unary', op: 'symbol?' }],
  ['string?', { shape: 'unary', op: 'string?' }],
  ['void', { shape: 'nullary', op: 'void' }],
  ['exit', { shape: 'nullary', op: 'exit' }],
]);

const RESERVED_WORD_LIST: readonly ReservedWord[] = [
  'quote',
  'if',
  'cond',
  'and',
  'or',
  'begin',
  'lambda',
  'define',
  'let',
  'letrec',
  'set!',
];

/**
 * Special-form keywords by surface name
 */
export const RESERVED_WORDS: ReadonlyMap<string, ReservedWord> = new Map(
  RESERVED_WORD_LIST.map((word): [string, ReservedWord] => [word, word])
);

/**
 * Body of the closure that stands for a primitive used as a value, e.g.
 * `+` in `(f + 1 2)`. Built once per primitive.
 */
export interface PrimitiveProcedureTemplate {
  readonly params: readonly string[];
  readonly rest: string | null;
  readonly body: Expr;
}

function templateFor(primitive: PrimitiveDef): PrimitiveProcedureTemplate {
  const x: VarExpr = { kind: 'var', name: 'x' };
  const y: VarExpr = { kind: 'var', name: 'y' };
  switch (primitive.shape) {
    case 'nullary':
      return { params: [], rest: null, body: { kind: 'nullary', op: primitive.op } };
    case 'unary':
      return { params: ['x'], rest: null, body: { kind: 'unary', op: primitive.op, operand: x } };
    case 'binary':
      return { params: ['x', 'y'], rest: null, body: { kind: 'binary', op: primitive.op, left: x, right: y } };
    case 'variadic':
      return {
        params: [],
        rest: 'args',
        body: { kind: 'variadic', op: primitive.op, operands: [], spread: { kind: 'var', name: 'args' } },
      };
  }
}

export const PRIMITIVE_PROCEDURES: ReadonlyMap<string, PrimitiveProcedureTemplate> = new Map(
  Array.from(PRIMITIVES, ([name, primitive]): [string, PrimitiveProcedureTemplate] => [name, templateFor(primitive)])
);
