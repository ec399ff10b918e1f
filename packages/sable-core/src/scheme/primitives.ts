/**
 * Scheme primitives - the operations behind unary, binary and variadic
 * expression nodes. Operands arrive already evaluated, left to right.
 */

import {
  type SchemeObj,
  type PairObj,
  makeBoolean,
  makePair,
  makeList,
  theVoidObj,
  theTrueObj,
  theFalseObj,
} from './value.js';
import { type UnaryOp, type BinaryOp, type VariadicOp, VARIADIC_MIN_ARGS } from './expr.js';
import {
  type NumberObj,
  add,
  subtract,
  multiply,
  divide,
  modulo,
  expt,
  compare,
  negate,
  reciprocal,
  makeInteger,
  expectNumber,
} from './numeric.js';
import { displayString } from './printer.js';
import { ArityError, SchemeTypeError } from './errors.js';
import type { EvalContext } from './evaluator.js';

function expectPair(value: SchemeObj, op: string): PairObj {
  const pair = value.asPair();
  if (!pair) {
    throw new SchemeTypeError(`${op}: expected a pair`);
  }
  return pair;
}

/**
 * Proper list check. Follows cdrs until a non-pair, so a circular list
 * never returns.
 */
export function isList(value: SchemeObj): boolean {
  let cur = value;
  for (let pair = cur.asPair(); pair; pair = cur.asPair()) {
    cur = pair.cdr;
  }
  return cur.asNil() !== null;
}

/**
 * eq?: integers, booleans and symbols by content, the empty list and void
 * equal to themselves, everything else by identity
 */
export function isEq(a: SchemeObj, b: SchemeObj): boolean {
  const ia = a.asInteger();
  const ib = b.asInteger();
  if (ia && ib) return ia.value === ib.value;

  const ba = a.asBoolean();
  const bb = b.asBoolean();
  if (ba && bb) return ba.value === bb.value;

  const sa = a.asSymbol();
  const sb = b.asSymbol();
  if (sa && sb) return sa.name === sb.name;

  if (a.asNil() && b.asNil()) return true;
  if (a.asVoid() && b.asVoid()) return true;

  return a === b;
}

export function applyUnary(op: UnaryOp, value: SchemeObj, context: EvalContext): SchemeObj {
  switch (op) {
    case 'car':
      return expectPair(value, 'car').car;
    case 'cdr':
      return expectPair(value, 'cdr').cdr;
    case 'not':
      return makeBoolean(!value.isTrue());
    case 'display':
      context.output.write(displayString(value));
      return theVoidObj;
    case 'list?':
      return makeBoolean(isList(value));
    case 'boolean?':
      return makeBoolean(value.asBoolean() !== null);
    case 'number?':
      return makeBoolean(value.isNumber());
    case 'null?':
      return makeBoolean(value.asNil() !== null);
    case 'pair?':
      return makeBoolean(value.asPair() !== null);
    case 'procedure?':
      return makeBoolean(value.asProcedure() !== null);
    case 'symbol?':
      return makeBoolean(value.asSymbol() !== null);
    case 'string?':
      return makeBoolean(value.asString() !== null);
  }
}

export function applyBinary(op: BinaryOp, a: SchemeObj, b: SchemeObj): SchemeObj {
  switch (op) {
    case '+':
      return add(a, b);
    case '-':
      return subtract(a, b);
    case '*':
      return multiply(a, b);
    case '/':
      return divide(a, b);
    case 'modulo':
      return modulo(a, b);
    case 'expt':
      return expt(a, b);
    case '<':
      return makeBoolean(compare(a, b, op) < 0);
    case '<=':
      return makeBoolean(compare(a, b, op) <= 0);
    case '=':
      return makeBoolean(compare(a, b, op) === 0);
    case '>=':
      return makeBoolean(compare(a, b, op) >= 0);
    case '>':
      return makeBoolean(compare(a, b, op) > 0);
    case 'cons':
      return makePair(a, b);
    case 'set-car!':
      expectPair(a, 'set-car!').car = b;
      return theVoidObj;
    case 'set-cdr!':
      expectPair(a, 'set-cdr!').cdr = b;
      return theVoidObj;
    case 'eq?':
      return makeBoolean(isEq(a, b));
  }
}

type Ordering = (c: -1 | 0 | 1) => boolean;

const ORDERINGS: Readonly<Record<'<' | '<=' | '=' | '>=' | '>', Ordering>> = {
  '<': (c) => c < 0,
  '<=': (c) => c <= 0,
  '=': (c) => c === 0,
  '>=': (c) => c >= 0,
  '>': (c) => c > 0,
};

/**
 * Every operand must be a number; then each adjacent pair must satisfy the
 * ordering, stopping at the first pair that does not
 */
function compareChain(op: '<' | '<=' | '=' | '>=' | '>', args: readonly SchemeObj[]): SchemeObj {
  const numbers = args.map((arg) => expectNumber(arg, op));
  const holds = ORDERINGS[op];
  for (let i = 0; i + 1 < numbers.length; i++) {
    if (!holds(compare(numbers[i], numbers[i + 1], op))) {
      return theFalseObj;
    }
  }
  return theTrueObj;
}

function fold(args: readonly SchemeObj[], combine: (a: SchemeObj, b: SchemeObj) => NumberObj): SchemeObj {
  let acc: SchemeObj = args[0];
  for (let i = 1; i < args.length; i++) {
    acc = combine(acc, args[i]);
  }
  return acc;
}

export function applyVariadic(op: VariadicOp, args: readonly SchemeObj[]): SchemeObj {
  const minArgs = VARIADIC_MIN_ARGS[op];
  if (args.length < minArgs) {
    throw new ArityError(`${op}: expected at least ${minArgs} argument${minArgs === 1 ? '' : 's'}, got ${args.length}`);
  }

  switch (op) {
    case '+':
      return args.reduce<SchemeObj>((acc, arg) => add(acc, arg), makeInteger(0));
    case '*':
      return args.reduce<SchemeObj>((acc, arg) => multiply(acc, arg), makeInteger(1));
    case '-':
      return args.length === 1 ? negate(args[0]) : fold(args, subtract);
    case '/':
      return args.length === 1 ? reciprocal(args[0]) : fold(args, divide);
    case '<':
    case '<=':
    case '=':
    case '>=':
    case '>':
      return compareChain(op, args);
    case 'list':
      return makeList(args);
  }
}
