/**
 * Numeric tower: 32-bit exact integers and exact rationals.
 *
 * Operands are promoted to fractions (an integer n is n/1), combined with
 * exact bigint arithmetic, and the result is normalised: lowest terms,
 * sign on the numerator, denominator 1 collapsed to an integer. A result
 * that does not fit the 32-bit range raises ArithmeticError.
 */

import { type SchemeObj, IntegerObj, RationalObj } from './value.js';
import { ArithmeticError, SchemeTypeError } from './errors.js';

export type NumberObj = IntegerObj | RationalObj;

export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;

const BIG_INT_MIN = BigInt(INT_MIN);
const BIG_INT_MAX = BigInt(INT_MAX);

interface Fraction {
  num: bigint;
  den: bigint;
}

/**
 * Narrow a value to a number or raise a type error naming the operation
 */
export function expectNumber(value: SchemeObj, op: string): NumberObj {
  const i = value.asInteger();
  if (i) return i;
  const r = value.asRational();
  if (r) return r;
  throw new SchemeTypeError(`${op}: expected a number`);
}

export function expectInteger(value: SchemeObj, op: string): IntegerObj {
  const i = value.asInteger();
  if (!i) {
    throw new SchemeTypeError(`${op}: expected an integer`);
  }
  return i;
}

export function makeInteger(value: number): IntegerObj {
  if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
    throw new ArithmeticError(`integer out of range: ${value}`);
  }
  return new IntegerObj(value);
}

/**
 * Exact rational in normal form. A zero denominator is a division by zero.
 */
export function makeRational(numerator: number | bigint, denominator: number | bigint, op: string = '/'): NumberObj {
  return normalize(BigInt(numerator), BigInt(denominator), op);
}

function fractionOf(n: NumberObj): Fraction {
  if (n instanceof IntegerObj) {
    return { num: BigInt(n.value), den: 1n };
  }
  return { num: BigInt(n.numerator), den: BigInt(n.denominator) };
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

function checkRange(value: bigint, op: string): number {
  if (value < BIG_INT_MIN || value > BIG_INT_MAX) {
    throw new ArithmeticError(`integer overflow in ${op}`);
  }
  return Number(value);
}

function normalize(num: bigint, den: bigint, op: string): NumberObj {
  if (den === 0n) {
    throw new ArithmeticError(`${op}: division by zero`);
  }
  if (den < 0n) {
    num = -num;
    den = -den;
  }
  const g = gcd(num, den);
  if (g > 1n) {
    num /= g;
    den /= g;
  }
  if (den === 1n) {
    return new IntegerObj(checkRange(num, op));
  }
  return new RationalObj(checkRange(num, op), checkRange(den, op));
}

function isZero(n: NumberObj): boolean {
  return n instanceof IntegerObj ? n.value === 0 : n.numerator === 0;
}

export function add(a: SchemeObj, b: SchemeObj): NumberObj {
  const x = fractionOf(expectNumber(a, '+'));
  const y = fractionOf(expectNumber(b, '+'));
  return normalize(x.num * y.den + y.num * x.den, x.den * y.den, '+');
}

export function subtract(a: SchemeObj, b: SchemeObj): NumberObj {
  const x = fractionOf(expectNumber(a, '-'));
  const y = fractionOf(expectNumber(b, '-'));
  return normalize(x.num * y.den - y.num * x.den, x.den * y.den, '-');
}

export function multiply(a: SchemeObj, b: SchemeObj): NumberObj {
  const x = fractionOf(expectNumber(a, '*'));
  const y = fractionOf(expectNumber(b, '*'));
  return normalize(x.num * y.num, x.den * y.den, '*');
}

export function divide(a: SchemeObj, b: SchemeObj): NumberObj {
  const dividend = expectNumber(a, '/');
  const divisor = expectNumber(b, '/');
  if (isZero(divisor)) {
    throw new ArithmeticError('/: division by zero');
  }
  const x = fractionOf(dividend);
  const y = fractionOf(divisor);
  return normalize(x.num * y.den, x.den * y.num, '/');
}

/**
 * Floored modulo: the result takes the sign of the divisor
 */
export function modulo(a: SchemeObj, b: SchemeObj): IntegerObj {
  const dividend = expectInteger(a, 'modulo').value;
  const divisor = expectInteger(b, 'modulo').value;
  if (divisor === 0) {
    throw new ArithmeticError('modulo: division by zero');
  }
  let r = dividend % divisor;
  if (r !== 0 && (r < 0) !== (divisor < 0)) {
    r += divisor;
  }
  return new IntegerObj(r + 0);
}

/**
 * Integer power by repeated squaring, checking every multiplication
 */
export function expt(a: SchemeObj, b: SchemeObj): IntegerObj {
  const base = expectInteger(a, 'expt').value;
  let exponent = expectInteger(b, 'expt').value;

  if (exponent < 0) {
    throw new ArithmeticError('expt: negative exponent');
  }
  if (base === 0 && exponent === 0) {
    throw new ArithmeticError('expt: 0^0 is undefined');
  }

  let result = 1n;
  let square = BigInt(base);
  while (exponent > 0) {
    if (exponent % 2 === 1) {
      result *= square;
      checkRange(result, 'expt');
    }
    if (exponent > 1) {
      square *= square;
      checkRange(square, 'expt');
    }
    exponent = Math.floor(exponent / 2);
  }

  return new IntegerObj(Number(result));
}

/**
 * Three-way comparison by cross-multiplication
 */
export function compare(a: SchemeObj, b: SchemeObj, op: string = 'compare'): -1 | 0 | 1 {
  const x = fractionOf(expectNumber(a, op));
  const y = fractionOf(expectNumber(b, op));
  const left = x.num * y.den;
  const right = y.num * x.den;
  return left < right ? -1 : left > right ? 1 : 0;
}

export function negate(a: SchemeObj): NumberObj {
  return subtract(new IntegerObj(0), a);
}

export function reciprocal(a: SchemeObj): NumberObj {
  return divide(new IntegerObj(1), a);
}
