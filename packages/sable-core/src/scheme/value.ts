/**
 * Scheme value system
 *
 * Every runtime value is an instance of one SchemeObj subclass. Callers
 * narrow with the as*() methods, which return the subclass or null.
 */

import type { Environment } from './environment.js';
import type { Expr } from './expr.js';

/**
 * Base class for all Scheme values
 */
export abstract class SchemeObj {
  asNil(): NilObj | null { return null; }
  asBoolean(): BooleanObj | null { return null; }
  asInteger(): IntegerObj | null { return null; }
  asRational(): RationalObj | null { return null; }
  asString(): StringObj | null { return null; }
  asSymbol(): SymbolObj | null { return null; }
  asPair(): PairObj | null { return null; }
  asProcedure(): ProcedureObj | null { return null; }
  asVoid(): VoidObj | null { return null; }
  asTerminate(): TerminateObj | null { return null; }
  asUnassigned(): UnassignedObj | null { return null; }

  /** Everything except #f is true */
  isTrue(): boolean {
    const b = this.asBoolean();
    return !(b && !b.value);
  }

  /** Integer or rational */
  isNumber(): boolean {
    return this.asInteger() !== null || this.asRational() !== null;
  }
}

/**
 * Empty list
 */
export class NilObj extends SchemeObj {
  asNil(): NilObj { return this; }
}

/**
 * #t or #f, only ever the two singletons below
 */
export class BooleanObj extends SchemeObj {
  constructor(public readonly value: boolean) {
    super();
  }
  asBoolean(): BooleanObj { return this; }
}

/**
 * Fixed-width (32-bit signed) exact integer
 */
export class IntegerObj extends SchemeObj {
  constructor(public readonly value: number) {
    super();
  }
  asInteger(): IntegerObj { return this; }
}

/**
 * Exact rational. The numeric tower hands these out in lowest terms with a
 * positive denominator other than 1; the constructor itself only rejects a
 * zero denominator.
 */
export class RationalObj extends SchemeObj {
  constructor(
    public readonly numerator: number,
    public readonly denominator: number
  ) {
    super();
    if (denominator === 0) {
      throw new RangeError('RationalObj: zero denominator');
    }
  }
  asRational(): RationalObj { return this; }
}

export class StringObj extends SchemeObj {
  constructor(public readonly value: string) {
    super();
  }
  asString(): StringObj { return this; }
}

export class SymbolObj extends SchemeObj {
  constructor(public readonly name: string) {
    super();
  }
  asSymbol(): SymbolObj { return this; }
}

/**
 * Pair (cons cell). car and cdr are the only mutable slots in the value model.
 */
export class PairObj extends SchemeObj {
  constructor(
    public car: SchemeObj,
    public cdr: SchemeObj
  ) {
    super();
  }
  asPair(): PairObj { return this; }
}

/**
 * Closure: parameter names, body and the environment it was created in.
 *
 * The environment is shared with its creator, never copied, so later
 * set!/define through that environment are visible to the closure. When
 * `rest` is set, surplus arguments are collected into a list bound to it.
 */
export class ProcedureObj extends SchemeObj {
  constructor(
    public readonly params: readonly string[],
    public readonly rest: string | null,
    public readonly body: Expr,
    public readonly env: Environment
  ) {
    super();
  }
  asProcedure(): ProcedureObj { return this; }
}

export class VoidObj extends SchemeObj {
  asVoid(): VoidObj { return this; }
}

/**
 * Result of (exit). The host driver stops reading forms when it sees it.
 */
export class TerminateObj extends SchemeObj {
  asTerminate(): TerminateObj { return this; }
}

/**
 * Placeholder held by a binding that exists but has no value yet
 * (letrec before its initialisers ran, or a name the parser has seen but
 * not yet evaluated).
 */
export class UnassignedObj extends SchemeObj {
  asUnassigned(): UnassignedObj { return this; }
}

export const theNilObj = new NilObj();
export const theTrueObj = new BooleanObj(true);
export const theFalseObj = new BooleanObj(false);
export const theVoidObj = new VoidObj();
export const theTerminateObj = new TerminateObj();
export const theUnassignedObj = new UnassignedObj();

export function makeBoolean(value: boolean): BooleanObj {
  return value ? theTrueObj : theFalseObj;
}

export function makeString(value: string): StringObj {
  return new StringObj(value);
}

export function makeSymbol(name: string): SymbolObj {
  return new SymbolObj(name);
}

export function makePair(car: SchemeObj, cdr: SchemeObj): PairObj {
  return new PairObj(car, cdr);
}

/**
 * Right-fold values into a proper list
 */
export function makeList(elements: readonly SchemeObj[]): SchemeObj {
  let result: SchemeObj = theNilObj;
  for (let i = elements.length - 1; i >= 0; i--) {
    result = makePair(elements[i], result);
  }
  return result;
}
