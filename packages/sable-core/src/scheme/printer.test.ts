/**
 * Printer tests
 */

import { describe, it, expect } from 'vitest';
import { show, displayString } from './printer.js';
import {
  IntegerObj,
  RationalObj,
  ProcedureObj,
  makeList,
  makePair,
  makeString,
  makeSymbol,
  theFalseObj,
  theNilObj,
  theTrueObj,
  theVoidObj,
} from './value.js';
import { Environment } from './environment.js';

describe('Printer - Atoms', () => {
  it('should print numbers', () => {
    expect(show(new IntegerObj(-12))).toBe('-12');
    expect(show(new RationalObj(-3, 4))).toBe('-3/4');
  });

  it('should print booleans, symbols and the empty list', () => {
    expect(show(theTrueObj)).toBe('#t');
    expect(show(theFalseObj)).toBe('#f');
    expect(show(makeSymbol('abc'))).toBe('abc');
    expect(show(theNilObj)).toBe('()');
  });

  it('should quote and escape strings only in show', () => {
    const s = makeString('say "hi"\n');
    expect(show(s)).toBe('"say \\"hi\\"\\n"');
    expect(displayString(s)).toBe('say "hi"\n');
  });

  it('should print opaque values', () => {
    const procedure = new ProcedureObj([], null, { kind: 'integer', value: 1 }, Environment.empty());
    expect(show(procedure)).toBe('#<procedure>');
    expect(show(theVoidObj)).toBe('#<void>');
  });
});

describe('Printer - Lists', () => {
  it('should print proper lists', () => {
    const list = makeList([new IntegerObj(1), makeList([new IntegerObj(2)]), makeString('x')]);
    expect(show(list)).toBe('(1 (2) "x")');
    expect(displayString(list)).toBe('(1 (2) x)');
  });

  it('should print an improper tail after a dot', () => {
    const pair = makePair(new IntegerObj(1), makePair(new IntegerObj(2), new IntegerObj(3)));
    expect(show(pair)).toBe('(1 2 . 3)');
  });
});
