/**
 * Parser tests - name resolution, special forms and parse-time checks
 */

import { describe, it, expect } from 'vitest';
import { readOne } from './reader.js';
import { parse } from './parser.js';
import { Environment } from './environment.js';
import { IntegerObj } from './value.js';
import type { Expr } from './expr.js';
import { ArityError, SchemeSyntaxError } from './errors.js';

function parseString(source: string, env: Environment = Environment.empty()): Expr {
  return parse(readOne(source), env);
}

describe('Parser - Literals and variables', () => {
  it('should parse literals', () => {
    expect(parseString('42')).toEqual({ kind: 'integer', value: 42 });
    expect(parseString('1/2')).toEqual({ kind: 'rational', numerator: 1, denominator: 2 });
    expect(parseString('"s"')).toEqual({ kind: 'string', value: 's' });
    expect(parseString('#f')).toEqual({ kind: 'boolean', value: false });
  });

  it('should parse a symbol as a variable reference', () => {
    expect(parseString('x')).toEqual({ kind: 'var', name: 'x' });
  });

  it('should parse the empty list as a quotation', () => {
    expect(parseString('()')).toEqual({ kind: 'quote', datum: { type: 'list', elements: [] } });
  });
});

describe('Parser - Primitives', () => {
  it('should parse unary and binary primitives to dedicated nodes', () => {
    expect(parseString('(car x)')).toEqual({ kind: 'unary', op: 'car', operand: { kind: 'var', name: 'x' } });
    expect(parseString('(cons 1 2)')).toEqual({
      kind: 'binary',
      op: 'cons',
      left: { kind: 'integer', value: 1 },
      right: { kind: 'integer', value: 2 },
    });
  });

  it('should use the binary node for a variadic primitive with two operands', () => {
    expect(parseString('(+ 1 2)').kind).toBe('binary');
    expect(parseString('(+ 1 2 3)')).toEqual({
      kind: 'variadic',
      op: '+',
      operands: [
        { kind: 'integer', value: 1 },
        { kind: 'integer', value: 2 },
        { kind: 'integer', value: 3 },
      ],
      spread: null,
    });
    expect(parseString('(list 1 2)').kind).toBe('variadic');
  });

  it('should parse nullary primitives', () => {
    expect(parseString('(exit)')).toEqual({ kind: 'nullary', op: 'exit' });
  });

  it('should check primitive arity', () => {
    expect(() => parseString('(car 1 2)')).toThrow(ArityError);
    expect(() => parseString('(car 1 2)')).toThrow('ArityError: wrong number of arguments for car: expected 1, got 2');
    expect(() => parseString('(cons 1)')).toThrow('expected 2, got 1');
    expect(() => parseString('(void 1)')).toThrow('expected 0, got 1');
    expect(() => parseString('(-)')).toThrow('expected at least 1, got 0');
    expect(() => parseString('(<)')).toThrow(ArityError);
  });

  it('should let a bound variable shadow a primitive', () => {
    const env = Environment.empty().extend('car', new IntegerObj(0));
    expect(parseString('(car x)', env)).toEqual({
      kind: 'apply',
      operator: { kind: 'var', name: 'car' },
      operands: [{ kind: 'var', name: 'x' }],
    });
  });

  it('should let a lambda parameter shadow a primitive in the body', () => {
    const expr = parseString('(lambda (list) (list 1 2 3))');
    expect(expr.kind).toBe('lambda');
    if (expr.kind === 'lambda') {
      expect(expr.body.kind).toBe('apply');
    }
  });
});

describe('Parser - Special forms', () => {
  it('should parse quote', () => {
    expect(parseString("'a")).toEqual({ kind: 'quote', datum: { type: 'symbol', name: 'a' } });
    expect(() => parseString('(quote a b)')).toThrow('quote requires exactly 1 argument');
  });

  it('should parse one- and two-armed if', () => {
    const expr = parseString('(if #t 1)');
    expect(expr).toEqual({
      kind: 'if',
      test: { kind: 'boolean', value: true },
      consequent: { kind: 'integer', value: 1 },
      alternative: null,
    });
    expect(() => parseString('(if #t)')).toThrow(SchemeSyntaxError);
  });

  it('should parse lambda with fixed and rest parameters', () => {
    const fixed = parseString('(lambda (a b) a)');
    expect(fixed).toEqual({ kind: 'lambda', params: ['a', 'b'], rest: null, body: { kind: 'var', name: 'a' } });

    const rest = parseString('(lambda args args)');
    expect(rest).toEqual({ kind: 'lambda', params: [], rest: 'args', body: { kind: 'var', name: 'args' } });
  });

  it('should wrap a multi-expression body in begin', () => {
    const expr = parseString('(lambda () 1 2)');
    expect(expr.kind === 'lambda' && expr.body.kind).toBe('begin');
  });

  it('should reject duplicate parameters and bindings', () => {
    expect(() => parseString('(lambda (a a) a)')).toThrow("lambda: duplicate name 'a'");
    expect(() => parseString('(let ((x 1) (x 2)) x)')).toThrow("let: duplicate name 'x'");
  });

  it('should parse the procedure form of define', () => {
    expect(parseString('(define (id x) x)')).toEqual({
      kind: 'define',
      name: 'id',
      value: { kind: 'lambda', params: ['x'], rest: null, body: { kind: 'var', name: 'x' } },
    });
  });

  it('should reject malformed define and set!', () => {
    expect(() => parseString('(define x)')).toThrow(SchemeSyntaxError);
    expect(() => parseString('(define 1 2)')).toThrow('define: name must be a symbol: 1');
    expect(() => parseString('(set! 1 2)')).toThrow('set! target must be a symbol');
  });

  it('should treat else as the catch-all cond clause', () => {
    const expr = parseString('(cond (#f 1) (else 2))');
    expect(expr).toEqual({
      kind: 'cond',
      clauses: [
        { test: { kind: 'boolean', value: false }, body: [{ kind: 'integer', value: 1 }] },
        { test: null, body: [{ kind: 'integer', value: 2 }] },
      ],
    });
  });

  it('should treat a bound else as an ordinary variable', () => {
    const env = Environment.empty().extend('else', new IntegerObj(1));
    const expr = parseString('(cond (else 2))', env);
    expect(expr.kind === 'cond' && expr.clauses[0].test).toEqual({ kind: 'var', name: 'else' });
  });

  it('should require else to be the last clause', () => {
    expect(() => parseString('(cond (else 1) (#t 2))')).toThrow('cond: else clause must be last');
  });

  it('should parse let and letrec bindings', () => {
    expect(parseString('(let ((x 1)) x)')).toEqual({
      kind: 'let',
      bindings: [{ name: 'x', value: { kind: 'integer', value: 1 } }],
      body: { kind: 'var', name: 'x' },
    });
    expect(parseString('(letrec ((f f)) f)').kind).toBe('letrec');
    expect(() => parseString('(let (x) x)')).toThrow('let binding must be (name expr): x');
  });

  it('should parse and, or and begin with any number of operands', () => {
    expect(parseString('(and)')).toEqual({ kind: 'and', operands: [] });
    expect(parseString('(or 1)')).toEqual({ kind: 'or', operands: [{ kind: 'integer', value: 1 }] });
    expect(parseString('(begin)')).toEqual({ kind: 'begin', body: [] });
  });

  it('should apply an unknown head symbol as a variable', () => {
    expect(parseString('(f 1)')).toEqual({
      kind: 'apply',
      operator: { kind: 'var', name: 'f' },
      operands: [{ kind: 'integer', value: 1 }],
    });
  });

  it('should apply a non-symbol head', () => {
    expect(parseString('((lambda (x) x) 1)').kind).toBe('apply');
  });
});
