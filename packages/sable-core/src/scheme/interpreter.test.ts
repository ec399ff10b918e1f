/**
 * Interpreter tests - sessions over several forms and inputs
 */

import { describe, it, expect } from 'vitest';
import { Interpreter } from './interpreter.js';
import { Environment } from './environment.js';
import { readOne } from './reader.js';
import { show } from './printer.js';
import { IntegerObj } from './value.js';
import { ArityError, SchemeSyntaxError } from './errors.js';

function session(): { interpreter: Interpreter; output: () => string } {
  let text = '';
  const interpreter = new Interpreter({
    output: {
      write(chunk: string): void {
        text += chunk;
      },
    },
    trace: false,
  });
  return { interpreter, output: () => text };
}

describe('Interpreter - Sessions', () => {
  it('should keep definitions between inputs', () => {
    const { interpreter } = session();
    interpreter.evalString('(define (square x) (* x x))');
    const result = interpreter.evalString('(square 12)');
    expect(show(result.value)).toBe('144');
    expect(result.terminated).toBe(false);
  });

  it('should return void for empty input', () => {
    const { interpreter } = session();
    expect(interpreter.evalString('  ; nothing\n').value.asVoid()).not.toBeNull();
  });

  it('should evaluate a single syntax tree', () => {
    const { interpreter } = session();
    expect(show(interpreter.evalSyntax(readOne("(list 1 'a)")))).toBe('(1 a)');
  });

  it('should start from a supplied environment', () => {
    const globals = Environment.empty();
    globals.define('answer', new IntegerObj(42));
    const interpreter = new Interpreter({ globals, output: { write: () => {} }, trace: false });
    expect(show(interpreter.evalString('(+ answer 1)').value)).toBe('43');
  });

  it('should see a procedure defined after the closure that calls it', () => {
    const { interpreter } = session();
    const result = interpreter.evalString('(define (f) (g)) (define (g) 7) (f)');
    expect(show(result.value)).toBe('7');
  });
});

describe('Interpreter - Output', () => {
  it('should write display output without quoting strings', () => {
    const { interpreter, output } = session();
    const result = interpreter.evalString('(display "hello") (display \'(1 "a" #t))');
    expect(output()).toBe('hello(1 a #t)');
    expect(result.value.asVoid()).not.toBeNull();
  });
});

describe('Interpreter - exit', () => {
  it('should stop at exit and skip the remaining forms', () => {
    const { interpreter, output } = session();
    const result = interpreter.evalString('(display 1) (exit) (display 2)');
    expect(result.terminated).toBe(true);
    expect(show(result.value)).toBe('#<terminate>');
    expect(output()).toBe('1');
  });
});

describe('Interpreter - Errors', () => {
  it('should report reader errors with the file name', () => {
    const { interpreter } = session();
    expect(() => interpreter.evalString('(+ 1 2', 'prog.scm')).toThrow(
      'SyntaxError: prog.scm:1:7: Unterminated list starting at 1:1'
    );
  });

  it('should raise parse errors before the form runs', () => {
    const { interpreter, output } = session();
    expect(() => interpreter.evalString('(begin (display "x") (car 1 2))')).toThrow(ArityError);
    expect(output()).toBe('');
  });

  it('should keep earlier definitions after a failing form', () => {
    const { interpreter } = session();
    interpreter.evalString('(define x 5)');
    expect(() => interpreter.evalString('(if)')).toThrow(SchemeSyntaxError);
    expect(show(interpreter.evalString('x').value)).toBe('5');
  });
});
