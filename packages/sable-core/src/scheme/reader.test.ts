/**
 * Reader tests - source text to syntax trees
 */

import { describe, it, expect } from 'vitest';
import { read, readOne } from './reader.js';
import { syntaxToString } from './syntax.js';
import { IncompleteInputError, SchemeSyntaxError } from './errors.js';

describe('Reader - Atoms', () => {
  it('should read integers', () => {
    expect(readOne('42')).toEqual({ type: 'number', value: 42 });
    expect(readOne('-17')).toEqual({ type: 'number', value: -17 });
    expect(readOne('+5')).toEqual({ type: 'number', value: 5 });
  });

  it('should read rationals as written', () => {
    expect(readOne('6/4')).toEqual({ type: 'rational', numerator: 6, denominator: 4 });
    expect(readOne('-1/3')).toEqual({ type: 'rational', numerator: -1, denominator: 3 });
  });

  it('should read booleans', () => {
    expect(readOne('#t')).toEqual({ type: 'boolean', value: true });
    expect(readOne('#f')).toEqual({ type: 'boolean', value: false });
  });

  it('should read symbols, including operator names', () => {
    expect(readOne('foo')).toEqual({ type: 'symbol', name: 'foo' });
    expect(readOne('set-car!')).toEqual({ type: 'symbol', name: 'set-car!' });
    expect(readOne('<=')).toEqual({ type: 'symbol', name: '<=' });
    expect(readOne('-')).toEqual({ type: 'symbol', name: '-' });
  });

  it('should read strings with escapes', () => {
    expect(readOne('"hello"')).toEqual({ type: 'string', value: 'hello' });
    expect(readOne('"a\\nb\\t\\"c\\"\\\\"')).toEqual({ type: 'string', value: 'a\nb\t"c"\\' });
  });
});

describe('Reader - Lists', () => {
  it('should read nested lists', () => {
    expect(syntaxToString(readOne('(a (b 1) ())'))).toBe('(a (b 1) ())');
  });

  it('should expand the quote abbreviation', () => {
    expect(syntaxToString(readOne("'(1 2)"))).toBe('(quote (1 2))');
    expect(syntaxToString(readOne("'x"))).toBe('(quote x)');
  });

  it('should skip comments and whitespace', () => {
    const forms = read('; leading comment\n(a b) ; trailing\n\n  c');
    expect(forms.map(syntaxToString)).toEqual(['(a b)', 'c']);
  });

  it('should read every top-level form in order', () => {
    expect(read('1 2 (3)').map(syntaxToString)).toEqual(['1', '2', '(3)']);
    expect(read('   ')).toEqual([]);
  });
});

describe('Reader - Errors', () => {
  it('should report an unterminated list as incomplete input', () => {
    expect(() => read('(a (b')).toThrow(IncompleteInputError);
    expect(() => read('(a', 'test.scm')).toThrow('SyntaxError: test.scm:1:3: Unterminated list starting at 1:1');
  });

  it('should report an unterminated string as incomplete input', () => {
    expect(() => read('"abc')).toThrow(IncompleteInputError);
  });

  it('should report a quote at end of input as incomplete input', () => {
    expect(() => read("'")).toThrow(IncompleteInputError);
  });

  it('should reject an unexpected close paren with its location', () => {
    expect(() => read('(a))', 'f.scm')).toThrow("SyntaxError: f.scm:1:4: Unexpected ')'");
  });

  it('should reject integer literals outside the 32-bit range', () => {
    expect(() => readOne('2147483648')).toThrow('Integer literal out of range: 2147483648');
    expect(readOne('-2147483648')).toEqual({ type: 'number', value: -2147483648 });
  });

  it('should reject a zero denominator', () => {
    expect(() => readOne('1/0')).toThrow('Zero denominator in 1/0');
  });

  it('should reject malformed identifiers and hash forms', () => {
    expect(() => readOne('1abc')).toThrow('Invalid identifier: 1abc');
    expect(() => readOne('#x')).toThrow('Invalid hash expression: #x');
    expect(() => readOne('a#b')).toThrow("Invalid character '#' in identifier: a#b");
  });

  it('should reject quasiquote', () => {
    expect(() => readOne('`(a)')).toThrow(SchemeSyntaxError);
  });

  it('should require exactly one form from readOne', () => {
    expect(() => readOne('')).toThrow('No expression to read');
    expect(() => readOne('1 2')).toThrow('Multiple expressions found, expected one');
  });
});
