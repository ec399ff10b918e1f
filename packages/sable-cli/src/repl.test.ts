/**
 * REPL tests - drive the loop over in-memory streams
 */

import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { startRepl } from './repl.js';

interface Capture {
  stream: Writable;
  text: () => string;
}

function capture(): Capture {
  let text = '';
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => text };
}

async function runRepl(lines: string[]): Promise<{ output: string; errors: string }> {
  const input = new PassThrough();
  const output = capture();
  const errors = capture();

  const done = startRepl({
    input,
    output: output.stream,
    errorOutput: errors.stream,
    prompt: '',
    continuationPrompt: '',
  });

  input.end(lines.map((line) => `${line}\n`).join(''));
  await done;
  await new Promise<void>((resolve) => setImmediate(() => resolve()));

  return { output: output.text(), errors: errors.text() };
}

describe('REPL - Evaluation', () => {
  it('should print the value of each form', async () => {
    const { output } = await runRepl(['(define (square x) (* x x))', '(square 7)', '"done"']);
    expect(output).toBe('#<procedure>\n49\n"done"\n');
  });

  it('should not print void results', async () => {
    const { output } = await runRepl(['(if #f 1)', '(display "hi")']);
    expect(output).toBe('hi');
  });

  it('should print every form on one line', async () => {
    const { output } = await runRepl(['1 2 3']);
    expect(output).toBe('1\n2\n3\n');
  });

  it('should join lines until a form is complete', async () => {
    const { output } = await runRepl(['(+ 1', '2)']);
    expect(output).toBe('3\n');
  });
});

describe('REPL - Errors', () => {
  it('should report an error and keep going', async () => {
    const { output, errors } = await runRepl(["(car '())", '(+ 1 1)']);
    expect(errors).toBe('Error: TypeError: car: expected a pair\n');
    expect(output).toBe('2\n');
  });

  it('should report reader errors and discard the input', async () => {
    const { output, errors } = await runRepl([')', '5']);
    expect(errors).toBe("Error: SyntaxError: <repl>:1:1: Unexpected ')'\n");
    expect(output).toBe('5\n');
  });
});

describe('REPL - Leaving', () => {
  it('should stop at exit', async () => {
    const { output } = await runRepl(['1', '(exit)', '(display "after")']);
    expect(output).toBe('1\n');
  });

  it('should stop at :quit', async () => {
    const { output } = await runRepl([':quit', '2']);
    expect(output).toBe('');
  });
});

describe('REPL - Commands', () => {
  it('should list global definitions', async () => {
    const { output } = await runRepl(['(define b 2)', '(define a 1)', ':env']);
    expect(output).toBe('2\n1\na b\n');
  });

  it('should reject unknown commands', async () => {
    const { output } = await runRepl([':nope']);
    expect(output).toBe('Unknown command: :nope. Type :help for available commands.\n');
  });
});
