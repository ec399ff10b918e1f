/**
 * Sable REPL - interactive read-eval-print loop.
 *
 * - Definitions persist between inputs
 * - Multi-line input: a line that leaves a list or string open is joined
 *   with the next one before anything is evaluated
 * - Commands: :help, :env, :quit
 * - Errors are reported and the loop continues; (exit) ends it
 */

import * as readline from 'readline';
import {
  Interpreter,
  IncompleteInputError,
  read,
  show,
  type SchemeObj,
  type Syntax,
} from 'sable-core';

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  /** Defaults to one whose `display` writes to `output` */
  interpreter?: Interpreter;
  prompt?: string;
  continuationPrompt?: string;
}

const HELP = [
  'Commands:',
  '  :help, :h     Show this help message',
  '  :env          List global definitions',
  '  :quit, :q     Leave the REPL (same as (exit))',
  '',
].join('\n');

/**
 * Run the loop until the input ends, :quit, or (exit).
 * Resolves once the readline interface has closed.
 */
export function startRepl(options: ReplOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const prompt = options.prompt ?? 'sable> ';
  const continuationPrompt = options.continuationPrompt ?? '  ... ';
  const interpreter =
    options.interpreter ??
    new Interpreter({
      output: {
        write(text: string): void {
          output.write(text);
        },
      },
    });

  const rl = readline.createInterface({ input, output, prompt, terminal: false });

  let buffer = '';
  // Lines already read from the same chunk may still arrive after close()
  let finished = false;

  const finish = (): void => {
    finished = true;
    rl.close();
  };

  return new Promise((resolve) => {
    rl.on('close', () => resolve());

    rl.on('line', (line: string) => {
      if (finished) return;
      const trimmed = line.trim();

      if (buffer === '' && trimmed.startsWith(':')) {
        if (handleCommand(trimmed, interpreter, output)) {
          rl.prompt();
        } else {
          finish();
        }
        return;
      }

      buffer += (buffer ? '\n' : '') + line;

      let forms: Syntax[];
      try {
        forms = read(buffer, '<repl>');
      } catch (error) {
        if (error instanceof IncompleteInputError) {
          output.write(continuationPrompt);
          return;
        }
        buffer = '';
        reportError(error, errorOutput);
        rl.prompt();
        return;
      }
      buffer = '';

      for (const form of forms) {
        let value: SchemeObj;
        try {
          value = interpreter.evalSyntax(form);
        } catch (error) {
          reportError(error, errorOutput);
          break;
        }
        if (value.asTerminate()) {
          finish();
          return;
        }
        if (!value.asVoid()) {
          output.write(`${show(value)}\n`);
        }
      }

      rl.prompt();
    });

    rl.prompt();
  });
}

/**
 * Returns false when the REPL should stop
 */
function handleCommand(command: string, interpreter: Interpreter, output: NodeJS.WritableStream): boolean {
  switch (command) {
    case ':help':
    case ':h':
      output.write(HELP);
      return true;

    case ':env': {
      const names = interpreter.globals.getBindingNames().sort();
      output.write(names.length > 0 ? `${names.join(' ')}\n` : '(no definitions)\n');
      return true;
    }

    case ':quit':
    case ':q':
      return false;

    default:
      output.write(`Unknown command: ${command}. Type :help for available commands.\n`);
      return true;
  }
}

function reportError(error: unknown, errorOutput: NodeJS.WritableStream): void {
  errorOutput.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  if (process.env.DEBUG && error instanceof Error && error.stack) {
    errorOutput.write(`${error.stack}\n`);
  }
}
