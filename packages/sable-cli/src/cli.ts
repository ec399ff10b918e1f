#!/usr/bin/env tsx
/**
 * Sable CLI - run Scheme files, evaluate expressions, or start the REPL
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { Interpreter, show } from 'sable-core';
import { startRepl } from './repl.js';

interface CliOptions {
  eval?: string;
  interactive?: boolean;
  trace?: boolean;
}

const program = new Command();

program
  .name('sable')
  .description('A small Scheme interpreter with exact integer and rational arithmetic')
  .version('0.1.0')
  .option('-e, --eval <code>', 'Evaluate an expression and print its value')
  .option('-i, --interactive', 'Start the REPL after running the file or expression')
  .option('--trace', 'Log every procedure application to stderr')
  .argument('[file]', 'Scheme source file')
  .action(async (file: string | undefined, options: CliOptions) => {
    const interpreter = new Interpreter({ trace: options.trace });

    try {
      if (file !== undefined) {
        const filePath = path.resolve(file);
        if (!fs.existsSync(filePath)) {
          console.error(`Error: File not found: ${file}`);
          process.exit(1);
        }
        const source = fs.readFileSync(filePath, 'utf-8');
        if (interpreter.evalString(source, file).terminated) {
          return;
        }
      }

      if (options.eval !== undefined) {
        const result = interpreter.evalString(options.eval, '<eval>');
        if (!result.value.asVoid() && !result.terminated) {
          console.log(show(result.value));
        }
        if (result.terminated) {
          return;
        }
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
      }
      process.exit(1);
    }

    if (options.interactive || (file === undefined && options.eval === undefined)) {
      await startRepl({ interpreter });
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
