/**
 * Interpreter - read, parse and evaluate top-level forms against one
 * persistent global environment.
 */

import { type SchemeObj, theVoidObj } from './value.js';
import { Environment } from './environment.js';
import type { Syntax } from './syntax.js';
import { read } from './reader.js';
import { parse } from './parser.js';
import { type EvalContext, type OutputPort, createContext, evaluate } from './evaluator.js';

export interface InterpreterOptions {
  /** Where `display` writes (stdout by default) */
  output?: OutputPort;
  /** Log procedure applications to stderr (DEBUG_EVAL by default) */
  trace?: boolean;
  /** Start from an existing environment instead of an empty one */
  globals?: Environment;
}

export interface EvalResult {
  /** Value of the last form evaluated, void when there was none */
  value: SchemeObj;
  /** (exit) was evaluated; forms after it were skipped */
  terminated: boolean;
}

export class Interpreter {
  readonly globals: Environment;
  readonly context: EvalContext;

  constructor(options: InterpreterOptions = {}) {
    this.globals = options.globals ?? Environment.empty();
    this.context = createContext({ output: options.output, trace: options.trace });
  }

  /**
   * Evaluate one top-level form
   */
  evalSyntax(syntax: Syntax): SchemeObj {
    const expr = parse(syntax, this.globals);
    return evaluate(expr, this.globals, this.context);
  }

  /**
   * Evaluate every form of a source text in order. Stops after a form that
   * evaluates to the terminate value.
   */
  evalString(source: string, file: string = '<input>'): EvalResult {
    let value: SchemeObj = theVoidObj;

    for (const syntax of read(source, file)) {
      value = this.evalSyntax(syntax);
      if (value.asTerminate()) {
        return { value, terminated: true };
      }
    }

    return { value, terminated: false };
  }
}
