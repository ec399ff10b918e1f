/**
 * Tree-walking evaluator
 *
 * evaluate() matches on the expression kind and recurses. There are no
 * suspension points and no tail calls: every procedure call is a nested
 * JavaScript call, so program recursion depth is bounded by the host stack.
 */

import {
  type SchemeObj,
  ProcedureObj,
  makeBoolean,
  makeString,
  makeSymbol,
  makePair,
  makeList,
  theNilObj,
  theVoidObj,
  theTerminateObj,
  theUnassignedObj,
} from './value.js';
import type { Environment } from './environment.js';
import { type Expr, type CondClause, type Binding, PRIMITIVE_PROCEDURES } from './expr.js';
import type { Syntax } from './syntax.js';
import { makeInteger, makeRational } from './numeric.js';
import { applyUnary, applyBinary, applyVariadic } from './primitives.js';
import { show } from './printer.js';
import { ArityError, RuntimeError, SchemeTypeError, UnboundVariableError } from './errors.js';

/**
 * Sink for `display`
 */
export interface OutputPort {
  write(text: string): void;
}

export interface EvalContext {
  readonly output: OutputPort;
  /** Log every procedure application to stderr */
  readonly trace: boolean;
}

export const stdoutPort: OutputPort = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

export function createContext(options: Partial<EvalContext> = {}): EvalContext {
  return {
    output: options.output ?? stdoutPort,
    trace: options.trace ?? Boolean(process.env.DEBUG_EVAL),
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled expression: ${JSON.stringify(value)}`);
}

export function evaluate(expr: Expr, env: Environment, context: EvalContext): SchemeObj {
  switch (expr.kind) {
    case 'integer':
      return makeInteger(expr.value);

    case 'rational':
      return makeRational(expr.numerator, expr.denominator);

    case 'string':
      return makeString(expr.value);

    case 'boolean':
      return makeBoolean(expr.value);

    case 'nullary':
      return expr.op === 'exit' ? theTerminateObj : theVoidObj;

    case 'quote':
      return quoteSyntax(expr.datum);

    case 'var':
      return lookupVariable(expr.name, env);

    case 'unary':
      return applyUnary(expr.op, evaluate(expr.operand, env, context), context);

    case 'binary': {
      const left = evaluate(expr.left, env, context);
      const right = evaluate(expr.right, env, context);
      return applyBinary(expr.op, left, right);
    }

    case 'variadic': {
      const args = expr.operands.map((operand) => evaluate(operand, env, context));
      if (expr.spread) {
        args.push(...listToArray(evaluate(expr.spread, env, context), expr.op));
      }
      return applyVariadic(expr.op, args);
    }

    case 'if': {
      if (evaluate(expr.test, env, context).isTrue()) {
        return evaluate(expr.consequent, env, context);
      }
      return expr.alternative ? evaluate(expr.alternative, env, context) : theVoidObj;
    }

    case 'cond':
      return evaluateCond(expr.clauses, env, context);

    case 'and': {
      let last: SchemeObj = makeBoolean(true);
      for (const operand of expr.operands) {
        last = evaluate(operand, env, context);
        if (!last.isTrue()) return last;
      }
      return last;
    }

    case 'or': {
      let last: SchemeObj = makeBoolean(false);
      for (const operand of expr.operands) {
        last = evaluate(operand, env, context);
        if (last.isTrue()) return last;
      }
      return last;
    }

    case 'begin':
      return evaluateSequence(expr.body, env, context);

    case 'lambda':
      return new ProcedureObj(expr.params, expr.rest, expr.body, env);

    case 'apply': {
      const operator = evaluate(expr.operator, env, context);
      const procedure = operator.asProcedure();
      if (!procedure) {
        throw new RuntimeError(`attempt to apply a non-procedure: ${show(operator)}`);
      }
      const args = expr.operands.map((operand) => evaluate(operand, env, context));
      return applyProcedure(procedure, args, context);
    }

    case 'define': {
      // A failing right-hand side leaves the name as it was
      const value = evaluate(expr.value, env, context);
      if (env.has(expr.name)) {
        env.modify(expr.name, value);
      } else {
        env.define(expr.name, value);
      }
      return value;
    }

    case 'let': {
      const values = expr.bindings.map(
        (binding): [string, SchemeObj] => [binding.name, evaluate(binding.value, env, context)]
      );
      return evaluate(expr.body, env.extendMany(values), context);
    }

    case 'letrec':
      return evaluateLetrec(expr.bindings, expr.body, env, context);

    case 'set': {
      const value = evaluate(expr.value, env, context);
      env.modify(expr.name, value);
      return value;
    }

    default:
      return assertNever(expr);
  }
}

/**
 * Call a procedure with already evaluated arguments
 */
export function applyProcedure(procedure: ProcedureObj, args: readonly SchemeObj[], context: EvalContext): SchemeObj {
  const { params, rest } = procedure;

  if (rest === null ? args.length !== params.length : args.length < params.length) {
    const expected = rest === null ? `${params.length}` : `at least ${params.length}`;
    throw new ArityError(`wrong number of arguments: expected ${expected}, got ${args.length}`);
  }

  const bindings: Array<[string, SchemeObj]> = params.map((name, i): [string, SchemeObj] => [name, args[i]]);
  if (rest !== null) {
    bindings.push([rest, makeList(args.slice(params.length))]);
  }

  if (context.trace) {
    console.error(`[apply] (${[...params, ...(rest ? [`. ${rest}`] : [])].join(' ')}) <- ${args.map(show).join(' ')}`);
  }

  return evaluate(procedure.body, procedure.env.extendMany(bindings), context);
}

/**
 * Variable reference: the environment first, then primitives taken as
 * values. Reserved words never resolve here.
 */
function lookupVariable(name: string, env: Environment): SchemeObj {
  const value = env.find(name);
  if (value !== undefined) {
    if (value.asUnassigned()) {
      throw new RuntimeError(`variable '${name}' used before its definition`);
    }
    return value;
  }

  const template = PRIMITIVE_PROCEDURES.get(name);
  if (template) {
    return new ProcedureObj(template.params, template.rest, template.body, env);
  }

  throw new UnboundVariableError(name);
}

function evaluateSequence(body: readonly Expr[], env: Environment, context: EvalContext): SchemeObj {
  let last: SchemeObj = theVoidObj;
  for (const expr of body) {
    last = evaluate(expr, env, context);
  }
  return last;
}

function evaluateCond(clauses: readonly CondClause[], env: Environment, context: EvalContext): SchemeObj {
  for (const clause of clauses) {
    if (clause.test === null) {
      return evaluateSequence(clause.body, env, context);
    }
    const test = evaluate(clause.test, env, context);
    if (test.isTrue()) {
      return clause.body.length === 0 ? test : evaluateSequence(clause.body, env, context);
    }
  }
  return theVoidObj;
}

function evaluateLetrec(bindings: readonly Binding[], body: Expr, env: Environment, context: EvalContext): SchemeObj {
  const inner = env.extendMany(bindings.map((binding): [string, SchemeObj] => [binding.name, theUnassignedObj]));
  const values = bindings.map((binding) => evaluate(binding.value, inner, context));
  bindings.forEach((binding, i) => inner.modify(binding.name, values[i]));
  return evaluate(body, inner, context);
}

/**
 * Rebuild a value from quoted syntax
 */
export function quoteSyntax(datum: Syntax): SchemeObj {
  switch (datum.type) {
    case 'number':
      return makeInteger(datum.value);
    case 'rational':
      return makeRational(datum.numerator, datum.denominator);
    case 'boolean':
      return makeBoolean(datum.value);
    case 'string':
      return makeString(datum.value);
    case 'symbol':
      return makeSymbol(datum.name);
    case 'list': {
      let result: SchemeObj = theNilObj;
      for (let i = datum.elements.length - 1; i >= 0; i--) {
        result = makePair(quoteSyntax(datum.elements[i]), result);
      }
      return result;
    }
    default:
      throw new RuntimeError('unsupported quoted syntax');
  }
}

function listToArray(list: SchemeObj, op: string): SchemeObj[] {
  const items: SchemeObj[] = [];
  let cur = list;
  for (let pair = cur.asPair(); pair; pair = cur.asPair()) {
    items.push(pair.car);
    cur = pair.cdr;
  }
  if (!cur.asNil()) {
    throw new SchemeTypeError(`${op}: argument list is not a proper list`);
  }
  return items;
}
