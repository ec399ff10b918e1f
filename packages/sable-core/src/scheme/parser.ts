/**
 * Parser - syntax trees to expression trees.
 *
 * The leading symbol of a list is resolved in this order: a variable bound
 * in the environment (plain application), a primitive (a dedicated node,
 * arity checked here), a reserved word (special form), and otherwise an
 * application of a not-yet-defined variable. The environment is consulted
 * only to decide whether a name is bound; names introduced by lambda, let,
 * letrec and internal define are added as placeholders while their scope is
 * parsed, so locals shadow primitives and keywords.
 */

import {
  type Syntax,
  type ListSyntax,
  type SymbolSyntax,
  listSyntax,
  syntaxToString,
} from './syntax.js';
import {
  type Expr,
  type Binding,
  type CondClause,
  type PrimitiveDef,
  type ReservedWord,
  PRIMITIVES,
  RESERVED_WORDS,
  VARIADIC_MIN_ARGS,
} from './expr.js';
import type { Environment } from './environment.js';
import { type SchemeObj, theUnassignedObj } from './value.js';
import { ArityError, SchemeSyntaxError } from './errors.js';

/**
 * Parse one top-level form against the environment it will be evaluated in
 */
export function parse(syntax: Syntax, env: Environment): Expr {
  const expr = parseSyntax(syntax, env);
  if (process.env.DEBUG_PARSE) {
    console.error(`[parse] ${syntaxToString(syntax)} => ${expr.kind}`);
  }
  return expr;
}

function parseSyntax(syntax: Syntax, env: Environment): Expr {
  switch (syntax.type) {
    case 'number':
      return { kind: 'integer', value: syntax.value };
    case 'rational':
      return { kind: 'rational', numerator: syntax.numerator, denominator: syntax.denominator };
    case 'string':
      return { kind: 'string', value: syntax.value };
    case 'boolean':
      return { kind: 'boolean', value: syntax.value };
    case 'symbol':
      return { kind: 'var', name: syntax.name };
    case 'list':
      return parseList(syntax.elements, env);
  }
}

function parseAll(elements: readonly Syntax[], env: Environment): Expr[] {
  return elements.map((element) => parseSyntax(element, env));
}

function parseList(elements: readonly Syntax[], env: Environment): Expr {
  if (elements.length === 0) {
    return { kind: 'quote', datum: listSyntax([]) };
  }

  const head = elements[0];
  const rest = elements.slice(1);

  if (head.type !== 'symbol') {
    return { kind: 'apply', operator: parseSyntax(head, env), operands: parseAll(rest, env) };
  }

  const op = head.name;

  if (env.has(op)) {
    return { kind: 'apply', operator: { kind: 'var', name: op }, operands: parseAll(rest, env) };
  }

  const primitive = PRIMITIVES.get(op);
  if (primitive) {
    return parsePrimitive(op, primitive, parseAll(rest, env));
  }

  const keyword = RESERVED_WORDS.get(op);
  if (keyword) {
    return parseSpecialForm(keyword, elements, env);
  }

  return { kind: 'apply', operator: { kind: 'var', name: op }, operands: parseAll(rest, env) };
}

function arityError(name: string, expected: string, got: number): ArityError {
  return new ArityError(`wrong number of arguments for ${name}: expected ${expected}, got ${got}`);
}

function parsePrimitive(name: string, primitive: PrimitiveDef, operands: Expr[]): Expr {
  switch (primitive.shape) {
    case 'nullary':
      if (operands.length !== 0) throw arityError(name, '0', operands.length);
      return { kind: 'nullary', op: primitive.op };

    case 'unary':
      if (operands.length !== 1) throw arityError(name, '1', operands.length);
      return { kind: 'unary', op: primitive.op, operand: operands[0] };

    case 'binary':
      if (operands.length !== 2) throw arityError(name, '2', operands.length);
      return { kind: 'binary', op: primitive.op, left: operands[0], right: operands[1] };

    case 'variadic': {
      const minArgs = VARIADIC_MIN_ARGS[primitive.op];
      if (operands.length < minArgs) throw arityError(name, `at least ${minArgs}`, operands.length);
      if (primitive.binary && operands.length === 2) {
        return { kind: 'binary', op: primitive.binary, left: operands[0], right: operands[1] };
      }
      return { kind: 'variadic', op: primitive.op, operands, spread: null };
    }
  }
}

function parseSpecialForm(keyword: ReservedWord, elements: readonly Syntax[], env: Environment): Expr {
  switch (keyword) {
    case 'quote':
      if (elements.length !== 2) {
        throw new SchemeSyntaxError('quote requires exactly 1 argument');
      }
      return { kind: 'quote', datum: elements[1] };

    case 'if':
      if (elements.length !== 3 && elements.length !== 4) {
        throw new SchemeSyntaxError('if requires 2 or 3 arguments');
      }
      return {
        kind: 'if',
        test: parseSyntax(elements[1], env),
        consequent: parseSyntax(elements[2], env),
        alternative: elements.length === 4 ? parseSyntax(elements[3], env) : null,
      };

    case 'cond':
      return { kind: 'cond', clauses: parseCondClauses(elements.slice(1), env) };

    case 'and':
      return { kind: 'and', operands: parseAll(elements.slice(1), env) };

    case 'or':
      return { kind: 'or', operands: parseAll(elements.slice(1), env) };

    case 'begin':
      return { kind: 'begin', body: parseSequence(elements.slice(1), env) };

    case 'lambda':
      return parseLambda(elements, env);

    case 'define':
      return parseDefine(elements, env);

    case 'let':
      return parseLet(elements, env);

    case 'letrec':
      return parseLetrec(elements, env);

    case 'set!': {
      if (elements.length !== 3) {
        throw new SchemeSyntaxError('set! requires exactly 2 arguments');
      }
      const target = elements[1];
      if (target.type !== 'symbol') {
        throw new SchemeSyntaxError('set! target must be a symbol');
      }
      return { kind: 'set', name: target.name, value: parseSyntax(elements[2], env) };
    }
  }
}

/**
 * (cond (test body...) ... (else body...))
 *
 * `else` is only the catch-all keyword while it is not bound as a variable.
 */
function parseCondClauses(clauses: readonly Syntax[], env: Environment): CondClause[] {
  return clauses.map((clause, index): CondClause => {
    if (clause.type !== 'list' || clause.elements.length === 0) {
      throw new SchemeSyntaxError(`cond clause must be a non-empty list: ${syntaxToString(clause)}`);
    }
    const [test, ...body] = clause.elements;

    if (test.type === 'symbol' && test.name === 'else' && !env.has('else')) {
      if (index !== clauses.length - 1) {
        throw new SchemeSyntaxError('cond: else clause must be last');
      }
      if (body.length === 0) {
        throw new SchemeSyntaxError('cond: else clause must have at least one expression');
      }
      return { test: null, body: parseAll(body, env) };
    }

    return { test: parseSyntax(test, env), body: parseAll(body, env) };
  });
}

/**
 * Environment used while parsing a scope that binds `names`
 */
function withPlaceholders(env: Environment, names: readonly string[]): Environment {
  if (names.length === 0) {
    return env;
  }
  return env.extendMany(names.map((name): [string, SchemeObj] => [name, theUnassignedObj]));
}

function checkDistinct(form: string, names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new SchemeSyntaxError(`${form}: duplicate name '${name}'`);
    }
    seen.add(name);
  }
}

function isDefineForm(syntax: Syntax, env: Environment): syntax is ListSyntax {
  return (
    syntax.type === 'list' &&
    syntax.elements.length > 1 &&
    syntax.elements[0].type === 'symbol' &&
    syntax.elements[0].name === 'define' &&
    !env.has('define')
  );
}

function definedName(form: ListSyntax): string | null {
  const target = form.elements[1];
  if (target.type === 'symbol') {
    return target.name;
  }
  if (target.type === 'list' && target.elements.length > 0 && target.elements[0].type === 'symbol') {
    return target.elements[0].name;
  }
  return null;
}

/**
 * Forms evaluated in order in one scope. Names defined by the sequence are
 * visible to the parser from its first form on.
 */
function parseSequence(forms: readonly Syntax[], env: Environment): Expr[] {
  const defined: string[] = [];
  for (const form of forms) {
    if (isDefineForm(form, env)) {
      const name = definedName(form);
      if (name !== null && !env.has(name) && !defined.includes(name)) {
        defined.push(name);
      }
    }
  }
  const scope = withPlaceholders(env, defined);
  return forms.map((form) => parseSyntax(form, scope));
}

/**
 * Body of lambda, let or letrec: one expression, or a begin of several
 */
function parseBody(forms: readonly Syntax[], env: Environment): Expr {
  const body = parseSequence(forms, env);
  return body.length === 1 ? body[0] : { kind: 'begin', body };
}

interface Formals {
  params: string[];
  rest: string | null;
}

/**
 * (a b c) for a fixed parameter list, or a bare symbol collecting all
 * arguments into a list
 */
function parseFormals(form: string, formals: Syntax): Formals {
  if (formals.type === 'symbol') {
    return { params: [], rest: formals.name };
  }
  if (formals.type !== 'list') {
    throw new SchemeSyntaxError(`${form} parameters must be a list or a symbol`);
  }
  const params = formals.elements.map((param) => {
    if (param.type !== 'symbol') {
      throw new SchemeSyntaxError(`${form} parameter must be a symbol: ${syntaxToString(param)}`);
    }
    return param.name;
  });
  checkDistinct(form, params);
  return { params, rest: null };
}

function formalNames({ params, rest }: Formals): string[] {
  return rest === null ? params : [...params, rest];
}

function parseLambda(elements: readonly Syntax[], env: Environment): Expr {
  if (elements.length < 3) {
    throw new SchemeSyntaxError('lambda requires a parameter list and a body');
  }
  const formals = parseFormals('lambda', elements[1]);
  const body = parseBody(elements.slice(2), withPlaceholders(env, formalNames(formals)));
  return { kind: 'lambda', params: formals.params, rest: formals.rest, body };
}

/**
 * (define name expr) or (define (name param...) body...)
 */
function parseDefine(elements: readonly Syntax[], env: Environment): Expr {
  if (elements.length < 3) {
    throw new SchemeSyntaxError('define requires a name and a value');
  }
  const target = elements[1];

  if (target.type === 'symbol') {
    if (elements.length !== 3) {
      throw new SchemeSyntaxError('define requires exactly 2 arguments');
    }
    const scope = env.has(target.name) ? env : withPlaceholders(env, [target.name]);
    return { kind: 'define', name: target.name, value: parseSyntax(elements[2], scope) };
  }

  if (target.type === 'list' && target.elements.length > 0) {
    const [name, ...params] = target.elements;
    if (name.type !== 'symbol') {
      throw new SchemeSyntaxError('define: procedure name must be a symbol');
    }
    const formals = parseFormals('define', listSyntax(params));
    const scope = env.has(name.name) ? env : withPlaceholders(env, [name.name]);
    const body = parseBody(elements.slice(2), withPlaceholders(scope, formals.params));
    return {
      kind: 'define',
      name: name.name,
      value: { kind: 'lambda', params: formals.params, rest: null, body },
    };
  }

  throw new SchemeSyntaxError(`define: name must be a symbol: ${syntaxToString(target)}`);
}

function parseBindings(form: string, bindings: Syntax, env: Environment): Binding[] {
  if (bindings.type !== 'list') {
    throw new SchemeSyntaxError(`${form} bindings must be a list`);
  }
  const parsed = bindings.elements.map((binding): [SymbolSyntax, Syntax] => {
    if (binding.type !== 'list' || binding.elements.length !== 2) {
      throw new SchemeSyntaxError(`${form} binding must be (name expr): ${syntaxToString(binding)}`);
    }
    const [name, value] = binding.elements;
    if (name.type !== 'symbol') {
      throw new SchemeSyntaxError(`${form} binding name must be a symbol: ${syntaxToString(name)}`);
    }
    return [name, value];
  });
  checkDistinct(form, parsed.map(([name]) => name.name));
  return parsed.map(([name, value]) => ({ name: name.name, value: parseSyntax(value, env) }));
}

/**
 * (let ((name expr)...) body...) - initialisers see the outer scope only
 */
function parseLet(elements: readonly Syntax[], env: Environment): Expr {
  if (elements.length < 3) {
    throw new SchemeSyntaxError('let requires bindings and a body');
  }
  const bindings = parseBindings('let', elements[1], env);
  const scope = withPlaceholders(env, bindings.map((binding) => binding.name));
  return { kind: 'let', bindings, body: parseBody(elements.slice(2), scope) };
}

/**
 * (letrec ((name expr)...) body...) - initialisers see every binding
 */
function parseLetrec(elements: readonly Syntax[], env: Environment): Expr {
  if (elements.length < 3) {
    throw new SchemeSyntaxError('letrec requires bindings and a body');
  }
  const names = bindingNames('letrec', elements[1]);
  const scope = withPlaceholders(env, names);
  const bindings = parseBindings('letrec', elements[1], scope);
  return { kind: 'letrec', bindings, body: parseBody(elements.slice(2), scope) };
}

function bindingNames(form: string, bindings: Syntax): string[] {
  if (bindings.type !== 'list') {
    throw new SchemeSyntaxError(`${form} bindings must be a list`);
  }
  return bindings.elements.flatMap((binding) =>
    binding.type === 'list' && binding.elements.length > 0 && binding.elements[0].type === 'symbol'
      ? [binding.elements[0].name]
      : []
  );
}
