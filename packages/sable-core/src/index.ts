/**
 * Sable Core - a small Scheme interpreter
 *
 * - Reader (source text to syntax trees)
 * - Parser (syntax trees to resolved expression trees)
 * - Evaluator over lexical environments
 * - Exact numeric tower (32-bit integers and rationals)
 */

export { Reader, read, readOne } from './scheme/reader.js';
export {
  type Syntax,
  type NumberSyntax,
  type RationalSyntax,
  type SymbolSyntax,
  type StringSyntax,
  type BooleanSyntax,
  type ListSyntax,
  syntaxToString,
} from './scheme/syntax.js';
export { parse } from './scheme/parser.js';
export type { Expr, UnaryOp, BinaryOp, VariadicOp, NullaryOp, ReservedWord } from './scheme/expr.js';
export { PRIMITIVES, RESERVED_WORDS } from './scheme/expr.js';
export {
  type OutputPort,
  type EvalContext,
  evaluate,
  applyProcedure,
  createContext,
  stdoutPort,
} from './scheme/evaluator.js';
export { Interpreter, type InterpreterOptions, type EvalResult } from './scheme/interpreter.js';
export { Environment } from './scheme/environment.js';
export {
  SchemeObj,
  NilObj,
  BooleanObj,
  IntegerObj,
  RationalObj,
  StringObj,
  SymbolObj,
  PairObj,
  ProcedureObj,
  VoidObj,
  TerminateObj,
  UnassignedObj,
  theNilObj,
  theTrueObj,
  theFalseObj,
  theVoidObj,
  theTerminateObj,
  makeBoolean,
  makeString,
  makeSymbol,
  makePair,
  makeList,
} from './scheme/value.js';
export {
  type NumberObj,
  INT_MIN,
  INT_MAX,
  makeInteger,
  makeRational,
  add,
  subtract,
  multiply,
  divide,
  modulo,
  expt,
  compare,
} from './scheme/numeric.js';
export { show, displayString } from './scheme/printer.js';
export {
  type SchemeErrorKind,
  type Location,
  SchemeError,
  RuntimeError,
  UnboundVariableError,
  SchemeTypeError,
  ArithmeticError,
  ArityError,
  SchemeSyntaxError,
  IncompleteInputError,
} from './scheme/errors.js';
