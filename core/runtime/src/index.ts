/**
 * stackcalc runtime - infix arithmetic on an operand stack and an operator stack
 *
 * Consolidates:
 * - Tokenizer (whitespace-separated and boundary-aware)
 * - Reduction engine and precedence table
 * - Evaluator entry points and the Result helpers they return
 */

export { evaluate, explain } from './core/evaluator.js';
export { tokenize } from './core/expr/tokenizer.js';
export { precedence } from './core/expr/precedence.js';
export { EvalError, EVAL_ERROR_CODES } from './core/errors.js';
export type { EvalErrorCode } from './core/errors.js';
export {
  Decimal,
  formatValue,
  DEFAULT_PRECISION,
  DEFAULT_ROUNDING,
  ROUNDING_MODES,
} from './core/decimal.js';
export type { RoundingMode } from './core/decimal.js';
export type { Token, OperatorSymbol, LexerMode } from './core/expr/types.js';
export type { EvalOptions, EvalResult, Explanation, TraceStep, StackSnapshot } from './core/types.js';
export { ok, err, isOk, isErr, map, match, unwrapOr } from './core/result.js';
export type { Ok, Err, Result } from './core/result.js';
