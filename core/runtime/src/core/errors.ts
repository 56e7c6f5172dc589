export const EVAL_ERROR_CODES = [
  'LEX_ERROR',
  'UNBALANCED_PARENS',
  'STACK_UNDERFLOW',
  'DIVISION_BY_ZERO',
  'TRAILING_GARBAGE',
] as const;

export type EvalErrorCode = (typeof EVAL_ERROR_CODES)[number];

/**
 * Raised inside the tokenizer and reduction engine. `evaluate` converts it to
 * an `Err` result; nothing else is caught there.
 */
export class EvalError extends Error {
  constructor(
    readonly code: EvalErrorCode,
    message: string,
    readonly pos?: number,
  ) {
    super(message);
    this.name = 'EvalError';
  }
}
