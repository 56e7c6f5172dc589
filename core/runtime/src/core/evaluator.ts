import { decimalFor } from './decimal.js';
import { EvalError } from './errors.js';
import { ReductionEngine } from './expr/engine.js';
import { tokenize } from './expr/tokenizer.js';
import { err, ok } from './result.js';
import type { EvalOptions, EvalResult, Explanation, StepObserver, TraceStep } from './types.js';

/**
 * Evaluates an infix expression. Tokenizing runs to completion before any
 * reduction, so a lexical error wins over every other failure.
 */
export function evaluate(expression: string, options: EvalOptions = {}): EvalResult {
  return run(expression, options);
}

/** `evaluate`, keeping every shift and reduce step. */
export function explain(expression: string, options: EvalOptions = {}): Explanation {
  const steps: TraceStep[] = [];
  const result = run(expression, options, (step) => steps.push(step));
  return { result, steps };
}

function run(expression: string, options: EvalOptions, observe?: StepObserver): EvalResult {
  try {
    const tokens = [...tokenize(expression, options)];
    const engine = new ReductionEngine(decimalFor(options), observe);
    for (const t of tokens) engine.feed(t);
    return ok(engine.finish());
  } catch (e) {
    if (e instanceof EvalError) return err(e.code, e.message, { pos: e.pos });
    throw e;
  }
}
