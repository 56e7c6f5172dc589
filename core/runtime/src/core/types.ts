// Core contracts shared by the engine, the evaluator and its callers
import type { Decimal, DecimalSettings } from "./decimal.js";
import type { EvalErrorCode } from "./errors.js";
import type { OperatorSymbol, TokenizeOptions } from "./expr/types.js";
import type { Result } from "./result.js";

export interface EvalOptions extends TokenizeOptions, DecimalSettings {}

export type EvalResult = Result<Decimal, EvalErrorCode>;

/** Stack contents after a step, bottom first, values in plain notation. */
export interface StackSnapshot {
  operands: string[];
  operators: string[];
}

export type TraceStep =
  | ({ kind: "shift"; token: string; pos: number } & StackSnapshot)
  | ({
      kind: "reduce";
      op: OperatorSymbol;
      pos: number;
      left: string;
      right: string;
      result: string;
    } & StackSnapshot);

export type StepObserver = (step: TraceStep) => void;

export interface Explanation {
  result: EvalResult;
  steps: TraceStep[];
}
