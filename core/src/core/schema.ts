import { z } from "zod";
import { EVAL_ERROR_CODES } from "../../runtime/src/index.js";

export const LexerMode = z.enum(["whitespace", "boundary"]);

export const RoundingMode = z.enum([
  "up",
  "down",
  "ceil",
  "floor",
  "half-up",
  "half-down",
  "half-even",
  "half-ceil",
  "half-floor"
]);

/**
 * Evaluation options
 */
export const EvalOptions = z.object({
  lexer: LexerMode.optional(),
  precision: z.number().int().min(1).max(1000).optional(),
  rounding: RoundingMode.optional()
});

/**
 * Input for evaluate/explain requests
 */
export const EvalInput = z.object({
  expr: z.string().max(10_000),
  options: EvalOptions.optional()
});

/**
 * Diagnostic codes: the evaluator's error codes plus handler-level ones
 */
export const DiagnosticCode = z.union([
  z.enum(EVAL_ERROR_CODES),
  z.enum(["schema_error", "internal"])
]);

export const Diagnostic = z.object({
  code: DiagnosticCode,
  message: z.string(),
  pos: z.number().int().nonnegative().optional(),
  severity: z.enum(["error", "warning", "info"])
});

const Snapshot = {
  operands: z.array(z.string()),
  operators: z.array(z.string())
};

export const TraceStep = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("shift"), token: z.string(), pos: z.number(), ...Snapshot }),
  z.object({
    kind: z.literal("reduce"),
    op: z.enum(["+", "-", "*", "/"]),
    pos: z.number(),
    left: z.string(),
    right: z.string(),
    result: z.string(),
    ...Snapshot
  })
]);

/**
 * Output from evaluate/explain
 */
export const EvalOutput = z.object({
  value: z.string().nullable(),
  diagnostics: z.array(Diagnostic),
  steps: z.array(TraceStep).optional(),
  perf: z.object({ durationMs: z.number() })
});

// Type exports
export type LexerModeT = z.infer<typeof LexerMode>;
export type RoundingModeT = z.infer<typeof RoundingMode>;
export type EvalOptionsT = z.infer<typeof EvalOptions>;
export type EvalInputT = z.infer<typeof EvalInput>;
export type DiagnosticCodeT = z.infer<typeof DiagnosticCode>;
export type DiagnosticT = z.infer<typeof Diagnostic>;
export type TraceStepT = z.infer<typeof TraceStep>;
export type EvalOutputT = z.infer<typeof EvalOutput>;
