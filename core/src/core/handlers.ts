import { randomUUID } from "node:crypto";
import {
  evaluate as evaluateExpr,
  explain as explainExpr,
  formatValue,
  type EvalResult,
  type TraceStep
} from "../../runtime/src/index.js";
import { getConfig } from "./config.js";
import {
  EvalInput,
  EvalOutput,
  type DiagnosticT,
  type EvalInputT,
  type EvalOptionsT,
  type EvalOutputT
} from "./schema.js";

/**
 * Options for handler execution
 */
export interface HandlerOptions {
  reqId?: string;
}

type Tool = "evaluate" | "explain";

/**
 * Core evaluation handler - transport-agnostic
 *
 * Rules:
 * - Never throws; always returns diagnostics
 * - Request options override the configured defaults
 * - Logs audit trail
 */
export async function evaluate(input: unknown, opts?: HandlerOptions): Promise<EvalOutputT> {
  return handle("evaluate", input, opts);
}

/**
 * Same as evaluate, with the shift/reduce trace in `steps`
 */
export async function explain(input: unknown, opts?: HandlerOptions): Promise<EvalOutputT> {
  return handle("explain", input, opts);
}

async function handle(tool: Tool, input: unknown, opts?: HandlerOptions): Promise<EvalOutputT> {
  const reqId = opts?.reqId ?? randomUUID();
  const started = Date.now();

  const parsed = EvalInput.safeParse(input);
  if (!parsed.success) {
    const diagnostics: DiagnosticT[] = [{
      code: "schema_error",
      message: parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "),
      severity: "error"
    }];
    return finish(tool, reqId, started, { value: null, diagnostics });
  }

  const options = resolveOptions(parsed.data);
  let result: EvalResult;
  let steps: TraceStep[] | undefined;
  try {
    if (tool === "explain") {
      ({ result, steps } = explainExpr(parsed.data.expr, options));
    } else {
      result = evaluateExpr(parsed.data.expr, options);
    }
  } catch (error) {
    // Evaluation failures come back as results; anything thrown is a bug
    const diagnostics: DiagnosticT[] = [{
      code: "internal",
      message: error instanceof Error ? error.message : String(error),
      severity: "error"
    }];
    return finish(tool, reqId, started, { value: null, diagnostics });
  }

  if (result.t === "ok") {
    return finish(tool, reqId, started, { value: formatValue(result.v), diagnostics: [], steps });
  }
  const diagnostics: DiagnosticT[] = [{
    code: result.code,
    message: result.msg ?? result.code,
    pos: positionOf(result.data),
    severity: "error"
  }];
  return finish(tool, reqId, started, { value: null, diagnostics, steps });
}

function resolveOptions(input: EvalInputT): Required<EvalOptionsT> {
  const { defaults } = getConfig();
  return {
    lexer: input.options?.lexer ?? defaults.lexer,
    precision: input.options?.precision ?? defaults.precision,
    rounding: input.options?.rounding ?? defaults.rounding
  };
}

function positionOf(data: unknown): number | undefined {
  if (typeof data !== "object" || data === null || !("pos" in data)) return undefined;
  return typeof data.pos === "number" ? data.pos : undefined;
}

function finish(
  tool: Tool,
  reqId: string,
  started: number,
  body: Omit<EvalOutputT, "perf">
): EvalOutputT {
  const output = EvalOutput.parse({
    ...body,
    perf: { durationMs: Date.now() - started }
  });

  logAudit({
    reqId,
    tool,
    durationMs: output.perf.durationMs,
    diagCounts: countDiagnostics(output.diagnostics)
  });

  return output;
}

/**
 * Count diagnostics by severity
 */
export function countDiagnostics(diagnostics: DiagnosticT[]): Record<string, number> {
  const counts: Record<string, number> = { error: 0, warning: 0, info: 0 };
  for (const diag of diagnostics) {
    counts[diag.severity] = (counts[diag.severity] ?? 0) + 1;
  }
  return counts;
}

/**
 * Audit log (stderr, one JSON object per line)
 */
function logAudit(entry: {
  reqId: string;
  tool: Tool;
  durationMs: number;
  diagCounts: Record<string, number>;
}) {
  if (!getConfig().audit) return;
  const log = {
    ts: new Date().toISOString(),
    ...entry
  };
  console.error(`[AUDIT] ${JSON.stringify(log)}`);
}
