import { readFileSync } from "node:fs";
import { createInterface } from "node:readline";
import { z } from "zod";
import {
  EVAL_ERROR_CODES,
  evaluate,
  explain,
  formatValue,
  type EvalOptions,
  type EvalResult,
  type TraceStep
} from "../../core/runtime/src/index.js";
import { EvalOptions as EvalOptionsSchema, LexerMode, RoundingMode } from "../../core/src/core/schema.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  readLine(): Promise<string | undefined>;
  readFile(path: string): string;
}

export const nodeIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readLine: firstStdinLine,
  readFile: (path) => readFileSync(path, "utf8")
};

const USAGE = [
  "stackcalc <command> [args] [flags]",
  "commands: eval [expr] | explain <expr> | test <fixtures.json>",
  "flags: --lexer whitespace|boundary --precision N --rounding MODE --json --only NAME"
];

const BOOLEAN_FLAGS = new Set(["--json"]);
const VALUE_FLAGS = new Set(["--lexer", "--precision", "--rounding", "--only"]);

const Flags = z.object({
  lexer: LexerMode.optional(),
  precision: z.coerce.number().int().min(1).max(1000).optional(),
  rounding: RoundingMode.optional()
});

const Fixture = z.object({
  name: z.string(),
  expr: z.string(),
  value: z.string().optional(),
  error: z.enum(EVAL_ERROR_CODES).optional(),
  options: EvalOptionsSchema.optional()
});
type FixtureT = z.infer<typeof Fixture>;

interface Args {
  positional: string[];
  flags: Map<string, string>;
  unknown: string[];
}

export function parseArgs(argv: string[]): Args {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const unknown: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      positional.push(a);
    } else if (BOOLEAN_FLAGS.has(a)) {
      flags.set(a, "true");
    } else if (VALUE_FLAGS.has(a)) {
      flags.set(a, argv[i + 1] ?? "");
      i++;
    } else {
      unknown.push(a);
    }
  }
  return { positional, flags, unknown };
}

/**
 * Runs one command and resolves to the process exit code.
 */
export async function run(argv: string[], io: CliIO = nodeIO): Promise<number> {
  const [cmd, ...rest] = argv;
  if (!cmd) {
    USAGE.forEach((l) => io.out(l));
    return 0;
  }
  const { positional, flags, unknown } = parseArgs(rest);
  if (unknown.length) {
    io.err(`error: unknown flag${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`);
    return 2;
  }

  const parsed = Flags.safeParse({
    lexer: flags.get("--lexer"),
    precision: flags.get("--precision"),
    rounding: flags.get("--rounding")
  });
  if (!parsed.success) {
    io.err(`error: invalid flags: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    return 2;
  }
  const options: EvalOptions = parsed.data;

  switch (cmd) {
    case "eval": {
      const expr = positional.length ? positional.join(" ") : await io.readLine();
      if (expr === undefined || expr.trim() === "") {
        io.err("error: no expression given");
        return 2;
      }
      return report(evaluate(expr, options), io, flags.has("--json"));
    }
    case "explain": {
      if (!positional.length) {
        io.err("error: no expression given");
        return 2;
      }
      const { result, steps } = explain(positional.join(" "), options);
      steps.forEach((s) => io.out(formatStep(s)));
      return report(result, io, false);
    }
    case "test": {
      const file = positional[0];
      if (!file) {
        io.err("error: no fixture file given");
        return 2;
      }
      return runTests(file, flags.get("--only"), io);
    }
    default:
      USAGE.forEach((l) => io.err(l));
      return 2;
  }
}

function report(result: EvalResult, io: CliIO, json: boolean): number {
  if (result.t === "ok") {
    const value = formatValue(result.v);
    io.out(json ? JSON.stringify({ value }) : value);
    return 0;
  }
  const message = result.msg ?? result.code;
  if (json) io.out(JSON.stringify({ error: { code: result.code, message } }));
  else io.err(`error: ${result.code}: ${message}`);
  return 1;
}

export function formatStep(step: TraceStep): string {
  const stacks = `[${step.operands.join(" ")}] [${step.operators.join(" ")}]`;
  if (step.kind === "shift") return `shift ${step.token} -> ${stacks}`;
  return `reduce ${step.left} ${step.op} ${step.right} = ${step.result} -> ${stacks}`;
}

function runTests(path: string, only: string | undefined, io: CliIO): number {
  let fixtures: FixtureT[];
  try {
    fixtures = z.array(Fixture).parse(JSON.parse(io.readFile(path)));
  } catch (error) {
    io.err(`error: cannot load ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return 2;
  }
  if (only) fixtures = fixtures.filter((f) => f.name.includes(only));

  let allPass = true;
  for (const f of fixtures) {
    const got = outcome(evaluate(f.expr, f.options ?? {}));
    const expected = f.error ?? f.value ?? "";
    const pass = got === expected;
    io.out(`${f.name}: ${pass ? "OK" : "FAIL"}`);
    if (!pass) {
      allPass = false;
      io.out(` expected: ${expected}`);
      io.out(`      got: ${got}`);
    }
  }
  return allPass ? 0 : 1;
}

// Value on success, error code on failure
function outcome(result: EvalResult): string {
  return result.t === "ok" ? formatValue(result.v) : result.code;
}

async function firstStdinLine(): Promise<string | undefined> {
  const rl = createInterface({ input: process.stdin });
  try {
    for await (const line of rl) return line;
    return undefined;
  } finally {
    rl.close();
  }
}
