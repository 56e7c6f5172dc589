import { z } from "zod";
import { DEFAULT_PRECISION, DEFAULT_ROUNDING } from "../../runtime/src/index.js";
import { LexerMode, RoundingMode, type EvalOptionsT } from "./schema.js";

/**
 * Process configuration, read from the environment once at startup
 *
 *   - MODE                - mcp | http | both (default: both)
 *   - PORT                - HTTP server port (default: 3001)
 *   - STACKCALC_LEXER     - default lexer (default: whitespace)
 *   - STACKCALC_PRECISION - default significant digits (default: 20)
 *   - STACKCALC_ROUNDING  - default rounding mode (default: half-even)
 *   - STACKCALC_AUDIT     - "0" turns off audit lines
 */
export const Env = z.object({
  MODE: z.enum(["mcp", "http", "both"]).default("both"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  STACKCALC_LEXER: LexerMode.default("whitespace"),
  STACKCALC_PRECISION: z.coerce.number().int().min(1).max(1000).default(DEFAULT_PRECISION),
  STACKCALC_ROUNDING: RoundingMode.default(DEFAULT_ROUNDING),
  STACKCALC_AUDIT: z.enum(["0", "1"]).default("1")
});

export interface Config {
  mode: "mcp" | "http" | "both";
  port: number;
  defaults: Required<EvalOptionsT>;
  audit: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const e = Env.parse(env);
  return {
    mode: e.MODE,
    port: e.PORT,
    defaults: {
      lexer: e.STACKCALC_LEXER,
      precision: e.STACKCALC_PRECISION,
      rounding: e.STACKCALC_ROUNDING
    },
    audit: e.STACKCALC_AUDIT === "1"
  };
}

let current: Config | undefined;

export function getConfig(): Config {
  current ??= loadConfig();
  return current;
}

/** Replaces the cached config; tests use it to avoid reading process.env. */
export function setConfig(config: Config): void {
  current = config;
}
