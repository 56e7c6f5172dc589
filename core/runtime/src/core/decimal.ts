import { Decimal } from "decimal.js";

export type RoundingMode =
  | "up"
  | "down"
  | "ceil"
  | "floor"
  | "half-up"
  | "half-down"
  | "half-even"
  | "half-ceil"
  | "half-floor";

export const ROUNDING_MODES: Record<RoundingMode, Decimal.Rounding> = {
  up: 0,
  down: 1,
  ceil: 2,
  floor: 3,
  "half-up": 4,
  "half-down": 5,
  "half-even": 6,
  "half-ceil": 7,
  "half-floor": 8,
};

export const DEFAULT_PRECISION = 20;
export const DEFAULT_ROUNDING: RoundingMode = "half-even";

export interface DecimalSettings {
  precision?: number;
  rounding?: RoundingMode;
}

// Arithmetic on a Decimal uses its constructor's settings, so each evaluation
// gets its own clone instead of mutating the shared one.
export function decimalFor(settings: DecimalSettings = {}): Decimal.Constructor {
  return Decimal.clone({
    precision: settings.precision ?? DEFAULT_PRECISION,
    rounding: ROUNDING_MODES[settings.rounding ?? DEFAULT_ROUNDING],
  });
}

export function D(x: Decimal.Value): Decimal {
  return x instanceof Decimal ? x : new Decimal(x);
}

/** Plain notation, never exponential. */
export function formatValue(x: Decimal): string {
  return x.toFixed();
}

export { Decimal };
