import type { Decimal } from '../decimal.js';
import type { OperatorSymbol } from './types.js';

type Operation = {
  rank: number;
  apply: (l: Decimal, r: Decimal) => Decimal;
};

// Equal ranks reduce left to right.
const OPERATIONS: Record<OperatorSymbol, Operation> = {
  '*': { rank: 2, apply: (l, r) => l.times(r) },
  '/': { rank: 2, apply: (l, r) => l.div(r) },
  '+': { rank: 1, apply: (l, r) => l.plus(r) },
  '-': { rank: 1, apply: (l, r) => l.minus(r) },
};

export const precedence = (op: OperatorSymbol): number => OPERATIONS[op].rank;

export const applyOperator = (op: OperatorSymbol, l: Decimal, r: Decimal): Decimal =>
  OPERATIONS[op].apply(l, r);
