import { type Decimal, formatValue } from '../decimal.js';
import { EvalError } from '../errors.js';
import { Stack } from '../stack.js';
import type { StackSnapshot, StepObserver } from '../types.js';
import { applyOperator, precedence } from './precedence.js';
import { tokenText, type OperatorSymbol, type Token } from './types.js';

// `base` is the operand depth when the entry was pushed; `floor` is the base
// of the entry beneath it. An operator owns the operands between the two.
type PendingOperator = { k: 'op'; v: OperatorSymbol; pos: number; base: number; floor: number };
type PendingParen = { k: 'lparen'; pos: number; base: number };
type Pending = PendingOperator | PendingParen;

/**
 * Dual-stack reducer. One instance serves one evaluation: feed every token,
 * then call `finish` once.
 */
export class ReductionEngine {
  private readonly operands = new Stack<Decimal>();
  private readonly operators = new Stack<Pending>();

  constructor(
    private readonly Dec: Decimal.Constructor,
    private readonly observe?: StepObserver,
  ) {}

  feed(token: Token): void {
    switch (token.k) {
      case 'num':
        this.operands.push(new this.Dec(token.v));
        break;
      case 'op': {
        const rank = precedence(token.v);
        this.reduceWhile((top) => precedence(top.v) >= rank);
        this.operators.push({
          k: 'op',
          v: token.v,
          pos: token.pos,
          base: this.operands.size(),
          floor: this.operators.peek()?.base ?? 0,
        });
        break;
      }
      case 'lparen':
        this.operators.push({ k: 'lparen', pos: token.pos, base: this.operands.size() });
        break;
      case 'rparen': {
        this.reduceWhile(() => true);
        const open = this.operators.pop();
        if (!open) {
          throw new EvalError('UNBALANCED_PARENS', `unmatched ')' at position ${token.pos}`, token.pos);
        }
        if (this.operands.size() <= open.base) {
          throw new EvalError('STACK_UNDERFLOW', `empty group at position ${open.pos}`, open.pos);
        }
        break;
      }
    }
    this.observe?.({ kind: 'shift', token: tokenText(token), pos: token.pos, ...this.snapshot() });
  }

  finish(): Decimal {
    this.reduceWhile(() => true);
    const open = this.operators.peek();
    if (open) {
      throw new EvalError('UNBALANCED_PARENS', `unclosed '(' at position ${open.pos}`, open.pos);
    }
    const depth = this.operands.size();
    if (depth > 1) {
      throw new EvalError('TRAILING_GARBAGE', `${depth} values left on the operand stack`);
    }
    const value = this.operands.pop();
    if (value === undefined) throw new EvalError('STACK_UNDERFLOW', 'empty expression');
    return value;
  }

  snapshot(): StackSnapshot {
    return {
      operands: this.operands.toArray().map(formatValue),
      operators: this.operators.toArray().map((p) => (p.k === 'op' ? p.v : '(')),
    };
  }

  // Stops at an open paren or an empty stack.
  private reduceWhile(pred: (top: PendingOperator) => boolean): void {
    let top = this.operators.peek();
    while (top?.k === 'op' && pred(top)) {
      this.operators.pop();
      this.reduce(top);
      top = this.operators.peek();
    }
  }

  private reduce(op: PendingOperator): void {
    if (op.base <= op.floor) throw missing(op, 'left');
    if (this.operands.size() <= op.base) throw missing(op, 'right');
    const right = this.operands.pop();
    const left = this.operands.pop();
    if (right === undefined || left === undefined) {
      throw new EvalError('STACK_UNDERFLOW', `not enough operands for '${op.v}' at position ${op.pos}`, op.pos);
    }
    if (op.v === '/' && right.isZero()) {
      throw new EvalError('DIVISION_BY_ZERO', `division by zero at position ${op.pos}`, op.pos);
    }
    const result = applyOperator(op.v, left, right);
    this.operands.push(result);
    this.observe?.({
      kind: 'reduce',
      op: op.v,
      pos: op.pos,
      left: formatValue(left),
      right: formatValue(right),
      result: formatValue(result),
      ...this.snapshot(),
    });
  }
}

function missing(op: PendingOperator, side: 'left' | 'right'): EvalError {
  return new EvalError(
    'STACK_UNDERFLOW',
    `operator '${op.v}' at position ${op.pos} is missing its ${side} operand`,
    op.pos,
  );
}
