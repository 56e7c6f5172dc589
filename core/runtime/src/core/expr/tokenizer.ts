import { D } from '../decimal.js';
import { EvalError } from '../errors.js';
import type { OperatorSymbol, Token, TokenizeOptions } from './types.js';

const NUMBER = /^(?:[0-9]+(?:\.[0-9]+)?|\.[0-9]+)$/;
const isDigit = (c: string) => c >= '0' && c <= '9';
const isWS = (c: string) => /\s/.test(c);
const isOp = (c: string): c is OperatorSymbol =>
  c === '+' || c === '-' || c === '*' || c === '/';

/**
 * Lazily tokenizes `input`. Each iteration rescans from the start, so the
 * returned sequence can be walked any number of times.
 */
export function tokenize(input: string, opts: TokenizeOptions = {}): Iterable<Token> {
  const scan = opts.lexer === 'boundary' ? scanBoundary : scanWhitespace;
  return { [Symbol.iterator]: () => scan(input) };
}

function single(c: string, pos: number): Token | undefined {
  if (isOp(c)) return { k: 'op', v: c, pos };
  if (c === '(') return { k: 'lparen', pos };
  if (c === ')') return { k: 'rparen', pos };
  return undefined;
}

function* scanWhitespace(input: string): Generator<Token> {
  for (const m of input.matchAll(/\S+/g)) {
    const text = m[0];
    const pos = m.index ?? 0;
    if (NUMBER.test(text)) {
      yield { k: 'num', v: D(text), text, pos };
      continue;
    }
    const t = text.length === 1 ? single(text, pos) : undefined;
    if (!t) throw new EvalError('LEX_ERROR', `unrecognized token '${text}' at position ${pos}`, pos);
    yield t;
  }
}

function* scanBoundary(input: string): Generator<Token> {
  let i = 0;
  const peek = (at = i) => input[at] ?? '';
  while (i < input.length) {
    const c = peek();
    if (isWS(c)) {
      i++;
      continue;
    }
    if (isDigit(c) || (c === '.' && isDigit(peek(i + 1)))) {
      const start = i;
      while (isDigit(peek())) i++;
      if (peek() === '.' && isDigit(peek(i + 1))) {
        i++;
        while (isDigit(peek())) i++;
      }
      if (peek() === '.') {
        throw new EvalError('LEX_ERROR', `unexpected character '.' at position ${i}`, i);
      }
      const text = input.slice(start, i);
      yield { k: 'num', v: D(text), text, pos: start };
      continue;
    }
    const t = single(c, i);
    if (!t) throw new EvalError('LEX_ERROR', `unexpected character '${c}' at position ${i}`, i);
    yield t;
    i++;
  }
}
