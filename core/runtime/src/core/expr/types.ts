import type { Decimal } from '../decimal.js';

export type OperatorSymbol = '+' | '-' | '*' | '/';

export type Token =
  | { k: 'num'; v: Decimal; text: string; pos: number }
  | { k: 'op'; v: OperatorSymbol; pos: number }
  | { k: 'lparen'; pos: number }
  | { k: 'rparen'; pos: number };

export type LexerMode = 'whitespace' | 'boundary';

export interface TokenizeOptions {
  lexer?: LexerMode;
}

export function tokenText(t: Token): string {
  switch (t.k) {
    case 'num':
      return t.text;
    case 'op':
      return t.v;
    case 'lparen':
      return '(';
    case 'rparen':
      return ')';
  }
}
