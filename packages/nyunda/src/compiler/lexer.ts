/**
 * Tokenizer for Nyunda source text.
 *
 * Rules are tried in order at every position and the first one that
 * matches wins, so multi-character operators must come before their
 * single-character prefixes.
 *
 * @module compiler/lexer
 */

import { LexError } from './errors.js';

export type TokenKind =
  | 'KEYWORD'
  | 'IDENTIFIER'
  | 'NUMBER'
  | 'OPERATOR'
  | 'SYMBOL'
  | 'EOF';

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly pos: number;
  readonly line: number;
  readonly column: number;
}

export type Keyword =
  | 'if'
  | 'elif'
  | 'else'
  | 'while'
  | 'print'
  | 'and'
  | 'or'
  | 'not'
  | 'true'
  | 'false';

export const KEYWORDS: ReadonlyMap<string, Keyword> = new Map<string, Keyword>([
  ['upami', 'if'],
  ['lamun', 'elif'],
  ['sanes', 'else'],
  ['bari', 'while'],
  ['cetak', 'print'],
  ['jeung', 'and'],
  ['atawa', 'or'],
  ['henteu', 'not'],
  ['leres', 'true'],
  ['palsu', 'false'],
]);

/** Surface spelling of each keyword, for error messages and the printer. */
export const KEYWORD_TEXT: Readonly<Record<Keyword, string>> = {
  if: 'upami',
  elif: 'lamun',
  else: 'sanes',
  while: 'bari',
  print: 'cetak',
  and: 'jeung',
  or: 'atawa',
  not: 'henteu',
  true: 'leres',
  false: 'palsu',
};

type RuleKind = Exclude<TokenKind, 'EOF' | 'KEYWORD'> | 'WORD' | 'SKIP';

interface LexRule {
  kind: RuleKind;
  pattern: RegExp;
}

const RULES: readonly LexRule[] = [
  { kind: 'SKIP', pattern: /[ \t\r\n]+/y },
  { kind: 'SKIP', pattern: /#[^\n]*/y },
  { kind: 'NUMBER', pattern: /\d+(?:\.\d+)?/y },
  { kind: 'WORD', pattern: /[A-Za-z_][A-Za-z0-9_]*/y },
  { kind: 'OPERATOR', pattern: /\*\*|==|!=|<=|>=/y },
  { kind: 'OPERATOR', pattern: /[=+\-*/%<>]/y },
  { kind: 'SYMBOL', pattern: /[(){};]/y },
];

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let lineStart = 0;

  while (i < input.length) {
    let lexeme: string | undefined;
    let rule: LexRule | undefined;

    for (const candidate of RULES) {
      candidate.pattern.lastIndex = i;
      const m = candidate.pattern.exec(input);
      if (m) {
        lexeme = m[0];
        rule = candidate;
        break;
      }
    }

    if (rule === undefined || lexeme === undefined) {
      throw new LexError(input[i], i, line, i - lineStart + 1);
    }

    const ruleKind = rule.kind;
    if (ruleKind !== 'SKIP') {
      const kind: TokenKind =
        ruleKind === 'WORD' ? (KEYWORDS.has(lexeme) ? 'KEYWORD' : 'IDENTIFIER') : ruleKind;
      tokens.push({ kind, text: lexeme, pos: i, line, column: i - lineStart + 1 });
    }

    for (let k = 0; k < lexeme.length; k++) {
      if (lexeme[k] === '\n') {
        line++;
        lineStart = i + k + 1;
      }
    }
    i += lexeme.length;
  }

  tokens.push({ kind: 'EOF', text: '', pos: i, line, column: i - lineStart + 1 });
  return tokens;
}

/** Keyword meaning of a token, or undefined when it is not a keyword. */
export function keywordOf(token: Token): Keyword | undefined {
  return token.kind === 'KEYWORD' ? KEYWORDS.get(token.text) : undefined;
}
