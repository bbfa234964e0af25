/**
 * Recursive descent parser for Nyunda programs.
 *
 * Grammar:
 *   program    -> statement* EOF
 *   statement  -> ';' | assignment | if | while | print
 *   assignment -> IDENTIFIER '=' expr
 *   if         -> 'upami' expr block ('lamun' expr block)* ('sanes' block)?
 *   while      -> 'bari' expr block
 *   print      -> 'cetak' '(' expr ')'
 *   block      -> '{' statement* '}'
 *   expr       -> or
 *   or         -> and ('atawa' and)*
 *   and        -> cmp ('jeung' cmp)*
 *   cmp        -> add (('==' | '!=' | '<' | '>' | '<=' | '>=') add)*
 *   add        -> mul (('+' | '-') mul)*
 *   mul        -> pow (('*' | '/' | '%') pow)*
 *   pow        -> unary ('**' pow)?
 *   unary      -> ('-' | 'henteu') unary | primary
 *   primary    -> NUMBER | 'leres' | 'palsu' | IDENTIFIER | '(' expr ')'
 *
 * @module compiler/parser
 */

import { ParseError } from './errors.js';
import { keywordOf, KEYWORD_TEXT, type Keyword, type Token } from './lexer.js';
import type {
  BinaryOp,
  ExprNode,
  IfNode,
  ProgramNode,
  StatementNode,
} from './ast.js';

const MAX_DEPTH = 100;

const COMPARISON_OPS: ReadonlySet<string> = new Set(['==', '!=', '<', '>', '<=', '>=']);

export function parse(tokens: Token[]): ProgramNode {
  if (tokens.length === 0 || tokens[tokens.length - 1].kind !== 'EOF') {
    throw new ParseError('token stream ending in EOF', 'no EOF token', 0);
  }

  let cursor = 0;
  let depth = 0;

  function peek(): Token {
    return tokens[cursor];
  }

  function advance(): Token {
    const tok = tokens[cursor];
    if (tok.kind !== 'EOF') cursor++;
    return tok;
  }

  function describe(tok: Token): string {
    return tok.kind === 'EOF' ? 'end of input' : `'${tok.text}'`;
  }

  function fail(expected: string, tok: Token = peek()): never {
    throw new ParseError(expected, describe(tok), tok.pos);
  }

  function isSymbol(text: string): boolean {
    const tok = peek();
    return (tok.kind === 'SYMBOL' || tok.kind === 'OPERATOR') && tok.text === text;
  }

  function isKeyword(keyword: Keyword): boolean {
    return keywordOf(peek()) === keyword;
  }

  function expectSymbol(text: string): Token {
    if (!isSymbol(text)) fail(`'${text}'`);
    return advance();
  }

  function expectKeyword(keyword: Keyword): Token {
    if (!isKeyword(keyword)) fail(`'${KEYWORD_TEXT[keyword]}'`);
    return advance();
  }

  function deeper(): void {
    depth++;
    if (depth > MAX_DEPTH) {
      throw new ParseError(`nesting of at most ${MAX_DEPTH} levels`, 'deeper nesting', peek().pos);
    }
  }

  function nested<T>(fn: () => T): T {
    deeper();
    const result = fn();
    depth--;
    return result;
  }

  function program(): ProgramNode {
    const statements: StatementNode[] = [];
    while (peek().kind !== 'EOF') {
      const stmt = statement();
      if (stmt) statements.push(stmt);
    }
    return { kind: 'program', statements };
  }

  function statement(): StatementNode | null {
    const tok = peek();

    if (isSymbol(';')) {
      advance();
      return null;
    }

    if (tok.kind === 'IDENTIFIER') {
      return assignment();
    }

    switch (keywordOf(tok)) {
      case 'if':
        return ifStatement();
      case 'while':
        return whileStatement();
      case 'print':
        return printStatement();
      default:
        return fail('statement');
    }
  }

  function assignment(): StatementNode {
    const name = advance();
    expectSymbol('=');
    const value = expr();
    return { kind: 'assign', name: name.text, value, pos: name.pos };
  }

  function ifStatement(): IfNode {
    const start = advance();
    const condition = expr();
    const thenBranch = block();
    let elseBranch: StatementNode[] = [];

    if (isKeyword('elif')) {
      elseBranch = [ifStatement()];
    } else if (isKeyword('else')) {
      advance();
      elseBranch = block();
    }

    return { kind: 'if', condition, thenBranch, elseBranch, pos: start.pos };
  }

  function whileStatement(): StatementNode {
    const start = expectKeyword('while');
    const condition = expr();
    const body = block();
    return { kind: 'while', condition, body, pos: start.pos };
  }

  function printStatement(): StatementNode {
    const start = expectKeyword('print');
    expectSymbol('(');
    const argument = expr();
    expectSymbol(')');
    return { kind: 'print', argument, pos: start.pos };
  }

  function block(): StatementNode[] {
    return nested(() => {
      expectSymbol('{');
      const statements: StatementNode[] = [];
      while (!isSymbol('}')) {
        if (peek().kind === 'EOF') fail("'}'");
        const stmt = statement();
        if (stmt) statements.push(stmt);
      }
      advance();
      return statements;
    });
  }

  function expr(): ExprNode {
    return nested(orExpr);
  }

  // Each link of a left-associative chain deepens the tree by one level.
  function orExpr(): ExprNode {
    const outer = depth;
    let left = andExpr();
    while (isKeyword('or')) {
      deeper();
      const tok = advance();
      const right = andExpr();
      left = { kind: 'binary', op: 'or', left, right, pos: tok.pos };
    }
    depth = outer;
    return left;
  }

  function andExpr(): ExprNode {
    const outer = depth;
    let left = cmpExpr();
    while (isKeyword('and')) {
      deeper();
      const tok = advance();
      const right = cmpExpr();
      left = { kind: 'binary', op: 'and', left, right, pos: tok.pos };
    }
    depth = outer;
    return left;
  }

  function binaryLevel(ops: ReadonlySet<string>, next: () => ExprNode): ExprNode {
    const outer = depth;
    let left = next();
    while (peek().kind === 'OPERATOR' && ops.has(peek().text)) {
      deeper();
      const tok = advance();
      const right = next();
      left = { kind: 'binary', op: toBinaryOp(tok), left, right, pos: tok.pos };
    }
    depth = outer;
    return left;
  }

  function cmpExpr(): ExprNode {
    return binaryLevel(COMPARISON_OPS, addExpr);
  }

  function addExpr(): ExprNode {
    return binaryLevel(ADDITIVE_OPS, mulExpr);
  }

  function mulExpr(): ExprNode {
    return binaryLevel(MULTIPLICATIVE_OPS, powExpr);
  }

  function powExpr(): ExprNode {
    const base = unary();
    if (isSymbol('**')) {
      const tok = advance();
      const exponent = nested(powExpr);
      return { kind: 'binary', op: '**', left: base, right: exponent, pos: tok.pos };
    }
    return base;
  }

  function unary(): ExprNode {
    if (isSymbol('-')) {
      const tok = advance();
      const operand = nested(unary);
      return { kind: 'unary', op: '-', operand, pos: tok.pos };
    }
    if (isKeyword('not')) {
      const tok = advance();
      const operand = nested(unary);
      return { kind: 'unary', op: 'not', operand, pos: tok.pos };
    }
    return primary();
  }

  function primary(): ExprNode {
    const tok = peek();

    if (tok.kind === 'NUMBER') {
      advance();
      return { kind: 'number', value: Number(tok.text), pos: tok.pos };
    }

    if (tok.kind === 'IDENTIFIER') {
      advance();
      return { kind: 'identifier', name: tok.text, pos: tok.pos };
    }

    const keyword = keywordOf(tok);
    if (keyword === 'true' || keyword === 'false') {
      advance();
      return { kind: 'boolean', value: keyword === 'true', pos: tok.pos };
    }

    if (isSymbol('(')) {
      advance();
      const node = expr();
      expectSymbol(')');
      return node;
    }

    return fail('expression');
  }

  return program();
}

const ADDITIVE_OPS: ReadonlySet<string> = new Set(['+', '-']);
const MULTIPLICATIVE_OPS: ReadonlySet<string> = new Set(['*', '/', '%']);

function toBinaryOp(tok: Token): BinaryOp {
  const text = tok.text;
  switch (text) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
    case '**':
    case '==':
    case '!=':
    case '<':
    case '>':
    case '<=':
    case '>=':
      return text;
    default:
      throw new ParseError('binary operator', `'${tok.text}'`, tok.pos);
  }
}
