/**
 * Front end of the Nyunda pipeline: source text to Program AST.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { compile, formatProgram } from 'nyunda/compiler';
 *
 * const program = compile('x = 3\ncetak(x * 1 + 0)');
 * formatProgram(program);
 * // "x = 3\ncetak(((x * 1) + 0))"
 * ```
 */

export { tokenize, keywordOf, KEYWORDS, KEYWORD_TEXT } from './lexer.js';
export type { Token, TokenKind, Keyword } from './lexer.js';

export { parse } from './parser.js';

export { formatProgram, formatExpression } from './printer.js';

export {
  ErrorKind,
  NyundaError,
  LexError,
  ParseError,
  ArithmeticError,
  UnboundVariableError,
  OperandTypeError,
  IterationLimitError,
  isNyundaError,
} from './errors.js';
export type { ValueKind } from './errors.js';

export { astDepth, signature, fingerprint, cloneExpr } from './ast.js';
export type {
  ASTNode,
  ExprNode,
  StatementNode,
  ProgramNode,
  NumberNode,
  BooleanNode,
  IdentifierNode,
  BinaryNode,
  UnaryNode,
  AssignNode,
  IfNode,
  WhileNode,
  PrintNode,
  BinaryOp,
  UnaryOp,
  ArithmeticOp,
  ComparisonOp,
  LogicalOp,
} from './ast.js';

import { tokenize } from './lexer.js';
import { parse } from './parser.js';
import type { ProgramNode } from './ast.js';

/**
 * Compile Nyunda source text into a Program AST.
 */
export function compile(source: string): ProgramNode {
  const tokens = tokenize(source);
  return parse(tokens);
}
