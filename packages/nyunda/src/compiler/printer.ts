/**
 * Serializes an AST back to Nyunda source text.
 *
 * Binary and unary expressions are always parenthesized, so printing a
 * parsed program and parsing the result yields the same tree.
 *
 * @module compiler/printer
 */

import { KEYWORD_TEXT } from './lexer.js';
import type { ExprNode, ProgramNode, StatementNode } from './ast.js';

const INDENT = '  ';

export function formatExpression(node: ExprNode): string {
  switch (node.kind) {
    case 'number':
      return node.value < 0 || Object.is(node.value, -0)
        ? `(-${String(-node.value)})`
        : String(node.value);
    case 'boolean':
      return node.value ? KEYWORD_TEXT.true : KEYWORD_TEXT.false;
    case 'identifier':
      return node.name;
    case 'binary': {
      const op = node.op === 'and' || node.op === 'or' ? KEYWORD_TEXT[node.op] : node.op;
      return `(${formatExpression(node.left)} ${op} ${formatExpression(node.right)})`;
    }
    case 'unary':
      return node.op === '-'
        ? `(-${formatExpression(node.operand)})`
        : `(${KEYWORD_TEXT.not} ${formatExpression(node.operand)})`;
  }
}

export function formatProgram(program: ProgramNode): string {
  return program.statements.map((stmt) => formatStatement(stmt, 0)).join('\n');
}

function formatStatement(node: StatementNode, level: number): string {
  const pad = INDENT.repeat(level);
  switch (node.kind) {
    case 'assign':
      return `${pad}${node.name} = ${formatExpression(node.value)}`;
    case 'print':
      return `${pad}${KEYWORD_TEXT.print}(${formatExpression(node.argument)})`;
    case 'while':
      return `${pad}${KEYWORD_TEXT.while} ${formatExpression(node.condition)} ${formatBlock(node.body, level)}`;
    case 'if': {
      const head = `${pad}${KEYWORD_TEXT.if} ${formatExpression(node.condition)} ${formatBlock(node.thenBranch, level)}`;
      if (node.elseBranch.length === 0) return head;
      return `${head} ${KEYWORD_TEXT.else} ${formatBlock(node.elseBranch, level)}`;
    }
  }
}

function formatBlock(statements: StatementNode[], level: number): string {
  if (statements.length === 0) return '{}';
  const body = statements.map((stmt) => formatStatement(stmt, level + 1)).join('\n');
  return `{\n${body}\n${INDENT.repeat(level)}}`;
}
