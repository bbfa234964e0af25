/**
 * AST node types for Nyunda programs.
 *
 * @module compiler/ast
 */

import { createHash } from 'node:crypto';

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%' | '**';

export type ComparisonOp = '==' | '!=' | '>' | '<' | '>=' | '<=';

export type LogicalOp = 'and' | 'or';

export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

export type UnaryOp = '-' | 'not';

export interface NumberNode {
  kind: 'number';
  value: number;
  pos: number;
}

export interface BooleanNode {
  kind: 'boolean';
  value: boolean;
  pos: number;
}

export interface IdentifierNode {
  kind: 'identifier';
  name: string;
  pos: number;
}

export interface BinaryNode {
  kind: 'binary';
  op: BinaryOp;
  left: ExprNode;
  right: ExprNode;
  pos: number;
}

export interface UnaryNode {
  kind: 'unary';
  op: UnaryOp;
  operand: ExprNode;
  pos: number;
}

export type ExprNode =
  | NumberNode
  | BooleanNode
  | IdentifierNode
  | BinaryNode
  | UnaryNode;

export interface AssignNode {
  kind: 'assign';
  name: string;
  value: ExprNode;
  pos: number;
}

export interface IfNode {
  kind: 'if';
  condition: ExprNode;
  thenBranch: StatementNode[];
  elseBranch: StatementNode[];
  pos: number;
}

export interface WhileNode {
  kind: 'while';
  condition: ExprNode;
  body: StatementNode[];
  pos: number;
}

export interface PrintNode {
  kind: 'print';
  argument: ExprNode;
  pos: number;
}

export type StatementNode = AssignNode | IfNode | WhileNode | PrintNode;

export interface ProgramNode {
  kind: 'program';
  statements: StatementNode[];
}

export type ASTNode = ExprNode | StatementNode | ProgramNode;

/**
 * Canonical structural encoding of a node. Positions are left out, so two
 * trees that differ only in where they came from share a signature.
 */
export function signature(node: ASTNode): string {
  switch (node.kind) {
    case 'number':
      return Object.is(node.value, -0) ? '-0' : String(node.value);
    case 'boolean':
      return node.value ? '#t' : '#f';
    case 'identifier':
      return `$${node.name}`;
    case 'binary':
      return `(${node.op} ${signature(node.left)} ${signature(node.right)})`;
    case 'unary':
      return `(${node.op === '-' ? 'neg' : 'not'} ${signature(node.operand)})`;
    case 'assign':
      return `(= $${node.name} ${signature(node.value)})`;
    case 'if':
      return `(if ${signature(node.condition)} ${block(node.thenBranch)} ${block(node.elseBranch)})`;
    case 'while':
      return `(while ${signature(node.condition)} ${block(node.body)})`;
    case 'print':
      return `(print ${signature(node.argument)})`;
    case 'program':
      return block(node.statements);
  }
}

function block(statements: StatementNode[]): string {
  return `[${statements.map(signature).join(' ')}]`;
}

/** Short digest of a node's signature, used as a visited-set key. */
export function fingerprint(node: ASTNode): string {
  return createHash('sha256').update(signature(node)).digest('hex').slice(0, 32);
}

/** Deep copy of an expression, so a subtree can appear twice without sharing. */
export function cloneExpr(node: ExprNode): ExprNode {
  switch (node.kind) {
    case 'number':
    case 'boolean':
    case 'identifier':
      return { ...node };
    case 'binary':
      return { ...node, left: cloneExpr(node.left), right: cloneExpr(node.right) };
    case 'unary':
      return { ...node, operand: cloneExpr(node.operand) };
  }
}

/**
 * Compute the depth of an AST tree.
 */
export function astDepth(node: ASTNode): number {
  switch (node.kind) {
    case 'number':
    case 'boolean':
    case 'identifier':
      return 1;
    case 'unary':
      return 1 + astDepth(node.operand);
    case 'binary':
      return 1 + Math.max(astDepth(node.left), astDepth(node.right));
    case 'assign':
      return 1 + astDepth(node.value);
    case 'print':
      return 1 + astDepth(node.argument);
    case 'if':
      return 1 + Math.max(
        astDepth(node.condition),
        blockDepth(node.thenBranch),
        blockDepth(node.elseBranch),
      );
    case 'while':
      return 1 + Math.max(astDepth(node.condition), blockDepth(node.body));
    case 'program':
      return 1 + blockDepth(node.statements);
  }
}

function blockDepth(statements: StatementNode[]): number {
  let depth = 0;
  for (const stmt of statements) depth = Math.max(depth, astDepth(stmt));
  return depth;
}
