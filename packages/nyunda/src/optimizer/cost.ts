/**
 * Static cost model used to rank rewritten programs.
 *
 * The numbers are a proxy for runtime work, not a measurement.
 *
 * @module optimizer/cost
 */

import type { ASTNode, BinaryOp, ExprNode } from '../compiler/ast.js';

export const SMALL_EXPONENT_LIMIT = 8;
export const POWER_WEIGHT_PER_STEP = 4;
export const POWER_FLAT_PENALTY = 40;
export const STATEMENT_WEIGHT = 1;

const OP_WEIGHTS: Record<Exclude<BinaryOp, '**'>, number> = {
  '+': 1,
  '-': 1,
  '==': 1,
  '!=': 1,
  '<': 1,
  '>': 1,
  '<=': 1,
  '>=': 1,
  and: 1,
  or: 1,
  '*': 2,
  '%': 2,
  '/': 3,
};

const UNARY_WEIGHT = 1;

/** Weight of `** exponent`, from the exponent node alone. */
export function powerWeight(exponent: ExprNode): number {
  if (
    exponent.kind === 'number' &&
    Number.isInteger(exponent.value) &&
    exponent.value >= 0 &&
    exponent.value <= SMALL_EXPONENT_LIMIT
  ) {
    return POWER_WEIGHT_PER_STEP * Math.max(1, exponent.value);
  }
  return POWER_FLAT_PENALTY;
}

export function nodeCost(node: ASTNode): number {
  switch (node.kind) {
    case 'number':
    case 'boolean':
    case 'identifier':
      return 0;
    case 'unary':
      return UNARY_WEIGHT + nodeCost(node.operand);
    case 'binary': {
      const weight = node.op === '**' ? powerWeight(node.right) : OP_WEIGHTS[node.op];
      return weight + nodeCost(node.left) + nodeCost(node.right);
    }
    case 'assign':
      return STATEMENT_WEIGHT + nodeCost(node.value);
    case 'print':
      return STATEMENT_WEIGHT + nodeCost(node.argument);
    case 'if':
      return STATEMENT_WEIGHT + nodeCost(node.condition) + sumCost(node.thenBranch) + sumCost(node.elseBranch);
    case 'while':
      return STATEMENT_WEIGHT + nodeCost(node.condition) + sumCost(node.body);
    case 'program':
      return sumCost(node.statements);
  }
}

function sumCost(nodes: ASTNode[]): number {
  let total = 0;
  for (const node of nodes) total += nodeCost(node);
  return total;
}
