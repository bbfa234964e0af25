/**
 * Local rewrite rules over expression nodes.
 *
 * Each rule looks at a single node and either returns a replacement or
 * null. Rules never recurse; the optimizer decides where to apply them.
 * Order in RULES is the tie-break order used by the search.
 *
 * @module optimizer/rules
 */

import { cloneExpr, type ExprNode } from '../compiler/ast.js';
import { applyBinary, applyUnary, type Value } from '../evaluator/operators.js';

export type RuleName = 'constantFolding' | 'strengthReduction' | 'algebraicIdentity';

export interface Rewrite {
  node: ExprNode;
  /** Short tag naming the specific transformation, e.g. `mul_one`. */
  detail: string;
}

export interface RewriteRule {
  name: RuleName;
  apply(node: ExprNode): Rewrite | null;
}

function isNumber(node: ExprNode, value?: number): boolean {
  return node.kind === 'number' && (value === undefined || node.value === value);
}

const BOOLEAN_OPS: ReadonlySet<string> = new Set(['==', '!=', '<', '>', '<=', '>=', 'and', 'or']);

/** Nodes whose value is (or may be) a boolean, which arithmetic rejects. */
function isBooleanValued(node: ExprNode): boolean {
  switch (node.kind) {
    case 'boolean':
      return true;
    case 'unary':
      return node.op === 'not';
    case 'binary':
      return BOOLEAN_OPS.has(node.op);
    default:
      return false;
  }
}

function literal(value: Value, pos: number): ExprNode {
  return typeof value === 'number'
    ? { kind: 'number', value, pos }
    : { kind: 'boolean', value, pos };
}

export const constantFolding: RewriteRule = {
  name: 'constantFolding',
  apply(node) {
    if (node.kind === 'unary') {
      const operand = node.operand;
      if (operand.kind !== 'number' && operand.kind !== 'boolean') return null;
      // `-` on a boolean is a runtime error; leave it for the evaluator
      if (node.op === '-' && operand.kind !== 'number') return null;
      return { node: literal(applyUnary(node.op, operand.value, node.pos), node.pos), detail: 'fold' };
    }

    if (node.kind !== 'binary') return null;
    const { op, left, right } = node;
    if (op === 'and' || op === 'or') return null;
    if (left.kind !== 'number' || right.kind !== 'number') return null;
    if ((op === '/' || op === '%') && right.value === 0) return null;

    const result = applyBinary(op, left.value, right.value, node.pos);
    if (typeof result === 'number' && !Number.isFinite(result)) return null;
    return { node: literal(result, node.pos), detail: 'fold' };
  },
};

export const strengthReduction: RewriteRule = {
  name: 'strengthReduction',
  apply(node) {
    if (node.kind !== 'binary' || node.op !== '**' || !isNumber(node.right, 2)) return null;
    return {
      node: { kind: 'binary', op: '*', left: node.left, right: cloneExpr(node.left), pos: node.pos },
      detail: 'power_to_multiply',
    };
  },
};

export const algebraicIdentity: RewriteRule = {
  name: 'algebraicIdentity',
  apply(node) {
    if (node.kind !== 'binary') return null;
    const { op, left, right } = node;
    // arithmetic on a boolean is a TypeError at runtime; keep it
    if (isBooleanValued(left) || isBooleanValued(right)) return null;

    switch (op) {
      case '*':
        if (isNumber(right, 1)) return { node: left, detail: 'mul_one' };
        if (isNumber(left, 1)) return { node: right, detail: 'mul_one' };
        if (isNumber(right, 0) || isNumber(left, 0)) {
          return { node: { kind: 'number', value: 0, pos: node.pos }, detail: 'mul_zero' };
        }
        return null;
      case '+':
        if (isNumber(right, 0)) return { node: left, detail: 'add_zero' };
        if (isNumber(left, 0)) return { node: right, detail: 'add_zero' };
        return null;
      case '-':
        return isNumber(right, 0) ? { node: left, detail: 'sub_zero' } : null;
      case '/':
        return isNumber(right, 1) ? { node: left, detail: 'div_one' } : null;
      default:
        return null;
    }
  },
};

export const RULES: readonly RewriteRule[] = [constantFolding, strengthReduction, algebraicIdentity];
