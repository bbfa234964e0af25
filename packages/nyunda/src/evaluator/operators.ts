/**
 * Runtime values and operator semantics, shared by the evaluator and
 * the optimizer's constant folding.
 *
 * @module evaluator/operators
 */

import type { BinaryOp, UnaryOp } from '../compiler/ast.js';
import { ArithmeticError, OperandTypeError, type ValueKind } from '../compiler/errors.js';
import { KEYWORD_TEXT } from '../compiler/lexer.js';

export type Value = number | boolean;

export type StrictBinaryOp = Exclude<BinaryOp, 'and' | 'or'>;

export function valueKind(value: Value): ValueKind {
  return typeof value === 'number' ? 'number' : 'boolean';
}

export function isTruthy(value: Value): boolean {
  return typeof value === 'boolean' ? value : value !== 0;
}

/** Human-readable form used for printed output. */
export function formatValue(value: Value): string {
  if (typeof value === 'boolean') {
    return value ? KEYWORD_TEXT.true : KEYWORD_TEXT.false;
  }
  return String(value);
}

export function applyUnary(op: UnaryOp, operand: Value, pos: number): Value {
  switch (op) {
    case 'not':
      return !isTruthy(operand);
    case '-':
      if (typeof operand !== 'number') {
        throw new OperandTypeError('-', [valueKind(operand)], pos);
      }
      return -operand;
  }
}

/**
 * Apply a non-short-circuiting binary operator. `and`/`or` are handled by
 * the evaluator since they must not evaluate their right operand eagerly.
 */
export function applyBinary(op: StrictBinaryOp, left: Value, right: Value, pos: number): Value {
  switch (op) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
  }

  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new OperandTypeError(op, [valueKind(left), valueKind(right)], pos);
  }

  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) throw new ArithmeticError('/', pos);
      return left / right;
    case '%':
      if (right === 0) throw new ArithmeticError('%', pos);
      return left - right * Math.floor(left / right);
    case '**':
      return left ** right;
    case '<':
      return left < right;
    case '>':
      return left > right;
    case '<=':
      return left <= right;
    case '>=':
      return left >= right;
  }
}
