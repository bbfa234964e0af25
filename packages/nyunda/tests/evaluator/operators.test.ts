import { describe, it, expect } from 'vitest';
import { ArithmeticError, OperandTypeError } from '../../src/compiler/errors.js';
import {
  applyBinary,
  applyUnary,
  formatValue,
  isTruthy,
  valueKind,
} from '../../src/evaluator/operators.js';

describe('operators', () => {
  it('should treat zero and palsu as falsy', () => {
    expect(isTruthy(0)).toBe(false);
    expect(isTruthy(-0.5)).toBe(true);
    expect(isTruthy(false)).toBe(false);
    expect(isTruthy(true)).toBe(true);
  });

  it('should format values for output', () => {
    expect(formatValue(true)).toBe('leres');
    expect(formatValue(false)).toBe('palsu');
    expect(formatValue(2.5)).toBe('2.5');
  });

  it('should name value kinds', () => {
    expect(valueKind(1)).toBe('number');
    expect(valueKind(false)).toBe('boolean');
  });

  it('should apply arithmetic operators', () => {
    expect(applyBinary('+', 2, 3, 0)).toBe(5);
    expect(applyBinary('-', 2, 3, 0)).toBe(-1);
    expect(applyBinary('*', 2, 3, 0)).toBe(6);
    expect(applyBinary('/', 3, 2, 0)).toBe(1.5);
    expect(applyBinary('**', 2, 3, 0)).toBe(8);
    expect(applyBinary('%', -1, 4, 0)).toBe(3);
  });

  it('should apply comparisons', () => {
    expect(applyBinary('<=', 2, 2, 0)).toBe(true);
    expect(applyBinary('>', 2, 2, 0)).toBe(false);
    expect(applyBinary('==', true, true, 0)).toBe(true);
    expect(applyBinary('!=', 1, true, 0)).toBe(true);
  });

  it('should reject ordering comparisons on booleans', () => {
    expect(() => applyBinary('<', true, 1, 3)).toThrow(OperandTypeError);
  });

  it('should reject a zero divisor', () => {
    expect(() => applyBinary('/', 1, 0, 5)).toThrow(ArithmeticError);
    expect(() => applyBinary('%', 1, 0, 5)).toThrow('Modulo by zero at position 5');
  });

  it('should apply unary operators', () => {
    expect(applyUnary('-', 4, 0)).toBe(-4);
    expect(applyUnary('not', 4, 0)).toBe(false);
    expect(() => applyUnary('-', true, 7)).toThrow("Unsupported operand kinds for '-': boolean at position 7");
  });
});
