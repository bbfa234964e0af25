/**
 * Stable error taxonomy for the Nyunda pipeline.
 *
 * Every failure the lexer, parser or evaluator raises is a NyundaError
 * whose `kind` is one of the codes below. Kinds are stable and safe to
 * match against in callers that format or report failures.
 *
 * @module compiler/errors
 */

export const ErrorKind = {
  LEX: 'LexError',
  PARSE: 'ParseError',
  ARITHMETIC: 'ArithmeticError',
  UNBOUND_VARIABLE: 'UnboundVariableError',
  TYPE: 'TypeError',
  ITERATION_LIMIT: 'IterationLimitError',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export type ValueKind = 'number' | 'boolean';

export abstract class NyundaError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly pos: number | undefined,
  ) {
    super(pos === undefined ? message : `${message} at position ${pos}`);
  }
}

export class LexError extends NyundaError {
  readonly kind = ErrorKind.LEX;

  constructor(
    public readonly character: string,
    pos: number,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`Unexpected character '${character}' (line ${line}, column ${column})`, pos);
    this.name = 'LexError';
  }
}

export class ParseError extends NyundaError {
  readonly kind = ErrorKind.PARSE;

  constructor(
    public readonly expected: string,
    public readonly found: string,
    pos: number,
  ) {
    super(`Expected ${expected}, got ${found}`, pos);
    this.name = 'ParseError';
  }
}

export class ArithmeticError extends NyundaError {
  readonly kind = ErrorKind.ARITHMETIC;

  constructor(
    public readonly operation: '/' | '%',
    pos: number,
  ) {
    super(operation === '/' ? 'Division by zero' : 'Modulo by zero', pos);
    this.name = 'ArithmeticError';
  }
}

export class UnboundVariableError extends NyundaError {
  readonly kind = ErrorKind.UNBOUND_VARIABLE;

  constructor(
    public readonly variable: string,
    pos: number,
  ) {
    super(`Variable '${variable}' is not defined`, pos);
    this.name = 'UnboundVariableError';
  }
}

/**
 * An operator applied to operand kinds it does not support.
 * Reported with kind `TypeError`; the class name avoids shadowing the global.
 */
export class OperandTypeError extends NyundaError {
  readonly kind = ErrorKind.TYPE;

  constructor(
    public readonly operator: string,
    public readonly operandKinds: readonly ValueKind[],
    pos: number,
  ) {
    super(`Unsupported operand kinds for '${operator}': ${operandKinds.join(', ')}`, pos);
    this.name = 'OperandTypeError';
  }
}

export class IterationLimitError extends NyundaError {
  readonly kind = ErrorKind.ITERATION_LIMIT;

  constructor(
    public readonly limit: number,
    pos: number,
  ) {
    super(`Loop exceeded ${limit} iterations`, pos);
    this.name = 'IterationLimitError';
  }
}

export function isNyundaError(error: unknown): error is NyundaError {
  return error instanceof NyundaError;
}
