/**
 * Tree-walking evaluator for Nyunda programs, with optional memoization
 * of expression results.
 *
 * All mutable run state lives in a RunContext that is created per call
 * and passed explicitly, so independent runs never share anything.
 *
 * @module evaluator/evaluator
 */

import type { ExprNode, ProgramNode, StatementNode, WhileNode } from '../compiler/ast.js';
import { IterationLimitError, UnboundVariableError } from '../compiler/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { MemoTable } from './memo.js';
import { applyBinary, applyUnary, formatValue, isTruthy, type Value } from './operators.js';

export interface ExecuteOptions {
  /** Cache expression results keyed by structure and free-variable values. Default true. */
  memoize?: boolean;
  /** Fail a `bari` loop that runs more than this many iterations. Off when unset. */
  maxLoopIterations?: number;
  /** Initial variable bindings. */
  environment?: Record<string, Value>;
  /** Called with each printed value as it is produced. */
  onPrint?: (value: Value) => void;
  logger?: Logger;
}

export interface ExecutionStats {
  statementsExecuted: number;
  memoHits: number;
  memoMisses: number;
  memoInvalidations: number;
  memoEntries: number;
}

export interface ExecutionResult {
  output: Value[];
  environment: Record<string, Value>;
  stats: ExecutionStats;
}

export interface RunContext {
  readonly environment: Map<string, Value>;
  readonly memo: MemoTable | null;
  readonly output: Value[];
  readonly maxLoopIterations: number | undefined;
  readonly onPrint: ((value: Value) => void) | undefined;
  readonly logger: Logger;
  statementsExecuted: number;
}

export function createRunContext(options: ExecuteOptions = {}): RunContext {
  return {
    environment: new Map(Object.entries(options.environment ?? {})),
    memo: options.memoize === false ? null : new MemoTable(),
    output: [],
    maxLoopIterations: options.maxLoopIterations,
    onPrint: options.onPrint,
    logger: options.logger ?? silentLogger,
    statementsExecuted: 0,
  };
}

/**
 * Run a program to completion. Runtime failures propagate as
 * NyundaError; use {@link executeIn} with your own context to keep the
 * output printed before a failure.
 */
export function execute(program: ProgramNode, options: ExecuteOptions = {}): ExecutionResult {
  const ctx = createRunContext(options);
  executeIn(program, ctx);
  return snapshot(ctx);
}

export function executeIn(program: ProgramNode, ctx: RunContext): void {
  executeBlock(program.statements, ctx);
}

export function snapshot(ctx: RunContext): ExecutionResult {
  const memoStats = ctx.memo?.getStats();
  return {
    output: [...ctx.output],
    environment: Object.fromEntries(ctx.environment),
    stats: {
      statementsExecuted: ctx.statementsExecuted,
      memoHits: memoStats?.hits ?? 0,
      memoMisses: memoStats?.misses ?? 0,
      memoInvalidations: memoStats?.invalidations ?? 0,
      memoEntries: memoStats?.entries ?? 0,
    },
  };
}

/** Evaluate a single expression against the given bindings. */
export function evaluateExpression(
  node: ExprNode,
  environment: Record<string, Value> = {},
  options: Pick<ExecuteOptions, 'memoize'> = {},
): Value {
  return evalExpr(node, createRunContext({ ...options, environment }));
}

function executeBlock(statements: StatementNode[], ctx: RunContext): void {
  for (const stmt of statements) {
    executeStatement(stmt, ctx);
  }
}

function executeStatement(stmt: StatementNode, ctx: RunContext): void {
  ctx.statementsExecuted++;

  switch (stmt.kind) {
    case 'assign': {
      const value = evalExpr(stmt.value, ctx);
      ctx.environment.set(stmt.name, value);
      // any cached result may have read the old binding
      ctx.memo?.clear();
      return;
    }

    case 'if':
      if (isTruthy(evalExpr(stmt.condition, ctx))) {
        executeBlock(stmt.thenBranch, ctx);
      } else {
        executeBlock(stmt.elseBranch, ctx);
      }
      return;

    case 'while':
      executeWhile(stmt, ctx);
      return;

    case 'print': {
      const value = evalExpr(stmt.argument, ctx);
      ctx.output.push(value);
      ctx.logger.debug('Printed value', { value: formatValue(value) });
      ctx.onPrint?.(value);
      return;
    }
  }
}

function executeWhile(stmt: WhileNode, ctx: RunContext): void {
  let iterations = 0;
  while (isTruthy(evalExpr(stmt.condition, ctx))) {
    if (ctx.maxLoopIterations !== undefined && iterations >= ctx.maxLoopIterations) {
      throw new IterationLimitError(ctx.maxLoopIterations, stmt.pos);
    }
    iterations++;
    executeBlock(stmt.body, ctx);
  }
}

function evalExpr(node: ExprNode, ctx: RunContext): Value {
  const memo = ctx.memo;
  if (memo === null) return evalNode(node, ctx);

  const key = memo.key(node, ctx.environment);
  const cached = memo.get(key);
  if (cached !== undefined) return cached;

  const value = evalNode(node, ctx);
  memo.set(key, value);
  return value;
}

function evalNode(node: ExprNode, ctx: RunContext): Value {
  switch (node.kind) {
    case 'number':
    case 'boolean':
      return node.value;

    case 'identifier': {
      const value = ctx.environment.get(node.name);
      if (value === undefined) {
        throw new UnboundVariableError(node.name, node.pos);
      }
      return value;
    }

    case 'unary':
      return applyUnary(node.op, evalExpr(node.operand, ctx), node.pos);

    case 'binary': {
      const op = node.op;
      // Short-circuit for logical operators
      if (op === 'and') {
        const left = evalExpr(node.left, ctx);
        return isTruthy(left) ? evalExpr(node.right, ctx) : left;
      }
      if (op === 'or') {
        const left = evalExpr(node.left, ctx);
        return isTruthy(left) ? left : evalExpr(node.right, ctx);
      }
      const left = evalExpr(node.left, ctx);
      const right = evalExpr(node.right, ctx);
      return applyBinary(op, left, right, node.pos);
    }
  }
}
