/**
 * End-to-end pipeline: lex, parse, optimize, execute.
 *
 * @module core/pipeline
 */

import { astDepth, type ProgramNode } from '../compiler/ast.js';
import { isNyundaError, type NyundaError } from '../compiler/errors.js';
import { tokenize } from '../compiler/lexer.js';
import { parse } from '../compiler/parser.js';
import { resolveConfig, type NyundaConfig } from '../config/schema.js';
import {
  createRunContext,
  executeIn,
  snapshot,
  type ExecutionStats,
} from '../evaluator/evaluator.js';
import type { Value } from '../evaluator/operators.js';
import { optimize, type OptimizationResult } from '../optimizer/optimizer.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface RunOptions extends Partial<NyundaConfig> {
  onPrint?: (value: Value) => void;
  logger?: Logger;
}

export interface RunResult {
  success: boolean;
  /** Values printed in execution order, including those before a failure. */
  output: Value[];
  environment: Record<string, Value>;
  error?: NyundaError;
  /** Program as executed (after optimization, when enabled). */
  program?: ProgramNode;
  optimization?: OptimizationResult;
  execution?: ExecutionStats;
}

export function run(source: string, options: RunOptions = {}): RunResult {
  const config = resolveConfig(options);
  const logger = options.logger ?? createLogger(config.logLevel);

  let program: ProgramNode;
  try {
    const tokens = tokenize(source);
    logger.debug('Tokenized source', { tokens: tokens.length });
    program = parse(tokens);
    logger.debug('Parsed program', {
      statements: program.statements.length,
      depth: astDepth(program),
    });
  } catch (err) {
    if (!isNyundaError(err)) throw err;
    logger.warn('Compilation failed', { kind: err.kind, pos: err.pos });
    return { success: false, output: [], environment: {}, error: err };
  }

  let optimization: OptimizationResult | undefined;
  if (config.optimize) {
    optimization = optimize(program, { maxIterations: config.maxOptimizerIterations, logger });
    program = optimization.program;
    logger.debug('Optimized program', {
      initialCost: optimization.initialCost,
      finalCost: optimization.finalCost,
      statesExplored: optimization.statesExplored,
    });
  }

  const ctx = createRunContext({
    memoize: config.memoize,
    maxLoopIterations: config.maxLoopIterations,
    onPrint: options.onPrint,
    logger,
  });

  try {
    executeIn(program, ctx);
  } catch (err) {
    if (!isNyundaError(err)) throw err;
    logger.warn('Execution failed', { kind: err.kind, pos: err.pos });
    const partial = snapshot(ctx);
    return {
      success: false,
      output: partial.output,
      environment: partial.environment,
      error: err,
      program,
      optimization,
      execution: partial.stats,
    };
  }

  const result = snapshot(ctx);
  logger.debug('Execution finished', { ...result.stats });
  return {
    success: true,
    output: result.output,
    environment: result.environment,
    program,
    optimization,
    execution: result.stats,
  };
}
