/**
 * Nyunda: a small scripting language with Sundanese keywords, a
 * cost-driven AST optimizer and a memoizing evaluator.
 *
 * @module nyunda
 *
 * @example
 * ```typescript
 * import { run } from 'nyunda';
 *
 * const result = run('n = 5\nhasil = 1\nbari n > 0 { hasil = hasil * n\nn = n - 1 }\ncetak(hasil)');
 * // result.output => [120]
 * ```
 */

export * from './compiler/index.js';

export { optimize, neighbors, DEFAULT_MAX_ITERATIONS } from './optimizer/optimizer.js';
export type { OptimizeOptions, OptimizationResult, RewriteCounts } from './optimizer/optimizer.js';
export { nodeCost, powerWeight } from './optimizer/cost.js';
export { RULES, constantFolding, strengthReduction, algebraicIdentity } from './optimizer/rules.js';
export type { RuleName, Rewrite, RewriteRule } from './optimizer/rules.js';

export {
  execute,
  executeIn,
  evaluateExpression,
  createRunContext,
  snapshot,
} from './evaluator/evaluator.js';
export type {
  ExecuteOptions,
  ExecutionResult,
  ExecutionStats,
  RunContext,
} from './evaluator/evaluator.js';
export { MemoTable, freeVariables, exprSignature } from './evaluator/memo.js';
export type { MemoStats } from './evaluator/memo.js';
export { formatValue, isTruthy, valueKind } from './evaluator/operators.js';
export type { Value } from './evaluator/operators.js';

export { run } from './core/pipeline.js';
export type { RunOptions, RunResult } from './core/pipeline.js';

export { DEFAULT_CONFIG, validateConfig, resolveConfig, fromConfigFile } from './config/schema.js';
export type { NyundaConfig, NyundaConfigFile } from './config/schema.js';
export { findConfig, loadConfig, loadConfigFromDirectory, CONFIG_FILES } from './config/loader.js';

export { createLogger, silentLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LogContext } from './utils/logger.js';
