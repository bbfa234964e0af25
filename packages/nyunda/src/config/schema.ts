// src/config/schema.ts
// Pipeline configuration and validation

import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { DEFAULT_MAX_ITERATIONS } from '../optimizer/optimizer.js';

export interface NyundaConfig {
  /** Run the optimizer before evaluation. */
  optimize: boolean;
  /** Enable the evaluator's memo table. */
  memoize: boolean;
  maxOptimizerIterations: number;
  /** Ceiling on iterations of a single loop; undefined means unbounded. */
  maxLoopIterations?: number;
  logLevel: LogLevel;
}

/**
 * Shape of a config file. Keys are snake_case, like other YAML config.
 */
export interface NyundaConfigFile {
  optimize?: boolean;
  memoize?: boolean;
  max_optimizer_iterations?: number;
  max_loop_iterations?: number;
  log_level?: LogLevel;
}

/**
 * Default settings
 */
export const DEFAULT_CONFIG: NyundaConfig = {
  optimize: true,
  memoize: true,
  maxOptimizerIterations: DEFAULT_MAX_ITERATIONS,
  logLevel: 'silent',
};

function isNonNegativeInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a parsed config file object
 */
export function validateConfig(config: unknown): config is NyundaConfigFile {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    return false;
  }

  const c = config as Record<string, unknown>;

  if (c.optimize !== undefined && typeof c.optimize !== 'boolean') {
    return false;
  }

  if (c.memoize !== undefined && typeof c.memoize !== 'boolean') {
    return false;
  }

  if (c.max_optimizer_iterations !== undefined && !isNonNegativeInteger(c.max_optimizer_iterations)) {
    return false;
  }

  if (c.max_loop_iterations !== undefined && !isNonNegativeInteger(c.max_loop_iterations)) {
    return false;
  }

  if (c.log_level !== undefined && !isLogLevel(c.log_level)) {
    return false;
  }

  return true;
}

/**
 * Map a validated config file onto pipeline options.
 */
export function fromConfigFile(file: NyundaConfigFile): Partial<NyundaConfig> {
  const config: Partial<NyundaConfig> = {};
  if (file.optimize !== undefined) config.optimize = file.optimize;
  if (file.memoize !== undefined) config.memoize = file.memoize;
  if (file.max_optimizer_iterations !== undefined) {
    config.maxOptimizerIterations = file.max_optimizer_iterations;
  }
  if (file.max_loop_iterations !== undefined) config.maxLoopIterations = file.max_loop_iterations;
  if (file.log_level !== undefined) config.logLevel = file.log_level;
  return config;
}

/**
 * Fill in defaults for any option the caller left out.
 */
export function resolveConfig(partial: Partial<NyundaConfig> = {}): NyundaConfig {
  return {
    optimize: partial.optimize ?? DEFAULT_CONFIG.optimize,
    memoize: partial.memoize ?? DEFAULT_CONFIG.memoize,
    maxOptimizerIterations: partial.maxOptimizerIterations ?? DEFAULT_CONFIG.maxOptimizerIterations,
    maxLoopIterations: partial.maxLoopIterations ?? DEFAULT_CONFIG.maxLoopIterations,
    logLevel: partial.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}
