import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  fromConfigFile,
  resolveConfig,
  validateConfig,
} from '../../src/config/schema.js';

describe('validateConfig', () => {
  it('should accept an empty object', () => {
    expect(validateConfig({})).toBe(true);
  });

  it('should accept every known key', () => {
    expect(
      validateConfig({
        optimize: false,
        memoize: true,
        max_optimizer_iterations: 50,
        max_loop_iterations: 0,
        log_level: 'debug',
      }),
    ).toBe(true);
  });

  it.each([
    ['a non-object', 'optimize'],
    ['an array', []],
    ['null', null],
    ['a non-boolean optimize flag', { optimize: 'yes' }],
    ['a non-boolean memoize flag', { memoize: 1 }],
    ['a negative iteration budget', { max_optimizer_iterations: -1 }],
    ['a fractional loop limit', { max_loop_iterations: 2.5 }],
    ['an unknown log level', { log_level: 'verbose' }],
  ])('should reject %s', (_label, value) => {
    expect(validateConfig(value)).toBe(false);
  });
});

describe('fromConfigFile', () => {
  it('should map snake_case keys onto options', () => {
    expect(
      fromConfigFile({ max_optimizer_iterations: 10, max_loop_iterations: 5, log_level: 'warn' }),
    ).toEqual({ maxOptimizerIterations: 10, maxLoopIterations: 5, logLevel: 'warn' });
  });

  it('should leave out keys the file omits', () => {
    expect(fromConfigFile({})).toEqual({});
  });
});

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig().maxLoopIterations).toBeUndefined();
  });

  it('should keep explicit values, including false', () => {
    expect(resolveConfig({ optimize: false, maxLoopIterations: 3 })).toEqual({
      optimize: false,
      memoize: true,
      maxOptimizerIterations: 1000,
      maxLoopIterations: 3,
      logLevel: 'silent',
    });
  });
});
