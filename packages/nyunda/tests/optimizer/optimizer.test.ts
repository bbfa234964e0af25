import { describe, it, expect, vi } from 'vitest';
import { compile } from '../../src/compiler/index.js';
import { signature } from '../../src/compiler/ast.js';
import { optimize } from '../../src/optimizer/optimizer.js';
import { nodeCost } from '../../src/optimizer/cost.js';

describe('optimize', () => {
  it('should simplify x * 1 + 0 down to x', () => {
    const result = optimize(compile('x = 3\ncetak(x * 1 + 0)'));

    expect(signature(result.program)).toBe('[(= $x 3) (print $x)]');
    expect(result.initialCost).toBe(5);
    expect(result.finalCost).toBe(2);
    expect(result.transformations).toEqual([
      'algebraicIdentity:mul_one',
      'algebraicIdentity:add_zero',
    ]);
    expect(result.rewrites).toEqual({
      constantFolding: 0,
      strengthReduction: 0,
      algebraicIdentity: 2,
    });
    expect(result.statesExplored).toBe(3);
  });

  it('should reduce x ** 2 to a multiplication without sharing nodes', () => {
    const result = optimize(compile('cetak(y ** 2)'));

    expect(signature(result.program)).toBe('[(print (* $y $y))]');
    expect(result.initialCost).toBe(9);
    expect(result.finalCost).toBe(3);
    expect(result.rewrites.strengthReduction).toBe(1);

    const stmt = result.program.statements[0];
    if (stmt.kind !== 'print' || stmt.argument.kind !== 'binary') {
      throw new Error('expected print of a binary expression');
    }
    expect(stmt.argument.left).not.toBe(stmt.argument.right);
  });

  it('should fold constants repeatedly', () => {
    const result = optimize(compile('cetak(2 ** 3 + 1)'));

    expect(signature(result.program)).toBe('[(print 9)]');
    expect(result.initialCost).toBe(14);
    expect(result.finalCost).toBe(1);
    expect(result.rewrites.constantFolding).toBe(2);
  });

  it('should fold comparisons into boolean literals', () => {
    const result = optimize(compile('upami 1 < 2 { cetak(1) }'));
    expect(signature(result.program)).toBe('[(if #t [(print 1)] [])]');
  });

  it('should fold negated literals', () => {
    const result = optimize(compile('x = -(2 - 5)'));
    expect(signature(result.program)).toBe('[(= $x 3)]');
  });

  it('should not fold division or modulo by zero', () => {
    const div = optimize(compile('cetak(4 / 0)'));
    expect(signature(div.program)).toBe('[(print (/ 4 0))]');
    expect(div.transformations).toEqual([]);

    const mod = optimize(compile('cetak(4 % 0)'));
    expect(signature(mod.program)).toBe('[(print (% 4 0))]');
  });

  it('should apply multiplication by zero', () => {
    const result = optimize(compile('cetak(x * 0)'));
    expect(signature(result.program)).toBe('[(print 0)]');
    expect(result.transformations).toEqual(['algebraicIdentity:mul_zero']);
  });

  it('should rewrite inside loop bodies and conditions', () => {
    const result = optimize(compile('bari n > 0 + 0 { n = n - 0\ncetak(n / 1) }'));
    expect(signature(result.program)).toBe('[(while (> $n 0) [(= $n $n) (print $n)])]');
  });

  it('should rewrite inside both branches of an if', () => {
    const result = optimize(compile('upami c { a = 1 * a } sanes { b = 0 + b }'));
    expect(signature(result.program)).toBe('[(if $c [(= $a $a)] [(= $b $b)])]');
  });

  it('should break cost ties by rule order', () => {
    const result = optimize(compile('cetak((x + 0) + (1 + 1))'));

    expect(result.transformations).toEqual([
      'constantFolding:fold',
      'algebraicIdentity:add_zero',
    ]);
    expect(signature(result.program)).toBe('[(print (+ $x 2))]');
  });

  it('should break cost ties by leftmost node position', () => {
    const result = optimize(compile('cetak((x * 1) + (y * 1))'), { maxIterations: 2 });

    expect(result.statesExplored).toBe(2);
    expect(signature(result.program)).toBe('[(print (+ $x (* $y 1)))]');
  });

  it('should return the input unchanged with no iteration budget', () => {
    const program = compile('cetak(1 + 2)');
    const result = optimize(program, { maxIterations: 0 });

    expect(result.program).toBe(program);
    expect(result.statesExplored).toBe(0);
    expect(result.finalCost).toBe(result.initialCost);
  });

  it('should leave programs without applicable rules alone', () => {
    const program = compile('x = a ** 3 - b');
    const result = optimize(program);

    expect(result.program).toBe(program);
    expect(result.statesExplored).toBe(1);
    expect(result.transformations).toEqual([]);
  });

  it('should not mutate its input', () => {
    const program = compile('cetak(x * 1 + 0)');
    const before = signature(program);
    optimize(program);
    expect(signature(program)).toBe(before);
  });

  it('should log each committed rewrite at debug level', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    optimize(compile('cetak(x * 0)'), { logger });

    expect(logger.debug).toHaveBeenCalledWith('Applied rewrite', {
      rule: 'algebraicIdentity',
      detail: 'mul_zero',
      cost: 1,
    });
  });

  it.each([
    'x = 3\ncetak(x * 1 + 0)',
    'cetak(a ** 2 + b ** 2 * 1)',
    'n = 10\nbari n > 0 { n = n - 1 * 1 }',
    'upami (2 + 2) == 4 { cetak(z ** 5 / 1) } sanes { cetak(0 * q) }',
    'x = a ** b',
  ])('should never increase cost for %j', (source) => {
    const program = compile(source);
    const result = optimize(program);

    expect(result.finalCost).toBeLessThanOrEqual(result.initialCost);
    expect(result.initialCost).toBe(nodeCost(program));
    expect(result.finalCost).toBe(nodeCost(result.program));
  });
});
