/**
 * Greedy best-first search over whole-program rewrites.
 *
 * A search state is an immutable Program snapshot. Its neighbors are all
 * programs reachable by one rule applied at one node. Each step pops the
 * cheapest unvisited state and commits to its cheapest strictly-cheaper
 * neighbor; the search stops at a local optimum or when the iteration
 * budget runs out, and returns the cheapest state it saw.
 *
 * @module optimizer/optimizer
 */

import { fingerprint, type ExprNode, type ProgramNode, type StatementNode } from '../compiler/ast.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { nodeCost } from './cost.js';
import { PriorityFrontier } from './frontier.js';
import { RULES, type Rewrite, type RewriteRule, type RuleName } from './rules.js';

export const DEFAULT_MAX_ITERATIONS = 1000;

export interface OptimizeOptions {
  maxIterations?: number;
  logger?: Logger;
}

export type RewriteCounts = Record<RuleName, number>;

export interface OptimizationResult {
  program: ProgramNode;
  initialCost: number;
  finalCost: number;
  statesExplored: number;
  rewrites: RewriteCounts;
  /** `rule:detail` for every committed rewrite, in order. */
  transformations: string[];
}

interface SearchState {
  program: ProgramNode;
  cost: number;
  rewrites: RewriteCounts;
  transformations: string[];
}

interface Neighbor {
  program: ProgramNode;
  rule: RuleName;
  detail: string;
}

export function optimize(program: ProgramNode, options: OptimizeOptions = {}): OptimizationResult {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const logger = options.logger ?? silentLogger;

  const initial: SearchState = {
    program,
    cost: nodeCost(program),
    rewrites: { constantFolding: 0, strengthReduction: 0, algebraicIdentity: 0 },
    transformations: [],
  };

  const frontier = new PriorityFrontier<SearchState>((s) => s.cost);
  const visited = new Set<string>();
  frontier.push(initial);

  let best = initial;
  let statesExplored = 0;

  while (statesExplored < maxIterations) {
    const state = frontier.pop();
    if (state === undefined) break;

    const key = fingerprint(state.program);
    if (visited.has(key)) continue;
    visited.add(key);
    statesExplored++;

    if (state.cost < best.cost) best = state;

    const next = cheapestNeighbor(state);
    if (next === null) {
      logger.debug('Optimizer reached local optimum', { cost: state.cost, statesExplored });
      break;
    }

    logger.debug('Applied rewrite', {
      rule: next.rule,
      detail: next.detail,
      cost: next.cost,
    });
    frontier.push(next.state);
  }

  return {
    program: best.program,
    initialCost: initial.cost,
    finalCost: best.cost,
    statesExplored,
    rewrites: best.rewrites,
    transformations: best.transformations,
  };
}

/**
 * Cheapest neighbor that costs strictly less than `state`. Ties keep the
 * first one found, which is rule order and then pre-order node position.
 */
function cheapestNeighbor(
  state: SearchState,
): { state: SearchState; rule: RuleName; detail: string; cost: number } | null {
  let found: { neighbor: Neighbor; cost: number } | null = null;

  for (const neighbor of neighbors(state.program)) {
    const cost = nodeCost(neighbor.program);
    if (cost < state.cost && (found === null || cost < found.cost)) {
      found = { neighbor, cost };
    }
  }

  if (found === null) return null;
  const { neighbor, cost } = found;
  return {
    state: {
      program: neighbor.program,
      cost,
      rewrites: { ...state.rewrites, [neighbor.rule]: state.rewrites[neighbor.rule] + 1 },
      transformations: [...state.transformations, `${neighbor.rule}:${neighbor.detail}`],
    },
    rule: neighbor.rule,
    detail: neighbor.detail,
    cost,
  };
}

/** Every program reachable by one rule applied at one node, in tie-break order. */
export function* neighbors(program: ProgramNode): Generator<Neighbor> {
  for (const rule of RULES) {
    for (const rewrite of statementListRewrites(program.statements, rule)) {
      yield {
        program: { kind: 'program', statements: rewrite.value },
        rule: rule.name,
        detail: rewrite.detail,
      };
    }
  }
}

interface Rewritten<T> {
  value: T;
  detail: string;
}

function* statementListRewrites(
  statements: StatementNode[],
  rule: RewriteRule,
): Generator<Rewritten<StatementNode[]>> {
  for (let i = 0; i < statements.length; i++) {
    for (const rewrite of statementRewrites(statements[i], rule)) {
      const copy = statements.slice();
      copy[i] = rewrite.value;
      yield { value: copy, detail: rewrite.detail };
    }
  }
}

function* statementRewrites(stmt: StatementNode, rule: RewriteRule): Generator<Rewritten<StatementNode>> {
  switch (stmt.kind) {
    case 'assign':
      for (const r of exprRewrites(stmt.value, rule)) {
        yield { value: { ...stmt, value: r.node }, detail: r.detail };
      }
      return;
    case 'print':
      for (const r of exprRewrites(stmt.argument, rule)) {
        yield { value: { ...stmt, argument: r.node }, detail: r.detail };
      }
      return;
    case 'if':
      for (const r of exprRewrites(stmt.condition, rule)) {
        yield { value: { ...stmt, condition: r.node }, detail: r.detail };
      }
      for (const r of statementListRewrites(stmt.thenBranch, rule)) {
        yield { value: { ...stmt, thenBranch: r.value }, detail: r.detail };
      }
      for (const r of statementListRewrites(stmt.elseBranch, rule)) {
        yield { value: { ...stmt, elseBranch: r.value }, detail: r.detail };
      }
      return;
    case 'while':
      for (const r of exprRewrites(stmt.condition, rule)) {
        yield { value: { ...stmt, condition: r.node }, detail: r.detail };
      }
      for (const r of statementListRewrites(stmt.body, rule)) {
        yield { value: { ...stmt, body: r.value }, detail: r.detail };
      }
      return;
  }
}

function* exprRewrites(node: ExprNode, rule: RewriteRule): Generator<Rewrite> {
  const here = rule.apply(node);
  if (here !== null) yield here;

  switch (node.kind) {
    case 'binary':
      for (const r of exprRewrites(node.left, rule)) {
        yield { node: { ...node, left: r.node }, detail: r.detail };
      }
      for (const r of exprRewrites(node.right, rule)) {
        yield { node: { ...node, right: r.node }, detail: r.detail };
      }
      return;
    case 'unary':
      for (const r of exprRewrites(node.operand, rule)) {
        yield { node: { ...node, operand: r.node }, detail: r.detail };
      }
      return;
    default:
      return;
  }
}
