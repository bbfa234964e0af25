/**
 * Memo table for expression results within a single run.
 *
 * Keys combine an expression's structural signature with a snapshot of
 * the free variables it reads. The whole table is dropped on every
 * assignment.
 *
 * @module evaluator/memo
 */

import { signature, type ExprNode } from '../compiler/ast.js';
import type { Value } from './operators.js';

export interface MemoStats {
  hits: number;
  misses: number;
  /** Clears that dropped at least one entry. */
  invalidations: number;
  entries: number;
}

const signatures = new WeakMap<ExprNode, string>();
const freeVariableSets = new WeakMap<ExprNode, readonly string[]>();

/** Structural signature of an expression, computed once per node object. */
export function exprSignature(node: ExprNode): string {
  let sig = signatures.get(node);
  if (sig === undefined) {
    sig = signature(node);
    signatures.set(node, sig);
  }
  return sig;
}

/**
 * Sorted, de-duplicated names of the identifiers an expression reads.
 * The language has no nested scopes, so every identifier is free.
 */
export function freeVariables(node: ExprNode): readonly string[] {
  const cached = freeVariableSets.get(node);
  if (cached !== undefined) return cached;

  const names = collectFreeVariables(node);
  freeVariableSets.set(node, names);
  return names;
}

function collectFreeVariables(node: ExprNode): readonly string[] {
  switch (node.kind) {
    case 'number':
    case 'boolean':
      return [];
    case 'identifier':
      return [node.name];
    case 'unary':
      return freeVariables(node.operand);
    case 'binary':
      return [...new Set([...freeVariables(node.left), ...freeVariables(node.right)])].sort();
  }
}

function encodeValue(value: Value | undefined): string {
  if (value === undefined) return '?';
  if (typeof value === 'boolean') return value ? 'T' : 'F';
  return Object.is(value, -0) ? '-0' : String(value);
}

export class MemoTable {
  private readonly entries = new Map<string, Value>();
  private hits = 0;
  private misses = 0;
  private invalidations = 0;

  key(node: ExprNode, environment: ReadonlyMap<string, Value>): string {
    const snapshot = freeVariables(node)
      .map((name) => `${name}=${encodeValue(environment.get(name))}`)
      .join(',');
    return `${exprSignature(node)}|${snapshot}`;
  }

  get(key: string): Value | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  set(key: string, value: Value): void {
    this.entries.set(key, value);
  }

  clear(): void {
    if (this.entries.size > 0) this.invalidations++;
    this.entries.clear();
  }

  getStats(): MemoStats {
    return {
      hits: this.hits,
      misses: this.misses,
      invalidations: this.invalidations,
      entries: this.entries.size,
    };
  }
}
