/**
 * @fileoverview Value types held by the fact store
 */

export type Scalar = string | number | boolean;

/** A leaf value: a scalar or a set of nominal values. */
export type FactValue = Scalar | string[];

export type FactNode = FactValue | FactTree;

export interface FactTree {
  [key: string]: FactNode;
}

/** Root segment under which derived requirements are stored. */
export const REQUIREMENTS_ROOT = 'requirements';

/** Path segments that quantify over the children of a node. */
export type Quantifier = 'any' | 'every';

export const QUANTIFIERS: readonly Quantifier[] = ['any', 'every'];

export function isQuantifier(segment: string): segment is Quantifier {
  return segment === 'any' || segment === 'every';
}

export function isFactTree(node: FactNode | undefined): node is FactTree {
  return typeof node === 'object' && !Array.isArray(node);
}

export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

export function isFactValue(value: unknown): value is FactValue {
  return isScalar(value) || isStringList(value);
}

export function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

export function requirementPath(name: string): string {
  return `${REQUIREMENTS_ROOT}.${name}`;
}

export function formatFactValue(value: FactValue | undefined): string {
  if (value === undefined) return 'unknown';
  if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : '(none)';
  return String(value);
}

/** Structural equality; sets compare regardless of order. */
export function factValuesEqual(a: FactValue | undefined, b: FactValue | undefined): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    const left = new Set(a);
    const right = new Set(b);
    return left.size === right.size && [...left].every((value) => right.has(value));
  }
  return a === b;
}
