/**
 * @fileoverview Fact Store
 *
 * Everything known about the current case: user answers, values looked up
 * from the knowledge base, and (under `requirements.`) the requirements
 * derived by the rule evaluator. Values are addressed by dotted paths.
 *
 * The store does no validation and triggers nothing; the session decides
 * when to re-run inference after a batch of writes.
 */

import {
  isFactTree,
  isQuantifier,
  splitPath,
  type FactNode,
  type FactTree,
  type FactValue,
  type Quantifier,
} from './types.js';

/** Values addressed by a (possibly quantified) path. */
export interface ResolvedValues {
  quantifier: Quantifier | null;
  /** One entry per addressed node; `undefined` where the node has no value. */
  values: Array<FactValue | undefined>;
}

export class FactStore {
  private root: FactTree;

  constructor(seed: FactTree = {}) {
    this.root = cloneTree(seed);
  }

  /**
   * Write `value` at `path`, creating intermediate nodes. A leaf value found
   * on the way is replaced by a node.
   */
  set(path: string, value: FactValue): void {
    const segments = splitPath(path);
    const leaf = segments.pop();
    if (leaf === undefined) {
      throw new Error(`Cannot write to an empty fact path`);
    }
    let node = this.root;
    for (const segment of segments) {
      const next = node[segment];
      if (isFactTree(next)) {
        node = next;
      } else {
        const created: FactTree = {};
        node[segment] = created;
        node = created;
      }
    }
    node[leaf] = cloneValue(value);
  }

  get(path: string): FactValue | undefined;
  get<T extends FactValue>(path: string, defaultValue: T): FactValue | T;
  get(path: string, defaultValue?: FactValue): FactValue | undefined {
    const node = this.lookup(splitPath(path));
    if (node === undefined || isFactTree(node)) return defaultValue;
    return cloneValue(node);
  }

  has(path: string): boolean {
    const node = this.lookup(splitPath(path));
    return node !== undefined && !isFactTree(node);
  }

  /**
   * Resolve a path that may contain one `any` / `every` segment, e.g.
   * `materials.any.brittleness`. Without a quantifier the result holds a
   * single entry.
   */
  resolve(path: string): ResolvedValues {
    const segments = splitPath(path);
    const position = segments.findIndex(isQuantifier);
    if (position < 0) {
      return { quantifier: null, values: [this.get(path)] };
    }

    const quantifier = segments[position];
    if (!isQuantifier(quantifier)) {
      return { quantifier: null, values: [] };
    }
    const parent = position === 0 ? this.root : this.lookup(segments.slice(0, position));
    if (!isFactTree(parent)) {
      return { quantifier, values: [] };
    }

    const rest = segments.slice(position + 1);
    const values = Object.values(parent).map((child) => {
      const node = isFactTree(child) ? descend(child, rest) : rest.length === 0 ? child : undefined;
      return node === undefined || isFactTree(node) ? undefined : cloneValue(node);
    });
    return { quantifier, values };
  }

  /** Deep copy of the subtree at `prefix` (empty when absent). */
  section(prefix: string): FactTree {
    const node = this.lookup(splitPath(prefix));
    return isFactTree(node) ? cloneTree(node) : {};
  }

  /** Flattened `[path, value]` pairs in insertion order. */
  entries(prefix = ''): Array<[string, FactValue]> {
    const start = prefix ? this.lookup(splitPath(prefix)) : this.root;
    if (!isFactTree(start)) return [];
    const result: Array<[string, FactValue]> = [];
    const walk = (node: FactTree, base: string): void => {
      for (const [key, child] of Object.entries(node)) {
        const path = base ? `${base}.${key}` : key;
        if (isFactTree(child)) {
          walk(child, path);
        } else {
          result.push([path, cloneValue(child)]);
        }
      }
    };
    walk(start, prefix);
    return result;
  }

  snapshot(): FactTree {
    return cloneTree(this.root);
  }

  clone(): FactStore {
    return new FactStore(this.root);
  }

  private lookup(segments: string[]): FactNode | undefined {
    return descend(this.root, segments);
  }
}

function descend(start: FactTree, segments: string[]): FactNode | undefined {
  let node: FactNode | undefined = start;
  for (const segment of segments) {
    if (!isFactTree(node)) return undefined;
    node = node[segment];
  }
  return node;
}

function cloneValue(value: FactValue): FactValue {
  return Array.isArray(value) ? [...value] : value;
}

function cloneTree(tree: FactTree): FactTree {
  const copy: FactTree = {};
  for (const [key, child] of Object.entries(tree)) {
    copy[key] = isFactTree(child) ? cloneTree(child) : cloneValue(child);
  }
  return copy;
}
