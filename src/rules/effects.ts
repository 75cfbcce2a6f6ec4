/**
 * @fileoverview Monotonic requirement merge
 *
 * Rule effects only ever tighten the derived requirements:
 * - `min` keeps the higher level, `max` the lower one
 * - `allowed` intersects with the established set (the first write establishes it)
 * - `excluded` accumulates
 * - `flag` stays true once set
 */

import type { FactStore } from '../facts/fact_store.js';
import {
  factValuesEqual,
  isStringList,
  requirementPath,
  type FactValue,
} from '../facts/types.js';
import type { KnowledgeBase, RequirementSpec, RuleEffect } from '../knowledge/types.js';

export interface RequirementChange {
  requirement: string;
  before: FactValue | undefined;
  after: FactValue | undefined;
  changed: boolean;
}

/**
 * Merge one rule effect into `requirements.<name>` and report what moved.
 * Effects naming an undeclared requirement are reported as unchanged.
 */
export function applyEffect(kb: KnowledgeBase, store: FactStore, effect: RuleEffect): RequirementChange {
  const path = requirementPath(effect.requirement);
  const before = store.get(path);
  const spec = kb.requirements.get(effect.requirement);
  const after = spec ? mergeRequirement(kb, spec, before, effect.value) : before;
  const changed = !factValuesEqual(before, after);
  if (changed && after !== undefined) {
    store.set(path, after);
  }
  return { requirement: effect.requirement, before, after, changed };
}

export function mergeRequirement(
  kb: KnowledgeBase,
  spec: RequirementSpec,
  current: FactValue | undefined,
  incoming: FactValue,
): FactValue | undefined {
  switch (spec.kind) {
    case 'min':
    case 'max': {
      const scale = kb.scales.get(spec.scale);
      if (!scale || !scale.has(incoming)) return current;
      if (!scale.has(current)) return incoming;
      return spec.kind === 'min' ? scale.max(current, incoming) : scale.min(current, incoming);
    }
    case 'allowed': {
      const values = asList(incoming);
      if (!isStringList(current)) return values;
      return current.filter((value) => values.includes(value));
    }
    case 'excluded': {
      const values = asList(incoming);
      const existing = isStringList(current) ? current : [];
      return [...existing, ...values.filter((value) => !existing.includes(value))];
    }
    case 'flag':
      return current === true || incoming === true;
  }
}

function asList(value: FactValue): string[] {
  if (typeof value === 'string') return [value];
  return isStringList(value) ? [...new Set(value)] : [];
}
