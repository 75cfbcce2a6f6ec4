/**
 * @fileoverview Matcher / Filter
 *
 * Binary gating of the catalog against the derived requirements. Gates run
 * in a fixed order and the first failure disqualifies the item:
 *
 * 1. category gates (`allowed` / `excluded` requirements on `category`)
 * 2. ordinal gates (`min` / `max` requirements)
 * 3. material compatibility
 * 4. other nominal gates (`allowed` / `excluded` on any other property)
 * 5. boolean flag gates
 *
 * A requirement that is not established does not gate. An allowed set that
 * is established but empty admits nothing. An item whose gated property has
 * no value fails that gate. Qualifying items keep catalog order, and callers
 * get copies of the catalog entries.
 */

import type { FactStore } from '../facts/fact_store.js';
import { formatFactValue, isStringList, requirementPath, type FactValue } from '../facts/types.js';
import { cloneItem, itemFieldValue } from '../knowledge/item_fields.js';
import type { Item, KnowledgeBase, RequirementSpec } from '../knowledge/types.js';
import { collectSuggestions } from './suggestions.js';

// ============================================================================
// TYPES
// ============================================================================

export type GateKind = 'category' | 'ordinal' | 'material' | 'nominal' | 'flag';

export interface GateFailure {
  gate: GateKind;
  /** Requirement name, or the material gate's item property. */
  requirement: string;
  reason: string;
}

export interface ItemAssessment {
  item: Item;
  qualified: boolean;
  failure: GateFailure | null;
}

export interface Recommendation {
  item: Item;
  suggestions: string[];
}

interface Gate {
  kind: GateKind;
  check(item: Item, store: FactStore): GateFailure | null;
}

// ============================================================================
// MATCHER
// ============================================================================

export class Matcher {
  private readonly gates: readonly Gate[];

  constructor(private readonly kb: KnowledgeBase) {
    this.gates = buildGates(kb);
  }

  assess(store: FactStore): ItemAssessment[] {
    return [...this.kb.items.values()].map((item) => {
      const failure = this.firstFailure(item, store);
      return { item: cloneItem(item), qualified: failure === null, failure };
    });
  }

  recommend(store: FactStore): Recommendation[] {
    return this.qualifying(store).map((item) => ({
      item: cloneItem(item),
      suggestions: collectSuggestions(this.kb, store, item),
    }));
  }

  /** Names of the qualifying items, in catalog order. */
  qualifyingNames(store: FactStore): string[] {
    return this.qualifying(store).map((item) => item.name);
  }

  firstFailure(item: Item, store: FactStore): GateFailure | null {
    for (const gate of this.gates) {
      const failure = gate.check(item, store);
      if (failure) return failure;
    }
    return null;
  }

  private qualifying(store: FactStore): Item[] {
    return [...this.kb.items.values()].filter((item) => this.firstFailure(item, store) === null);
  }
}

// ============================================================================
// GATES
// ============================================================================

const GATE_ORDER: readonly GateKind[] = ['category', 'ordinal', 'material', 'nominal', 'flag'];

function buildGates(kb: KnowledgeBase): Gate[] {
  const gates: Gate[] = [];
  for (const spec of kb.requirements.values()) {
    const gate = requirementGate(kb, spec);
    if (gate) gates.push(gate);
  }
  const materialGate = materialCompatibilityGate(kb);
  if (materialGate) gates.push(materialGate);
  // Stable sort keeps requirement declaration order within each kind.
  return gates.sort((a, b) => GATE_ORDER.indexOf(a.kind) - GATE_ORDER.indexOf(b.kind));
}

function requirementGate(kb: KnowledgeBase, spec: RequirementSpec): Gate | null {
  const path = requirementPath(spec.name);

  switch (spec.kind) {
    case 'min':
    case 'max': {
      const { property } = spec;
      const scale = kb.scales.get(spec.scale);
      if (!property || !scale) return null;
      return {
        kind: 'ordinal',
        check(item, store) {
          const threshold = store.get(path);
          if (!scale.has(threshold)) return null;
          const actual = itemFieldValue(item, property);
          const passes =
            typeof actual === 'string' &&
            (spec.kind === 'min' ? scale.atLeast(actual, threshold) : scale.atMost(actual, threshold));
          if (passes) return null;
          const relation = spec.kind === 'min' ? 'below required' : 'above allowed';
          return failure('ordinal', spec.name, `${property} ${formatFactValue(actual)} is ${relation} ${threshold}`);
        },
      };
    }
    case 'allowed':
    case 'excluded': {
      const { property } = spec;
      if (!property) return null;
      const kind: GateKind = property === 'category' ? 'category' : 'nominal';
      return {
        kind,
        check(item, store) {
          const established = store.get(path);
          if (!isStringList(established)) return null;
          const actual = itemFieldValue(item, property);
          if (actual === undefined) {
            return failure(kind, spec.name, `${property} is unknown`);
          }
          const listed = overlaps(actual, established);
          if (spec.kind === 'allowed' && established.length === 0) {
            return failure(kind, spec.name, `no ${property} is allowed`);
          }
          if (spec.kind === 'allowed' && !listed) {
            return failure(kind, spec.name, `${property} ${formatFactValue(actual)} is not among ${formatFactValue(established)}`);
          }
          if (spec.kind === 'excluded' && listed) {
            return failure(kind, spec.name, `${property} ${formatFactValue(actual)} is excluded`);
          }
          return null;
        },
      };
    }
    case 'flag': {
      const { gate } = spec;
      if (!gate) return null;
      return {
        kind: 'flag',
        check(item, store) {
          if (store.get(path) !== true) return null;
          const actual = itemFieldValue(item, gate.property);
          if (actual === gate.expect) return null;
          return failure('flag', spec.name, `${gate.property} is ${formatFactValue(actual)}, expected ${String(gate.expect)}`);
        },
      };
    }
  }
}

function materialCompatibilityGate(kb: KnowledgeBase): Gate | null {
  const { materialGate } = kb;
  if (!materialGate) return null;
  return {
    kind: 'material',
    check(item, store) {
      const materials = materialGate.facts
        .map((path) => store.get(path))
        .filter((value): value is string => typeof value === 'string');
      if (materials.length === 0) return null;

      const compatible = itemFieldValue(item, materialGate.property);
      if (!isStringList(compatible)) {
        return failure('material', materialGate.property, `${materialGate.property} is unknown`);
      }
      const passes =
        materialGate.mode === 'all'
          ? materials.every((material) => compatible.includes(material))
          : materials.some((material) => compatible.includes(material));
      if (passes) return null;
      const missing = materials.filter((material) => !compatible.includes(material));
      return failure('material', materialGate.property, `not compatible with ${[...new Set(missing)].join(', ')}`);
    },
  };
}

function overlaps(actual: FactValue, listed: readonly string[]): boolean {
  if (Array.isArray(actual)) return actual.some((value) => listed.includes(value));
  return typeof actual === 'string' && listed.includes(actual);
}

function failure(gate: GateKind, requirement: string, reason: string): GateFailure {
  return { gate, requirement, reason };
}
