/**
 * @fileoverview Forward-chaining rule evaluator
 *
 * Rules are visited by descending priority, ties in declaration order. A
 * satisfied rule applies its effects at once, so rules later in the same pass
 * already see them, and is recorded as fired. Passes repeat until one fires
 * nothing or every rule has fired; each pass that continues fires at least one
 * rule, so N rules need at most N passes.
 *
 * The fired set belongs to the caller (one per session): a rule never fires
 * twice even if its condition keeps holding.
 */

import type { FactStore } from '../facts/fact_store.js';
import type { KnowledgeBase, Rule } from '../knowledge/types.js';
import { evaluateConditions } from './conditions.js';
import { applyEffect, type RequirementChange } from './effects.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FiredRule {
  ruleId: string;
  context: string;
  priority: number;
  /** 1-based pass in which the rule fired. */
  pass: number;
  /** Firing position across the whole session. */
  sequence: number;
  changes: RequirementChange[];
}

export interface ChainResult {
  passes: number;
  fired: FiredRule[];
}

// ============================================================================
// EVALUATOR
// ============================================================================

export class ForwardChainer {
  private readonly agenda: readonly Rule[];

  constructor(private readonly kb: KnowledgeBase) {
    this.agenda = [...kb.rules.values()].sort((a, b) => b.priority - a.priority || a.order - b.order);
  }

  /** Rules in the order they are visited within a pass. */
  get order(): string[] {
    return this.agenda.map((rule) => rule.id);
  }

  /**
   * Run to a fixed point. `fired` is updated in place with the ids of rules
   * that fire; `sequenceStart` numbers the new firings after earlier ones.
   */
  run(store: FactStore, fired: Set<string>, sequenceStart = 0): ChainResult {
    const trace: FiredRule[] = [];
    let passes = 0;

    while (this.agenda.some((rule) => !fired.has(rule.id))) {
      passes += 1;
      let firedThisPass = false;

      for (const rule of this.agenda) {
        if (fired.has(rule.id)) continue;
        if (!evaluateConditions(rule.when, { store })) continue;

        fired.add(rule.id);
        firedThisPass = true;
        trace.push({
          ruleId: rule.id,
          context: rule.context,
          priority: rule.priority,
          pass: passes,
          sequence: sequenceStart + trace.length + 1,
          changes: rule.then.map((effect) => applyEffect(this.kb, store, effect)),
        });
      }

      if (!firedThisPass) break;
    }

    return { passes, fired: trace };
  }
}
