/**
 * @fileoverview Condition evaluation
 *
 * A condition list is a conjunction of atoms. Every atom reads one subject
 * (a fact path, possibly quantified, or a property of the item under
 * consideration) and applies one operator to it.
 *
 * Evaluation never throws: a subject with no value makes the atom false,
 * negated operators included.
 */

import type { FactStore } from '../facts/fact_store.js';
import { factValuesEqual, type FactValue, type Scalar } from '../facts/types.js';
import { itemFieldValue } from '../knowledge/item_fields.js';
import type { Condition, ConditionTest, Item } from '../knowledge/types.js';

export interface EvaluationContext {
  store: FactStore;
  /** Item under consideration, for `item:` subjects. */
  item?: Item;
}

export function evaluateConditions(conditions: readonly Condition[], context: EvaluationContext): boolean {
  return conditions.every((condition) => evaluateCondition(condition, context));
}

export function evaluateCondition(condition: Condition, context: EvaluationContext): boolean {
  const { subject, test } = condition;

  if (subject.kind === 'item') {
    if (!context.item) return false;
    return testValue(itemFieldValue(context.item, subject.property), test, context.store);
  }

  const { quantifier, values } = context.store.resolve(subject.path);
  switch (quantifier) {
    case null:
      return testValue(values[0], test, context.store);
    case 'any':
      return values.some((value) => testValue(value, test, context.store));
    case 'every':
      return values.length > 0 && values.every((value) => testValue(value, test, context.store));
  }
}

function testValue(value: FactValue | undefined, test: ConditionTest, store: FactStore): boolean {
  if (value === undefined) return false;

  switch (test.op) {
    case 'equals':
      return matchesScalar(value, test.value);
    case 'not_equals':
      return !matchesScalar(value, test.value);
    case 'in':
      return test.values.some((candidate) => matchesScalar(value, candidate));
    case 'not_in':
      return !test.values.some((candidate) => matchesScalar(value, candidate));
    case 'at_least':
      return typeof value === 'string' && test.scale.atLeast(value, test.level);
    case 'at_most':
      return typeof value === 'string' && test.scale.atMost(value, test.level);
    case 'same_as':
    case 'differs_from': {
      const other = store.get(test.path);
      if (other === undefined) return false;
      const same = factValuesEqual(value, other);
      return test.op === 'same_as' ? same : !same;
    }
  }
}

/** Set-valued subjects match a scalar they contain. */
function matchesScalar(value: FactValue, expected: Scalar): boolean {
  if (Array.isArray(value)) {
    return typeof expected === 'string' && value.includes(expected);
  }
  return value === expected;
}
