import { describe, expect, it } from 'vitest';
import { FactStore } from '../../facts/fact_store.js';
import type { RequirementSpec } from '../../knowledge/types.js';
import { createMinimalKnowledgeBase } from '../../__tests__/helpers/knowledge_fixture.js';
import { applyEffect, mergeRequirement } from '../effects.js';

const kb = createMinimalKnowledgeBase();

function spec(name: string): RequirementSpec {
  const found = kb.requirements.get(name);
  if (!found) throw new Error(`fixture has no requirement ${name}`);
  return found;
}

describe('mergeRequirement', () => {
  it('keeps the higher level for min requirements', () => {
    expect(mergeRequirement(kb, spec('min_strength'), undefined, 'medium')).toBe('medium');
    expect(mergeRequirement(kb, spec('min_strength'), 'medium', 'low')).toBe('medium');
    expect(mergeRequirement(kb, spec('min_strength'), 'medium', 'high')).toBe('high');
  });

  it('keeps the lower level for max requirements', () => {
    expect(mergeRequirement(kb, spec('max_cure'), 'slow', 'immediate')).toBe('immediate');
    expect(mergeRequirement(kb, spec('max_cure'), 'immediate', 'slow')).toBe('immediate');
  });

  it('intersects allowed sets once established', () => {
    expect(mergeRequirement(kb, spec('allowed_categories'), undefined, ['glue', 'hardware'])).toEqual([
      'glue',
      'hardware',
    ]);
    expect(mergeRequirement(kb, spec('allowed_categories'), ['glue', 'hardware'], ['hardware'])).toEqual([
      'hardware',
    ]);
    expect(mergeRequirement(kb, spec('allowed_categories'), ['glue'], ['hardware'])).toEqual([]);
  });

  it('accumulates excluded sets without duplicates', () => {
    expect(mergeRequirement(kb, spec('excluded_categories'), ['glue'], ['hardware', 'glue'])).toEqual([
      'glue',
      'hardware',
    ]);
  });

  it('never clears a flag', () => {
    expect(mergeRequirement(kb, spec('fragile'), true, false)).toBe(true);
    expect(mergeRequirement(kb, spec('fragile'), undefined, true)).toBe(true);
  });
});

describe('applyEffect', () => {
  it('writes a new value and reports the change', () => {
    const store = new FactStore();

    const change = applyEffect(kb, store, { requirement: 'min_strength', value: 'medium' });

    expect(change).toEqual({ requirement: 'min_strength', before: undefined, after: 'medium', changed: true });
    expect(store.get('requirements.min_strength')).toBe('medium');
  });

  it('reports an effect that cannot loosen the requirement as unchanged', () => {
    const store = new FactStore();
    applyEffect(kb, store, { requirement: 'min_strength', value: 'high' });

    const change = applyEffect(kb, store, { requirement: 'min_strength', value: 'low' });

    expect(change).toEqual({ requirement: 'min_strength', before: 'high', after: 'high', changed: false });
    expect(store.get('requirements.min_strength')).toBe('high');
  });

  it('stores an emptied allowed set', () => {
    const store = new FactStore();
    applyEffect(kb, store, { requirement: 'allowed_categories', value: ['glue'] });

    const change = applyEffect(kb, store, { requirement: 'allowed_categories', value: ['hardware'] });

    expect(change.changed).toBe(true);
    expect(store.get('requirements.allowed_categories')).toEqual([]);
  });

  it('ignores undeclared requirements', () => {
    const store = new FactStore();

    const change = applyEffect(kb, store, { requirement: 'waterproof', value: true });

    expect(change).toEqual({ requirement: 'waterproof', before: undefined, after: undefined, changed: false });
    expect(store.section('requirements')).toEqual({});
  });
});
