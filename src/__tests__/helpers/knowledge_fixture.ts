/**
 * @fileoverview Small knowledge base used across the unit tests
 *
 * Four catalog items, five questions and seven rules: enough to reach every
 * requirement kind, the material gate, lookups and quantified paths.
 * Every call returns a fresh document that tests may mutate.
 */

import { loadKnowledgeBase, type LoaderOptions } from '../../knowledge/loader.js';
import type { KnowledgeBaseDocumentInput } from '../../knowledge/schema.js';
import type { KnowledgeBase } from '../../knowledge/types.js';

export type FixtureDocument = Required<KnowledgeBaseDocumentInput>;

/** Rule ids in agenda order (priority descending, then declaration order). */
export const FIXTURE_RULE_ORDER = [
  'r_glass_fragile',
  'r_strength_high',
  'r_outdoor',
  'r_removable',
  'r_mixed',
  'r_fragile_no_screw',
  'r_strength_low',
];

export function createMinimalDocument(): FixtureDocument {
  return {
    version: 'test-1',
    scales: {
      strength: ['low', 'medium', 'high'],
      curing_time: ['immediate', 'slow'],
    },
    enums: {
      category: ['glue', 'hardware'],
      material: ['wood', 'metal', 'glass'],
      grade: ['low', 'high'],
    },
    attributes: {
      'parts.first.material': { type: 'enum', domain: 'material', lookup: 'materials' },
      'parts.first.brittleness': { type: 'enum', domain: 'grade' },
      'parts.second.material': { type: 'enum', domain: 'material', lookup: 'materials' },
      'parts.second.brittleness': { type: 'enum', domain: 'grade' },
      'load.strength': { type: 'ordinal', scale: 'strength' },
      'load.outdoor': { type: 'boolean' },
      'use.removable': { type: 'boolean' },
    },
    lookups: {
      materials: {
        wood: { brittleness: 'low' },
        metal: { brittleness: 'low' },
        glass: { brittleness: 'high' },
      },
    },
    requirements: {
      min_strength: { kind: 'min', scale: 'strength', property: 'strength' },
      max_cure: { kind: 'max', scale: 'curing_time', property: 'curing_time' },
      allowed_categories: { kind: 'allowed', domain: 'category', property: 'category' },
      excluded_categories: { kind: 'excluded', domain: 'category', property: 'category' },
      excluded_items: { kind: 'excluded', domain: 'item', property: 'name' },
      weatherproof: { kind: 'flag', gate: { property: 'weatherproof', expect: true } },
      fragile: { kind: 'flag' },
    },
    item_properties: {
      strength: { type: 'ordinal', scale: 'strength' },
      weatherproof: { type: 'boolean', default: false },
      materials: { type: 'set', domain: 'material' },
    },
    matching: {
      material_compatibility: {
        facts: ['parts.first.material', 'parts.second.material'],
        property: 'materials',
        mode: 'all',
      },
    },
    questions: [
      { id: 'first_material', prompt: 'First material?', kind: 'choice', attribute: 'parts.first.material' },
      { id: 'second_material', prompt: 'Second material?', kind: 'choice', attribute: 'parts.second.material' },
      { id: 'strength', prompt: 'Strength?', kind: 'choice', attribute: 'load.strength' },
      {
        id: 'outdoor',
        prompt: 'Outdoors?',
        kind: 'boolean',
        attribute: 'load.outdoor',
        ask_if: [{ fact: 'load.strength', in: ['medium', 'high'] }],
      },
      {
        id: 'removable',
        prompt: 'Removable?',
        kind: 'boolean',
        attribute: 'use.removable',
        applicable_to: ['hardware'],
      },
    ],
    items: [
      {
        name: 'Epoxy glue',
        category: 'glue',
        curing_time: 'slow',
        properties: { strength: 'high', weatherproof: true, materials: ['wood', 'metal', 'glass'] },
      },
      {
        name: 'Wood glue',
        category: 'glue',
        curing_time: 'slow',
        properties: { strength: 'medium', materials: ['wood'] },
      },
      {
        name: 'Screw',
        category: 'hardware',
        curing_time: 'immediate',
        properties: { strength: 'medium', materials: ['wood', 'metal'] },
      },
      {
        name: 'Bolt',
        category: 'hardware',
        curing_time: 'immediate',
        properties: { strength: 'high', weatherproof: true, materials: ['wood', 'metal'] },
      },
    ],
    rules: [
      {
        id: 'r_glass_fragile',
        priority: 50,
        when: [{ fact: 'parts.any.brittleness', equals: 'high' }],
        then: { fragile: true },
      },
      {
        id: 'r_fragile_no_screw',
        priority: 10,
        when: [{ fact: 'requirements.fragile', equals: true }],
        then: { excluded_items: ['Screw'] },
      },
      {
        id: 'r_strength_high',
        priority: 40,
        when: [{ fact: 'load.strength', equals: 'high' }],
        then: { min_strength: 'high' },
      },
      {
        id: 'r_strength_low',
        priority: 5,
        when: [{ fact: 'load.strength', equals: 'low' }],
        then: { min_strength: 'low' },
      },
      {
        id: 'r_outdoor',
        priority: 30,
        when: [{ fact: 'load.outdoor', equals: true }],
        then: { weatherproof: true },
      },
      {
        id: 'r_removable',
        priority: 30,
        when: [{ fact: 'use.removable', equals: true }],
        then: { allowed_categories: ['hardware'] },
      },
      {
        id: 'r_mixed',
        priority: 20,
        when: [{ fact: 'parts.first.material', differs_from: 'parts.second.material' }],
        then: { allowed_categories: ['glue'] },
      },
    ],
    suggestion_rules: [
      {
        id: 's_clamp',
        applies_to: ['glue'],
        item_when: [{ item: 'curing_time', equals: 'slow' }],
        text: 'Clamp {item.name} overnight.',
      },
      {
        id: 's_outdoor',
        applies_to: ['bolt'],
        when: [{ fact: 'load.outdoor', equals: true }],
        text: 'Use stainless hardware for {parts.any.material}.',
      },
      {
        id: 's_fragile',
        applies_to: ['all'],
        when: [{ fact: 'requirements.fragile', equals: true }],
        text: 'Handle the {parts.first.material} with care.',
      },
    ],
  };
}

export function createMinimalKnowledgeBase(
  document: KnowledgeBaseDocumentInput = createMinimalDocument(),
  options: LoaderOptions = {},
): KnowledgeBase {
  return loadKnowledgeBase(document, options);
}
