/**
 * @fileoverview Knowledge Base Type Definitions
 *
 * In-memory, validated form of a knowledge base document. Everything here is
 * produced once by the loader and treated as read-only afterwards, so a single
 * `KnowledgeBase` can back any number of sessions.
 *
 * @packageDocumentation
 */

import type { UnknownAttributeError } from '../core/errors.js';
import type { FactValue, Scalar } from '../facts/types.js';
import type { OrdinalScale } from './ordinal.js';

// ============================================================================
// ATTRIBUTE DECLARATIONS
// ============================================================================

export type AttributeType =
  | { type: 'boolean' }
  | { type: 'enum'; domain: string }
  | { type: 'ordinal'; scale: string }
  | { type: 'set'; domain: string };

/** Declaration of a fact path that questions may write. */
export type FactAttribute = AttributeType & {
  path: string;
  /** Lookup table used to populate sibling attributes when this one is written. */
  lookup?: string;
};

/** Declaration of an item property (the item property bag schema). */
export type ItemProperty = AttributeType & {
  name: string;
  default?: FactValue;
};

/** Item fields that live outside the property bag but can still be gated. */
export const BUILTIN_ITEM_FIELDS = ['name', 'category', 'curing_time'] as const;

export type BuiltinItemField = (typeof BUILTIN_ITEM_FIELDS)[number];

// ============================================================================
// REQUIREMENTS
// ============================================================================

export type RequirementKind = 'min' | 'max' | 'allowed' | 'excluded' | 'flag';

export interface FlagGate {
  property: string;
  expect: boolean;
}

interface RequirementBase {
  name: string;
  description?: string;
}

export type RequirementSpec = RequirementBase &
  (
    | { kind: 'min' | 'max'; scale: string; property?: string }
    | { kind: 'allowed' | 'excluded'; domain: string; property?: string }
    | { kind: 'flag'; gate?: FlagGate }
  );

// ============================================================================
// CONDITIONS
// ============================================================================

export type ConditionSubject =
  | { kind: 'fact'; path: string }
  | { kind: 'item'; property: string };

export type ConditionTest =
  | { op: 'equals'; value: Scalar }
  | { op: 'not_equals'; value: Scalar }
  | { op: 'in'; values: Scalar[] }
  | { op: 'not_in'; values: Scalar[] }
  | { op: 'at_least'; level: string; scale: OrdinalScale }
  | { op: 'at_most'; level: string; scale: OrdinalScale }
  | { op: 'same_as'; path: string }
  | { op: 'differs_from'; path: string };

export type ConditionOperator = ConditionTest['op'];

export interface Condition {
  subject: ConditionSubject;
  test: ConditionTest;
  /** Where the atom was declared, for tracing. */
  location: string;
}

// ============================================================================
// ENTITIES
// ============================================================================

export type QuestionKind = 'boolean' | 'choice';

export interface Question {
  id: string;
  prompt: string;
  kind: QuestionKind;
  /** Fact path the answer is written to. */
  attribute: string;
  /** Allowed answers for `choice` questions (empty for `boolean`). */
  choices: string[];
  askIf: Condition[];
  applicableTo: string[];
  rationale: string[];
}

export interface Item {
  name: string;
  category: string;
  properties: Record<string, FactValue>;
  notes: string[];
  requiresTools: string[];
  surfacePrep: string[];
  curingTime?: string;
}

export interface RuleEffect {
  requirement: string;
  value: FactValue;
}

export interface Rule {
  id: string;
  context: string;
  priority: number;
  /** Position in the document; breaks priority ties. */
  order: number;
  when: Condition[];
  then: RuleEffect[];
}

export interface SuggestionRule {
  id: string;
  appliesTo: string[];
  when: Condition[];
  itemWhen: Condition[];
  text: string;
}

export type MaterialMatchMode = 'any' | 'all';

export interface MaterialGate {
  facts: string[];
  property: string;
  mode: MaterialMatchMode;
}

// ============================================================================
// KNOWLEDGE BASE
// ============================================================================

export interface KnowledgeBase {
  version: string;
  source?: string;
  scales: ReadonlyMap<string, OrdinalScale>;
  enums: ReadonlyMap<string, readonly string[]>;
  attributes: ReadonlyMap<string, FactAttribute>;
  lookups: ReadonlyMap<string, ReadonlyMap<string, Readonly<Record<string, FactValue>>>>;
  requirements: ReadonlyMap<string, RequirementSpec>;
  itemProperties: ReadonlyMap<string, ItemProperty>;
  materialGate: MaterialGate | null;
  questions: ReadonlyMap<string, Question>;
  items: ReadonlyMap<string, Item>;
  rules: ReadonlyMap<string, Rule>;
  suggestionRules: ReadonlyMap<string, SuggestionRule>;
  /** Load-time consistency warnings. */
  diagnostics: readonly UnknownAttributeError[];
}

/** Domain backing the special `item` requirement domain. */
export const ITEM_DOMAIN = 'item';
