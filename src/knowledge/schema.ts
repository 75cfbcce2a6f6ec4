/**
 * @fileoverview Zod schemas for the knowledge base document
 *
 * These describe the *shape* of the YAML document only. Cross references
 * (domains, scales, declared attributes, unique ids) are checked by the
 * loader, which reports them with a precise location.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// SCALARS
// ============================================================================

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const FactValueSchema = z.union([ScalarSchema, z.array(z.string())]);

const NameSchema = z.string().trim().min(1);

// ============================================================================
// DECLARATIONS
// ============================================================================

export const AttributeTypeNameSchema = z.enum(['boolean', 'enum', 'ordinal', 'set']);

/** Fact attribute declaration (`attributes.<path>`). */
export const AttributeSchema = z.object({
  type: AttributeTypeNameSchema,
  domain: NameSchema.optional(),
  scale: NameSchema.optional(),
  lookup: NameSchema.optional(),
  description: z.string().optional(),
}).strict();

/** Item property declaration (`item_properties.<name>`). */
export const ItemPropertySchema = z.object({
  type: AttributeTypeNameSchema,
  domain: NameSchema.optional(),
  scale: NameSchema.optional(),
  default: FactValueSchema.optional(),
  description: z.string().optional(),
}).strict();

export const RequirementKindSchema = z.enum(['min', 'max', 'allowed', 'excluded', 'flag']);

export const RequirementSchema = z.object({
  kind: RequirementKindSchema,
  scale: NameSchema.optional(),
  domain: NameSchema.optional(),
  property: NameSchema.optional(),
  gate: z.object({
    property: NameSchema,
    expect: z.boolean(),
  }).strict().optional(),
  description: z.string().optional(),
}).strict();

// ============================================================================
// CONDITIONS
// ============================================================================

/**
 * One condition atom: exactly one subject (`fact` or `item`) and exactly one
 * operator. The "exactly one" part is enforced by the loader.
 */
export const ConditionSchema = z.object({
  fact: NameSchema.optional(),
  item: NameSchema.optional(),
  equals: ScalarSchema.optional(),
  not_equals: ScalarSchema.optional(),
  in: z.array(ScalarSchema).min(1).optional(),
  not_in: z.array(ScalarSchema).min(1).optional(),
  at_least: NameSchema.optional(),
  at_most: NameSchema.optional(),
  same_as: NameSchema.optional(),
  differs_from: NameSchema.optional(),
}).strict();

// ============================================================================
// ENTITIES
// ============================================================================

export const QuestionSchema = z.object({
  id: NameSchema,
  prompt: z.string().min(1),
  kind: z.enum(['boolean', 'choice']),
  attribute: NameSchema,
  choices: z.array(NameSchema).min(1).optional(),
  ask_if: z.array(ConditionSchema).default([]),
  applicable_to: z.array(NameSchema).default([]),
  rationale: z.array(z.string()).default([]),
}).strict();

export const ItemSchema = z.object({
  name: NameSchema,
  category: NameSchema,
  properties: z.record(FactValueSchema).default({}),
  notes: z.array(z.string()).default([]),
  requires_tools: z.array(z.string()).default([]),
  surface_prep: z.array(z.string()).default([]),
  curing_time: NameSchema.optional(),
}).strict();

export const RuleSchema = z.object({
  id: NameSchema,
  context: z.string().default(''),
  priority: z.number().int().default(0),
  when: z.array(ConditionSchema).min(1),
  then: z.record(FactValueSchema).refine((effects) => Object.keys(effects).length > 0, {
    message: 'a rule needs at least one effect',
  }),
}).strict();

export const SuggestionRuleSchema = z.object({
  id: NameSchema,
  applies_to: z.array(NameSchema).min(1).default(['all']),
  when: z.array(ConditionSchema).default([]),
  item_when: z.array(ConditionSchema).default([]),
  text: z.string().min(1),
}).strict();

export const MaterialCompatibilitySchema = z.object({
  facts: z.array(NameSchema).min(1),
  property: NameSchema,
  mode: z.enum(['any', 'all']).default('any'),
}).strict();

// ============================================================================
// DOCUMENT
// ============================================================================

export const KnowledgeBaseDocumentSchema = z.object({
  version: z.union([z.string(), z.number()]).transform((value) => String(value)),
  scales: z.record(z.array(NameSchema).min(1)),
  enums: z.record(z.array(NameSchema).min(1)).default({}),
  attributes: z.record(AttributeSchema),
  lookups: z.record(z.record(z.record(FactValueSchema))).default({}),
  requirements: z.record(RequirementSchema),
  item_properties: z.record(ItemPropertySchema).default({}),
  matching: z.object({
    material_compatibility: MaterialCompatibilitySchema.optional(),
  }).strict().default({}),
  questions: z.array(QuestionSchema).default([]),
  items: z.array(ItemSchema),
  rules: z.array(RuleSchema).default([]),
  suggestion_rules: z.array(SuggestionRuleSchema).default([]),
}).strict();

export type ConditionDocument = z.infer<typeof ConditionSchema>;
export type AttributeDocument = z.infer<typeof AttributeSchema>;
export type ItemPropertyDocument = z.infer<typeof ItemPropertySchema>;
export type RequirementDocument = z.infer<typeof RequirementSchema>;
export type QuestionDocument = z.infer<typeof QuestionSchema>;
export type ItemDocument = z.infer<typeof ItemSchema>;
export type RuleDocument = z.infer<typeof RuleSchema>;
export type SuggestionRuleDocument = z.infer<typeof SuggestionRuleSchema>;
/** Input form: what a YAML author writes (defaults still optional). */
export type KnowledgeBaseDocumentInput = z.input<typeof KnowledgeBaseDocumentSchema>;
export type KnowledgeBaseDocument = z.output<typeof KnowledgeBaseDocumentSchema>;
