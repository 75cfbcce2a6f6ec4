/**
 * @fileoverview Knowledge Base Loader
 *
 * Turns a knowledge base document (YAML text or an already parsed object)
 * into a validated, read-only `KnowledgeBase`. The transform is purely
 * structural: shape checks come from the zod schemas, cross references
 * (scales, domains, declared attributes, unique ids) are checked here and
 * reported as `SchemaError`s carrying the offending location.
 *
 * References to attributes that no declaration covers are collected as
 * `UnknownAttributeError` diagnostics instead of failing the load; at
 * evaluation time such a reference is simply never satisfied.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import YAML, { YAMLParseError } from 'yaml';
import { SchemaError, UnknownAttributeError } from '../core/errors.js';
import {
  REQUIREMENTS_ROOT,
  formatFactValue,
  isQuantifier,
  isStringList,
  splitPath,
  type FactValue,
  type Scalar,
} from '../facts/types.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { OrdinalScale } from './ordinal.js';
import {
  KnowledgeBaseDocumentSchema,
  type AttributeDocument,
  type ConditionDocument,
  type ItemPropertyDocument,
  type KnowledgeBaseDocument,
} from './schema.js';
import {
  BUILTIN_ITEM_FIELDS,
  ITEM_DOMAIN,
  type AttributeType,
  type Condition,
  type ConditionSubject,
  type ConditionTest,
  type FactAttribute,
  type Item,
  type ItemProperty,
  type KnowledgeBase,
  type MaterialGate,
  type Question,
  type RequirementSpec,
  type Rule,
  type RuleEffect,
  type SuggestionRule,
} from './types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface LoaderOptions {
  /** Fail on undeclared attribute references instead of reporting them. */
  strictAttributes?: boolean;
  /** Label used in error messages, usually the file path. */
  source?: string;
}

const CATEGORY_DOMAIN = 'category';
const CURING_TIME_SCALE = 'curing_time';

/** Item fields that templates may print besides gated properties. */
const ITEM_TEXT_FIELDS = ['notes', 'requires_tools', 'surface_prep'];

const OPERATOR_KEYS = [
  'equals',
  'not_equals',
  'in',
  'not_in',
  'at_least',
  'at_most',
  'same_as',
  'differs_from',
] as const;

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load a knowledge base from YAML text or a parsed document object.
 * @throws SchemaError when the document is malformed or inconsistent
 */
export function loadKnowledgeBase(source: unknown, options: LoaderOptions = {}): KnowledgeBase {
  const raw = typeof source === 'string' ? parseYaml(source, options.source) : source;
  const parsed = KnowledgeBaseDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const [first, ...rest] = parsed.error.issues;
    const more = rest.length > 0 ? ` (and ${rest.length} more issue${rest.length === 1 ? '' : 's'})` : '';
    throw new SchemaError(formatLocation(first?.path ?? []), `${first?.message ?? 'invalid document'}${more}`, options.source);
  }

  const knowledgeBase = new KnowledgeBaseCompiler(parsed.data, options).compile();
  for (const diagnostic of knowledgeBase.diagnostics) {
    logWarning(diagnostic.message, { path: diagnostic.path, location: diagnostic.location });
  }
  return knowledgeBase;
}

/**
 * Read and load a knowledge base file.
 * @throws SchemaError when the file cannot be read or is invalid
 */
export async function loadKnowledgeBaseFile(path: string, options: LoaderOptions = {}): Promise<KnowledgeBase> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new SchemaError('document', `cannot read knowledge base: ${getErrorMessage(error)}`, path);
  }
  return loadKnowledgeBase(text, { source: path, ...options });
}

/** `['rules', 3, 'when', 0, 'fact']` → `rules[3].when[0].fact` */
export function formatLocation(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return 'document';
  return path.reduce<string>((location, segment) => {
    if (typeof segment === 'number') return `${location}[${segment}]`;
    return location ? `${location}.${segment}` : segment;
  }, '');
}

function parseYaml(text: string, source?: string): unknown {
  try {
    return YAML.parse(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const position = error.linePos?.[0];
      const location = position ? `line ${position.line}, column ${position.col}` : 'document';
      throw new SchemaError(location, error.message.split('\n')[0] ?? error.message, source);
    }
    throw error;
  }
}

// ============================================================================
// COMPILER
// ============================================================================

class KnowledgeBaseCompiler {
  private readonly diagnostics: UnknownAttributeError[] = [];
  private readonly scales = new Map<string, OrdinalScale>();
  private readonly enums = new Map<string, readonly string[]>();
  private readonly attributes = new Map<string, FactAttribute>();
  private readonly lookups = new Map<string, Map<string, Readonly<Record<string, FactValue>>>>();
  private readonly requirements = new Map<string, RequirementSpec>();
  private readonly itemProperties = new Map<string, ItemProperty>();
  private readonly items = new Map<string, Item>();

  constructor(
    private readonly doc: KnowledgeBaseDocument,
    private readonly options: LoaderOptions,
  ) {}

  compile(): KnowledgeBase {
    this.compileScales();
    this.compileEnums();
    this.compileAttributes();
    this.compileItemProperties();
    this.compileRequirements();
    this.compileLookups();
    const materialGate = this.compileMaterialGate();
    this.compileItems();
    const questions = this.compileQuestions();
    const rules = this.compileRules();
    const suggestionRules = this.compileSuggestionRules();

    const [firstDiagnostic] = this.diagnostics;
    if (this.options.strictAttributes && firstDiagnostic) {
      throw this.error(firstDiagnostic.location, `attribute '${firstDiagnostic.path}' is not declared`);
    }

    // Sessions share the compiled entities.
    freezeEntities(this.items);
    freezeEntities(questions);
    freezeEntities(rules);
    freezeEntities(suggestionRules);

    return {
      version: this.doc.version,
      source: this.options.source,
      scales: this.scales,
      enums: this.enums,
      attributes: this.attributes,
      lookups: this.lookups,
      requirements: this.requirements,
      itemProperties: this.itemProperties,
      materialGate,
      questions,
      items: this.items,
      rules,
      suggestionRules,
      diagnostics: [...this.diagnostics],
    };
  }

  // --------------------------------------------------------------------------
  // Domains and scales
  // --------------------------------------------------------------------------

  private compileScales(): void {
    for (const [name, levels] of Object.entries(this.doc.scales)) {
      if (name === ITEM_DOMAIN) {
        throw this.error(`scales.${name}`, `'${ITEM_DOMAIN}' is reserved for catalog item names`);
      }
      const duplicate = findDuplicate(levels);
      if (duplicate !== undefined) {
        throw this.error(`scales.${name}`, `duplicate level '${duplicate}'`);
      }
      this.scales.set(name, new OrdinalScale(name, levels));
    }
  }

  private compileEnums(): void {
    for (const [name, values] of Object.entries(this.doc.enums)) {
      if (name === ITEM_DOMAIN) {
        throw this.error(`enums.${name}`, `'${ITEM_DOMAIN}' is reserved for catalog item names`);
      }
      if (this.scales.has(name)) {
        throw this.error(`enums.${name}`, `'${name}' is already declared as a scale`);
      }
      const duplicate = findDuplicate(values);
      if (duplicate !== undefined) {
        throw this.error(`enums.${name}`, `duplicate value '${duplicate}'`);
      }
      this.enums.set(name, [...values]);
    }
    if (!this.enums.has(CATEGORY_DOMAIN)) {
      throw this.error(`enums.${CATEGORY_DOMAIN}`, 'the category enum is required');
    }
  }

  private hasDomain(name: string): boolean {
    return name === ITEM_DOMAIN || this.enums.has(name) || this.scales.has(name);
  }

  private domainValues(name: string): readonly string[] {
    if (name === ITEM_DOMAIN) return [...this.items.keys()];
    return this.enums.get(name) ?? this.scales.get(name)?.levels ?? [];
  }

  private compileAttributeType(raw: AttributeDocument | ItemPropertyDocument, location: string): AttributeType {
    switch (raw.type) {
      case 'boolean':
        return { type: 'boolean' };
      case 'ordinal': {
        if (!raw.scale) throw this.error(location, "ordinal declarations need a 'scale'");
        if (!this.scales.has(raw.scale)) throw this.error(`${location}.scale`, `unknown scale '${raw.scale}'`);
        return { type: 'ordinal', scale: raw.scale };
      }
      case 'enum': {
        if (!raw.domain) throw this.error(location, "enum declarations need a 'domain'");
        if (!this.hasDomain(raw.domain)) throw this.error(`${location}.domain`, `unknown domain '${raw.domain}'`);
        return { type: 'enum', domain: raw.domain };
      }
      case 'set': {
        if (!raw.domain) throw this.error(location, "set declarations need a 'domain'");
        if (!this.hasDomain(raw.domain)) throw this.error(`${location}.domain`, `unknown domain '${raw.domain}'`);
        return { type: 'set', domain: raw.domain };
      }
    }
  }

  /** Reason why `value` does not fit `type`, or null when it does. */
  private checkValue(type: AttributeType, value: FactValue): string | null {
    switch (type.type) {
      case 'boolean':
        return typeof value === 'boolean' ? null : `expected true or false, got '${formatFactValue(value)}'`;
      case 'ordinal': {
        const scale = this.scales.get(type.scale);
        return scale?.has(value) ? null : `'${formatFactValue(value)}' is not a level of scale '${type.scale}'`;
      }
      case 'enum': {
        const domain = this.domainValues(type.domain);
        return typeof value === 'string' && domain.includes(value)
          ? null
          : `'${formatFactValue(value)}' is outside domain '${type.domain}'`;
      }
      case 'set': {
        if (!isStringList(value)) return `expected a list of '${type.domain}' values`;
        const domain = this.domainValues(type.domain);
        const outside = value.find((entry) => !domain.includes(entry));
        return outside === undefined ? null : `'${outside}' is outside domain '${type.domain}'`;
      }
    }
  }

  // --------------------------------------------------------------------------
  // Declarations
  // --------------------------------------------------------------------------

  private compileAttributes(): void {
    for (const [path, raw] of Object.entries(this.doc.attributes)) {
      const location = `attributes.${path}`;
      const segments = splitPath(path);
      if (segments.join('.') !== path) {
        throw this.error(location, 'malformed attribute path');
      }
      if (segments[0] === REQUIREMENTS_ROOT) {
        throw this.error(location, `'${REQUIREMENTS_ROOT}.' is reserved for derived requirements`);
      }
      if (segments.some(isQuantifier)) {
        throw this.error(location, "'any' and 'every' are reserved path segments");
      }
      const type = this.compileAttributeType(raw, location);
      if (raw.lookup !== undefined && type.type !== 'enum') {
        throw this.error(`${location}.lookup`, 'only enum attributes can drive a lookup');
      }
      this.attributes.set(path, { ...type, path, lookup: raw.lookup });
    }

    const paths = [...this.attributes.keys()];
    for (const path of paths) {
      const nested = paths.find((other) => other.startsWith(`${path}.`));
      if (nested) {
        throw this.error(`attributes.${nested}`, `'${path}' is declared as a value and cannot have children`);
      }
    }
  }

  private compileItemProperties(): void {
    for (const [name, raw] of Object.entries(this.doc.item_properties)) {
      const location = `item_properties.${name}`;
      if (BUILTIN_ITEM_FIELDS.some((field) => field === name) || ITEM_TEXT_FIELDS.includes(name)) {
        throw this.error(location, `'${name}' is a built-in item field`);
      }
      const type = this.compileAttributeType(raw, location);
      if (raw.default !== undefined) {
        const reason = this.checkValue(type, raw.default);
        if (reason) throw this.error(`${location}.default`, reason);
      }
      this.itemProperties.set(name, { ...type, name, default: raw.default });
    }
  }

  /** Type of an item field: built-in fields first, then the property bag. */
  private itemFieldType(property: string): AttributeType | undefined {
    switch (property) {
      case 'name':
        return { type: 'enum', domain: ITEM_DOMAIN };
      case 'category':
        return { type: 'enum', domain: CATEGORY_DOMAIN };
      case 'curing_time':
        return this.scales.has(CURING_TIME_SCALE) ? { type: 'ordinal', scale: CURING_TIME_SCALE } : undefined;
      default:
        return this.itemProperties.get(property);
    }
  }

  private compileRequirements(): void {
    for (const [name, raw] of Object.entries(this.doc.requirements)) {
      const location = `requirements.${name}`;
      if (name.includes('.') || isQuantifier(name)) {
        throw this.error(location, 'requirement names must be a single path segment');
      }
      switch (raw.kind) {
        case 'min':
        case 'max': {
          if (!raw.scale) throw this.error(location, `'${raw.kind}' requirements need a 'scale'`);
          if (!this.scales.has(raw.scale)) throw this.error(`${location}.scale`, `unknown scale '${raw.scale}'`);
          if (raw.property) {
            this.checkGatedProperty(`${location}.property`, raw.property, { type: 'ordinal', scale: raw.scale });
          }
          this.requirements.set(name, {
            name,
            description: raw.description,
            kind: raw.kind,
            scale: raw.scale,
            property: raw.property,
          });
          break;
        }
        case 'allowed':
        case 'excluded': {
          if (!raw.domain) throw this.error(location, `'${raw.kind}' requirements need a 'domain'`);
          if (!this.hasDomain(raw.domain)) throw this.error(`${location}.domain`, `unknown domain '${raw.domain}'`);
          if (raw.property) {
            this.checkGatedProperty(`${location}.property`, raw.property, { type: 'enum', domain: raw.domain });
          }
          this.requirements.set(name, {
            name,
            description: raw.description,
            kind: raw.kind,
            domain: raw.domain,
            property: raw.property,
          });
          break;
        }
        case 'flag': {
          if (raw.gate) {
            this.checkGatedProperty(`${location}.gate.property`, raw.gate.property, { type: 'boolean' });
          }
          this.requirements.set(name, { name, description: raw.description, kind: 'flag', gate: raw.gate });
          break;
        }
      }
    }
  }

  private checkGatedProperty(location: string, property: string, expected: AttributeType): void {
    const actual = this.itemFieldType(property);
    if (!actual) throw this.error(location, `unknown item property '${property}'`);

    let compatible = false;
    switch (expected.type) {
      case 'ordinal':
        compatible = actual.type === 'ordinal' && actual.scale === expected.scale;
        break;
      case 'boolean':
        compatible = actual.type === 'boolean';
        break;
      case 'enum':
      case 'set':
        compatible = (actual.type === 'enum' || actual.type === 'set') && actual.domain === expected.domain;
        break;
    }
    if (!compatible) {
      throw this.error(location, `item property '${property}' (${describeType(actual)}) cannot be gated as ${describeType(expected)}`);
    }
  }

  private compileLookups(): void {
    for (const [table, entries] of Object.entries(this.doc.lookups)) {
      this.lookups.set(table, new Map(Object.entries(entries)));
    }

    for (const attribute of this.attributes.values()) {
      if (attribute.lookup === undefined || attribute.type !== 'enum') continue;
      const table = this.lookups.get(attribute.lookup);
      if (!table) {
        throw this.error(`attributes.${attribute.path}.lookup`, `unknown lookup table '${attribute.lookup}'`);
      }
      const domain = this.domainValues(attribute.domain);
      const parent = splitPath(attribute.path).slice(0, -1).join('.');
      for (const [key, entry] of table) {
        if (!domain.includes(key)) {
          throw this.error(`lookups.${attribute.lookup}.${key}`, `'${key}' is outside domain '${attribute.domain}'`);
        }
        for (const [field, value] of Object.entries(entry)) {
          const location = `lookups.${attribute.lookup}.${key}.${field}`;
          const sibling = parent ? `${parent}.${field}` : field;
          const declaration = this.attributes.get(sibling);
          if (!declaration) throw this.error(location, `no attribute '${sibling}' is declared`);
          const reason = this.checkValue(declaration, value);
          if (reason) throw this.error(location, reason);
        }
      }
    }
  }

  private compileMaterialGate(): MaterialGate | null {
    const raw = this.doc.matching.material_compatibility;
    if (!raw) return null;
    const location = 'matching.material_compatibility';

    const property = this.itemProperties.get(raw.property);
    if (!property || property.type !== 'set') {
      throw this.error(`${location}.property`, `'${raw.property}' must be a declared set-valued item property`);
    }
    raw.facts.forEach((path, index) => {
      const attribute = this.attributes.get(path);
      if (!attribute) throw this.error(`${location}.facts[${index}]`, `undeclared attribute '${path}'`);
      if (attribute.type !== 'enum' || attribute.domain !== property.domain) {
        throw this.error(`${location}.facts[${index}]`, `'${path}' must be an enum over domain '${property.domain}'`);
      }
    });
    return { facts: [...raw.facts], property: raw.property, mode: raw.mode };
  }

  // --------------------------------------------------------------------------
  // Catalog
  // --------------------------------------------------------------------------

  private compileItems(): void {
    const categories = this.domainValues(CATEGORY_DOMAIN);
    this.doc.items.forEach((raw, index) => {
      const location = `items[${index}]`;
      if (this.items.has(raw.name)) {
        throw this.error(`${location}.name`, `duplicate item name '${raw.name}'`);
      }
      if (!categories.includes(raw.category)) {
        throw this.error(`${location}.category`, `'${raw.category}' is outside domain '${CATEGORY_DOMAIN}'`);
      }

      for (const key of Object.keys(raw.properties)) {
        if (!this.itemProperties.has(key)) {
          throw this.error(`${location}.properties.${key}`, `undeclared item property '${key}'`);
        }
      }
      const properties: Record<string, FactValue> = {};
      for (const [name, declaration] of this.itemProperties) {
        const value = name in raw.properties ? raw.properties[name] : declaration.default;
        if (value === undefined) {
          throw this.error(`${location}.properties.${name}`, 'required property is missing');
        }
        const reason = this.checkValue(declaration, value);
        if (reason) throw this.error(`${location}.properties.${name}`, reason);
        properties[name] = Array.isArray(value) ? [...value] : value;
      }

      if (raw.curing_time !== undefined) {
        const scale = this.scales.get(CURING_TIME_SCALE);
        if (!scale) {
          throw this.error(`${location}.curing_time`, `declare a '${CURING_TIME_SCALE}' scale to use curing times`);
        }
        if (!scale.has(raw.curing_time)) {
          throw this.error(`${location}.curing_time`, `'${raw.curing_time}' is not a level of scale '${CURING_TIME_SCALE}'`);
        }
      }

      this.items.set(raw.name, {
        name: raw.name,
        category: raw.category,
        properties,
        notes: [...raw.notes],
        requiresTools: [...raw.requires_tools],
        surfacePrep: [...raw.surface_prep],
        curingTime: raw.curing_time,
      });
    });
  }

  // --------------------------------------------------------------------------
  // Questions
  // --------------------------------------------------------------------------

  private compileQuestions(): Map<string, Question> {
    const questions = new Map<string, Question>();
    const categories = this.domainValues(CATEGORY_DOMAIN);

    this.doc.questions.forEach((raw, index) => {
      const location = `questions[${index}]`;
      if (questions.has(raw.id)) {
        throw this.error(`${location}.id`, `duplicate question id '${raw.id}'`);
      }
      const attribute = this.attributes.get(raw.attribute);
      if (!attribute) {
        throw this.error(`${location}.attribute`, `undeclared attribute '${raw.attribute}'`);
      }

      let choices: string[] = [];
      if (raw.kind === 'boolean') {
        if (attribute.type !== 'boolean') {
          throw this.error(`${location}.kind`, `boolean question writes to ${attribute.type} attribute '${raw.attribute}'`);
        }
        if (raw.choices) throw this.error(`${location}.choices`, 'boolean questions take no choices');
      } else {
        let domain: readonly string[];
        if (attribute.type === 'enum') {
          domain = this.domainValues(attribute.domain);
        } else if (attribute.type === 'ordinal') {
          domain = this.domainValues(attribute.scale);
        } else {
          throw this.error(`${location}.kind`, `choice question writes to ${attribute.type} attribute '${raw.attribute}'`);
        }
        (raw.choices ?? []).forEach((choice, choiceIndex) => {
          if (!domain.includes(choice)) {
            throw this.error(`${location}.choices[${choiceIndex}]`, `'${choice}' is outside the domain of '${raw.attribute}'`);
          }
        });
        choices = raw.choices ? [...raw.choices] : [...domain];
        const duplicate = findDuplicate(choices);
        if (duplicate !== undefined) throw this.error(`${location}.choices`, `duplicate choice '${duplicate}'`);
      }

      raw.applicable_to.forEach((category, categoryIndex) => {
        if (!categories.includes(category)) {
          throw this.error(`${location}.applicable_to[${categoryIndex}]`, `'${category}' is outside domain '${CATEGORY_DOMAIN}'`);
        }
      });

      questions.set(raw.id, {
        id: raw.id,
        prompt: raw.prompt,
        kind: raw.kind,
        attribute: raw.attribute,
        choices,
        askIf: raw.ask_if.map((condition, i) => this.compileCondition(condition, `${location}.ask_if[${i}]`, 'fact')),
        applicableTo: [...raw.applicable_to],
        rationale: [...raw.rationale],
      });
    });
    return questions;
  }

  // --------------------------------------------------------------------------
  // Rules
  // --------------------------------------------------------------------------

  private compileRules(): Map<string, Rule> {
    const rules = new Map<string, Rule>();
    this.doc.rules.forEach((raw, index) => {
      const location = `rules[${index}]`;
      if (rules.has(raw.id)) {
        throw this.error(`${location}.id`, `duplicate rule id '${raw.id}'`);
      }
      const then: RuleEffect[] = Object.entries(raw.then).map(([requirement, value]) => ({
        requirement,
        value: this.compileEffectValue(requirement, value, `${location}.then.${requirement}`),
      }));
      rules.set(raw.id, {
        id: raw.id,
        context: raw.context,
        priority: raw.priority,
        order: index,
        when: raw.when.map((condition, i) => this.compileCondition(condition, `${location}.when[${i}]`, 'fact')),
        then,
      });
    });
    return rules;
  }

  private compileEffectValue(name: string, value: FactValue, location: string): FactValue {
    const spec = this.requirements.get(name);
    if (!spec) throw this.error(location, `undeclared requirement '${name}'`);

    switch (spec.kind) {
      case 'min':
      case 'max': {
        const scale = this.scales.get(spec.scale);
        if (!scale || !scale.has(value)) {
          throw this.error(location, `'${formatFactValue(value)}' is not a level of scale '${spec.scale}'`);
        }
        return value;
      }
      case 'allowed':
      case 'excluded': {
        const values = typeof value === 'string' ? [value] : isStringList(value) ? value : null;
        if (!values) throw this.error(location, `expected a list of '${spec.domain}' values`);
        if (spec.kind === 'allowed' && values.length === 0) {
          throw this.error(location, 'an empty allowed set admits no item; drop the effect instead');
        }
        const domain = this.domainValues(spec.domain);
        const outside = values.find((entry) => !domain.includes(entry));
        if (outside !== undefined) {
          throw this.error(location, `'${outside}' is outside domain '${spec.domain}'`);
        }
        return [...new Set(values)];
      }
      case 'flag': {
        if (typeof value !== 'boolean') {
          throw this.error(location, `expected true or false, got '${formatFactValue(value)}'`);
        }
        return value;
      }
    }
  }

  private compileSuggestionRules(): Map<string, SuggestionRule> {
    const suggestionRules = new Map<string, SuggestionRule>();
    this.doc.suggestion_rules.forEach((raw, index) => {
      const location = `suggestion_rules[${index}]`;
      if (suggestionRules.has(raw.id)) {
        throw this.error(`${location}.id`, `duplicate suggestion rule id '${raw.id}'`);
      }
      this.checkTemplate(raw.text, `${location}.text`);
      suggestionRules.set(raw.id, {
        id: raw.id,
        appliesTo: [...raw.applies_to],
        when: raw.when.map((condition, i) => this.compileCondition(condition, `${location}.when[${i}]`, 'fact')),
        itemWhen: raw.item_when.map((condition, i) =>
          this.compileCondition(condition, `${location}.item_when[${i}]`, 'item'),
        ),
        text: raw.text,
      });
    });
    return suggestionRules;
  }

  private checkTemplate(text: string, location: string): void {
    for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
      const key = (match[1] ?? '').trim();
      if (key.startsWith('item.')) {
        const field = key.slice('item.'.length);
        if (!this.itemFieldType(field) && !ITEM_TEXT_FIELDS.includes(field)) {
          this.report(key, location);
        }
      } else {
        this.resolveFactPath(key, location);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Conditions
  // --------------------------------------------------------------------------

  private compileCondition(raw: ConditionDocument, location: string, subjectKind: 'fact' | 'item'): Condition {
    const operators = OPERATOR_KEYS.filter((key) => raw[key] !== undefined);
    if (operators.length !== 1) {
      throw this.error(location, `a condition needs exactly one operator (${OPERATOR_KEYS.join(', ')})`);
    }

    let subject: ConditionSubject;
    let declared: AttributeType | null;
    if (subjectKind === 'item') {
      if (raw.fact !== undefined || raw.item === undefined) {
        throw this.error(location, "item conditions take an 'item' property and no 'fact'");
      }
      subject = { kind: 'item', property: raw.item };
      declared = this.itemFieldType(raw.item) ?? null;
      if (!declared) this.report(`item.${raw.item}`, `${location}.item`);
    } else {
      if (raw.item !== undefined || raw.fact === undefined) {
        throw this.error(location, "conditions here take a 'fact' path and no 'item'");
      }
      subject = { kind: 'fact', path: raw.fact };
      declared = this.resolveFactPath(raw.fact, `${location}.fact`);
    }

    return { subject, test: this.compileTest(raw, declared, location), location };
  }

  private compileTest(raw: ConditionDocument, declared: AttributeType | null, location: string): ConditionTest {
    if (raw.equals !== undefined) {
      return { op: 'equals', value: this.checkOperand(declared, raw.equals, `${location}.equals`) };
    }
    if (raw.not_equals !== undefined) {
      return { op: 'not_equals', value: this.checkOperand(declared, raw.not_equals, `${location}.not_equals`) };
    }
    if (raw.in !== undefined) {
      return { op: 'in', values: raw.in.map((value, i) => this.checkOperand(declared, value, `${location}.in[${i}]`)) };
    }
    if (raw.not_in !== undefined) {
      return {
        op: 'not_in',
        values: raw.not_in.map((value, i) => this.checkOperand(declared, value, `${location}.not_in[${i}]`)),
      };
    }
    if (raw.at_least !== undefined) {
      return { op: 'at_least', level: raw.at_least, scale: this.ordinalScaleFor(declared, raw.at_least, `${location}.at_least`) };
    }
    if (raw.at_most !== undefined) {
      return { op: 'at_most', level: raw.at_most, scale: this.ordinalScaleFor(declared, raw.at_most, `${location}.at_most`) };
    }
    if (raw.same_as !== undefined) {
      this.resolveFactPath(raw.same_as, `${location}.same_as`);
      return { op: 'same_as', path: raw.same_as };
    }
    if (raw.differs_from !== undefined) {
      this.resolveFactPath(raw.differs_from, `${location}.differs_from`);
      return { op: 'differs_from', path: raw.differs_from };
    }
    throw this.error(location, 'missing condition operator');
  }

  private checkOperand(declared: AttributeType | null, value: Scalar, location: string): Scalar {
    if (!declared) return value;
    const element: AttributeType = declared.type === 'set' ? { type: 'enum', domain: declared.domain } : declared;
    const reason = this.checkValue(element, value);
    if (reason) throw this.error(location, reason);
    return value;
  }

  private ordinalScaleFor(declared: AttributeType | null, level: string, location: string): OrdinalScale {
    const scale = declared?.type === 'ordinal' ? this.scales.get(declared.scale) : undefined;
    if (!scale) {
      throw this.error(location, 'ordinal comparisons need an attribute declared on an ordinal scale');
    }
    if (!scale.has(level)) {
      throw this.error(location, `'${level}' is not a level of scale '${scale.name}'`);
    }
    return scale;
  }

  /**
   * Declared type of a fact path (quantifier segments match any child), or
   * null after recording a diagnostic when nothing declares it.
   */
  private resolveFactPath(path: string, location: string): AttributeType | null {
    const segments = splitPath(path);
    if (segments.filter(isQuantifier).length > 1) {
      throw this.error(location, "a path may contain at most one 'any' or 'every' segment");
    }

    if (segments[0] === REQUIREMENTS_ROOT) {
      const spec = segments.length === 2 ? this.requirements.get(segments[1] ?? '') : undefined;
      if (!spec) {
        this.report(path, location);
        return null;
      }
      return requirementValueType(spec);
    }

    const matches = [...this.attributes.values()].filter((attribute) =>
      pathMatches(splitPath(attribute.path), segments),
    );
    const [first] = matches;
    if (!first) {
      this.report(path, location);
      return null;
    }
    if (matches.some((attribute) => describeType(attribute) !== describeType(first))) {
      throw this.error(location, `'${path}' spans attributes of different types`);
    }
    return first;
  }

  // --------------------------------------------------------------------------
  // Reporting
  // --------------------------------------------------------------------------

  private report(path: string, location: string): void {
    this.diagnostics.push(new UnknownAttributeError(path, location));
  }

  private error(location: string, reason: string): SchemaError {
    return new SchemaError(location, reason, this.options.source);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/** Type of the value a requirement holds in the fact store. */
export function requirementValueType(spec: RequirementSpec): AttributeType {
  switch (spec.kind) {
    case 'min':
    case 'max':
      return { type: 'ordinal', scale: spec.scale };
    case 'allowed':
    case 'excluded':
      return { type: 'set', domain: spec.domain };
    case 'flag':
      return { type: 'boolean' };
  }
}

function pathMatches(declared: string[], query: string[]): boolean {
  return (
    declared.length === query.length &&
    query.every((segment, index) => isQuantifier(segment) || segment === declared[index])
  );
}

function describeType(type: AttributeType): string {
  switch (type.type) {
    case 'boolean':
      return 'boolean';
    case 'ordinal':
      return `ordinal:${type.scale}`;
    case 'enum':
      return `enum:${type.domain}`;
    case 'set':
      return `set:${type.domain}`;
  }
}

function findDuplicate(values: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

function freezeEntities(entities: ReadonlyMap<string, object>): void {
  for (const entity of entities.values()) {
    freezeDeep(entity);
  }
}

/** Freeze plain objects and arrays; class instances such as scales are left alone. */
function freezeDeep(value: unknown): void {
  if (Array.isArray(value)) {
    value.forEach((entry) => freezeDeep(entry));
  } else if (isPlainObject(value)) {
    Object.values(value).forEach((entry) => freezeDeep(entry));
  } else {
    return;
  }
  Object.freeze(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}
