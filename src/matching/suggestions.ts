/**
 * @fileoverview Suggestion rules
 *
 * Advisory text attached to a qualifying item. A suggestion rule contributes
 * when its `applies_to` targets the item and both its fact conditions and its
 * item conditions hold. Suggestions keep rule declaration order.
 */

import type { FactStore } from '../facts/fact_store.js';
import { formatFactValue, type FactValue } from '../facts/types.js';
import { itemFieldValue } from '../knowledge/item_fields.js';
import type { Item, KnowledgeBase, SuggestionRule } from '../knowledge/types.js';
import { evaluateConditions } from '../rules/conditions.js';

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;
const ALL_ITEMS = 'all';

/**
 * `all`, a category name, or a case-insensitive fragment of the item name.
 */
export function suggestionTargets(rule: SuggestionRule, item: Item, kb: KnowledgeBase): boolean {
  const categories = kb.enums.get('category') ?? [];
  const name = item.name.toLowerCase();
  return rule.appliesTo.some((target) => {
    if (target === ALL_ITEMS) return true;
    if (categories.includes(target)) return item.category === target;
    return name.includes(target.toLowerCase());
  });
}

export function collectSuggestions(kb: KnowledgeBase, store: FactStore, item: Item): string[] {
  const suggestions: string[] = [];
  for (const rule of kb.suggestionRules.values()) {
    if (!suggestionTargets(rule, item, kb)) continue;
    if (!evaluateConditions(rule.when, { store })) continue;
    if (!evaluateConditions(rule.itemWhen, { store, item })) continue;
    suggestions.push(renderTemplate(rule.text, store, item));
  }
  return suggestions;
}

/**
 * Fill `{item.<field>}` and `{<fact path>}` placeholders. Lists are joined
 * with `, `; missing values render as `unknown`.
 */
export function renderTemplate(text: string, store: FactStore, item?: Item): string {
  return text.replace(PLACEHOLDER_PATTERN, (_match, rawKey: string) => {
    const key = rawKey.trim();
    let value: FactValue | undefined;
    if (key.startsWith('item.')) {
      value = item ? itemFieldValue(item, key.slice('item.'.length)) : undefined;
    } else {
      const resolved = store.resolve(key);
      if (resolved.quantifier === null) {
        value = resolved.values[0];
      } else {
        const known = resolved.values.flatMap((entry) =>
          entry === undefined ? [] : Array.isArray(entry) ? entry : [String(entry)],
        );
        value = known.length > 0 ? known : undefined;
      }
    }
    return formatFactValue(value);
  });
}
