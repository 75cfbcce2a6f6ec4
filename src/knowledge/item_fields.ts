/**
 * @fileoverview Uniform access to item fields, built-in or in the property bag.
 */

import type { FactValue } from '../facts/types.js';
import type { Item } from './types.js';

/** A copy of a catalog item that shares nothing with the knowledge base. */
export function cloneItem(item: Item): Item {
  return {
    ...item,
    properties: cloneProperties(item.properties),
    notes: [...item.notes],
    requiresTools: [...item.requiresTools],
    surfacePrep: [...item.surfacePrep],
  };
}

export function cloneProperties(properties: Readonly<Record<string, FactValue>>): Record<string, FactValue> {
  return Object.fromEntries(
    Object.entries(properties).map(([key, value]) => [key, Array.isArray(value) ? [...value] : value]),
  );
}

export function itemFieldValue(item: Item, field: string): FactValue | undefined {
  switch (field) {
    case 'name':
      return item.name;
    case 'category':
      return item.category;
    case 'curing_time':
      return item.curingTime;
    case 'notes':
      return [...item.notes];
    case 'requires_tools':
      return [...item.requiresTools];
    case 'surface_prep':
      return [...item.surfacePrep];
    default: {
      const value = item.properties[field];
      return Array.isArray(value) ? [...value] : value;
    }
  }
}
