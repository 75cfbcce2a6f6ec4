/**
 * @fileoverview Knowledge base: document schema, loader and compiled types
 */

export { loadKnowledgeBase, loadKnowledgeBaseFile, formatLocation, requirementValueType, type LoaderOptions } from './loader.js';
export { OrdinalScale } from './ordinal.js';
export { cloneItem, cloneProperties, itemFieldValue } from './item_fields.js';
export { KnowledgeBaseDocumentSchema, type KnowledgeBaseDocument, type KnowledgeBaseDocumentInput } from './schema.js';
export * from './types.js';
