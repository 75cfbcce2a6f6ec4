/**
 * @fileoverview Public advisor API
 */

export {
  loadKnowledgeBase,
  loadKnowledgeBaseFile,
  newSession,
  applyAnswer,
  skipQuestion,
  currentRequirements,
  recommend,
  type LoaderOptions,
} from './advisor.js';
