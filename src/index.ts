/**
 * @fileoverview Fastening Advisor
 *
 * Rule-based selection of fastening and bonding methods. A session collects
 * answers into a fact store, a forward-chaining evaluator derives
 * requirements from them, and a matcher gates the catalog against those
 * requirements, attaching advisory suggestions to every qualifying method.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadKnowledgeBaseFile, newSession, applyAnswer, recommend } from 'fastening-advisor';
 *
 * const kb = await loadKnowledgeBaseFile('data/knowledge_base.yaml');
 * const session = newSession(kb);
 * applyAnswer(session, 'material_a_type', 'wood');
 * applyAnswer(session, 'material_b_type', 'wood');
 *
 * for (const { item, suggestions } of recommend(session)) {
 *   console.log(item.name, suggestions);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PUBLIC API
// ============================================================================

export { newSession, applyAnswer, skipQuestion, currentRequirements, recommend } from './api/index.js';

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

export * from './knowledge/index.js';
export { FactStore, type ResolvedValues } from './facts/fact_store.js';
export * from './facts/types.js';
export { evaluateCondition, evaluateConditions, type EvaluationContext } from './rules/conditions.js';
export { applyEffect, mergeRequirement, type RequirementChange } from './rules/effects.js';
export { ForwardChainer, type ChainResult, type FiredRule } from './rules/forward_chainer.js';
export {
  Matcher,
  type GateFailure,
  type GateKind,
  type ItemAssessment,
  type Recommendation,
} from './matching/matcher.js';
export { collectSuggestions, renderTemplate, suggestionTargets } from './matching/suggestions.js';
export {
  AdvisorSession,
  type AnswerRecord,
  type ReplayAnswer,
  type SessionOptions,
} from './session/session.js';
export { coerceAnswer } from './session/answers.js';
export {
  DEFAULT_SEQUENCER_OPTIONS,
  nextQuestion,
  normalizeAnswer,
  rankQuestions,
  type NormalizedAnswer,
  type QuestionCandidate,
  type SequencerOptions,
} from './session/sequencer.js';
export { buildSnapshot, type SessionSnapshot } from './session/snapshot.js';

// ============================================================================
// AMBIENT
// ============================================================================

export { loadConfig, DEFAULT_KNOWLEDGE_BASE_PATH, type AdvisorConfig } from './config/index.js';
export * from './core/errors.js';
export { configureLogger, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

/**
 * Current advisor version.
 * The knowledge base carries its own `version`; this one describes the engine.
 */
export const ADVISOR_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
  string: '1.0.0',
} as const;
