/**
 * @fileoverview Advisor API
 *
 * Function-style entry points for collaborators (question sequencer, CLI,
 * debug writers). Each call takes the session explicitly; there is no
 * process-wide state.
 *
 * ```typescript
 * const kb = loadKnowledgeBase(yamlText);
 * const session = newSession(kb);
 * applyAnswer(session, 'material_a_type', 'wood');
 * const recommendations = recommend(session);
 * ```
 */

import type { FactTree } from '../facts/types.js';
import type { KnowledgeBase } from '../knowledge/types.js';
import type { Recommendation } from '../matching/matcher.js';
import type { ChainResult } from '../rules/forward_chainer.js';
import { AdvisorSession, type SessionOptions } from '../session/session.js';

export { loadKnowledgeBase, loadKnowledgeBaseFile, type LoaderOptions } from '../knowledge/loader.js';

export function newSession(kb: KnowledgeBase, options: SessionOptions = {}): AdvisorSession {
  return new AdvisorSession(kb, options);
}

/**
 * Validate and record an answer, then run inference to a fixed point.
 * @throws InvalidAnswerError when the answer does not fit the question
 */
export function applyAnswer(session: AdvisorSession, questionId: string, rawValue: unknown): ChainResult {
  return session.applyAnswer(questionId, rawValue);
}

export function skipQuestion(session: AdvisorSession, questionId: string): void {
  session.skipQuestion(questionId);
}

export function currentRequirements(session: AdvisorSession): FactTree {
  return session.currentRequirements();
}

/** Qualifying items for the facts known so far; empty is a valid answer. */
export function recommend(session: AdvisorSession): Recommendation[] {
  return session.recommend();
}
