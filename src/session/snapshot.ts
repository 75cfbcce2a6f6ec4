/**
 * @fileoverview Session snapshot
 *
 * Structured, serializable view of a session for debug writers: case facts,
 * derived requirements, the fired-rule trace, the current recommendations
 * with their suggestions, and the audit trail. The core builds it; writing
 * it anywhere is the caller's business.
 */

import type { FactTree, FactValue } from '../facts/types.js';
import { cloneProperties } from '../knowledge/item_fields.js';
import type { RequirementChange } from '../rules/effects.js';
import type { AdvisorSession, AnswerRecord } from './session.js';

export interface SnapshotRule {
  id: string;
  context: string;
  priority: number;
  pass: number;
  sequence: number;
  changes: RequirementChange[];
}

export interface SnapshotRecommendation {
  name: string;
  category: string;
  properties: Record<string, FactValue>;
  curingTime: string | null;
  suggestions: string[];
}

export interface SessionSnapshot {
  sessionId: string;
  knowledgeBaseVersion: string;
  startedAt: string;
  capturedAt: string;
  facts: FactTree;
  requirements: FactTree;
  firedRules: SnapshotRule[];
  recommendationCount: number;
  recommendations: SnapshotRecommendation[];
  questionHistory: AnswerRecord[];
}

export function buildSnapshot(session: AdvisorSession, capturedAt: Date): SessionSnapshot {
  const recommendations = session.recommend().map(({ item, suggestions }) => ({
    name: item.name,
    category: item.category,
    properties: cloneProperties(item.properties),
    curingTime: item.curingTime ?? null,
    suggestions,
  }));

  return {
    sessionId: session.id,
    knowledgeBaseVersion: session.kb.version,
    startedAt: session.startedAt,
    capturedAt: capturedAt.toISOString(),
    facts: session.facts(),
    requirements: session.currentRequirements(),
    firedRules: session.firedRules().map((rule) => ({
      id: rule.ruleId,
      context: rule.context,
      priority: rule.priority,
      pass: rule.pass,
      sequence: rule.sequence,
      changes: rule.changes,
    })),
    recommendationCount: recommendations.length,
    recommendations,
    questionHistory: session.history(),
  };
}
