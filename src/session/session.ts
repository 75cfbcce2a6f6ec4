/**
 * @fileoverview Advisor Session
 *
 * One consultation: a private fact store, the per-session fired-rule set and
 * the question/answer audit trail, over a shared read-only knowledge base.
 * Every accepted answer is followed by a complete forward-chaining run before
 * control returns to the caller.
 */

import { randomUUID } from 'node:crypto';
import { InvalidAnswerError } from '../core/errors.js';
import { FactStore } from '../facts/fact_store.js';
import { REQUIREMENTS_ROOT, splitPath, type FactTree, type FactValue } from '../facts/types.js';
import type { Condition, KnowledgeBase, Question } from '../knowledge/types.js';
import { Matcher, type ItemAssessment, type Recommendation } from '../matching/matcher.js';
import { evaluateConditions } from '../rules/conditions.js';
import { ForwardChainer, type ChainResult, type FiredRule } from '../rules/forward_chainer.js';
import { logDebug } from '../telemetry/logger.js';
import { coerceAnswer, describeRaw } from './answers.js';
import { buildSnapshot, type SessionSnapshot } from './snapshot.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SessionOptions {
  id?: string;
  /** Source of audit-trail timestamps. */
  clock?: () => Date;
  /** Facts known before the first question (e.g. from a caller's form). */
  seed?: FactTree;
}

export interface AnswerRecord {
  questionId: string;
  attribute: string;
  /** `null` when the question was skipped. */
  answer: FactValue | null;
  timestamp: string;
}

/** A previously given answer, as stored in an answers file. */
export interface ReplayAnswer {
  questionId: string;
  /** `null` replays a skip. */
  answer: unknown;
}

// ============================================================================
// SESSION
// ============================================================================

export class AdvisorSession {
  readonly id: string;
  readonly startedAt: string;
  private readonly store: FactStore;
  private readonly chainer: ForwardChainer;
  private readonly matcher: Matcher;
  private readonly clock: () => Date;
  private readonly firedIds = new Set<string>();
  private readonly fired: FiredRule[] = [];
  private readonly trail: AnswerRecord[] = [];

  constructor(
    readonly kb: KnowledgeBase,
    options: SessionOptions = {},
  ) {
    this.id = options.id ?? randomUUID();
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock().toISOString();
    this.store = new FactStore(options.seed);
    this.chainer = new ForwardChainer(kb);
    this.matcher = new Matcher(kb);
    if (options.seed && Object.keys(options.seed).length > 0) {
      this.infer();
    }
  }

  /** Rebuild a session from answers given in an earlier run, in order. */
  static replay(kb: KnowledgeBase, answers: readonly ReplayAnswer[], options: SessionOptions = {}): AdvisorSession {
    const session = new AdvisorSession(kb, options);
    for (const { questionId, answer } of answers) {
      if (answer === null) {
        session.skipQuestion(questionId);
      } else {
        session.applyAnswer(questionId, answer);
      }
    }
    return session;
  }

  // --------------------------------------------------------------------------
  // Answers
  // --------------------------------------------------------------------------

  /**
   * Validate and record an answer, then run inference to a fixed point.
   * @throws InvalidAnswerError leaving the session unchanged
   */
  applyAnswer(questionId: string, raw: unknown): ChainResult {
    const question = this.requireOpenQuestion(questionId, raw);
    const value = coerceAnswer(question, raw);

    this.writeFact(this.store, question.attribute, value);
    this.trail.push({
      questionId,
      attribute: question.attribute,
      answer: value,
      timestamp: this.clock().toISOString(),
    });
    return this.infer();
  }

  /** Record that the user declined to answer; no fact is written. */
  skipQuestion(questionId: string): void {
    const question = this.requireOpenQuestion(questionId, null);
    this.trail.push({
      questionId,
      attribute: question.attribute,
      answer: null,
      timestamp: this.clock().toISOString(),
    });
  }

  /**
   * Names of the items that would qualify after answering `questionId` with
   * `raw`. Runs inference on a scratch copy of the facts and fired-rule set;
   * this session is left untouched.
   * @throws InvalidAnswerError under the same conditions as `applyAnswer`
   */
  simulateAnswer(questionId: string, raw: unknown): string[] {
    const question = this.requireOpenQuestion(questionId, raw);
    const value = coerceAnswer(question, raw);

    const scratch = this.store.clone();
    this.writeFact(scratch, question.attribute, value);
    this.chainer.run(scratch, new Set(this.firedIds));
    return this.matcher.qualifyingNames(scratch);
  }

  isSettled(questionId: string): boolean {
    return this.trail.some((record) => record.questionId === questionId);
  }

  // --------------------------------------------------------------------------
  // Read accessors
  // --------------------------------------------------------------------------

  currentRequirements(): FactTree {
    return this.store.section(REQUIREMENTS_ROOT);
  }

  /** Case facts (answers and looked-up values), without requirements. */
  facts(): FactTree {
    const { [REQUIREMENTS_ROOT]: _requirements, ...facts } = this.store.snapshot();
    return facts;
  }

  getFact(path: string): FactValue | undefined {
    return this.store.get(path);
  }

  conditionsHold(conditions: readonly Condition[]): boolean {
    return evaluateConditions(conditions, { store: this.store });
  }

  recommend(): Recommendation[] {
    return this.matcher.recommend(this.store);
  }

  assess(): ItemAssessment[] {
    return this.matcher.assess(this.store);
  }

  firedRules(): FiredRule[] {
    return this.fired.map((rule) => ({ ...rule, changes: rule.changes.map((change) => ({ ...change })) }));
  }

  history(): AnswerRecord[] {
    return this.trail.map((record) => ({ ...record }));
  }

  snapshot(): SessionSnapshot {
    return buildSnapshot(this, this.clock());
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private requireOpenQuestion(questionId: string, raw: unknown): Question {
    const question = this.kb.questions.get(questionId);
    if (!question) {
      throw new InvalidAnswerError(questionId, describeRaw(raw), 'a question defined in the knowledge base');
    }
    if (this.isSettled(questionId)) {
      throw new InvalidAnswerError(questionId, describeRaw(raw), 'a question not yet answered or skipped');
    }
    return question;
  }

  /** Write an answer and the sibling values its lookup table provides. */
  private writeFact(store: FactStore, path: string, value: FactValue): void {
    store.set(path, value);

    const attribute = this.kb.attributes.get(path);
    if (attribute?.lookup === undefined || typeof value !== 'string') return;
    const entry = this.kb.lookups.get(attribute.lookup)?.get(value);
    if (!entry) return;

    const parent = splitPath(path).slice(0, -1).join('.');
    for (const [field, fieldValue] of Object.entries(entry)) {
      store.set(parent ? `${parent}.${field}` : field, fieldValue);
    }
  }

  private infer(): ChainResult {
    const result = this.chainer.run(this.store, this.firedIds, this.fired.length);
    for (const rule of result.fired) {
      this.fired.push(rule);
      logDebug(`Rule fired: ${rule.ruleId}`, {
        session: this.id,
        pass: rule.pass,
        priority: rule.priority,
        changed: rule.changes.filter((change) => change.changed).map((change) => change.requirement),
      });
    }
    return result;
  }
}
