/**
 * @fileoverview Question sequencer
 *
 * Picks the next question to put to the user and parses what they type.
 *
 * Questions that feed the material gate come first, in declaration order.
 * After that every open question (not answered or skipped, `ask_if` holding)
 * is tried out: each possible answer is simulated on a scratch copy of the
 * session, and a question is only a candidate when its answers lead to
 * different recommendations. Candidates are ranked by:
 *
 * 1. category coverage: while several categories remain, questions that
 *    apply to more than one of them are preferred
 * 2. expected elimination: the average number of methods an answer removes,
 *    relative to the most an evenly splitting question could remove
 * 3. declaration order
 */

import { InvalidAnswerError } from '../core/errors.js';
import type { FactValue } from '../facts/types.js';
import type { Question } from '../knowledge/types.js';
import { coerceAnswer } from './answers.js';
import type { AdvisorSession } from './session.js';

export interface SequencerOptions {
  /** Stop asking once this many recommendations or fewer remain. */
  stopWhenNarrowedTo?: number;
}

export const DEFAULT_SEQUENCER_OPTIONS: Required<SequencerOptions> = {
  stopWhenNarrowedTo: 1,
};

export type NormalizedAnswer =
  | { kind: 'skip' }
  | { kind: 'answer'; value: FactValue };

export interface QuestionCandidate {
  question: Question;
  /** Remaining categories the question applies to. */
  coverage: number;
  /** Expected elimination, from 0 to 1. */
  score: number;
}

const SKIP_INPUTS = ['s', 'skip'];

export function nextQuestion(session: AdvisorSession, options: SequencerOptions = {}): Question | null {
  const { stopWhenNarrowedTo } = { ...DEFAULT_SEQUENCER_OPTIONS, ...options };
  const open = [...session.kb.questions.values()].filter(
    (question) => !session.isSettled(question.id) && session.conditionsHold(question.askIf),
  );

  const materialFacts = session.kb.materialGate?.facts ?? [];
  const materialQuestion = open.find((question) => materialFacts.includes(question.attribute));
  if (materialQuestion) return materialQuestion;

  const remaining = session.recommend();
  if (remaining.length <= stopWhenNarrowedTo) return null;
  const categories = new Set(remaining.map(({ item }) => item.category));

  const candidates = rankQuestions(session, open, remaining.length, categories);
  const preferred =
    categories.size > 1 && candidates.some((candidate) => candidate.coverage > 1)
      ? candidates.filter((candidate) => candidate.coverage > 1)
      : candidates;

  let best: QuestionCandidate | undefined;
  for (const candidate of preferred) {
    if (!best || candidate.score > best.score) best = candidate;
  }
  return best?.question ?? null;
}

/** Open questions that can change the recommendations, in declaration order. */
export function rankQuestions(
  session: AdvisorSession,
  questions: readonly Question[],
  remaining: number,
  categories: ReadonlySet<string>,
): QuestionCandidate[] {
  const candidates: QuestionCandidate[] = [];
  for (const question of questions) {
    const coverage =
      question.applicableTo.length === 0
        ? categories.size
        : question.applicableTo.filter((category) => categories.has(category)).length;
    if (coverage === 0) continue;

    const outcomes = possibleAnswers(question).map((answer) => session.simulateAnswer(question.id, answer));
    const distinct = new Set(outcomes.map((names) => JSON.stringify(names)));
    if (distinct.size <= 1) continue;

    candidates.push({ question, coverage, score: eliminationScore(remaining, outcomes) });
  }
  return candidates;
}

function possibleAnswers(question: Question): FactValue[] {
  return question.kind === 'boolean' ? [true, false] : [...question.choices];
}

function eliminationScore(remaining: number, outcomes: readonly string[][]): number {
  const expected = outcomes.reduce((sum, names) => sum + names.length, 0) / outcomes.length;
  const evenSplit = remaining - remaining / outcomes.length;
  return evenSplit === 0 ? 0 : (remaining - expected) / evenSplit;
}

/**
 * Parse interactive input: `s`/`skip`, yes/no for boolean questions, and a
 * choice number (1-based) or choice text for choice questions.
 * @throws InvalidAnswerError when the input matches nothing
 */
export function normalizeAnswer(question: Question, input: string): NormalizedAnswer {
  const text = input.trim();
  const lowered = text.toLowerCase();
  if (SKIP_INPUTS.includes(lowered)) return { kind: 'skip' };

  if (question.kind === 'choice' && /^\d+$/.test(text)) {
    const choice = question.choices[Number(text) - 1];
    if (choice === undefined) {
      throw new InvalidAnswerError(question.id, `'${text}'`, `a number from 1 to ${question.choices.length}`);
    }
    return { kind: 'answer', value: choice };
  }

  const choice = question.choices.find((candidate) => candidate.toLowerCase() === lowered);
  return { kind: 'answer', value: coerceAnswer(question, choice ?? text) };
}
