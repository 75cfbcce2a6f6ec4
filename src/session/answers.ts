/**
 * @fileoverview Answer validation
 *
 * Maps a raw answer onto the value a question's attribute holds, or raises
 * `InvalidAnswerError` so the caller can re-prompt.
 */

import { InvalidAnswerError } from '../core/errors.js';
import type { FactValue } from '../facts/types.js';
import type { Question } from '../knowledge/types.js';

const BOOLEAN_ANSWERS: Readonly<Record<string, boolean>> = {
  true: true,
  yes: true,
  y: true,
  false: false,
  no: false,
  n: false,
};

export function coerceAnswer(question: Question, raw: unknown): FactValue {
  if (question.kind === 'boolean') {
    if (typeof raw === 'boolean') return raw;
    if (typeof raw === 'string') {
      const parsed = BOOLEAN_ANSWERS[raw.trim().toLowerCase()];
      if (parsed !== undefined) return parsed;
    }
    throw new InvalidAnswerError(question.id, describeRaw(raw), 'yes or no');
  }

  const choice = typeof raw === 'string' ? raw.trim() : undefined;
  if (choice !== undefined && question.choices.includes(choice)) return choice;
  throw new InvalidAnswerError(question.id, describeRaw(raw), `one of ${question.choices.join(', ')}`);
}

export function describeRaw(raw: unknown): string {
  if (typeof raw === 'string') return `'${raw}'`;
  if (raw === undefined) return 'nothing';
  return JSON.stringify(raw) ?? String(raw);
}
