/**
 * @fileoverview Answer sources for non-interactive runs
 *
 * An answers file is either a YAML map of question id to answer (in asking
 * order, `null` for a skipped question) or a debug snapshot, whose
 * `questionHistory` is replayed as recorded.
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import type { ReplayAnswer } from '../session/session.js';
import { createError } from './errors.js';

const AnswerValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string()), z.null()]);

const SnapshotHistorySchema = z.object({
  questionHistory: z.array(
    z.object({
      questionId: z.string().min(1),
      answer: AnswerValueSchema,
    }),
  ),
});

const AnswerMapSchema = z.record(AnswerValueSchema);

export function parseAnswersDocument(document: unknown, source = 'answers'): ReplayAnswer[] {
  const history = SnapshotHistorySchema.safeParse(document);
  if (history.success) {
    return history.data.questionHistory.map(({ questionId, answer }) => ({ questionId, answer }));
  }

  const answers = AnswerMapSchema.safeParse(document ?? {});
  if (!answers.success) {
    const issue = answers.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw createError('INVALID_ARGUMENT', `${source}: expected a map of question id to answer${where}`);
  }
  return Object.entries(answers.data).map(([questionId, answer]) => ({
    questionId,
    answer: typeof answer === 'number' ? String(answer) : answer,
  }));
}

export async function readAnswersFile(path: string): Promise<ReplayAnswer[]> {
  const text = await readFile(path, 'utf8');
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `${path}: not valid YAML`, { cause: String(error) });
  }
  return parseAnswersDocument(document, path);
}

/** `--set question=value` pairs, in command line order. */
export function parseSetArguments(pairs: readonly string[]): ReplayAnswer[] {
  return pairs.map((pair) => {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw createError('INVALID_ARGUMENT', `Expected --set <question>=<answer>, got '${pair}'`);
    }
    return { questionId: pair.slice(0, separator).trim(), answer: pair.slice(separator + 1).trim() };
  });
}
