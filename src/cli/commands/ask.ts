/**
 * @fileoverview Ask command - interactive consultation
 */

import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { InvalidAnswerError } from '../../core/errors.js';
import type { Question } from '../../knowledge/types.js';
import { DEFAULT_SEQUENCER_OPTIONS, nextQuestion, normalizeAnswer } from '../../session/sequencer.js';
import { AdvisorSession } from '../../session/session.js';
import { parseCommandArgs, parseNonNegativeInteger } from '../args.js';
import { loadCommandContext } from '../context.js';
import { printRecommendations, printRequirements } from '../output.js';
import { writeSnapshot } from '../snapshot_writer.js';

const USAGE = 'fastening-advisor ask [--kb <path>] [--snapshot <path>] [--stop-at <n>]';

export interface AskCommandOptions {
  args: string[];
  env?: NodeJS.ProcessEnv;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export async function askCommand(options: AskCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(USAGE, () =>
    parseArgs({
      args: options.args,
      options: {
        kb: { type: 'string' },
        snapshot: { type: 'string' },
        'stop-at': { type: 'string' },
      },
      allowPositionals: false,
      strict: true,
    }),
  );
  const stopWhenNarrowedTo = parseNonNegativeInteger(
    '--stop-at',
    values['stop-at'],
    DEFAULT_SEQUENCER_OPTIONS.stopWhenNarrowedTo,
  );

  const { config, kb } = await loadCommandContext({ kbPath: values.kb, env: options.env });
  const snapshotPath = values.snapshot ?? config.snapshotPath;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  const session = new AdvisorSession(kb);
  const readline = createInterface({ input, output, terminal: false });
  const lines = readline[Symbol.asyncIterator]();

  try {
    let question = nextQuestion(session, { stopWhenNarrowedTo });
    while (question) {
      output.write(formatQuestion(question));
      const line = await lines.next();
      if (line.done) break;

      try {
        const answer = normalizeAnswer(question, line.value);
        if (answer.kind === 'skip') {
          session.skipQuestion(question.id);
        } else {
          session.applyAnswer(question.id, answer.value);
        }
      } catch (error) {
        if (!(error instanceof InvalidAnswerError)) throw error;
        output.write(`${error.message}\n`);
        continue;
      }

      if (snapshotPath) {
        await writeSnapshot(snapshotPath, session.snapshot());
      }
      question = nextQuestion(session, { stopWhenNarrowedTo });
    }
  } finally {
    readline.close();
  }

  const writeLine = (line: string): void => {
    output.write(`${line}\n`);
  };
  writeLine('');
  printRequirements(session.currentRequirements(), writeLine);
  writeLine('');
  printRecommendations(session.recommend(), kb.items.size, writeLine);
}

export function formatQuestion(question: Question): string {
  const lines = ['', question.prompt];
  for (const reason of question.rationale) {
    lines.push(`  (${reason})`);
  }
  if (question.kind === 'boolean') {
    lines.push('[y/n, s to skip] > ');
  } else {
    question.choices.forEach((choice, index) => lines.push(`  ${index + 1}) ${choice}`));
    lines.push('[number or name, s to skip] > ');
  }
  return lines.join('\n');
}
