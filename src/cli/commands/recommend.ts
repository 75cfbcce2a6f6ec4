/**
 * @fileoverview Recommend command - evaluate answers without prompting
 */

import { parseArgs } from 'node:util';
import { AdvisorSession, type ReplayAnswer } from '../../session/session.js';
import { readAnswersFile, parseSetArguments } from '../answers_file.js';
import { parseCommandArgs } from '../args.js';
import { loadCommandContext } from '../context.js';
import { printFiredRules, printRecommendations, printRejections, printRequirements } from '../output.js';

const USAGE = 'fastening-advisor recommend [--answers <file>] [--set <question>=<answer> ...] [--kb <path>] [--trace] [--json]';

export interface RecommendCommandOptions {
  args: string[];
  env?: NodeJS.ProcessEnv;
}

export async function recommendCommand(options: RecommendCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(USAGE, () =>
    parseArgs({
      args: options.args,
      options: {
        kb: { type: 'string' },
        answers: { type: 'string' },
        set: { type: 'string', multiple: true },
        trace: { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: false,
      strict: true,
    }),
  );

  const { kb } = await loadCommandContext({ kbPath: values.kb, env: options.env });
  const answers: ReplayAnswer[] = [
    ...(values.answers ? await readAnswersFile(values.answers) : []),
    ...parseSetArguments(values.set ?? []),
  ];

  const session = AdvisorSession.replay(kb, answers);
  const recommendations = session.recommend();

  if (values.json) {
    const report = {
      knowledgeBase: kb.version,
      answered: session.history().length,
      requirements: session.currentRequirements(),
      recommendations: recommendations.map(({ item, suggestions }) => ({
        name: item.name,
        category: item.category,
        suggestions,
      })),
      ...(values.trace
        ? {
            firedRules: session.firedRules(),
            rejected: session
              .assess()
              .flatMap(({ item, failure }) => (failure ? [{ name: item.name, ...failure }] : [])),
          }
        : {}),
    };
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  printRequirements(session.currentRequirements());
  console.log('');
  printRecommendations(recommendations, kb.items.size);

  if (values.trace) {
    console.log('');
    printFiredRules(session.firedRules());
    console.log('');
    printRejections(session.assess());
  }
}
