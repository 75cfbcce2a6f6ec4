/**
 * @fileoverview Check command - validate a knowledge base
 */

import { parseArgs } from 'node:util';
import { parseCommandArgs } from '../args.js';
import { loadCommandContext } from '../context.js';
import { printKeyValue } from '../output.js';

const USAGE = 'fastening-advisor check [--kb <path>] [--strict] [--json]';

export interface CheckCommandOptions {
  args: string[];
  env?: NodeJS.ProcessEnv;
}

export async function checkCommand(options: CheckCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(USAGE, () =>
    parseArgs({
      args: options.args,
      options: {
        kb: { type: 'string' },
        strict: { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: false,
      strict: true,
    }),
  );

  const { kb } = await loadCommandContext({
    kbPath: values.kb,
    strictAttributes: values.strict,
    env: options.env,
  });

  const counts = {
    scales: kb.scales.size,
    enums: kb.enums.size,
    attributes: kb.attributes.size,
    requirements: kb.requirements.size,
    questions: kb.questions.size,
    items: kb.items.size,
    rules: kb.rules.size,
    suggestionRules: kb.suggestionRules.size,
  };
  const warnings = kb.diagnostics.map((diagnostic) => ({ path: diagnostic.path, location: diagnostic.location }));

  if (values.json) {
    console.log(JSON.stringify({ valid: true, version: kb.version, source: kb.source, counts, warnings }, null, 2));
    return;
  }

  console.log(`Knowledge base ${kb.version} is valid (${kb.source ?? 'inline'})`);
  printKeyValue(Object.entries(counts).map(([key, value]) => ({ key, value })));
  if (warnings.length > 0) {
    console.log('');
    console.log(`Warnings (${warnings.length}):`);
    for (const warning of warnings) {
      console.log(`  - ${warning.location}: '${warning.path}' is not declared`);
    }
  }
}
