#!/usr/bin/env node
/**
 * @fileoverview Fastening Advisor CLI
 *
 * Commands:
 *   fastening-advisor ask         - Interactive consultation
 *   fastening-advisor recommend   - Evaluate answers non-interactively
 *   fastening-advisor check       - Validate a knowledge base
 *   fastening-advisor help        - Show help for a command
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '../config/index.js';
import { configureLogger } from '../telemetry/logger.js';
import { showHelp } from './help.js';
import { askCommand } from './commands/ask.js';
import { checkCommand } from './commands/check.js';
import { recommendCommand } from './commands/recommend.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'ask' | 'recommend' | 'check' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  ask: {
    description: 'Interactive consultation, one question at a time',
    usage: 'fastening-advisor ask [--kb <path>] [--snapshot <path>] [--stop-at <n>]',
  },
  recommend: {
    description: 'Evaluate a set of answers non-interactively',
    usage: 'fastening-advisor recommend [--answers <file>] [--set <question>=<answer> ...] [--trace] [--json]',
  },
  check: {
    description: 'Validate a knowledge base and summarize its contents',
    usage: 'fastening-advisor check [--kb <path>] [--strict] [--json]',
  },
  help: {
    description: 'Show help for a command',
    usage: 'fastening-advisor help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/**
 * Check if --json flag is present in arguments
 */
function hasJsonFlag(args: string[]): boolean {
  return args.includes('--json');
}

/**
 * Output a structured error for agent consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const [command, ...commandArgs] = args;
  const jsonMode = hasJsonFlag(args);

  // Global flags only apply before the command; the rest belongs to the command.
  const { values } = parseArgs({
    args: command?.startsWith('-') ? args : [],
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version) {
    const { ADVISOR_VERSION } = await import('../index.js');
    console.log(`fastening-advisor ${ADVISOR_VERSION.string}`);
    return;
  }

  if (values.help || command === undefined || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : undefined);
    return;
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'fastening-advisor help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    showHelp(command);
    return;
  }

  try {
    configureLogger({ level: loadConfig().logLevel });

    switch (command) {
      case 'ask':
        await askCommand({ args: commandArgs });
        break;
      case 'recommend':
        await recommendCommand({ args: commandArgs });
        break;
      case 'check':
        await checkCommand({ args: commandArgs });
        break;
    }
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

main().catch((error) => {
  const envelope = classifyError(error);
  outputStructuredError(envelope, process.argv.includes('--json'));
  process.exitCode = getExitCode(envelope);
});
