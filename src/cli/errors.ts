/**
 * @fileoverview CLI error handling with helpful suggestions
 *
 * Every failure is turned into an `ErrorEnvelope` so `--json` callers get a
 * machine-readable error, and into an exit code:
 *
 *   1   unexpected failure
 *   2   knowledge base failed to load (SchemaError)
 *   3   answer rejected (InvalidAnswerError)
 *   64  invalid command line usage
 *   78  invalid configuration
 */

import { ConfigError, InvalidAnswerError, SchemaError, isAdvisorError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'KNOWLEDGE_BASE_INVALID'
  | 'INVALID_ANSWER'
  | 'CONFIG_INVALID'
  | 'INTERNAL';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `fastening-advisor help <command>` for usage information.',
  FILE_NOT_FOUND: 'Check the path; relative paths are resolved from the current directory.',
  KNOWLEDGE_BASE_INVALID: 'Run `fastening-advisor check --kb <path>` to list the problems in the knowledge base.',
  INVALID_ANSWER: 'Answer with one of the listed choices, or skip the question.',
  CONFIG_INVALID: 'Fix or unset the ADVISOR_* environment variable named above.',
  INTERNAL: 'Re-run with ADVISOR_LOG_LEVEL=debug for more detail.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 64,
  FILE_NOT_FOUND: 66,
  KNOWLEDGE_BASE_INVALID: 2,
  INVALID_ANSWER: 3,
  CONFIG_INVALID: 78,
  INTERNAL: 1,
};

export interface ErrorEnvelope {
  code: CliErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

export function createErrorEnvelope(
  code: CliErrorCode,
  message: string,
  overrides: Partial<Omit<ErrorEnvelope, 'code' | 'message'>> = {},
): ErrorEnvelope {
  return {
    code,
    message,
    retryable: overrides.retryable ?? code === 'INVALID_ANSWER',
    recoveryHints: overrides.recoveryHints ?? [ERROR_SUGGESTIONS[code]],
    context: { timestamp: new Date().toISOString(), ...overrides.context },
  };
}

/** Map any thrown value onto an envelope. */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, {
      recoveryHints: error.suggestion ? [error.suggestion] : [],
      context: error.details,
    });
  }
  if (error instanceof SchemaError) {
    return createErrorEnvelope('KNOWLEDGE_BASE_INVALID', error.message, {
      context: { location: error.location, source: error.source },
    });
  }
  if (error instanceof InvalidAnswerError) {
    return createErrorEnvelope('INVALID_ANSWER', error.message, {
      context: { questionId: error.questionId, received: error.received, expected: error.expected },
    });
  }
  if (error instanceof ConfigError) {
    return createErrorEnvelope('CONFIG_INVALID', error.message, { context: { configKey: error.configKey } });
  }
  if (isNodeError(error) && error.code === 'ENOENT') {
    return createErrorEnvelope('FILE_NOT_FOUND', error.message);
  }
  const message = getErrorMessage(error);
  return createErrorEnvelope('INTERNAL', message, {
    context: isAdvisorError(error) ? { advisorCode: error.code } : undefined,
  });
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODES[envelope.code];
}

export function formatError(error: unknown): string {
  const envelope = classifyError(error);
  return `Error [${envelope.code}]: ${envelope.message}`;
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  for (const hint of envelope.recoveryHints) {
    lines.push(`  Hint: ${hint}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
