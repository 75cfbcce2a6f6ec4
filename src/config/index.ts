/**
 * @fileoverview Advisor configuration
 *
 * Environment-driven settings, validated with zod:
 * - `ADVISOR_KB_PATH`: knowledge base file (defaults to the bundled one)
 * - `ADVISOR_LOG_LEVEL`: debug | info | warn | error | silent
 * - `ADVISOR_SNAPSHOT_PATH`: where `ask` writes its debug snapshot
 *
 * CLI flags override these values.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { LOG_LEVELS, type LogLevel } from '../telemetry/logger.js';

export const DEFAULT_KNOWLEDGE_BASE_PATH = fileURLToPath(new URL('../../data/knowledge_base.yaml', import.meta.url));

export interface AdvisorConfig {
  knowledgeBasePath: string;
  logLevel: LogLevel;
  snapshotPath: string | null;
}

const ENV_KEYS = {
  knowledgeBasePath: 'ADVISOR_KB_PATH',
  logLevel: 'ADVISOR_LOG_LEVEL',
  snapshotPath: 'ADVISOR_SNAPSHOT_PATH',
} as const;

const OptionalPathSchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvironmentSchema = z.object({
  [ENV_KEYS.knowledgeBasePath]: OptionalPathSchema,
  [ENV_KEYS.logLevel]: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()),
  [ENV_KEYS.snapshotPath]: OptionalPathSchema,
});

/**
 * Read configuration from an environment map.
 * @throws ConfigError naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdvisorConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue?.path[0] ?? 'environment');
    const detail = key === ENV_KEYS.logLevel ? `expected one of ${LOG_LEVELS.join(', ')}` : issue?.message ?? 'invalid value';
    throw new ConfigError(key, detail);
  }

  const values = parsed.data;
  return {
    knowledgeBasePath: values[ENV_KEYS.knowledgeBasePath] ?? DEFAULT_KNOWLEDGE_BASE_PATH,
    logLevel: values[ENV_KEYS.logLevel] ?? 'info',
    snapshotPath: values[ENV_KEYS.snapshotPath] ?? null,
  };
}
