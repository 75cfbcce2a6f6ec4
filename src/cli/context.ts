/**
 * @fileoverview Shared command setup: configuration and knowledge base
 */

import { resolve } from 'node:path';
import { loadConfig, type AdvisorConfig } from '../config/index.js';
import { loadKnowledgeBaseFile } from '../knowledge/loader.js';
import type { KnowledgeBase } from '../knowledge/types.js';
import { logInfo } from '../telemetry/logger.js';

export interface CommandContext {
  config: AdvisorConfig;
  kb: KnowledgeBase;
}

export interface ContextOptions {
  /** `--kb`, overriding ADVISOR_KB_PATH. */
  kbPath?: string;
  strictAttributes?: boolean;
  env?: NodeJS.ProcessEnv;
}

export async function loadCommandContext(options: ContextOptions = {}): Promise<CommandContext> {
  const config = loadConfig(options.env);

  const path = resolve(options.kbPath ?? config.knowledgeBasePath);
  const kb = await loadKnowledgeBaseFile(path, { strictAttributes: options.strictAttributes });
  logInfo(`Loaded knowledge base ${kb.version}`, {
    path,
    questions: kb.questions.size,
    items: kb.items.size,
    rules: kb.rules.size,
  });
  return { config, kb };
}
