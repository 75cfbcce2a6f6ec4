import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../core/errors.js';
import { DEFAULT_KNOWLEDGE_BASE_PATH, loadConfig } from '../index.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      knowledgeBasePath: DEFAULT_KNOWLEDGE_BASE_PATH,
      logLevel: 'info',
      snapshotPath: null,
    });
  });

  it('points the default knowledge base at the bundled data file', () => {
    expect(DEFAULT_KNOWLEDGE_BASE_PATH.endsWith(join('data', 'knowledge_base.yaml'))).toBe(true);
  });

  it('reads and normalizes the ADVISOR_ variables', () => {
    const config = loadConfig({
      ADVISOR_KB_PATH: ' /tmp/kb.yaml ',
      ADVISOR_LOG_LEVEL: ' DEBUG ',
      ADVISOR_SNAPSHOT_PATH: '/tmp/snapshot.yaml',
    });

    expect(config).toEqual({
      knowledgeBasePath: '/tmp/kb.yaml',
      logLevel: 'debug',
      snapshotPath: '/tmp/snapshot.yaml',
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ ADVISOR_KB_PATH: '   ', ADVISOR_LOG_LEVEL: '' })).toEqual({
      knowledgeBasePath: DEFAULT_KNOWLEDGE_BASE_PATH,
      logLevel: 'info',
      snapshotPath: null,
    });
  });

  it('names the variable holding an invalid log level', () => {
    let caught: unknown;
    try {
      loadConfig({ ADVISOR_LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      configKey: 'ADVISOR_LOG_LEVEL',
      message: 'Configuration error for ADVISOR_LOG_LEVEL: expected one of debug, info, warn, error, silent',
    });
  });
});
