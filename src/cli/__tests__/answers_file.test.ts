import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CliError } from '../errors.js';
import { parseAnswersDocument, parseSetArguments, readAnswersFile } from '../answers_file.js';
import { cleanupWorkspace, createTempWorkspace, createTestFile } from '../../__tests__/helpers/workspace.js';

describe('parseAnswersDocument', () => {
  it('reads a map of question id to answer in order', () => {
    expect(parseAnswersDocument({ material_a_type: 'wood', vibration: false, strength: 3, uv_exposure: null })).toEqual([
      { questionId: 'material_a_type', answer: 'wood' },
      { questionId: 'vibration', answer: false },
      { questionId: 'strength', answer: '3' },
      { questionId: 'uv_exposure', answer: null },
    ]);
  });

  it('replays the question history of a snapshot', () => {
    const snapshot = {
      sessionId: 'session-1',
      questionHistory: [
        { questionId: 'material_a_type', attribute: 'materials.material_a.material_type', answer: 'wood', timestamp: 't1' },
        { questionId: 'vibration', attribute: 'load.vibration', answer: null, timestamp: 't2' },
      ],
    };

    expect(parseAnswersDocument(snapshot)).toEqual([
      { questionId: 'material_a_type', answer: 'wood' },
      { questionId: 'vibration', answer: null },
    ]);
  });

  it('treats an empty document as no answers', () => {
    expect(parseAnswersDocument(null)).toEqual([]);
  });

  it('rejects documents that are not maps', () => {
    expect(() => parseAnswersDocument(['wood'], 'answers.yaml')).toThrow(
      'answers.yaml: expected a map of question id to answer',
    );
  });
});

describe('readAnswersFile', () => {
  let workspace = '';

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await cleanupWorkspace(workspace);
  });

  it('parses YAML answer files', async () => {
    const path = await createTestFile(workspace, 'answers.yaml', 'material_a_type: wood\naccess_one_side: yes\n');

    await expect(readAnswersFile(path)).resolves.toEqual([
      { questionId: 'material_a_type', answer: 'wood' },
      { questionId: 'access_one_side', answer: 'yes' },
    ]);
  });

  it('reports invalid YAML as a usage error', async () => {
    const path = await createTestFile(workspace, 'broken.yaml', 'material_a_type: [wood\n');

    await expect(readAnswersFile(path)).rejects.toBeInstanceOf(CliError);
  });
});

describe('parseSetArguments', () => {
  it('splits on the first equals sign', () => {
    expect(parseSetArguments(['material_a_type=wood', ' note = a=b '])).toEqual([
      { questionId: 'material_a_type', answer: 'wood' },
      { questionId: 'note', answer: 'a=b' },
    ]);
  });

  it('rejects pairs without a question id', () => {
    expect(() => parseSetArguments(['wood'])).toThrow("Expected --set <question>=<answer>, got 'wood'");
    expect(() => parseSetArguments(['=wood'])).toThrow(CliError);
  });
});
