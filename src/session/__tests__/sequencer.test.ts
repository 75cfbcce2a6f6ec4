import { describe, expect, it } from 'vitest';
import { InvalidAnswerError } from '../../core/errors.js';
import type { Question } from '../../knowledge/types.js';
import { loadKnowledgeBase } from '../../knowledge/loader.js';
import { createMinimalDocument, createMinimalKnowledgeBase } from '../../__tests__/helpers/knowledge_fixture.js';
import { nextQuestion, normalizeAnswer, rankQuestions } from '../sequencer.js';
import { AdvisorSession } from '../session.js';

describe('question sequencer', () => {
  const kb = createMinimalKnowledgeBase();

  function question(id: string): Question {
    const found = kb.questions.get(id);
    if (!found) throw new Error(`fixture has no question ${id}`);
    return found;
  }

  describe('nextQuestion', () => {
    it('starts with the first material question', () => {
      expect(nextQuestion(new AdvisorSession(kb))?.id).toBe('first_material');
    });

    it('asks material questions before questions declared ahead of them', () => {
      const doc = createMinimalDocument();
      doc.questions = [...doc.questions.slice(2), ...doc.questions.slice(0, 2)];
      const session = new AdvisorSession(loadKnowledgeBase(doc));
      session.applyAnswer('first_material', 'wood');

      expect(nextQuestion(session)?.id).toBe('second_material');
    });

    it('moves past answered and skipped questions', () => {
      const session = new AdvisorSession(kb);
      session.applyAnswer('first_material', 'wood');
      session.skipQuestion('second_material');

      expect(nextQuestion(session)?.id).toBe('strength');
    });

    it('leaves out questions whose conditions do not hold', () => {
      const session = new AdvisorSession(kb);
      session.skipQuestion('first_material');
      session.skipQuestion('second_material');
      session.skipQuestion('strength');

      expect(nextQuestion(session)?.id).toBe('removable');
    });

    it('asks a conditional question once its condition holds', () => {
      const session = new AdvisorSession(kb);
      session.skipQuestion('first_material');
      session.skipQuestion('second_material');
      session.applyAnswer('strength', 'medium');

      expect(nextQuestion(session)?.id).toBe('outdoor');
    });

    it('skips a question whose every answer leaves the same recommendations', () => {
      const session = new AdvisorSession(kb);
      session.skipQuestion('first_material');
      session.skipQuestion('second_material');
      session.applyAnswer('strength', 'high');

      // Both remaining methods are weatherproof, so the outdoor answer changes nothing.
      expect(session.simulateAnswer('outdoor', true)).toEqual(['Epoxy glue', 'Bolt']);
      expect(session.simulateAnswer('outdoor', false)).toEqual(['Epoxy glue', 'Bolt']);
      expect(nextQuestion(session)?.id).toBe('removable');
    });

    it('prefers the question expected to eliminate more methods', () => {
      const doc = createMinimalDocument();
      doc.questions[4] = { id: 'removable', prompt: 'Removable?', kind: 'boolean', attribute: 'use.removable' };
      const session = new AdvisorSession(loadKnowledgeBase(doc));
      session.skipQuestion('first_material');
      session.skipQuestion('second_material');

      const open = [...session.kb.questions.values()].filter(
        (question) => !session.isSettled(question.id) && session.conditionsHold(question.askIf),
      );
      const candidates = rankQuestions(session, open, 4, new Set(['glue', 'hardware']));

      expect(candidates.map(({ question, coverage }) => [question.id, coverage])).toEqual([
        ['strength', 2],
        ['removable', 2],
      ]);
      expect(candidates[0]?.score).toBeCloseTo(0.25);
      expect(candidates[1]?.score).toBeCloseTo(0.5);
      expect(nextQuestion(session)?.id).toBe('removable');
    });

    it('prefers questions that apply to several remaining categories', () => {
      const session = new AdvisorSession(kb);
      session.skipQuestion('first_material');
      session.skipQuestion('second_material');

      // removable eliminates more but only concerns hardware.
      expect(nextQuestion(session)?.id).toBe('strength');
    });

    it('leaves out questions for categories no recommendation belongs to', () => {
      const session = new AdvisorSession(kb);
      session.applyAnswer('first_material', 'wood');
      session.applyAnswer('second_material', 'metal');
      session.skipQuestion('strength');

      expect(nextQuestion(session, { stopWhenNarrowedTo: 0 })).toBeNull();
    });

    it('stops once the recommendations are narrowed down', () => {
      const session = new AdvisorSession(kb);
      session.applyAnswer('first_material', 'wood');
      session.applyAnswer('second_material', 'metal');

      expect(session.recommend()).toHaveLength(1);
      expect(nextQuestion(session)).toBeNull();
    });

    it('does not change the session while simulating answers', () => {
      const session = new AdvisorSession(kb);
      session.skipQuestion('first_material');
      session.skipQuestion('second_material');

      expect(session.simulateAnswer('removable', true)).toEqual(['Screw', 'Bolt']);
      expect(session.getFact('use.removable')).toBeUndefined();
      expect(session.firedRules()).toEqual([]);
      expect(session.recommend()).toHaveLength(4);
    });
  });

  describe('normalizeAnswer', () => {
    it('recognizes skips', () => {
      expect(normalizeAnswer(question('strength'), 's')).toEqual({ kind: 'skip' });
      expect(normalizeAnswer(question('outdoor'), ' SKIP ')).toEqual({ kind: 'skip' });
    });

    it('maps choice numbers from 1', () => {
      expect(normalizeAnswer(question('first_material'), '2')).toEqual({ kind: 'answer', value: 'metal' });
    });

    it('rejects out-of-range choice numbers', () => {
      expect(() => normalizeAnswer(question('first_material'), '0')).toThrow(InvalidAnswerError);
      expect(() => normalizeAnswer(question('first_material'), '4')).toThrow(
        "Invalid answer for first_material: expected a number from 1 to 3, got '4'",
      );
    });

    it('matches choice names regardless of case', () => {
      expect(normalizeAnswer(question('first_material'), 'Glass')).toEqual({ kind: 'answer', value: 'glass' });
    });

    it('parses yes and no', () => {
      expect(normalizeAnswer(question('outdoor'), ' Y ')).toEqual({ kind: 'answer', value: true });
      expect(normalizeAnswer(question('outdoor'), 'no')).toEqual({ kind: 'answer', value: false });
    });

    it('rejects anything else', () => {
      expect(() => normalizeAnswer(question('first_material'), 'plastic')).toThrow(InvalidAnswerError);
    });
  });
});
