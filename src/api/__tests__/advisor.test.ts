/**
 * @fileoverview Consultations against the bundled knowledge base
 */

import { beforeAll, describe, expect, it } from 'vitest';
import { DEFAULT_KNOWLEDGE_BASE_PATH } from '../../config/index.js';
import type { KnowledgeBase } from '../../knowledge/types.js';
import { nextQuestion } from '../../session/sequencer.js';
import type { AdvisorSession } from '../../session/session.js';
import {
  applyAnswer,
  currentRequirements,
  loadKnowledgeBaseFile,
  newSession,
  recommend,
  skipQuestion,
} from '../advisor.js';

let kb: KnowledgeBase;

beforeAll(async () => {
  kb = await loadKnowledgeBaseFile(DEFAULT_KNOWLEDGE_BASE_PATH);
});

function answerAll(session: AdvisorSession, answers: Array<[string, string]>): void {
  for (const [questionId, value] of answers) {
    applyAnswer(session, questionId, value);
  }
}

function recommendedNames(session: AdvisorSession): string[] {
  return recommend(session).map(({ item }) => item.name);
}

describe('bundled knowledge base', () => {
  it('loads cleanly', () => {
    expect(kb.version).toBe('1.0');
    expect(kb.items.size).toBe(20);
    expect(kb.questions.size).toBe(16);
    expect(kb.rules.size).toBe(30);
    expect(kb.suggestionRules.size).toBe(9);
    expect(kb.diagnostics).toEqual([]);
  });

  it('starts a consultation with the first material', () => {
    expect(nextQuestion(newSession(kb))?.id).toBe('material_a_type');
  });

  it('recommends every method before any answer', () => {
    expect(recommend(newSession(kb))).toHaveLength(20);
  });
});

describe('consultations', () => {
  it('recommends removable mechanical fasteners for a removable wooden joint', () => {
    const session = newSession(kb);
    answerAll(session, [
      ['material_a_type', 'wood'],
      ['material_b_type', 'wood'],
      ['environment_moisture', 'none'],
      ['permanence', 'removable'],
      ['strength_required', 'moderate'],
    ]);

    expect(currentRequirements(session)).toEqual({
      excluded_categories: ['thermal', 'adhesive'],
      allowed_permanence: ['removable'],
      min_tensile_strength: 'moderate',
    });
    expect(recommend(session).map(({ item, suggestions }) => [item.name, suggestions])).toEqual([
      ['Wood screw', ['Drill pilot holes before driving Wood screw to avoid splitting the wood.']],
      ['Hex bolt and nut', ['Add a washer under the nut so the joint survives repeated disassembly.']],
      ['Masonry anchor', []],
      ['Cam-lock furniture connector', []],
    ]);
  });

  it('keeps thermal joining for a permanent metal joint under heavy load', () => {
    const session = newSession(kb);
    answerAll(session, [
      ['material_a_type', 'metal'],
      ['material_b_type', 'metal'],
      ['permanence', 'permanent'],
      ['load_type', 'heavy_dynamic'],
    ]);

    expect(currentRequirements(session)).toEqual({
      allowed_permanence: ['permanent', 'semi_permanent'],
      min_tensile_strength: 'high',
      min_shear_strength: 'high',
      min_vibration_resistance: 'good',
    });
    expect(recommend(session).map(({ item, suggestions }) => [item.name, suggestions])).toEqual([
      [
        'Two-part epoxy',
        [
          'Clamp or support the joint until Two-part epoxy has cured (slow cure).',
          'Lightly sand and degrease smooth surfaces before applying Two-part epoxy.',
          'Work in a well-ventilated area: Two-part epoxy gives off fumes while it is applied.',
        ],
      ],
      ['Blind rivet', []],
      ['Metal welding', ['Work in a well-ventilated area: Metal welding gives off fumes while it is applied.']],
    ]);
  });

  it('limits paper joints to adhesives that take paper', () => {
    const session = newSession(kb);
    answerAll(session, [
      ['material_a_type', 'paper'],
      ['material_b_type', 'paper'],
    ]);

    expect(currentRequirements(session)).toEqual({
      excluded_categories: ['thermal'],
      allowed_categories: ['adhesive'],
    });
    expect(recommendedNames(session)).toEqual([
      'Wood glue (PVA)',
      'Hot-melt glue',
      'Fabric adhesive',
      'Wallpaper adhesive',
    ]);
  });

  it('chains brittle materials into excluded impact fasteners', () => {
    const session = newSession(kb);
    const result = applyAnswer(session, 'material_a_type', 'glass');

    expect(result.fired.map((rule) => rule.ruleId)).toEqual([
      'thermal_needs_fusible_materials',
      'brittle_substrate',
      'fragile_avoid_impact_fasteners',
    ]);
    expect(currentRequirements(session)).toEqual({
      excluded_categories: ['thermal'],
      fragile_substrate: true,
      excluded_items: ['Nail', 'Staple', 'Blind rivet'],
    });
  });

  it('does not derive anything from a skipped question', () => {
    const session = newSession(kb);
    applyAnswer(session, 'load_type', 'light_dynamic');
    skipQuestion(session, 'vibration');

    expect(session.getFact('load.vibration')).toBeUndefined();
    expect(session.firedRules().map((rule) => rule.ruleId)).toEqual(['light_dynamic_load']);
    expect(currentRequirements(session)).toEqual({ min_vibration_resistance: 'fair' });
  });

  it('never lowers a threshold, whatever the answer order', () => {
    const strongFirst = newSession(kb);
    answerAll(strongFirst, [
      ['strength_required', 'very_high'],
      ['load_type', 'static'],
    ]);

    const staticFirst = newSession(kb);
    answerAll(staticFirst, [
      ['load_type', 'static'],
      ['strength_required', 'very_high'],
    ]);

    const baseline = strongFirst.firedRules().find((rule) => rule.ruleId === 'static_load_baseline');
    expect(baseline?.changes).toEqual([
      { requirement: 'min_tensile_strength', before: 'very_high', after: 'very_high', changed: false },
    ]);
    expect(currentRequirements(strongFirst)).toEqual({ min_tensile_strength: 'very_high', min_shear_strength: 'high' });
    expect(currentRequirements(staticFirst)).toEqual(currentRequirements(strongFirst));
  });

  it('gates one-sided access on the two-sided access property', () => {
    const session = newSession(kb);
    answerAll(session, [
      ['material_a_type', 'metal'],
      ['material_b_type', 'metal'],
    ]);
    applyAnswer(session, 'access_one_side', 'yes');

    const rejected = session.assess().filter(({ failure }) => failure?.requirement === 'one_sided_access');
    expect(rejected.map(({ item }) => item.name)).toEqual(['Hex bolt and nut']);
  });

  it('can leave nothing to recommend', () => {
    const session = newSession(kb);
    answerAll(session, [
      ['material_a_type', 'glass'],
      ['material_b_type', 'fabric'],
      ['strength_required', 'very_high'],
    ]);

    expect(recommend(session)).toEqual([]);
  });
});
