/**
 * @fileoverview Terminal output helpers
 */

import { formatFactValue, isFactTree, type FactTree } from '../facts/types.js';
import type { ItemAssessment, Recommendation } from '../matching/matcher.js';
import type { FiredRule } from '../rules/forward_chainer.js';

/** Destination for one line of output; stdout unless a command is given a stream. */
export type LineWriter = (line: string) => void;

const toStdout: LineWriter = (line) => console.log(line);

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][], write: LineWriter = toStdout): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  write(headerLine.trimEnd());
  write(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ');
    write(line.trimEnd());
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(
  items: Array<{ key: string; value: string | number | boolean | null }>,
  write: LineWriter = toStdout,
): void {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    write(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

export function printRequirements(requirements: FactTree, write: LineWriter = toStdout): void {
  const entries = Object.entries(requirements);
  write('Derived requirements:');
  if (entries.length === 0) {
    write('  (none yet)');
    return;
  }
  printKeyValue(
    entries.map(([key, value]) => ({ key, value: isFactTree(value) ? '(nested)' : formatFactValue(value) })),
    write,
  );
}

export function printRecommendations(
  recommendations: Recommendation[],
  catalogSize: number,
  write: LineWriter = toStdout,
): void {
  if (recommendations.length === 0) {
    write('No fastening method satisfies the derived requirements.');
    return;
  }
  write(`Recommended methods (${recommendations.length} of ${catalogSize}):`);
  recommendations.forEach(({ item, suggestions }, index) => {
    write(`  ${index + 1}. ${item.name} [${item.category}]`);
    for (const suggestion of suggestions) {
      write(`     - ${suggestion}`);
    }
  });
}

export function printFiredRules(fired: FiredRule[], write: LineWriter = toStdout): void {
  write('Fired rules:');
  if (fired.length === 0) {
    write('  (none)');
    return;
  }
  printTable(
    ['#', 'Pass', 'Rule', 'Priority', 'Changed'],
    fired.map((rule) => [
      String(rule.sequence),
      String(rule.pass),
      rule.ruleId,
      String(rule.priority),
      rule.changes
        .filter((change) => change.changed)
        .map((change) => `${change.requirement}=${formatFactValue(change.after)}`)
        .join('; ') || '-',
    ]),
    write,
  );
}

export function printRejections(assessments: ItemAssessment[], write: LineWriter = toStdout): void {
  const rejected = assessments.filter((assessment) => assessment.failure !== null);
  write('Rejected methods:');
  if (rejected.length === 0) {
    write('  (none)');
    return;
  }
  printTable(
    ['Method', 'Gate', 'Requirement', 'Reason'],
    rejected.map(({ item, failure }) => [
      item.name,
      failure?.gate ?? '',
      failure?.requirement ?? '',
      failure?.reason ?? '',
    ]),
    write,
  );
}
