/**
 * @fileoverview Command line parsing helpers
 */

import { createError } from './errors.js';
import { getErrorMessage } from '../utils/errors.js';

/** Run a strict `parseArgs` call, reporting its failures as usage errors. */
export function parseCommandArgs<T>(usage: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `${getErrorMessage(error)}\nUsage: ${usage}`);
  }
}

export function parseNonNegativeInteger(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw createError('INVALID_ARGUMENT', `${flag} expects a non-negative integer, got '${value}'`);
  }
  return parsed;
}
