/**
 * Argument parsing and run summaries shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { ConfigError } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import type { SkippedItem, SkipUnit } from '../pipeline/skips.js';

/** Skip reasons listed in a summary */
export const MAX_LISTED_SKIPS = 10;

const UNIT_PLURALS: Record<SkipUnit, string> = {
  page: 'pages',
  thread: 'threads',
  reply: 'replies',
};

/**
 * Today's date (UTC) as YYYY-MM-DD
 */
export function todayUtc(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Parse a YYYY-MM-DD calendar date
 */
export function parseDateArg(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('Expected a date in YYYY-MM-DD format.');
  }

  // Rejects dates like 2024-02-30 that Date would roll over
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    throw new InvalidArgumentError(`${value} is not a calendar date.`);
  }
  return value;
}

/**
 * Build a commander parser for an integer within bounds
 */
export function intInRange(min: number, max: number): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer from ${min} to ${max}.`);
    }
    return parsed;
  };
}

/**
 * Summary lines for the skipped items of a run
 */
export function formatSkipSummary(skipped: readonly SkippedItem[]): string[] {
  if (skipped.length === 0) {
    return ['Skipped: 0'];
  }

  const units: SkipUnit[] = ['page', 'thread', 'reply'];
  const counts = units
    .map(unit => ({ unit, count: skipped.filter(item => item.unit === unit).length }))
    .filter(entry => entry.count > 0)
    .map(entry => `${UNIT_PLURALS[entry.unit]} ${entry.count}`);

  const lines = [`Skipped: ${skipped.length} (${counts.join(', ')})`];
  for (const item of skipped.slice(0, MAX_LISTED_SKIPS)) {
    lines.push(`  - ${item.unit} ${item.id}: ${item.reason}`);
  }
  if (skipped.length > MAX_LISTED_SKIPS) {
    lines.push(`  ... and ${skipped.length - MAX_LISTED_SKIPS} more`);
  }
  return lines;
}

/**
 * Report a run-aborting error and set a failing exit code
 */
export function reportFatal(command: string, error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error(`${command} failed: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
}
