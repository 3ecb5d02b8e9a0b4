/**
 * Skip log
 * Every unit of work dropped during a run is counted and logged here.
 */

import type { ErrorKind } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

export type SkipUnit = 'page' | 'thread' | 'reply';

export interface SkippedItem {
  unit: SkipUnit;
  id: string;
  reason: string;
  kind: ErrorKind;
}

export class SkipLog {
  private readonly entries: SkippedItem[] = [];

  record(item: SkippedItem): void {
    this.entries.push(item);
    createLogger({ module: 'skips' }).warn(item, `Skipped ${item.unit} ${item.id}: ${item.reason}`);
  }

  get items(): readonly SkippedItem[] {
    return this.entries;
  }

  get count(): number {
    return this.entries.length;
  }

  countBy(unit: SkipUnit): number {
    return this.entries.filter(item => item.unit === unit).length;
  }
}
