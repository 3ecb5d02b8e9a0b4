/**
 * Skip log tests
 */

import { describe, it, expect } from 'vitest';
import { SkipLog } from './skips.js';

describe('SkipLog', () => {
  it('should keep items in record order and count them by unit', () => {
    const skips = new SkipLog();

    skips.record({ unit: 'thread', id: 'm1', reason: 'no replies', kind: 'data_quality' });
    skips.record({ unit: 'reply', id: 'm2/r1', reason: 'empty content', kind: 'data_quality' });
    skips.record({ unit: 'thread', id: 'm3', reason: 'still throttled', kind: 'transient' });

    expect(skips.count).toBe(3);
    expect(skips.countBy('thread')).toBe(2);
    expect(skips.countBy('reply')).toBe(1);
    expect(skips.countBy('page')).toBe(0);
    expect(skips.items.map(item => item.id)).toEqual(['m1', 'm2/r1', 'm3']);
  });
});
