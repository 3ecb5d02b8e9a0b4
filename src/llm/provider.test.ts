/**
 * LLM Provider abstraction tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_OPTIONS,
  buildMessages,
  estimateTokens,
  mergeOptions,
  validateProviderConfig,
} from './provider.js';

describe('mergeOptions', () => {
  it('should fall back to the defaults', () => {
    expect(mergeOptions()).toEqual(DEFAULT_OPTIONS);
    expect(DEFAULT_OPTIONS).toEqual({ maxTokens: 1024, temperature: 0.1, topP: 0.1, jsonMode: false });
  });

  it('should prefer call options over provider defaults', () => {
    expect(mergeOptions({ temperature: 0.7 }, { temperature: 0.3, maxTokens: 256 })).toEqual({
      maxTokens: 256,
      temperature: 0.7,
      topP: 0.1,
      jsonMode: false,
    });
  });

  it('should keep explicit zero values', () => {
    expect(mergeOptions({ temperature: 0 }).temperature).toBe(0);
  });
});

describe('estimateTokens', () => {
  it('should use four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('buildMessages', () => {
  it('should put the system prompt first', () => {
    expect(buildMessages('question', 'be brief')).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'question' },
    ]);
  });

  it('should omit an empty system prompt', () => {
    expect(buildMessages('question')).toEqual([{ role: 'user', content: 'question' }]);
  });
});

describe('validateProviderConfig', () => {
  it('should require an API key', () => {
    expect(() => validateProviderConfig({ apiKey: '' })).toThrow('API key is required');
    expect(() => validateProviderConfig({ apiKey: 'test-secret' })).not.toThrow();
  });
});
