/**
 * Model output validation tests
 */

import { describe, it, expect } from 'vitest';
import { DataQualityError } from '../errors/index.js';
import { coerceModelReply, extractJsonObject, parseQAPairResponse } from './validation.js';

describe('extractJsonObject', () => {
  it('should strip markdown code fences', () => {
    expect(extractJsonObject('```json\n{"question": "Q", "answer": "A"}\n```')).toBe('{"question": "Q", "answer": "A"}');
  });

  it('should ignore braces and escaped quotes inside strings', () => {
    const text = 'Here you go: {"question": "Why does {x} fail?", "answer": "Quote \\" and }"} done';

    expect(extractJsonObject(text)).toBe('{"question": "Why does {x} fail?", "answer": "Quote \\" and }"}');
  });

  it('should return the first complete object', () => {
    expect(extractJsonObject('{"a": {"b": 1}} {"c": 2}')).toBe('{"a": {"b": 1}}');
  });

  it('should return null without an object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('{"unterminated": true')).toBeNull();
  });
});

describe('coerceModelReply', () => {
  it('should lower-case keys and unwrap a single-element array', () => {
    expect(coerceModelReply([{ Question: 'q', ANSWER: 'a' }])).toEqual({ question: 'q', answer: 'a' });
  });

  it('should leave other values alone', () => {
    expect(coerceModelReply('text')).toBe('text');
    expect(coerceModelReply([1, 2])).toEqual([1, 2]);
  });
});

describe('parseQAPairResponse', () => {
  it('should parse a pair', () => {
    expect(parseQAPairResponse('{"question": " How do I reset my password? ", "answer": "Use settings."}')).toEqual({
      question: 'How do I reset my password?',
      answer: 'Use settings.',
    });
  });

  it('should parse a pair wrapped in prose and an array', () => {
    expect(parseQAPairResponse('[{"Question": "Q", "Answer": "A"}]')).toEqual({ question: 'Q', answer: 'A' });
    expect(parseQAPairResponse('Sure!\n```json\n{"question": "Q", "answer": "A"}\n```')).toEqual({
      question: 'Q',
      answer: 'A',
    });
  });

  it('should find the object when the prose opens with a bracket', () => {
    expect(parseQAPairResponse('[Summary] Here is the pair:\n{"question": "Q", "answer": "A"}')).toEqual({
      question: 'Q',
      answer: 'A',
    });
  });

  it('should report prose that opens with a bracket and holds no object', () => {
    expect(() => parseQAPairResponse('[Summary] nothing to extract')).toThrow(
      'Model output contains no JSON object'
    );
  });

  it('should return null when the model finds no question', () => {
    expect(parseQAPairResponse('{"question": null, "answer": null}')).toBeNull();
    expect(parseQAPairResponse('{"question": "", "answer": "  "}')).toBeNull();
    expect(parseQAPairResponse('{}')).toBeNull();
  });

  it('should reject a one-sided pair', () => {
    expect(() => parseQAPairResponse('{"question": "Q", "answer": null}')).toThrow(
      'Model output is incomplete: Answer is required'
    );
  });

  it('should reject unusable output', () => {
    expect(() => parseQAPairResponse('')).toThrow('Model returned empty output');
    expect(() => parseQAPairResponse('I cannot help with that.')).toThrow('Model output contains no JSON object');
    expect(() => parseQAPairResponse('{"question": "Q",}')).toThrow('Model output is not valid JSON');
    expect(() => parseQAPairResponse('{"question": 42, "answer": "A"}')).toThrow(DataQualityError);
  });
});
