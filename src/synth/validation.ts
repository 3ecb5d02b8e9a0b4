/**
 * Zod validation for model output
 * Pulls the question/answer object out of a reply that may be wrapped in prose
 */

import { z } from 'zod';
import { DataQualityError } from '../errors/index.js';

/**
 * Question/answer pair
 */
export const QAPairSchema = z.object({
  question: z.string().trim().min(1, 'Question is required'),
  answer: z.string().trim().min(1, 'Answer is required'),
});
export type QAPair = z.infer<typeof QAPairSchema>;

/**
 * What the model is asked to return; null fields mean "no question here"
 */
const ModelReplySchema = z.object({
  question: z.string().nullish(),
  answer: z.string().nullish(),
});

/**
 * Return the first balanced JSON object in a model reply
 * Handles markdown code fences and braces inside strings
 */
export function extractJsonObject(text: string): string | null {
  const cleaned = text.replace(/```(?:json)?/gi, '');
  let start = cleaned.indexOf('{');

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < cleaned.length; i++) {
      const ch = cleaned[i];

      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }

      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) return cleaned.slice(start, i + 1);
      }
    }

    // Unbalanced from here; try the next opening brace
    start = cleaned.indexOf('{', start + 1);
  }

  return null;
}

/**
 * Coerce common LLM response issues
 * Unwraps a one-element array and lower-cases top-level keys
 */
export function coerceModelReply(data: unknown): unknown {
  const value = Array.isArray(data) && data.length === 1 ? data[0] : data;

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key.toLowerCase()] = entry;
  }
  return result;
}

type JsonResult = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParseJson(text: string): JsonResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Parse a model reply into a pair
 * @returns null when the model reports no discernible question
 * @throws DataQualityError when the reply cannot be used
 */
export function parseQAPairResponse(text: string): QAPair | null {
  if (!text.trim()) {
    throw new DataQualityError('Model returned empty output');
  }

  // A bare array reply; prose that merely opens with `[` falls through
  const trimmed = text.trim();
  const array = trimmed.startsWith('[') ? tryParseJson(trimmed) : null;

  let json: string;
  let data: unknown;
  if (array?.ok === true) {
    json = trimmed;
    data = array.value;
  } else {
    const extracted = extractJsonObject(text);
    if (!extracted) {
      throw new DataQualityError('Model output contains no JSON object', { output: text.slice(0, 200) });
    }
    const parsed = tryParseJson(extracted);
    if (!parsed.ok) {
      throw new DataQualityError(
        'Model output is not valid JSON',
        { output: extracted.slice(0, 200) },
        { cause: parsed.error }
      );
    }
    json = extracted;
    data = parsed.value;
  }

  const reply = ModelReplySchema.safeParse(coerceModelReply(data));
  if (!reply.success) {
    throw new DataQualityError('Model output has no question/answer fields', { output: json.slice(0, 200) });
  }

  const question = reply.data.question?.trim() ?? '';
  const answer = reply.data.answer?.trim() ?? '';
  if (!question && !answer) {
    return null;
  }

  const pair = QAPairSchema.safeParse({ question, answer });
  if (!pair.success) {
    throw new DataQualityError(
      `Model output is incomplete: ${pair.error.issues.map(issue => issue.message).join(', ')}`,
      { output: json.slice(0, 200) }
    );
  }

  return pair.data;
}
