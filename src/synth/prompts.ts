/**
 * Prompts for question/answer pair synthesis
 */

import { CHARS_PER_TOKEN, estimateTokens } from '../llm/provider.js';
import type { ThreadRecord } from '../threads/types.js';

/**
 * System prompt for pair synthesis
 */
export const QNA_SYSTEM_PROMPT = `You turn a support conversation into one question and one answer for a knowledge base.

You receive the original message of a thread and its replies, oldest first.

1. Question: distill the question being asked in the original message down to its essence. Remove greetings, formatting noise and anyone's names or other personal identifiers.
2. Answer: synthesize a single concise and correct answer from all replies. If a reply mentions a person, rephrase to avoid the name. Keep links that matter in [text](url) form.

Respond with exactly one JSON object and nothing else:
{"question": "<question>", "answer": "<answer>"}

If the original message asks no question, or the replies do not answer it, respond with:
{"question": null, "answer": null}`;

/**
 * Prompt built for one thread
 */
export interface ThreadPrompt {
  text: string;
  includedReplies: number;
  truncated: boolean;
  estimatedTokens: number;
}

/** Smallest remainder worth filling with a partial reply */
export const MIN_PARTIAL_REPLY_CHARS = 40;

const ELLIPSIS = '…';

function cut(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, Math.max(0, maxChars - ELLIPSIS.length)) + ELLIPSIS;
}

/**
 * Serialize a thread into the user prompt within a token budget
 * The root is capped at half the budget; replies are kept oldest first
 */
export function buildThreadPrompt(thread: ThreadRecord, budgetTokens: number): ThreadPrompt {
  const charBudget = budgetTokens * CHARS_PER_TOKEN;
  const rootBudget = Math.floor(charBudget / 2);
  let text = `Original message:\n${cut(thread.content, rootBudget)}`;
  let truncated = thread.content.length > rootBudget;
  let includedReplies = 0;

  if (thread.replies.length > 0) {
    text += '\n\nReplies:';

    for (const [i, reply] of thread.replies.entries()) {
      const piece = `\n${i + 1}. ${reply.content}`;

      if (text.length + piece.length <= charBudget) {
        text += piece;
        includedReplies++;
        continue;
      }

      truncated = true;
      const remaining = charBudget - text.length;
      if (remaining >= MIN_PARTIAL_REPLY_CHARS) {
        text += cut(piece, remaining);
        includedReplies++;
      }
      break;
    }
  }

  return {
    text,
    includedReplies,
    truncated,
    estimatedTokens: estimateTokens(text),
  };
}
