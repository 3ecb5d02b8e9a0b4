/**
 * Pair synthesizer
 * One completion request per thread, turned into a question/answer pair
 */

import { classifyError, errorMessage, isFatalError, type ErrorKind } from '../errors/index.js';
import type { RateGate } from '../http/rate-limit.js';
import { mapWithConcurrency } from '../http/pool.js';
import type { RetryPolicy } from '../http/retry.js';
import { buildMessages, type CompletionOptions, type LLMProvider } from '../llm/provider.js';
import type { SkipLog } from '../pipeline/skips.js';
import type { ThreadRecord } from '../threads/types.js';
import { createLogger } from '../utils/logger.js';
import { QNA_SYSTEM_PROMPT, buildThreadPrompt } from './prompts.js';
import { parseQAPairResponse, type QAPair } from './validation.js';

/**
 * What synthesis needs from the outside world
 */
export interface SynthesizerDeps {
  provider: LLMProvider;
  retry: RetryPolicy;
  gate: RateGate;
  completion?: CompletionOptions;
  promptTokenBudget: number;
}

/**
 * A pair as written to disk
 */
export interface PairRecord extends QAPair {
  /** Position of the thread in the input file */
  index: number;
  threadId: string;
  askedAt: string;
}

export type SynthesisOutcome =
  | { status: 'produced'; pair: QAPair; truncated: boolean }
  | { status: 'skipped'; reason: string; kind: ErrorKind };

/**
 * Synthesize one pair from a thread
 * Fatal errors propagate; every other failure becomes a skip
 */
export async function synthesizePair(
  thread: ThreadRecord,
  deps: SynthesizerDeps
): Promise<SynthesisOutcome> {
  if (thread.replies.length === 0) {
    return { status: 'skipped', reason: 'no replies', kind: 'data_quality' };
  }

  const log = createLogger({ module: 'synth', threadId: thread.id });
  const prompt = buildThreadPrompt(thread, deps.promptTokenBudget);
  if (prompt.truncated) {
    log.debug(
      { includedReplies: prompt.includedReplies, replies: thread.replies.length },
      'Thread truncated to fit the prompt budget'
    );
  }

  const messages = buildMessages(prompt.text, QNA_SYSTEM_PROMPT);
  const options: CompletionOptions = { ...deps.completion, jsonMode: true };

  try {
    const pair = await deps.retry.execute(
      'completion',
      async () => {
        await deps.gate.acquire();
        const result = await deps.provider.chat(messages, options);
        return parseQAPairResponse(result.content);
      },
      { threadId: thread.id }
    );

    if (!pair) {
      return { status: 'skipped', reason: 'no discernible question', kind: 'data_quality' };
    }
    return { status: 'produced', pair, truncated: prompt.truncated };
  } catch (error) {
    if (isFatalError(error)) throw error;
    return { status: 'skipped', reason: errorMessage(error), kind: classifyError(error) };
  }
}

export interface RunSynthesisOptions extends SynthesizerDeps {
  skips: SkipLog;
  concurrency: number;
  /** Called with each pair as soon as it is produced */
  onPair?: (record: PairRecord) => Promise<void>;
  /** Called after every thread settles */
  onSettled?: (done: number, total: number) => void;
}

export interface SynthesisRun {
  /** Produced pairs in thread order */
  pairs: PairRecord[];
  skipped: number;
}

/**
 * Synthesize pairs for every thread with a bounded pool
 */
export async function runSynthesis(
  threads: readonly ThreadRecord[],
  options: RunSynthesisOptions
): Promise<SynthesisRun> {
  let done = 0;
  let skipped = 0;

  const outcomes = await mapWithConcurrency(threads, options.concurrency, async (thread, index) => {
    const outcome = await synthesizePair(thread, options);
    let record: PairRecord | null = null;

    if (outcome.status === 'produced') {
      record = { index, threadId: thread.id, askedAt: thread.createdAt, ...outcome.pair };
      await options.onPair?.(record);
    } else {
      skipped++;
      options.skips.record({ unit: 'thread', id: thread.id, reason: outcome.reason, kind: outcome.kind });
    }

    done++;
    options.onSettled?.(done, threads.length);
    return record;
  });

  return {
    pairs: outcomes.filter((record): record is PairRecord => record !== null),
    skipped,
  };
}
