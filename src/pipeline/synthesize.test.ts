/**
 * Synthesis pipeline tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { documentPairWriter, jsonPairWriter } from '../export/pairs.js';
import { RateGate } from '../http/rate-limit.js';
import { RetryPolicy } from '../http/retry.js';
import type { ChatMessage, CompletionResult, LLMProvider } from '../llm/provider.js';
import { writeThreadFile } from '../threads/store.js';
import type { ThreadFile } from '../threads/types.js';
import { runSynthesisPipeline, type SynthesisProgress } from './synthesize.js';

/**
 * Echoes the original message back as the question
 */
const provider: LLMProvider = {
  name: 'echo',
  async chat(messages: ChatMessage[]): Promise<CompletionResult> {
    const prompt = messages[messages.length - 1].content;
    const question = prompt.split('\n')[1];
    const content = question === 'Lunch is here'
      ? '{"question": null, "answer": null}'
      : JSON.stringify({ question, answer: 'See the replies.' });
    return { content, model: 'echo', inputTokens: 0, outputTokens: 0, finishReason: 'stop' };
  },
};

const threadFile: ThreadFile = {
  version: 1,
  source: { groupId: 'group-1', channelId: 'channel-1', since: '2024-03-01' },
  threads: [
    {
      id: 'm1',
      author: 'user-1',
      createdAt: '2024-03-01T10:00:00Z',
      content: 'How do I reset my password?',
      replies: [{ id: 'r1', author: 'user-2', createdAt: '2024-03-01T10:05:00Z', content: 'Settings > Security' }],
    },
    {
      id: 'm2',
      author: 'user-1',
      createdAt: '2024-03-01T11:00:00Z',
      content: 'Lunch is here',
      replies: [{ id: 'r2', author: 'user-3', createdAt: '2024-03-01T11:01:00Z', content: 'Thanks!' }],
    },
    {
      id: 'm3',
      author: 'user-4',
      createdAt: '2024-03-01T12:00:00Z',
      content: 'Where is the VPN guide?',
      replies: [{ id: 'r3', author: 'user-2', createdAt: '2024-03-01T12:05:00Z', content: 'On the wiki' }],
    },
  ],
};

function deps() {
  const sleep = async () => {};
  return {
    provider,
    retry: new RetryPolicy({ maxAttempts: 2 }, { sleep }),
    gate: new RateGate({ requestsPerMinute: 60, sleep }),
    promptTokenBudget: 6000,
    concurrency: 2,
  };
}

describe('runSynthesisPipeline', () => {
  let dir: string;
  let inputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'channel-qna-synth-'));
    inputPath = join(dir, 'threads.json');
    await writeThreadFile(inputPath, threadFile);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one file per produced pair', async () => {
    const outputDir = join(dir, 'pairs');
    const progress: SynthesisProgress[] = [];

    const result = await runSynthesisPipeline({
      ...deps(),
      inputPath,
      outputDir,
      writer: jsonPairWriter,
      onProgress: update => progress.push(update),
    });

    expect(result).toMatchObject({ threadsRead: 3, threadsProcessed: 3, produced: 2 });
    expect(result.files).toEqual([join(outputDir, 'qna_0.json'), join(outputDir, 'qna_2.json')]);
    expect(result.skipped).toEqual([
      { unit: 'thread', id: 'm2', reason: 'no discernible question', kind: 'data_quality' },
    ]);
    expect((await readdir(outputDir)).sort()).toEqual(['qna_0.json', 'qna_2.json']);
    expect(JSON.parse(await readFile(join(outputDir, 'qna_2.json'), 'utf-8'))).toEqual({
      index: 2,
      threadId: 'm3',
      askedAt: '2024-03-01T12:00:00Z',
      question: 'Where is the VPN guide?',
      answer: 'See the replies.',
    });
    expect(progress).toHaveLength(3);
    expect(progress[2]).toEqual({ current: 3, total: 3 });
  });

  it('should process only the first threads when limited', async () => {
    const outputDir = join(dir, 'docs');

    const result = await runSynthesisPipeline({
      ...deps(),
      inputPath,
      outputDir,
      writer: documentPairWriter,
      limit: 1,
    });

    expect(result.threadsProcessed).toBe(1);
    expect(result.files).toEqual([join(outputDir, 'qna_0.md')]);
    expect(await readFile(join(outputDir, 'qna_0.md'), 'utf-8')).toBe(
      '# How do I reset my password?\n\nSee the replies.\n'
    );
  });

  it('should create the output directory even when nothing is produced', async () => {
    const outputDir = join(dir, 'empty');

    const result = await runSynthesisPipeline({
      ...deps(),
      inputPath,
      outputDir,
      writer: jsonPairWriter,
      limit: 0,
    });

    expect(result.produced).toBe(0);
    expect(await readdir(outputDir)).toEqual([]);
  });

  it('should fail on an input that is not a thread file', async () => {
    await expect(
      runSynthesisPipeline({
        ...deps(),
        inputPath: join(dir, 'missing.json'),
        outputDir: join(dir, 'out'),
        writer: jsonPairWriter,
      })
    ).rejects.toThrow(/^Cannot read /);
  });
});
