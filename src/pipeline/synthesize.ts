/**
 * Synthesis pipeline
 * Thread file in, one pair file per answered thread out
 */

import { mkdir } from 'fs/promises';
import { writePair, type PairWriter } from '../export/pairs.js';
import { runSynthesis, type SynthesizerDeps } from '../synth/synthesizer.js';
import { readThreadFile } from '../threads/store.js';
import { createLogger } from '../utils/logger.js';
import { SkipLog, type SkippedItem } from './skips.js';

/**
 * Synthesis progress
 */
export interface SynthesisProgress {
  current: number;
  total: number;
}

/**
 * Synthesis options
 */
export interface SynthesisOptions extends SynthesizerDeps {
  inputPath: string;
  outputDir: string;
  writer: PairWriter;
  concurrency: number;
  /** Process only the first N threads */
  limit?: number;
  skips?: SkipLog;
  onProgress?: (progress: SynthesisProgress) => void;
}

/**
 * Synthesis result
 */
export interface SynthesisResult {
  threadsRead: number;
  threadsProcessed: number;
  produced: number;
  skipped: readonly SkippedItem[];
  /** Written paths in thread order */
  files: string[];
  duration: number;
}

/**
 * Run the synthesis pipeline
 */
export async function runSynthesisPipeline(options: SynthesisOptions): Promise<SynthesisResult> {
  const startTime = Date.now();
  const log = createLogger({ module: 'pipeline', pipeline: 'synthesize' });
  const skips = options.skips ?? new SkipLog();

  const file = await readThreadFile(options.inputPath);
  const threads = options.limit !== undefined ? file.threads.slice(0, options.limit) : file.threads;

  await mkdir(options.outputDir, { recursive: true });
  log.info(
    { input: options.inputPath, threads: threads.length, format: options.writer.format },
    'Synthesizing pairs'
  );

  const written = new Map<number, string>();
  const run = await runSynthesis(threads, {
    ...options,
    skips,
    onPair: async record => {
      written.set(record.index, await writePair(options.outputDir, record, options.writer));
    },
    onSettled: (current, total) => options.onProgress?.({ current, total }),
  });

  const files = run.pairs.flatMap(record => {
    const path = written.get(record.index);
    return path ? [path] : [];
  });

  const result: SynthesisResult = {
    threadsRead: file.threads.length,
    threadsProcessed: threads.length,
    produced: run.pairs.length,
    skipped: skips.items,
    files,
    duration: Date.now() - startTime,
  };

  log.info(
    { produced: result.produced, skipped: run.skipped, duration: result.duration },
    'Synthesis complete'
  );

  return result;
}
