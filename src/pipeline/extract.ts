/**
 * Extraction pipeline
 * Channel messages in, thread file out
 */

import { extractChannel } from '../extract/channel.js';
import type { ChannelRef, ChannelSource } from '../graph/types.js';
import { writeThreadFile } from '../threads/store.js';
import type { ThreadFile } from '../threads/types.js';
import { createLogger } from '../utils/logger.js';
import { SkipLog, type SkippedItem } from './skips.js';

/**
 * Extraction options
 */
export interface ExtractionOptions {
  source: ChannelSource;
  channel: ChannelRef;
  /** YYYY-MM-DD (UTC), inclusive */
  since: string;
  outputPath: string;
  concurrency: number;
  skips?: SkipLog;
}

/**
 * Extraction result
 */
export interface ExtractionResult {
  threadCount: number;
  replyCount: number;
  pagesFetched: number;
  messagesSeen: number;
  skipped: readonly SkippedItem[];
  outputPath: string;
  bytesWritten: number;
  duration: number;
}

/**
 * Run the extraction pipeline
 */
export async function runExtractionPipeline(options: ExtractionOptions): Promise<ExtractionResult> {
  const startTime = Date.now();
  const log = createLogger({ module: 'pipeline', pipeline: 'extract' });
  const skips = options.skips ?? new SkipLog();

  log.info({ ...options.channel, since: options.since }, 'Extracting channel');

  const extraction = await extractChannel(options.source, {
    channel: options.channel,
    since: options.since,
    concurrency: options.concurrency,
    skips,
  });

  const file: ThreadFile = {
    version: 1,
    source: { ...options.channel, since: options.since },
    threads: extraction.threads,
  };
  const bytesWritten = await writeThreadFile(options.outputPath, file);

  const result: ExtractionResult = {
    threadCount: extraction.threads.length,
    replyCount: extraction.threads.reduce((sum, thread) => sum + thread.replies.length, 0),
    pagesFetched: extraction.pagesFetched,
    messagesSeen: extraction.messagesSeen,
    skipped: skips.items,
    outputPath: options.outputPath,
    bytesWritten,
    duration: Date.now() - startTime,
  };

  log.info(
    { threads: result.threadCount, replies: result.replyCount, skipped: skips.count, duration: result.duration },
    'Extraction complete'
  );

  return result;
}
