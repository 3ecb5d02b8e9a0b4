/**
 * extract command
 * Pull a channel's threads from Microsoft Graph into a thread file
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { loadConfig, requireGraphSettings } from '../../config/index.js';
import { createGraphClient } from '../../graph/client.js';
import { createRetryPolicy } from '../../http/retry.js';
import { runExtractionPipeline } from '../../pipeline/extract.js';
import { configureLogger } from '../../utils/logger.js';
import { formatSkipSummary, intInRange, parseDateArg, reportFatal, todayUtc } from '../output.js';

/** Options for the extract command */
export interface ExtractOptions {
  env?: string;
  concurrency?: number;
}

/**
 * Register the extract command on the program
 */
export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Extract channel threads and their replies into a thread file')
    .argument('<output-file>', 'Thread file to write')
    .argument('[date-from]', 'Only threads started on or after this date (YYYY-MM-DD, default: today (UTC))', parseDateArg)
    .option('--env <path>', 'Path to .env file')
    .option('--concurrency <n>', 'Reply fetches in flight (1-16)', intInRange(1, 16))
    .action(async (outputFile: string, dateFrom: string | undefined, options: ExtractOptions) => {
      try {
        const config = loadConfig(options.env);
        configureLogger(config);
        const graph = requireGraphSettings(config);

        const since = dateFrom ?? todayUtc();
        const outputPath = resolve(outputFile);
        console.log(`Extracting threads since ${since}`);

        const source = createGraphClient(graph, {
          timeout: config.requestTimeoutMs,
          retry: createRetryPolicy({ maxAttempts: config.maxAttempts }),
        });

        const result = await runExtractionPipeline({
          source,
          channel: { groupId: graph.groupId, channelId: graph.channelId },
          since,
          outputPath,
          concurrency: options.concurrency ?? config.replyConcurrency,
        });

        console.log('');
        console.log('Extraction complete:');
        console.log(`  Pages fetched: ${result.pagesFetched}`);
        console.log(`  Messages seen: ${result.messagesSeen}`);
        console.log(`  Threads written: ${result.threadCount}`);
        console.log(`  Replies written: ${result.replyCount}`);
        for (const line of formatSkipSummary(result.skipped)) {
          console.log(`  ${line}`);
        }
        console.log(`  Output: ${result.outputPath}`);
        console.log(`  Duration: ${(result.duration / 1000).toFixed(1)}s`);
      } catch (err) {
        reportFatal('Extraction', err);
      }
    });
}
