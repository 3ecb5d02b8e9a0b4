/**
 * synthesize command
 * Turn a thread file into question/answer pair files
 */

import { Command, Option } from 'commander';
import { resolve } from 'path';
import { loadConfig, requireCompletionSettings } from '../../config/index.js';
import { PAIR_FORMATS, getPairWriter, isPairFormat } from '../../export/pairs.js';
import { RateGate } from '../../http/rate-limit.js';
import { createRetryPolicy } from '../../http/retry.js';
import { createAzureOpenAIProvider } from '../../llm/azure-openai.js';
import { runSynthesisPipeline } from '../../pipeline/synthesize.js';
import { configureLogger } from '../../utils/logger.js';
import { formatSkipSummary, intInRange, reportFatal } from '../output.js';

/** Options for the synthesize command */
export interface SynthesizeOptions {
  env?: string;
  format: string;
  limit?: number;
  concurrency?: number;
}

/**
 * Register the synthesize command on the program
 */
export function registerSynthesizeCommand(program: Command): void {
  program
    .command('synthesize')
    .description('Synthesize one question/answer pair per thread')
    .argument('<input-file>', 'Thread file written by extract')
    .argument('<output-dir>', 'Directory for the pair files')
    .addOption(
      new Option('--format <format>', 'Output format')
        .choices([...PAIR_FORMATS])
        .default('json')
    )
    .option('--limit <n>', 'Process only the first N threads', intInRange(1, Number.MAX_SAFE_INTEGER))
    .option('--concurrency <n>', 'Completion requests in flight (1-16)', intInRange(1, 16))
    .option('--env <path>', 'Path to .env file')
    .action(async (inputFile: string, outputDir: string, options: SynthesizeOptions) => {
      try {
        if (!isPairFormat(options.format)) {
          throw new Error(`Unknown output format: ${options.format}`);
        }
        const writer = getPairWriter(options.format);
        const config = loadConfig(options.env);
        configureLogger(config);
        const completion = requireCompletionSettings(config);

        const provider = createAzureOpenAIProvider(completion, {
          timeout: config.requestTimeoutMs,
        });
        const showProgress = process.stderr.isTTY;

        const result = await runSynthesisPipeline({
          inputPath: resolve(inputFile),
          outputDir: resolve(outputDir),
          writer,
          limit: options.limit,
          concurrency: options.concurrency ?? config.synthesisConcurrency,
          provider,
          retry: createRetryPolicy({ maxAttempts: config.maxAttempts }),
          gate: new RateGate({ requestsPerMinute: config.requestsPerMinute }),
          completion: {
            maxTokens: config.maxTokens,
            temperature: config.temperature,
            topP: config.topP,
          },
          promptTokenBudget: config.promptTokenBudget,
          onProgress: ({ current, total }) => {
            if (showProgress) {
              process.stderr.write(`\rSynthesized ${current}/${total}${current === total ? '\n' : ''}`);
            }
          },
        });

        console.log('');
        console.log('Synthesis complete:');
        console.log(`  Threads read: ${result.threadsRead}`);
        console.log(`  Threads processed: ${result.threadsProcessed}`);
        console.log(`  Pairs written: ${result.produced}`);
        for (const line of formatSkipSummary(result.skipped)) {
          console.log(`  ${line}`);
        }
        console.log(`  Output: ${resolve(outputDir)}`);
        console.log(`  Duration: ${(result.duration / 1000).toFixed(1)}s`);
      } catch (err) {
        reportFatal('Synthesis', err);
      }
    });
}
