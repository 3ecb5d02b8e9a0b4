#!/usr/bin/env node
/**
 * channel-qna CLI - Main entry point
 */

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { version } from '../version.js';
import { registerExtractCommand, registerSynthesizeCommand } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('channel-qna')
    .description('Extract Teams channel threads and synthesize question/answer pairs')
    .version(version);

  registerExtractCommand(program);
  registerSynthesizeCommand(program);

  return program;
}

/**
 * Whether this module is the process entry point (directly or through the bin link)
 */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run CLI when executed directly (not when imported as module)
if (isEntryPoint()) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
