/**
 * channel-qna - Teams channel threads to question/answer pairs
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './errors/index.js';
export * from './extract/html.js';
export * from './extract/channel.js';
export * from './graph/types.js';
export * from './graph/client.js';
export * from './http/retry.js';
export * from './http/rate-limit.js';
export * from './http/pool.js';
export * from './llm/provider.js';
export * from './llm/azure-openai.js';
export * from './threads/types.js';
export * from './threads/store.js';
export * from './synth/prompts.js';
export * from './synth/validation.js';
export * from './synth/synthesizer.js';
export * from './export/pairs.js';
export * from './pipeline/skips.js';
export * from './pipeline/extract.js';
export * from './pipeline/synthesize.js';
export { configureLogger, createLogger, getLogger } from './utils/logger.js';
export { version } from './version.js';
