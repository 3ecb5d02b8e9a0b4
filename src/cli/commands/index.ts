/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerExtractCommand } from './extract.js';
export { registerSynthesizeCommand } from './synthesize.js';
