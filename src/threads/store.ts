/**
 * Thread file persistence
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { PipelineError, errorMessage } from '../errors/index.js';
import { ThreadFileSchema, type ThreadFile } from './types.js';

/**
 * Serialize a thread file
 */
export function serializeThreadFile(file: ThreadFile): string {
  return JSON.stringify(file, null, 2) + '\n';
}

/**
 * Write a thread file, creating parent directories
 * @returns bytes written
 */
export async function writeThreadFile(path: string, file: ThreadFile): Promise<number> {
  const content = serializeThreadFile(file);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
  return Buffer.byteLength(content, 'utf-8');
}

/**
 * Parse and validate thread file content
 * @throws PipelineError (fatal) when the content is not a thread file
 */
export function parseThreadFile(content: string, path = '<input>'): ThreadFile {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new PipelineError(`${path} is not valid JSON: ${errorMessage(error)}`, 'fatal', { cause: error });
  }

  const result = ThreadFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PipelineError(`${path} is not a thread file:\n  - ${issues.join('\n  - ')}`, 'fatal');
  }

  return result.data;
}

/**
 * Read and validate a thread file
 */
export async function readThreadFile(path: string): Promise<ThreadFile> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PipelineError(`Cannot read ${path}: ${errorMessage(error)}`, 'fatal', { cause: error });
  }
  return parseThreadFile(content, path);
}
