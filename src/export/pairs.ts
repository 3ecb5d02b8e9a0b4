/**
 * Pair export module
 * One file per produced pair, named after the thread's position in the input
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import type { PairRecord } from '../synth/synthesizer.js';

export type PairFormat = 'json' | 'document';

/**
 * Renders a pair record to file content
 */
export interface PairWriter {
  format: PairFormat;
  extension: string;
  render(record: PairRecord): string;
}

/**
 * JSON writer: the record as a 2-space indented object
 */
export const jsonPairWriter: PairWriter = {
  format: 'json',
  extension: 'json',
  render(record) {
    const { index, threadId, askedAt, question, answer } = record;
    return JSON.stringify({ index, threadId, askedAt, question, answer }, null, 2) + '\n';
  },
};

/**
 * Document writer: question as a heading, answer as the body
 */
export const documentPairWriter: PairWriter = {
  format: 'document',
  extension: 'md',
  render(record) {
    const heading = record.question.replace(/\s+/g, ' ').trim();
    return `# ${heading}\n\n${record.answer.trim()}\n`;
  },
};

const WRITERS: Record<PairFormat, PairWriter> = {
  json: jsonPairWriter,
  document: documentPairWriter,
};

export const PAIR_FORMATS: readonly PairFormat[] = ['json', 'document'];

/**
 * Type guard for a format name
 */
export function isPairFormat(value: string): value is PairFormat {
  return value === 'json' || value === 'document';
}

/**
 * Writer for a format
 */
export function getPairWriter(format: PairFormat): PairWriter {
  return WRITERS[format];
}

/**
 * Filename for a pair
 * Format: qna_{index}.{extension}
 */
export function pairFilename(index: number, writer: PairWriter): string {
  return `qna_${index}.${writer.extension}`;
}

/**
 * Write a pair into the output directory
 * @returns path of the written file
 */
export async function writePair(
  outputDir: string,
  record: PairRecord,
  writer: PairWriter
): Promise<string> {
  const path = join(outputDir, pairFilename(record.index, writer));
  await mkdir(outputDir, { recursive: true });
  await writeFile(path, writer.render(record), 'utf-8');
  return path;
}
