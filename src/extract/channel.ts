/**
 * Channel extraction
 * Turns paginated channel messages and their replies into ThreadRecords
 */

import { z } from 'zod';
import { classifyError, errorMessage, isFatalError } from '../errors/index.js';
import { GraphMessageSchema, type ChannelRef, type ChannelSource, type GraphMessage } from '../graph/types.js';
import { mapWithConcurrency } from '../http/pool.js';
import type { SkipLog } from '../pipeline/skips.js';
import type { MessageRecord, ThreadRecord } from '../threads/types.js';
import { createLogger } from '../utils/logger.js';
import { cleanHtml } from './html.js';

export interface ExtractChannelOptions {
  channel: ChannelRef;
  /** Lower bound on the root message date, YYYY-MM-DD (UTC) */
  since: string;
  /** Reply fetches in flight */
  concurrency: number;
  skips: SkipLog;
}

export interface ChannelExtraction {
  threads: ThreadRecord[];
  pagesFetched: number;
  messagesSeen: number;
}

/**
 * Date portion (UTC) of a Graph timestamp
 */
export function messageDate(createdDateTime: string): string {
  return new Date(createdDateTime).toISOString().slice(0, 10);
}

/**
 * Author id of a message, or null when the sender is unknown
 */
export function messageAuthor(message: GraphMessage): string | null {
  const from = message.from;
  return from?.user?.id ?? from?.application?.id ?? from?.device?.id ?? null;
}

function isConversation(message: GraphMessage): boolean {
  return !message.messageType || message.messageType === 'message';
}

function idOf(raw: unknown): string {
  const parsed = z.object({ id: z.string() }).safeParse(raw);
  return parsed.success ? parsed.data.id : '(unknown)';
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

function toRecord(message: GraphMessage): MessageRecord {
  return {
    id: message.id,
    author: messageAuthor(message),
    createdAt: message.createdDateTime,
    content: cleanHtml(message.body.content),
  };
}

/**
 * Pick the root messages of a page that belong in the output
 */
function selectRoots(values: unknown[], since: string, skips: SkipLog): GraphMessage[] {
  const roots: GraphMessage[] = [];

  for (const raw of values) {
    const parsed = GraphMessageSchema.safeParse(raw);
    if (!parsed.success) {
      skips.record({
        unit: 'thread',
        id: idOf(raw),
        reason: `malformed message: ${describeIssues(parsed.error)}`,
        kind: 'data_quality',
      });
      continue;
    }

    const message = parsed.data;
    if (!isConversation(message)) continue;
    if (messageDate(message.createdDateTime) < since) continue;

    if (message.deletedDateTime) {
      skips.record({ unit: 'thread', id: message.id, reason: 'deleted', kind: 'data_quality' });
      continue;
    }

    roots.push(message);
  }

  return roots;
}

/**
 * Validate, clean and order raw replies
 */
export function buildReplies(rootId: string, rawReplies: unknown[], skips: SkipLog): MessageRecord[] {
  const replies: MessageRecord[] = [];

  for (const raw of rawReplies) {
    const parsed = GraphMessageSchema.safeParse(raw);
    if (!parsed.success) {
      skips.record({
        unit: 'reply',
        id: `${rootId}/${idOf(raw)}`,
        reason: `malformed reply: ${describeIssues(parsed.error)}`,
        kind: 'data_quality',
      });
      continue;
    }

    const reply = parsed.data;
    if (!isConversation(reply) || reply.deletedDateTime) continue;

    const record = toRecord(reply);
    if (!record.content) {
      skips.record({ unit: 'reply', id: `${rootId}/${reply.id}`, reason: 'empty content', kind: 'data_quality' });
      continue;
    }
    replies.push(record);
  }

  // Chronological; equal timestamps keep API order
  return replies
    .map((record, position) => ({ record, position, time: Date.parse(record.createdAt) }))
    .sort((a, b) => a.time - b.time || a.position - b.position)
    .map(entry => entry.record);
}

async function buildThread(
  source: ChannelSource,
  root: GraphMessage,
  options: ExtractChannelOptions
): Promise<ThreadRecord | null> {
  const { skips, channel } = options;
  const record = toRecord(root);

  if (!record.content) {
    skips.record({ unit: 'thread', id: root.id, reason: 'empty content', kind: 'data_quality' });
    return null;
  }

  let rawReplies: unknown[];
  try {
    rawReplies = await source.listReplies(channel, root.id);
  } catch (error) {
    if (isFatalError(error)) throw error;
    skips.record({
      unit: 'thread',
      id: root.id,
      reason: `replies unavailable: ${errorMessage(error)}`,
      kind: classifyError(error),
    });
    return null;
  }

  return { ...record, replies: buildReplies(root.id, rawReplies, skips) };
}

/**
 * Extract every qualifying thread of a channel, in API order
 */
export async function extractChannel(
  source: ChannelSource,
  options: ExtractChannelOptions
): Promise<ChannelExtraction> {
  const log = createLogger({ module: 'extract', channelId: options.channel.channelId });
  const threads: ThreadRecord[] = [];
  let pagesFetched = 0;
  let messagesSeen = 0;

  try {
    for await (const page of source.listMessagePages(options.channel)) {
      pagesFetched++;
      messagesSeen += page.value.length;

      const roots = selectRoots(page.value, options.since, options.skips);
      const built = await mapWithConcurrency(roots, options.concurrency, root =>
        buildThread(source, root, options)
      );

      for (const thread of built) {
        if (thread) threads.push(thread);
      }

      log.info({ page: pagesFetched, roots: roots.length, threads: threads.length }, 'Processed page');
    }
  } catch (error) {
    // Without the failed page there is no continuation link; stop here
    if (pagesFetched === 0 || isFatalError(error)) throw error;

    options.skips.record({
      unit: 'page',
      id: `page ${pagesFetched + 1}`,
      reason: `pagination stopped: ${errorMessage(error)}`,
      kind: classifyError(error),
    });
  }

  return { threads, pagesFetched, messagesSeen };
}
