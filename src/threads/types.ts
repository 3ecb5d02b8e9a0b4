/**
 * Thread records: the interchange format between extraction and synthesis
 */

import { z } from 'zod';

/**
 * One cleaned message
 */
export const MessageRecordSchema = z.object({
  id: z.string().min(1),
  author: z.string().nullable(),
  createdAt: z.string().min(1),
  content: z.string(),
});
export type MessageRecord = z.infer<typeof MessageRecordSchema>;

/**
 * Originating message plus its replies, oldest reply first
 */
export const ThreadRecordSchema = MessageRecordSchema.extend({
  replies: z.array(MessageRecordSchema),
});
export type ThreadRecord = z.infer<typeof ThreadRecordSchema>;

/**
 * Extractor output file
 */
export const ThreadFileSchema = z.object({
  version: z.literal(1),
  source: z.object({
    groupId: z.string(),
    channelId: z.string(),
    since: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  }),
  threads: z.array(ThreadRecordSchema),
});
export type ThreadFile = z.infer<typeof ThreadFileSchema>;
