/**
 * Microsoft Graph channel message shapes
 * Only the fields the extractor reads are declared; the rest pass through.
 */

import { z } from 'zod';

/**
 * Identity of a user, application or device
 */
export const IdentitySchema = z
  .object({
    id: z.string().nullish(),
    displayName: z.string().nullish(),
  })
  .passthrough();
export type Identity = z.infer<typeof IdentitySchema>;

/**
 * Sender set
 */
export const MessageFromSchema = z
  .object({
    user: IdentitySchema.nullish(),
    application: IdentitySchema.nullish(),
    device: IdentitySchema.nullish(),
  })
  .passthrough();
export type MessageFrom = z.infer<typeof MessageFromSchema>;

/**
 * Message body (HTML or text)
 */
export const ItemBodySchema = z.object({
  contentType: z.string().nullish(),
  content: z.string().nullish(),
});
export type ItemBody = z.infer<typeof ItemBodySchema>;

/**
 * Channel message or reply
 */
export const GraphMessageSchema = z
  .object({
    id: z.string().min(1),
    messageType: z.string().nullish(),
    createdDateTime: z.string().datetime({ offset: true }),
    deletedDateTime: z.string().nullish(),
    replyToId: z.string().nullish(),
    from: MessageFromSchema.nullish(),
    body: ItemBodySchema,
  })
  .passthrough();
export type GraphMessage = z.infer<typeof GraphMessageSchema>;

/**
 * Collection page envelope
 * Items are validated one by one so a single bad message does not sink the page
 */
export const MessagePageSchema = z
  .object({
    value: z.array(z.unknown()),
    '@odata.nextLink': z.string().url().nullish(),
  })
  .passthrough();
export type MessagePage = z.infer<typeof MessagePageSchema>;

/**
 * Graph error body
 */
export const GraphErrorSchema = z.object({
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
    })
    .passthrough(),
});
export type GraphErrorBody = z.infer<typeof GraphErrorSchema>;

/**
 * Channel coordinates
 */
export interface ChannelRef {
  groupId: string;
  channelId: string;
}

/**
 * Where the extractor reads messages from
 */
export interface ChannelSource {
  /**
   * Validated pages of root messages, in API order
   */
  listMessagePages(channel: ChannelRef): AsyncIterable<MessagePage>;

  /**
   * Raw replies of one message, across all reply pages
   */
  listReplies(channel: ChannelRef, messageId: string): Promise<unknown[]>;
}
