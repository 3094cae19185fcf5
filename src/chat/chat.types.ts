/**
 * Shapes exchanged between a chat platform and the assistant.
 * Platforms post one InboundMessage per message seen in a channel, addressed
 * to the bot or not, so the channel history stays complete.
 */
import { z } from 'zod';

export const ReferencedMessageSchema = z.object({
  authorName: z.string().min(1),
  content: z.string(),
  /** True when the referenced message was written by the assistant itself. */
  fromBot: z.boolean().default(false),
});

export const InboundMessageSchema = z.object({
  channelId: z.string().min(1),
  authorId: z.string().min(1),
  authorName: z.string().min(1),
  content: z.string().min(1).max(8000),
  mentionsBot: z.boolean().default(true),
  referenced: ReferencedMessageSchema.optional(),
});

export type ReferencedMessage = z.infer<typeof ReferencedMessageSchema>;
export type InboundMessage = z.infer<typeof InboundMessageSchema>;

/**
 * Result of handling one inbound message
 */
export interface TurnResult {
  replied: boolean;
  /** Reply split into platform-sized pieces, in send order. */
  chunks: string[];
  /** Whether a memory block was injected into the prompt. */
  usedMemory: boolean;
}
