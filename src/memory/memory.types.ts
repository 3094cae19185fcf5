/**
 * Type definitions for the memory system.
 * Profiles: one evolving natural-language summary per user (user_summaries.json)
 * Conversation log: embedded conversation snippets per channel (conversations.json)
 */
import { z } from 'zod';

/**
 * A single chat turn as delivered by the platform layer
 */
export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export const UserSummaryEntrySchema = z.object({
  summary: z.string(),
  updated_at: z.string(),
});

/**
 * Storage format for user_summaries.json, keyed by user id
 */
export const UserSummariesSchema = z.record(z.string(), UserSummaryEntrySchema);

export type UserSummaryEntry = z.infer<typeof UserSummaryEntrySchema>;
export type UserSummaries = z.infer<typeof UserSummariesSchema>;

export interface UserProfile {
  userId: string;
  summary: string;
  updatedAt: string;
}

export const ConversationRecordSchema = z.object({
  id: z.string(),
  document: z.string(),
  embedding: z.array(z.number()),
  channel_id: z.string(),
  timestamp: z.string(),
  message_count: z.number().int().nonnegative(),
});

/**
 * Storage format for conversations.json, oldest first
 */
export const ConversationLogSchema = z.array(ConversationRecordSchema);

export type ConversationRecord = z.infer<typeof ConversationRecordSchema>;

/**
 * What a conversation log entry is built from. A non-empty summary is stored
 * as-is; otherwise the tail of `turns` is rendered.
 */
export interface ConversationSource {
  turns: ChatTurn[];
  summary?: string;
}

export interface ConversationQueryOptions {
  channelId?: string;
  topN?: number;
  minScore?: number;
}

export interface ScoredConversation {
  record: ConversationRecord;
  score: number;
}

export interface MemoryContextOptions {
  includeUser?: boolean;
  includeConversation?: boolean;
}
