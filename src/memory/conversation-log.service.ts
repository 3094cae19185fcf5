/**
 * CONVERSATION LOG SERVICE - Embedded conversation snippets for semantic recall.
 *
 * Each append embeds one document (an LLM summary, or the last few turns) and
 * adds it to conversations.json; once the log holds more than
 * `memory.maxConversations` records the oldest are evicted. Queries embed the
 * query text and scan every record (optionally only one channel's).
 */
import { Injectable, Logger } from '@nestjs/common';
import * as crypto from 'crypto';
import { ConfigService } from '../config/config.service';
import { truncateText } from '../utils/truncate';
import { EmbeddingService } from './embedding.service';
import { MemoryStorageService } from './memory-storage.service';
import {
  ConversationQueryOptions,
  ConversationRecord,
  ConversationSource,
  ScoredConversation,
} from './memory.types';
import { cosineSimilarity } from './similarity';

@Injectable()
export class ConversationLogService {
  private readonly logger = new Logger(ConversationLogService.name);
  private sequence = 0;

  constructor(
    private readonly storage: MemoryStorageService,
    private readonly embeddingService: EmbeddingService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Text stored (and embedded) for a conversation snippet
   */
  buildDocument(source: ConversationSource): string {
    const { summary } = source;
    if (summary?.trim()) {
      return summary;
    }
    const { documentTurnLimit, documentCharLimit } = this.configService.getMemoryConfig();
    return source.turns
      .slice(-documentTurnLimit)
      .map((turn) => `${turn.role}: ${truncateText(turn.content, documentCharLimit)}`)
      .join('\n');
  }

  private generateId(channelId: string, timestamp: string, document: string): string {
    const raw = `${channelId}:${timestamp}:${this.sequence++}:${document}`;
    return crypto.createHash('md5').update(raw).digest('hex').slice(0, 16);
  }

  /**
   * Store a conversation snippet. Rejects, without writing anything, if there
   * is nothing to store or the embedding call fails.
   */
  async append(channelId: string, source: ConversationSource): Promise<string> {
    const document = this.buildDocument(source);
    if (!document.trim()) {
      throw new Error(`Nothing to store for channel ${channelId}`);
    }

    const embedding = await this.embeddingService.generateEmbedding(document);

    const timestamp = new Date().toISOString();
    const record: ConversationRecord = {
      id: this.generateId(channelId, timestamp, document),
      document,
      embedding,
      channel_id: channelId,
      timestamp,
      message_count: source.turns.length,
    };

    const { maxConversations } = this.configService.getMemoryConfig();
    await this.storage.conversations.update((records) => {
      const next = [...records, record];
      if (next.length <= maxConversations) {
        return next;
      }
      this.logger.debug(`Evicting ${next.length - maxConversations} oldest conversation(s)`);
      return next.slice(-maxConversations);
    });

    this.logger.debug(`Stored conversation ${record.id} for channel ${channelId}`);
    return record.id;
  }

  /**
   * Score stored conversations against a query. Highest score first, ties in
   * storage order; at most `topN` results, each scoring above `minScore`.
   * Returns [] if the query cannot be embedded.
   */
  async search(queryText: string, options: ConversationQueryOptions = {}): Promise<ScoredConversation[]> {
    const memoryConfig = this.configService.getMemoryConfig();
    const { channelId, topN = memoryConfig.topN, minScore = memoryConfig.minScore } = options;

    const records = await this.storage.conversations.read();
    const candidates =
      channelId !== undefined ? records.filter((r) => r.channel_id === channelId) : records;

    if (candidates.length === 0) {
      return [];
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddingService.generateEmbedding(queryText);
    } catch (error) {
      this.logger.warn(`Conversation recall skipped, query could not be embedded: ${error}`);
      return [];
    }

    return candidates
      .map((record) => ({ record, score: cosineSimilarity(queryEmbedding, record.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topN)
      .filter((result) => result.score > minScore);
  }

  /**
   * Documents of the conversations most relevant to a query
   */
  async query(queryText: string, options: ConversationQueryOptions = {}): Promise<string[]> {
    const results = await this.search(queryText, options);
    return results.map((result) => result.record.document);
  }

  async list(channelId?: string): Promise<ConversationRecord[]> {
    const records = await this.storage.conversations.read();
    return channelId !== undefined ? records.filter((r) => r.channel_id === channelId) : records;
  }

  async count(channelId?: string): Promise<number> {
    return (await this.list(channelId)).length;
  }
}
