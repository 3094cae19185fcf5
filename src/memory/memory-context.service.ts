/**
 * Builds the memory block injected into the system prompt: what we know about
 * the user, followed by past conversations in the channel that look relevant to
 * the current message.
 */
import { Injectable } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { ConversationLogService } from './conversation-log.service';
import { MemoryContextOptions } from './memory.types';
import { UserProfileService } from './user-profile.service';

@Injectable()
export class MemoryContextService {
  constructor(
    private readonly userProfileService: UserProfileService,
    private readonly conversationLogService: ConversationLogService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Returns undefined when there is nothing worth injecting, so callers can
   * skip the memory block entirely.
   */
  async buildContext(
    userId: string,
    currentMessage: string,
    channelId?: string,
    options: MemoryContextOptions = {},
  ): Promise<string | undefined> {
    const { includeUser = true, includeConversation = true } = options;
    const contextParts: string[] = [];

    if (includeUser) {
      const summary = await this.userProfileService.getSummary(userId);
      if (summary) {
        contextParts.push(`About this user: ${summary}`);
      }
    }

    if (includeConversation) {
      const relevant = await this.conversationLogService.query(currentMessage, {
        channelId,
        topN: this.configService.getMemoryConfig().contextTopN,
      });
      if (relevant.length > 0) {
        contextParts.push('Relevant past conversations:\n' + relevant.join('\n---\n'));
      }
    }

    return contextParts.length > 0 ? contextParts.join('\n\n') : undefined;
  }
}
