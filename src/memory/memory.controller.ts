/**
 * Read-only HTTP view of the memory stores, for inspecting what the assistant
 * remembers about a user or a channel.
 */
import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { ConversationLogService } from './conversation-log.service';
import { UserProfile } from './memory.types';
import { UserProfileService } from './user-profile.service';

export interface ConversationSummaryView {
  id: string;
  channelId: string;
  document: string;
  timestamp: string;
  messageCount: number;
}

@Controller('memory')
export class MemoryController {
  constructor(
    private readonly userProfileService: UserProfileService,
    private readonly conversationLogService: ConversationLogService,
  ) {}

  @Get('users/:userId')
  async getUserProfile(@Param('userId') userId: string): Promise<UserProfile> {
    const profile = await this.userProfileService.getProfile(userId);
    if (!profile) {
      throw new NotFoundException(`No profile stored for user ${userId}`);
    }
    return profile;
  }

  @Get('conversations')
  async listConversations(
    @Query('channelId') channelId?: string,
  ): Promise<ConversationSummaryView[]> {
    const records = await this.conversationLogService.list(channelId || undefined);
    return records.map((record) => ({
      id: record.id,
      channelId: record.channel_id,
      document: record.document,
      timestamp: record.timestamp,
      messageCount: record.message_count,
    }));
  }
}
