/**
 * Rewrites a user's profile from their recent messages. The previous summary
 * goes into the prompt and the model's answer replaces it, so the model
 * decides which older facts to carry forward.
 *
 * A user's messages are recognised by the "{displayName}: " prefix the chat
 * layer puts on every user turn.
 */
import { Injectable, Logger } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { ConfigService } from '../config/config.service';
import { PromptService } from '../prompts/prompt.service';
import { ChatTurn } from './memory.types';
import { UserProfileService } from './user-profile.service';

@Injectable()
export class SummarySynthesizerService {
  private readonly logger = new Logger(SummarySynthesizerService.name);

  constructor(
    private readonly userProfileService: UserProfileService,
    private readonly aiService: AiService,
    private readonly promptService: PromptService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Messages authored by the named user, most recent last
   */
  selectUserMessages(userName: string, recentTurns: ChatTurn[]): string[] {
    const prefix = `${userName}:`;
    return recentTurns
      .filter((turn) => turn.role === 'user' && turn.content.startsWith(prefix))
      .map((turn) => turn.content)
      .slice(-this.configService.getMemoryConfig().userTurnLimit);
  }

  /**
   * Update the stored summary for a user. Returns the new summary, or an empty
   * string when the user has no recent messages or the model call fails (the
   * stored summary is left untouched in both cases).
   */
  async synthesize(userId: string, userName: string, recentTurns: ChatTurn[]): Promise<string> {
    const userMessages = this.selectUserMessages(userName, recentTurns);
    if (userMessages.length === 0) {
      return '';
    }

    const existing = await this.userProfileService.getSummary(userId);
    const prompt = this.promptService.getPrompt('memory', 'userSummary', {
      previousSummary: existing ? `Previous summary: ${existing}\n\n` : '',
      userName,
      wordLimit: String(this.configService.getMemoryConfig().summaryWordLimit),
      messages: userMessages.join('\n'),
    });

    let summary: string;
    try {
      summary = await this.aiService.complete(prompt);
    } catch (error) {
      this.logger.warn(`Profile update for user ${userId} skipped: ${error}`);
      return '';
    }

    await this.userProfileService.setSummary(userId, summary);
    this.logger.log(`Profile updated for user ${userId} from ${userMessages.length} message(s)`);
    return summary;
  }
}
