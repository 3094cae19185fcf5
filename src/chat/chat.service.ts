/**
 * Handles one inbound chat message end to end: records it in the channel
 * history, and when the assistant is addressed builds the memory block, asks
 * the model for a reply and hands the reply back for delivery.
 *
 * Remembering the turn (conversation log entry, occasional profile rewrite)
 * happens in the background after the reply is returned. Failures there are
 * logged and never reach the user.
 */
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { ConfigService } from '../config/config.service';
import { ConversationLogService } from '../memory/conversation-log.service';
import { MemoryContextService } from '../memory/memory-context.service';
import { ChatTurn } from '../memory/memory.types';
import { SummarySynthesizerService } from '../memory/summary-synthesizer.service';
import { PromptService } from '../prompts/prompt.service';
import { splitMessage } from '../utils/split-message';
import { InboundMessage, ReferencedMessage, TurnResult } from './chat.types';
import { MessageHistoryService } from './message-history.service';

@Injectable()
export class ChatService implements OnModuleDestroy {
  private readonly logger = new Logger(ChatService.name);
  private readonly pending = new Map<number, Promise<void>>();
  private nextTaskId = 0;

  constructor(
    private readonly history: MessageHistoryService,
    private readonly aiService: AiService,
    private readonly memoryContextService: MemoryContextService,
    private readonly conversationLogService: ConversationLogService,
    private readonly summarySynthesizer: SummarySynthesizerService,
    private readonly promptService: PromptService,
    private readonly configService: ConfigService,
  ) {}

  async onModuleDestroy() {
    await this.flush();
  }

  async handleMessage(message: InboundMessage): Promise<TurnResult> {
    const { channelId, authorId, authorName, content } = message;

    // Every message is recorded so later replies have the full channel context
    this.history.append(channelId, { role: 'user', content: `${authorName}: ${content}` });

    if (!message.mentionsBot) {
      return { replied: false, chunks: [], usedMemory: false };
    }

    const turns = this.history.getTurns(channelId);
    if (message.referenced) {
      turns.push(this.renderReference(message.referenced));
    }

    const memoryContext = await this.loadMemoryContext(authorId, content, channelId);

    let reply: string;
    try {
      reply = await this.aiService.chat(turns, memoryContext);
    } catch (error) {
      this.logger.error(`Failed to generate reply in channel ${channelId}: ${error}`);
      return {
        replied: true,
        chunks: [this.promptService.getPrompt('assistant', 'apology')],
        usedMemory: memoryContext !== undefined,
      };
    }

    this.history.append(channelId, { role: 'assistant', content: reply });
    const recentTurns = this.history.getTurns(channelId);
    this.runInBackground(() => this.rememberTurn(message, recentTurns));

    return {
      replied: true,
      chunks: splitMessage(reply, this.configService.getConfig().maxReplyLength),
      usedMemory: memoryContext !== undefined,
    };
  }

  clearHistory(channelId: string): void {
    this.history.clear(channelId);
    this.logger.log(`History cleared for channel ${channelId}`);
  }

  /**
   * Resolves once all background memory work started so far has finished
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending.values());
    }
  }

  private renderReference(referenced: ReferencedMessage): ChatTurn {
    if (referenced.fromBot) {
      return { role: 'assistant', content: `[Referenced message] ${referenced.content}` };
    }
    return {
      role: 'user',
      content: `[Referenced message] ${referenced.authorName}: ${referenced.content}`,
    };
  }

  private async loadMemoryContext(
    userId: string,
    content: string,
    channelId: string,
  ): Promise<string | undefined> {
    try {
      return await this.memoryContextService.buildContext(userId, content, channelId);
    } catch (error) {
      this.logger.warn(`Replying without memory in channel ${channelId}: ${error}`);
      return undefined;
    }
  }

  private runInBackground(work: () => Promise<void>): void {
    const id = this.nextTaskId++;
    const task = work().then(
      () => {
        this.pending.delete(id);
      },
      (error: unknown) => {
        this.pending.delete(id);
        this.logger.error(`Background memory task failed: ${error}`);
      },
    );
    this.pending.set(id, task);
  }

  /**
   * Store the exchange in the conversation log and, with the configured
   * probability, refresh the author's profile
   */
  private async rememberTurn(message: InboundMessage, turns: ChatTurn[]): Promise<void> {
    const memoryConfig = this.configService.getMemoryConfig();

    try {
      const summary = memoryConfig.summarizeConversations
        ? await this.aiService.summarizeConversation(turns)
        : undefined;
      await this.conversationLogService.append(message.channelId, { turns, summary });
    } catch (error) {
      this.logger.warn(`Conversation not stored for channel ${message.channelId}: ${error}`);
    }

    if (Math.random() >= memoryConfig.profileUpdateProbability) {
      return;
    }

    try {
      await this.summarySynthesizer.synthesize(message.authorId, message.authorName, turns);
    } catch (error) {
      this.logger.warn(`Profile not updated for user ${message.authorId}: ${error}`);
    }
  }
}
