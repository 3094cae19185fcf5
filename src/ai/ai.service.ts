/**
 * LLM gateway. The chat flow uses `chat` for replies; the memory services use
 * `complete` for profile synthesis and `summarizeConversation` for log entries.
 * `chat` and `complete` propagate errors so callers can decide how to degrade.
 */
import { Injectable, Logger } from '@nestjs/common';
import {
  AIMessage,
  BaseMessage,
  HumanMessage,
  MessageContent,
  SystemMessage,
} from '@langchain/core/messages';
import { ModelFactoryService } from '../model/model-factory.service';
import { PromptService } from '../prompts/prompt.service';
import { ConfigService } from '../config/config.service';
import { ChatTurn } from '../memory/memory.types';
import { truncateText } from '../utils/truncate';

/**
 * Flatten message content to plain text, keeping only text parts.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);

  constructor(
    private readonly modelFactory: ModelFactoryService,
    private readonly promptService: PromptService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Build the system prompt, with the memory block appended when present.
   */
  buildSystemPrompt(systemAddendum?: string): string {
    const config = this.configService.getConfig();
    const base = this.promptService.getPrompt('assistant', 'system', {
      botName: config.botName,
      model: config.model,
    });
    if (!systemAddendum) {
      return base;
    }
    const memory = this.promptService.getPrompt('assistant', 'memory', { context: systemAddendum });
    return `${base}\n\n${memory}`;
  }

  /**
   * Generate the assistant reply for a conversation.
   */
  async chat(turns: ChatTurn[], systemAddendum?: string): Promise<string> {
    const messages: BaseMessage[] = [
      new SystemMessage(this.buildSystemPrompt(systemAddendum)),
      ...turns.map((turn) =>
        turn.role === 'assistant' ? new AIMessage(turn.content) : new HumanMessage(turn.content),
      ),
    ];

    const response = await this.modelFactory.getModel('main').invoke(messages);
    const text = contentToText(response.content);
    this.logger.debug(`Reply generated (${text.length} chars, ${turns.length} turns of context)`);
    return text;
  }

  /**
   * Run a single-prompt completion on the utility model.
   */
  async complete(prompt: string): Promise<string> {
    const response = await this.modelFactory.getModel('utility').invoke([new HumanMessage(prompt)]);
    return contentToText(response.content);
  }

  /**
   * Summarize the tail of a conversation for storage in the conversation log.
   * Returns an empty string on failure so the caller can store raw turns instead.
   */
  async summarizeConversation(turns: ChatTurn[]): Promise<string> {
    if (turns.length === 0) {
      return '';
    }

    const { summaryTurnLimit, summaryCharLimit } = this.configService.getMemoryConfig();
    const conversation = turns
      .slice(-summaryTurnLimit)
      .map((turn) => `${turn.role}: ${truncateText(turn.content, summaryCharLimit)}`)
      .join('\n');

    try {
      const summary = await this.complete(
        this.promptService.getPrompt('memory', 'conversationSummary', { conversation }),
      );
      return summary.trim();
    } catch (error) {
      this.logger.error(`Failed to summarize conversation: ${error}`);
      return '';
    }
  }
}
