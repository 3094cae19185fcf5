/**
 * Recent turns per channel, oldest first. Kept in process memory only; the
 * durable record of past conversations is the conversation log.
 */
import { Injectable } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { ChatTurn } from '../memory/memory.types';

@Injectable()
export class MessageHistoryService {
  private histories: Map<string, ChatTurn[]> = new Map();

  constructor(private readonly configService: ConfigService) {}

  append(channelId: string, turn: ChatTurn): void {
    const turns = this.histories.get(channelId) ?? [];
    turns.push(turn);

    const maxTurns = this.configService.getConfig().historySize;
    if (turns.length > maxTurns) {
      turns.splice(0, turns.length - maxTurns);
    }
    this.histories.set(channelId, turns);
  }

  /**
   * Copy of the channel's turns; safe to extend without touching the history
   */
  getTurns(channelId: string): ChatTurn[] {
    return [...(this.histories.get(channelId) ?? [])];
  }

  clear(channelId: string): void {
    this.histories.delete(channelId);
  }
}
