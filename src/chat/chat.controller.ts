/**
 * HTTP entry point for chat platforms. A platform adapter posts every message
 * it sees and sends back the returned chunks when `replied` is true.
 */
import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  HttpCode,
  Param,
  Post,
} from '@nestjs/common';
import { ChatService } from './chat.service';
import { InboundMessageSchema, TurnResult } from './chat.types';

@Controller('chat')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post()
  @HttpCode(200)
  async handleMessage(@Body() body: unknown): Promise<TurnResult> {
    const parsed = InboundMessageSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    return this.chatService.handleMessage(parsed.data);
  }

  @Delete(':channelId/history')
  @HttpCode(204)
  clearHistory(@Param('channelId') channelId: string): void {
    this.chatService.clearHistory(channelId);
  }
}
