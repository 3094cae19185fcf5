import { Module } from '@nestjs/common';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { MessageHistoryService } from './message-history.service';
import { MemoryModule } from '../memory/memory.module';

@Module({
  imports: [MemoryModule],
  controllers: [ChatController],
  providers: [ChatService, MessageHistoryService],
  exports: [ChatService],
})
export class ChatModule {}
