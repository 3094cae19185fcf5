import { Module } from '@nestjs/common';
import { MemoryStorageService } from './memory-storage.service';
import { EmbeddingService } from './embedding.service';
import { UserProfileService } from './user-profile.service';
import { ConversationLogService } from './conversation-log.service';
import { MemoryContextService } from './memory-context.service';
import { SummarySynthesizerService } from './summary-synthesizer.service';
import { MemoryController } from './memory.controller';

@Module({
  controllers: [MemoryController],
  providers: [
    MemoryStorageService,
    EmbeddingService,
    UserProfileService,
    ConversationLogService,
    MemoryContextService,
    SummarySynthesizerService,
  ],
  exports: [
    UserProfileService,
    ConversationLogService,
    MemoryContextService,
    SummarySynthesizerService,
  ],
})
export class MemoryModule {}
