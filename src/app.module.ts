import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AppConfigModule } from './config/config.module';
import { ModelModule } from './model/model.module';
import { PromptModule } from './prompts/prompt.module';
import { AiModule } from './ai/ai.module';
import { MemoryModule } from './memory/memory.module';
import { ChatModule } from './chat/chat.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    AppConfigModule,
    ModelModule,
    PromptModule,
    AiModule,
    MemoryModule, // Profiles + conversation log, file-backed under memory.directory
    ChatModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
