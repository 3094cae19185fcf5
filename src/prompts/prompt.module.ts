import { Global, Module } from '@nestjs/common';
import { PromptService } from './prompt.service';
import { AppConfigModule } from '../config/config.module';

@Global()
@Module({
  imports: [AppConfigModule],
  providers: [PromptService],
  exports: [PromptService],
})
export class PromptModule {}
