/**
 * Simple root/health response for the HTTP server.
 */
import { Injectable } from '@nestjs/common';
import { ConfigService } from './config/config.service';

@Injectable()
export class AppService {
  constructor(private readonly configService: ConfigService) {}

  getHello(): string {
    return `${this.configService.getConfig().botName} chat memory assistant is running!`;
  }
}
