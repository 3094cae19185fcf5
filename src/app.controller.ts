/**
 * HTTP root endpoint (GET /). Returns a simple "service is running" message;
 * the real entry points are /chat and /memory.
 */
import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getHello(): string {
    return this.appService.getHello();
  }
}
