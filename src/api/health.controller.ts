import { Controller, Get } from '@nestjs/common';
import { SubscribersService } from '../subscribers/subscribers.service';
import { TelegramService } from '../telegram/telegram.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly subscribers: SubscribersService,
    private readonly telegram: TelegramService
  ) {}

  @Get()
  check() {
    return { status: 'ok', storage: this.subscribers.backend, bot: this.telegram.isConfigured() };
  }
}
