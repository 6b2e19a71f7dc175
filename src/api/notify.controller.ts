import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { NotifyResult, NotifyService } from '../notify/notify.service';
import { ApiKeyGuard } from './api-key.guard';
import { NotifyDto } from './dto/notify.dto';

@Controller()
@UseGuards(ApiKeyGuard)
export class NotifyController {
  constructor(private readonly notifier: NotifyService) {}

  @Post('notify')
  @HttpCode(HttpStatus.OK)
  notify(@Body() payload: NotifyDto): Promise<NotifyResult> {
    return this.notifier.notify(payload);
  }
}
