import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Put, UseGuards } from '@nestjs/common';
import { SerializedSubscriberMap, serializeSubscriberMap } from '../subscribers/subscriber.model';
import { SubscribersService } from '../subscribers/subscribers.service';
import { ApiKeyGuard } from './api-key.guard';
import { UpdateSubscriberDto } from './dto/update-subscriber.dto';

@Controller('subscribers')
@UseGuards(ApiKeyGuard)
export class SubscribersController {
  constructor(private readonly subscribers: SubscribersService) {}

  @Get()
  async list(): Promise<SerializedSubscriberMap> {
    return serializeSubscriberMap(await this.subscribers.list());
  }

  @Post('sync')
  @HttpCode(HttpStatus.OK)
  async syncAll(): Promise<{ updated: number; ok: true }> {
    const updated = await this.subscribers.syncAll();
    return { updated, ok: true };
  }

  @Put(':chatId')
  async update(
    @Param('chatId', ParseIntPipe) chatId: number,
    @Body() payload: UpdateSubscriberDto
  ): Promise<SerializedSubscriberMap> {
    const record = await this.subscribers.update(chatId, payload.toProfile());
    return { [String(chatId)]: record };
  }

  @Post(':chatId/sync')
  @HttpCode(HttpStatus.OK)
  async sync(@Param('chatId', ParseIntPipe) chatId: number): Promise<SerializedSubscriberMap> {
    const record = await this.subscribers.syncFromTelegram(chatId);
    return { [String(chatId)]: record };
  }
}
