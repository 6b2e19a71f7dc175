import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage, LoggerService } from '../common/logger.service';
import { TelegramService } from '../telegram/telegram.service';

/** One pending follow-up per chat; scheduling again replaces the earlier timer. */
@Injectable()
export class FollowupScheduler implements OnModuleDestroy {
  private readonly pending = new Map<number, NodeJS.Timeout>();

  constructor(
    private readonly config: ConfigService,
    private readonly logger: LoggerService,
    private readonly telegram: TelegramService
  ) {}

  get delayMs(): number {
    return (this.config.get<number>('followupDelaySeconds') || 0) * 1000;
  }

  schedule(chatId: number): boolean {
    const delay = this.delayMs;
    if (delay <= 0) return false;

    this.cancel(chatId);
    const timer = setTimeout(() => {
      this.pending.delete(chatId);
      void this.deliver(chatId);
    }, delay);
    timer.unref();
    this.pending.set(chatId, timer);
    return true;
  }

  cancel(chatId: number): boolean {
    const timer = this.pending.get(chatId);
    if (!timer) return false;
    clearTimeout(timer);
    this.pending.delete(chatId);
    return true;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  onModuleDestroy() {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }

  private async deliver(chatId: number) {
    const text = this.config.get<string>('followupMessage') || '';
    try {
      await this.telegram.sendMessage(chatId, text);
    } catch (err) {
      this.logger.warn('Follow-up message failed', { chatId, error: errorMessage(err) });
    }
  }
}
