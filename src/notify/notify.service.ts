import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mapWithConcurrency } from '../common/concurrency';
import { errorMessage, LoggerService } from '../common/logger.service';
import { normalizeNip, SubscriberMap } from '../subscribers/subscriber.model';
import { SubscribersService } from '../subscribers/subscribers.service';
import { TelegramService } from '../telegram/telegram.service';

export interface NotifyRequest {
  message: string;
  chat_id?: number;
  username?: string;
  first_name?: string;
  last_name?: string;
  nip?: string;
}

export interface NotifyResult {
  sent: number;
  ok: true;
}

export type TargetFilter = Omit<NotifyRequest, 'message'>;

function contains(haystack: string | null, needle: string): boolean {
  return haystack !== null && haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Picks recipients from the subscriber map. A chat id only ever selects that
 * subscriber. Name filters are exclusive in the order username, first name,
 * last name; a NIP filter replaces whatever they selected.
 */
export function selectTargets(subscribers: SubscriberMap, filter: TargetFilter): number[] {
  if (filter.chat_id !== undefined) {
    return subscribers.has(filter.chat_id) ? [filter.chat_id] : [];
  }

  const entries = [...subscribers.entries()];
  let targets: number[];

  if (filter.username) {
    const wanted = filter.username.toLowerCase();
    targets = entries.filter(([, meta]) => meta.username?.toLowerCase() === wanted).map(([id]) => id);
  } else if (filter.first_name) {
    const needle = filter.first_name;
    targets = entries.filter(([, meta]) => contains(meta.first_name, needle)).map(([id]) => id);
  } else if (filter.last_name) {
    const needle = filter.last_name;
    targets = entries.filter(([, meta]) => contains(meta.last_name, needle)).map(([id]) => id);
  } else {
    targets = entries.map(([id]) => id);
  }

  if (filter.nip) {
    const wanted = normalizeNip(filter.nip);
    targets = entries.filter(([, meta]) => meta.nip !== null && meta.nip === wanted).map(([id]) => id);
  }

  return targets;
}

@Injectable()
export class NotifyService {
  constructor(
    private readonly config: ConfigService,
    private readonly logger: LoggerService,
    private readonly subscribers: SubscribersService,
    private readonly telegram: TelegramService
  ) {}

  async notify(request: NotifyRequest): Promise<NotifyResult> {
    const subscribers = await this.subscribers.list();
    const targets = selectTargets(subscribers, request);
    if (!targets.length) {
      return { sent: 0, ok: true };
    }

    this.telegram.assertConfigured();
    const limit = this.config.get<number>('notifyConcurrency') || 10;
    const results = await mapWithConcurrency(targets, limit, (chatId) => this.deliver(chatId, request.message));
    const sent = results.filter(Boolean).length;
    this.logger.log('Notification dispatched', { targets: targets.length, sent });
    return { sent, ok: true };
  }

  broadcast(message: string): Promise<NotifyResult> {
    return this.notify({ message });
  }

  private async deliver(chatId: number, text: string): Promise<boolean> {
    try {
      await this.telegram.sendMessage(chatId, text);
      return true;
    } catch (err) {
      this.logger.warn('Failed to send message', { chatId, error: errorMessage(err) });
      return false;
    }
  }
}
