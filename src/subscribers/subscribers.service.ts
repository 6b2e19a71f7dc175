import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mapWithConcurrency } from '../common/concurrency';
import { ChatNotAccessibleError } from '../common/errors';
import { errorMessage, LoggerService } from '../common/logger.service';
import { SubscriberStore, UpsertResult } from '../storage/subscriber-store';
import { TelegramService } from '../telegram/telegram.service';
import {
  applyProfile,
  normalizeNip,
  SubscriberMap,
  SubscriberProfile,
  SubscriberRecord
} from './subscriber.model';

export interface IncomingChat {
  id: number;
  type: string;
}

export interface IncomingUser {
  first_name?: string;
  last_name?: string;
  username?: string;
}

@Injectable()
export class SubscribersService {
  constructor(
    private readonly config: ConfigService,
    private readonly logger: LoggerService,
    private readonly store: SubscriberStore,
    private readonly telegram: TelegramService
  ) {}

  get backend() {
    return this.store.backend;
  }

  list(): Promise<SubscriberMap> {
    return this.store.loadAll();
  }

  get(chatId: number): Promise<SubscriberRecord | null> {
    return this.store.get(chatId);
  }

  /**
   * Creates or refreshes the record of a private chat. Fields Telegram did not
   * send are left as stored. Group chats are ignored.
   */
  async recordInteraction(chat: IncomingChat, from?: IncomingUser): Promise<UpsertResult | null> {
    if (chat.type !== 'private') return null;
    const result = await this.store.upsert(chat.id, {
      first_name: from?.first_name,
      last_name: from?.last_name,
      username: from?.username
    });
    if (result.created) {
      this.logger.log('Subscriber added', { chatId: chat.id, username: result.record.username });
    }
    return result;
  }

  /** Explicit edits always stamp `updated_at`, even when the values are unchanged. */
  async update(chatId: number, patch: SubscriberProfile): Promise<SubscriberRecord> {
    const { record } = await this.store.upsert(chatId, patch, { touch: true });
    return record;
  }

  async setNip(chatId: number, raw: string): Promise<SubscriberRecord> {
    return this.update(chatId, { nip: normalizeNip(raw) });
  }

  async syncFromTelegram(chatId: number): Promise<SubscriberRecord> {
    this.telegram.assertConfigured();
    let profile: SubscriberProfile;
    try {
      profile = await this.telegram.getChatProfile(chatId);
    } catch (err) {
      this.logger.warn('Failed to fetch chat info', { chatId, error: errorMessage(err) });
      throw new ChatNotAccessibleError(chatId, err);
    }
    return this.update(chatId, profile);
  }

  /** Refreshes every record from Telegram; returns how many chats answered. */
  async syncAll(): Promise<number> {
    this.telegram.assertConfigured();
    const map = await this.store.loadAll();
    if (!map.size) return 0;

    const limit = this.config.get<number>('notifyConcurrency') || 10;
    const now = new Date().toISOString();
    const outcomes = await mapWithConcurrency([...map.keys()], limit, async (chatId) => {
      try {
        const profile = await this.telegram.getChatProfile(chatId);
        const current = map.get(chatId);
        if (current) map.set(chatId, applyProfile(current, profile, now).record);
        return true;
      } catch (err) {
        this.logger.warn('Failed to sync chat', { chatId, error: errorMessage(err) });
        return false;
      }
    });

    await this.store.saveAll(map);
    return outcomes.filter(Boolean).length;
  }
}
