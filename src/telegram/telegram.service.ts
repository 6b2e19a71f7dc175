import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { Telegraf } from 'telegraf';
import { TelegramNotConfiguredError } from '../common/errors';

export interface ChatProfile {
  first_name: string | null;
  last_name: string | null;
  username: string | null;
}

function stringField(source: object, key: string): string | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : null;
}

/** Single Telegraf instance shared by the command handlers and the HTTP API. */
@Injectable()
export class TelegramService {
  readonly bot: Telegraf;
  private readonly token: string;

  constructor(private readonly config: ConfigService) {
    this.token = this.config.get<string>('botToken') || '';
    const proxyUrl = this.config.get<string>('socksProxy');
    const agent = proxyUrl ? new SocksProxyAgent(proxyUrl) : undefined;
    this.bot = new Telegraf(this.token, agent ? { telegram: { agent } } : undefined);
  }

  isConfigured(): boolean {
    return this.token.length > 0;
  }

  assertConfigured() {
    if (!this.isConfigured()) throw new TelegramNotConfiguredError();
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    this.assertConfigured();
    await this.bot.telegram.sendMessage(chatId, text);
  }

  async getChatProfile(chatId: number): Promise<ChatProfile> {
    this.assertConfigured();
    const chat = await this.bot.telegram.getChat(chatId);
    return {
      first_name: stringField(chat, 'first_name'),
      last_name: stringField(chat, 'last_name'),
      username: stringField(chat, 'username')
    };
  }
}
