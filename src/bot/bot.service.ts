import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OutboundUrlRejectedError, SubscriberNotFoundError } from '../common/errors';
import { errorMessage, LoggerService } from '../common/logger.service';
import { ForwardService } from '../forward/forward.service';
import { NotifyService } from '../notify/notify.service';
import { SubscribersService } from '../subscribers/subscribers.service';
import { TelegramService } from '../telegram/telegram.service';
import {
  ADMIN_HELP,
  BROADCAST_USAGE,
  commandArgs,
  describeSubscriber,
  describeSubscribers,
  FORWARD_USAGE,
  HELP,
  NIP_USAGE,
  NOT_ALLOWED,
  NOT_SUBSCRIBED,
  WELCOME
} from './bot.replies';
import { FollowupScheduler } from './followup.scheduler';

/** The slice of a Telegraf context the handlers rely on. */
export interface BotContext {
  chat?: { id: number; type: string };
  from?: { id: number; first_name?: string; last_name?: string; username?: string };
  reply(text: string): Promise<unknown>;
}

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
  private launched = false;

  constructor(
    private readonly config: ConfigService,
    private readonly logger: LoggerService,
    private readonly telegram: TelegramService,
    private readonly subscribers: SubscribersService,
    private readonly notifier: NotifyService,
    private readonly forwarder: ForwardService,
    private readonly followups: FollowupScheduler
  ) {}

  async onModuleInit() {
    this.registerHandlers();

    if (!this.config.get<boolean>('botPolling')) {
      this.logger.log('Bot polling disabled; serving the HTTP API only');
      return;
    }
    if (!this.telegram.isConfigured()) {
      this.logger.warn('TELEGRAM_TOKEN is not set; bot polling not started');
      return;
    }

    const bot = this.telegram.bot;
    try {
      const me = await bot.telegram.getMe();
      this.logger.log(`Bot identity: @${me.username || 'unknown'}`);
    } catch (err) {
      this.logger.error('Bot getMe failed', errorMessage(err));
      throw err;
    }

    try {
      await bot.telegram.deleteWebhook();
      this.logger.log('Bot webhook cleared');
    } catch (err) {
      this.logger.error('Bot deleteWebhook failed', errorMessage(err));
    }

    bot.catch((err) => {
      this.logger.error('Bot error', errorMessage(err));
    });

    bot
      .launch({ dropPendingUpdates: true }, () => {
        this.launched = true;
        this.logger.log('Bot launched');
      })
      .catch((err: unknown) => {
        this.launched = false;
        this.logger.error('Bot polling stopped', errorMessage(err));
      });
  }

  onModuleDestroy() {
    if (!this.launched) return;
    this.launched = false;
    try {
      this.telegram.bot.stop('shutdown');
    } catch (err) {
      this.logger.warn('Bot stop failed', { error: errorMessage(err) });
    }
  }

  private registerHandlers() {
    const bot = this.telegram.bot;

    bot.use(async (ctx, next) => {
      await this.trackSubscriber(ctx);
      return next();
    });

    bot.start((ctx) => this.handleStart(ctx));
    bot.help((ctx) => this.handleHelp(ctx));
    bot.command('me', (ctx) => this.handleMe(ctx));
    bot.command('nip', (ctx) => this.handleNip(ctx, commandArgs(ctx.message.text)));
    bot.command('forward', (ctx) => this.handleForward(ctx, commandArgs(ctx.message.text)));
    bot.command('subscribers', (ctx) => this.handleSubscribers(ctx));
    bot.command('broadcast', (ctx) => this.handleBroadcast(ctx, commandArgs(ctx.message.text)));
  }

  /** Keeps the sender's record current on every private update. */
  async trackSubscriber(ctx: Pick<BotContext, 'chat' | 'from'>) {
    if (!ctx.chat) return;
    try {
      await this.subscribers.recordInteraction(ctx.chat, ctx.from);
    } catch (err) {
      this.logger.error('Failed to record subscriber', errorMessage(err), { chatId: ctx.chat.id });
    }
  }

  async handleStart(ctx: BotContext) {
    await ctx.reply(WELCOME);
    if (ctx.chat?.type === 'private') {
      this.followups.schedule(ctx.chat.id);
    }
  }

  async handleHelp(ctx: BotContext) {
    await ctx.reply(this.isAdmin(ctx) ? `${HELP}\n\n${ADMIN_HELP}` : HELP);
  }

  async handleMe(ctx: BotContext) {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    const record = await this.subscribers.get(chatId);
    await ctx.reply(record ? describeSubscriber(chatId, record) : NOT_SUBSCRIBED);
  }

  async handleNip(ctx: BotContext, args: string) {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    if (!args) {
      await ctx.reply(NIP_USAGE);
      return;
    }
    const record = await this.subscribers.setNip(chatId, args);
    await ctx.reply(record.nip ? `✅ NIP saved: ${record.nip}` : NIP_USAGE);
  }

  async handleForward(ctx: BotContext, args: string) {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    if (!args) {
      await ctx.reply(FORWARD_USAGE);
      return;
    }

    try {
      const result = await this.forwarder.forwardSubscriber(chatId, args);
      await ctx.reply(`✅ Sent your record to ${result.url} (HTTP ${result.status}).`);
    } catch (err) {
      if (err instanceof OutboundUrlRejectedError) {
        this.logger.warn('Forward refused', { chatId, reason: err.reason });
        await ctx.reply(`⛔ Refused: ${err.reason}.`);
        return;
      }
      if (err instanceof SubscriberNotFoundError) {
        await ctx.reply(NOT_SUBSCRIBED);
        return;
      }
      this.logger.warn('Forward failed', { chatId, error: errorMessage(err) });
      await ctx.reply('⚠️ Forward failed. Check the URL and try again.');
    }
  }

  async handleSubscribers(ctx: BotContext) {
    if (!this.isAdmin(ctx)) {
      await ctx.reply(NOT_ALLOWED);
      return;
    }
    const map = await this.subscribers.list();
    await ctx.reply(describeSubscribers(map));
  }

  async handleBroadcast(ctx: BotContext, args: string) {
    if (!this.isAdmin(ctx)) {
      await ctx.reply(NOT_ALLOWED);
      return;
    }
    if (!args) {
      await ctx.reply(BROADCAST_USAGE);
      return;
    }
    const result = await this.notifier.broadcast(args);
    await ctx.reply(`📣 Broadcast sent to ${result.sent} subscriber(s).`);
  }

  private isAdmin(ctx: BotContext): boolean {
    const adminId = this.config.get<number | null>('adminChatId');
    if (adminId === null || adminId === undefined) return false;
    return ctx.from?.id === adminId || ctx.chat?.id === adminId;
  }
}
