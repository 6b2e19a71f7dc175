export class TelegramNotConfiguredError extends Error {
  constructor() {
    super('Server not configured with TELEGRAM_TOKEN');
    this.name = 'TelegramNotConfiguredError';
  }
}

export class ChatNotAccessibleError extends Error {
  constructor(readonly chatId: number, cause?: unknown) {
    super(`Chat ${chatId} not found or not accessible`);
    this.name = 'ChatNotAccessibleError';
    if (cause !== undefined) this.cause = cause;
  }
}

export class SubscriberNotFoundError extends Error {
  constructor(readonly chatId: number) {
    super(`Subscriber ${chatId} not found`);
    this.name = 'SubscriberNotFoundError';
  }
}

export class SubscriberDataFormatError extends Error {
  constructor(detail: string) {
    super(`Unsupported subscribers data: ${detail}`);
    this.name = 'SubscriberDataFormatError';
  }
}

export class OutboundUrlRejectedError extends Error {
  constructor(readonly url: string, readonly reason: string) {
    super(`URL rejected: ${reason}`);
    this.name = 'OutboundUrlRejectedError';
  }
}
