import { SubscriberMap, SubscriberRecord } from '../subscribers/subscriber.model';

export const WELCOME = '👋 Welcome! You are now subscribed to updates from this bot. Send /help to see what I can do.';

export const HELP = [
  'Available commands:',
  '/start - subscribe to updates',
  '/help - show this message',
  '/me - show what I know about you',
  '/nip <number> - link your NIP to this chat',
  '/forward <https-url> - send your subscriber record to a URL'
].join('\n');

export const ADMIN_HELP = ['Admin commands:', '/subscribers - list subscribers', '/broadcast <text> - message everyone'].join(
  '\n'
);

export const NIP_USAGE = '❗ Usage: /nip <number>\nExample: /nip 198012312005011002';
export const FORWARD_USAGE = '❗ Usage: /forward <https-url>\nExample: /forward https://hooks.example.com/inbox';
export const BROADCAST_USAGE = '❗ Usage: /broadcast <text>';
export const NOT_ALLOWED = '⛔ This command is for the bot administrator only.';
export const NOT_SUBSCRIBED = '❗ Please /start first.';

const LIST_LIMIT = 20;

function displayName(record: SubscriberRecord): string {
  const name = [record.first_name, record.last_name].filter(Boolean).join(' ');
  const handle = record.username ? `@${record.username}` : '';
  return [handle, name ? `(${name})` : ''].filter(Boolean).join(' ') || '(no name)';
}

export function describeSubscriber(chatId: number, record: SubscriberRecord): string {
  return [
    `Chat id: ${chatId}`,
    `First name: ${record.first_name ?? '-'}`,
    `Last name: ${record.last_name ?? '-'}`,
    `Username: ${record.username ? `@${record.username}` : '-'}`,
    `NIP: ${record.nip ?? '-'}`,
    `Subscribed at: ${record.subscribed_at ?? '-'}`,
    `Updated at: ${record.updated_at ?? '-'}`
  ].join('\n');
}

export function describeSubscribers(map: SubscriberMap): string {
  if (!map.size) return 'No subscribers yet.';
  const lines = [`Subscribers: ${map.size}`];
  let shown = 0;
  for (const [chatId, record] of map) {
    if (shown === LIST_LIMIT) {
      lines.push(`… and ${map.size - LIST_LIMIT} more`);
      break;
    }
    lines.push(`• ${chatId} ${displayName(record)}`);
    shown += 1;
  }
  return lines.join('\n');
}

/** Text after the command name, e.g. `/nip@my_bot 123` → `123`. */
export function commandArgs(text: string): string {
  return text.replace(/^\/[a-z0-9_]+(?:@[a-z0-9_]+)?\s*/i, '').trim();
}
