import * as path from 'path';

export const DEFAULT_FOLLOWUP_MESSAGE =
  'Still here? Send /help to see what I can do, or /nip <number> to link your NIP.';

export interface AppConfig {
  port: number;
  logLevel: string;
  logDir: string;
  logToFile: boolean;
  logSilent: boolean;
  botToken: string;
  botPolling: boolean;
  adminChatId: number | null;
  subscribersFile: string;
  notifyApiKey: string | null;
  notifyConcurrency: number;
  forwardAllowedHosts: string[];
  forwardTimeoutMs: number;
  followupDelaySeconds: number;
  followupMessage: string;
  oracleUser?: string;
  oraclePassword?: string;
  oracleConnectString?: string;
  oracleSynchronize: boolean;
  socksProxy: string | null;
}

type Env = Record<string, string | undefined>;

function intOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return !/^(false|0|no|off)$/i.test(raw.trim());
}

function optional(raw: string | undefined): string | null {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : null;
}

export function isDatabaseConfigured(env: Env): boolean {
  return Boolean(optional(env.ORACLE_CONNECT_STRING));
}

export function buildConfig(env: Env): AppConfig {
  const adminRaw = optional(env.ADMIN_CHAT_ID);
  const adminChatId = adminRaw !== null && /^-?\d+$/.test(adminRaw) ? Number(adminRaw) : null;

  return {
    port: intOr(env.PORT, 8000),
    logLevel: optional(env.LOG_LEVEL) ?? 'info',
    logDir: optional(env.LOG_DIR) ?? path.join(process.cwd(), 'logs'),
    logToFile: flag(env.LOG_TO_FILE, true),
    logSilent: flag(env.LOG_SILENT, false),
    botToken: optional(env.TELEGRAM_TOKEN) ?? '',
    botPolling: flag(env.BOT_POLLING, true),
    adminChatId,
    subscribersFile: optional(env.SUBSCRIBERS_FILE) ?? 'subscribers.json',
    notifyApiKey: optional(env.NOTIFY_API_KEY),
    notifyConcurrency: Math.max(1, intOr(env.NOTIFY_CONCURRENCY, 10)),
    forwardAllowedHosts: (env.FORWARD_ALLOWED_HOSTS ?? '')
      .split(',')
      .map((host) => host.trim().toLowerCase())
      .filter(Boolean),
    forwardTimeoutMs: Math.max(1, intOr(env.FORWARD_TIMEOUT_MS, 10_000)),
    followupDelaySeconds: Math.max(0, intOr(env.FOLLOWUP_DELAY_SECONDS, 0)),
    followupMessage: optional(env.FOLLOWUP_MESSAGE) ?? DEFAULT_FOLLOWUP_MESSAGE,
    oracleUser: env.ORACLE_USER,
    oraclePassword: env.ORACLE_PASSWORD,
    oracleConnectString: optional(env.ORACLE_CONNECT_STRING) ?? undefined,
    oracleSynchronize: flag(env.ORACLE_SYNCHRONIZE, true),
    socksProxy: optional(env.SOCKS_PROXY)
  };
}

export default (): AppConfig => buildConfig(process.env);
