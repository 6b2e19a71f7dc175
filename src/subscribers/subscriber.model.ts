import { SubscriberDataFormatError } from '../common/errors';

export const NIP_MAX_LENGTH = 18;

export const PROFILE_FIELDS = ['first_name', 'last_name', 'username', 'nip'] as const;

export type ProfileField = (typeof PROFILE_FIELDS)[number];

export interface SubscriberRecord {
  first_name: string | null;
  last_name: string | null;
  username: string | null;
  nip: string | null;
  subscribed_at: string | null;
  updated_at: string | null;
}

/** Partial profile: `undefined` leaves a field untouched, `null` clears it. */
export type SubscriberProfile = Partial<Record<ProfileField, string | null>>;

export type SubscriberMap = Map<number, SubscriberRecord>;

export type SerializedSubscriberMap = Record<string, SubscriberRecord>;

export interface NormalizedSubscriberData {
  map: SubscriberMap;
  migrated: boolean;
}

const RECORD_FIELDS: ReadonlyArray<keyof SubscriberRecord> = [
  'first_name',
  'last_name',
  'username',
  'nip',
  'subscribed_at',
  'updated_at'
];

export function normalizeNip(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  const compact = raw.replace(/\s+/g, '');
  if (!compact) return null;
  return compact.slice(0, NIP_MAX_LENGTH);
}

export function parseChatId(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isSafeInteger(raw) ? raw : null;
  if (typeof raw === 'string' && /^-?\d+$/.test(raw.trim())) {
    const parsed = Number(raw.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

export function emptyRecord(subscribedAt: string): SubscriberRecord {
  return {
    first_name: null,
    last_name: null,
    username: null,
    nip: null,
    subscribed_at: subscribedAt,
    updated_at: null
  };
}

export function applyProfile(
  record: SubscriberRecord,
  profile: SubscriberProfile,
  now: string,
  touch = false
): { record: SubscriberRecord; changed: boolean } {
  const next: SubscriberRecord = { ...record };
  let changed = false;

  for (const field of PROFILE_FIELDS) {
    const value = profile[field];
    if (value === undefined) continue;
    const normalized = field === 'nip' ? normalizeNip(value) : value;
    if (next[field] !== normalized) {
      next[field] = normalized;
      changed = true;
    }
  }

  if (changed || touch) next.updated_at = now;
  return { record: next, changed: changed || touch };
}

export function createRecord(profile: SubscriberProfile, now: string, subscribedAt?: string | null): SubscriberRecord {
  const { record } = applyProfile(emptyRecord(subscribedAt ?? now), profile, now);
  return { ...record, updated_at: now };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function completeRecord(raw: unknown, now: string): { record: SubscriberRecord; completed: boolean } {
  const source = isPlainObject(raw) ? raw : {};
  let completed = !isPlainObject(raw);
  const record = emptyRecord(now);

  for (const field of RECORD_FIELDS) {
    if (!(field in source)) {
      completed = true;
      continue;
    }
    const value = source[field];
    if (typeof value === 'string') {
      record[field] = field === 'nip' ? normalizeNip(value) : value;
      if (record[field] !== value) completed = true;
    } else {
      record[field] = null;
      if (value !== null) completed = true;
    }
  }

  return { record, completed };
}

/**
 * Turns whatever was read from a subscribers file into a map.
 *
 * Accepts the legacy list of chat ids as well as the keyed mapping; `migrated`
 * tells the caller the stored shape differs from the normalized one and should
 * be written back.
 */
export function normalizeSubscriberData(raw: unknown, now: string): NormalizedSubscriberData {
  const map: SubscriberMap = new Map();

  if (raw === null || raw === undefined) {
    return { map, migrated: false };
  }

  if (Array.isArray(raw)) {
    for (const entry of raw) {
      const chatId = parseChatId(entry);
      if (chatId === null) continue;
      map.set(chatId, emptyRecord(now));
    }
    return { map, migrated: true };
  }

  if (isPlainObject(raw)) {
    let migrated = false;
    for (const [key, meta] of Object.entries(raw)) {
      const chatId = parseChatId(key);
      if (chatId === null) {
        migrated = true;
        continue;
      }
      const { record, completed } = completeRecord(meta, now);
      map.set(chatId, record);
      if (completed) migrated = true;
    }
    return { map, migrated };
  }

  throw new SubscriberDataFormatError(`expected a list or a mapping, got ${typeof raw}`);
}

export function serializeSubscriberMap(map: SubscriberMap): SerializedSubscriberMap {
  const out: SerializedSubscriberMap = {};
  for (const [chatId, record] of map) {
    out[String(chatId)] = record;
  }
  return out;
}
