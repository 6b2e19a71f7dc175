import { SubscriberMap, SubscriberProfile, SubscriberRecord } from '../subscribers/subscriber.model';

export type StorageBackend = 'file' | 'database';

export interface UpsertOptions {
  /** ISO timestamp to use as `subscribed_at` when the record is created. */
  subscribedAt?: string | null;
  /** Stamp `updated_at` on an existing record even when no field changed. */
  touch?: boolean;
}

export interface UpsertResult {
  record: SubscriberRecord;
  created: boolean;
  changed: boolean;
}

/**
 * Persistence for subscriber records. Used as the injection token; the storage
 * module binds it to the file or the database implementation.
 */
export abstract class SubscriberStore {
  abstract readonly backend: StorageBackend;

  abstract loadAll(): Promise<SubscriberMap>;

  abstract saveAll(map: SubscriberMap): Promise<void>;

  abstract get(chatId: number): Promise<SubscriberRecord | null>;

  abstract upsert(chatId: number, profile: SubscriberProfile, options?: UpsertOptions): Promise<UpsertResult>;
}
