import { Repository } from 'typeorm';
import { LoggerService } from '../common/logger.service';
import { SubscriberEntity } from '../entities/subscriber.entity';
import {
  applyProfile,
  createRecord,
  NIP_MAX_LENGTH,
  SubscriberMap,
  SubscriberProfile,
  SubscriberRecord
} from '../subscribers/subscriber.model';
import { SubscriberStore, UpsertOptions, UpsertResult } from './subscriber-store';

export class DatabaseSubscriberStore extends SubscriberStore {
  readonly backend = 'database' as const;

  constructor(
    private readonly repo: Repository<SubscriberEntity>,
    private readonly logger: LoggerService,
    private readonly clock: () => Date = () => new Date()
  ) {
    super();
  }

  async loadAll(): Promise<SubscriberMap> {
    const rows = await this.repo.find();
    const map: SubscriberMap = new Map();
    for (const row of rows) {
      map.set(Number(row.chat_id), this.toRecord(row));
    }
    return map;
  }

  async get(chatId: number): Promise<SubscriberRecord | null> {
    const row = await this.repo.findOne({ where: { chat_id: chatId } });
    return row ? this.toRecord(row) : null;
  }

  async upsert(chatId: number, profile: SubscriberProfile, options: UpsertOptions = {}): Promise<UpsertResult> {
    return this.repo.manager.transaction(async (manager) => {
      const repo = manager.getRepository(SubscriberEntity);
      const now = this.clock().toISOString();
      const row = await repo.findOne({ where: { chat_id: chatId } });

      if (!row) {
        const record = createRecord(profile, now, options.subscribedAt);
        await repo.save(this.toEntity(chatId, record));
        return { record, created: true, changed: true };
      }

      const { record, changed } = applyProfile(this.toRecord(row), profile, now, options.touch);
      if (changed) {
        await repo.save(this.toEntity(chatId, record));
      }
      return { record, created: false, changed };
    });
  }

  /** Overwrites profile fields of every entry; rows absent from `map` are left alone. */
  async saveAll(map: SubscriberMap): Promise<void> {
    await this.repo.manager.transaction(async (manager) => {
      const repo = manager.getRepository(SubscriberEntity);
      const now = this.clock().toISOString();
      for (const [chatId, meta] of map) {
        const row = await repo.findOne({ where: { chat_id: chatId } });
        await repo.save(
          this.toEntity(chatId, {
            ...meta,
            subscribed_at: row?.subscribed_at?.toISOString() ?? meta.subscribed_at ?? now,
            updated_at: meta.updated_at ?? now
          })
        );
      }
    });
  }

  private toRecord(row: SubscriberEntity): SubscriberRecord {
    return {
      first_name: row.first_name ?? null,
      last_name: row.last_name ?? null,
      username: row.username ?? null,
      nip: row.nip ?? null,
      subscribed_at: row.subscribed_at ? row.subscribed_at.toISOString() : null,
      updated_at: row.updated_at ? row.updated_at.toISOString() : null
    };
  }

  private toEntity(chatId: number, record: SubscriberRecord): SubscriberEntity {
    const entity = new SubscriberEntity();
    entity.chat_id = chatId;
    entity.first_name = record.first_name;
    entity.last_name = record.last_name;
    entity.username = record.username;
    entity.nip = this.clampNip(chatId, record.nip);
    entity.subscribed_at = this.parseTimestamp(record.subscribed_at);
    entity.updated_at = this.parseTimestamp(record.updated_at);
    return entity;
  }

  private clampNip(chatId: number, nip: string | null): string | null {
    if (nip === null || nip.length <= NIP_MAX_LENGTH) return nip;
    this.logger.warn('NIP longer than column width; truncating', { chatId, length: nip.length });
    return nip.slice(0, NIP_MAX_LENGTH);
  }

  private parseTimestamp(value: string | null): Date | null {
    if (value === null) return null;
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      this.logger.warn('Unparseable timestamp dropped', { value });
      return null;
    }
    return parsed;
  }
}
