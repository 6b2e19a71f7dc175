import { promises as fs } from 'fs';
import * as path from 'path';
import { SubscriberDataFormatError } from '../common/errors';
import { errorMessage, LoggerService } from '../common/logger.service';
import {
  applyProfile,
  createRecord,
  normalizeSubscriberData,
  serializeSubscriberMap,
  SubscriberMap,
  SubscriberProfile,
  SubscriberRecord
} from '../subscribers/subscriber.model';
import { SubscriberStore, UpsertOptions, UpsertResult } from './subscriber-store';

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Subscribers kept in a single JSON document keyed by chat id.
 *
 * Operations run one at a time within the process. There is no locking
 * across processes: separate writers can overwrite each other.
 */
export class FileSubscriberStore extends SubscriberStore {
  readonly backend = 'file' as const;
  private queue: Promise<unknown> = Promise.resolve();
  private writes = 0;

  constructor(
    readonly filePath: string,
    private readonly logger: LoggerService,
    private readonly clock: () => Date = () => new Date()
  ) {
    super();
  }

  loadAll(): Promise<SubscriberMap> {
    return this.exclusive(() => this.readMap());
  }

  saveAll(map: SubscriberMap): Promise<void> {
    return this.exclusive(() => this.write(map));
  }

  get(chatId: number): Promise<SubscriberRecord | null> {
    return this.exclusive(async () => (await this.readMap()).get(chatId) ?? null);
  }

  upsert(chatId: number, profile: SubscriberProfile, options: UpsertOptions = {}): Promise<UpsertResult> {
    return this.exclusive(async () => {
      const map = await this.readMap();
      const now = this.now();
      const existing = map.get(chatId);

      if (!existing) {
        const record = createRecord(profile, now, options.subscribedAt);
        map.set(chatId, record);
        await this.write(map);
        return { record, created: true, changed: true };
      }

      const { record, changed } = applyProfile(existing, profile, now, options.touch);
      if (changed) {
        map.set(chatId, record);
        await this.write(map);
      }
      return { record, created: false, changed };
    });
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async readMap(): Promise<SubscriberMap> {
    const content = await this.readContent();
    if (content === null) return new Map();

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      await this.quarantine(errorMessage(err));
      return new Map();
    }

    try {
      const { map, migrated } = normalizeSubscriberData(parsed, this.now());
      if (migrated) {
        await this.write(map);
        this.logger.log('Subscribers file upgraded to current format', {
          file: this.filePath,
          subscribers: map.size
        });
      }
      return map;
    } catch (err) {
      if (!(err instanceof SubscriberDataFormatError)) throw err;
      await this.quarantine(err.message);
      return new Map();
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private async readContent(): Promise<string | null> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      return content.trim() ? content : null;
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  private async quarantine(reason: string) {
    const stamp = this.now().replace(/[:.]/g, '-');
    const backup = `${this.filePath}.corrupt-${stamp}`;
    await fs.rename(this.filePath, backup);
    await this.write(new Map());
    this.logger.warn('Subscribers file unreadable; moved aside and reset', {
      file: this.filePath,
      backup,
      reason
    });
  }

  private async write(map: SubscriberMap) {
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    this.writes += 1;
    const tmp = `${this.filePath}.${process.pid}.${this.writes}.tmp`;
    await fs.writeFile(tmp, `${JSON.stringify(serializeSubscriberMap(map), null, 2)}\n`, 'utf-8');
    await fs.rename(tmp, this.filePath);
  }
}
