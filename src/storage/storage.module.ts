import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { LoggerService } from '../common/logger.service';
import { SubscriberEntity } from '../entities/subscriber.entity';
import { DatabaseSubscriberStore } from './database-subscriber.store';
import { FileSubscriberStore } from './file-subscriber.store';
import { SubscriberStore } from './subscriber-store';

export function createSubscriberStore(
  config: ConfigService,
  logger: LoggerService,
  dataSource?: DataSource
): SubscriberStore {
  if (dataSource) {
    logger.log('Subscriber storage: database', { table: 'subscribers' });
    return new DatabaseSubscriberStore(dataSource.getRepository(SubscriberEntity), logger);
  }
  const file = config.get<string>('subscribersFile') || 'subscribers.json';
  logger.log('Subscriber storage: file', { file });
  return new FileSubscriberStore(file, logger);
}

@Global()
@Module({
  providers: [
    LoggerService,
    {
      provide: SubscriberStore,
      inject: [ConfigService, LoggerService, { token: DataSource, optional: true }],
      useFactory: createSubscriberStore
    }
  ],
  exports: [SubscriberStore]
})
export class StorageModule {}
