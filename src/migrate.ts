import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { AppDataSource, appConfig } from './database/data-source';
import { LoggerService } from './common/logger.service';
import { SubscriberEntity } from './entities/subscriber.entity';
import { isDatabaseConfigured } from './config/configuration';
import { DatabaseSubscriberStore } from './storage/database-subscriber.store';
import { FileSubscriberStore } from './storage/file-subscriber.store';

/** Copies the subscribers file into the database. Re-running upserts the same rows. */
async function migrate() {
  if (!isDatabaseConfigured(process.env)) {
    throw new Error('ORACLE_CONNECT_STRING is required for migration.');
  }

  const logger = new LoggerService(new ConfigService({ ...appConfig }));
  await AppDataSource.initialize();

  try {
    const source = new FileSubscriberStore(appConfig.subscribersFile, logger);
    const subscribers = await source.loadAll();
    if (!subscribers.size) {
      // eslint-disable-next-line no-console
      console.log(`No subscribers found in ${appConfig.subscribersFile}. Nothing to migrate.`);
      return;
    }

    const target = new DatabaseSubscriberStore(AppDataSource.getRepository(SubscriberEntity), logger);
    await target.saveAll(subscribers);
    // eslint-disable-next-line no-console
    console.log(`Migrated ${subscribers.size} subscriber(s) to the database.`);
  } finally {
    await AppDataSource.destroy();
  }
}

migrate().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Migration failed', err);
  process.exit(1);
});
