import { DataSource } from 'typeorm';
import { silentLogger, testConfig } from '../testing/test-config';
import { DatabaseSubscriberStore } from './database-subscriber.store';
import { FileSubscriberStore } from './file-subscriber.store';
import { createSubscriberStore } from './storage.module';

describe('createSubscriberStore', () => {
  const logger = silentLogger();

  it('uses the configured file without a database', () => {
    const store = createSubscriberStore(testConfig({ subscribersFile: '/tmp/subs.json' }), logger);

    expect(store).toBeInstanceOf(FileSubscriberStore);
    expect(store.backend).toBe('file');
  });

  it('uses the database when a connection is available', () => {
    const getRepository = jest.fn(() => ({}));
    const dataSource = { getRepository } as unknown as DataSource;

    const store = createSubscriberStore(testConfig(), logger, dataSource);

    expect(store).toBeInstanceOf(DatabaseSubscriberStore);
    expect(getRepository).toHaveBeenCalledTimes(1);
  });
});
