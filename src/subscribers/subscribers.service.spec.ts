import { ChatNotAccessibleError, TelegramNotConfiguredError } from '../common/errors';
import { InMemorySubscriberStore } from '../testing/in-memory-subscriber.store';
import { silentLogger, testConfig } from '../testing/test-config';
import { TelegramService } from '../telegram/telegram.service';
import { SubscribersService } from './subscribers.service';

describe('SubscribersService', () => {
  const logger = silentLogger();

  function setup(seed: ConstructorParameters<typeof InMemorySubscriberStore>[0] = {}, botToken = 'test-token') {
    const config = testConfig({ botToken });
    const store = new InMemorySubscriberStore(seed);
    const telegram = new TelegramService(config);
    const service = new SubscribersService(config, logger, store, telegram);
    return { store, telegram, service };
  }

  describe('recordInteraction', () => {
    it('updates names on repeated private messages without duplicating the record', async () => {
      const { store, service } = setup();
      const chat = { id: 42, type: 'private' };

      const first = await service.recordInteraction(chat, { first_name: 'Ann', username: 'ann' });
      const second = await service.recordInteraction(chat, { first_name: 'Ann', last_name: 'Lee', username: 'ann_lee' });

      expect(first?.created).toBe(true);
      expect(second?.created).toBe(false);
      expect(store.records.size).toBe(1);
      expect(store.records.get(42)).toMatchObject({ first_name: 'Ann', last_name: 'Lee', username: 'ann_lee' });
    });

    it('keeps stored fields Telegram did not send', async () => {
      const { store, service } = setup({ 42: { first_name: 'Ann', last_name: 'Lee' } });

      await service.recordInteraction({ id: 42, type: 'private' }, { first_name: 'Ann' });

      expect(store.records.get(42)?.last_name).toBe('Lee');
    });

    it('ignores group chats', async () => {
      const { store, service } = setup();

      expect(await service.recordInteraction({ id: -100, type: 'group' }, { first_name: 'G' })).toBeNull();
      expect(store.records.size).toBe(0);
    });
  });

  it('normalizes the NIP on update and creates missing records', async () => {
    const { service } = setup();

    const record = await service.update(3333, { nip: 'X'.repeat(25), first_name: 'Zoe' });

    expect(record.nip).toBe('X'.repeat(18));
    expect(record.first_name).toBe('Zoe');
    expect(record.last_name).toBeNull();
  });

  it('stamps updated_at on an update even when nothing changed', async () => {
    const { service } = setup({ 8: { username: 'ann', updated_at: '2024-03-01T00:00:00.000Z' } });

    const record = await service.update(8, { username: 'ann' });

    expect(record.updated_at).toBe('2025-01-01T00:00:00.000Z');
  });

  describe('syncFromTelegram', () => {
    it('overwrites names with the chat info from Telegram', async () => {
      const { service, telegram } = setup({ 1000042: {} });
      jest
        .spyOn(telegram, 'getChatProfile')
        .mockResolvedValue({ first_name: 'Updated', last_name: 'UpdatedLast', username: 'updated_user' });

      const record = await service.syncFromTelegram(1000042);

      expect(record).toMatchObject({ first_name: 'Updated', last_name: 'UpdatedLast', username: 'updated_user' });
    });

    it('reports chats Telegram cannot reach', async () => {
      const { service, telegram } = setup();
      jest.spyOn(telegram, 'getChatProfile').mockRejectedValue(new Error('400: Bad Request: chat not found'));

      await expect(service.syncFromTelegram(7)).rejects.toBeInstanceOf(ChatNotAccessibleError);
    });

    it('refuses to run without a bot token', async () => {
      const { service } = setup({}, '');

      await expect(service.syncFromTelegram(7)).rejects.toBeInstanceOf(TelegramNotConfiguredError);
    });
  });

  it('syncs every subscriber, skipping failures, and saves once', async () => {
    const { service, telegram, store } = setup({ 1001: {}, 1002: {} });
    jest.spyOn(telegram, 'getChatProfile').mockImplementation(async (chatId) => {
      if (chatId === 1002) throw new Error('blocked');
      return { first_name: `user${chatId}`, last_name: `user${chatId}Last`, username: `user${chatId}` };
    });

    const updated = await service.syncAll();

    expect(updated).toBe(1);
    expect(store.saves).toBe(1);
    expect(store.records.get(1001)).toMatchObject({ first_name: 'user1001', username: 'user1001' });
    expect(store.records.get(1002)?.first_name).toBeNull();
  });

  it('returns zero from syncAll when there is nobody to sync', async () => {
    const { service, store } = setup();

    expect(await service.syncAll()).toBe(0);
    expect(store.saves).toBe(0);
  });
});
