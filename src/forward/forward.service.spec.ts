import { AxiosHeaders } from 'axios';
import { OutboundUrlRejectedError, SubscriberNotFoundError } from '../common/errors';
import { SubscribersService } from '../subscribers/subscribers.service';
import { TelegramService } from '../telegram/telegram.service';
import { InMemorySubscriberStore } from '../testing/in-memory-subscriber.store';
import { silentLogger, testConfig } from '../testing/test-config';
import { ForwardService } from './forward.service';

describe('ForwardService', () => {
  const logger = silentLogger();
  const record = {
    first_name: 'Ann',
    last_name: null,
    username: 'ann',
    nip: '12345',
    subscribed_at: '2025-01-01T00:00:00.000Z',
    updated_at: '2025-01-02T00:00:00.000Z'
  };

  function setup(forwardAllowedHosts = ['hooks.example.com']) {
    const config = testConfig({ forwardAllowedHosts });
    const subscribers = new SubscribersService(
      config,
      logger,
      new InMemorySubscriberStore({ 42: record }),
      new TelegramService(config)
    );
    const service = new ForwardService(config, logger, subscribers);
    const post = jest.spyOn(service.client, 'post').mockResolvedValue({
      status: 202,
      statusText: 'Accepted',
      data: {},
      headers: {},
      config: { headers: new AxiosHeaders() }
    });
    return { service, post };
  }

  it('posts the caller record to an accepted URL', async () => {
    const { service, post } = setup();

    const result = await service.forwardSubscriber(42, 'https://hooks.example.com/inbox');

    expect(result).toEqual({ url: 'https://hooks.example.com/inbox', status: 202 });
    expect(post).toHaveBeenCalledWith('https://hooks.example.com/inbox', { chat_id: 42, ...record }, {});
  });

  it('does not call out when the URL is refused', async () => {
    const { service, post } = setup();

    await expect(service.forwardSubscriber(42, 'http://hooks.example.com/inbox')).rejects.toBeInstanceOf(
      OutboundUrlRejectedError
    );
    await expect(service.forwardSubscriber(42, 'https://127.0.0.1/inbox')).rejects.toBeInstanceOf(
      OutboundUrlRejectedError
    );
    expect(post).not.toHaveBeenCalled();
  });

  it('needs an existing subscriber record', async () => {
    const { service, post } = setup();

    await expect(service.forwardSubscriber(7, 'https://hooks.example.com/inbox')).rejects.toBeInstanceOf(
      SubscriberNotFoundError
    );
    expect(post).not.toHaveBeenCalled();
  });

  it('connects to the address checked during validation', async () => {
    const { service, post } = setup([]);
    const resolve = jest.fn(async () => ['93.184.216.34']);
    service.resolve = resolve;

    await service.forwardSubscriber(42, 'https://api.example.org/hook');

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledWith(
      'https://api.example.org/hook',
      { chat_id: 42, ...record },
      { lookup: expect.any(Function) }
    );
  });

  it('refuses hosts that resolve to internal addresses', async () => {
    const { service, post } = setup([]);
    service.resolve = async () => ['10.0.0.7'];

    await expect(service.forwardSubscriber(42, 'https://api.example.org/hook')).rejects.toMatchObject({
      reason: 'host api.example.org resolves to a private address'
    });
    expect(post).not.toHaveBeenCalled();
  });
});
