import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { silentLogger } from '../testing/test-config';
import { emptyRecord } from '../subscribers/subscriber.model';
import { FileSubscriberStore } from './file-subscriber.store';

const NOW = new Date('2025-11-18T04:00:00.000Z');

describe('FileSubscriberStore', () => {
  let dir: string;
  let file: string;
  let store: FileSubscriberStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'subscribers-'));
    file = path.join(dir, 'subs.json');
    store = new FileSubscriberStore(file, silentLogger(), () => NOW);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const readJson = async (): Promise<unknown> => JSON.parse(await fs.readFile(file, 'utf-8'));

  it('upgrades a legacy list file in place', async () => {
    await fs.writeFile(file, '[1, 1000042]', 'utf-8');

    const map = await store.loadAll();

    expect([...map.keys()]).toEqual([1, 1000042]);
    const defaults = {
      first_name: null,
      last_name: null,
      username: null,
      nip: null,
      subscribed_at: '2025-11-18T04:00:00.000Z',
      updated_at: null
    };
    expect(await readJson()).toEqual({ '1': defaults, '1000042': defaults });
  });

  it('writes back mapping entries that lack keys', async () => {
    await fs.writeFile(
      file,
      '{"1000042": {"first_name": "Dana", "username": "dana_test", "subscribed_at": "2025-11-18T03:46:45.489811+00:00"}}',
      'utf-8'
    );

    const record = await store.get(1000042);

    expect(record?.last_name).toBeNull();
    expect(await readJson()).toEqual({
      '1000042': {
        first_name: 'Dana',
        last_name: null,
        username: 'dana_test',
        nip: null,
        subscribed_at: '2025-11-18T03:46:45.489811+00:00',
        updated_at: null
      }
    });
  });

  it('returns an empty map for an empty file without rewriting it', async () => {
    await fs.writeFile(file, '', 'utf-8');

    const map = await store.loadAll();

    expect(map.size).toBe(0);
    expect(await fs.readFile(file, 'utf-8')).toBe('');
  });

  it('returns an empty map when the file does not exist yet', async () => {
    const map = await store.loadAll();

    expect(map.size).toBe(0);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('moves an unreadable file aside and resets it', async () => {
    await fs.writeFile(file, 'not-a-json', 'utf-8');

    const map = await store.loadAll();

    expect(map.size).toBe(0);
    expect(await fs.readFile(file, 'utf-8')).toBe('{}\n');
    const backup = path.join(dir, 'subs.json.corrupt-2025-11-18T04-00-00-000Z');
    expect(await fs.readFile(backup, 'utf-8')).toBe('not-a-json');
  });

  it('moves aside a file holding neither a list nor a mapping', async () => {
    await fs.writeFile(file, '"just text"', 'utf-8');

    expect((await store.loadAll()).size).toBe(0);
    expect(await readJson()).toEqual({});
  });

  it('refreshes an existing record instead of adding a duplicate', async () => {
    const first = await store.upsert(77, { first_name: 'Ann', username: 'ann' });
    const second = await store.upsert(77, { first_name: 'Anne', username: 'ann' });
    const third = await store.upsert(77, { first_name: 'Anne' });

    expect(first.created).toBe(true);
    expect(second).toMatchObject({ created: false, changed: true });
    expect(third).toMatchObject({ created: false, changed: false });

    const map = await store.loadAll();
    expect(map.size).toBe(1);
    expect(map.get(77)).toMatchObject({ first_name: 'Anne', username: 'ann', last_name: null });
  });

  it('keeps a supplied subscription time for new records', async () => {
    const { record } = await store.upsert(5, {}, { subscribedAt: '2024-05-01T10:00:00.000Z' });

    expect(record.subscribed_at).toBe('2024-05-01T10:00:00.000Z');
    expect(record.updated_at).toBe('2025-11-18T04:00:00.000Z');
  });

  it('keeps every record when upserts overlap', async () => {
    await store.saveAll(new Map([[1, emptyRecord('2025-01-01T00:00:00.000Z')]]));

    const results = await Promise.all(
      Array.from({ length: 20 }, (_, i) => store.upsert(1000 + i, { username: `user${i}` }))
    );

    expect(results.every((result) => result.created)).toBe(true);
    const map = await store.loadAll();
    expect(map.size).toBe(21);
    expect(map.get(1019)?.username).toBe('user19');
    expect((await fs.readdir(dir)).sort()).toEqual(['subs.json']);
  });

  it('stamps updated_at on an unchanged record when asked to', async () => {
    await store.upsert(5, { first_name: 'A' });
    const later = new FileSubscriberStore(file, silentLogger(), () => new Date('2025-12-01T00:00:00.000Z'));

    const plain = await later.upsert(5, { first_name: 'A' });
    const touched = await later.upsert(5, { first_name: 'A' }, { touch: true });

    expect(plain).toMatchObject({ changed: false, record: { updated_at: '2025-11-18T04:00:00.000Z' } });
    expect(touched).toMatchObject({ changed: true, record: { updated_at: '2025-12-01T00:00:00.000Z' } });
    expect((await later.get(5))?.updated_at).toBe('2025-12-01T00:00:00.000Z');
  });
});
