import { HISTORY_LIMIT, MemorySessionStore, appendTurn, createSession } from '../../src/services/session.service';
import { RedisLike, RedisSessionStore } from '../../src/services/cache.service';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('appendTurn', () => {
  it('keeps only the most recent turns', () => {
    let history = createSession('chat-1', 'telegram').history;
    for (let i = 1; i <= 8; i++) {
      history = appendTurn(history, 'user', `message ${i}`);
    }

    expect(history).toHaveLength(HISTORY_LIMIT);
    expect(history[0].text).toBe('message 3');
    expect(history[5].text).toBe('message 8');
  });
});

describe('MemorySessionStore', () => {
  it('returns what was stored', async () => {
    const store = new MemorySessionStore();
    const session = createSession('chat-1', 'telegram');

    await store.put('chat-1', session);

    await expect(store.get('chat-1')).resolves.toBe(session);
    await expect(store.get('chat-2')).resolves.toBeNull();
  });

  it('never evicts without a ttl', async () => {
    let now = 0;
    const store = new MemorySessionStore(undefined, () => now);
    await store.put('chat-1', createSession('chat-1', 'telegram'));

    now = 365 * 24 * 3600 * 1000;

    await expect(store.get('chat-1')).resolves.not.toBeNull();
  });

  it('drops idle sessions after the ttl', async () => {
    let now = 0;
    const store = new MemorySessionStore(1000, () => now);
    await store.put('chat-1', createSession('chat-1', 'telegram'));
    await store.put('chat-2', createSession('chat-2', 'telegram'));

    now = 500;
    await store.put('chat-2', createSession('chat-2', 'telegram'));
    now = 1200;

    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
    await expect(store.get('chat-1')).resolves.toBeNull();
    await expect(store.get('chat-2')).resolves.not.toBeNull();
  });
});

describe('RedisSessionStore', () => {
  function fakeRedis() {
    const data = new Map<string, string>();
    const redis: RedisLike = {
      get: jest.fn(async (key: string) => data.get(key) ?? null),
      set: jest.fn(async (key: string, value: string) => {
        data.set(key, value);
        return 'OK';
      }),
    };
    return { redis, data };
  }

  it('stores sessions as JSON under a prefixed key', async () => {
    const { redis, data } = fakeRedis();
    const store = new RedisSessionStore(redis);
    const session = createSession('chat-1', 'whatsapp');

    await store.put('chat-1', session);

    expect(data.get('session:chat-1')).toBe(JSON.stringify(session));
    expect(redis.set).toHaveBeenCalledWith('session:chat-1', JSON.stringify(session));
    await expect(store.get('chat-1')).resolves.toEqual(session);
  });

  it('sets an expiry when a ttl is configured', async () => {
    const { redis } = fakeRedis();
    const store = new RedisSessionStore(redis, 3600);

    await store.put('chat-1', createSession('chat-1', 'telegram'));

    expect(redis.set).toHaveBeenCalledWith('session:chat-1', expect.any(String), { EX: 3600 });
  });

  it('treats a read failure as a missing session', async () => {
    const redis: RedisLike = {
      get: jest.fn().mockRejectedValue(new Error('connection lost')),
      set: jest.fn(),
    };

    await expect(new RedisSessionStore(redis).get('chat-1')).resolves.toBeNull();
  });

  it('ignores a stored value that is not a session', async () => {
    const { redis, data } = fakeRedis();
    data.set('session:chat-1', JSON.stringify({ conversationId: 'chat-1', formState: 'SOMEWHERE' }));

    await expect(new RedisSessionStore(redis).get('chat-1')).resolves.toBeNull();
  });
});
