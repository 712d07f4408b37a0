import * as fs from 'fs';
import * as path from 'path';
import Redis from 'ioredis';
import { RedisAtomicStore, loadScripts } from '../../src/cache/atomic-store';
import { getOperation, invalidateOperation, setOperation } from '../../src/cache/operations';
import { StoreCorruptionError, TransientStoreError } from '../../src/cache/errors';
import { timestamp } from '../../src/cache/timestamp';

const SCRIPTS = {
  coherentSet: '-- set',
  coherentInvalidate: '-- invalidate',
  coherentGet: '-- get',
};

function createFakeRedis() {
  return {
    defineCommand: jest.fn(),
    coherentSet: jest.fn(),
    coherentInvalidate: jest.fn(),
    coherentGetBuffer: jest.fn(),
    hgetallBuffer: jest.fn(),
    ping: jest.fn(),
  };
}

function replyError(message: string): Error {
  const err = new Error(message);
  err.name = 'ReplyError';
  return err;
}

describe('RedisAtomicStore', () => {
  let redis: ReturnType<typeof createFakeRedis>;
  let store: RedisAtomicStore;

  beforeEach(() => {
    redis = createFakeRedis();
    store = new RedisAtomicStore(redis as unknown as Redis, SCRIPTS);
  });

  it('should define one single-key command per script', () => {
    expect(redis.defineCommand).toHaveBeenCalledTimes(3);
    expect(redis.defineCommand).toHaveBeenCalledWith('coherentSet', { numberOfKeys: 1, lua: '-- set' });
    expect(redis.defineCommand).toHaveBeenCalledWith('coherentInvalidate', { numberOfKeys: 1, lua: '-- invalidate' });
    expect(redis.defineCommand).toHaveBeenCalledWith('coherentGet', { numberOfKeys: 1, lua: '-- get' });
  });

  it('should pass value and timestamp halves to the set script', async () => {
    redis.coherentSet.mockResolvedValue(1);
    const value = Buffer.from('payload');

    await expect(store.executeAtomic('user:1', setOperation(value, timestamp(1700000000, 5)))).resolves.toBe('accepted');
    expect(redis.coherentSet).toHaveBeenCalledWith('user:1', value, '1700000000', '5');
  });

  it('should map a zero reply to rejected', async () => {
    redis.coherentSet.mockResolvedValue(0);
    await expect(store.executeAtomic('k', setOperation(Buffer.from('x'), timestamp(1)))).resolves.toBe('rejected');
  });

  it('should pass the tombstone window to the invalidate script', async () => {
    redis.coherentInvalidate.mockResolvedValue(1);

    await expect(store.executeAtomic('k', invalidateOperation(timestamp(9, 1), 120))).resolves.toBe('accepted');
    expect(redis.coherentInvalidate).toHaveBeenCalledWith('k', '9', '1', '120');
  });

  it('should read buffers from the get script', async () => {
    redis.coherentGetBuffer.mockResolvedValueOnce(Buffer.from('v1')).mockResolvedValueOnce(null);

    await expect(store.executeAtomic('k', getOperation())).resolves.toEqual({ kind: 'value', value: Buffer.from('v1') });
    await expect(store.executeAtomic('k', getOperation())).resolves.toEqual({ kind: 'miss' });
    expect(redis.coherentGetBuffer).toHaveBeenCalledWith('k');
  });

  it('should reject an unexpected script reply', async () => {
    redis.coherentSet.mockResolvedValue('OK');
    await expect(store.executeAtomic('k', setOperation(Buffer.from('x'), timestamp(1)))).rejects.toThrow(
      'Unexpected script reply: OK',
    );
  });

  describe('error mapping', () => {
    it('should map a CORRUPT script error to StoreCorruptionError', async () => {
      redis.coherentGetBuffer.mockRejectedValue(replyError('ERR Error running script: CORRUPT k: malformed write timestamp'));

      const promise = store.executeAtomic('k', getOperation());
      await expect(promise).rejects.toBeInstanceOf(StoreCorruptionError);
      await expect(promise).rejects.toMatchObject({ key: 'k' });
    });

    it('should map WRONGTYPE to StoreCorruptionError', async () => {
      redis.coherentSet.mockRejectedValue(
        replyError('WRONGTYPE Operation against a key holding the wrong kind of value'),
      );
      await expect(store.executeAtomic('k', setOperation(Buffer.from('x'), timestamp(1)))).rejects.toBeInstanceOf(
        StoreCorruptionError,
      );
    });

    it('should map connection failures to TransientStoreError', async () => {
      redis.coherentInvalidate.mockRejectedValue(new Error('Connection is closed.'));

      const promise = store.executeAtomic('k', invalidateOperation(timestamp(1), 120));
      await expect(promise).rejects.toBeInstanceOf(TransientStoreError);
      await expect(promise).rejects.toThrow('Store call failed for k: Connection is closed.');
    });

    it('should treat other script errors as transient', async () => {
      redis.coherentSet.mockRejectedValue(replyError('BUSY Redis is busy running a script'));
      await expect(store.executeAtomic('k', setOperation(Buffer.from('x'), timestamp(1)))).rejects.toBeInstanceOf(
        TransientStoreError,
      );
    });
  });

  describe('inspect', () => {
    it('should decode the raw hash', async () => {
      redis.hgetallBuffer.mockResolvedValue({
        ts_sec: Buffer.from('10'),
        ts_nsec: Buffer.from('0'),
        inv_sec: Buffer.from('12'),
        inv_nsec: Buffer.from('3'),
        v: Buffer.from('old'),
      });

      await expect(store.inspect('k')).resolves.toEqual({
        value: Buffer.from('old'),
        writeTs: { seconds: 10, nanoseconds: 0 },
        invalidateTs: { seconds: 12, nanoseconds: 3 },
      });
      expect(redis.hgetallBuffer).toHaveBeenCalledWith('k');
    });

    it('should resolve undefined for an absent key', async () => {
      redis.hgetallBuffer.mockResolvedValue({});
      await expect(store.inspect('k')).resolves.toBeUndefined();
    });

    it('should flag a malformed hash as corruption', async () => {
      redis.hgetallBuffer.mockResolvedValue({ inv_sec: Buffer.from('-1'), inv_nsec: Buffer.from('0') });
      await expect(store.inspect('k')).rejects.toBeInstanceOf(StoreCorruptionError);
    });
  });

  describe('waitUntilOnline', () => {
    it('should return once a ping succeeds', async () => {
      redis.ping
        .mockRejectedValueOnce(new Error('ECONNREFUSED'))
        .mockRejectedValueOnce(new Error('ECONNREFUSED'))
        .mockResolvedValue('PONG');

      await store.waitUntilOnline(5, 0);
      expect(redis.ping).toHaveBeenCalledTimes(3);
    });

    it('should give up after the last attempt', async () => {
      redis.ping.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(store.waitUntilOnline(2, 0)).rejects.toThrow('Store call failed for PING: Redis is not online');
      expect(redis.ping).toHaveBeenCalledTimes(2);
    });
  });
});

describe('loadScripts', () => {
  const luaDir = path.resolve(__dirname, '..', '..', 'lua');

  it('should prefix every script with the shared helpers', () => {
    const common = fs.readFileSync(path.join(luaDir, 'common.lua'), 'utf-8');
    const scripts = loadScripts(luaDir);

    expect(scripts.coherentSet).toBe(`${common}\n${fs.readFileSync(path.join(luaDir, 'set.lua'), 'utf-8')}`);
    expect(scripts.coherentInvalidate.startsWith(common)).toBe(true);
    expect(scripts.coherentGet.startsWith(common)).toBe(true);
  });

  it('should read the scripts from the project by default', () => {
    expect(loadScripts()).toEqual(loadScripts(luaDir));
  });
});
