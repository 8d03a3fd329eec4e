import { Transaction } from '../src/transaction/Transaction';
import { WriteBuffer } from '../src/transaction/WriteBuffer';
import { MemoryStore } from '../src/store/MemoryStore';
import { TransactionStateError, UncommittedTransactionError } from '../src/utils/errors';
import { FlakyStore } from './helpers/FlakyStore';
import { RejectingBuffer } from './helpers/RejectingBuffer';

describe('Transaction', () => {
  let backend: FlakyStore;
  let buffer: WriteBuffer;
  let txn: Transaction;

  beforeEach(() => {
    backend = new FlakyStore();
    buffer = new WriteBuffer();
    txn = new Transaction(buffer, backend);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('reads', () => {
    test('should fall through to the backend once for unknown keys', async () => {
      await backend.set('k', 'remote');
      const spy = jest.spyOn(backend, 'get');

      const entry = await txn.get('k');

      expect(entry?.value).toBe('remote');
      expect(spy).toHaveBeenCalledTimes(1);
    });

    test('should issue a distinct token for every read', async () => {
      await backend.set('k', 'remote');

      const first = await txn.get('k');
      const second = await txn.get('k');
      const many = await txn.getMulti(['k']);

      const tokens = new Set([first?.token, second?.token, many.get('k')?.token]);
      expect(tokens.size).toBe(3);
    });

    test('should not hand out backend tokens', async () => {
      await backend.set('k', 'remote');
      const remote = await backend.get('k');

      const entry = await txn.get('k');
      expect(entry?.token).not.toBe(remote?.token);
    });

    test('should read its own writes without touching the backend', async () => {
      const spy = jest.spyOn(backend, 'get');

      await txn.set('k', 'mine');
      const entry = await txn.get('k');

      expect(entry?.value).toBe('mine');
      expect(spy).not.toHaveBeenCalled();
    });

    test('getMulti should only ask the backend for keys the buffer does not know', async () => {
      await backend.set('remote', 'r');
      await backend.set('deleted', 'stale');
      await txn.set('local', 'l');
      await txn.delete('deleted');
      const spy = jest.spyOn(backend, 'getMulti');

      const found = await txn.getMulti(['local', 'remote', 'deleted', 'missing']);

      expect(spy).toHaveBeenCalledWith(['remote', 'missing']);
      expect(Array.from(found.keys())).toEqual(['local', 'remote']);
      expect(found.get('local')?.value).toBe('l');
      expect(found.get('remote')?.value).toBe('r');
    });

    test('getMulti should skip the backend entirely when everything is buffered', async () => {
      await txn.set('a', 1);
      const spy = jest.spyOn(backend, 'getMulti');

      await txn.getMulti(['a']);
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('writes', () => {
    test('should defer writes until commit', async () => {
      await txn.set('k', 'v');

      expect(await backend.get('k')).toBeNull();
      expect(txn.pending).toBe(1);

      expect(await txn.commit()).toBe(true);
      expect((await backend.get('k'))?.value).toBe('v');
      expect(txn.pending).toBe(0);
    });

    test('should replay a copy of the value as it was written', async () => {
      const value = { n: 1 };
      await txn.set('k', value);
      value.n = 2;

      await txn.commit();
      expect((await backend.get('k'))?.value).toEqual({ n: 1 });
    });

    test('setMulti should report buffer outcomes and defer one action', async () => {
      const result = await txn.setMulti(new Map<string, unknown>([['a', 1], ['b', 2]]));

      expect(result).toEqual(new Map([['a', true], ['b', true]]));
      expect(txn.pending).toBe(1);

      await txn.commit();
      expect((await backend.get('b'))?.value).toBe(2);
    });

    test('add should fail when the key exists on the backend', async () => {
      await backend.set('k', 'remote');

      expect(await txn.add('k', 'mine')).toBe(false);
      expect(txn.pending).toBe(0);
    });

    test('add should fail when the key exists only in this transaction', async () => {
      await txn.set('k', 'mine');

      expect(await txn.add('k', 'again')).toBe(false);
      expect(txn.pending).toBe(1);
    });

    test('add should succeed after a delete in the same transaction', async () => {
      await backend.set('k', 'remote');
      await txn.delete('k');

      expect(await txn.add('k', 'fresh')).toBe(true);
      expect((await txn.get('k'))?.value).toBe('fresh');
    });

    test('replace should only succeed for keys visible to the transaction', async () => {
      expect(await txn.replace('k', 'v')).toBe(false);

      await txn.set('k', 'v1');
      expect(await txn.replace('k', 'v2')).toBe(true);

      await txn.commit();
      expect((await backend.get('k'))?.value).toBe('v2');
    });

    test('touch should fail for missing keys and defer for existing ones', async () => {
      expect(await txn.touch('missing', 60)).toBe(false);

      await backend.set('k', 'v');
      expect(await txn.touch('k', 60)).toBe(true);
      expect(txn.pending).toBe(1);
      expect(await txn.commit()).toBe(true);
      expect((await backend.get('k'))?.value).toBe('v');
    });
  });

  describe('local buffer failures', () => {
    let rejecting: RejectingBuffer;

    beforeEach(() => {
      rejecting = new RejectingBuffer();
      txn = new Transaction(rejecting, backend);
    });

    test('set should fail without deferring anything', async () => {
      rejecting.reject('k');

      expect(await txn.set('k', 'v')).toBe(false);
      expect(txn.pending).toBe(0);
    });

    test('add should fail without deferring anything', async () => {
      rejecting.reject('k');

      expect(await txn.add('k', 'v')).toBe(false);
      expect(txn.pending).toBe(0);
    });

    test('replace, touch and counters should fail without deferring anything', async () => {
      await backend.set('k', 1);
      rejecting.reject('k');

      expect(await txn.replace('k', 2)).toBe(false);
      expect(await txn.touch('k', 60)).toBe(false);
      expect(await txn.increment('k')).toBe(false);
      expect(await txn.decrement('k')).toBe(false);
      expect(txn.pending).toBe(0);
    });

    test('cas should fail without deferring anything', async () => {
      await backend.set('k', 1);
      const read = await txn.get('k');
      rejecting.reject('k');

      expect(await txn.cas(read?.token ?? '', 'k', 2)).toBe(false);
      expect(txn.pending).toBe(0);
    });

    test('delete should fail and leave the key visible', async () => {
      await backend.set('k', 'remote');
      rejecting.reject('k');

      expect(await txn.delete('k')).toBe(false);
      expect(txn.pending).toBe(0);
      expect((await txn.get('k'))?.value).toBe('remote');
    });

    test('deleteMulti should report every key as failed', async () => {
      await backend.set('a', 1);
      await backend.set('b', 2);
      rejecting.reject('b');

      const result = await txn.deleteMulti(['a', 'b']);

      expect(result).toEqual(new Map([['a', false], ['b', false]]));
      expect(txn.pending).toBe(0);
    });

    test('setMulti should only defer the keys the buffer accepted', async () => {
      rejecting.reject('b');

      const result = await txn.setMulti(new Map<string, unknown>([['a', 1], ['b', 2], ['c', 3]]));

      expect(result).toEqual(new Map([['a', true], ['b', false], ['c', true]]));
      expect(txn.pending).toBe(1);

      const spy = jest.spyOn(backend, 'setMulti');
      expect(await txn.commit()).toBe(true);
      expect(spy).toHaveBeenCalledWith(new Map([['a', 1], ['c', 3]]), 0);
      expect(await backend.get('b')).toBeNull();
    });
  });

  describe('deletes', () => {
    test('should hide the backend value until commit', async () => {
      await backend.set('k', 'remote');

      expect(await txn.delete('k')).toBe(true);

      const spy = jest.spyOn(backend, 'get');
      expect(await txn.get('k')).toBeNull();
      expect(spy).not.toHaveBeenCalled();
      expect((await backend.get('k'))?.value).toBe('remote');

      await txn.commit();
      expect(await backend.get('k')).toBeNull();
    });

    test('should report missing keys without deferring anything', async () => {
      expect(await txn.delete('missing')).toBe(false);
      expect(txn.pending).toBe(0);
    });

    test('should count buffered writes as existing', async () => {
      await txn.set('k', 'v');

      expect(await txn.delete('k')).toBe(true);
      expect(txn.pending).toBe(2);
    });

    test('deleteMulti should report existence per key', async () => {
      await backend.set('a', 1);
      await txn.set('b', 2);

      const result = await txn.deleteMulti(['a', 'b', 'c']);

      expect(result).toEqual(new Map([['a', true], ['b', true], ['c', false]]));
      expect(await txn.getMulti(['a', 'b', 'c'])).toEqual(new Map());
    });

    test('deleteMulti should not defer anything when no key exists', async () => {
      const result = await txn.deleteMulti(['x', 'y']);

      expect(result).toEqual(new Map([['x', false], ['y', false]]));
      expect(txn.pending).toBe(0);
    });
  });

  describe('cas', () => {
    test('should succeed locally with a fresh token and replay on commit', async () => {
      await txn.set('a', 1);
      const read = await txn.get('a');

      expect(await txn.cas(read?.token ?? '', 'a', 2)).toBe(true);
      expect((await txn.get('a'))?.value).toBe(2);

      expect(await txn.commit()).toBe(true);
      expect((await backend.get('a'))?.value).toBe(2);
    });

    test('should fail for unknown tokens', async () => {
      await backend.set('a', 1);
      expect(await txn.cas('not-a-token', 'a', 2)).toBe(false);
    });

    test('should fail for backend-issued tokens', async () => {
      await backend.set('a', 1);
      const remote = await backend.get('a');

      expect(await txn.cas(remote?.token ?? '', 'a', 2)).toBe(false);
    });

    test('should fail when the transaction has since seen a different value', async () => {
      await backend.set('a', 1);
      const read = await txn.get('a');
      await txn.set('a', 5);

      expect(await txn.cas(read?.token ?? '', 'a', 2)).toBe(false);
      expect((await txn.get('a'))?.value).toBe(5);
    });

    test('should fail when the token was issued for another key', async () => {
      await backend.set('a', 1);
      await backend.set('b', 1);
      const read = await txn.get('a');

      expect(await txn.cas(read?.token ?? '', 'b', 2)).toBe(false);
    });

    test('should not accept tokens from before a commit', async () => {
      await backend.set('a', 1);
      const read = await txn.get('a');
      await txn.commit();

      expect(await txn.cas(read?.token ?? '', 'a', 2)).toBe(false);
    });

    test('should not be affected by mutating the value that was read', async () => {
      await backend.set('a', { n: 1 });
      const read = await txn.get('a');
      if (!read) throw new Error('expected a value');

      const value = read.value;
      if (typeof value === 'object' && value !== null && 'n' in value) {
        value.n = 99;
      }

      expect(await txn.cas(read.token, 'a', { n: 2 })).toBe(true);
    });

    test('should fail the commit when another writer changed the key', async () => {
      await backend.set('a', 1);
      const read = await txn.get('a');
      await txn.set('b', 'side effect');
      await txn.cas(read?.token ?? '', 'a', 2);

      await backend.set('a', 'external');

      expect(await txn.commit()).toBe(false);
      expect(await backend.get('a')).toBeNull();
      expect(await backend.get('b')).toBeNull();
    });
  });

  describe('counters', () => {
    test('should seed absent counters with the initial value', async () => {
      expect(await txn.increment('k', 5, 10)).toBe(10);
      expect(await txn.increment('k', 5, 10)).toBe(15);
    });

    test('should seed decrements so the first result is the initial value', async () => {
      expect(await txn.decrement('k', 3, 7)).toBe(7);
      expect(await txn.decrement('k', 3, 7)).toBe(4);
    });

    test('should build on the backend value', async () => {
      await backend.set('k', 40);
      expect(await txn.increment('k', 2)).toBe(42);
      expect((await backend.get('k'))?.value).toBe(40);

      await txn.commit();
      expect((await backend.get('k'))?.value).toBe(42);
    });

    test('should clamp at zero', async () => {
      await txn.set('k', 2);
      expect(await txn.decrement('k', 5)).toBe(0);
    });

    test('should reject invalid arguments without side effects', async () => {
      expect(await txn.increment('k', 0)).toBe(false);
      expect(await txn.increment('k', 1, -1)).toBe(false);
      expect(await txn.decrement('k', -2)).toBe(false);
      expect(txn.pending).toBe(0);
      expect(buffer.presence('k')).toBe('unknown');
    });

    test('should reject non-numeric values', async () => {
      await txn.set('k', 'abc');
      expect(await txn.increment('k')).toBe(false);
      expect(txn.pending).toBe(1);
    });

    test('should replay the increment against the backend', async () => {
      await txn.increment('k', 5, 10);
      await txn.increment('k', 5, 10);
      await txn.commit();

      expect((await backend.get('k'))?.value).toBe(15);
    });
  });

  describe('flush', () => {
    test('should discard pending writes and suspend backend reads', async () => {
      await backend.set('remote', 'r');
      await txn.set('a', 1);

      expect(await txn.flush()).toBe(true);
      expect(txn.pending).toBe(1);
      expect(txn.readsSuspended).toBe(true);

      const spy = jest.spyOn(backend, 'get');
      expect(await txn.get('remote')).toBeNull();
      expect(await txn.get('a')).toBeNull();
      expect(spy).not.toHaveBeenCalled();
    });

    test('getMulti should not reach the backend while reads are suspended', async () => {
      await backend.set('remote', 'r');
      await txn.flush();
      const spy = jest.spyOn(backend, 'getMulti');

      expect(await txn.getMulti(['remote', 'other'])).toEqual(new Map());
      expect(spy).not.toHaveBeenCalled();
    });

    test('should still see keys written after the flush', async () => {
      await txn.flush();
      await txn.set('b', 2);

      const found = await txn.getMulti(['b', 'remote']);
      expect(Array.from(found.keys())).toEqual(['b']);
    });

    test('should wipe the backend on commit and resume reads', async () => {
      await backend.set('remote', 'r');
      await txn.flush();
      await txn.set('b', 2);

      expect(await txn.commit()).toBe(true);
      expect(await backend.get('remote')).toBeNull();
      expect((await backend.get('b'))?.value).toBe(2);
      expect(txn.readsSuspended).toBe(false);
    });
  });

  describe('commit and rollback', () => {
    test('should succeed trivially with nothing deferred', async () => {
      await backend.set('k', 'v');
      const spies = [
        jest.spyOn(backend, 'set'),
        jest.spyOn(backend, 'delete'),
        jest.spyOn(backend, 'deleteMulti'),
        jest.spyOn(backend, 'flush')
      ];

      expect(await txn.commit()).toBe(true);
      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
      }
      expect((await backend.get('k'))?.value).toBe('v');
    });

    test('later writes to the same key should win', async () => {
      await txn.set('a', 1);
      await txn.set('a', 2);
      await txn.commit();

      expect((await backend.get('a'))?.value).toBe(2);
    });

    test('should invalidate every touched key when an action fails', async () => {
      await backend.set('before', 'old');
      backend.failOn('set', 'bad');

      await txn.set('before', 'new');
      await txn.set('bad', 'x');
      await txn.set('after', 'never');

      const spy = jest.spyOn(backend, 'deleteMulti');
      expect(await txn.commit()).toBe(false);

      expect(spy).toHaveBeenCalledWith(['before', 'bad']);
      expect(await backend.get('before')).toBeNull();
      expect(await backend.get('after')).toBeNull();
      expect(txn.pending).toBe(0);
      expect(txn.state).toBe('active');
    });

    test('should stop replaying at the first failure', async () => {
      backend.failOn('add', 'a');
      await txn.add('a', 1);
      await txn.set('b', 2);
      const spy = jest.spyOn(backend, 'set');

      expect(await txn.commit()).toBe(false);
      expect(spy).not.toHaveBeenCalled();
    });

    test('should roll back and rethrow when the backend throws', async () => {
      await txn.set('a', 1);
      await txn.touch('a', 30);
      backend.throwOn('touch');

      await expect(txn.commit()).rejects.toThrow('backend unavailable during touch');
      expect(await backend.get('a')).toBeNull();
      expect(txn.pending).toBe(0);
      expect(txn.state).toBe('active');
    });

    test('rollback should complete even if invalidation fails', async () => {
      backend.failOn('set', 'b');
      backend.throwOn('deleteMulti');
      await txn.set('a', 1);
      await txn.set('b', 2);

      expect(await txn.commit()).toBe(false);
      expect(txn.pending).toBe(0);
      expect((await backend.get('a'))?.value).toBe(1);
    });

    test('explicit rollback should discard deferred work without touching the backend', async () => {
      await backend.set('k', 'v');
      await txn.set('k', 'changed');
      const spy = jest.spyOn(backend, 'deleteMulti');

      expect(await txn.rollback()).toBe(true);
      expect(spy).not.toHaveBeenCalled();
      expect((await backend.get('k'))?.value).toBe('v');
      expect(txn.pending).toBe(0);
      expect((await txn.get('k'))?.value).toBe('v');
    });

    test('rolled back deletes should not hide backend values afterwards', async () => {
      await backend.set('d', 'keep');
      await txn.delete('d');
      expect(await txn.get('d')).toBeNull();

      await txn.rollback();
      expect((await txn.get('d'))?.value).toBe('keep');
      expect(buffer.presence('d')).toBe('unknown');
    });

    test('should read the backend again after a failed commit', async () => {
      await backend.set('a', 1);
      const read = await txn.get('a');
      await txn.cas(read?.token ?? '', 'a', 2);
      await backend.set('a', 'external');

      expect(await txn.commit()).toBe(false);
      expect(await txn.get('a')).toBeNull();

      await backend.set('a', 'fresh');
      expect((await txn.get('a'))?.value).toBe('fresh');
    });

    test('should drop its buffered copies after a successful commit', async () => {
      await txn.set('a', 1);
      await txn.commit();

      await backend.set('a', 'external');
      expect((await txn.get('a'))?.value).toBe('external');
    });

    test('should be reusable after commit', async () => {
      await txn.set('a', 1);
      await txn.commit();

      await txn.set('b', 2);
      expect(txn.pending).toBe(1);
      await txn.commit();
      expect((await backend.get('b'))?.value).toBe(2);
    });

    test('should reject operations while committing', async () => {
      const slow = new MemoryStore();
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => { release = resolve; });
      jest.spyOn(slow, 'set').mockImplementation(async () => {
        await gate;
        return true;
      });

      const committing = new Transaction(new WriteBuffer(), slow);
      await committing.set('a', 1);
      const pendingCommit = committing.commit();

      expect(committing.state).toBe('committing');
      await expect(committing.get('a')).rejects.toBeInstanceOf(TransactionStateError);
      await expect(committing.rollback()).rejects.toBeInstanceOf(TransactionStateError);

      release();
      expect(await pendingCommit).toBe(true);
      expect(committing.state).toBe('active');
    });
  });

  describe('close', () => {
    test('should throw when deferred work is left behind', async () => {
      await txn.set('k', 'v');

      expect(() => txn.close()).toThrow(UncommittedTransactionError);
      await txn.rollback();
    });

    test('should pass once the transaction is finished', async () => {
      await txn.set('k', 'v');
      await txn.commit();

      expect(() => txn.close()).not.toThrow();
    });
  });
});
