/**
 * Tests for PersistentMemory
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PersistentMemory } from '../../../src/memory/PersistentMemory.js';
import {
  InvalidMemoryInputError,
  PersistenceFailedError,
  ThreadNotFoundError,
} from '../../../src/memory/errors.js';
import { createMemoryThread } from '../../../src/memory/types.js';
import { createMessage } from '../../../src/types/index.js';
import { FakeMemoryStore } from '../../mocks/FakeMemoryStore.js';

describe('PersistentMemory', () => {
  let store: FakeMemoryStore;
  let memory: PersistentMemory;

  beforeEach(() => {
    store = new FakeMemoryStore();
    memory = new PersistentMemory({ store, clock: () => new Date(5000) });
  });

  it('should write appends to the store', async () => {
    await memory.appendAll('t1', [createMessage('user', 'a'), createMessage('assistant', 'b')]);

    expect(store.entries.map((entry) => entry.message.content)).toEqual(['a', 'b']);
    expect(store.entries[0]?.recordedAt).toEqual(new Date(5000));
    expect(store.threads.get('t1')?.history).toEqual([
      createMessage('user', 'a'),
      createMessage('assistant', 'b'),
    ]);
  });

  it('should fall through to the store on a cache miss and repopulate the cache', async () => {
    store.threads.set('t1', createMemoryThread('t1', { history: [createMessage('user', 'stored')] }));

    expect(await memory.read('t1')).toEqual([createMessage('user', 'stored')]);

    store.failWith = new Error('store offline');
    expect(await memory.read('t1')).toEqual([createMessage('user', 'stored')]);
  });

  it('should keep stored history when appending to a thread the cache has not seen', async () => {
    store.threads.set('t1', createMemoryThread('t1', { history: [createMessage('user', 'first')] }));

    await memory.append('t1', createMessage('user', 'second'));

    const expected = [createMessage('user', 'first'), createMessage('user', 'second')];
    expect(await memory.read('t1')).toEqual(expected);
    expect(store.threads.get('t1')?.history).toEqual(expected);
    expect(store.entries).toHaveLength(1);
  });

  describe('concurrent writes', () => {
    beforeEach(() => {
      store.threads.set('t1', createMemoryThread('t1', { history: [createMessage('user', 'stored')] }));
    });

    it('should keep every append when store loads finish out of order', async () => {
      store.loadDelays = [5, 20];

      await Promise.all([
        memory.append('t1', createMessage('user', 'A')),
        memory.append('t1', createMessage('user', 'B')),
      ]);

      const expected = [
        createMessage('user', 'stored'),
        createMessage('user', 'A'),
        createMessage('user', 'B'),
      ];
      expect(await memory.read('t1')).toEqual(expected);
      expect(store.threads.get('t1')?.history).toEqual(expected);
    });

    it('should not let a slow read overwrite a newer append', async () => {
      store.loadDelays = [20, 5];

      const [history] = await Promise.all([
        memory.read('t1'),
        memory.append('t1', createMessage('user', 'A')),
      ]);

      const expected = [createMessage('user', 'stored'), createMessage('user', 'A')];
      expect(history).toEqual(expected);
      expect(await memory.read('t1')).toEqual(expected);
      expect(store.threads.get('t1')?.history).toEqual(expected);
    });
  });

  it('should fail with NotFound when neither side has the thread', async () => {
    await expect(memory.read('missing')).rejects.toBeInstanceOf(ThreadNotFoundError);
  });

  it('should write forks to the store', async () => {
    await memory.append('t1', createMessage('user', 'hello'));

    const forked = await memory.fork('t1', 't2');

    expect(store.threads.get('t2')).toEqual(forked);
    expect(forked.parentThreadId).toBe('t1');
  });

  it('should write upserts to both sides', async () => {
    const thread = createMemoryThread('t1', { history: [createMessage('user', 'x')] });

    await memory.upsert(thread);

    expect(store.threads.get('t1')).toBe(thread);
    expect(await memory.getThread('t1')).toBe(thread);
  });

  describe('search', () => {
    it('should prefer cached hits', async () => {
      await memory.append('t1', createMessage('user', 'release notes'));
      store.failWith = new Error('store offline');

      const entries = await memory.search('release');

      expect(entries.map((entry) => entry.message.content)).toEqual(['release notes']);
    });

    it('should fall back to the store when the cache has no hit', async () => {
      store.entries.push({
        threadId: 'archived',
        message: createMessage('user', 'release plan'),
        recordedAt: new Date(100),
      });

      const entries = await memory.search('release');

      expect(entries.map((entry) => entry.threadId)).toEqual(['archived']);
    });

    it('should not consult the store for invalid input', async () => {
      store.failWith = new Error('store offline');

      await expect(memory.search('')).rejects.toBeInstanceOf(InvalidMemoryInputError);
    });
  });

  it('should wrap store failures as PersistenceFailed', async () => {
    store.failWith = new Error('disk full');

    const error = await memory.append('t1', createMessage('user', 'x')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PersistenceFailedError);
    expect(error instanceof PersistenceFailedError && error.message).toBe('disk full');
  });
});
