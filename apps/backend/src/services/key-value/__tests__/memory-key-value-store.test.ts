/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryKeyValueStore } from '../memory-key-value-store.js';

describe('MemoryKeyValueStore', () => {
  let now: number;
  let store: MemoryKeyValueStore;

  beforeEach(() => {
    now = 1_000_000;
    store = new MemoryKeyValueStore(() => now);
  });

  it('stores and deletes values', async () => {
    await store.set('greeting', 'hello');

    expect(await store.get('greeting')).toBe('hello');
    expect(await store.del('greeting')).toBe(1);
    expect(await store.del('greeting')).toBe(0);
    expect(await store.get('greeting')).toBeNull();
  });

  it('expires a value exactly at its TTL', async () => {
    await store.set('token', 'abc', 1000);

    now += 999;
    expect(await store.get('token')).toBe('abc');

    now += 1;
    expect(await store.get('token')).toBeNull();
  });

  it('sets a value only when the key is absent or expired', async () => {
    expect(await store.setIfAbsent('lock', 'first', 1000)).toBe(true);
    expect(await store.setIfAbsent('lock', 'second', 1000)).toBe(false);
    expect(await store.get('lock')).toBe('first');

    now += 1000;
    expect(await store.setIfAbsent('lock', 'third', 1000)).toBe(true);
    expect(await store.get('lock')).toBe('third');
  });

  it('increments from zero and accepts negative amounts', async () => {
    expect(await store.incrBy('counter', 3)).toBe(3);
    expect(await store.incrBy('counter', -1)).toBe(2);
  });

  it('keeps the previous expiry when incrementing without a TTL', async () => {
    await store.incrBy('counter', 1, 500);
    now += 400;
    await store.incrBy('counter', 1);

    now += 100;
    expect(await store.get('counter')).toBeNull();
  });

  it('refuses to increment a non-integer value', async () => {
    await store.set('name', 'abc');

    await expect(store.incrBy('name', 1)).rejects.toThrow('Value at name is not an integer');
  });

  it('sweeps expired entries', async () => {
    await store.set('short', 'a', 100);
    await store.set('long', 'b', 10_000);
    await store.set('forever', 'c');

    now += 100;

    expect(await store.sweep()).toBe(1);
    expect(await store.get('long')).toBe('b');
    expect(await store.get('forever')).toBe('c');
  });
});
