import { describe, it, expect } from 'vitest';
import { MemoryKeyValueStore } from '@/engine/kv-store.js';

describe('MemoryKeyValueStore', () => {
  it('stores, overwrites and deletes values', () => {
    const store = new MemoryKeyValueStore();
    expect(store.get('a')).toBeNull();
    store.put('a', '1');
    store.put('a', '2');
    expect(store.get('a')).toBe('2');
    store.delete('a');
    expect(store.get('a')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('commits transaction writes together', () => {
    const store = new MemoryKeyValueStore();
    store.put('gone', 'x');

    const result = store.transaction((tx) => {
      tx.put('a', '1');
      tx.put('b', '2');
      tx.delete('gone');
      // Reads inside the transaction see its own writes
      expect(tx.get('a')).toBe('1');
      expect(tx.get('gone')).toBeNull();
      // ...but the base store does not until commit
      expect(store.get('a')).toBeNull();
      return 'done';
    });

    expect(result).toBe('done');
    expect(store.get('a')).toBe('1');
    expect(store.get('b')).toBe('2');
    expect(store.get('gone')).toBeNull();
  });

  it('discards every write when the transaction throws', () => {
    const store = new MemoryKeyValueStore();
    store.put('a', 'original');

    expect(() =>
      store.transaction((tx) => {
        tx.put('a', 'changed');
        tx.put('b', 'new');
        throw new Error('abort');
      }),
    ).toThrow('abort');

    expect(store.get('a')).toBe('original');
    expect(store.get('b')).toBeNull();
    expect(store.size).toBe(1);
  });

  it('rejects nested transactions', () => {
    const store = new MemoryKeyValueStore();
    expect(() => store.transaction(() => store.transaction(() => 1))).toThrow('Nested transactions are not supported');
    // The outer transaction is released after the failure
    expect(store.transaction(() => 2)).toBe(2);
  });
});
