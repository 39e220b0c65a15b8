import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../src/utils/keyed-lock.js';

describe('KeyedLock', () => {
  it('runs tasks under one key in submission order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = lock.run('a', async () => {
      await gate;
      order.push('first');
    });
    const second = lock.run('a', async () => {
      order.push('second');
    });
    const other = lock.run('b', async () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['other']);
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(['other', 'first', 'second']);
    expect(lock.activeKeys()).toEqual([]);
  });

  it('releases the key when a task throws', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('a', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await lock.run('a', async () => 42)).toBe(42);
  });
});
