import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../src/domain/concurrency/KeyedMutex.js';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  it('runs tasks for the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive('cust-1', task('a')),
      mutex.runExclusive('cust-1', task('b')),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys run side by side', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    };

    await Promise.all([
      mutex.runExclusive('cust-1', task('a')),
      mutex.runExclusive('cust-2', task('b')),
    ]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('keeps going after a task fails', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('cust-1', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('cust-1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets idle keys', async () => {
    const mutex = new KeyedMutex();

    await mutex.runExclusive('cust-1', async () => undefined);

    expect(mutex.getPendingKeyCount()).toBe(0);
  });
});
