import { describe, it, expect } from 'vitest';
import { KeyedMutex, Semaphore, parallelMap } from '../src/concurrency.js';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 5));

describe('Semaphore', () => {
  it('should hand permits to waiters in order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
  });
});

describe('parallelMap', () => {
  it('should keep input order in the results', async () => {
    const results = await parallelMap(
      [30, 10, 20],
      async value => {
        await new Promise(resolve => setTimeout(resolve, value));
        return value * 2;
      },
      3
    );

    expect(results).toEqual([60, 20, 40]);
  });

  it('should never run more mappers than the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await parallelMap(
      [1, 2, 3, 4, 5, 6],
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
      },
      2
    );

    expect(peak).toBe(2);
  });

  it('should propagate mapper failures', async () => {
    await expect(
      parallelMap([1, 2], async value => {
        if (value === 2) throw new Error('mapper failed');
        return value;
      }, 2)
    ).rejects.toThrow('mapper failed');
  });

  it('should start no mapper after a failure and wait for those in flight', async () => {
    const started: number[] = [];
    const finished: number[] = [];

    const attempt = parallelMap(
      [1, 2, 3, 4],
      async value => {
        started.push(value);
        if (value === 1) throw new Error('first failed');
        await tick();
        finished.push(value);
        return value;
      },
      2
    );

    await expect(attempt).rejects.toThrow('first failed');
    expect(started).toEqual([1, 2]);
    expect(finished).toEqual([2]);
  });
});

describe('KeyedMutex', () => {
  it('should serialise work for the same key', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const run = (label: string) =>
      mutex.run('1:hello', async () => {
        events.push(`${label}:start`);
        await tick();
        events.push(`${label}:end`);
        return label;
      });

    const results = await Promise.all([run('a'), run('b')]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should let different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const run = (key: string) =>
      mutex.run(key, async () => {
        events.push(`${key}:start`);
        await tick();
        events.push(`${key}:end`);
      });

    await Promise.all([run('1:a'), run('1:b')]);

    expect(events.slice(0, 2)).toEqual(['1:a:start', '1:b:start']);
  });

  it('should release the key after a failure', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.run('k', async () => 'next')).resolves.toBe('next');
    expect(mutex.size).toBe(0);
  });
});
