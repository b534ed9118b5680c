import { describe, it, expect } from 'vitest';
import { Semaphore } from '../semaphore.js';

describe('Semaphore', () => {
  it('grants up to capacity without waiting', async () => {
    const gate = new Semaphore(2);
    await gate.acquire();
    await gate.acquire();
    expect(gate.inUse).toBe(2);
    expect(gate.pending).toBe(0);
  });

  it('queues callers beyond capacity and serves them in order', async () => {
    const gate = new Semaphore(1);
    const order: string[] = [];
    const release = await gate.acquire();

    const first = gate.acquire().then((r) => {
      order.push('first');
      return r;
    });
    const second = gate.acquire().then((r) => {
      order.push('second');
      return r;
    });
    expect(gate.pending).toBe(2);

    release();
    (await first)();
    (await second)();

    expect(order).toEqual(['first', 'second']);
    expect(gate.inUse).toBe(0);
  });

  it('ignores a second call to the same release', async () => {
    const gate = new Semaphore(1);
    const release = await gate.acquire();
    release();
    release();

    await gate.acquire();
    expect(gate.inUse).toBe(1);
    expect(gate.pending).toBe(0);

    let granted = false;
    void gate.acquire().then(() => {
      granted = true;
    });
    await Promise.resolve();
    expect(granted).toBe(false);
  });

  it('releases the slot when the task throws', async () => {
    const gate = new Semaphore(1);
    await expect(gate.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(gate.inUse).toBe(0);
    await expect(gate.run(() => Promise.resolve(42))).resolves.toBe(42);
  });

  it('treats a capacity below one as one', async () => {
    const gate = new Semaphore(0);
    await gate.acquire();
    expect(gate.inUse).toBe(1);
  });
});
